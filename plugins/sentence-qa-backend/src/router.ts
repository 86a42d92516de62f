/*
 * Copyright (C) 2025-2026 flickleafy
 *
 * This program is free software: you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation, either version 3 of the License, or
 * (at your option) any later version.
 *
 * This program is distributed in the hope that it will be useful,
 * but WITHOUT ANY WARRANTY; without even the implied warranty of
 * MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE. See the
 * GNU General Public License for more details.
 *
 * You should have received a copy of the GNU General Public License
 * along with this program. If not, see <https://www.gnu.org/licenses/>.
 */

/**
 * Express router for the sentence Q&A backend
 * Handles HTTP requests and delegates to the services
 *
 * @packageDocumentation
 */

import express, { NextFunction, Request, RequestHandler, Response, Router } from 'express';
import multer from 'multer';
import path from 'path';
import { z } from 'zod';
import { InputError, SentenceQaError, errorMessage } from './errors';
import { SentenceQaServices } from './plugin';

const retrievalLevel = z.union([z.literal(0), z.literal(1), z.literal(2), z.literal(3), z.literal(4)]);

export const askRequestSchema = z.object({
  query: z.string().trim().min(1, 'query is required').max(2000),
  limit: z.number().int().min(5).max(50).optional(),
  customPrompt: z.string().max(1000).optional(),
  enabledLevels: z.array(retrievalLevel).min(1).optional(),
});

export const continueRequestSchema = z.object({
  sessionId: z.string().min(1, 'sessionId is required'),
  limit: z.number().int().min(5).max(50).optional(),
  customPrompt: z.string().max(1000).optional(),
});

function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): T {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || 'body'}: ${issue.message}`);
    throw new InputError(issues.join('; '));
  }
  return parsed.data;
}

/**
 * UTF-8, or latin1 when the bytes are not valid UTF-8
 */
export function decodeUpload(buffer: Buffer): string {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(buffer);
  } catch {
    return buffer.toString('latin1');
  }
}

/**
 * Forward rejected promises to the error handler
 */
function asyncHandler(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

/**
 * Create and configure the sentence Q&A router
 * Follows Dependency Injection and Single Responsibility principles
 */
export function createSentenceQaRouter(services: SentenceQaServices): Router {
  const router = Router();
  router.use(express.json());

  const { logger, config, llmService, sentenceStore, sessionStore, questionService, ingestionService } = services;
  const { maxUploadBytes } = config.getConfig().ingestion;

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: maxUploadBytes },
    fileFilter: (_req, file, cb) => {
      if (path.extname(file.originalname).toLowerCase() === '.txt') {
        cb(null, true);
      } else {
        cb(new InputError('Only .txt files are supported. Please convert your document to .txt format.'));
      }
    },
  });

  const readUpload = (req: Request): { text: string; filename: string } => {
    if (!req.file) {
      throw new InputError('No file uploaded. Send the file in the "file" field.');
    }
    return { text: decodeUpload(req.file.buffer), filename: req.file.originalname };
  };

  /**
   * POST /ask
   * Ask a question and open a session
   */
  router.post(
    '/ask',
    asyncHandler(async (req, res) => {
      const request = parseBody(askRequestSchema, req.body);
      res.json(await questionService.ask(request));
    })
  );

  /**
   * POST /continue
   * Tell me more about the session's question
   */
  router.post(
    '/continue',
    asyncHandler(async (req, res) => {
      const request = parseBody(continueRequestSchema, req.body);
      res.json(await questionService.continue(request));
    })
  );

  /**
   * POST /upload
   * Index a .txt file
   */
  router.post(
    '/upload',
    upload.single('file'),
    asyncHandler(async (req, res) => {
      const { text, filename } = readUpload(req);
      res.json(await ingestionService.indexText(text, filename));
    })
  );

  /**
   * POST /replace
   * Drop the corpus and every session, then index the new file
   */
  router.post(
    '/replace',
    upload.single('file'),
    asyncHandler(async (req, res) => {
      const { text, filename } = readUpload(req);
      const deleted = await ingestionService.deleteAll();
      sessionStore.clearAll();
      logger.info(`Replacing corpus: removed ${deleted} sentences`);
      res.json(await ingestionService.indexText(text, filename));
    })
  );

  /**
   * DELETE /documents
   */
  router.delete(
    '/documents',
    asyncHandler(async (_req, res) => {
      const documentsDeleted = await ingestionService.deleteAll();
      sessionStore.clearAll();
      res.json({ message: 'All documents deleted successfully', documentsDeleted });
    })
  );

  /**
   * GET /documents/count
   */
  router.get(
    '/documents/count',
    asyncHandler(async (_req, res) => {
      const totalDocuments = await sentenceStore.count();
      const maxLevel = await sentenceStore.maxLevel();
      res.json({
        totalDocuments,
        maxLevel,
        levelsAvailable: totalDocuments > 0 ? maxLevel + 1 : 0,
        ready: totalDocuments > 0,
      });
    })
  );

  /**
   * GET /health
   */
  router.get(
    '/health',
    asyncHandler(async (_req, res) => {
      let documentsIndexed = 0;
      let storeReachable = true;
      try {
        documentsIndexed = await sentenceStore.count();
      } catch (error) {
        storeReachable = false;
        logger.error(`Health check: sentence store unavailable: ${errorMessage(error)}`);
      }
      const llm = await llmService.healthCheck();

      let status: 'healthy' | 'degraded' | 'unhealthy' = 'degraded';
      if (!storeReachable) {
        status = 'unhealthy';
      } else if (llm && documentsIndexed > 0) {
        status = 'healthy';
      }

      res.json({
        status,
        llm,
        documentsIndexed,
        activeSessions: sessionStore.count(),
        ready: documentsIndexed > 0,
        message: documentsIndexed === 0 ? 'Upload a file with POST /upload to get started' : 'System ready for queries',
      });
    })
  );

  // Error handler (must be after routes)
  router.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof multer.MulterError) {
      const message =
        error.code === 'LIMIT_FILE_SIZE'
          ? `File too large. Maximum size is ${Math.round(maxUploadBytes / (1024 * 1024))}MB.`
          : `Upload error: ${error.message}`;
      res.status(400).json({ error: 'InputError', message });
      return;
    }
    if (error instanceof SyntaxError) {
      res.status(400).json({ error: 'InputError', message: 'Request body is not valid JSON' });
      return;
    }
    if (error instanceof SentenceQaError) {
      logger.warn(`Request failed (${error.statusCode}): ${error.message}`);
      res.status(error.statusCode).json({ error: error.name, message: error.message });
      return;
    }
    logger.error(`Unhandled request error: ${errorMessage(error)}`);
    res.status(500).json({ error: 'InternalError', message: errorMessage(error) });
  });

  return router;
}
