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
 * Standalone HTTP server
 *
 * @packageDocumentation
 */

import dotenv from 'dotenv';
import express, { Express } from 'express';
import { createRootLogger } from './logger';
import { PluginEnvironment, createServices } from './plugin';
import { createSentenceQaRouter } from './router';
import { ConfigService } from './services';

/**
 * Express app with the router mounted at the root
 */
export async function createApp(env: PluginEnvironment): Promise<Express> {
  const app = express();
  const services = await createServices(env);
  app.use(createSentenceQaRouter(services));
  return app;
}

export async function startServer(): Promise<void> {
  dotenv.config();

  const logger = createRootLogger();
  const config = ConfigService.fromEnv(process.env);
  const app = await createApp({ logger, config });
  const { port } = config.getConfig();

  app.listen(port, () => {
    logger.info(`Sentence Q&A backend listening on port ${port}`);
  });
}

if (require.main === module) {
  startServer().catch(error => {
    // eslint-disable-next-line no-console
    console.error('Failed to start server', error);
    process.exit(1);
  });
}
