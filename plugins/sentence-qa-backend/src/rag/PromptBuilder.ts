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
 * Prompt construction for answers and question variants
 *
 * @packageDocumentation
 */

import { ChatMessage, RetrievedSentence, SourceSentence } from '../models';

export const SOURCE_TYPE_LABELS = {
  semantic: 'Pure semantic',
  0: 'Level 0: keyword combination',
  1: 'Level 1: keyword + auxiliary word',
  2: 'Level 2: synonym combination',
  3: 'Level 3: synonym + auxiliary word',
  4: 'Level 4: semantic fallback',
} as const;

export function sourceTypeLabel(sentence: Pick<RetrievedSentence, 'retrievalLevel' | 'isPrimarySource'>): string {
  if (sentence.isPrimarySource) {
    return SOURCE_TYPE_LABELS.semantic;
  }
  return SOURCE_TYPE_LABELS[sentence.retrievalLevel];
}

/**
 * API view of a retrieved sentence
 */
export function toSourceSentence(sentence: RetrievedSentence): SourceSentence {
  const source: SourceSentence = {
    text: sentence.text,
    level: sentence.retrievalLevel,
    documentLevel: sentence.level,
    score: sentence.score,
    sentenceIndex: sentence.sentenceIndex,
    sourceTypeLabel: sourceTypeLabel(sentence),
    isPrimarySource: sentence.isPrimarySource,
  };

  const match = sentence.match;
  switch (match.kind) {
    case 'keyword_combo':
      source.keywordCombo = match.keywordCombo;
      break;
    case 'synonym_combo':
      source.keywordCombo = match.keywordCombo;
      source.synonymUsed = match.synonymUsed;
      break;
    case 'auxiliary_pair':
      source.magicWordUsed = match.magicWordUsed;
      if (match.synonymUsed) {
        source.synonymUsed = match.synonymUsed;
      }
      break;
    case 'semantic':
      break;
  }
  return source;
}

export interface AnswerPromptInput {
  question: string;
  questionVariants?: string;
  keywords: string[];
  sources: RetrievedSentence[];
  /** 0 for the first answer, n for the n-th "tell me more" */
  continueCount: number;
  customPrompt?: string;
}

/**
 * Group sources under their source type label, keeping first-seen group order
 */
export function formatSourceBlock(sources: readonly RetrievedSentence[]): string {
  const groups = new Map<string, string[]>();
  for (const source of sources) {
    const label = sourceTypeLabel(source);
    const lines = groups.get(label) ?? [];
    lines.push(`- ${source.text}`);
    groups.set(label, lines);
  }

  return [...groups.entries()].map(([label, lines]) => `[${label}]\n${lines.join('\n')}`).join('\n\n');
}

function instructionsFor(continueCount: number): string {
  if (continueCount > 0) {
    return `Instructions:
- This is a FOLLOW-UP request (Continue #${continueCount}).
- The user wants MORE DETAILS and DEEPER information.
- Use ONLY the NEW source sentences above to EXPAND the answer.
- DO NOT repeat information from previous answers.
- If the sources add nothing new, say that all available information has been provided.`;
  }
  return `Instructions:
- Use ONLY the information in the source sentences to answer.
- If you cannot find the answer, say you don't have enough information.
- Answer clearly and concisely.`;
}

/**
 * Messages for the final answer
 */
export function buildAnswerMessages(input: AnswerPromptInput): ChatMessage[] {
  const sections = [`User original question:\n${input.question}`];

  if (input.questionVariants?.trim()) {
    sections.push(`Question variations:\n${input.questionVariants.trim()}`);
  }
  if (input.keywords.length > 0) {
    sections.push(`Keywords:\n${input.keywords.join(', ')}`);
  }
  sections.push(`Source sentences (grouped by source type):\n${formatSourceBlock(input.sources)}`);
  sections.push(instructionsFor(input.continueCount));

  if (input.customPrompt?.trim()) {
    sections.push(`User custom instructions:\n${input.customPrompt.trim()}`);
  }

  return [
    {
      role: 'system',
      content: 'You answer questions strictly from the source sentences you are given.',
    },
    { role: 'user', content: sections.join('\n\n') },
  ];
}

/**
 * Messages asking for 3-4 rewrites of the question. Earlier rewrites are
 * listed so a follow-up asks for new angles.
 */
export function buildVariantMessages(question: string, previousVariants: readonly string[]): ChatMessage[] {
  const content = previousVariants.length > 0
    ? `The user asked: "${question}"

Previously generated variations (DO NOT repeat these):
${previousVariants.join('\n')}

Generate 3-4 NEW and DIFFERENT variations of this question that ask for more details or related aspects. Each variation on a new line.`
    : `Rewrite the following question in 3-4 different ways, each on a new line:

${question}`;

  return [{ role: 'user', content }];
}

export function exploredEverythingAnswer(question: string): string {
  return `All available information about "${question}" has been explored. Ask a new question to continue.`;
}
