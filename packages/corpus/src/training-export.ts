/**
 * Fine-tuning exports
 *
 * Records -> chat examples -> Alpaca JSON, or an Ollama Modelfile that carries
 * the first few examples as inline knowledge.
 */

import { readFileSync } from 'node:fs';
import type { KnowledgeRecord, Logger } from '@strata/core';
import { createLogger, fillTemplate } from '@strata/core';

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface ChatExample {
  messages: [ChatMessage, ChatMessage, ChatMessage];
  metadata: Record<string, unknown>;
}

export interface AlpacaEntry {
  instruction: string;
  input: string;
  output: string;
  system: string;
}

const FALLBACK_SYSTEM = 'You are AURA.';

export function prepareTrainingExamples(
  records: readonly KnowledgeRecord[],
  maxSamples: number = 500
): ChatExample[] {
  const examples: ChatExample[] = [];

  for (const record of records.slice(0, maxSamples)) {
    if (!record.instruction || !record.response) continue;
    examples.push({
      messages: [
        { role: 'system', content: record.system ?? FALLBACK_SYSTEM },
        { role: 'user', content: record.instruction },
        { role: 'assistant', content: record.response },
      ],
      metadata: record.metadata,
    });
  }

  return examples;
}

export function toAlpaca(examples: readonly ChatExample[]): AlpacaEntry[] {
  return examples.map(({ messages: [system, user, assistant] }) => ({
    instruction: user.content,
    input: '',
    output: assistant.content,
    system: system.content,
  }));
}

// =============================================================================
// Modelfile
// =============================================================================

const MODELFILE_TEMPLATE = new URL('../templates/modelfile.txt', import.meta.url);
const DEFAULT_BASE_MODEL = 'phi3:mini';

export interface ModelfileOptions {
  now?: Date;
  baseModel?: string;
  /** How many examples become inline knowledge */
  limit?: number;
}

export function buildKnowledgeText(examples: readonly ChatExample[], limit: number = 20): string {
  const lines: string[] = [];
  for (const { messages } of examples.slice(0, limit)) {
    lines.push(`Q: ${messages[1].content.slice(0, 200)}`);
    lines.push(`A: ${messages[2].content.slice(0, 300)}`);
  }
  return lines.join('\n').slice(0, 3000);
}

export function renderModelfile(examples: readonly ChatExample[], options: ModelfileOptions = {}): string {
  return fillTemplate(readFileSync(MODELFILE_TEMPLATE, 'utf-8'), {
    generatedAt: (options.now ?? new Date()).toISOString(),
    baseModel: options.baseModel ?? DEFAULT_BASE_MODEL,
    knowledge: buildKnowledgeText(examples, options.limit),
  });
}

export interface TrainingExportPaths {
  alpacaPath: string;
  modelfilePath: string;
}

export async function writeTrainingExports(
  examples: readonly ChatExample[],
  paths: TrainingExportPaths,
  options: ModelfileOptions = {},
  logger: Logger = createLogger('Exporter')
): Promise<void> {
  const fs = await import('node:fs/promises');
  const path = await import('node:path');

  await fs.mkdir(path.dirname(paths.alpacaPath), { recursive: true });
  await fs.writeFile(paths.alpacaPath, JSON.stringify(toAlpaca(examples), null, 2));
  logger.info(`Exported ${examples.length} examples to ${paths.alpacaPath}`);

  await fs.mkdir(path.dirname(paths.modelfilePath), { recursive: true });
  await fs.writeFile(paths.modelfilePath, renderModelfile(examples, options));
  logger.info(`Exported Modelfile to ${paths.modelfilePath}`);
}
