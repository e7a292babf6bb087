import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as os from 'node:os';
import type { Logger } from '@strata/core';
import { createConfig } from '@strata/core';
import { KnowledgeBase } from '../knowledge-base';
import { RetrievalEngine } from '../engine';

function spyLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

const JSONL = [
  JSON.stringify({ type: 'knowledge', instruction: 'What is lattice', response: 'lattice answer', metadata: {} }),
  '',
  'not json',
  '{"instruction": 5}',
  JSON.stringify({ instruction: 'Describe spindle', response: 'spindle answer' }),
].join('\n');

describe('KnowledgeBase.fromJsonl', () => {
  it('skips blank and malformed lines and keeps the rest', () => {
    const logger = spyLogger();
    const kb = KnowledgeBase.fromJsonl(JSONL, { logger });

    expect(kb.size).toBe(2);
    expect(kb.entries[1]).toEqual({ instruction: 'Describe spindle', response: 'spindle answer', metadata: {} });
    expect(logger.warn).toHaveBeenCalledWith('Skipped 2 malformed record line(s)');
  });

  it('indexes by position in the loaded entries', () => {
    const kb = KnowledgeBase.fromJsonl(JSONL, { logger: spyLogger() });
    expect(kb.index.lookup('spindle')).toEqual([1, 1]);

    const engine = new RetrievalEngine(kb, createConfig(), spyLogger());
    expect(engine.searchScored('spindle')[0]).toMatchObject({ position: 1, score: 2 });
  });
});

describe('KnowledgeBase.fromFile', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'kb-test-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('loads a JSONL file', async () => {
    const file = path.join(tmpDir, 'kb.jsonl');
    await fs.writeFile(file, JSONL);
    expect(KnowledgeBase.fromFile(file, { logger: spyLogger() }).size).toBe(2);
  });

  it('yields an empty base for a missing file', () => {
    const logger = spyLogger();
    const file = path.join(tmpDir, 'missing.jsonl');
    const kb = KnowledgeBase.fromFile(file, { logger });

    expect(kb.size).toBe(0);
    expect(kb.index.size).toBe(0);
    expect(logger.warn).toHaveBeenCalledWith(`Knowledge base not found: ${file}`);
  });
});
