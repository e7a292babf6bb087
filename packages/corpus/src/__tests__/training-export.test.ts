import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as os from 'node:os';
import { readFileSync } from 'node:fs';
import type { KnowledgeRecord } from '@strata/core';
import { placeholders, silentLogger } from '@strata/core';
import {
  buildKnowledgeText,
  prepareTrainingExamples,
  renderModelfile,
  toAlpaca,
  writeTrainingExports,
} from '../training-export';

const RECORDS: KnowledgeRecord[] = [
  { instruction: 'Q1', response: 'A1', metadata: {}, system: 'test-system' },
  { instruction: '', response: 'A2', metadata: {} },
  { instruction: 'Q3', response: 'A3', metadata: { k: 1 } },
];

const NOW = new Date('2026-03-04T05:06:07.000Z');

describe('prepareTrainingExamples', () => {
  it('skips records without an instruction or response', () => {
    const examples = prepareTrainingExamples(RECORDS);
    expect(examples).toHaveLength(2);
    expect(examples[0].messages).toEqual([
      { role: 'system', content: 'test-system' },
      { role: 'user', content: 'Q1' },
      { role: 'assistant', content: 'A1' },
    ]);
  });

  it('falls back to a default system prompt', () => {
    const [, second] = prepareTrainingExamples(RECORDS);
    expect(second.messages[0].content).toBe('You are AURA.');
    expect(second.metadata).toEqual({ k: 1 });
  });

  it('caps the number of records considered', () => {
    expect(prepareTrainingExamples(RECORDS, 1)).toHaveLength(1);
  });
});

describe('toAlpaca', () => {
  it('maps chat examples to instruction/output pairs', () => {
    expect(toAlpaca(prepareTrainingExamples(RECORDS))).toEqual([
      { instruction: 'Q1', input: '', output: 'A1', system: 'test-system' },
      { instruction: 'Q3', input: '', output: 'A3', system: 'You are AURA.' },
    ]);
  });
});

describe('Modelfile', () => {
  it('builds Q/A knowledge lines', () => {
    const examples = prepareTrainingExamples(RECORDS);
    expect(buildKnowledgeText(examples)).toBe('Q: Q1\nA: A1\nQ: Q3\nA: A3');
    expect(buildKnowledgeText(examples, 1)).toBe('Q: Q1\nA: A1');
  });

  it('truncates long questions and answers', () => {
    const examples = prepareTrainingExamples([
      { instruction: 'x'.repeat(250), response: 'y'.repeat(350), metadata: {} },
    ]);
    expect(buildKnowledgeText(examples)).toBe(`Q: ${'x'.repeat(200)}\nA: ${'y'.repeat(300)}`);
  });

  it('ships a template whose placeholders are all filled', () => {
    const template = readFileSync(new URL('../../templates/modelfile.txt', import.meta.url), 'utf-8');
    expect(placeholders(template)).toEqual(['generatedAt', 'baseModel', 'knowledge']);
    expect(renderModelfile([], { now: NOW })).not.toMatch(/\{\{\w+\}\}/);
  });

  it('renders the template with defaults', () => {
    const text = renderModelfile(prepareTrainingExamples(RECORDS), { now: NOW });
    const lines = text.split('\n');
    expect(lines[1]).toBe('# Generated: 2026-03-04T05:06:07.000Z');
    expect(lines).toContain('FROM phi3:mini');
    expect(text).toContain('Core knowledge:\nQ: Q1\nA: A1\nQ: Q3\nA: A3\n');
  });

  it('uses the requested base model', () => {
    const text = renderModelfile([], { now: NOW, baseModel: 'test-model' });
    expect(text.split('\n')).toContain('FROM test-model');
  });
});

describe('writeTrainingExports', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'training-export-test-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('writes the Alpaca JSON and the Modelfile', async () => {
    const alpacaPath = path.join(tmpDir, 'alpaca.json');
    const modelfilePath = path.join(tmpDir, 'ollama', 'Modelfile');

    await writeTrainingExports(
      prepareTrainingExamples(RECORDS),
      { alpacaPath, modelfilePath },
      { now: NOW },
      silentLogger
    );

    const alpaca = JSON.parse(await fs.readFile(alpacaPath, 'utf-8'));
    expect(alpaca).toHaveLength(2);
    const modelfile = await fs.readFile(modelfilePath, 'utf-8');
    expect(modelfile.startsWith('# Sovereign AURA Agent Modelfile\n')).toBe(true);
  });
});
