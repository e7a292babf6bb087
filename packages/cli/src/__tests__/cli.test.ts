import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as os from 'node:os';
import { USAGE, defaultOutputPath, run } from '../cli';

interface Captured {
  out: string[];
  err: string[];
}

async function runCli(argv: string[], env: Record<string, string> = {}): Promise<Captured & { code: number }> {
  const captured: Captured = { out: [], err: [] };
  const code = await run(argv, {
    stdout: (line) => captured.out.push(line),
    stderr: (line) => captured.err.push(line),
    env: { STRATA_LOG_LEVEL: 'silent', ...env },
  });
  return { ...captured, code };
}

const KNOWLEDGE = [
  { instruction: 'Explain lattice drift', response: 'lattice lattice', metadata: {} },
  { instruction: 'Describe lattice', response: 'bound', metadata: {} },
]
  .map((r) => JSON.stringify(r))
  .join('\n');

describe('strata cli', () => {
  let tmpDir: string;
  let kbPath: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'strata-cli-test-'));
    kbPath = path.join(tmpDir, 'kb.jsonl');
    await fs.writeFile(kbPath, KNOWLEDGE);
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('converts a corpus into a bundle and JSON lines', async () => {
    const input = path.join(tmpDir, 'session.txt');
    const output = path.join(tmpDir, 'out', 'kb.json');
    await fs.writeFile(input, '(1) a = b\nΦ=0.7\n');

    const result = await runCli(['convert', input, output]);

    expect(result.code).toBe(0);
    expect(result.out).toEqual([
      'Equations: 1',
      'Metrics: 1',
      'Organisms: 0',
      'Sections: 0',
      'Training pairs: 6',
      `Wrote ${output} and ${path.join(tmpDir, 'out', 'kb.jsonl')}`,
    ]);
    const lines = (await fs.readFile(path.join(tmpDir, 'out', 'kb.jsonl'), 'utf-8')).trim().split('\n');
    expect(lines).toHaveLength(6);
  });

  it('reports an unreadable corpus', async () => {
    const result = await runCli(['convert', path.join(tmpDir, 'missing.txt')]);
    expect(result.code).toBe(1);
    expect(result.err[0].startsWith('Failed to read corpus')).toBe(true);
  });

  it('prints ranked instructions with scores', async () => {
    const result = await runCli(['search', kbPath, 'lattice']);
    expect(result.out).toEqual(['1. [3] Explain lattice drift', '2. [1] Describe lattice']);
  });

  it('honours --top', async () => {
    const result = await runCli(['search', kbPath, 'lattice', '--top', '1']);
    expect(result.out).toEqual(['1. [3] Explain lattice drift']);
  });

  it('says when nothing matches', async () => {
    const result = await runCli(['search', kbPath, 'unrelated']);
    expect(result.out).toEqual(['No matches']);
  });

  it('rejects a non-numeric --top', async () => {
    const result = await runCli(['search', kbPath, 'lattice', '--top', 'abc']);
    expect(result.code).toBe(1);
    expect(result.err).toEqual(['--top expects a positive integer, got "abc"', USAGE]);
  });

  it('prints the assembled context', async () => {
    const result = await runCli(['context', kbPath, 'lattice', '--budget', '1000']);
    expect(result.out).toEqual([
      'Q: Explain lattice drift\nA: lattice lattice\n\nQ: Describe lattice\nA: bound\n\n',
    ]);
  });

  it('exports Alpaca JSON and a Modelfile', async () => {
    const outDir = path.join(tmpDir, 'export');
    const result = await runCli(['export', kbPath, outDir]);

    expect(result.out).toEqual([`Exported 2 examples to ${outDir}`]);
    const alpaca = JSON.parse(await fs.readFile(path.join(outDir, 'training_alpaca.json'), 'utf-8'));
    expect(alpaca[1]).toEqual({ instruction: 'Describe lattice', input: '', output: 'bound', system: 'You are AURA.' });
    await expect(fs.access(path.join(outDir, 'Modelfile'))).resolves.toBeUndefined();
  });

  it('prints training file statistics', async () => {
    const result = await runCli(['stats', kbPath]);
    const lines = result.out[0].split('\n');
    expect(lines[0]).toBe(`${'kb.jsonl'.padEnd(40)}    0.0MB      2 ex`);
    expect(lines[1]).toBe('TOTAL:    0.0MB      2 examples');
  });

  it('rejects unknown commands with usage', async () => {
    const result = await runCli(['frobnicate']);
    expect(result.code).toBe(1);
    expect(result.err).toEqual(['Unknown command: frobnicate', USAGE]);
  });

  it('rejects invalid environment configuration', async () => {
    const result = await runCli(['search', kbPath, 'lattice'], { STRATA_TOP_K: 'zero' });
    expect(result.code).toBe(1);
    expect(result.err[0].startsWith('Invalid environment configuration: STRATA_TOP_K')).toBe(true);
  });
});

describe('defaultOutputPath', () => {
  it('places the bundle beside the input', () => {
    expect(defaultOutputPath(path.join('logs', 'session.txt'))).toBe(path.join('logs', 'session_training.json'));
    expect(defaultOutputPath('corpus')).toBe('corpus_training.json');
  });
});
