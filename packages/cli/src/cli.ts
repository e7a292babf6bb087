/**
 * strata command line
 *
 * Usage:
 *   strata convert <input> [output]
 *   strata search <knowledge.jsonl> <query...> [--top N]
 *   strata context <knowledge.jsonl> <query...> [--budget N]
 *   strata export <knowledge.jsonl> <outDir>
 *   strata stats <file...>
 */

import * as path from 'node:path';
import type { StrataConfig } from '@strata/core';
import { ConfigError, CorpusReadError, configFromEnv, createLogger } from '@strata/core';
import {
  CorpusBuilder,
  KnowledgeSynthesizer,
  buildBundle,
  formatTrainingStats,
  prepareTrainingExamples,
  summarizeTrainingFiles,
  writeBundle,
  writeTrainingExports,
} from '@strata/corpus';
import { KnowledgeBase, RetrievalEngine } from '@strata/retrieval';

export interface CliIO {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
  env?: Record<string, string | undefined>;
}

export const USAGE = [
  'Usage:',
  '  strata convert <input> [output]',
  '  strata search <knowledge.jsonl> <query...> [--top N]',
  '  strata context <knowledge.jsonl> <query...> [--budget N]',
  '  strata export <knowledge.jsonl> <outDir>',
  '  strata stats <file...>',
].join('\n');

class UsageError extends Error {}

interface ParsedArgs {
  positional: string[];
  options: Map<string, string>;
}

function parseArgs(args: readonly string[], valueFlags: readonly string[]): ParsedArgs {
  const positional: string[] = [];
  const options = new Map<string, string>();

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (valueFlags.includes(arg)) {
      const value = args[i + 1];
      if (value === undefined) throw new UsageError(`Missing value for ${arg}`);
      options.set(arg, value);
      i++;
    } else {
      positional.push(arg);
    }
  }

  return { positional, options };
}

function positiveInt(value: string | undefined, flag: string, fallback: number): number {
  if (value === undefined) return fallback;
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) throw new UsageError(`${flag} expects a positive integer, got "${value}"`);
  return n;
}

/** `logs/session.txt` -> `logs/session_training.json` */
export function defaultOutputPath(input: string): string {
  const { dir, name } = path.parse(input);
  return path.join(dir, `${name}_training.json`);
}

async function convert(args: readonly string[], config: Readonly<StrataConfig>, io: CliIO): Promise<number> {
  const [input, outputArg] = args;
  if (input === undefined) throw new UsageError('convert needs an input file');
  const output = outputArg ?? defaultOutputPath(input);

  const logger = createLogger('Convert', config.logLevel);
  const snapshot = new CorpusBuilder(config, logger).buildFromFile(input);
  const records = new KnowledgeSynthesizer(config).synthesize(snapshot);
  const written = await writeBundle(buildBundle(snapshot, records), output, logger);

  const s = snapshot.statistics;
  io.stdout(`Equations: ${s.equationsExtracted}`);
  io.stdout(`Metrics: ${s.metricsExtracted}`);
  io.stdout(`Organisms: ${s.organismsExtracted}`);
  io.stdout(`Sections: ${s.sectionsExtracted}`);
  io.stdout(`Training pairs: ${records.length}`);
  io.stdout(`Wrote ${written.jsonPath} and ${written.jsonlPath}`);
  return 0;
}

function search(args: readonly string[], config: Readonly<StrataConfig>, io: CliIO): number {
  const { positional, options } = parseArgs(args, ['--top']);
  const [file, ...query] = positional;
  if (file === undefined || query.length === 0) throw new UsageError('search needs a knowledge file and a query');

  const topK = positiveInt(options.get('--top'), '--top', config.retrieval.defaultTopK);
  const engine = loadEngine(file, config);

  const results = engine.searchScored(query.join(' '), topK);
  if (results.length === 0) {
    io.stdout('No matches');
    return 0;
  }
  results.forEach((r, i) => io.stdout(`${i + 1}. [${r.score}] ${r.record.instruction}`));
  return 0;
}

function context(args: readonly string[], config: Readonly<StrataConfig>, io: CliIO): number {
  const { positional, options } = parseArgs(args, ['--budget']);
  const [file, ...query] = positional;
  if (file === undefined || query.length === 0) throw new UsageError('context needs a knowledge file and a query');

  const budget = positiveInt(options.get('--budget'), '--budget', config.retrieval.defaultTokenBudget);
  io.stdout(loadEngine(file, config).getContext(query.join(' '), budget));
  return 0;
}

async function exportTraining(args: readonly string[], config: Readonly<StrataConfig>, io: CliIO): Promise<number> {
  const [file, outDir] = args;
  if (file === undefined || outDir === undefined) throw new UsageError('export needs a knowledge file and an output directory');

  const logger = createLogger('Exporter', config.logLevel);
  const kb = KnowledgeBase.fromFile(file, { config, logger });
  const examples = prepareTrainingExamples(kb.entries, config.export.maxSamples);

  const paths = {
    alpacaPath: path.join(outDir, 'training_alpaca.json'),
    modelfilePath: path.join(outDir, 'Modelfile'),
  };
  await writeTrainingExports(examples, paths, { limit: config.export.modelfileExamples }, logger);

  io.stdout(`Exported ${examples.length} examples to ${outDir}`);
  return 0;
}

async function stats(args: readonly string[], config: Readonly<StrataConfig>, io: CliIO): Promise<number> {
  if (args.length === 0) throw new UsageError('stats needs at least one file');
  const summary = await summarizeTrainingFiles(args, createLogger('Stats', config.logLevel));
  io.stdout(formatTrainingStats(summary));
  return 0;
}

function loadEngine(file: string, config: Readonly<StrataConfig>): RetrievalEngine {
  const logger = createLogger('Retrieval', config.logLevel);
  return new RetrievalEngine(KnowledgeBase.fromFile(file, { config, logger }), config, logger);
}

/** Runs one command; resolves to the process exit code */
export async function run(argv: readonly string[], io: CliIO): Promise<number> {
  const [command, ...args] = argv;

  try {
    const config = configFromEnv(io.env ?? process.env);

    switch (command) {
      case 'convert':
        return await convert(args, config, io);
      case 'search':
        return search(args, config, io);
      case 'context':
        return context(args, config, io);
      case 'export':
        return await exportTraining(args, config, io);
      case 'stats':
        return await stats(args, config, io);
      default:
        throw new UsageError(command === undefined ? 'No command given' : `Unknown command: ${command}`);
    }
  } catch (error) {
    if (error instanceof UsageError) {
      io.stderr(error.message);
      io.stderr(USAGE);
      return 1;
    }
    if (error instanceof CorpusReadError || error instanceof ConfigError) {
      io.stderr(error.message);
      return 1;
    }
    throw error;
  }
}
