import fs, { type Stats } from 'fs';
import fsp from 'fs/promises';
import path from 'path';
import readline from 'readline';
import { resolveWordListPaths, type WordListPaths } from '../config.js';
import { ResourceError } from '../core/errors.js';
import { logger } from '../core/logger.js';
import type { RunStore } from '../db/queries.js';
import { formatAverage, type AggregateResult } from '../pipeline/aggregate.js';
import { loadLexicon } from '../pipeline/lexicon.js';
import { runPipeline, type PipelineCounters } from '../pipeline/pipeline.js';

export const OUTPUT_FILE = 'part-r-00000';
export const SUCCESS_MARKER = '_SUCCESS';

export interface JobOptions {
  inputPath: string;
  outputPath: string;
  wordLists?: Partial<WordListPaths>;
  store?: RunStore | null;
}

export interface JobResult {
  runId: number | null;
  outputFile: string;
  results: AggregateResult[];
  counters: PipelineCounters;
}

const EMPTY_COUNTERS: PipelineCounters = {
  recordsRead: 0,
  recordsClassified: 0,
  recordsDropped: 0,
  pairsEmitted: 0,
};

// Files starting with "_" or "." are markers or hidden files, never input
function isInputFile(name: string): boolean {
  return !name.startsWith('_') && !name.startsWith('.');
}

export async function listInputFiles(inputPath: string): Promise<string[]> {
  let stats: Stats;
  try {
    stats = await fsp.stat(inputPath);
  } catch (error) {
    throw new ResourceError(`Input path does not exist: ${inputPath}`, { path: inputPath, cause: error });
  }

  if (stats.isFile()) {
    return [inputPath];
  }

  const names = (await fsp.readdir(inputPath)).filter(isInputFile).sort();
  const files: string[] = [];
  for (const name of names) {
    const file = path.join(inputPath, name);
    // stat follows symlinks to the file they point at
    let entry: Stats;
    try {
      entry = await fsp.stat(file);
    } catch (error) {
      throw new ResourceError(`Unable to read input file: ${file}`, { path: file, cause: error });
    }
    if (entry.isDirectory()) {
      throw new ResourceError(`Input directory contains a subdirectory: ${file}`, { path: file });
    }
    if (entry.isFile()) {
      files.push(file);
    }
  }
  return files;
}

export async function* readLines(files: readonly string[]): AsyncGenerator<string> {
  for (const file of files) {
    const rl = readline.createInterface({
      input: fs.createReadStream(file, { encoding: 'utf8' }),
      crlfDelay: Infinity,
    });
    try {
      for await (const line of rl) {
        yield line;
      }
    } finally {
      rl.close();
    }
  }
}

export function formatResults(results: readonly AggregateResult[]): string {
  return results.map(result => `${result.key}\t${formatAverage(result.average)}\n`).join('');
}

async function prepareOutputDir(outputPath: string): Promise<void> {
  // Delete output directory if it exists
  await fsp.rm(outputPath, { recursive: true, force: true });
  await fsp.mkdir(outputPath, { recursive: true });
}

export async function runJob(options: JobOptions): Promise<JobResult> {
  const inputPath = path.resolve(options.inputPath);
  const outputPath = path.resolve(options.outputPath);
  const store = options.store ?? null;
  const wordLists = resolveWordListPaths(options.wordLists);

  logger.info('Starting sentiment job', { inputPath, outputPath, wordLists });
  const runId = store ? store.logRunStart(inputPath, outputPath) : null;
  let counters = EMPTY_COUNTERS;

  try {
    const lexicon = await loadLexicon(wordLists);
    logger.debug('Word lists loaded', {
      positiveWords: lexicon.positive.size,
      negativeWords: lexicon.negative.size,
    });

    const files = await listInputFiles(inputPath);
    await prepareOutputDir(outputPath);

    const pipeline = await runPipeline(readLines(files), lexicon);
    counters = pipeline.counters;

    const outputFile = path.join(outputPath, OUTPUT_FILE);
    await fsp.writeFile(outputFile, formatResults(pipeline.results), 'utf8');
    await fsp.writeFile(path.join(outputPath, SUCCESS_MARKER), '');

    if (store && runId !== null) {
      store.saveResults(runId, pipeline.results);
      store.logRunEnd(runId, 'success', counters);
    }

    logger.info(`Sentiment job complete: ${counters.recordsRead} read, ${counters.recordsClassified} classified`, {
      files: files.length,
      dropped: counters.recordsDropped,
    });

    return { runId, outputFile, results: pipeline.results, counters };
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    if (store && runId !== null) {
      store.logRunEnd(runId, 'failed', counters, errorMessage);
    }
    throw error;
  }
}
