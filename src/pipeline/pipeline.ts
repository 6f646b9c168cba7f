import type { Lexicon } from './lexicon.js';
import { classify } from './sentiment.js';
import { aggregate, type AggregateResult } from './aggregate.js';
import { Shuffle } from './shuffle.js';

export interface PipelineCounters {
  recordsRead: number;
  recordsClassified: number;
  recordsDropped: number;
  pairsEmitted: number;
}

export interface PipelineResult {
  results: AggregateResult[];
  counters: PipelineCounters;
}

// classify every line -> group by metric key -> one aggregate per key
export async function runPipeline(
  lines: Iterable<string> | AsyncIterable<string>,
  lexicon: Lexicon,
): Promise<PipelineResult> {
  const shuffle = new Shuffle();
  let recordsRead = 0;
  let recordsClassified = 0;
  let pairsEmitted = 0;

  for await (const line of lines) {
    recordsRead++;
    const pairs = classify(line, lexicon);
    if (!pairs) continue;

    recordsClassified++;
    pairsEmitted += pairs.length;
    shuffle.emitAll(pairs);
  }

  const results: AggregateResult[] = [];
  for (const [key, values] of shuffle.groups()) {
    results.push(aggregate(key, values));
  }

  return {
    results,
    counters: {
      recordsRead,
      recordsClassified,
      recordsDropped: recordsRead - recordsClassified,
      pairsEmitted,
    },
  };
}
