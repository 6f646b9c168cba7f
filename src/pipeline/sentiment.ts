import type { Lexicon } from './lexicon.js';
import { emitMetrics, type MetricPair, type SentimentCounts } from './metrics.js';

// Whitespace as the classic string tokenizer sees it: space, tab, LF, CR, FF
const TOKEN_SEPARATOR = /[ \t\n\r\f]+/;
const NON_WORD_CHARS = /[^a-zA-Z0-9\-+]/g;

export function tokenize(line: string): string[] {
  return line.toLowerCase().split(TOKEN_SEPARATOR).filter(token => token.length > 0);
}

export function cleanToken(token: string): string {
  return token.replace(NON_WORD_CHARS, '');
}

// A token found in both lists counts toward both
export function countSentimentWords(line: string, lexicon: Lexicon): SentimentCounts {
  let positive = 0;
  let negative = 0;

  for (const token of tokenize(line)) {
    const word = cleanToken(token);
    if (lexicon.positive.has(word)) positive++;
    if (lexicon.negative.has(word)) negative++;
  }

  return { positive, negative };
}

/**
 * Classifies one record. Returns the five metric pairs, or `null` when the
 * line holds no sentiment word (the record is dropped entirely).
 */
export function classify(line: string, lexicon: Lexicon): MetricPair[] | null {
  return emitMetrics(countSentimentWords(line, lexicon));
}

// Batch classify
export function classifyBatch(lines: readonly string[], lexicon: Lexicon): Array<MetricPair[] | null> {
  return lines.map(line => classify(line, lexicon));
}
