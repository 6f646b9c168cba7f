import type { WordListPaths } from '../config.js';
import { WordSet } from './wordset.js';

export interface Lexicon {
  positive: WordSet;
  negative: WordSet;
}

// Classification cannot start without both lists, so either failure rejects
export async function loadLexicon(paths: WordListPaths): Promise<Lexicon> {
  const [positive, negative] = await Promise.all([
    WordSet.load(paths.positive),
    WordSet.load(paths.negative),
  ]);
  return { positive, negative };
}

export function createLexicon(positive: Iterable<string>, negative: Iterable<string>): Lexicon {
  return {
    positive: WordSet.build(positive),
    negative: WordSet.build(negative),
  };
}
