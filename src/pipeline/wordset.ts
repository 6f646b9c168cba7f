import fs from 'fs/promises';
import { ResourceError } from '../core/errors.js';

const COMMENT_PREFIX = '//';

/**
 * Immutable set of normalized (trimmed, lowercased) words.
 *
 * Blank lines and lines starting with `//` never make it into the set;
 * duplicates collapse silently. Safe to share between any number of
 * classifications since nothing mutates it after construction.
 */
export class WordSet implements Iterable<string> {
  private readonly words: ReadonlySet<string>;

  private constructor(words: Set<string>) {
    this.words = words;
    Object.freeze(this);
  }

  static build(lines: Iterable<string>): WordSet {
    const words = new Set<string>();
    for (const line of lines) {
      const word = line.trim().toLowerCase();
      if (word.length > 0 && !word.startsWith(COMMENT_PREFIX)) {
        words.add(word);
      }
    }
    return new WordSet(words);
  }

  /**
   * Reads a UTF-8 word list, one word per line.
   * @throws ResourceError when the file is missing, unreadable or not valid UTF-8
   */
  static async load(filePath: string): Promise<WordSet> {
    let buffer: Buffer;
    try {
      buffer = await fs.readFile(filePath);
    } catch (error) {
      throw new ResourceError(`Unable to read word list: ${filePath}`, { path: filePath, cause: error });
    }

    let text: string;
    try {
      text = new TextDecoder('utf-8', { fatal: true }).decode(buffer);
    } catch (error) {
      throw new ResourceError(`Word list is not valid UTF-8: ${filePath}`, { path: filePath, cause: error });
    }

    return WordSet.build(text.split(/\r\n|\n|\r/));
  }

  has(word: string): boolean {
    return this.words.has(word);
  }

  get size(): number {
    return this.words.size;
  }

  [Symbol.iterator](): Iterator<string> {
    return this.words[Symbol.iterator]();
  }
}
