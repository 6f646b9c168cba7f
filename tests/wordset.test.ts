import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { WordSet } from '../src/pipeline/wordset.js';
import { loadLexicon } from '../src/pipeline/lexicon.js';
import { ResourceError } from '../src/core/errors.js';

describe('WordSet', () => {
  it('should trim and lowercase every entry', () => {
    const words = WordSet.build(['  Good  ', 'GREAT', '\tExcellent']);
    expect([...words].sort()).toEqual(['excellent', 'good', 'great']);
  });

  it('should skip blank lines and // comments', () => {
    const words = WordSet.build(['// positive words', '', '   ', 'good', '  // indented comment']);
    expect([...words]).toEqual(['good']);
  });

  it('should collapse duplicates silently', () => {
    const words = WordSet.build(['good', 'Good', ' GOOD ']);
    expect(words.size).toBe(1);
    expect(words.has('good')).toBe(true);
  });

  it('should only match normalized lookups', () => {
    const words = WordSet.build(['Great']);
    expect(words.has('great')).toBe(true);
    expect(words.has('Great')).toBe(false);
  });

  it('should be frozen after construction', () => {
    const words = WordSet.build(['good']);
    expect(Object.isFrozen(words)).toBe(true);
  });
});

describe('WordSet.load', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'wordset-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should read one word per line with any line ending', async () => {
    const file = path.join(dir, 'positive.txt');
    fs.writeFileSync(file, '// header\r\ngood\r\nGreat\nawesome\rexcellent\n\n');

    const words = await WordSet.load(file);
    expect([...words].sort()).toEqual(['awesome', 'excellent', 'good', 'great']);
  });

  it('should ignore a UTF-8 byte order mark', async () => {
    const file = path.join(dir, 'bom.txt');
    fs.writeFileSync(file, Buffer.concat([Buffer.from([0xef, 0xbb, 0xbf]), Buffer.from('good\nbad\n')]));

    const words = await WordSet.load(file);
    expect(words.has('good')).toBe(true);
    expect(words.size).toBe(2);
  });

  it('should fail with a ResourceError when the file is missing', async () => {
    const file = path.join(dir, 'missing.txt');

    await expect(WordSet.load(file)).rejects.toBeInstanceOf(ResourceError);
    await expect(WordSet.load(file)).rejects.toMatchObject({ path: file });
  });

  it('should fail with a ResourceError when the file is not valid UTF-8', async () => {
    const file = path.join(dir, 'latin1.txt');
    fs.writeFileSync(file, Buffer.from([0x67, 0x6f, 0x6f, 0x64, 0x0a, 0xff, 0xfe, 0x0a]));

    await expect(WordSet.load(file)).rejects.toThrow(`Word list is not valid UTF-8: ${file}`);
  });

  it('should reject loadLexicon when either list is unreadable', async () => {
    const positive = path.join(dir, 'positive.txt');
    fs.writeFileSync(positive, 'good\n');

    await expect(
      loadLexicon({ positive, negative: path.join(dir, 'negative.txt') })
    ).rejects.toMatchObject({ name: 'ResourceError', path: path.join(dir, 'negative.txt') });
  });

  it('should load both lists into a lexicon', async () => {
    const positive = path.join(dir, 'positive.txt');
    const negative = path.join(dir, 'negative.txt');
    fs.writeFileSync(positive, 'good\ngreat\n');
    fs.writeFileSync(negative, 'bad\n');

    const lexicon = await loadLexicon({ positive, negative });
    expect(lexicon.positive.size).toBe(2);
    expect(lexicon.negative.has('bad')).toBe(true);
  });
});
