import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { RunStore } from '../src/db/queries.js';

describe('RunStore', () => {
  let store: RunStore;

  beforeEach(() => {
    store = RunStore.open(':memory:');
  });

  afterEach(() => {
    store.close();
  });

  it('should log a run from start to success', () => {
    const id = store.logRunStart('/data/in', '/data/out');
    expect(store.getRun(id)).toMatchObject({
      id,
      input_path: '/data/in',
      output_path: '/data/out',
      status: 'running',
      completed_at: null,
    });

    store.logRunEnd(id, 'success', { recordsRead: 10, recordsClassified: 7 });
    const run = store.getRun(id);
    expect(run).toMatchObject({ status: 'success', records_read: 10, records_classified: 7, error: null });
    expect(run?.completed_at).not.toBeNull();
  });

  it('should keep the error of a failed run', () => {
    const id = store.logRunStart('/data/in', '/data/out');
    store.logRunEnd(id, 'failed', { recordsRead: 0, recordsClassified: 0 }, 'Unable to read word list: /x');
    expect(store.getRun(id)?.error).toBe('Unable to read word list: /x');
  });

  it('should store results per metric and return them in key order', () => {
    const id = store.logRunStart('/data/in', '/data/out');
    store.saveResults(id, [
      { key: 'SentimentRatio', average: -12.5 },
      { key: 'PositiveScore', average: 33.33 },
    ]);

    expect(store.getRunResults(id)).toEqual([
      { key: 'PositiveScore', average: 33.33 },
      { key: 'SentimentRatio', average: -12.5 },
    ]);
  });

  it('should overwrite a metric saved twice for the same run', () => {
    const id = store.logRunStart('/data/in', '/data/out');
    store.saveResults(id, [{ key: 'PositiveScore', average: 10 }]);
    store.saveResults(id, [{ key: 'PositiveScore', average: 20 }]);
    expect(store.getRunResults(id)).toEqual([{ key: 'PositiveScore', average: 20 }]);
  });

  it('should list the most recent runs first', () => {
    const first = store.logRunStart('/a', '/out');
    const second = store.logRunStart('/b', '/out');
    const third = store.logRunStart('/c', '/out');

    expect(store.getRecentRuns().map(run => run.id)).toEqual([third, second, first]);
    expect(store.getRecentRuns(2).map(run => run.input_path)).toEqual(['/c', '/b']);
  });

  it('should return null for an unknown run', () => {
    expect(store.getRun(42)).toBeNull();
    expect(store.getRunResults(42)).toEqual([]);
  });
});
