// Metric keys, in the order a classified record emits them
export const METRIC_KEYS = [
  'PositiveWordCount',
  'NegativeWordCount',
  'PositiveScore',
  'NegativeScore',
  'SentimentRatio',
] as const;

export type MetricKey = typeof METRIC_KEYS[number];

export type MetricPair = readonly [key: MetricKey, value: number];

export interface SentimentCounts {
  positive: number;
  negative: number;
}

export function isMetricKey(value: string): value is MetricKey {
  return METRIC_KEYS.some(key => key === value);
}

/**
 * Derives the five per-record metrics from word counts, or `null` when the
 * record holds no sentiment word at all. Percentages are truncated toward
 * zero, never rounded.
 */
export function emitMetrics({ positive, negative }: SentimentCounts): MetricPair[] | null {
  const total = positive + negative;
  if (total === 0) {
    return null;
  }

  const ratio = Math.trunc(((positive - negative) / total) * 100);
  const positiveScore = Math.trunc((positive / total) * 100);
  const negativeScore = Math.trunc((negative / total) * 100);

  return [
    ['PositiveWordCount', positive],
    ['NegativeWordCount', negative],
    ['PositiveScore', positiveScore],
    ['NegativeScore', negativeScore],
    ['SentimentRatio', ratio],
  ];
}

export function toMetricRecord(pairs: readonly MetricPair[]): Record<MetricKey, number> {
  const record: Record<MetricKey, number> = {
    PositiveWordCount: 0,
    NegativeWordCount: 0,
    PositiveScore: 0,
    NegativeScore: 0,
    SentimentRatio: 0,
  };
  for (const [key, value] of pairs) {
    record[key] = value;
  }
  return record;
}
