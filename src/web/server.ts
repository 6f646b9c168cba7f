import express, { type NextFunction, type Request, type Response } from 'express';
import type { Server } from 'http';
import { z } from 'zod';
import { config } from '../config.js';
import { logger } from '../core/logger.js';
import type { RunStore } from '../db/queries.js';
import type { Lexicon } from '../pipeline/lexicon.js';
import { toMetricRecord } from '../pipeline/metrics.js';
import { runPipeline } from '../pipeline/pipeline.js';
import { classifyBatch } from '../pipeline/sentiment.js';

export interface ServerDeps {
  lexicon: Lexicon;
  store?: RunStore | null;
}

const MAX_LINES = 10_000;

const classifyBody = z.union([
  z.object({ text: z.string() }),
  z.object({ texts: z.array(z.string()).max(MAX_LINES) }),
]);

const analyzeBody = z.object({
  lines: z.array(z.string()).max(MAX_LINES),
});

const runsQuery = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(20),
});

export function createApp({ lexicon, store = null }: ServerDeps): express.Express {
  const app = express();

  // JSON parsing
  app.use(express.json({ limit: '5mb' }));

  app.get('/api/health', (req, res) => {
    res.json({
      status: 'ok',
      uptimeSeconds: Math.round(process.uptime()),
      positiveWords: lexicon.positive.size,
      negativeWords: lexicon.negative.size,
    });
  });

  // Per-record metrics; `null` means the text holds no sentiment word
  app.post('/api/classify', (req, res) => {
    const body = classifyBody.safeParse(req.body);
    if (!body.success) {
      res.status(400).json({ error: 'Expected { text } or { texts: string[] }', issues: body.error.issues });
      return;
    }

    const texts = 'text' in body.data ? [body.data.text] : body.data.texts;
    const metrics = classifyBatch(texts, lexicon).map(pairs => (pairs ? toMetricRecord(pairs) : null));

    res.json('text' in body.data ? { metrics: metrics[0] } : { metrics });
  });

  // Full classify -> aggregate over a batch of lines
  app.post('/api/analyze', async (req, res, next) => {
    const body = analyzeBody.safeParse(req.body);
    if (!body.success) {
      res.status(400).json({ error: 'Expected { lines: string[] }', issues: body.error.issues });
      return;
    }

    try {
      const { results, counters } = await runPipeline(body.data.lines, lexicon);
      res.json({ results, counters });
    } catch (error) {
      next(error);
    }
  });

  app.get('/api/runs', (req, res) => {
    const query = runsQuery.safeParse(req.query);
    if (!query.success) {
      res.status(400).json({ error: 'Invalid limit', issues: query.error.issues });
      return;
    }
    res.json(store ? store.getRecentRuns(query.data.limit) : []);
  });

  app.get('/api/runs/:id', (req, res) => {
    const id = Number(req.params.id);
    if (!Number.isInteger(id) || id < 1) {
      res.status(400).json({ error: 'Invalid run id' });
      return;
    }

    const run = store?.getRun(id) ?? null;
    if (!store || !run) {
      res.status(404).json({ error: `Run ${id} not found` });
      return;
    }
    res.json({ run, results: store.getRunResults(id) });
  });

  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    // body-parser tags client errors (malformed JSON, oversized body) with a 4xx status
    const status = typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number'
      ? error.status
      : 500;

    if (status >= 500) {
      logger.error('Request failed', {
        path: req.path,
        error: error instanceof Error ? error.message : String(error),
      });
      res.status(500).json({ error: 'Internal server error' });
      return;
    }
    res.status(status).json({ error: error instanceof Error ? error.message : 'Bad request' });
  });

  return app;
}

export function startServer(deps: ServerDeps, port = config.port): Server {
  const app = createApp(deps);
  return app.listen(port, () => {
    logger.info(`Sentiment API listening at http://localhost:${port}`);
  });
}
