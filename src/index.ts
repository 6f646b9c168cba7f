import type { Server } from 'http';
import { config, resolveWordListPaths } from './config.js';
import { logger } from './core/logger.js';
import { RunStore } from './db/queries.js';
import { defaultDatabasePath } from './db/schema.js';
import { loadLexicon } from './pipeline/lexicon.js';
import { startServer } from './web/server.js';

let server: Server | null = null;
let store: RunStore | null = null;

async function main() {
  logger.info('='.repeat(50));
  logger.info('Word-list Sentiment API');
  logger.info('='.repeat(50));

  // Load word lists
  const wordLists = resolveWordListPaths();
  logger.info('Loading word lists...', wordLists);
  const lexicon = await loadLexicon(wordLists);
  logger.info(`Loaded ${lexicon.positive.size} positive and ${lexicon.negative.size} negative words`);

  // Open run history
  if (config.history.enabled) {
    const dbPath = defaultDatabasePath(config.paths.data);
    store = RunStore.open(dbPath);
    logger.info(`Run history at ${dbPath}`);
  }

  // Start web server
  server = startServer({ lexicon, store });

  logger.info('');
  logger.info('Batch job command:');
  logger.info('  npm run job -- <input path> <output path> [positive wordlist] [negative wordlist]');
  logger.info('');
}

function shutdown() {
  logger.info('Shutting down...');
  server?.close();
  store?.close();
  process.exit(0);
}

// Handle graceful shutdown
process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

main().catch(error => {
  logger.error('Failed to start:', error);
  process.exit(1);
});
