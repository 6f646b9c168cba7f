import { config } from '../config.js';
import { logger } from '../core/logger.js';
import { RunStore } from '../db/queries.js';
import { defaultDatabasePath } from '../db/schema.js';
import { runJob } from './runner.js';

export const USAGE =
  'Usage: sentiment-job <input path> <output path> [positive wordlist] [negative wordlist]';

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = -1;

export interface DriverOptions {
  // `undefined` opens the configured history database, `null` disables it
  store?: RunStore | null;
}

function openConfiguredStore(): RunStore | null {
  return config.history.enabled ? RunStore.open(defaultDatabasePath(config.paths.data)) : null;
}

export async function runDriver(args: readonly string[], options: DriverOptions = {}): Promise<number> {
  if (args.length < 2) {
    console.error(USAGE);
    return EXIT_USAGE;
  }

  const [inputPath, outputPath] = args;
  const positive: string | undefined = args[2];
  const negative: string | undefined = args[3];
  const ownsStore = options.store === undefined;
  const store = ownsStore ? openConfiguredStore() : options.store ?? null;

  try {
    await runJob({
      inputPath,
      outputPath,
      wordLists: { positive, negative },
      store,
    });
    return EXIT_SUCCESS;
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    logger.error(`Sentiment job failed: ${errorMessage}`);
    return EXIT_FAILURE;
  } finally {
    if (ownsStore && store) {
      store.close();
    }
  }
}
