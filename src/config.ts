import { z } from 'zod';
import dotenv from 'dotenv';
import path from 'path';
import { ConfigError } from './core/errors.js';

dotenv.config();

// Helper for Boolean
const bool = (defaultValue: 'true' | 'false') =>
  z.enum(['true', 'false'])
   .default(defaultValue)
   .transform(val => val === 'true');

// Configuration Schema
const configSchema = z.object({
  // Word lists (relative to paths.root unless absolute)
  wordLists: z.object({
    positive: z.string().default(path.join('input', 'positive.txt')),
    negative: z.string().default(path.join('input', 'negative.txt')),
  }),

  // Server
  port: z.string().default('3000').transform(Number).pipe(z.number().int().min(0).max(65535)),
  logLevel: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  logToFile: bool('true'),

  // Run history
  history: z.object({
    enabled: bool('true'),
  }),

  // Paths
  paths: z.object({
    root: z.string().default(process.cwd()),
    data: z.string().optional(),
    logs: z.string().optional(),
  }).transform(p => ({
    root: p.root,
    data: p.data ?? path.join(p.root, 'data'),
    logs: p.logs ?? path.join(p.root, 'logs'),
  })),
});

export type AppConfig = z.infer<typeof configSchema>;

export interface WordListPaths {
  positive: string;
  negative: string;
}

// Unset and empty variables both fall through to the defaults
const blank = (value: string | undefined) => (value === '' ? undefined : value);

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const rawConfig = {
    wordLists: {
      positive: blank(env.POSITIVE_WORDLIST_PATH),
      negative: blank(env.NEGATIVE_WORDLIST_PATH),
    },

    port: blank(env.PORT),
    logLevel: blank(env.LOG_LEVEL),
    logToFile: blank(env.LOG_TO_FILE),

    history: {
      enabled: blank(env.HISTORY_ENABLED),
    },

    paths: {
      root: blank(env.APP_ROOT),
      data: blank(env.DATA_DIR),
      logs: blank(env.LOGS_DIR),
    },
  };

  const parsed = configSchema.safeParse(rawConfig);
  if (!parsed.success) {
    throw new ConfigError('Invalid configuration', parsed.error.format());
  }
  return parsed.data;
}

/**
 * Word-list locations in priority order: explicit override, then the
 * configured value (environment or built-in default). Relative paths are
 * resolved against the configured root.
 */
export function resolveWordListPaths(
  overrides: Partial<WordListPaths> = {},
  settings: Pick<AppConfig, 'wordLists' | 'paths'> = config,
): WordListPaths {
  return {
    positive: path.resolve(settings.paths.root, overrides.positive ?? settings.wordLists.positive),
    negative: path.resolve(settings.paths.root, overrides.negative ?? settings.wordLists.negative),
  };
}

function loadProcessConfig(): AppConfig {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error('❌ Invalid Configuration:', JSON.stringify(error.issues, null, 2));
      process.exit(1);
    }
    throw error;
  }
}

export const config = loadProcessConfig();
