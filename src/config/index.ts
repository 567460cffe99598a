import { homedir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import { ConfigError } from '../utils/errors.js';

const booleanFromEnv = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const configSchema = z.object({
  // Document
  notesFilePath: z.string().min(1).default('~/endless.txt'),
  saveDebounceMs: z.coerce.number().int().nonnegative().default(500),

  // Preferences
  databasePath: z.string().min(1).optional(),
  timezone: z.string().default('UTC'),

  // Hotkey
  hotkeysEnabled: booleanFromEnv.default('true'),

  // App
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
  host: z.string().default('127.0.0.1'),
  port: z.coerce.number().int().positive().default(5175),
});

export type Config = z.infer<typeof configSchema>;

export function expandHome(path: string): string {
  if (path === '~') {
    return homedir();
  }
  if (path.startsWith('~/')) {
    return join(homedir(), path.slice(2));
  }
  return path;
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): Config {
  // Helper to convert empty strings to undefined
  const env = (key: string): string | undefined => {
    const value = source[key];
    return value === '' ? undefined : value;
  };

  const raw = {
    notesFilePath: env('NOTES_FILE_PATH'),
    saveDebounceMs: env('SAVE_DEBOUNCE_MS'),
    databasePath: env('DATABASE_PATH'),
    timezone: env('TIMEZONE'),
    hotkeysEnabled: env('HOTKEYS_ENABLED'),
    logLevel: env('LOG_LEVEL'),
    host: env('HOST'),
    port: env('PORT'),
  };

  try {
    const parsed = configSchema.parse(raw);
    return { ...parsed, notesFilePath: expandHome(parsed.notesFilePath) };
  } catch (error) {
    if (error instanceof z.ZodError) {
      const issues = error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new ConfigError(`Configuration validation failed:\n${issues.join('\n')}`);
    }
    throw error;
  }
}
