import os from 'os';
import { z } from 'zod';
import { ConfigError } from './errors';
import type { ClassificationPolicy } from './types';

const EnvSchema = z.object({
  SYNC_FOLDER: z.string().optional(),
  SYNC_VERBOSE: z
    .string()
    .optional()
    .transform(value => value === 'true' || value === '1'),
  SYNC_FAVOR: z.enum(['favor-boards', 'favor-sections']).default('favor-boards'),
  KB_API_URL: z.string().url().optional(),
  KB_API_TOKEN: z.string().optional(),
});

export interface SyncConfig {
  folder: string;
  verbose: boolean;
  policy: ClassificationPolicy;
  apiUrl?: string;
  apiToken?: string;
}

/**
 * Reads settings from the environment (call `dotenv.config()` first to pick
 * up a .env file). Empty variables count as unset.
 * @param env - Variables to read (default: process.env)
 * @returns Validated settings
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): SyncConfig {
  const values = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''));
  const parsed = EnvSchema.safeParse(values);

  if (!parsed.success) {
    const keys = parsed.error.issues.map(issue => issue.path.join('.')).join(', ');
    throw new ConfigError(`Invalid configuration for ${keys}: ${parsed.error.issues[0]?.message}`);
  }

  return {
    folder: parsed.data.SYNC_FOLDER ?? os.tmpdir(),
    verbose: parsed.data.SYNC_VERBOSE,
    policy: parsed.data.SYNC_FAVOR,
    apiUrl: parsed.data.KB_API_URL,
    apiToken: parsed.data.KB_API_TOKEN,
  };
}
