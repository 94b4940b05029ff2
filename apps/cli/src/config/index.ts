/**
 * CLI Configuration
 * 
 * Loads `.env`, validates the environment and locates the config
 * directory. Imported before anything that creates a logger, so the
 * log level chosen here is the one the shared logger starts with.
 */

import { config as dotenvConfig } from 'dotenv';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import { z } from 'zod';

dotenvConfig();

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('warn'),
  FFMPEG_PATH: z.string().min(1).optional(),
  FFPROBE_PATH: z.string().min(1).optional(),
  FFPLAY_PATH: z.string().min(1).optional(),
  VIDTOOL_CONFIG_DIR: z.string().min(1).optional(),
});

export type CliEnv = z.infer<typeof envSchema>;

export function parseEnv(env: NodeJS.ProcessEnv, argv: readonly string[] = []): CliEnv {
  const parsed = envSchema.parse(env);
  // --debug has to win before the logger is created, which is before commander runs
  if (argv.includes('--debug')) {
    return { ...parsed, LOG_LEVEL: 'debug' };
  }
  return parsed;
}

const env = parseEnv(process.env, process.argv);
process.env['LOG_LEVEL'] = env.LOG_LEVEL;

const configDir = resolve(env.VIDTOOL_CONFIG_DIR ?? join(homedir(), '.vidtool'));

export const config = {
  env: env.NODE_ENV,
  logLevel: env.LOG_LEVEL,
  configDir,
  configFile: join(configDir, 'config.json'),
  presetsFile: join(configDir, 'presets.json'),
} as const;
