/**
 * Config Store
 * 
 * Persists the last-used encoding and output settings as one flat JSON
 * document. Missing or invalid values fall back to their defaults.
 */

import { existsSync, readFileSync, writeFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod';
import { createLogger } from '@vidtool/utils';
import {
  encodingOptionsShape,
  parseLenient,
  serializeEncodingOptions,
  toEncodingOptions,
  type EncodingOptions,
} from './encodingOptions.js';
import {
  outputSettingsShape,
  serializeOutputSettings,
  toOutputSettings,
  type OutputSettings,
} from './outputSettings.js';
import { InvalidArgumentError } from '../errors/index.js';

const log = createLogger({ module: 'config-store' });

export const rawAppConfigSchema = z.object({
  ...encodingOptionsShape,
  ...outputSettingsShape,
});

export type RawAppConfig = z.output<typeof rawAppConfigSchema>;
export type ConfigKey = keyof RawAppConfig;

export const CONFIG_KEYS: readonly ConfigKey[] = rawAppConfigSchema.keyof().options;

export interface AppConfig {
  encoding: EncodingOptions;
  output: OutputSettings;
}

export function isConfigKey(key: string): key is ConfigKey {
  return key in rawAppConfigSchema.shape;
}

export class ConfigStore {
  private raw: RawAppConfig | null = null;

  constructor(private readonly filePath: string) {}

  get path(): string {
    return this.filePath;
  }

  /**
   * Read the document from disk (cached after the first call)
   */
  load(): AppConfig {
    const raw = this.getRaw();
    return {
      encoding: toEncodingOptions(raw),
      output: toOutputSettings(raw),
    };
  }

  getRaw(): RawAppConfig {
    if (!this.raw) {
      this.raw = this.readFromDisk();
    }
    return { ...this.raw };
  }

  /**
   * Set one persisted key, validating the value before writing
   */
  set(key: string, value: unknown): RawAppConfig {
    if (!isConfigKey(key)) {
      throw new InvalidArgumentError('config key', `unknown key "${key}"`);
    }
    const result = rawAppConfigSchema.safeParse({ ...this.getRaw(), [key]: value });
    if (!result.success) {
      const issue = result.error.issues[0];
      throw new InvalidArgumentError(key, issue?.message ?? 'invalid value');
    }
    this.write(result.data);
    return result.data;
  }

  save(config: AppConfig): void {
    this.write({
      ...serializeEncodingOptions(config.encoding),
      ...serializeOutputSettings(config.output),
    });
  }

  reset(): RawAppConfig {
    const defaults = rawAppConfigSchema.parse({});
    this.write(defaults);
    return defaults;
  }

  private readFromDisk(): RawAppConfig {
    if (!existsSync(this.filePath)) {
      return rawAppConfigSchema.parse({});
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(this.filePath, 'utf-8'));
    } catch (error) {
      log.warn({ file: this.filePath, err: error }, 'Unreadable config file, using defaults');
      return rawAppConfigSchema.parse({});
    }

    const { value, dropped } = parseLenient(rawAppConfigSchema, parsed);
    if (dropped.length > 0) {
      log.warn({ file: this.filePath, keys: dropped }, 'Ignoring invalid config values');
    }
    return value;
  }

  private write(raw: RawAppConfig): void {
    mkdirSync(dirname(this.filePath), { recursive: true });
    writeFileSync(this.filePath, JSON.stringify(raw, null, 2));
    this.raw = raw;
    log.debug({ file: this.filePath }, 'Saved config');
  }
}
