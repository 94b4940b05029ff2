/**
 * Preset Store
 * 
 * Named bundles of encoding options kept in one JSON document:
 *   { "version": "1.0", "presets": { "<name>": { ...options, "description": "" } } }
 * 
 * Single presets are exchanged as
 *   { "vidtool_preset": { "version": "1.0", "name": "<name>", "settings": { ... } } }
 */

import { existsSync, readFileSync, writeFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod';
import { createLogger, getErrorMessage, isNonEmptyString } from '@vidtool/utils';
import { PresetError } from '../errors/index.js';
import {
  encodingOptionsSchema,
  parseLenient,
  serializeEncodingOptions,
  type EncodingOptions,
} from '../settings/encodingOptions.js';
import { DEFAULT_PRESETS } from './defaults.js';

const log = createLogger({ module: 'presets' });

const PRESET_FILE_VERSION = '1.0';

const presetSettingsSchema = z.record(z.unknown());
export type PresetSettings = z.infer<typeof presetSettingsSchema>;

const presetFileSchema = z.object({
  version: z.string().optional(),
  presets: z.record(presetSettingsSchema).default({}),
});

const presetExportSchema = z.object({
  vidtool_preset: z.object({
    version: z.string().optional(),
    name: z.string().default('Imported Preset'),
    settings: presetSettingsSchema.default({}),
  }),
});

export interface Preset {
  name: string;
  description: string;
  options: EncodingOptions;
}

function readJson(filePath: string): unknown {
  return JSON.parse(readFileSync(filePath, 'utf-8'));
}

export class PresetStore {
  private presets: Record<string, PresetSettings> = {};

  constructor(private readonly filePath: string) {
    this.load();
  }

  get path(): string {
    return this.filePath;
  }

  /**
   * Load presets from disk, creating the defaults when the file is
   * missing and falling back to them when it cannot be read
   */
  load(): void {
    if (!existsSync(this.filePath)) {
      this.presets = structuredClone(DEFAULT_PRESETS);
      this.save();
      return;
    }

    try {
      const parsed = presetFileSchema.parse(readJson(this.filePath));
      this.presets = parsed.presets;
      log.debug({ file: this.filePath, count: Object.keys(this.presets).length }, 'Loaded presets');
    } catch (error) {
      log.warn({ file: this.filePath, err: error }, 'Error loading presets, using defaults');
      this.presets = structuredClone(DEFAULT_PRESETS);
    }
  }

  save(): void {
    try {
      mkdirSync(dirname(this.filePath), { recursive: true });
      const document = { version: PRESET_FILE_VERSION, presets: this.presets };
      writeFileSync(this.filePath, JSON.stringify(document, null, 2), 'utf-8');
    } catch (error) {
      throw new PresetError(`Failed to save presets: ${getErrorMessage(error)}`, error);
    }
  }

  getPresetNames(): string[] {
    return Object.keys(this.presets).sort();
  }

  has(name: string): boolean {
    return Object.hasOwn(this.presets, name);
  }

  /**
   * Raw stored settings of a preset (a copy)
   */
  getSettings(name: string): PresetSettings {
    return { ...this.require(name) };
  }

  /**
   * A preset resolved to a complete options record; invalid stored
   * values fall back to their defaults
   */
  getPreset(name: string): Preset {
    const settings = this.require(name);
    const { value, dropped } = parseLenient(encodingOptionsSchema, settings);
    if (dropped.length > 0) {
      log.warn({ preset: name, keys: dropped }, 'Preset has invalid values, using defaults for them');
    }
    const description = settings['description'];
    return {
      name,
      description: typeof description === 'string' ? description : '',
      options: value,
    };
  }

  savePreset(name: string, options: EncodingOptions, description: string = ''): void {
    if (!isNonEmptyString(name)) {
      throw new PresetError('Preset name cannot be empty');
    }
    this.presets[name] = { ...serializeEncodingOptions(options), description };
    this.save();
    log.info({ preset: name }, 'Saved preset');
  }

  deletePreset(name: string): void {
    this.require(name);
    delete this.presets[name];
    this.save();
    log.info({ preset: name }, 'Deleted preset');
  }

  renamePreset(oldName: string, newName: string): void {
    const settings = this.require(oldName);
    if (!isNonEmptyString(newName)) {
      throw new PresetError('New preset name cannot be empty');
    }
    if (newName !== oldName && this.has(newName)) {
      throw new PresetError(`Preset '${newName}' already exists`);
    }
    delete this.presets[oldName];
    this.presets[newName] = settings;
    this.save();
    log.info({ from: oldName, to: newName }, 'Renamed preset');
  }

  exportPreset(name: string, filePath: string): void {
    const settings = this.require(name);
    const document = {
      vidtool_preset: {
        version: PRESET_FILE_VERSION,
        name,
        settings,
      },
    };
    try {
      writeFileSync(filePath, JSON.stringify(document, null, 2), 'utf-8');
    } catch (error) {
      throw new PresetError(`Failed to export preset: ${getErrorMessage(error)}`, error);
    }
    log.info({ preset: name, file: filePath }, 'Exported preset');
  }

  /**
   * Import a preset file, returning the name it was stored under.
   * Conflicting names get " (1)", " (2)", ... appended.
   */
  importPreset(filePath: string): string {
    let raw: unknown;
    try {
      raw = readJson(filePath);
    } catch (error) {
      throw new PresetError(`Failed to import preset: ${getErrorMessage(error)}`, error);
    }

    const parsed = presetExportSchema.safeParse(raw);
    if (!parsed.success) {
      throw new PresetError('Invalid preset file format');
    }

    const { name: originalName, settings } = parsed.data.vidtool_preset;
    let name = originalName;
    let counter = 1;
    while (this.has(name)) {
      name = `${originalName} (${counter})`;
      counter++;
    }

    this.presets[name] = settings;
    this.save();
    log.info({ preset: name, file: filePath }, 'Imported preset');
    return name;
  }

  private require(name: string): PresetSettings {
    const settings = this.presets[name];
    if (!settings || !this.has(name)) {
      throw new PresetError(`Preset '${name}' not found`);
    }
    return settings;
  }
}
