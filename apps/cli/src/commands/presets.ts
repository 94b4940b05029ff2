/**
 * Presets Command
 * 
 * Manage named encoding presets.
 */

import chalk from 'chalk';
import type { Command } from 'commander';
import { serializeEncodingOptions } from '@vidtool/core';
import { openConfigStore, openPresetStore } from '../lib/context.js';
import { applyEncodeFlags, type EncodeFlags } from '../lib/options.js';
import { fail, printHeader, printJson, printKeyValue, printSuccess, wantsJson } from '../lib/output.js';

export async function presetsListCommand(_options: object, command: Command): Promise<void> {
  try {
    const store = openPresetStore();
    const presets = store.getPresetNames().map(name => store.getPreset(name));

    if (wantsJson(command)) {
      printJson(presets.map(({ name, description }) => ({ name, description })));
      return;
    }

    printHeader('Presets');
    for (const preset of presets) {
      console.log(`${chalk.cyan(preset.name)}${preset.description ? chalk.gray(` - ${preset.description}`) : ''}`);
    }
  } catch (error) {
    fail(error);
  }
}

export async function presetsShowCommand(name: string, _options: object, command: Command): Promise<void> {
  try {
    const preset = openPresetStore().getPreset(name);
    const settings = serializeEncodingOptions(preset.options);

    if (wantsJson(command)) {
      printJson({ name: preset.name, description: preset.description, settings });
      return;
    }

    printHeader(preset.name);
    if (preset.description) {
      console.log(chalk.gray(preset.description));
      console.log();
    }
    for (const [key, value] of Object.entries(settings)) {
      printKeyValue(key, value);
    }
  } catch (error) {
    fail(error);
  }
}

interface SavePresetOptions extends EncodeFlags {
  description?: string;
}

/**
 * Save the current settings, with any flags applied, under a name
 */
export async function presetsSaveCommand(name: string, options: SavePresetOptions): Promise<void> {
  try {
    const base = options.preset !== undefined
      ? openPresetStore().getPreset(options.preset).options
      : openConfigStore().load().encoding;
    const encoding = applyEncodeFlags(base, options);

    openPresetStore().savePreset(name, encoding, options.description ?? '');
    printSuccess(`Saved preset '${name}'`);
  } catch (error) {
    fail(error);
  }
}

export async function presetsDeleteCommand(name: string): Promise<void> {
  try {
    openPresetStore().deletePreset(name);
    printSuccess(`Deleted preset '${name}'`);
  } catch (error) {
    fail(error);
  }
}

export async function presetsRenameCommand(oldName: string, newName: string): Promise<void> {
  try {
    openPresetStore().renamePreset(oldName, newName);
    printSuccess(`Renamed '${oldName}' to '${newName}'`);
  } catch (error) {
    fail(error);
  }
}

export async function presetsExportCommand(name: string, file: string): Promise<void> {
  try {
    openPresetStore().exportPreset(name, file);
    printSuccess(`Exported '${name}' to ${file}`);
  } catch (error) {
    fail(error);
  }
}

export async function presetsImportCommand(file: string): Promise<void> {
  try {
    const name = openPresetStore().importPreset(file);
    printSuccess(`Imported preset '${name}'`);
  } catch (error) {
    fail(error);
  }
}
