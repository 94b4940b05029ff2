/**
 * Config Command
 * 
 * View and modify the saved encoding and output settings.
 */

import chalk from 'chalk';
import type { Command } from 'commander';
import { CONFIG_KEYS, InvalidArgumentError, isConfigKey } from '@vidtool/core';
import { openConfigStore } from '../lib/context.js';
import { parseConfigValue } from '../lib/options.js';
import { fail, printHeader, printJson, printKeyValue, printSuccess, wantsJson } from '../lib/output.js';

interface ConfigOptions {
  reset?: boolean;
}

export async function configCommand(
  key: string | undefined,
  value: string | undefined,
  options: ConfigOptions,
  command: Command
): Promise<void> {
  try {
    const store = openConfigStore();
    const json = wantsJson(command);

    if (options.reset) {
      const defaults = store.reset();
      if (json) printJson(defaults);
      else printSuccess('Configuration reset to defaults');
      return;
    }

    if (key === undefined) {
      const raw = store.getRaw();
      if (json) {
        printJson(raw);
        return;
      }
      printHeader(`Configuration (${store.path})`);
      for (const configKey of CONFIG_KEYS) {
        const current = raw[configKey];
        console.log(`${chalk.cyan(configKey)}: ${current === null ? chalk.gray('not set') : String(current)}`);
      }
      console.log();
      console.log(chalk.gray('Use "vidtool config <key> <value>" to set a value'));
      return;
    }

    if (!isConfigKey(key)) {
      throw new InvalidArgumentError('config key', `unknown key "${key}", valid keys: ${CONFIG_KEYS.join(', ')}`);
    }

    if (value === undefined) {
      const current = store.getRaw()[key];
      if (json) printJson({ [key]: current });
      else printKeyValue(key, current ?? 'not set');
      return;
    }

    const updated = store.set(key, parseConfigValue(value));
    if (json) printJson({ [key]: updated[key] });
    else printSuccess(`Set ${key} = ${String(updated[key])}`);
  } catch (error) {
    fail(error);
  }
}
