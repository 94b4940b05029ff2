/**
 * Services shared by the commands, built from the CLI configuration
 */

import { ConfigStore, getBinaryPath, PresetStore } from '@vidtool/core';
import { FFProbe, MediaInfoCache, type MediaProber } from '@vidtool/media';
import { FFmpeg, FFplay } from '@vidtool/processing';
import { config } from '../config/index.js';

export function openConfigStore(): ConfigStore {
  return new ConfigStore(config.configFile);
}

/**
 * Opening the store writes the default presets when the file is missing
 */
export function openPresetStore(): PresetStore {
  return new PresetStore(config.presetsFile);
}

export function createProber(): MediaProber {
  return new MediaInfoCache(new FFProbe(getBinaryPath('ffprobe')));
}

export function createRunner(): FFmpeg {
  return new FFmpeg();
}

export function createPlayer(): FFplay {
  return new FFplay();
}
