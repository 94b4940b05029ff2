/**
 * Info Command
 * 
 * Probe a file and print its stream summary.
 */

import ora from 'ora';
import type { Command } from 'commander';
import type { MediaInfo } from '@vidtool/media';
import { createProber } from '../lib/context.js';
import { fail, printJson, printWarning, wantsJson } from '../lib/output.js';

function describeMedia(info: MediaInfo): Record<string, unknown> {
  return {
    file: info.file,
    format: info.formatName,
    formatLongName: info.formatLongName,
    duration: info.duration,
    runtime: info.runtime,
    size: info.size,
    bitrate: info.bitrate,
    resolution: info.resolution,
    streams: info.streams,
  };
}

export async function infoCommand(file: string, _options: object, command: Command): Promise<void> {
  const json = wantsJson(command);
  const spinner = ora({ text: 'Reading media info...', isEnabled: !json }).start();

  try {
    const info = await createProber().getMediaInfo(file);
    spinner.stop();

    if (json) {
      printJson(describeMedia(info));
      return;
    }

    console.log(info.getInfoBlock());
    if (info.hasOddResolution) {
      printWarning('Odd resolution, use --fix-resolution when encoding');
    }
  } catch (error) {
    spinner.fail('Failed to read media info');
    fail(error);
  }
}
