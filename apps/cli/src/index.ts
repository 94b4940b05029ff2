#!/usr/bin/env tsx
/**
 * CLI Entry Point
 * 
 * Command-line interface for vidtool: inspect, rename, play and batch
 * encode video files with the ffmpeg tool family.
 */

// Loads .env and settles the log level before any logger exists
import { config } from './config/index.js';

import { Command } from 'commander';
import chalk from 'chalk';
import { OVERWRITE_POLICIES, SUBTITLE_MODES } from '@vidtool/core';

// Commands
import { infoCommand } from './commands/info.js';
import { encodeCommand } from './commands/encode.js';
import { previewCommand } from './commands/preview.js';
import { renameCommand } from './commands/rename.js';
import { selectCommand } from './commands/select.js';
import { moveCommand } from './commands/move.js';
import { playCommand } from './commands/play.js';
import {
  presetsDeleteCommand,
  presetsExportCommand,
  presetsImportCommand,
  presetsListCommand,
  presetsRenameCommand,
  presetsSaveCommand,
  presetsShowCommand,
} from './commands/presets.js';
import { configCommand } from './commands/config.js';
import { collect } from './lib/options.js';

const program = new Command();

program
  .name('vidtool')
  .description('Inspect, rename and batch-encode video files with ffmpeg')
  .version('1.0.0')
  .option('--json', 'Output in JSON format')
  .option('--debug', `Enable debug logging (current level: ${config.logLevel})`);

/**
 * Options that change the encoding settings
 */
function withEncodeOptions(command: Command): Command {
  return command
    .option('-p, --preset <name>', 'Start from a saved preset instead of the saved settings')
    .option('--video-codec <codec>', 'Encode video with this codec')
    .option('--audio-codec <codec>', 'Encode audio with this codec')
    .option('--crf <value>', 'Constant rate factor (4-63)')
    .option('--subtitles <mode>', `Subtitle handling (${SUBTITLE_MODES.join(', ')})`)
    .option('--no-data', 'Drop data streams')
    .option('--fix-resolution', 'Round odd dimensions down to even')
    .option('--fix-errors', 'Ignore decoding errors')
    .option('--suffix <suffix>', 'Output filename suffix')
    .option('--extension <ext>', 'Output container extension')
    .option('--append-res', 'Append the resolution to output names');
}

/**
 * Options that decide where outputs go
 */
function withOutputOptions(command: Command): Command {
  return command
    .option('-o, --output-dir <dir>', 'Output directory (default: next to the input)')
    .option('--source-root <dir>', 'Mirror directories below this root in the output directory')
    .option('--subdir <pattern>', 'Subdirectory pattern, e.g. "{codec}" or "archived/{date}"')
    .option('--pattern <pattern>', 'Filename pattern, e.g. "{stem}{suffix}{extension}"')
    .option('--overwrite <policy>', `What to do when the output exists (${OVERWRITE_POLICIES.join(', ')})`)
    .option('--output-preset <name>', 'Named output layout, e.g. "Codec Subdirectory"');
}

// ============================================
// MEDIA COMMANDS
// ============================================

program
  .command('info <file>')
  .description('Show format and stream information')
  .action(infoCommand);

withOutputOptions(withEncodeOptions(
  program
    .command('encode <files...>')
    .description('Encode files one after another (Ctrl-C cancels)')
))
  .option('--save', 'Save the resulting settings as the new defaults')
  .action(encodeCommand);

withOutputOptions(withEncodeOptions(
  program
    .command('preview <files...>')
    .description('Show the output path each file would get')
)).action(previewCommand);

program
  .command('rename <files...>')
  .description('Append the resolution to file names, or rewrite them with --find')
  .option('--find <regex>', 'Regular expression to replace in each name')
  .option('--replace <text>', 'Replacement, may use $1 and $<name> references', '')
  .option('--case-sensitive', 'Match --find case-sensitively')
  .option('--dry-run', 'Show the new names without renaming')
  .action(renameCommand);

// ============================================
// FILE MANAGEMENT COMMANDS
// ============================================

program
  .command('select <files...>')
  .description('List the files matching name and media criteria')
  .option('--ext <list>', 'Extensions to keep, e.g. "mkv,mp4"')
  .option('--include <glob>', 'Filename glob a file must match (repeatable)', collect, [])
  .option('--exclude <glob>', 'Filename glob that drops a file (repeatable)', collect, [])
  .option('--min-size <mb>', 'Minimum size in MB')
  .option('--max-size <mb>', 'Maximum size in MB')
  .option('--min-duration <sec>', 'Minimum duration in seconds')
  .option('--max-duration <sec>', 'Maximum duration in seconds')
  .option('--min-width <px>', 'Minimum width')
  .option('--max-width <px>', 'Maximum width')
  .option('--min-height <px>', 'Minimum height')
  .option('--max-height <px>', 'Maximum height')
  .option('--video-codec <list>', 'Video codecs to keep, e.g. "hevc,h264"')
  .option('--audio-codec <list>', 'Audio codecs to keep')
  .action(selectCommand);

program
  .command('move <files...>')
  .description('Move files into a subfolder, numbering clashing names')
  .requiredOption('--into <folder>', 'Subfolder name or relative path')
  .option('--base <dir>', 'Directory the subfolder is created in (default: current directory)')
  .option('--copy', 'Copy instead of moving')
  .option('--no-create', 'Fail when the subfolder does not exist')
  .action(moveCommand);

program
  .command('play <file>')
  .description('Play a file with ffplay')
  .action(playCommand);

// ============================================
// SETTINGS COMMANDS
// ============================================

const presets = program
  .command('presets')
  .description('Manage encoding presets');

presets
  .command('list', { isDefault: true })
  .description('List presets')
  .action(presetsListCommand);

presets
  .command('show <name>')
  .description('Show the settings of a preset')
  .action(presetsShowCommand);

withEncodeOptions(
  presets
    .command('save <name>')
    .description('Save the current settings, with any flags applied, as a preset')
)
  .option('-d, --description <text>', 'Preset description')
  .action(presetsSaveCommand);

presets
  .command('delete <name>')
  .description('Delete a preset')
  .action(presetsDeleteCommand);

presets
  .command('rename <oldName> <newName>')
  .description('Rename a preset')
  .action(presetsRenameCommand);

presets
  .command('export <name> <file>')
  .description('Export a preset to a file')
  .action(presetsExportCommand);

presets
  .command('import <file>')
  .description('Import a preset from a file')
  .action(presetsImportCommand);

program
  .command('config [key] [value]')
  .description('View or modify the saved settings')
  .option('--reset', 'Reset to defaults')
  .action(configCommand);

// ============================================
// ERROR HANDLING
// ============================================

program.exitOverride((err) => {
  if (err.code === 'commander.unknownCommand') {
    console.log('Run', chalk.cyan('vidtool --help'), 'for available commands');
  }
  process.exit(err.exitCode);
});

await program.parseAsync();
