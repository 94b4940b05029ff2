/**
 * @vidtool/processing
 * 
 * Encoding layer: output path generation, progress parsing, the
 * cancellable transcoder executor, encode jobs and batches, plus
 * selecting, renaming and moving files in bulk.
 * 
 * Every transcoder command line is logged before it runs.
 */

// FFmpeg wrapper
export { FFmpeg, FFplay } from './ffmpeg.js';

// Streaming executor
export {
  executeStreaming,
  type StreamingOptions,
  type ExecutionResult,
} from './executor.js';

// Progress
export {
  ProgressInfo,
  formatProgress,
  formatBytes,
  type ProgressSnapshot,
} from './progressParser.js';

// Command Builder
export { FFmpegCommandBuilder, EVEN_RESOLUTION_FILTER } from './commandBuilder.js';

// Output paths
export {
  OutputPathGenerator,
  MAX_INCREMENT,
  type NamingOptions,
  type GeneratorConfig,
  type GeneratorOptions,
  type PreviewEntry,
} from './outputPath.js';
export {
  OUTPUT_PRESETS,
  getOutputPreset,
  isOutputPresetName,
  type OutputPresetName,
} from './outputPresets.js';

// Jobs
export { EncodeJob, type EncodeJobDeps, type AddInputOptions } from './encodeJob.js';
export {
  runBatch,
  formatBatchSummary,
  type BatchRequest,
  type BatchCallbacks,
  type BatchSummary,
  type FileResult,
  type FileStatus,
} from './batchRunner.js';

// Selection and file management
export {
  BatchFilter,
  selectFiles,
  type BatchFilterCriteria,
  type NumericRange,
} from './batchFilter.js';
export {
  renameWithResolution,
  resolutionFilename,
  compileFindPattern,
  planRegexRename,
  applyRenamePlan,
  type RenamePlanEntry,
  type RenameStatus,
  type RegexRenameOptions,
} from './rename.js';
export {
  moveToSubfolder,
  uniqueTarget,
  formatOperationSummary,
  MAX_LISTED_ERRORS,
  type FileOperation,
  type OperationSummary,
  type SubfolderOptions,
  type SubfolderResult,
  type PlacedFile,
} from './fileOperations.js';

// Types
export type { TranscoderRunner, EncodeResult } from './types.js';
