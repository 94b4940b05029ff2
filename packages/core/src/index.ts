/**
 * @vidtool/core
 * 
 * Error taxonomy, external binary resolution and the persisted
 * settings model (options, output settings, config and presets).
 */

// Errors
export {
  VidToolError,
  isVidToolError,
  InputNotFoundError,
  NotAFileError,
  CommandNotFoundError,
  PermissionDeniedError,
  InvalidArgumentError,
  TooManyCollisionsError,
  SubprocessFailedError,
  CancelledError,
  OutputNotProducedError,
  MetadataExtractionFailedError,
  PresetError,
  type ErrorCode,
} from './errors/index.js';

// Binaries
export {
  getBinariesConfig,
  binaries,
  getBinaryPath,
  isBinaryAvailable,
  assertBinaryAvailable,
  type BinaryName,
  type BinaryConfig,
  type BinariesConfig,
} from './config/binaries.js';

// Encoding options
export {
  SUBTITLE_MODES,
  CRF_MIN,
  CRF_MAX,
  encodingOptionsSchema,
  rawEncodingOptionsSchema,
  parseEncodingOptions,
  parseLenient,
  defaultEncodingOptions,
  toEncodingOptions,
  serializeEncodingOptions,
  type SubtitleMode,
  type EncodingOptions,
  type RawEncodingOptions,
} from './settings/encodingOptions.js';

// Output settings
export {
  OVERWRITE_POLICIES,
  DEFAULT_FILENAME_PATTERN,
  isOverwritePolicy,
  outputSettingsSchema,
  toOutputSettings,
  serializeOutputSettings,
  type OverwritePolicy,
  type OutputSettings,
  type RawOutputSettings,
} from './settings/outputSettings.js';

// Config store
export {
  ConfigStore,
  CONFIG_KEYS,
  isConfigKey,
  rawAppConfigSchema,
  type AppConfig,
  type RawAppConfig,
  type ConfigKey,
} from './settings/configStore.js';

// Presets
export {
  PresetStore,
  type Preset,
  type PresetSettings,
} from './presets/presetStore.js';
export { DEFAULT_PRESETS } from './presets/defaults.js';
