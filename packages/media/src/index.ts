/**
 * @vidtool/media
 * 
 * Media analysis layer: probe files with ffprobe and expose the result
 * as an immutable MediaInfo.
 */

// Probing
export {
  FFProbe,
  ffprobeResultSchema,
  type FFProbeResult,
  type FFProbeStream,
} from './probes/ffprobe.js';

// Model
export { MediaInfo, type MediaInfoInit } from './mediaInfo.js';
export { MediaInfoCache } from './cache.js';

// Types
export type {
  StreamKind,
  StreamInfo,
  MediaProber,
} from './types.js';
