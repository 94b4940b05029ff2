/**
 * Built-in encoding presets, written when no preset file exists yet.
 */

import type { PresetSettings } from './presetStore.js';

export const DEFAULT_PRESETS: Record<string, PresetSettings> = {
  'H.265 High Quality': {
    description: 'High quality H.265 encoding with CRF 18',
    encode_video: true,
    video_codec: 'libx265',
    encode_audio: false,
    audio_codec: 'copy',
    use_crf: true,
    crf_value: 18,
    output_extension: '.mkv',
    output_suffix: '_h265_hq',
    fix_resolution: true,
    no_data: true,
    subtitles: 'All',
  },
  'H.265 Balanced': {
    description: 'Balanced H.265 encoding with CRF 23',
    encode_video: true,
    video_codec: 'libx265',
    encode_audio: false,
    audio_codec: 'copy',
    use_crf: true,
    crf_value: 23,
    output_extension: '.mkv',
    output_suffix: '_h265',
    fix_resolution: true,
    no_data: true,
    subtitles: 'All',
  },
  'H.265 Small Size': {
    description: 'Smaller file size H.265 encoding with CRF 28',
    encode_video: true,
    video_codec: 'libx265',
    encode_audio: false,
    audio_codec: 'copy',
    use_crf: true,
    crf_value: 28,
    output_extension: '.mkv',
    output_suffix: '_small',
    fix_resolution: true,
    no_data: true,
    subtitles: 'None',
  },
  'H.264 Compatible': {
    description: 'H.264 encoding for maximum compatibility',
    encode_video: true,
    video_codec: 'libx264',
    encode_audio: true,
    audio_codec: 'aac',
    use_crf: true,
    crf_value: 23,
    output_extension: '.mp4',
    output_suffix: '_h264',
    fix_resolution: true,
    no_data: true,
    subtitles: 'All',
  },
  'Copy Video + Convert Audio': {
    description: 'Copy video stream, convert audio to AAC',
    encode_video: false,
    video_codec: 'copy',
    encode_audio: true,
    audio_codec: 'aac',
    use_crf: false,
    crf_value: 23,
    output_extension: '.mkv',
    output_suffix: '_audio_aac',
    fix_resolution: false,
    no_data: true,
    subtitles: 'All',
  },
  'Archive Quality': {
    description: 'Lossless/near-lossless archival quality',
    encode_video: true,
    video_codec: 'libx265',
    encode_audio: false,
    audio_codec: 'copy',
    use_crf: true,
    crf_value: 12,
    output_extension: '.mkv',
    output_suffix: '_archive',
    fix_resolution: false,
    no_data: false,
    subtitles: 'All',
  },
};
