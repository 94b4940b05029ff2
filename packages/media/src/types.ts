/**
 * Media Types
 */

import type { MediaInfo } from './mediaInfo.js';

export type StreamKind = 'video' | 'audio' | 'subtitle' | 'data';

export interface StreamInfo {
  index: number;
  kind: StreamKind;
  codecName: string;
  codecLongName: string;
  bitRate: number | null;
  
  // Video
  width?: number;
  height?: number;
  codedWidth?: number;
  codedHeight?: number;
  displayAspectRatio?: string;
  
  // Audio
  channels?: number;
}

/**
 * Anything that can turn a file path into MediaInfo
 */
export interface MediaProber {
  getMediaInfo(filePath: string): Promise<MediaInfo>;
}
