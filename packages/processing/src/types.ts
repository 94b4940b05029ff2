/**
 * Processing Types
 */

import type { ExecutionResult, StreamingOptions } from './executor.js';

/**
 * Anything that can run a transcoder command line. The default is the
 * FFmpeg wrapper; tests substitute an in-process fake.
 */
export interface TranscoderRunner {
  /** Binary path, used in logs and error details */
  readonly command: string;
  run(args: string[], options?: StreamingOptions): Promise<ExecutionResult>;
  isAvailable(): Promise<boolean>;
}

export interface EncodeResult {
  outputPath: string;
  /** Bytes */
  outputSize: number;
  exitCode: number;
  elapsedMs: number;
}
