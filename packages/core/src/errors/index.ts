/**
 * Custom Error Classes
 */

export type ErrorCode =
  | 'INPUT_NOT_FOUND'
  | 'NOT_A_FILE'
  | 'COMMAND_NOT_FOUND'
  | 'PERMISSION_DENIED'
  | 'INVALID_ARGUMENT'
  | 'TOO_MANY_COLLISIONS'
  | 'SUBPROCESS_FAILED'
  | 'CANCELLED'
  | 'OUTPUT_NOT_PRODUCED'
  | 'METADATA_EXTRACTION_FAILED'
  | 'PRESET_ERROR';

/**
 * Base error class for all vidtool errors
 */
export class VidToolError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'VidToolError';
    this.code = code;
    this.details = details;
    
    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

export function isVidToolError(error: unknown, code?: ErrorCode): error is VidToolError {
  return error instanceof VidToolError && (code === undefined || error.code === code);
}

export class InputNotFoundError extends VidToolError {
  constructor(path: string) {
    super(`Input file not found: ${path}`, 'INPUT_NOT_FOUND', { path });
    this.name = 'InputNotFoundError';
  }
}

export class NotAFileError extends VidToolError {
  constructor(path: string) {
    super(`Not a regular file: ${path}`, 'NOT_A_FILE', { path });
    this.name = 'NotAFileError';
  }
}

/**
 * External binary could not be located
 */
export class CommandNotFoundError extends VidToolError {
  constructor(command: string, cause?: unknown) {
    super(
      `Command not found: ${command}. Install it or set its path in the environment.`,
      'COMMAND_NOT_FOUND',
      { command },
      { cause }
    );
    this.name = 'CommandNotFoundError';
  }
}

export class PermissionDeniedError extends VidToolError {
  constructor(target: string, action: string, cause?: unknown) {
    super(`Permission denied: cannot ${action} ${target}`, 'PERMISSION_DENIED', { target, action }, { cause });
    this.name = 'PermissionDeniedError';
  }
}

/**
 * Validation error for invalid inputs
 */
export class InvalidArgumentError extends VidToolError {
  constructor(field: string, message: string) {
    super(
      `Invalid ${field}: ${message}`,
      'INVALID_ARGUMENT',
      { field, message }
    );
    this.name = 'InvalidArgumentError';
  }
}

export class TooManyCollisionsError extends VidToolError {
  constructor(path: string, attempts: number) {
    super(
      `Too many existing files with similar names: ${path} (${attempts} attempts)`,
      'TOO_MANY_COLLISIONS',
      { path, attempts }
    );
    this.name = 'TooManyCollisionsError';
  }
}

/**
 * External command exited non-zero
 */
export class SubprocessFailedError extends VidToolError {
  public readonly exitCode: number | null;

  constructor(
    command: string,
    exitCode: number | null,
    output: string
  ) {
    super(
      `Command failed with exit code ${exitCode ?? 'unknown'}${output ? `: ${output}` : ''}`,
      'SUBPROCESS_FAILED',
      { command, exitCode, output: output.substring(0, 1000) }
    );
    this.name = 'SubprocessFailedError';
    this.exitCode = exitCode;
  }
}

export class CancelledError extends VidToolError {
  constructor(message: string = 'Cancelled by user') {
    super(message, 'CANCELLED');
    this.name = 'CancelledError';
  }
}

export class OutputNotProducedError extends VidToolError {
  constructor(path: string, reason: 'missing' | 'empty') {
    super(
      `Encoder reported success but output is ${reason}: ${path}`,
      'OUTPUT_NOT_PRODUCED',
      { path, reason }
    );
    this.name = 'OutputNotProducedError';
  }
}

export class MetadataExtractionFailedError extends VidToolError {
  constructor(path: string, reason: string, cause?: unknown) {
    super(`Failed to read metadata for ${path}: ${reason}`, 'METADATA_EXTRACTION_FAILED', { path }, { cause });
    this.name = 'MetadataExtractionFailedError';
  }
}

export class PresetError extends VidToolError {
  constructor(message: string, cause?: unknown) {
    super(message, 'PRESET_ERROR', undefined, { cause });
    this.name = 'PresetError';
  }
}
