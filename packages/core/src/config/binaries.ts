/**
 * Binary Configuration
 * 
 * Centralized resolution of the ffmpeg tool family.
 * 
 * Priority order:
 * 1. Environment variables (e.g., FFMPEG_PATH)
 * 2. Bundled binary folder (packages/core/binaries/<os>/)
 * 3. System PATH
 */

import { existsSync } from 'node:fs';
import { spawn } from 'node:child_process';
import { join, resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { CommandNotFoundError } from '../errors/index.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

// Binary folder location - relative to packages/core/
const BINARY_ROOT = resolve(__dirname, '../../binaries');

export type BinaryName = 'ffmpeg' | 'ffprobe' | 'ffplay';

const ENV_VARS: Record<BinaryName, string> = {
  ffmpeg: 'FFMPEG_PATH',
  ffprobe: 'FFPROBE_PATH',
  ffplay: 'FFPLAY_PATH',
};

/**
 * OS-specific subfolder
 */
function getOsFolder(): string {
  switch (process.platform) {
    case 'win32':
      return 'windows';
    case 'darwin':
      return 'macos';
    default:
      return 'linux';
  }
}

/**
 * Get executable extension for current OS
 */
function getExeExt(): string {
  return process.platform === 'win32' ? '.exe' : '';
}

export interface BinaryConfig {
  name: BinaryName;
  envVar: string;
  resolvedPath: string;
  source: 'env' | 'bundled' | 'path';
}

export type BinariesConfig = Record<BinaryName, BinaryConfig>;

function resolveBinaryPath(name: BinaryName, env: NodeJS.ProcessEnv): BinaryConfig {
  const envVar = ENV_VARS[name];
  
  // 1. Check environment variable
  const envPath = env[envVar];
  if (envPath && existsSync(envPath)) {
    return { name, envVar, resolvedPath: envPath, source: 'env' };
  }
  
  // 2. Check bundled binary folder
  const bundledPath = join(BINARY_ROOT, getOsFolder(), name + getExeExt());
  if (existsSync(bundledPath)) {
    return { name, envVar, resolvedPath: bundledPath, source: 'bundled' };
  }
  
  // 3. Bare name, resolved through PATH at spawn time
  return { name, envVar, resolvedPath: name, source: 'path' };
}

/**
 * Get all binary configurations
 */
export function getBinariesConfig(env: NodeJS.ProcessEnv = process.env): BinariesConfig {
  return {
    ffmpeg: resolveBinaryPath('ffmpeg', env),
    ffprobe: resolveBinaryPath('ffprobe', env),
    ffplay: resolveBinaryPath('ffplay', env),
  };
}

// Singleton instance
let _binaries: BinariesConfig | null = null;

/**
 * Get binary configurations (cached)
 */
export function binaries(): BinariesConfig {
  if (!_binaries) {
    _binaries = getBinariesConfig();
  }
  return _binaries;
}

/**
 * Get a specific binary path
 */
export function getBinaryPath(name: BinaryName): string {
  return binaries()[name].resolvedPath;
}

/**
 * Check if a binary can be spawned and answers `-version`
 */
export async function isBinaryAvailable(binaryPath: string): Promise<boolean> {
  return new Promise((resolve) => {
    try {
      const proc = spawn(binaryPath, ['-version'], {
        stdio: 'ignore',
        timeout: 5000,
      });
      
      proc.on('close', (code) => {
        resolve(code === 0);
      });
      
      proc.on('error', () => {
        resolve(false);
      });
    } catch {
      resolve(false);
    }
  });
}

/**
 * Throw CommandNotFoundError when a binary is unavailable
 */
export async function assertBinaryAvailable(binaryPath: string): Promise<void> {
  if (!(await isBinaryAvailable(binaryPath))) {
    throw new CommandNotFoundError(binaryPath);
  }
}
