/**
 * Time Utilities
 */

const pad2 = (n: number): string => n.toString().padStart(2, '0');

/**
 * Format duration in milliseconds to human-readable string
 */
export function formatDuration(ms: number): string {
  if (!Number.isFinite(ms) || ms < 0) return '--';
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  }
  
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);
  
  if (hours > 0) {
    return `${hours}h ${minutes % 60}m ${seconds % 60}s`;
  }
  if (minutes > 0) {
    return `${minutes}m ${seconds % 60}s`;
  }
  return `${seconds}s`;
}

/**
 * Format seconds as a runtime clock (H:MM:SS)
 */
export function formatRuntime(totalSeconds: number): string {
  const whole = Math.max(0, Math.floor(totalSeconds));
  const hours = Math.floor(whole / 3600);
  const minutes = Math.floor((whole % 3600) / 60);
  const seconds = whole % 60;
  return `${hours}:${pad2(minutes)}:${pad2(seconds)}`;
}

/**
 * Format an ETA in seconds as MM:SS (minutes may exceed 59)
 */
export function formatEta(etaSeconds: number): string {
  const whole = Math.max(0, Math.floor(etaSeconds));
  return `${pad2(Math.floor(whole / 60))}:${pad2(whole % 60)}`;
}

/** YYYY-MM-DD in local time */
export function formatDateStamp(date: Date): string {
  return `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
}

/** YYYYMMDD in local time */
export function formatCompactDate(date: Date): string {
  return `${date.getFullYear()}${pad2(date.getMonth() + 1)}${pad2(date.getDate())}`;
}

/** HHMMSS in local time */
export function formatTimeStamp(date: Date): string {
  return `${pad2(date.getHours())}${pad2(date.getMinutes())}${pad2(date.getSeconds())}`;
}
