/**
 * Formatting utilities for cloud-shrink
 */

/**
 * Format bytes as human-readable string
 * @param bytes - Number of bytes
 * @returns Formatted string (e.g., "1.50 GB")
 */
export function formatBytes(bytes: number): string {
  if (bytes === 0) return '0 B';
  if (bytes < 0) return `-${formatBytes(-bytes)}`;

  const units = ['B', 'KB', 'MB', 'GB', 'TB', 'PB'];
  const exponent = Math.min(Math.floor(Math.log(bytes) / Math.log(1024)), units.length - 1);
  const value = bytes / Math.pow(1024, exponent);

  return `${value.toFixed(2)} ${units[exponent]}`;
}

/**
 * Format duration in seconds as human-readable string
 * @param seconds - Duration in seconds
 * @returns Formatted string (e.g., "1h 30m 45s")
 */
export function formatDuration(seconds: number): string {
  if (seconds < 0) return '0s';

  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const secs = Math.floor(seconds % 60);

  if (hours > 0) {
    return `${hours}h ${minutes}m ${secs}s`;
  } else if (minutes > 0) {
    return `${minutes}m ${secs}s`;
  }
  return `${secs}s`;
}

/** Format a bitrate given in kilobits per second (e.g., "8.0 Mbps", "640 Kbps") */
export function formatKbps(kbps: number): string {
  if (kbps >= 1000) {
    return `${(kbps / 1000).toFixed(1)} Mbps`;
  }
  return `${Math.round(kbps)} Kbps`;
}

/** Format a percentage already expressed on a 0-100 scale */
export function formatPercentage(value: number, decimals = 1): string {
  return `${value.toFixed(decimals)}%`;
}

/** Megabytes (MiB) to bytes */
export function megabytes(mb: number): number {
  return Math.round(mb * 1024 * 1024);
}
