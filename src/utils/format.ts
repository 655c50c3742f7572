/**
 * Format file size for display
 */
export function formatSize(bytes: number): string {
  const units = ['B', 'KB', 'MB', 'GB'];
  let size = bytes;
  let unit = 0;

  while (size >= 1024 && unit < units.length - 1) {
    size /= 1024;
    unit++;
  }

  return `${size.toFixed(2)} ${units[unit]}`;
}

/**
 * Throughput in MB/s (2^20 bytes); 0 before any time has elapsed
 */
export function megabytesPerSecond(bytes: number, elapsedMs: number): number {
  if (elapsedMs <= 0) return 0;
  return bytes / (1024 * 1024) / (elapsedMs / 1000);
}

/**
 * "<name>: 42.0% (1.5 MB/s)"
 */
export function formatProgress(name: string, downloaded: number, total: number, elapsedMs: number): string {
  const percent = (downloaded / total) * 100;
  const speed = megabytesPerSecond(downloaded, elapsedMs);
  return `${name}: ${percent.toFixed(1)}% (${speed.toFixed(1)} MB/s)`;
}
