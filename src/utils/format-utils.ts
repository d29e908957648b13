/**
 * Format bytes to human-readable size
 * Example: 1900000000 → "1.8 GB"
 */
export function formatBytes(bytes: number): string {
  const units = ['B', 'KB', 'MB', 'GB', 'TB'];
  let size = bytes;
  let unitIndex = 0;

  while (size >= 1024 && unitIndex < units.length - 1) {
    size /= 1024;
    unitIndex++;
  }

  return `${size.toFixed(1)} ${units[unitIndex]}`;
}

/**
 * Format milliwatts as watts
 * Example: 250000 → "250 W"
 */
export function formatPower(milliwatts: number): string {
  return `${Math.round(milliwatts / 1000)} W`;
}

/**
 * Time elapsed since an ISO timestamp
 * Example: "45s ago", "3m ago", "2h ago"
 */
export function formatAge(timestamp: string | null, now: number = Date.now()): string {
  if (!timestamp) return 'never';

  const seconds = Math.max(0, Math.floor((now - new Date(timestamp).getTime()) / 1000));
  if (seconds < 60) return `${seconds}s ago`;

  const minutes = Math.floor(seconds / 60);
  if (minutes < 60) return `${minutes}m ago`;

  const hours = Math.floor(minutes / 60);
  if (hours < 24) return `${hours}h ago`;

  return `${Math.floor(hours / 24)}d ago`;
}

/**
 * Truncate a string to a maximum length
 */
export function truncate(str: string, maxLength: number): string {
  if (str.length <= maxLength) return str;
  return str.slice(0, maxLength - 3) + '...';
}

/**
 * Text progress bar
 * Example: (50, 10) → "[█████░░░░░]"
 */
export function progressBar(percentage: number, width: number = 30): string {
  const clamped = Math.min(Math.max(percentage, 0), 100);
  const filled = Math.round((clamped / 100) * width);
  return '[' + '█'.repeat(filled) + '░'.repeat(width - filled) + ']';
}
