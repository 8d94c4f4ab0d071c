// Size formatting and the single-line pull progress display
import type { PullEvent } from '@casegen/shared';
import type { LineWriter } from '../log.js';

const SIZE_UNITS = ['B', 'KB', 'MB', 'GB', 'TB'];

/**
 * Convert bytes to a human readable size, 1024 per step, one decimal.
 */
export function formatSize(bytes: number): string {
  if (bytes <= 0) {
    return '0 B';
  }

  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < SIZE_UNITS.length - 1) {
    value /= 1024;
    unit++;
  }

  return `${value.toFixed(1)} ${SIZE_UNITS[unit]}`;
}

export function formatPullProgress(event: PullEvent): string {
  const status = event.status ?? 'pulling';
  if (event.total !== undefined && event.total > 0 && event.completed !== undefined) {
    const percent = Math.min(100, (event.completed / event.total) * 100);
    return `${status} ${percent.toFixed(1)}% (${formatSize(event.completed)} / ${formatSize(event.total)})`;
  }
  return status;
}

// Rewrites one terminal line in place with \r, padding over longer previous text
export class ProgressLine {
  private width = 0;

  constructor(private readonly write: LineWriter) {}

  update(text: string): void {
    const padding = this.width > text.length ? ' '.repeat(this.width - text.length) : '';
    this.write(`\r${text}${padding}`);
    this.width = text.length;
  }

  finish(): void {
    if (this.width > 0) {
      this.write('\n');
      this.width = 0;
    }
  }
}
