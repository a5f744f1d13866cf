/**
 * @fileoverview Progress indicators and plain-text layout for CLI output
 */

import cliProgress from 'cli-progress';

export interface ProgressBarHandle {
  increment(delta?: number, payload?: Record<string, unknown>): void;
  stop(): void;
}

export interface ProgressBarOptions {
  total: number;
  format?: string;
}

/**
 * Progress bar on stderr, so stdout stays clean for piped output.
 */
export function createProgressBar(options: ProgressBarOptions): ProgressBarHandle {
  const format = options.format ?? '{bar} {percentage}% | {value}/{total} | {task}';

  const bar = new cliProgress.SingleBar(
    {
      format,
      barCompleteChar: '=',
      barIncompleteChar: '-',
      hideCursor: true,
      clearOnComplete: false,
      stopOnComplete: true,
      stream: process.stderr,
    },
    cliProgress.Presets.shades_classic,
  );

  bar.start(options.total, 0, { task: 'Starting...' });

  return {
    increment(delta = 1, payload?: Record<string, unknown>): void {
      bar.increment(delta, payload);
    },

    stop(): void {
      bar.stop();
    },
  };
}

/**
 * Format milliseconds into a human-readable duration
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  }
  if (ms < 60_000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60_000);
  const seconds = Math.round((ms % 60_000) / 1000);
  return `${minutes}m ${seconds}s`;
}

/**
 * Lay out a simple table as lines of text
 */
export function formatTable(headers: string[], rows: string[][]): string[] {
  const widths = headers.map((header, i) => {
    const maxRowWidth = Math.max(0, ...rows.map((row) => (row[i] ?? '').length));
    return Math.max(header.length, maxRowWidth);
  });

  const pad = (cells: string[]): string =>
    cells.map((cell, i) => cell.padEnd(widths[i] ?? 0)).join(' | ').trimEnd();

  return [
    pad(headers),
    widths.map((w) => '-'.repeat(w)).join('-+-'),
    ...rows.map((row) => pad(headers.map((_, i) => row[i] ?? ''))),
  ];
}

/**
 * Lay out a key-value list as indented lines
 */
export function formatKeyValue(items: Array<{ key: string; value: string | number | boolean | null }>): string[] {
  const maxKeyLength = Math.max(0, ...items.map((item) => item.key.length));
  return items.map((item) => {
    const value = item.value === null ? 'N/A' : String(item.value);
    return `  ${item.key.padEnd(maxKeyLength)}: ${value}`;
  });
}
