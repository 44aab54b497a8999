/**
 * @fileoverview Cell progress bar
 *
 * Renders to stderr so that stdout stays free for a notebook written to `-`.
 */

import cliProgress from 'cli-progress';

export interface ProgressBarHandle {
  increment(delta?: number, payload?: Record<string, unknown>): void;
  stop(): void;
}

export interface ProgressBarOptions {
  total: number;
  /** Shown in the `{task}` slot of the format */
  task?: string;
  format?: string;
  etaBuffer?: number;
}

export function createProgressBar(options: ProgressBarOptions): ProgressBarHandle {
  const { total, etaBuffer = 10 } = options;

  const format = options.format || '{bar} {percentage}% | {value}/{total} cells | {task} | ETA: {eta_formatted}';

  const bar = new cliProgress.SingleBar(
    {
      format,
      barCompleteChar: '=',
      barIncompleteChar: '-',
      hideCursor: true,
      clearOnComplete: false,
      stopOnComplete: true,
      etaBuffer,
      forceRedraw: true,
      stream: process.stderr,
    },
    cliProgress.Presets.shades_classic,
  );

  bar.start(total, 0, { task: options.task ?? 'Executing' });

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
