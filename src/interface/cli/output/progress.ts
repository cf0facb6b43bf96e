/**
 * Simple progress bar for CLI (stderr output)
 */

import type { GlobalOptions } from '../utils/global-options.js';

export interface ProgressState {
  current: number;
  total: number;
  label: string;
  /** Counted thing, e.g. "nodes" */
  unit?: string;
}

export function formatProgressLine(state: ProgressState, barWidth = 32): string {
  const { current, total, label, unit = 'nodes' } = state;
  const filled = total > 0 ? Math.round((current / total) * barWidth) : 0;
  const empty = barWidth - filled;
  const bar = '█'.repeat(filled) + '░'.repeat(empty);

  return `  ${label.padEnd(12)} ${bar}  ${current}/${total} ${unit}`;
}

export function renderProgressBar(
  state: ProgressState,
  globals: GlobalOptions,
): void {
  if (globals.quiet || globals.json) return;

  process.stderr.write(`\r${formatProgressLine(state)}`);

  if (state.current === state.total) {
    process.stderr.write('\n');
  }
}
