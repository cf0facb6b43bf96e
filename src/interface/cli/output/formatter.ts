/**
 * CLI output formatter with picocolors
 */

import pc from 'picocolors';

export function formatSuccess(message: string): string {
  return pc.green(`OK ${message}`);
}

export function formatWarning(message: string): string {
  return pc.yellow(`WARN ${message}`);
}

export function formatError(message: string): string {
  return pc.red(`Error: ${message}`);
}

export function formatHint(message: string): string {
  return pc.cyan(`Hint: ${message}`);
}

/**
 * Closeness with fixed precision. Zero farness gives an infinite score.
 */
export function formatCloseness(score: number): string {
  if (score === Number.POSITIVE_INFINITY) return 'inf';
  return score.toFixed(6);
}

export function formatDim(text: string): string {
  return pc.dim(text);
}

export function formatBold(text: string): string {
  return pc.bold(text);
}

export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}
