/**
 * JSON output mode for --json flag
 */

/**
 * JSON has no infinity; closeness of a zero-farness node is written as "Infinity".
 */
export function jsonReplacer(_key: string, value: unknown): unknown {
  if (typeof value === 'number' && !Number.isFinite(value)) {
    return String(value);
  }
  return value;
}

export function toJson(data: unknown): string {
  return JSON.stringify(data, jsonReplacer, 2);
}

export function printJson(data: unknown): void {
  process.stdout.write(toJson(data) + '\n');
}

export function printJsonError(error: {
  message: string;
  code?: string;
  cause?: string;
  hint?: string;
}): void {
  printJson({ error });
}
