/**
 * MCP Server logger - writes to stderr + .gcl/serve.log
 * stdout is reserved for MCP protocol (JSON-RPC)
 */

import { createWriteStream, type WriteStream } from 'node:fs';
import { join } from 'node:path';
import { formatMessage, type LogLevel } from '../../shared/logger.js';

let logFileStream: WriteStream | null = null;

export function initServeLogger(gclDir: string): string {
  const logPath = join(gclDir, 'serve.log');
  logFileStream?.end();
  logFileStream = createWriteStream(logPath, { flags: 'a' });
  return logPath;
}

export function logToStderr(
  message: string,
  level: LogLevel = 'info',
): void {
  const formatted = formatMessage(level, message, []);

  process.stderr.write(formatted + '\n');

  logFileStream?.write(formatted + '\n');
}

export function closeServeLogger(): void {
  logFileStream?.end();
  logFileStream = null;
}

/**
 * Route console.log/info to stderr while serving; console.warn and
 * console.error already write there.
 */
export function interceptConsole(): void {
  console.log = (...args: unknown[]) => {
    logToStderr(args.map(String).join(' '), 'info');
  };
  console.info = (...args: unknown[]) => {
    logToStderr(args.map(String).join(' '), 'info');
  };
}
