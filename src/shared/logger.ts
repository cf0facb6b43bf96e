/**
 * graph-closeness logger
 *
 * Lines go to stderr and, when configured, to an append-only file.
 * Each logger carries a component name plus optional key=value context,
 * rendered as `[Component key=value ...]` ahead of the message.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Values attached to every line of a logger, e.g. the oracle of a run */
export type LogContext = Readonly<Record<string, string | number>>;

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  /** Same component, with `context` merged over the current one */
  child(context: LogContext): Logger;
}

interface Sink {
  level: LogLevel;
  stream: fs.WriteStream | null;
}

const sink: Sink = { level: 'info', stream: null };

export function configureLogger(options: {
  level?: LogLevel;
  file?: string | null;
}): void {
  if (options.level) {
    sink.level = options.level;
  }
  if (options.file === undefined) return;

  sink.stream?.end();
  sink.stream = null;
  if (options.file) {
    fs.mkdirSync(path.dirname(options.file), { recursive: true });
    sink.stream = fs.createWriteStream(options.file, { flags: 'a' });
  }
}

export function formatMessage(level: LogLevel, message: string, args: unknown[]): string {
  const timestamp = new Date().toISOString();
  const levelTag = level.toUpperCase().padEnd(5);
  const extra = args.length > 0
    ? ' ' + args.map((a) => (typeof a === 'string' ? a : JSON.stringify(a))).join(' ')
    : '';
  return `[${timestamp}] ${levelTag} ${message}${extra}`;
}

export function closeLogger(): void {
  sink.stream?.end();
  sink.stream = null;
}

function renderTag(component: string | undefined, context: LogContext): string {
  const parts = component ? [component] : [];
  for (const [key, value] of Object.entries(context)) {
    parts.push(`${key}=${value}`);
  }
  return parts.length > 0 ? `[${parts.join(' ')}] ` : '';
}

export function createLogger(component?: string, context: LogContext = {}): Logger {
  const tag = renderTag(component, context);

  const emit = (level: LogLevel, message: string, args: unknown[]): void => {
    if (LEVEL_RANK[level] < LEVEL_RANK[sink.level]) return;
    const line = formatMessage(level, tag + message, args) + '\n';
    process.stderr.write(line);
    sink.stream?.write(line);
  };

  return {
    debug: (message, ...args) => emit('debug', message, args),
    info: (message, ...args) => emit('info', message, args),
    warn: (message, ...args) => emit('warn', message, args),
    error: (message, ...args) => emit('error', message, args),
    child: (extra) => createLogger(component, { ...context, ...extra }),
  };
}
