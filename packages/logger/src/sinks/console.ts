import pc from 'picocolors';

import type { LogContext, LogEntry, LogLevel, Sink } from '../logger.js';

export interface ConsoleSinkOptions {
  color?: boolean | undefined;
  /** Defaults to stderr so stdout stays free for command output. */
  stream?: 'stdout' | 'stderr' | undefined;
}

const levelColors: Record<LogLevel, (text: string) => string> = {
  trace: pc.gray,
  debug: pc.cyan,
  info: pc.green,
  warn: pc.yellow,
  error: pc.red,
};

const pad2 = (value: number): string => String(value).padStart(2, '0');

function clock(timestamp: Date): string {
  return [timestamp.getHours(), timestamp.getMinutes(), timestamp.getSeconds()].map(pad2).join(':');
}

function renderContext(context: LogContext): string {
  return `{${Object.entries(context)
    .map(([key, value]) => `${key}=${JSON.stringify(value)}`)
    .join(', ')}}`;
}

/**
 * Human-readable lines: `[HH:MM:SS] LEVEL [category] message {key=value, ...}`.
 */
export class ConsoleSink implements Sink {
  private readonly color: boolean;
  private readonly stream: NodeJS.WriteStream;

  constructor(options?: ConsoleSinkOptions) {
    this.color = options?.color ?? false;
    this.stream = options?.stream === 'stdout' ? process.stdout : process.stderr;
  }

  format(entry: LogEntry): string {
    const label = entry.level.toUpperCase().padEnd(5);
    const level = this.color ? levelColors[entry.level](label) : label;
    const parts = [`[${clock(entry.timestamp)}]`, level, `[${entry.category}]`, entry.msg];
    if (entry.context) parts.push(renderContext(entry.context));
    return parts.join(' ');
  }

  write(entry: LogEntry): void {
    this.stream.write(`${this.format(entry)}\n`);
  }
}
