import { closeSync, mkdirSync, openSync, writeSync } from 'node:fs';
import { dirname } from 'node:path';

import type { LogEntry, Sink } from '../logger.js';

export interface FileSinkOptions {
  path: string;
}

/**
 * JSON lines appended to `path`. The file is opened on the first entry and
 * closed by `flush`; a later entry opens it again.
 */
export class FileSink implements Sink {
  private fd: number | undefined;

  constructor(private readonly options: FileSinkOptions) {}

  write(entry: LogEntry): void {
    if (this.fd === undefined) {
      mkdirSync(dirname(this.options.path), { recursive: true });
      this.fd = openSync(this.options.path, 'a');
    }
    const record = {
      time: entry.timestamp.toISOString(),
      level: entry.level,
      category: entry.category,
      msg: entry.msg,
      context: entry.context,
    };
    writeSync(this.fd, `${JSON.stringify(record)}\n`);
  }

  flush(): void {
    if (this.fd === undefined) return;
    closeSync(this.fd);
    this.fd = undefined;
  }
}
