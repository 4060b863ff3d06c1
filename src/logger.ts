import { appendFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  at: string;
  level: LogLevel;
  scope: string;
  file?: string;
  message: string;
}

/**
 * Collects log entries for one worker or stage. Buffers are never shared
 * between workers; the coordinator merges them into the run log.
 */
export class LogBuffer {
  constructor(
    readonly scope: string,
    private readonly entries: LogEntry[] = []
  ) {}

  scoped(scope: string): LogBuffer {
    return new LogBuffer(scope, this.entries);
  }

  log(level: LogLevel, message: string, file?: string): void {
    this.entries.push({
      at: new Date().toISOString(),
      level,
      scope: this.scope,
      ...(file === undefined ? {} : { file }),
      message,
    });
  }

  debug(message: string, file?: string): void {
    this.log('debug', message, file);
  }

  info(message: string, file?: string): void {
    this.log('info', message, file);
  }

  warn(message: string, file?: string): void {
    this.log('warn', message, file);
  }

  error(message: string, file?: string): void {
    this.log('error', message, file);
  }

  get size(): number {
    return this.entries.length;
  }

  snapshot(): LogEntry[] {
    return [...this.entries];
  }

  drain(): LogEntry[] {
    return this.entries.splice(0, this.entries.length);
  }
}

export class RunLog {
  private readonly counts: Record<LogLevel, number> = { debug: 0, info: 0, warn: 0, error: 0 };

  private constructor(readonly path: string) {}

  static async open(dataDirectory: string, startedAt = new Date()): Promise<RunLog> {
    const logDir = join(dataDirectory, 'logs');
    await mkdir(logDir, { recursive: true });

    const ts = startedAt.toISOString().replace(/[:.]/g, '-');
    return new RunLog(join(logDir, `run-${ts}.ndjson`));
  }

  /**
   * Appends every buffer's entries in the order given, emptying the buffers.
   */
  async merge(buffers: LogBuffer[]): Promise<number> {
    const lines: string[] = [];

    for (const buffer of buffers) {
      for (const entry of buffer.drain()) {
        this.counts[entry.level]++;
        lines.push(JSON.stringify(entry));
      }
    }

    if (lines.length > 0) {
      await appendFile(this.path, lines.join('\n') + '\n');
    }

    return lines.length;
  }

  count(level: LogLevel): number {
    return this.counts[level];
  }
}
