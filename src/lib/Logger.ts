import { createWriteStream } from 'fs';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/** Receives one fully formatted line, without the trailing newline. */
export type LogSink = (line: string) => void;

/**
 * A sink backed by a file stream, which has to be closed once the run ends
 * so buffered lines reach the disk.
 */
export interface FileSink {
  write: LogSink;
  close(): Promise<void>;
}

/**
 * Human-readable progress log, fanned out to every configured sink.
 *
 * @example
 * // 2024-05-01T10:00:00.000Z - INFO - Processing URL [1/3]: https://example.com/
 */
export class Logger {
  private readonly sinks: LogSink[];
  private readonly minLevel: LogLevel;
  private readonly now: () => Date;

  constructor(
    sinks: LogSink[],
    minLevel: LogLevel = 'info',
    now: () => Date = () => new Date()
  ) {
    this.sinks = sinks;
    this.minLevel = minLevel;
    this.now = now;
  }

  debug(message: string): void {
    this.log('debug', message);
  }

  info(message: string): void {
    this.log('info', message);
  }

  warn(message: string): void {
    this.log('warn', message);
  }

  error(message: string): void {
    this.log('error', message);
  }

  private log(level: LogLevel, message: string): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) return;

    const line = `${this.now().toISOString()} - ${level.toUpperCase()} - ${message}`;
    for (const sink of this.sinks) {
      sink(line);
    }
  }
}

/**
 * Writes lines to stderr, leaving stdout free for anything piped.
 */
export function consoleSink(
  stream: NodeJS.WritableStream = process.stderr
): LogSink {
  return (line) => {
    stream.write(`${line}\n`);
  };
}

/**
 * Opens a log file for appending, creating it when needed. Resolves once the
 * file is open and rejects when it cannot be opened.
 *
 * A write error after that point stops further writes and is reported once
 * on stderr, so a failing log file never takes the run down with it.
 * @param filePath Path of the log file.
 * @returns The sink and a `close` that flushes it.
 */
export async function openFileSink(filePath: string): Promise<FileSink> {
  const stream = createWriteStream(filePath, { flags: 'a', encoding: 'utf8' });

  await new Promise<void>((resolve, reject) => {
    stream.once('open', () => resolve());
    stream.once('error', reject);
  });

  let failed = false;
  stream.on('error', (error) => {
    if (failed) return;
    failed = true;
    process.stderr.write(`Log file ${filePath} failed: ${error.message}\n`);
  });

  return {
    write: (line) => {
      if (failed) return;
      stream.write(`${line}\n`);
    },
    close: () =>
      new Promise((resolve) => {
        if (failed) {
          resolve();
          return;
        }
        stream.once('error', () => resolve());
        stream.end(() => resolve());
      }),
  };
}
