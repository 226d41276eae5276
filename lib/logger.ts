import fs from 'node:fs';
import path from 'node:path';

export interface CrawlLogger {
  info(line: string): void;
  warn(line: string): void;
  error(line: string): void;
  close(): Promise<void>;
}

export interface CrawlLoggerOptions {
  echo?: boolean;
}

/** Writes every line to the console and appends it to the log file. */
export function createCrawlLogger(logPath: string | null, { echo = true }: CrawlLoggerOptions = {}): CrawlLogger {
  let stream: fs.WriteStream | null = null;
  let failure: Error | null = null;
  if (logPath) {
    fs.mkdirSync(path.dirname(logPath), { recursive: true });
    stream = fs.createWriteStream(logPath, { flags: 'a', encoding: 'utf-8' });
    stream.on('error', (error) => {
      failure ??= error;
    });
  }

  const write = (line: string, print: (message: string) => void) => {
    if (echo) print(line);
    if (!failure) stream?.write(`${line}\n`);
  };

  return {
    info: (line) => write(line, console.log),
    warn: (line) => write(line, console.warn),
    error: (line) => write(line, console.error),
    close: () =>
      new Promise<void>((resolve, reject) => {
        if (!stream) {
          resolve();
          return;
        }
        if (failure) {
          stream.destroy();
          reject(failure);
          return;
        }
        stream.once('close', () => (failure ? reject(failure) : resolve()));
        stream.end();
      })
  };
}

export const silentLogger: CrawlLogger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  close: async () => {}
};
