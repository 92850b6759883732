import path from 'node:path';
import fs from 'fs-extra';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogCategory = 'pipeline' | 'download' | 'upload' | 'preflight' | 'auth' | 'cli';

export interface LogEntry {
  readonly timestamp: string;
  readonly level: LogLevel;
  readonly category: LogCategory;
  readonly message: string;
}

const LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

export const formatEntry = (entry: LogEntry): string =>
  `[${entry.timestamp}] ${entry.level.toUpperCase()} [${entry.category}] ${entry.message}`;

export class Logger {
  private level: LogLevel = 'info';
  private filePath: string | null = null;
  private fileFailureReported = false;
  private pendingWrite: Promise<void> = Promise.resolve();

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.level);
  }

  private log(level: LogLevel, category: LogCategory, message: string): void {
    if (!this.shouldLog(level)) return;

    const line = formatEntry({ timestamp: new Date().toISOString(), level, category, message });

    switch (level) {
      case 'debug':
        console.debug(line);
        break;
      case 'info':
        console.info(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      case 'error':
        console.error(line);
        break;
    }

    if (this.filePath) {
      this.appendToFile(this.filePath, line);
    }
  }

  private appendToFile(filePath: string, line: string): void {
    // Appends are chained so lines keep their order in the file.
    this.pendingWrite = this.pendingWrite
      .then(async () => {
        await fs.ensureDir(path.dirname(filePath));
        await fs.appendFile(filePath, `${line}\n`);
      })
      .catch((error: unknown) => {
        if (this.fileFailureReported) return;
        this.fileFailureReported = true;
        const reason = error instanceof Error ? error.message : String(error);
        process.stderr.write(`Log file ${filePath} is not writable: ${reason}\n`);
      });
  }

  debug(category: LogCategory, message: string): void {
    this.log('debug', category, message);
  }

  info(category: LogCategory, message: string): void {
    this.log('info', category, message);
  }

  warn(category: LogCategory, message: string): void {
    this.log('warn', category, message);
  }

  error(category: LogCategory, message: string): void {
    this.log('error', category, message);
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  /**
   * Mirrors every emitted line into the given file; `null` turns file output off.
   */
  setFile(filePath: string | null): void {
    this.filePath = filePath;
    this.fileFailureReported = false;
  }

  /** Resolves once queued file writes have landed. */
  flush(): Promise<void> {
    return this.pendingWrite;
  }
}

export const logger = new Logger();
