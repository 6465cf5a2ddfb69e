import fs from 'fs-extra';
import path from 'path';
import chalk from 'chalk';
import type { LogColor, LogEntry } from '../types/config.types.js';

const PALETTE: Record<LogColor, (text: string) => string> = {
  red: chalk.red,
  lime: chalk.greenBright,
  green: chalk.green,
  maroon: chalk.redBright,
  yellow: chalk.yellow,
  navy: chalk.blue,
  aqua: chalk.cyan,
  gray: chalk.gray,
};

export function colorize(message: string, color?: LogColor): string {
  return color ? PALETTE[color](message) : message;
}

export abstract class Logger {
  useColors = false;
  private entries: LogEntry[] = [];

  log(message: string, color?: LogColor): void {
    this.entries.push({
      timestamp: new Date().toISOString(),
      message,
      color,
    });
    this.write(message, color);
  }

  protected abstract write(message: string, color?: LogColor): void;

  getEntries(): LogEntry[] {
    return [...this.entries];
  }

  getMessages(): string[] {
    return this.entries.map((entry) => entry.message);
  }
}

export type LineWriter = (text: string) => void;

export class ConsoleLogger extends Logger {
  constructor(private readonly writer: LineWriter = (text) => process.stdout.write(text)) {
    super();
  }

  protected write(message: string, color?: LogColor): void {
    this.writer((this.useColors ? colorize(message, color) : message) + '\n');
  }
}

// Colors never reach the file
export class FileLogger extends Logger {
  constructor(private readonly file: string) {
    super();
    fs.ensureDirSync(path.dirname(file));
  }

  protected write(message: string): void {
    const timestamp = new Date().toISOString();
    const text = message
      .split('\n')
      .map((line) => `${timestamp} ${line}`)
      .join('\n');
    fs.appendFileSync(this.file, text + '\n', 'utf-8');
  }

  getFile(): string {
    return this.file;
  }
}

export function createLogger(logFile: string | null, useColors: boolean): Logger {
  const logger = logFile !== null ? new FileLogger(logFile) : new ConsoleLogger();
  logger.useColors = useColors;
  return logger;
}
