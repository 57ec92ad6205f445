import { appendFileSync } from 'node:fs';
import chalk from 'chalk';
import { errorMessage } from '../errors.js';

export interface Logger {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  debug(message: string): void;
  dim(message: string): void;
}

export interface LoggerOptions {
  /** Append every line to this file as well. */
  file?: string;
  /** Only warnings and errors reach the console. */
  quiet?: boolean;
  verbose?: boolean;
}

type Level = 'INFO' | 'WARNING' | 'ERROR' | 'DEBUG';

export function createLogger(options: LoggerOptions = {}): Logger {
  let logFile = options.file;

  const write = (level: Level, message: string, colored: string, toConsole: boolean) => {
    const timestamp = new Date().toISOString();
    if (logFile) {
      try {
        appendFileSync(logFile, `${timestamp} - ${level} - ${message}\n`, 'utf-8');
      } catch (err) {
        console.error(chalk.red(`Cannot write log file ${logFile}: ${errorMessage(err)}. Logging to console only.`));
        logFile = undefined;
      }
    }
    if (!toConsole) return;
    const line = `${chalk.gray(timestamp)} ${colored}`;
    if (level === 'ERROR' || level === 'WARNING') {
      console.error(line);
    } else {
      console.log(line);
    }
  };

  const loud = !options.quiet;
  return {
    info: (message) => write('INFO', message, chalk.green(message), loud),
    success: (message) => write('INFO', message, chalk.bold.green(message), loud),
    warn: (message) => write('WARNING', message, chalk.yellow(message), true),
    error: (message) => write('ERROR', message, chalk.red(message), true),
    debug: (message) => write('DEBUG', message, chalk.cyan(message), loud && Boolean(options.verbose)),
    dim: (message) => write('INFO', message, chalk.dim(message), loud),
  };
}
