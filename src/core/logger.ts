import chalk from 'chalk';

/**
 * Console logger for long scans.
 *
 * Every line is prefixed with the elapsed run time so interleaved output from
 * concurrent company workers can still be followed.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  verbose?: boolean;
  startedAt?: number;
  /** Defaults to console.log for debug/info and console.error for warn/error. */
  write?: (level: LogLevel, line: string) => void;
  now?: () => number;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const now = options.now ?? Date.now;
  const startedAt = options.startedAt ?? now();
  const write = options.write ?? writeToConsole;

  const emit = (level: LogLevel, message: string) => {
    const stamp = chalk.dim(`[${formatElapsed(now() - startedAt)}]`);
    write(level, `${stamp} ${colorize(level, message)}`);
  };

  return {
    debug: message => {
      if (options.verbose) emit('debug', message);
    },
    info: message => emit('info', message),
    warn: message => emit('warn', message),
    error: message => emit('error', message),
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

/** HH:MM:SS; hours keep growing past 99 */
export function formatElapsed(ms: number): string {
  const totalSeconds = Math.max(0, Math.floor(ms / 1000));
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  return [hours, minutes, seconds].map(n => String(n).padStart(2, '0')).join(':');
}

function colorize(level: LogLevel, message: string): string {
  switch (level) {
    case 'debug':
      return chalk.dim(message);
    case 'warn':
      return chalk.yellow(message);
    case 'error':
      return chalk.red(`ERROR: ${message}`);
    default:
      return message;
  }
}

function writeToConsole(level: LogLevel, line: string): void {
  if (level === 'warn' || level === 'error') {
    console.error(line);
  } else {
    console.log(line);
  }
}
