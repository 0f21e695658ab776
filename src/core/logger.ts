import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'success' | 'warn' | 'error' | 'critical';

/** Receives every formatted line; swap it out to capture output */
export type LogSink = (level: LogLevel, line: string) => void;

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Conditions that may leave the project tree in a broken state */
  critical(message: string): void;
}

export interface LoggerOptions {
  verbose?: boolean;
  sink?: LogSink;
}

const consoleSink: LogSink = (level, line) => {
  if (level === 'error' || level === 'critical') {
    console.error(line);
  } else {
    console.log(line);
  }
};

function format(level: LogLevel, message: string): string {
  switch (level) {
    case 'debug':
      return chalk.gray(`  ${message}`);
    case 'info':
      return chalk.white(message);
    case 'success':
      return chalk.green(`✓ ${message}`);
    case 'warn':
      return chalk.yellow(`⚠ ${message}`);
    case 'error':
      return chalk.red(`✗ ${message}`);
    case 'critical':
      return chalk.bgRed.white.bold(` CRITICAL `) + ' ' + chalk.red.bold(message);
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const sink = options.sink ?? consoleSink;
  const emit = (level: LogLevel, message: string): void => {
    if (level === 'debug' && !options.verbose) return;
    sink(level, format(level, message));
  };

  return {
    debug: (message) => emit('debug', message),
    info: (message) => emit('info', message),
    success: (message) => emit('success', message),
    warn: (message) => emit('warn', message),
    error: (message) => emit('error', message),
    critical: (message) => emit('critical', message),
  };
}

/**
 * Logger that keeps plain (uncolored) entries in memory
 */
export function createMemoryLogger(verbose = true): Logger & { entries: Array<{ level: LogLevel; message: string }> } {
  const entries: Array<{ level: LogLevel; message: string }> = [];
  const push = (level: LogLevel) => (message: string): void => {
    if (level === 'debug' && !verbose) return;
    entries.push({ level, message });
  };

  return {
    entries,
    debug: push('debug'),
    info: push('info'),
    success: push('success'),
    warn: push('warn'),
    error: push('error'),
    critical: push('critical'),
  };
}
