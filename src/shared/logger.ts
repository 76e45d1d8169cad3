import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(text: string): void;
  info(text: string): void;
  success(text: string): void;
  warning(text: string): void;
  error(text: string): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export function createConsoleLogger(level: LogLevel = 'info'): Logger {
  const enabled = (at: LogLevel) => LEVEL_ORDER[at] >= LEVEL_ORDER[level];

  return {
    debug: (text) => { if (enabled('debug')) console.log(chalk.gray(text)); },
    info: (text) => { if (enabled('info')) console.log(chalk.blue(text)); },
    success: (text) => { if (enabled('info')) console.log(chalk.green(text)); },
    warning: (text) => { if (enabled('warn')) console.warn(chalk.yellow(text)); },
    error: (text) => { if (enabled('error')) console.error(chalk.red(text)); },
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  success: () => {},
  warning: () => {},
  error: () => {},
};
