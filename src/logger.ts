import chalk from 'chalk';

export interface Logger {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  debug(message: string): void;
}

export interface LoggerOptions {
  scope?: string;
  verbose?: boolean;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const prefix = options.scope ? chalk.gray(`[${options.scope}] `) : '';
  return {
    info: message => console.log(`${prefix}${message}`),
    success: message => console.log(`${prefix}${chalk.green(message)}`),
    warn: message => console.warn(`${prefix}${chalk.yellow(message)}`),
    error: message => console.error(`${prefix}${chalk.red(message)}`),
    debug: message => {
      if (options.verbose) {
        console.log(`${prefix}${chalk.dim(message)}`);
      }
    }
  };
}

export const silentLogger: Logger = {
  info: () => undefined,
  success: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  debug: () => undefined
};
