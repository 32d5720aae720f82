import chalk from 'chalk';
import ora from 'ora';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggerOptions {
  verbose?: boolean;
  silent?: boolean;
}

export class Logger {
  private verbose: boolean;
  private silent: boolean;

  constructor(options: LoggerOptions = {}) {
    this.verbose = options.verbose ?? false;
    this.silent = options.silent ?? false;
  }

  static silent(): Logger {
    return new Logger({ silent: true });
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

  /**
   * Plain line with no level colouring
   */
  print(message: string): void {
    if (!this.silent) {
      console.log(message);
    }
  }

  spinner(text: string): ora.Ora {
    return ora({ text, isSilent: this.silent });
  }

  private log(level: LogLevel, message: string) {
    if (this.silent || (level === 'debug' && !this.verbose)) {
      return;
    }

    switch (level) {
      case 'debug':
        console.log(chalk.gray(message));
        break;
      case 'info':
        console.log(chalk.cyan(message));
        break;
      case 'warn':
        console.log(chalk.yellow(message));
        break;
      case 'error':
        console.error(chalk.red(message));
        break;
    }
  }
}
