/**
 * Console logger with chalk colouring
 */

import chalk from 'chalk';

export interface Logger {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  debug(message: string): void;
  dim(message: string): void;
}

export class ConsoleLogger implements Logger {
  private verbose: boolean;

  constructor(verbose = process.env.ISSUE_DESK_DEBUG === '1') {
    this.verbose = verbose;
  }

  setVerbose(verbose: boolean): void {
    this.verbose = verbose;
  }

  info(message: string): void {
    console.log(chalk.blue('ℹ ') + message);
  }

  success(message: string): void {
    console.log(chalk.green(`✓ ${message}`));
  }

  warn(message: string): void {
    console.warn(chalk.yellow(`⚠ ${message}`));
  }

  error(message: string): void {
    console.error(chalk.red(`✗ ${message}`));
  }

  debug(message: string): void {
    if (this.verbose) {
      console.log(chalk.gray(`[debug] ${message}`));
    }
  }

  dim(message: string): void {
    console.log(chalk.gray(message));
  }
}

export const logger = new ConsoleLogger();
