import chalk from 'chalk';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  child(scope: string): Logger;
}

export interface ConsoleLoggerOptions {
  verbose?: boolean;
  scope?: string;
}

/**
 * Coloured console logger. Scoped children prefix every line with their scope
 * so interleaved output from the reconciler and the rollout stays readable.
 */
export class ConsoleLogger implements Logger {
  private readonly verbose: boolean;
  private readonly scope?: string;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.verbose = options.verbose ?? false;
    this.scope = options.scope;
  }

  debug(message: string): void {
    if (this.verbose) {
      console.log(chalk.gray(this.format(message)));
    }
  }

  info(message: string): void {
    console.log(chalk.blue(this.format(message)));
  }

  success(message: string): void {
    console.log(chalk.green(`✓ ${this.format(message)}`));
  }

  warn(message: string): void {
    console.log(chalk.yellow(`⚠ ${this.format(message)}`));
  }

  error(message: string): void {
    console.error(chalk.red(`✖ ${this.format(message)}`));
  }

  child(scope: string): Logger {
    return new ConsoleLogger({
      verbose: this.verbose,
      scope: this.scope ? `${this.scope}/${scope}` : scope
    });
  }

  private format(message: string): string {
    return this.scope ? `[${this.scope}] ${message}` : message;
  }
}

class SilentLogger implements Logger {
  debug(): void {}
  info(): void {}
  success(): void {}
  warn(): void {}
  error(): void {}
  child(): Logger {
    return this;
  }
}

export const silentLogger: Logger = new SilentLogger();

export function createLogger(verbose = process.env.PLATFORMCTL_VERBOSE === '1'): Logger {
  return new ConsoleLogger({ verbose });
}
