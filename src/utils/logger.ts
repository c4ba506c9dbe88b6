import chalk from 'chalk';
import { LOG_PREFIX } from '../constants.js';

/**
 * Same shape as Probot's `app.log`
 */
export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/**
 * The part of an ora spinner the logger needs
 */
export interface ActiveSpinner {
  readonly isSpinning: boolean;
  clear(): unknown;
  render(): unknown;
}

export interface ConsoleLoggerOptions {
  verbose?: boolean;
  /** Cleared before each line and redrawn after it while spinning */
  spinner?: ActiveSpinner;
}

/**
 * Console logger with chalk-coloured levels
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const verbose = options.verbose || false;
  const { spinner } = options;

  const write = (emit: () => void) => {
    if (!spinner?.isSpinning) {
      emit();
      return;
    }
    spinner.clear();
    emit();
    spinner.render();
  };

  return {
    debug(message) {
      if (verbose) {
        write(() => console.log(chalk.gray(`${LOG_PREFIX} ${message}`)));
      }
    },
    info(message) {
      write(() => console.log(`${chalk.cyan(LOG_PREFIX)} ${message}`));
    },
    warn(message) {
      write(() => console.warn(chalk.yellow(`${LOG_PREFIX} ⚠️  ${message}`)));
    },
    error(message) {
      write(() => console.error(chalk.red(`${LOG_PREFIX} ${message}`)));
    },
  };
}
