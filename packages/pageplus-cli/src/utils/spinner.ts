/**
 * Spinner Utilities for the PagePlus CLI
 *
 * Progress indicator for batch runs
 */

import ora from 'ora';
import type { Ora } from 'ora';
import chalk from 'chalk';

export interface ProgressController {
  update(message: string): void;
  succeed(message?: string): void;
  fail(message?: string): void;
  warn(message?: string): void;
  stop(): void;
}

export class SpinnerManager {
  private currentSpinner: Ora | null = null;
  private silent = false;

  /**
   * Suppress all spinner output (`--quiet`)
   */
  setSilent(silent: boolean): void {
    this.silent = silent;
  }

  /**
   * Create and start a spinner
   */
  start(message: string): ProgressController {
    this.stop();

    this.currentSpinner = ora({
      text: message,
      color: 'cyan',
      isSilent: this.silent,
    }).start();

    return this.createController(this.currentSpinner);
  }

  private createController(spinner: Ora): ProgressController {
    return {
      update: (message: string) => {
        spinner.text = message;
      },

      succeed: (message?: string) => {
        spinner.succeed(message ? chalk.green(message) : spinner.text);
        this.currentSpinner = null;
      },

      fail: (message?: string) => {
        spinner.fail(message ? chalk.red(message) : spinner.text);
        this.currentSpinner = null;
      },

      warn: (message?: string) => {
        spinner.warn(message ? chalk.yellow(message) : spinner.text);
        this.currentSpinner = null;
      },

      stop: () => {
        spinner.stop();
        this.currentSpinner = null;
      },
    };
  }

  /**
   * Stop current spinner if any
   */
  stop(): void {
    if (this.currentSpinner) {
      this.currentSpinner.stop();
      this.currentSpinner = null;
    }
  }
}

export const spinner = new SpinnerManager();
