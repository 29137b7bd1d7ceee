import { Command } from 'commander';
import chalk from 'chalk';
import ora, { Ora } from 'ora';
import { AppError } from './error-handler';
import { Logger } from './logger';
import { ProgressCallback, ProgressInfo, formatProgress } from './progress';
import { RawOptions } from './validator';

/**
 * Takes spinner and parsed options, returns void or Promise<void>
 */
export type CommandHandler = (spinner: Ora, options: RawOptions) => Promise<void> | void;

export interface CommandOptions {
  name: string;
  description: string;
  options?: Array<[flags: string, description: string]>;
  handler: CommandHandler;
}

/**
 * Shared command builder:
 * - spinner initialization and management
 * - unified error handling with process.exit()
 * - consistent success/failure messaging
 */
export class CommandBuilder {
  /**
   * @example
   * const cmd = CommandBuilder.create({
   *   name: 'artists',
   *   description: 'Sync followed artists',
   *   options: [['-u, --update', 'Fetch from Spotify']],
   *   handler: async (spinner, options) => {
   *     spinner.text = 'Syncing...';
   *     const result = await tracker.syncArtists();
   *     spinner.succeed(`Synced ${result.written} artists`);
   *   }
   * });
   */
  static create(options: CommandOptions): Command {
    const { name, description, handler } = options;

    const command = new Command(name).description(description);
    for (const [flags, flagDescription] of options.options ?? []) {
      command.option(flags, flagDescription);
    }

    return command.action(async (cmdOptions: RawOptions) => {
      const spinner = this.createSpinner();

      try {
        await handler(spinner, cmdOptions);
        process.exit(0);
      } catch (error) {
        spinner.fail(this.formatError(this.describeError(error)));
        if (error instanceof Error) {
          Logger.error(`Command ${name} failed`, error);
        }
        process.exit(1);
      }
    });
  }

  static describeError(error: unknown): string {
    if (error instanceof AppError) {
      return error.getUserMessage();
    }
    return error instanceof Error ? error.message : String(error);
  }

  static createSpinner(): Ora {
    return ora().start();
  }

  /**
   * Progress callback that writes into the spinner text
   */
  static createProgressCallback(spinner: Ora): ProgressCallback {
    return (progress: ProgressInfo) => {
      let message = `${progress.stage}: ${formatProgress(progress)}`;

      if (progress.currentPage !== undefined) {
        message += ` (page ${progress.currentPage})`;
      }

      if (progress.message) {
        message += ` - ${progress.message}`;
      }

      spinner.text = message;
    };
  }

  static formatSuccess(message: string): string {
    return chalk.green(`✓ ${message}`);
  }

  static formatError(message: string): string {
    return chalk.red(`✗ ${message}`);
  }

  static formatWarning(message: string): string {
    return chalk.yellow(`⚠ ${message}`);
  }
}
