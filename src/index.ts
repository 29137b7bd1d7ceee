#!/usr/bin/env node

import dotenv from 'dotenv';
import { program } from 'commander';
import chalk from 'chalk';
import { applyLogging, loadConfig } from './config';
import { AppContext, createContext } from './context';
import { createAuthCommand } from './commands/auth';
import { createArtistsCommand } from './commands/artists';
import { createReleasesCommand } from './commands/releases';
import { createInfoCommand } from './commands/info';
import { createPlaylistCommand } from './commands/playlist';
import { CommandBuilder } from './utils/command-builder';

dotenv.config();

function bootstrap(): AppContext {
  try {
    const config = loadConfig();
    applyLogging(config);
    return createContext(config);
  } catch (error) {
    console.error(chalk.red(CommandBuilder.describeError(error)));
    console.log(chalk.yellow('Create a .env file with your settings. See .env.example for reference.'));
    process.exit(1);
  }
}

const ctx = bootstrap();

program
  .name('release-week')
  .description('Track weekly releases of the artists you follow on Spotify')
  .version('1.0.0');

program.addCommand(createAuthCommand(ctx));
program.addCommand(createArtistsCommand(ctx));
program.addCommand(createReleasesCommand(ctx));
program.addCommand(createInfoCommand(ctx));
program.addCommand(createPlaylistCommand(ctx));

program.parse(process.argv);

// Commands call process.exit() themselves once their work is done
