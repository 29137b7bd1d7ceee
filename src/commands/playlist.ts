import chalk from 'chalk';
import { AppContext } from '../context';
import { PlaylistOutcome } from '../services/playlist';
import { CommandBuilder } from '../utils/command-builder';
import { Validator } from '../utils/validator';

export function renderPlaylistOutcomes(outcomes: PlaylistOutcome[]): string[] {
  return outcomes.map((outcome) => {
    switch (outcome.status) {
      case 'created':
        return `Created ${outcome.name} with ${outcome.trackCount} tracks`;
      case 'exists':
        return `Playlist ${outcome.name} already exists`;
      case 'empty':
        return `No ${outcome.kind} releases in week ${outcome.week.week}/${outcome.week.year}, skipped ${outcome.name}`;
    }
  });
}

export function createPlaylistCommand(ctx: AppContext) {
  return CommandBuilder.create({
    name: 'playlist',
    description: 'Create "Weekly Picks" playlists from cached releases',
    options: [
      ['-t, --type <kinds>', 'Release types: album, single, appears_on, compilation or all (comma separated)'],
      ['-d, --date <date>', 'Use the week containing this date (YYYY-MM-DD)'],
      ['-p, --previous-weeks <n>', 'Also create playlists for the n weeks before'],
    ],
    handler: async (spinner, rawOptions) => {
      const options = Validator.validatePlaylistOptions(rawOptions);
      const service = ctx.playlists(CommandBuilder.createProgressCallback(spinner));

      spinner.text = 'Checking existing playlists...';
      const outcomes = await service.createWeeklyPlaylists(options.date ?? new Date(), options.previousWeeks, options.kinds);
      const created = outcomes.filter((outcome) => outcome.status === 'created').length;

      spinner.succeed(CommandBuilder.formatSuccess(`Created ${created} playlists`));
      renderPlaylistOutcomes(outcomes).forEach((line) =>
        console.log(line.startsWith('Created') ? chalk.green(line) : chalk.gray(line)),
      );
    },
  });
}
