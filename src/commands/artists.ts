import chalk from 'chalk';
import { AppContext } from '../context';
import { Artist } from '../types';
import { CommandBuilder } from '../utils/command-builder';
import { filterArtists, formatArtistLine } from '../utils/formatters';
import { Validator } from '../utils/validator';

export function renderArtistList(artists: Artist[], search?: string): string[] {
  const shown = filterArtists(artists, search);
  if (shown.length === 0) {
    return [search ? `No cached artists match "${search}".` : 'No artists cached. Run with --update first.'];
  }
  return [...shown.map(formatArtistLine), '', `${shown.length} of ${artists.length} artists`];
}

export function createArtistsCommand(ctx: AppContext) {
  return CommandBuilder.create({
    name: 'artists',
    description: 'Sync followed artists from Spotify or list the cached ones',
    options: [
      ['-u, --update', 'Fetch followed artists from Spotify'],
      ['-f, --force', 'Discard saved progress and start the update from scratch'],
      ['-s, --search <term>', 'Only list artists whose name contains <term>'],
    ],
    handler: async (spinner, rawOptions) => {
      const options = Validator.validateArtistsOptions(rawOptions);

      if (options.update) {
        spinner.text = 'Syncing followed artists...';
        const result = await ctx.tracker(CommandBuilder.createProgressCallback(spinner)).syncArtists(options.force);
        const removed = result.removed > 0 ? `, removed ${result.removed} unfollowed` : '';
        const resumed = result.resumed ? ' (resumed)' : '';
        spinner.succeed(CommandBuilder.formatSuccess(`Synced ${result.written} artists${removed}${resumed}`));
        return;
      }

      const artists = (await ctx.store.entries('artists')).map(([, artist]) => artist);
      spinner.stop();
      console.log(chalk.bold('Followed artists'));
      renderArtistList(artists, options.search).forEach((line) => console.log(line));
    },
  });
}
