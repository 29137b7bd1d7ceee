import chalk from 'chalk';
import { AppContext } from '../context';
import { ReleaseWeek, UpdateState } from '../types';
import { formatDate } from '../utils/calendar';
import { CommandBuilder } from '../utils/command-builder';
import { formatUpdateState } from '../utils/formatters';
import { Logger } from '../utils/logger';
import { Validator } from '../utils/validator';

export function renderWeekInfo(weeks: ReleaseWeek[]): string[] {
  return weeks.map((week) => `Release week ${week.week}/${week.year}: ${formatDate(week.start)} - ${formatDate(week.end)}`);
}

export function renderArtistCounts(cached: number, remote: number | null): string[] {
  const lines = [`Artist count cache: ${cached}`];
  if (remote === null) {
    lines.push('Artist count remote: unavailable');
    return lines;
  }
  lines.push(`Artist count remote: ${remote}`);
  if (cached < remote) {
    lines.push(`Artist cache is outdated by ${remote - cached}.`);
  }
  return lines;
}

export function renderStates(states: UpdateState[]): string[] {
  if (states.length === 0) {
    return ['No unfinished updates.'];
  }
  return states.map(formatUpdateState);
}

export function createInfoCommand(ctx: AppContext) {
  return CommandBuilder.create({
    name: 'info',
    description: 'Show release week dates, artist cache status and unfinished updates',
    options: [
      ['-w, --release-week', 'Show release week dates'],
      ['-a, --artists', 'Compare cached and followed artist counts'],
      ['-s, --state', 'Show unfinished or failed updates'],
      ['-d, --date <date>', 'Use the week containing this date (YYYY-MM-DD)'],
      ['-p, --previous-weeks <n>', 'Also show the n weeks before'],
    ],
    handler: async (spinner, rawOptions) => {
      const options = Validator.validateInfoOptions(rawOptions);
      const lines: string[] = [];

      if (options.releaseWeek) {
        lines.push(...renderWeekInfo(ctx.tracker().weekInfo(options.date, options.previousWeeks)));
      }

      if (options.artists) {
        spinner.text = 'Counting followed artists...';
        const cached = await ctx.store.count('artists');
        let remote: number | null = null;
        try {
          remote = await ctx.fetcher.request('count followed artists', (token) => ctx.api.followedArtistTotal(token));
        } catch (error) {
          Logger.warn(`Remote artist count unavailable: ${CommandBuilder.describeError(error)}`);
        }
        lines.push(...renderArtistCounts(cached, remote));
      }

      if (options.state) {
        lines.push(...renderStates(await ctx.checkpoints.list()));
      }

      spinner.stop();
      lines.forEach((line) => console.log(line.includes('outdated') ? chalk.yellow(line) : line));
    },
  });
}
