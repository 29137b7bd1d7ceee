import chalk from 'chalk';
import { AppContext } from '../context';
import { WeeklyReleases } from '../types';
import { CommandBuilder } from '../utils/command-builder';
import { formatReleaseLine, formatWeekHeader } from '../utils/formatters';
import { formatReleaseKinds } from '../utils/release-kinds';
import { Validator } from '../utils/validator';

export function renderWeeklyReleases(weeks: WeeklyReleases[]): string[] {
  const lines: string[] = [];
  for (const { week, releases } of weeks) {
    lines.push(formatWeekHeader(week));
    if (releases.length === 0) {
      lines.push('  no releases');
    }
    for (const release of releases) {
      lines.push(`  ${formatReleaseLine(release)}`);
    }
  }
  return lines;
}

export function createReleasesCommand(ctx: AppContext) {
  return CommandBuilder.create({
    name: 'releases',
    description: 'Sync releases of cached artists or show releases per week',
    options: [
      ['-u, --update', 'Fetch releases of every cached artist from Spotify'],
      ['-f, --force', 'Discard saved progress and refetch every artist'],
      ['-t, --type <kinds>', 'Release types: album, single, appears_on, compilation or all (comma separated)'],
      ['-d, --date <date>', 'Show the week containing this date (YYYY-MM-DD)'],
      ['-p, --previous-weeks <n>', 'Also show the n weeks before'],
    ],
    handler: async (spinner, rawOptions) => {
      const options = Validator.validateReleasesOptions(rawOptions);
      const tracker = ctx.tracker(CommandBuilder.createProgressCallback(spinner));

      if (options.update) {
        spinner.text = `Syncing ${formatReleaseKinds(options.kinds)} releases...`;
        const result = await tracker.syncReleases(options.kinds, options.force);
        const resumed = result.resumed ? ' (resumed)' : '';
        spinner.succeed(
          CommandBuilder.formatSuccess(
            `Checked ${result.processed} artists, fetched ${result.written} releases${resumed}`,
          ),
        );
        if (result.skipped > 0) {
          console.log(chalk.gray(`   ${result.skipped} releases skipped (no exact release day or other type)`));
        }
        return;
      }

      const weeks = await tracker.releasesForDisplay(options.date, options.previousWeeks, options.kinds);
      spinner.stop();
      renderWeeklyReleases(weeks).forEach((line) => console.log(line.startsWith('Week') ? chalk.bold(line) : line));
    },
  });
}
