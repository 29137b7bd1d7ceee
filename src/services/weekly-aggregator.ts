import { Release, ReleaseKind, WeeklyReleases } from '../types';
import { Calendar, parseDayPrecisionDate } from '../utils/calendar';
import { compareForDisplay } from '../utils/formatters';
import { LocalStore } from './database';

/**
 * Groups cached releases by release week. Read-only over the store.
 */
export class WeeklyAggregator {
  constructor(
    private readonly store: LocalStore,
    private readonly calendar: Calendar,
  ) {}

  async releasesForWeek(year: number, week: number, kinds?: readonly ReleaseKind[]): Promise<Release[]> {
    const target = this.calendar.releaseWeek(year, week);
    const releases = await this.allReleases(kinds);
    return releases.filter((release) => {
      const date = parseDayPrecisionDate(release.releaseDate);
      return date !== null && this.calendar.contains(target, date);
    });
  }

  /**
   * The week containing `anchorDate` and `previousWeeks` weeks before it, most recent first
   */
  async releasesForWeeks(
    anchorDate: Date,
    previousWeeks: number,
    kinds?: readonly ReleaseKind[],
  ): Promise<WeeklyReleases[]> {
    const weeks = this.calendar.weeksEndingAt(anchorDate, previousWeeks);
    const releases = await this.allReleases(kinds);
    return weeks.map((week) => ({
      week,
      releases: releases.filter((release) => {
        const date = parseDayPrecisionDate(release.releaseDate);
        return date !== null && this.calendar.contains(week, date);
      }),
    }));
  }

  /**
   * Every cached release once, in display order
   */
  private async allReleases(kinds?: readonly ReleaseKind[]): Promise<Release[]> {
    const byId = new Map<string, Release>();
    for (const [, releases] of await this.store.entries('releases')) {
      for (const release of releases) {
        if (kinds && !kinds.includes(release.kind)) {
          continue;
        }
        if (!byId.has(release.id)) {
          byId.set(release.id, release);
        }
      }
    }
    return [...byId.values()].sort(compareForDisplay);
  }
}
