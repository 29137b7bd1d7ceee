import { ReleaseKind, ReleaseWeek, WeeklyReleases } from '../types';
import { Calendar } from '../utils/calendar';
import { DEFAULT_RELEASE_KINDS } from '../utils/release-kinds';
import { SyncEngine, SyncResult } from './sync-engine';
import { WeeklyAggregator } from './weekly-aggregator';

/**
 * Entry points the CLI commands call
 */
export class ReleaseTracker {
  constructor(
    private readonly engine: SyncEngine,
    private readonly aggregator: WeeklyAggregator,
    private readonly calendar: Calendar,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  syncArtists(force: boolean = false): Promise<SyncResult> {
    return this.engine.syncArtists({ force });
  }

  syncReleases(kinds: readonly ReleaseKind[] = DEFAULT_RELEASE_KINDS, force: boolean = false): Promise<SyncResult> {
    return this.engine.syncReleases({ kinds, force });
  }

  weekInfo(date: Date | undefined, previousWeeks: number = 0): ReleaseWeek[] {
    return this.calendar.weeksEndingAt(date ?? this.clock(), previousWeeks);
  }

  releasesForDisplay(
    date: Date | undefined,
    previousWeeks: number = 0,
    kinds: readonly ReleaseKind[] = DEFAULT_RELEASE_KINDS,
  ): Promise<WeeklyReleases[]> {
    return this.aggregator.releasesForWeeks(date ?? this.clock(), previousWeeks, kinds);
  }
}
