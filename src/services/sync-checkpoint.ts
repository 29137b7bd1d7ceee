import { UpdateState } from '../types';
import { AppError, ErrorType } from '../utils/error-handler';
import { Logger } from '../utils/logger';
import { LocalStore } from './database';

export type UpdateOutcome = 'completed' | 'failed';

/**
 * Progress recorded after a page or chunk has been written to the store
 */
export interface CheckpointProgress {
  cursor?: string | null;
  processedIds?: string[];
  totalCount?: number | null;
}

export interface CheckpointStats {
  kind: string;
  status: UpdateState['status'];
  processed: number;
  total: number | null;
  cursor: string | null;
  startedAt: string;
  updatedAt: string;
  lastError?: string;
}

/**
 * Persisted progress of bulk updates, one record per operation kind.
 *
 * absent -> in_progress -> completed (record deleted) | failed (record kept).
 * A later run without force resumes a failed or interrupted record; force
 * discards it.
 */
export class SyncCheckpointService {
  constructor(
    private readonly store: LocalStore,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  async beginOrResume(kind: string, force: boolean = false): Promise<UpdateState> {
    const now = this.clock().toISOString();
    const existing = await this.store.get('state', kind);

    if (existing && !force) {
      const resumed: UpdateState = {
        kind,
        cursor: existing.cursor,
        processedIds: existing.processedIds,
        totalCount: existing.totalCount,
        startedAt: existing.startedAt,
        updatedAt: now,
        status: 'in_progress',
      };
      await this.store.put('state', kind, resumed);
      Logger.info(`Resuming ${kind} update`, {
        previousStatus: existing.status,
        processed: existing.processedIds.length,
        cursor: existing.cursor,
      });
      return resumed;
    }

    if (existing) {
      Logger.info(`Discarding ${kind} checkpoint`, { processed: existing.processedIds.length });
    }

    const fresh: UpdateState = {
      kind,
      cursor: null,
      processedIds: [],
      totalCount: null,
      startedAt: now,
      updatedAt: now,
      status: 'in_progress',
    };
    await this.store.put('state', kind, fresh);
    return fresh;
  }

  /**
   * Record progress. Only call this once the covered data is durably stored.
   */
  async checkpoint(kind: string, progress: CheckpointProgress): Promise<UpdateState> {
    const state = await this.require(kind);
    const processed = new Set(state.processedIds);
    const added = (progress.processedIds ?? []).filter((id) => !processed.has(id));

    const next: UpdateState = {
      ...state,
      cursor: progress.cursor !== undefined ? progress.cursor : state.cursor,
      processedIds: [...state.processedIds, ...added],
      totalCount: progress.totalCount !== undefined ? progress.totalCount : state.totalCount,
      updatedAt: this.clock().toISOString(),
    };
    await this.store.put('state', kind, next);
    Logger.debug(`Checkpoint ${kind}`, { processed: next.processedIds.length, cursor: next.cursor });
    return next;
  }

  async finish(kind: string, outcome: UpdateOutcome, error?: Error): Promise<void> {
    if (outcome === 'completed') {
      await this.store.delete('state', kind);
      Logger.info(`Update ${kind} completed`);
      return;
    }

    const state = await this.require(kind);
    const failed: UpdateState = {
      ...state,
      status: 'failed',
      updatedAt: this.clock().toISOString(),
    };
    if (error) {
      failed.lastError = error.message;
    }
    await this.store.put('state', kind, failed);
    Logger.warn(`Update ${kind} failed, progress kept for resume`, {
      processed: failed.processedIds.length,
      error: error?.message,
    });
  }

  inspect(kind: string): Promise<UpdateState | null> {
    return this.store.get('state', kind);
  }

  async list(): Promise<UpdateState[]> {
    const entries = await this.store.entries('state');
    return entries.map(([, state]) => state);
  }

  stats(state: UpdateState): CheckpointStats {
    return {
      kind: state.kind,
      status: state.status,
      processed: state.processedIds.length,
      total: state.totalCount,
      cursor: state.cursor,
      startedAt: state.startedAt,
      updatedAt: state.updatedAt,
      lastError: state.lastError,
    };
  }

  private async require(kind: string): Promise<UpdateState> {
    const state = await this.store.get('state', kind);
    if (!state) {
      throw new AppError(ErrorType.PersistenceError, `No update state recorded for ${kind}`, undefined, undefined, {
        operation: 'checkpoint',
        resource: kind,
      });
    }
    return state;
  }
}
