import { log } from '../log';
import { recordSweep } from '../metrics';
import type { AudioArtifactStore } from '../storage/audioStore';

export interface Scheduler {
  /** Runs `task` every `intervalMs` until the returned cancel function is called. */
  every(intervalMs: number, task: () => void): () => void;
}

export const timerScheduler: Scheduler = {
  every(intervalMs, task) {
    const timer = setInterval(task, intervalMs);
    timer.unref?.();
    return () => clearInterval(timer);
  },
};

export type SweepStatus = 'completed' | 'disabled' | 'store_unavailable';

export interface SweepFailure {
  id: string;
  error: string;
}

export interface SweepReport {
  status: SweepStatus;
  startedAt: number;
  durationMs: number;
  scanned: number;
  skippedProtected: number;
  deleted: string[];
  failed: SweepFailure[];
}

export interface JanitorSchedule {
  intervalSeconds: number;
  /** 0 keeps the janitor ticking without deleting anything. */
  ttlSeconds: number;
}

export interface CacheJanitorOptions {
  scheduler?: Scheduler;
  now?: () => number;
  onSweep?: (report: SweepReport) => void;
}

export type JanitorStore = Pick<AudioArtifactStore, 'listAll' | 'delete'>;

/**
 * Periodically deletes artifacts older than the TTL. Sweeps are driven only by
 * the schedule and never overlap; a tick that lands mid-sweep is dropped.
 */
export class CacheJanitor {
  private readonly scheduler: Scheduler;
  private readonly now: () => number;
  private readonly onSweep?: (report: SweepReport) => void;
  private cancelSchedule: (() => void) | null = null;
  private inFlight: Promise<void> | null = null;
  private ttlMs = 0;
  private latest: SweepReport | null = null;

  constructor(
    private readonly store: JanitorStore,
    options: CacheJanitorOptions = {},
  ) {
    this.scheduler = options.scheduler ?? timerScheduler;
    this.now = options.now ?? Date.now;
    this.onSweep = options.onSweep;
  }

  get running(): boolean {
    return this.cancelSchedule !== null;
  }

  get sweeping(): boolean {
    return this.inFlight !== null;
  }

  get lastReport(): SweepReport | null {
    return this.latest;
  }

  start(schedule: JanitorSchedule): void {
    const { intervalSeconds, ttlSeconds } = schedule;
    if (!Number.isInteger(intervalSeconds) || intervalSeconds <= 0) {
      throw new RangeError(`sweep interval must be a positive integer, got ${intervalSeconds}`);
    }
    if (!Number.isInteger(ttlSeconds) || ttlSeconds < 0) {
      throw new RangeError(`ttl must be a non-negative integer, got ${ttlSeconds}`);
    }
    if (this.cancelSchedule) {
      throw new Error('cache janitor already started');
    }

    this.ttlMs = ttlSeconds * 1000;
    this.cancelSchedule = this.scheduler.every(intervalSeconds * 1000, () => this.tick());

    if (ttlSeconds === 0) {
      log.info({ event: 'janitor_started', interval_s: intervalSeconds }, 'audio cleanup disabled (ttl = 0)');
    } else {
      log.info(
        { event: 'janitor_started', interval_s: intervalSeconds, ttl_s: ttlSeconds },
        'audio cleanup janitor started',
      );
    }
  }

  /** Cancels the schedule and waits for an in-flight sweep to finish. */
  async stop(): Promise<void> {
    if (this.cancelSchedule) {
      this.cancelSchedule();
      this.cancelSchedule = null;
      log.info({ event: 'janitor_stopped' }, 'audio cleanup janitor stopped');
    }
    await this.idle();
  }

  /** Resolves once no sweep is running. Does not start one. */
  async idle(): Promise<void> {
    while (this.inFlight) {
      await this.inFlight;
    }
  }

  private tick(): void {
    if (this.inFlight) {
      log.debug({ event: 'janitor_tick_skipped' }, 'previous sweep still running');
      return;
    }

    this.inFlight = this.sweep()
      .then((report) => {
        this.latest = report;
        this.onSweep?.(report);
      })
      .catch((error: unknown) => {
        log.error({ err: error, event: 'janitor_sweep_error' }, 'audio cleanup sweep failed');
      })
      .finally(() => {
        this.inFlight = null;
      });
  }

  private async sweep(): Promise<SweepReport> {
    const startedAt = this.now();
    const report: SweepReport = {
      status: 'completed',
      startedAt,
      durationMs: 0,
      scanned: 0,
      skippedProtected: 0,
      deleted: [],
      failed: [],
    };

    if (this.ttlMs === 0) {
      report.status = 'disabled';
      return this.finish(report);
    }

    try {
      for await (const entry of this.store.listAll()) {
        report.scanned += 1;
        if (entry.protected) {
          report.skippedProtected += 1;
          continue;
        }

        // Ages are measured against the sweep start, so anything created after it is never expired.
        const ageMs = startedAt - entry.createdAt;
        if (ageMs <= this.ttlMs) {
          continue;
        }

        try {
          if (await this.store.delete(entry.id)) {
            report.deleted.push(entry.id);
            log.info(
              { event: 'artifact_evicted', id: entry.id, age_s: Math.round(ageMs / 1000) },
              'deleted expired audio artifact',
            );
          }
        } catch (error) {
          report.failed.push({ id: entry.id, error: error instanceof Error ? error.message : String(error) });
          log.warn({ err: error, event: 'artifact_evict_failed', id: entry.id }, 'failed to delete audio artifact');
        }
      }
    } catch (error) {
      report.status = 'store_unavailable';
      log.error(
        { err: error, event: 'janitor_store_unavailable' },
        'audio store unreadable, retrying on next sweep',
      );
    }

    return this.finish(report);
  }

  private finish(report: SweepReport): SweepReport {
    report.durationMs = Math.max(0, this.now() - report.startedAt);
    recordSweep(report.status, report.durationMs, report.deleted.length, report.failed.length);

    if (report.deleted.length > 0) {
      log.info(
        { event: 'janitor_sweep', deleted: report.deleted.length, ids: report.deleted },
        `cleaned up ${report.deleted.length} expired audio file(s)`,
      );
    }
    return report;
  }
}
