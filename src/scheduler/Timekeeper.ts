/**
 * Timekeeper - persistent, time-ordered job scheduling.
 *
 * Pending jobs live in `jobs.json` keyed by job id; finished ones in
 * `archive.json`. Each tick reads the pending set, picks the due jobs that
 * are not already running and hands each to the dispatcher without awaiting
 * it, so one slow instrument never holds up the next tick.
 *
 * A job's archive entry is written before the job leaves the pending set.
 * Pending jobs that turn out to be archived already are dropped, never
 * re-run.
 */

import { randomUUID } from 'node:crypto';
import { InvalidScheduleTimeError, ParameterMismatchError, errorMessage } from '../core/errors.js';
import { createLogger } from '../logging/logger.js';
import type { StateStore } from '../store/StateStore.js';
import type { TaskRegistry } from '../tasks/TaskRegistry.js';
import { validateParameters } from '../tasks/TaskValidator.js';
import type { TaskArgs } from '../tasks/types.js';
import type { Dispatcher } from './Dispatcher.js';
import {
  ArchiveEntrySchema,
  JobSchema,
  type ArchiveEntry,
  type Job,
  type JobSummary,
  type SchedulerCallback,
  type SchedulerEvent,
} from './types.js';

const log = createLogger('timekeeper');

export interface TimekeeperOptions {
  jobsStore: StateStore;
  archiveStore: StateStore;
  registry: TaskRegistry;
  dispatcher: Dispatcher;
  tickIntervalMs?: number;
  now?: () => Date;
}

export interface TimekeeperStatus {
  running: boolean;
  tickIntervalMs: number;
  inFlight: string[];
  lastTickAt?: string;
  errorStreak: number;
  lastError?: string;
}

export interface RestoreSummary {
  pending: number;
  overdue: number;
  /** Pending jobs dropped because they were archived already */
  dropped: string[];
}

function toInstant(value: Date | string): Date {
  const instant = typeof value === 'string' ? new Date(value) : value;
  if (Number.isNaN(instant.getTime())) {
    throw new InvalidScheduleTimeError(typeof value === 'string' ? value : String(value));
  }
  return instant;
}

function compareJobs(a: Job, b: Job): number {
  return Date.parse(a.scheduleTime) - Date.parse(b.scheduleTime) || a.seq - b.seq;
}

export class Timekeeper {
  private readonly jobsStore: StateStore;
  private readonly archiveStore: StateStore;
  private readonly registry: TaskRegistry;
  private readonly dispatcher: Dispatcher;
  private readonly now: () => Date;
  private readonly inFlight = new Map<string, Promise<void>>();
  /** Runs whose archive entry is not written yet; retried without re-running */
  private readonly settled = new Map<string, ArchiveEntry>();
  private tickIntervalMs: number;
  private timer: NodeJS.Timeout | null = null;
  private ticking: Promise<void> | null = null;
  private callback: SchedulerCallback | null = null;
  private lastTickAt: string | undefined;
  private errorStreak = 0;
  private lastError: string | undefined;

  constructor(options: TimekeeperOptions) {
    this.jobsStore = options.jobsStore;
    this.archiveStore = options.archiveStore;
    this.registry = options.registry;
    this.dispatcher = options.dispatcher;
    this.tickIntervalMs = options.tickIntervalMs ?? 500;
    this.now = options.now ?? (() => new Date());
  }

  // ==========================================================================
  // Pending jobs
  // ==========================================================================

  /**
   * Schedule a task. The name is resolved to its canonical identifier and the
   * arguments are checked against its parameters before anything is stored.
   */
  async addJob(taskName: string, scheduleTime: Date | string, kwargs: TaskArgs = {}): Promise<string> {
    const definition = this.registry.require(taskName);
    const report = validateParameters(definition, kwargs);
    if (!report.ok) {
      throw new ParameterMismatchError(definition.name, report.errors, report.warnings);
    }
    const instant = toInstant(scheduleTime);

    const job = await this.jobsStore.update((draft) => {
      let seq = 0;
      for (const value of Object.values(draft)) {
        const parsed = JobSchema.safeParse(value);
        if (parsed.success) seq = Math.max(seq, parsed.data.seq + 1);
      }
      const created: Job = {
        jobId: randomUUID(),
        taskName: definition.name,
        scheduleTime: instant.toISOString(),
        kwargs: structuredClone(kwargs),
        seq,
        createdAt: this.now().toISOString(),
      };
      draft[created.jobId] = created;
      return created;
    });

    log.info({ jobId: job.jobId, task: job.taskName, scheduleTime: job.scheduleTime }, 'Job added');
    this.notify({ type: 'job_added', job });
    return job.jobId;
  }

  /**
   * Pending jobs in firing order. Entries that do not parse are skipped.
   */
  async listJobs(): Promise<Job[]> {
    const raw = await this.jobsStore.read();
    const jobs: Job[] = [];
    for (const [jobId, value] of Object.entries(raw)) {
      const parsed = JobSchema.safeParse(value);
      if (!parsed.success) {
        log.warn({ jobId }, 'Skipping malformed pending job');
        continue;
      }
      jobs.push(parsed.data);
    }
    return jobs.sort(compareJobs);
  }

  async getJobs(): Promise<Record<string, JobSummary>> {
    const summaries: Record<string, JobSummary> = {};
    for (const job of await this.listJobs()) {
      summaries[job.jobId] = { task: job.taskName, schedule_time: job.scheduleTime, kwargs: job.kwargs };
    }
    return summaries;
  }

  /**
   * Remove a pending job. Unknown, already fired and currently running jobs
   * are left alone and reported as `false`.
   */
  async cancelJob(jobId: string): Promise<boolean> {
    if (this.inFlight.has(jobId) || this.settled.has(jobId)) {
      log.warn({ jobId }, 'Job is already running, not cancelled');
      return false;
    }
    const removed = await this.jobsStore.remove([jobId]);
    if (removed.length === 0) {
      log.warn({ jobId }, 'No pending job to cancel');
      return false;
    }
    log.info({ jobId }, 'Job cancelled');
    this.notify({ type: 'job_cancelled', jobId });
    return true;
  }

  // ==========================================================================
  // Firing
  // ==========================================================================

  /**
   * Start every due job that is not already running. Returns the ids
   * started, in firing order; completion is observed through `whenIdle()`.
   */
  async tick(): Promise<string[]> {
    const now = this.now().getTime();
    this.lastTickAt = new Date(now).toISOString();
    const due = (await this.listJobs()).filter(
      (job) => Date.parse(job.scheduleTime) <= now && !this.inFlight.has(job.jobId)
    );

    for (const job of due) {
      const run = this.fire(job)
        .catch((err: unknown) => {
          log.error({ jobId: job.jobId, err: errorMessage(err) }, 'Failed to settle job');
        })
        .finally(() => {
          this.inFlight.delete(job.jobId);
        });
      this.inFlight.set(job.jobId, run);
    }
    return due.map((job) => job.jobId);
  }

  /**
   * Resolves once no tick and no job is running.
   */
  async whenIdle(): Promise<void> {
    while (this.ticking || this.inFlight.size > 0) {
      if (this.ticking) await this.ticking;
      await Promise.all(this.inFlight.values());
    }
  }

  /**
   * Run a job and move it to the archive. A run whose archive write or
   * pending-set removal failed is kept in `settled`; the next tick finishes
   * the bookkeeping and never runs the task again.
   */
  private async fire(job: Job): Promise<void> {
    let entry = this.settled.get(job.jobId);

    if ((await this.archiveStore.get(job.jobId)) !== undefined) {
      await this.jobsStore.remove([job.jobId]);
      this.settled.delete(job.jobId);
      if (entry) {
        this.notify({ type: 'job_fired', jobId: job.jobId, entry });
      } else {
        log.warn({ jobId: job.jobId }, 'Job was archived already, dropped from pending set');
      }
      return;
    }

    if (entry) {
      log.info({ jobId: job.jobId }, 'Retrying archive write for finished job');
    } else {
      if ((await this.jobsStore.get(job.jobId)) === undefined) {
        return;
      }
      entry = await this.dispatcher.execute(job);
      this.settled.set(job.jobId, entry);
    }

    await this.archiveStore.write({ [job.jobId]: entry });
    await this.jobsStore.remove([job.jobId]);
    this.settled.delete(job.jobId);
    this.notify({ type: 'job_fired', jobId: job.jobId, entry });
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /**
   * Reconcile the pending set with the archive after a restart.
   */
  async restore(): Promise<RestoreSummary> {
    const archive = await this.archiveStore.read();
    const jobs = await this.listJobs();
    const dropped = jobs.filter((job) => archive[job.jobId] !== undefined).map((job) => job.jobId);
    if (dropped.length > 0) {
      await this.jobsStore.remove(dropped);
    }

    const now = this.now().getTime();
    const remaining = jobs.filter((job) => !dropped.includes(job.jobId));
    const summary: RestoreSummary = {
      pending: remaining.length,
      overdue: remaining.filter((job) => Date.parse(job.scheduleTime) <= now).length,
      dropped,
    };
    log.info(summary, 'Scheduler restored');
    return summary;
  }

  start(tickIntervalMs: number = this.tickIntervalMs): TimekeeperStatus {
    if (this.timer) {
      return this.status();
    }
    this.tickIntervalMs = tickIntervalMs;
    this.timer = setInterval(() => {
      if (this.ticking) return;
      this.ticking = this.tick()
        .then(
          () => {
            this.errorStreak = 0;
            this.lastError = undefined;
          },
          (err: unknown) => {
            this.errorStreak += 1;
            this.lastError = errorMessage(err);
            log.error({ err: this.lastError, errorStreak: this.errorStreak }, 'Scheduler tick failed');
          }
        )
        .finally(() => {
          this.ticking = null;
        });
    }, this.tickIntervalMs);
    this.timer.unref();
    log.info({ tickIntervalMs: this.tickIntervalMs }, 'Scheduler started');
    return this.status();
  }

  stop(): TimekeeperStatus {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      log.info('Scheduler stopped');
    }
    return this.status();
  }

  status(): TimekeeperStatus {
    return {
      running: this.timer !== null,
      tickIntervalMs: this.tickIntervalMs,
      inFlight: [...this.inFlight.keys()],
      ...(this.lastTickAt ? { lastTickAt: this.lastTickAt } : {}),
      errorStreak: this.errorStreak,
      ...(this.lastError ? { lastError: this.lastError } : {}),
    };
  }

  // ==========================================================================
  // Archive
  // ==========================================================================

  async getArchive(): Promise<Record<string, ArchiveEntry>> {
    const raw = await this.archiveStore.read();
    const entries: Record<string, ArchiveEntry> = {};
    for (const [jobId, value] of Object.entries(raw)) {
      const parsed = ArchiveEntrySchema.safeParse(value);
      if (!parsed.success) {
        log.warn({ jobId }, 'Skipping malformed archive entry');
        continue;
      }
      entries[jobId] = parsed.data;
    }
    return entries;
  }

  async getArchiveEntry(jobId: string): Promise<ArchiveEntry | null> {
    const parsed = ArchiveEntrySchema.safeParse(await this.archiveStore.get(jobId));
    return parsed.success ? parsed.data : null;
  }

  /**
   * Empty the archive. Returns the number of entries removed.
   */
  async clearArchive(): Promise<number> {
    const removed = await this.archiveStore.update((draft) => {
      const keys = Object.keys(draft);
      for (const key of keys) {
        delete draft[key];
      }
      return keys.length;
    });
    log.info({ removed }, 'Archive cleared');
    this.notify({ type: 'archive_cleared', removed });
    return removed;
  }

  // ==========================================================================
  // Observer
  // ==========================================================================

  /**
   * Register the single observer. A later registration replaces it; null
   * removes it.
   */
  setCallback(callback: SchedulerCallback | null): void {
    this.callback = callback;
  }

  private notify(event: SchedulerEvent): void {
    const callback = this.callback;
    if (!callback) return;
    try {
      void Promise.resolve(callback(event)).catch((err: unknown) => {
        log.error({ event: event.type, err: errorMessage(err) }, 'Scheduler callback failed');
      });
    } catch (err) {
      log.error({ event: event.type, err: errorMessage(err) }, 'Scheduler callback failed');
    }
  }
}
