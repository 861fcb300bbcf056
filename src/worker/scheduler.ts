/**
 * In-process scheduler for named daily jobs.
 *
 * Each job has a cron expression; one timer per job is armed for its next
 * run and re-armed after the run finishes. A job never overlaps itself: a
 * timer that fires while a manual run is in flight is skipped.
 */

import { CronExpressionParser } from 'cron-parser';

/** Longest delay setTimeout accepts; longer waits are split into hops. */
const MAX_TIMER_DELAY_MS = 2_147_483_647;

export interface ScheduledJob {
  name: string;
  /** Standard 5-field cron expression (min hour dom month dow) */
  cron: string;
  run: () => Promise<unknown>;
}

export interface JobStatus {
  name: string;
  cron: string;
  next_run_at: Date | null;
  last_run_at: Date | null;
  last_result: unknown;
  last_error: string | null;
  running: boolean;
}

interface JobEntry extends JobStatus {
  job: ScheduledJob;
  timer: ReturnType<typeof setTimeout> | null;
}

export class UnknownJobError extends Error {
  constructor(public job_name: string) {
    super(`Unknown job: ${job_name}`);
    this.name = 'UnknownJobError';
  }
}

export class JobAlreadyRunningError extends Error {
  constructor(public job_name: string) {
    super(`Job ${job_name} is already running`);
    this.name = 'JobAlreadyRunningError';
  }
}

/**
 * Compute the next run time for a cron expression in a given timezone.
 */
export function computeNextRunAt(cronExpression: string, timezone: string, currentDate: Date): Date {
  const expr = CronExpressionParser.parse(cronExpression, {
    tz: timezone,
    currentDate,
  });
  return expr.next().toDate();
}

export interface SchedulerOptions {
  /** IANA timezone the cron expressions are read in. Default: UTC. */
  timezone?: string;
  now?: () => Date;
}

export class Scheduler {
  private readonly timezone: string;
  private readonly now: () => Date;
  private readonly jobs = new Map<string, JobEntry>();
  private started = false;

  constructor(options: SchedulerOptions = {}) {
    this.timezone = options.timezone ?? 'UTC';
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Add a job. Throws if the name is taken or the cron expression is invalid.
   */
  register(job: ScheduledJob): void {
    if (this.jobs.has(job.name)) {
      throw new Error(`Job ${job.name} is already registered`);
    }
    // Fails fast on a bad expression.
    computeNextRunAt(job.cron, this.timezone, this.now());

    const entry: JobEntry = {
      job,
      name: job.name,
      cron: job.cron,
      next_run_at: null,
      last_run_at: null,
      last_result: null,
      last_error: null,
      running: false,
      timer: null,
    };
    this.jobs.set(job.name, entry);
    if (this.started) this.arm(entry);
  }

  start(): void {
    if (this.started) return;
    this.started = true;
    for (const entry of this.jobs.values()) {
      this.arm(entry);
    }
    console.log(`[Scheduler] Started with ${this.jobs.size} job(s)`);
  }

  stop(): void {
    this.started = false;
    for (const entry of this.jobs.values()) {
      if (entry.timer) clearTimeout(entry.timer);
      entry.timer = null;
      entry.next_run_at = null;
    }
  }

  isStarted(): boolean {
    return this.started;
  }

  list(): JobStatus[] {
    return [...this.jobs.values()].map((entry) => this.status(entry));
  }

  get(name: string): JobStatus | null {
    const entry = this.jobs.get(name);
    return entry ? this.status(entry) : null;
  }

  /**
   * Run a job immediately and return its result. Errors from the job are
   * recorded and rethrown.
   *
   * @throws UnknownJobError, JobAlreadyRunningError
   */
  async runNow(name: string): Promise<unknown> {
    const entry = this.jobs.get(name);
    if (!entry) throw new UnknownJobError(name);
    if (entry.running) throw new JobAlreadyRunningError(name);
    return this.execute(entry);
  }

  private status(entry: JobEntry): JobStatus {
    return {
      name: entry.name,
      cron: entry.cron,
      next_run_at: entry.next_run_at,
      last_run_at: entry.last_run_at,
      last_result: entry.last_result,
      last_error: entry.last_error,
      running: entry.running,
    };
  }

  private arm(entry: JobEntry): void {
    if (entry.timer) clearTimeout(entry.timer);

    const now = this.now();
    const next = computeNextRunAt(entry.cron, this.timezone, now);
    entry.next_run_at = next;

    const delay = next.getTime() - now.getTime();
    if (delay > MAX_TIMER_DELAY_MS) {
      entry.timer = setTimeout(() => this.arm(entry), MAX_TIMER_DELAY_MS);
      return;
    }

    entry.timer = setTimeout(() => {
      entry.timer = null;
      void this.tick(entry);
    }, Math.max(delay, 0));
  }

  private async tick(entry: JobEntry): Promise<void> {
    try {
      if (entry.running) {
        console.warn(`[Scheduler] Job ${entry.name} still running - skipping this run`);
        return;
      }
      await this.execute(entry);
    } catch (err) {
      console.error(`[Scheduler] Job ${entry.name} failed:`, (err as Error).message);
    } finally {
      if (this.started) this.arm(entry);
    }
  }

  private async execute(entry: JobEntry): Promise<unknown> {
    entry.running = true;
    entry.last_run_at = this.now();
    const started = Date.now();
    try {
      const result = await entry.job.run();
      entry.last_result = result;
      entry.last_error = null;
      console.log(`[Scheduler] Job ${entry.name} finished in ${Date.now() - started}ms`);
      return result;
    } catch (err) {
      entry.last_result = null;
      entry.last_error = err instanceof Error ? err.message : String(err);
      throw err;
    } finally {
      entry.running = false;
    }
  }
}
