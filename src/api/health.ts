/**
 * Component health checks aggregated by GET /health.
 */

import type { Pool } from 'pg';
import type { Scheduler } from '../worker/scheduler.ts';

export type HealthStatus = 'healthy' | 'degraded' | 'unhealthy';

export interface HealthCheckResult {
  status: HealthStatus;
  latency_ms: number;
  details?: Record<string, unknown>;
}

export interface HealthChecker {
  name: string;
  critical: boolean;
  check(): Promise<HealthCheckResult>;
}

export interface ComponentHealth {
  status: HealthStatus;
  latency_ms: number;
  details?: Record<string, unknown>;
}

export interface HealthResponse {
  status: HealthStatus;
  timestamp: string;
  components: Record<string, ComponentHealth>;
}

export class DatabaseHealthChecker implements HealthChecker {
  readonly name = 'database';
  readonly critical = true;

  constructor(private pool: Pool) {}

  async check(): Promise<HealthCheckResult> {
    const start = Date.now();
    try {
      await this.pool.query('SELECT 1');
      const latency_ms = Date.now() - start;

      return {
        status: 'healthy',
        latency_ms,
        details: {
          pool_total: this.pool.totalCount,
          pool_idle: this.pool.idleCount,
          pool_waiting: this.pool.waitingCount,
        },
      };
    } catch {
      return {
        status: 'unhealthy',
        latency_ms: Date.now() - start,
        details: { error: 'Database connection failed' },
      };
    }
  }
}

/**
 * Degraded when the scheduler is stopped or a job's last run failed.
 */
export class SchedulerHealthChecker implements HealthChecker {
  readonly name = 'scheduler';
  readonly critical = false;

  constructor(private scheduler: Scheduler) {}

  async check(): Promise<HealthCheckResult> {
    const jobs = this.scheduler.list();
    const failing = jobs.filter((job) => job.last_error !== null).map((job) => job.name);
    const running = this.scheduler.isStarted();

    return {
      status: running && failing.length === 0 ? 'healthy' : 'degraded',
      latency_ms: 0,
      details: { running, jobs: jobs.length, failing },
    };
  }
}

export class HealthCheckRegistry {
  private checkers: HealthChecker[] = [];

  register(checker: HealthChecker): void {
    this.checkers.push(checker);
  }

  /**
   * Runs every check concurrently. A checker that throws counts as unhealthy.
   * Overall status is unhealthy when a critical check is, degraded when any
   * other check is not healthy.
   */
  async checkAll(): Promise<HealthResponse> {
    const results = await Promise.all(
      this.checkers.map(async (checker) => ({ checker, result: await runCheck(checker) })),
    );

    const components: Record<string, ComponentHealth> = {};
    let overallStatus: HealthStatus = 'healthy';
    for (const { checker, result } of results) {
      components[checker.name] = result;
      if (result.status === 'healthy') continue;
      if (result.status === 'unhealthy' && checker.critical) {
        overallStatus = 'unhealthy';
      } else if (overallStatus === 'healthy') {
        overallStatus = 'degraded';
      }
    }

    return {
      status: overallStatus,
      timestamp: new Date().toISOString(),
      components,
    };
  }
}

async function runCheck(checker: HealthChecker): Promise<HealthCheckResult> {
  const start = Date.now();
  try {
    return await checker.check();
  } catch (err) {
    return {
      status: 'unhealthy',
      latency_ms: Date.now() - start,
      details: { error: (err as Error).message },
    };
  }
}
