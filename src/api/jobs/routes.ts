/**
 * Job routes: list the scheduler's jobs and trigger a run by name.
 */

import type { FastifyInstance } from 'fastify';

import { JobAlreadyRunningError, UnknownJobError, type Scheduler } from '../../worker/scheduler.ts';

interface NameParams {
  name: string;
}

export interface JobRoutesOptions {
  scheduler: Scheduler;
}

export async function jobRoutesPlugin(app: FastifyInstance, opts: JobRoutesOptions): Promise<void> {
  const { scheduler } = opts;

  // GET /api/jobs
  app.get('/api/jobs', async (_req, reply) => {
    const jobs = scheduler.list().map(({ last_result: _result, ...job }) => job);
    return reply.send({ jobs, scheduler_running: scheduler.isStarted() });
  });

  // POST /api/jobs/:name/run
  app.post<{ Params: NameParams }>('/api/jobs/:name/run', async (req, reply) => {
    const { name } = req.params;
    try {
      const result = await scheduler.runNow(name);
      return reply.send({ job: name, result });
    } catch (error) {
      if (error instanceof UnknownJobError) {
        return reply.code(404).send({ error: 'Job not found' });
      }
      if (error instanceof JobAlreadyRunningError) {
        return reply.code(409).send({ error: error.message });
      }
      req.log.error({ err: error, job: name }, 'Manual job run failed');
      return reply.code(500).send({
        error: 'Job failed',
        message: error instanceof Error ? error.message : String(error),
      });
    }
  });
}
