import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { parseOrThrow } from '../../shared/schemas.js';
import { forceFailRun, runDailyPipeline } from '../../pipeline/executor.js';
import { getRunStatus, listRuns, requireRun } from '../../pipeline/registry.js';
import { listTimelineEvents } from '../../timeline/emitter.js';
import { PIPELINE_SUBJECT_TYPE } from '../../timeline/pipeline-events.js';
import type { RouteOpts } from '../types.js';
import { actorOf, requestIdOf } from '../types.js';

const RunControlSchema = z.object({ resume: z.boolean().default(false) }).passthrough();

const ListRunsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(50),
  offset: z.coerce.number().int().min(0).default(0),
  status: z.enum(['queued', 'running', 'done', 'failed']).optional(),
});

const ForceFailBodySchema = z.object({ reason: z.string().max(2000).optional() }).default({});

export async function registerPipelineRoutes(fastify: FastifyInstance, opts: RouteOpts) {
  fastify.post(
    '/v1/pipelines/daily/run',
    { config: { rateLimit: { max: 10, timeWindow: '1 minute' } } },
    async (req) => {
      const { resume } = parseOrThrow(RunControlSchema, req.body ?? {}, 'run request');
      return runDailyPipeline(opts.db, req.body, {
        steps: opts.steps,
        requestedBy: actorOf(req),
        requestId: requestIdOf(req),
        resume,
      });
    },
  );

  fastify.get('/v1/pipelines/daily/runs', async (req) => {
    const query = parseOrThrow(ListRunsQuerySchema, req.query, 'query');
    return { runs: listRuns(opts.db, query), limit: query.limit, offset: query.offset };
  });

  fastify.get<{ Params: { ref: string } }>('/v1/pipelines/daily/runs/:ref', async (req) => {
    return getRunStatus(opts.db, req.params.ref);
  });

  fastify.get<{ Params: { ref: string } }>('/v1/pipelines/daily/runs/:ref/events', async (req) => {
    const run = requireRun(opts.db, req.params.ref);
    return {
      events: listTimelineEvents(opts.db, {
        subject_type: PIPELINE_SUBJECT_TYPE,
        subject_id: run.id,
        audience: 'finance',
      }),
    };
  });

  fastify.post<{ Params: { ref: string } }>(
    '/v1/pipelines/daily/runs/:ref/force-fail',
    async (req) => {
      const body = parseOrThrow(ForceFailBodySchema, req.body ?? {}, 'force-fail request');
      const run = requireRun(opts.db, req.params.ref);
      forceFailRun(opts.db, run.id, {
        actor: actorOf(req),
        reason: body.reason,
        requestId: requestIdOf(req),
      });
      return getRunStatus(opts.db, run.id);
    },
  );
}
