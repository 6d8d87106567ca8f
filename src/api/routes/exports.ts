import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { IsoDateSchema, ScopeFiltersSchema, parseOrThrow } from '../../shared/schemas.js';
import {
  STATE_AT_TIME_EXPORT,
  ensureExportJob,
  exportCutoff,
  listExportJobs,
  requireExportJob,
} from '../../exports/jobs.js';
import { runExportWorkerOnce } from '../../exports/worker.js';
import type { RouteOpts } from '../types.js';
import { actorOf } from '../types.js';

const ExportListQuerySchema = z.object({
  status: z.enum(['queued', 'running', 'done', 'failed']).optional(),
  limit: z.coerce.number().int().min(1).max(500).default(50),
});

const ExportCreateSchema = z.object({
  export_type: z.literal(STATE_AT_TIME_EXPORT).default(STATE_AT_TIME_EXPORT),
  as_of_date: IsoDateSchema,
  filters: ScopeFiltersSchema,
});

export async function registerExportRoutes(fastify: FastifyInstance, opts: RouteOpts) {
  fastify.get('/v1/exports', async (req) => {
    const query = parseOrThrow(ExportListQuerySchema, req.query, 'query');
    return { exports: listExportJobs(opts.db, query) };
  });

  fastify.post('/v1/exports', async (req, reply) => {
    const body = parseOrThrow(ExportCreateSchema, req.body ?? {}, 'export request');
    const result = ensureExportJob(opts.db, {
      export_type: body.export_type,
      as_of: exportCutoff(body.as_of_date),
      filters: body.filters,
      requested_by: actorOf(req),
    });
    return reply.status(result.idempotent ? 200 : 202).send(result);
  });

  fastify.get<{ Params: { export_id: string } }>('/v1/exports/:export_id', async (req) => {
    return requireExportJob(opts.db, req.params.export_id);
  });

  fastify.post(
    '/v1/exports/worker/run-once',
    { config: { rateLimit: { max: 10, timeWindow: '1 minute' } } },
    async (req) => {
      const result = await runExportWorkerOnce(opts.db, { actor: actorOf(req) });
      return { processed: result };
    },
  );
}
