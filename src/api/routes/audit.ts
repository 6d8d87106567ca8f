import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { listAuditLog } from '../../audit/audit.js';
import { parseOrThrow } from '../../shared/schemas.js';
import type { RouteOpts } from '../types.js';

const AuditQuerySchema = z
  .object({
    subject_type: z.string().min(1).max(64).optional(),
    subject_id: z.string().min(1).max(128).optional(),
    limit: z.coerce.number().int().min(1).max(500).default(100),
    offset: z.coerce.number().int().min(0).default(0),
  })
  .refine((q) => (q.subject_type === undefined) === (q.subject_id === undefined), {
    message: 'subject_type and subject_id go together',
  });

export async function registerAuditRoutes(fastify: FastifyInstance, opts: RouteOpts) {
  fastify.get('/v1/audit', async (req) => {
    const query = parseOrThrow(AuditQuerySchema, req.query, 'query');
    return { entries: listAuditLog(opts.db, query), limit: query.limit, offset: query.offset };
  });
}
