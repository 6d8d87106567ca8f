import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { NotFoundError } from '../../shared/errors.js';
import { parseOrThrow } from '../../shared/schemas.js';
import {
  decideWorkflowRequest,
  getOrCreateWorkflowRequest,
  getWorkflowRequest,
  listWorkflowRequests,
  WorkflowRequestInputSchema,
} from '../../workflows/approvals.js';
import type { RouteOpts } from '../types.js';
import { actorOf, requestIdOf, roleOf } from '../types.js';

const ListQuerySchema = z.object({
  status: z.enum(['pending', 'approved', 'rejected']).optional(),
});

const DecideBodySchema = z.object({
  decision: z.enum(['approved', 'rejected']),
  reason: z.string().max(2000).optional(),
});

export async function registerWorkflowRoutes(fastify: FastifyInstance, opts: RouteOpts) {
  fastify.get('/v1/workflows', async (req) => {
    const query = parseOrThrow(ListQuerySchema, req.query, 'query');
    return { requests: listWorkflowRequests(opts.db, query) };
  });

  fastify.post('/v1/workflows', async (req, reply) => {
    const input = parseOrThrow(WorkflowRequestInputSchema, req.body ?? {}, 'workflow request');
    const result = getOrCreateWorkflowRequest(opts.db, input, {
      requestedBy: actorOf(req),
      requestId: requestIdOf(req),
    });
    return reply.status(result.created ? 201 : 200).send(result);
  });

  fastify.get<{ Params: { id: string } }>('/v1/workflows/:id', async (req) => {
    const request = getWorkflowRequest(opts.db, req.params.id);
    if (!request) throw new NotFoundError(`Workflow request not found: ${req.params.id}`);
    return request;
  });

  fastify.post<{ Params: { id: string } }>('/v1/workflows/:id/decide', async (req) => {
    const body = parseOrThrow(DecideBodySchema, req.body ?? {}, 'decision');
    return decideWorkflowRequest(opts.db, req.params.id, body.decision, {
      actor: actorOf(req),
      role: roleOf(req),
      reason: body.reason,
      requestId: requestIdOf(req),
    });
  });
}
