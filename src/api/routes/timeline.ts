import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { parseOrThrow } from '../../shared/schemas.js';
import {
  TimelineEventInputSchema,
  emitTimelineEvent,
  listTimelineEvents,
} from '../../timeline/emitter.js';
import type { RouteOpts } from '../types.js';
import { actorOf, requestIdOf } from '../types.js';

const TimelineQuerySchema = z.object({
  subject_type: z.string().min(1),
  subject_id: z.string().min(1),
  audience: z.enum(['all', 'finance']).default('all'),
  limit: z.coerce.number().int().min(1).max(500).default(100),
});

export async function registerTimelineRoutes(fastify: FastifyInstance, opts: RouteOpts) {
  fastify.get('/v1/timeline', async (req) => {
    const query = parseOrThrow(TimelineQuerySchema, req.query, 'query');
    return { events: listTimelineEvents(opts.db, query) };
  });

  fastify.post('/v1/timeline/events', async (req, reply) => {
    const body = parseOrThrow(TimelineEventInputSchema, req.body ?? {}, 'timeline event');
    const result = emitTimelineEvent(opts.db, {
      ...body,
      correlation_id: body.correlation_id ?? requestIdOf(req),
      actor: body.actor ?? actorOf(req),
    });
    return reply.status(result.created ? 201 : 200).send(result);
  });
}
