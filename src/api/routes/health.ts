import type { FastifyInstance } from 'fastify';
import { verifyAuditChain } from '../../audit/audit.js';
import type { RouteOpts } from '../types.js';

export async function registerHealthRoutes(fastify: FastifyInstance, opts: RouteOpts) {
  fastify.get('/v1/health', async () => {
    return {
      status: 'ok',
      instance_id: opts.config.instance_id,
      version: opts.config.version,
      audit_chain: verifyAuditChain(opts.db),
    };
  });
}
