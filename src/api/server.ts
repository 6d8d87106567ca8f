import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import { openProject } from '../config/context.js';
import { isFinpipeError, ValidationError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { DailyJobRunner } from '../scheduler/daily-runner.js';
import { SqliteLeaseStore } from '../scheduler/lease.js';
import type { RouteOpts } from './types.js';
import { registerAuditRoutes } from './routes/audit.js';
import { registerHealthRoutes } from './routes/health.js';
import { registerPipelineRoutes } from './routes/pipelines.js';
import { registerTimelineRoutes } from './routes/timeline.js';
import { registerExportRoutes } from './routes/exports.js';
import { registerWorkflowRoutes } from './routes/workflows.js';

export async function createServer(deps: RouteOpts): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: false,
    trustProxy: false,
  });

  await fastify.register(cors, {
    origin: deps.config.api.allowed_origins,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'X-Request-ID', 'X-Actor', 'X-Role'],
  });

  // Only routes that opt in through `config.rateLimit` are limited.
  await fastify.register(rateLimit, {
    global: false,
    max: 100,
    timeWindow: '1 minute',
  });

  fastify.addHook('onSend', async (_req, reply) => {
    reply.header('X-Content-Type-Options', 'nosniff');
    reply.header('X-Frame-Options', 'DENY');
    reply.header('Content-Security-Policy', "default-src 'none'");
    reply.header('Referrer-Policy', 'no-referrer');
  });

  fastify.setErrorHandler(async (err, req, reply) => {
    if (isFinpipeError(err)) {
      const body: Record<string, unknown> = { error: err.message, code: err.code };
      if (err instanceof ValidationError) body['issues'] = err.issues;
      return reply.status(err.statusCode).send(body);
    }
    if (err.statusCode !== undefined && err.statusCode < 500) {
      return reply.status(err.statusCode).send({ error: err.message, code: err.code ?? 'bad_request' });
    }
    logger.error('Unhandled API error', { method: req.method, url: req.url, error: err.message });
    return reply.status(500).send({ error: 'Internal server error', code: 'internal_error' });
  });

  await registerHealthRoutes(fastify, deps);
  await registerAuditRoutes(fastify, deps);
  await registerPipelineRoutes(fastify, deps);
  await registerTimelineRoutes(fastify, deps);
  await registerExportRoutes(fastify, deps);
  await registerWorkflowRoutes(fastify, deps);

  return fastify;
}

export interface ServerOptions {
  cwd?: string;
  host?: string;
  port?: number;
  /** Run the daily scheduler in the same process. */
  withScheduler?: boolean;
}

export async function startServer(opts: ServerOptions = {}): Promise<void> {
  const project = openProject(opts.cwd);
  const host = opts.host ?? project.config.api.host;
  const port = opts.port ?? project.config.api.port;

  const isLoopback = host === '127.0.0.1' || host === 'localhost' || host === '::1';
  if (!isLoopback) {
    logger.warn('Non-loopback bind requested. Put an authenticating proxy in front.', { host });
  }

  const fastify = await createServer(project);

  let scheduler: DailyJobRunner | null = null;
  if (opts.withScheduler) {
    scheduler = new DailyJobRunner({
      db: project.db,
      feed: project.feed,
      leases: new SqliteLeaseStore(project.db),
      steps: project.steps,
      config: project.config.scheduler,
    });
    fastify.addHook('onClose', async () => scheduler?.stop());
  }

  try {
    await fastify.listen({ host, port });
    logger.info('API server listening', { host, port, url: `http://${host}:${port}/v1` });
    scheduler?.start();
  } catch (err) {
    logger.error('Failed to start server', { error: (err as Error).message });
    process.exit(1);
  }
}

if (require.main === module) {
  void startServer();
}
