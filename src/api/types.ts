import type Database from 'better-sqlite3';
import type { FastifyRequest } from 'fastify';
import type { FinpipeConfig } from '../shared/schemas.js';
import type { StepImpls } from '../pipeline/types.js';
import { parseOrThrow } from '../shared/schemas.js';
import { ApproverRoleSchema, type ApproverRole } from '../workflows/approvals.js';

export interface RouteOpts {
  db: Database.Database;
  config: FinpipeConfig;
  steps: StepImpls;
}

/** The caller's X-Request-ID, when sent once. */
export function requestIdOf(req: FastifyRequest): string | null {
  const header = req.headers['x-request-id'];
  return typeof header === 'string' && header.length > 0 ? header : null;
}

/** Actor label for audit and timeline rows; authentication is handled upstream. */
export function actorOf(req: FastifyRequest): string {
  const header = req.headers['x-actor'];
  return typeof header === 'string' && header.length > 0 ? header : 'api';
}

/** Approver role from X-Role, set by the same upstream as X-Actor. Defaults to finance. */
export function roleOf(req: FastifyRequest): ApproverRole {
  const header = req.headers['x-role'];
  if (typeof header !== 'string' || header.length === 0) return 'finance';
  return parseOrThrow(ApproverRoleSchema, header, 'X-Role header');
}
