import type Database from 'better-sqlite3';
import { z } from 'zod';
import { canonicalHash } from '../shared/canonical.js';
import { ConflictError, ForbiddenError, NotFoundError, ValidationError } from '../shared/errors.js';
import { StateMachine } from '../shared/fsm.js';
import { generateId } from '../shared/ids.js';
import { parseOrThrow } from '../shared/schemas.js';
import { ensureOrFetch } from '../store/ensure.js';
import { conditionalTransition, readStatus } from '../store/transition.js';
import { correlationIdFromRequestId, emitTimelineEvent } from '../timeline/emitter.js';

export type WorkflowStatus = 'pending' | 'approved' | 'rejected';
export type WorkflowDecision = Exclude<WorkflowStatus, 'pending'>;
export const ApproverRoleSchema = z.enum(['finance', 'admin']);
export type ApproverRole = z.infer<typeof ApproverRoleSchema>;

export const WORKFLOW_MACHINE = new StateMachine<WorkflowStatus>(
  'workflow_request',
  ['pending', 'approved', 'rejected'],
  [
    { from: ['pending'], to: 'approved' },
    { from: ['pending'], to: 'rejected' },
  ],
  ['approved', 'rejected'],
);

export const APPROVAL_THRESHOLD_USD = 250_000;
export const APPROVAL_SLA_HOURS = 24;
const GATED_ACTIONS = new Set(['rfq.award', 'hedge.manual.create']);

export interface ApprovalPolicy {
  requires_approval: boolean;
  required_role: ApproverRole | null;
  threshold_usd: number | null;
  notional_usd: number | null;
}

/**
 * Gated actions always need approval. Below the threshold finance may
 * approve; at or above it, or when the notional is unknown, admin must.
 */
export function approvalPolicyForAction(action: string, notionalUsd: number | null): ApprovalPolicy {
  if (!GATED_ACTIONS.has(action)) {
    return { requires_approval: false, required_role: null, threshold_usd: null, notional_usd: notionalUsd };
  }
  const requiredRole: ApproverRole =
    notionalUsd !== null && notionalUsd < APPROVAL_THRESHOLD_USD ? 'finance' : 'admin';
  return {
    requires_approval: true,
    required_role: requiredRole,
    threshold_usd: APPROVAL_THRESHOLD_USD,
    notional_usd: notionalUsd,
  };
}

export interface WorkflowRequest {
  id: string;
  request_key: string;
  inputs_hash: string;
  action: string;
  subject_type: string;
  subject_id: string;
  required_role: ApproverRole;
  notional_usd: number | null;
  threshold_usd: number | null;
  context: Record<string, unknown>;
  status: WorkflowStatus;
  requested_by: string | null;
  decided_by: string | null;
  decided_at: string | null;
  decision_reason: string | null;
  correlation_id: string | null;
  sla_due_at: string;
  created_at: string;
  updated_at: string;
}

interface WorkflowRequestRow extends Omit<WorkflowRequest, 'context'> {
  context_json: string;
}

export const WorkflowRequestInputSchema = z.object({
  action: z.string().min(1).max(128),
  subject_type: z.string().min(1).max(64),
  subject_id: z.string().min(1).max(128),
  notional_usd: z.number().finite().nonnegative().nullable().default(null),
  context: z.record(z.unknown()).default({}),
});

export type WorkflowRequestInput = z.input<typeof WorkflowRequestInputSchema>;

function toRequest(row: WorkflowRequestRow): WorkflowRequest {
  const { context_json, ...rest } = row;
  return { ...rest, context: JSON.parse(context_json) as Record<string, unknown> };
}

function normMoney(value: number | null): string | null {
  return value === null ? null : value.toFixed(2);
}

export function computeWorkflowIdentity(fields: {
  action: string;
  subject_type: string;
  subject_id: string;
  required_role: ApproverRole;
  notional_usd: number | null;
  threshold_usd: number | null;
  context: Record<string, unknown>;
}): { request_key: string; inputs_hash: string } {
  const inputsHash = canonicalHash({
    ...fields,
    notional_usd: normMoney(fields.notional_usd),
    threshold_usd: normMoney(fields.threshold_usd),
  });
  return { request_key: `wf_${inputsHash.slice(0, 32)}`, inputs_hash: inputsHash };
}

export function getWorkflowRequest(db: Database.Database, id: string): WorkflowRequest | null {
  const row = db.prepare(`SELECT * FROM workflow_requests WHERE id = ?`).get(id) as
    | WorkflowRequestRow
    | undefined;
  return row ? toRequest(row) : null;
}

function getByKey(db: Database.Database, requestKey: string): WorkflowRequest | null {
  const row = db.prepare(`SELECT * FROM workflow_requests WHERE request_key = ?`).get(requestKey) as
    | WorkflowRequestRow
    | undefined;
  return row ? toRequest(row) : null;
}

export function listWorkflowRequests(
  db: Database.Database,
  filter?: { status?: WorkflowStatus },
): WorkflowRequest[] {
  const rows = filter?.status
    ? db
        .prepare(`SELECT * FROM workflow_requests WHERE status = ? ORDER BY created_at DESC, rowid DESC`)
        .all(filter.status)
    : db.prepare(`SELECT * FROM workflow_requests ORDER BY created_at DESC, rowid DESC`).all();
  return (rows as WorkflowRequestRow[]).map(toRequest);
}

/**
 * Get-or-create the approval request for an action. Identical inputs map to
 * the same `request_key`, so retries converge on one request.
 */
export function getOrCreateWorkflowRequest(
  db: Database.Database,
  input: WorkflowRequestInput,
  opts: { requestedBy?: string | null; requestId?: string | null } = {},
): { request: WorkflowRequest; created: boolean } {
  const req = parseOrThrow(WorkflowRequestInputSchema, input, 'workflow request');
  const policy = approvalPolicyForAction(req.action, req.notional_usd);
  if (!policy.requires_approval || policy.required_role === null) {
    throw new ValidationError(`Action ${req.action} does not require approval`);
  }
  const requiredRole = policy.required_role;
  const { request_key, inputs_hash } = computeWorkflowIdentity({
    action: req.action,
    subject_type: req.subject_type,
    subject_id: req.subject_id,
    required_role: requiredRole,
    notional_usd: policy.notional_usd,
    threshold_usd: policy.threshold_usd,
    context: req.context,
  });
  const correlationId = correlationIdFromRequestId(opts.requestId);

  const { entity, created } = ensureOrFetch(db, {
    find: () => getByKey(db, request_key) ?? undefined,
    insert: () => {
      const now = new Date();
      const dueAt = new Date(now.getTime() + APPROVAL_SLA_HOURS * 3600_000);
      db.prepare(`
        INSERT INTO workflow_requests
          (id, request_key, inputs_hash, action, subject_type, subject_id, required_role,
           notional_usd, threshold_usd, context_json, status, requested_by, correlation_id,
           sla_due_at, created_at, updated_at)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, 'pending', ?, ?, ?, ?, ?)
      `).run(
        generateId(),
        request_key,
        inputs_hash,
        req.action,
        req.subject_type,
        req.subject_id,
        requiredRole,
        policy.notional_usd,
        policy.threshold_usd,
        JSON.stringify(req.context),
        opts.requestedBy ?? null,
        correlationId,
        dueAt.toISOString(),
        now.toISOString(),
        now.toISOString(),
      );
    },
  });

  emitTimelineEvent(
    db,
    {
      event_type: 'WORKFLOW_REQUESTED',
      subject_type: 'workflow',
      subject_id: entity.id,
      idempotency_key: `workflow_request:${entity.request_key}:requested`,
      visibility: 'finance',
      correlation_id: entity.correlation_id ?? correlationId,
      actor: opts.requestedBy ?? null,
      payload: {
        workflow_request_id: entity.id,
        request_key: entity.request_key,
        action: entity.action,
        subject_type: entity.subject_type,
        subject_id: entity.subject_id,
        required_role: entity.required_role,
      },
    },
    {
      action: 'workflow.requested',
      actor: opts.requestedBy,
      subject_type: 'workflow',
      subject_id: entity.id,
      request_id: opts.requestId,
      payload: { request_key: entity.request_key, inputs_hash: entity.inputs_hash },
    },
  );

  return { request: entity, created };
}

/** Admin may decide anything; finance only what requires finance. */
export function canDecide(role: ApproverRole, required: ApproverRole): boolean {
  return role === 'admin' || required === role;
}

/**
 * Decide a pending request. Repeating the recorded decision is a no-op that
 * keeps the first decider; a different decision after one was made conflicts.
 * A decider whose role is below `required_role` is refused before any write.
 */
export function decideWorkflowRequest(
  db: Database.Database,
  id: string,
  decision: WorkflowDecision,
  opts: { actor: string; role: ApproverRole; reason?: string | null; requestId?: string | null },
): WorkflowRequest {
  const pending = getWorkflowRequest(db, id);
  if (!pending) throw new NotFoundError(`Workflow request not found: ${id}`);
  if (!canDecide(opts.role, pending.required_role)) {
    throw new ForbiddenError(
      `Workflow request ${id} requires the ${pending.required_role} role; ${opts.actor} has ${opts.role}`,
    );
  }

  const changed = conditionalTransition(db, {
    table: 'workflow_requests',
    id,
    to: decision,
    allowedFrom: WORKFLOW_MACHINE.allowedFrom(decision),
    setOnce: {
      decided_by: opts.actor,
      decided_at: new Date().toISOString(),
      decision_reason: opts.reason ?? null,
    },
  });
  if (changed === 0) {
    const current = readStatus(db, 'workflow_requests', id);
    if (current === null) throw new NotFoundError(`Workflow request not found: ${id}`);
    throw new ConflictError(`Workflow request ${id} is already ${current}`, current);
  }

  const request = getWorkflowRequest(db, id);
  if (!request) throw new NotFoundError(`Workflow request not found: ${id}`);

  emitTimelineEvent(
    db,
    {
      event_type: 'WORKFLOW_DECIDED',
      subject_type: 'workflow',
      subject_id: request.id,
      idempotency_key: `workflow_request:${request.request_key}:decided`,
      visibility: 'finance',
      correlation_id: opts.requestId ?? request.correlation_id,
      actor: request.decided_by,
      payload: {
        workflow_request_id: request.id,
        request_key: request.request_key,
        decision: request.status,
        decided_by: request.decided_by,
        reason: request.decision_reason,
      },
    },
    {
      action: 'workflow.decided',
      actor: opts.actor,
      subject_type: 'workflow',
      subject_id: request.id,
      request_id: opts.requestId,
      payload: { request_key: request.request_key, decision: request.status },
    },
  );

  return request;
}
