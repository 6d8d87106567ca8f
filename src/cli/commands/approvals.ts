import type { Command } from 'commander';
import { requireProject } from '../cli-shared.js';
import {
  decideWorkflowRequest,
  getOrCreateWorkflowRequest,
  listWorkflowRequests,
  ApproverRoleSchema,
  type WorkflowDecision,
  type WorkflowStatus,
} from '../../workflows/approvals.js';

const STATUSES: WorkflowStatus[] = ['pending', 'approved', 'rejected'];

interface DecideFlags {
  reason?: string;
  actor: string;
  role: string;
}

function decide(id: string, decision: WorkflowDecision, flags: DecideFlags): void {
  const role = ApproverRoleSchema.safeParse(flags.role);
  if (!role.success) {
    console.error(`Invalid --role '${flags.role}': expected finance or admin`);
    process.exit(1);
  }
  const { db } = requireProject();
  try {
    const updated = decideWorkflowRequest(db, id, decision, {
      actor: flags.actor,
      role: role.data,
      reason: flags.reason,
    });
    console.log(`${decision === 'approved' ? 'Approved' : 'Rejected'}: ${updated.id}`);
  } catch (err) {
    console.error(`Failed: ${(err as Error).message}`);
    process.exit(1);
  }
}

export function registerApprovalsCommand(program: Command): void {
  const approvals = program
    .command('approvals')
    .description('Manage workflow approval requests');

  approvals
    .command('list')
    .description('List approval requests')
    .option('--status <status>', 'Filter by status: pending, approved, rejected')
    .action((opts) => {
      const status = STATUSES.find((s) => s === opts.status);
      const { db } = requireProject();
      const items = listWorkflowRequests(db, status ? { status } : undefined);

      if (items.length === 0) {
        console.log('No approvals found.');
        return;
      }

      console.log(`\nApprovals (${items.length}):\n`);
      for (const r of items) {
        console.log(`  [${r.status.toUpperCase().padEnd(8)}] ${r.id}`);
        console.log(`          Action:  ${r.action} on ${r.subject_type}/${r.subject_id}`);
        console.log(`          Role:    ${r.required_role}`);
        if (r.notional_usd !== null) console.log(`          Notional: ${r.notional_usd.toFixed(2)} USD`);
        console.log(`          SLA due: ${r.sla_due_at}`);
        if (r.decided_by) console.log(`          Decided: ${r.decided_at ?? ''} by ${r.decided_by}`);
        if (r.decision_reason) console.log(`          Reason:  ${r.decision_reason}`);
        console.log();
      }
    });

  approvals
    .command('request <action> <subjectType> <subjectId>')
    .description('Open (or fetch) the approval request for a gated action')
    .option('--notional <usd>', 'Notional in USD')
    .option('--actor <actor>', 'Requesting user', 'cli')
    .action((action: string, subjectType: string, subjectId: string, opts) => {
      const { db } = requireProject();
      const notional = opts.notional === undefined ? null : Number(opts.notional);
      try {
        const { request, created } = getOrCreateWorkflowRequest(
          db,
          { action, subject_type: subjectType, subject_id: subjectId, notional_usd: notional },
          { requestedBy: opts.actor as string },
        );
        console.log(`${created ? 'Created' : 'Existing'}: ${request.id} (requires ${request.required_role})`);
      } catch (err) {
        console.error(`Failed: ${(err as Error).message}`);
        process.exit(1);
      }
    });

  approvals
    .command('approve <id>')
    .description('Approve a pending request')
    .option('--reason <reason>', 'Reason for decision')
    .option('--actor <actor>', 'Deciding user', 'cli')
    .option('--role <role>', 'Deciding role: finance or admin', 'finance')
    .action((id: string, opts: DecideFlags) => decide(id, 'approved', opts));

  approvals
    .command('reject <id>')
    .description('Reject a pending request')
    .option('--reason <reason>', 'Reason for decision')
    .option('--actor <actor>', 'Deciding user', 'cli')
    .option('--role <role>', 'Deciding role: finance or admin', 'finance')
    .action((id: string, opts: DecideFlags) => decide(id, 'rejected', opts));
}
