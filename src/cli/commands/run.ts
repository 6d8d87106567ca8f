import type { Command } from 'commander';
import { parseJsonFlag, printJson, requireProject } from '../cli-shared.js';
import { forceFailRun, runDailyPipeline } from '../../pipeline/executor.js';
import { getRunStatus, listRuns, requireRun } from '../../pipeline/registry.js';
import { RUN_MACHINE } from '../../pipeline/status.js';
import type { RunStatusView } from '../../pipeline/types.js';

function printRunStatus(view: RunStatusView): void {
  const { run } = view;
  console.log(`Run ${run.id} [${run.status.toUpperCase()}]`);
  console.log(`  As of:       ${run.as_of_date}`);
  console.log(`  Version:     ${run.pipeline_version}`);
  console.log(`  Inputs hash: ${run.inputs_hash}`);
  if (run.error_code) console.log(`  Error:       ${run.error_code}: ${run.error_message ?? ''}`);
  console.log('  Steps:');
  for (const step of view.steps) {
    console.log(`    ${step.status.padEnd(8)} ${step.step_name}`);
  }
}

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Run the daily snapshot pipeline for a business date')
    .requiredOption('--as-of <date>', 'Business date (YYYY-MM-DD)')
    .option('--pipeline-version <version>', 'Pipeline version label', 'daily.v1')
    .option('--filters <json>', 'Scope filters as a JSON object')
    .option('--dry-run', 'Print the plan without writing anything', false)
    .option('--no-exports', 'Skip the exports step')
    .option('--resume', 'Resume a failed run at its failed step', false)
    .option('--json', 'Print the result as JSON', false)
    .action(async (opts) => {
      const { db, steps } = requireProject();
      const result = await runDailyPipeline(
        db,
        {
          as_of_date: opts.asOf as string,
          pipeline_version: opts.pipelineVersion as string,
          scope_filters: parseJsonFlag(opts.filters as string | undefined, '--filters'),
          mode: opts.dryRun ? 'dry_run' : 'materialize',
          emit_exports: opts.exports as boolean,
        },
        { steps, requestedBy: 'cli', resume: opts.resume as boolean },
      );

      if (opts.json) {
        printJson(result);
        return;
      }
      if (result.mode === 'dry_run') {
        console.log('[DRY RUN] – nothing was written');
        console.log(`  Inputs hash: ${result.inputs_hash}`);
        console.log(`  Steps:       ${result.ordered_steps.join(' -> ')}`);
        return;
      }
      printRunStatus(getRunStatus(db, result.run_id));
      if (result.status === 'failed') process.exitCode = 1;
    });

  program
    .command('status <ref>')
    .description('Show a run and its steps by run id or inputs hash')
    .option('--json', 'Print as JSON', false)
    .action((ref: string, opts) => {
      const { db } = requireProject();
      const view = getRunStatus(db, ref);
      if (opts.json) printJson(view);
      else printRunStatus(view);
    });

  const runs = program.command('runs').description('Inspect and operate on pipeline runs');

  runs
    .command('list')
    .description('List pipeline runs, newest first')
    .option('--status <status>', `Filter by status: ${RUN_MACHINE.states.join(', ')}`)
    .option('--limit <n>', 'Maximum rows', '20')
    .action((opts) => {
      const status = opts.status as string | undefined;
      if (status !== undefined && !RUN_MACHINE.isState(status)) {
        console.error(`Invalid status: ${status}`);
        process.exit(1);
      }
      const { db } = requireProject();
      const items = listRuns(db, { status, limit: parseInt(opts.limit as string, 10) });
      if (items.length === 0) {
        console.log('No runs found.');
        return;
      }
      for (const run of items) {
        console.log(`  [${run.status.toUpperCase().padEnd(7)}] ${run.id}  ${run.as_of_date}  ${run.pipeline_version}`);
      }
    });

  runs
    .command('force-fail <ref>')
    .description('Mark a stuck running run as failed so it can be resumed')
    .option('--reason <reason>', 'Why the run is being failed')
    .action((ref: string, opts) => {
      const { db } = requireProject();
      const run = requireRun(db, ref);
      forceFailRun(db, run.id, { actor: 'cli', reason: opts.reason as string | undefined });
      console.log(`Run ${run.id} marked failed. Re-run the same request with --resume to continue.`);
    });
}
