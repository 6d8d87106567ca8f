import type { Command } from 'commander';
import { printJson, requireProject } from '../cli-shared.js';
import { listExportJobs } from '../../exports/jobs.js';
import { runExportWorkerOnce } from '../../exports/worker.js';

export function registerExportsCommand(program: Command): void {
  const exportsCmd = program.command('exports').description('Inspect and process export jobs');

  exportsCmd
    .command('list')
    .description('List export jobs, newest first')
    .option('--json', 'Print as JSON', false)
    .action((opts) => {
      const { db } = requireProject();
      const jobs = listExportJobs(db);
      if (opts.json) {
        printJson(jobs);
        return;
      }
      if (jobs.length === 0) {
        console.log('No export jobs found.');
        return;
      }
      for (const job of jobs) {
        console.log(`  [${job.status.toUpperCase().padEnd(7)}] ${job.export_id}  ${job.export_type}  ${job.as_of}`);
      }
    });

  exportsCmd
    .command('work')
    .description('Process queued export jobs until the queue is empty')
    .option('--max <n>', 'Stop after this many jobs', '100')
    .action(async (opts) => {
      const { db } = requireProject();
      const max = parseInt(opts.max as string, 10);
      let processed = 0;
      while (processed < max) {
        const result = await runExportWorkerOnce(db, { actor: 'cli' });
        if (!result) break;
        processed++;
        console.log(`  ${result.status.padEnd(6)} ${result.export_id}`);
      }
      console.log(processed === 0 ? 'No queued export jobs.' : `Processed ${processed} job(s).`);
    });
}
