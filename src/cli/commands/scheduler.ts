import type { Command } from 'commander';
import { printJson, requireProject } from '../cli-shared.js';
import { DailyJobRunner } from '../../scheduler/daily-runner.js';
import { SqliteLeaseStore } from '../../scheduler/lease.js';

export function registerSchedulerCommand(program: Command): void {
  program
    .command('scheduler')
    .description('Run the daily ingest and pipeline jobs on a timer')
    .option('--once', 'Run a single tick and exit', false)
    .action(async (opts) => {
      const { db, feed, steps, config } = requireProject();
      const runner = new DailyJobRunner({
        db,
        feed,
        steps,
        leases: new SqliteLeaseStore(db),
        config: config.scheduler,
      });

      if (opts.once) {
        printJson(await runner.tick());
        return;
      }

      runner.start();
      console.log('Scheduler running. Press Ctrl+C to stop');
      process.on('SIGINT', () => {
        runner.stop();
        process.exit(0);
      });
    });
}
