#!/usr/bin/env node
import { Command } from 'commander';
import { registerInitCommand } from './commands/init.js';
import { registerRunCommand } from './commands/run.js';
import { registerEventsCommand } from './commands/events.js';
import { registerExportsCommand } from './commands/exports.js';
import { registerApprovalsCommand } from './commands/approvals.js';
import { registerIngestCommand } from './commands/ingest.js';
import { registerSchedulerCommand } from './commands/scheduler.js';
import { registerServeCommand } from './commands/serve.js';

const program = new Command();

program
  .name('finpipe')
  .description('finpipe – daily snapshot pipeline for commodity back offices')
  .version('0.1.0');

registerInitCommand(program);
registerRunCommand(program);
registerEventsCommand(program);
registerExportsCommand(program);
registerApprovalsCommand(program);
registerIngestCommand(program);
registerSchedulerCommand(program);
registerServeCommand(program);

program.parseAsync(process.argv).catch((err: Error) => {
  console.error('Error:', err.message);
  process.exit(1);
});
