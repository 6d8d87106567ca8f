import type { Command } from 'commander';
import { startServer } from '../../api/server.js';

export function registerServeCommand(program: Command): void {
  program
    .command('serve')
    .description('Start the local API server')
    .option('--host <host>', 'Bind host (default: from config)')
    .option('--port <port>', 'Port (default: from config)')
    .option('--with-scheduler', 'Also run the daily scheduler in this process', false)
    .action(async (opts) => {
      const port = opts.port === undefined ? undefined : parseInt(opts.port as string, 10);

      console.log('Starting finpipe API...');
      console.log('\nPress Ctrl+C to stop\n');

      await startServer({
        host: opts.host as string | undefined,
        port,
        withScheduler: opts.withScheduler as boolean,
      });
    });
}
