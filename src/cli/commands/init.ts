import type { Command } from 'commander';
import { initProject } from '../../config/config.js';

export function registerInitCommand(program: Command): void {
  program
    .command('init')
    .description('Initialize a finpipe project in the current directory')
    .option('--force', 'Reinitialize even if the project already exists', false)
    .action((opts) => {
      try {
        const { paths, config } = initProject({ force: opts.force as boolean });
        console.log(`Project initialized at ${paths.root}`);
        console.log(`  Instance ID:   ${config.instance_id}`);
        console.log(`  Position book: ${config.sources.position_book}`);
        console.log(`  Market feed:   ${config.sources.market_feed}`);
        console.log(`\nNext steps:`);
        console.log(`  finpipe ingest --as-of <date>   – load market prices`);
        console.log(`  finpipe run --as-of <date>      – run the daily pipeline`);
        console.log(`  finpipe serve                   – start the API`);
      } catch (err) {
        console.error(`Init failed: ${(err as Error).message}`);
        process.exit(1);
      }
    });
}
