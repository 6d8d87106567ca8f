import { join } from 'node:path';

export interface FinpipePaths {
  root: string;         // .finpipe/
  config: string;       // .finpipe/config.yaml
  stateDb: string;      // .finpipe/state.db
}

export function getFinpipePaths(cwd: string = process.cwd()): FinpipePaths {
  const root = join(cwd, '.finpipe');
  return {
    root,
    config: join(root, 'config.yaml'),
    stateDb: join(root, 'state.db'),
  };
}
