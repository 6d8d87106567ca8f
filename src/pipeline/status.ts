import { StateMachine } from '../shared/fsm.js';
import type { RunStatus, StepStatus } from './types.js';

export const RUN_MACHINE = new StateMachine<RunStatus>(
  'pipeline_run',
  ['queued', 'running', 'done', 'failed'],
  [
    { from: ['queued'], to: 'running' },
    { from: ['failed'], to: 'running', resume: true },
    { from: ['running'], to: 'done' },
    { from: ['running'], to: 'failed' },
  ],
  ['done'],
);

export const STEP_MACHINE = new StateMachine<StepStatus>(
  'pipeline_step',
  ['pending', 'running', 'done', 'failed', 'skipped'],
  [
    { from: ['pending'], to: 'running' },
    { from: ['failed'], to: 'running', resume: true },
    { from: ['running'], to: 'done' },
    { from: ['running'], to: 'failed' },
    { from: ['pending'], to: 'skipped' },
  ],
  ['done', 'skipped'],
);
