import { describe, it, expect } from '@jest/globals';
import { RUN_MACHINE, STEP_MACHINE } from '../pipeline/status.js';

describe('StateMachine', () => {
  it('allows forward transitions and rejects backward ones', () => {
    expect(RUN_MACHINE.transition('queued', 'running')).toEqual({
      ok: true,
      state: 'running',
      changed: true,
    });
    const back = RUN_MACHINE.transition('done', 'running');
    expect(back.ok).toBe(false);
    if (!back.ok) expect(back.error).toBe('pipeline_run: illegal transition done -> running');
  });

  it('treats current === desired as an idempotent no-op unless disabled', () => {
    expect(STEP_MACHINE.transition('done', 'done')).toEqual({ ok: true, state: 'done', changed: false });
    expect(STEP_MACHINE.transition('running', 'running', { idempotent: false }).ok).toBe(false);
  });

  it('only takes resume edges when asked', () => {
    expect(RUN_MACHINE.canTransition('failed', 'running')).toBe(false);
    expect(RUN_MACHINE.canTransition('failed', 'running', { resume: true })).toBe(true);
  });

  it('derives the guard set for a conditional update', () => {
    expect(RUN_MACHINE.allowedFrom('running', { idempotent: false })).toEqual(['queued']);
    expect(RUN_MACHINE.allowedFrom('running', { resume: true, idempotent: false })).toEqual([
      'queued',
      'failed',
    ]);
    expect(STEP_MACHINE.allowedFrom('done')).toEqual(['running', 'done']);
  });

  it('knows its states and the terminal ones', () => {
    expect(RUN_MACHINE.isTerminal('done')).toBe(true);
    expect(RUN_MACHINE.isTerminal('failed')).toBe(false);
    expect(RUN_MACHINE.isState('failed')).toBe(true);
    expect(RUN_MACHINE.isState('skipped')).toBe(false);
    expect(STEP_MACHINE.isTerminal('skipped')).toBe(true);
  });
});
