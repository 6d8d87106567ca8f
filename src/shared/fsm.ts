export interface TransitionEdge<S extends string> {
  from: readonly S[];
  to: S;
  /** Only taken when the caller asks for a resume. */
  resume?: boolean;
}

export interface TransitionOptions {
  resume?: boolean;
  /** Accept `current === desired` as a no-op. Defaults to true. */
  idempotent?: boolean;
}

export type TransitionResult<S extends string> =
  | { ok: true; state: S; changed: boolean }
  | { ok: false; error: string };

/**
 * Forward-only state machine used by runs, steps, snapshot runs, export jobs
 * and workflow requests. The same table drives in-memory checks and the
 * `status IN (...)` set of the conditional UPDATE.
 */
export class StateMachine<S extends string> {
  readonly name: string;
  readonly states: readonly S[];
  readonly terminal: readonly S[];
  private readonly edges: readonly TransitionEdge<S>[];

  constructor(
    name: string,
    states: readonly S[],
    edges: readonly TransitionEdge<S>[],
    terminal: readonly S[],
  ) {
    this.name = name;
    this.states = states;
    this.edges = edges;
    this.terminal = terminal;
  }

  isState(value: string): value is S {
    return (this.states as readonly string[]).includes(value);
  }

  isTerminal(state: S): boolean {
    return this.terminal.includes(state);
  }

  canTransition(from: S, to: S, opts: TransitionOptions = {}): boolean {
    return this.edges.some(
      (edge) => edge.to === to && edge.from.includes(from) && (!edge.resume || opts.resume === true),
    );
  }

  transition(current: S, desired: S, opts: TransitionOptions = {}): TransitionResult<S> {
    if (current === desired && opts.idempotent !== false) {
      return { ok: true, state: current, changed: false };
    }
    if (this.canTransition(current, desired, opts)) {
      return { ok: true, state: desired, changed: true };
    }
    return {
      ok: false,
      error: `${this.name}: illegal transition ${current} -> ${desired}`,
    };
  }

  /** States from which `to` may be reached, for the guard's `status IN (...)`. */
  allowedFrom(to: S, opts: TransitionOptions = {}): S[] {
    const from = new Set<S>();
    for (const edge of this.edges) {
      if (edge.to !== to) continue;
      if (edge.resume && opts.resume !== true) continue;
      for (const state of edge.from) from.add(state);
    }
    if (opts.idempotent !== false) from.add(to);
    return this.states.filter((state) => from.has(state));
  }
}
