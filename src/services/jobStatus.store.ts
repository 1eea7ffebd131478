import type { JobStatusBase, JobStatusView } from '../types/jobs';

type AnyJobStatus = JobStatusBase<unknown, unknown, string>;

/** Identifies the run that is allowed to write to a store. */
export interface RunToken {
  readonly generation: number;
}

/**
 * Holds one engine's status. Every method completes synchronously, so on
 * Node's single thread each read-modify-write is atomic with respect to the
 * batch's other workers and to pollers.
 */
export class JobStatusStore<TStatus extends AnyJobStatus> {
  private state: TStatus;
  private generation = 0;

  constructor(private readonly createIdle: () => TStatus) {
    this.state = createIdle();
  }

  /**
   * Starts a run unless one is in flight. The previous run's status is
   * replaced wholesale. Returns `null` when the engine is busy.
   */
  tryBegin(fields: Partial<Omit<TStatus, 'running'>>): RunToken | null {
    if (this.state.running) {
      return null;
    }

    const next = this.createIdle();
    Object.assign(next, fields);
    next.running = true;
    next.startedAt = new Date().toISOString();
    next.finishedAt = null;

    this.generation += 1;
    this.state = next;
    return { generation: this.generation };
  }

  isCurrent(token: RunToken): boolean {
    return token.generation === this.generation;
  }

  /** Applies `mutate` for the current run. Writes from a superseded run are dropped. */
  update(token: RunToken, mutate: (status: TStatus) => void): boolean {
    if (!this.isCurrent(token)) {
      return false;
    }
    mutate(this.state);
    return true;
  }

  publish(token: RunToken, results: TStatus['results'], counts: TStatus['counts']): boolean {
    return this.update(token, (status) => {
      status.results = results;
      status.counts = counts;
    });
  }

  finish(token: RunToken): boolean {
    return this.update(token, (status) => {
      status.running = false;
      status.finishedAt = new Date().toISOString();
    });
  }

  /** Advisory stop: clears `running` so a new run may start. In-flight work is not interrupted. */
  stop(): void {
    this.state.running = false;
  }

  isRunning(): boolean {
    return this.state.running;
  }

  results(): TStatus['results'] {
    return this.state.results;
  }

  snapshot(): TStatus {
    return {
      ...this.state,
      results: [...this.state.results],
      counts: { ...this.state.counts },
      log: [...this.state.log],
    };
  }

  view(): JobStatusView<TStatus> {
    const { results: _results, ...rest } = this.snapshot();
    return rest;
  }
}
