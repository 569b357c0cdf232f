/**
 * Cancellable handle for one analysis run.
 */

import { EventEmitter } from 'node:events';
import { setImmediate } from 'node:timers/promises';
import type { AnalysisState } from './states';
import type { AnalysisOutcome, ProgressEvent } from './types';

export interface TaskContext {
  readonly signal: AbortSignal;
  setState(state: AnalysisState): void;
  reportProgress(event: ProgressEvent): void;
}

export class AnalysisTask {
  readonly result: Promise<AnalysisOutcome>;

  private readonly controller = new AbortController();
  private readonly emitter = new EventEmitter();
  private readonly events: ProgressEvent[] = [];
  private waiters: Array<() => void> = [];
  private settled = false;
  private currentState: AnalysisState = 'idle';

  constructor(run: (context: TaskContext) => Promise<AnalysisOutcome>) {
    const context: TaskContext = {
      signal: this.controller.signal,
      setState: (state) => this.setState(state),
      reportProgress: (event) => this.pushProgress(event),
    };

    this.result = (async () => {
      // Let the caller attach listeners before the first transition
      await setImmediate();
      try {
        return await run(context);
      } finally {
        this.settled = true;
        this.wake();
      }
    })();
  }

  get state(): AnalysisState {
    return this.currentState;
  }

  get aborted(): boolean {
    return this.controller.signal.aborted;
  }

  /** Stop before the next chunk. A request already in flight runs to completion. */
  abort(): void {
    this.controller.abort();
  }

  on(event: 'state', listener: (state: AnalysisState) => void): this {
    this.emitter.on(event, listener);
    return this;
  }

  off(event: 'state', listener: (state: AnalysisState) => void): this {
    this.emitter.off(event, listener);
    return this;
  }

  /**
   * Progress events in order, from the first one.
   * The stream ends when the task settles.
   */
  async *progress(): AsyncGenerator<ProgressEvent, void, undefined> {
    let index = 0;
    while (true) {
      if (index < this.events.length) {
        yield this.events[index++];
        continue;
      }
      if (this.settled) return;
      await new Promise<void>((resolve) => this.waiters.push(resolve));
    }
  }

  private setState(state: AnalysisState): void {
    if (state === this.currentState) return;
    this.currentState = state;
    this.emitter.emit('state', state);
  }

  private pushProgress(event: ProgressEvent): void {
    this.events.push(event);
    this.wake();
  }

  private wake(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const resolve of waiters) resolve();
  }
}
