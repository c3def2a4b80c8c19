import { AsyncLocalStorage } from 'node:async_hooks';
import { createLogger, serializeError } from '../observability/logger.js';
import { AsyncChannel } from './channel.js';
import type { AgentEvent } from './events.js';
import type { Plan, Turn } from './types.js';

export type ApprovalSignal = { planId: string; approved: boolean };

export type RunContextInit = {
  sessionId: string;
  debug?: boolean;
  stream?: boolean;
  signal?: AbortSignal;
};

const log = createLogger('context');

// Tracks which run owns the code currently executing.
const owningRun = new AsyncLocalStorage<RunContext>();

/**
 * Per-request state threaded through the runner, the modes and every tool
 * call. Created for one request and dropped once its stream is flushed.
 */
export class RunContext {
  readonly sessionId: string;
  readonly debug: boolean;
  readonly stream: boolean;
  readonly signal?: AbortSignal;

  message = '';
  history: Turn[] = [];
  plan: Plan | null = null;

  readonly planEvents = new AsyncChannel<AgentEvent>('plan-events');
  readonly approvals = new AsyncChannel<ApprovalSignal>('approvals');

  constructor(init: RunContextInit) {
    this.sessionId = init.sessionId;
    this.debug = init.debug ?? false;
    this.stream = init.stream ?? true;
    this.signal = init.signal;
  }

  /** True when called from code running on behalf of this run. */
  isOwner(): boolean {
    return owningRun.getStore() === this;
  }

  /** Runs `fn` (and everything it awaits) as owned by this run. */
  run<T>(fn: () => T): T {
    return owningRun.run(this, fn);
  }

  /** Pulls `source` step by step inside this run's scope. */
  bind<T>(source: AsyncGenerator<T, void, undefined>): AsyncGenerator<T, void, undefined> {
    const ctx = this;
    return (async function* scoped() {
      let finished = false;
      try {
        for (;;) {
          const step = await ctx.run(() => source.next());
          if (step.done) {
            finished = true;
            return;
          }
          yield step.value;
        }
      } finally {
        if (!finished) await ctx.run(() => source.return(undefined));
      }
    })();
  }

  /**
   * Publishes a plan event for the delivery stream. Never throws: a failed
   * publish is logged and dropped.
   */
  emitPlanEvent(event: AgentEvent): void {
    this.publish(this.planEvents, event);
  }

  resolveApproval(planId: string, approved: boolean): void {
    this.publish(this.approvals, { planId, approved });
  }

  /** Plan events published so far that the stream has not yet carried. */
  takePlanEvents(): AgentEvent[] {
    return this.planEvents.drain();
  }

  dispose(): void {
    this.planEvents.close();
    this.approvals.close();
  }

  // Calls from outside the run (a transport handler, a detached callback) are
  // re-entered on the next turn of the loop inside the run's scope.
  private publish<T>(channel: AsyncChannel<T>, item: T): void {
    if (this.isOwner()) {
      this.deliverSafely(channel, item);
      return;
    }
    try {
      setImmediate(() => this.run(() => this.deliverSafely(channel, item)));
    } catch (err) {
      log.warn('failed to schedule channel delivery', { session: this.sessionId, channel: channel.name, error: serializeError(err).message });
    }
  }

  private deliverSafely<T>(channel: AsyncChannel<T>, item: T): void {
    try {
      channel.deliver(item);
    } catch (err) {
      log.warn('channel delivery failed', { session: this.sessionId, channel: channel.name, error: serializeError(err).message });
    }
  }
}
