import type { RunContext } from '../context.js';
import type { AgentEvent } from '../events.js';

/**
 * A stage between the modes and the delivery layer. `onEvent` returns the
 * event to pass on (possibly rewritten) or null to drop it.
 */
export interface Middleware {
  readonly name: string;
  onRunStart?(ctx: RunContext): void | Promise<void>;
  onEvent?(event: AgentEvent, ctx: RunContext): AgentEvent | null | Promise<AgentEvent | null>;
  onRunEnd?(ctx: RunContext): void | Promise<void>;
}

export class MiddlewarePipeline {
  constructor(private middlewares: readonly Middleware[] = []) {}

  get size(): number {
    return this.middlewares.length;
  }

  async start(ctx: RunContext): Promise<void> {
    for (const m of this.middlewares) await m.onRunStart?.(ctx);
  }

  async process(event: AgentEvent, ctx: RunContext): Promise<AgentEvent | null> {
    let current: AgentEvent | null = event;
    for (const m of this.middlewares) {
      if (!m.onEvent) continue;
      current = await m.onEvent(current, ctx);
      if (current === null) return null;
    }
    return current;
  }

  // Every middleware gets its end hook even if an earlier one throws.
  async end(ctx: RunContext): Promise<void> {
    const failures: unknown[] = [];
    for (const m of this.middlewares) {
      try {
        await m.onRunEnd?.(ctx);
      } catch (err) {
        failures.push(err);
      }
    }
    if (failures.length === 1) throw failures[0];
    if (failures.length > 1) throw new AggregateError(failures, 'Several middlewares failed to end the run');
  }
}
