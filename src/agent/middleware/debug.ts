import type { RunContext } from '../context.js';
import type { AgentEvent } from '../events.js';
import type { Middleware } from './pipeline.js';

export const DEBUG_LEVELS = ['off', 'basic', 'full'] as const;
export type DebugLevel = (typeof DEBUG_LEVELS)[number];

export function isDebugLevel(value: string): value is DebugLevel {
  return DEBUG_LEVELS.some(level => level === value);
}

/**
 * Controls how much of the model-call bracketing reaches the client.
 * off: llm events are dropped unless the run asked for debug output.
 * basic: llm events pass without their prompt and reasoning payloads.
 * full: everything passes.
 */
export class DebugMiddleware implements Middleware {
  readonly name = 'debug';

  constructor(private level: DebugLevel = 'basic') {}

  onEvent(event: AgentEvent, ctx: RunContext): AgentEvent | null {
    if (event.type !== 'llm_start' && event.type !== 'llm_end') return event;
    const level = this.level === 'off' && ctx.debug ? 'basic' : this.level;
    if (level === 'off') return null;
    if (level === 'full') return event;
    if (event.type === 'llm_start') return { ...event, input: '' };
    const { reasoning: _reasoning, ...rest } = event;
    return rest;
  }
}
