import type { RawEngineEvent } from '../llm/interfaces.js';
import { buildToken } from './events.js';
import type { AgentEvent } from './events.js';
import { formatDebugInput } from './prompt.js';
import { ReasoningFilter } from './thinking.js';

export const LLM_INPUT_LIMIT = 5000;

export type AdaptOptions = {
  /** System prompt shown in llm_start input. */
  system: string;
  /** Overrides the origin reported by the engine (plan steps use "executor"). */
  origin?: string;
  motivation?: string;
  /** Step-scoped instruction shown in llm_start input. */
  instruction?: string;
};

type CallTrack = { startedAt: number; origin: string; model: string };

const MOTIVATIONS: Record<string, string> = {
  agent: 'Calling the model to reason about the request',
};

function stringifyInput(input: unknown): string {
  if (typeof input === 'string') return input;
  return JSON.stringify(input) ?? '';
}

/**
 * Translates one engine stream into canonical events. Create one adapter per
 * stream: its bracketing tables, side-channel cursor and reasoning filter all
 * live for exactly that stream.
 */
export class EventStreamAdapter {
  private calls = new Map<string, CallTrack>();
  private tools = new Map<string, number>();
  private surfaced = 0;
  private filter = new ReasoningFilter();

  constructor(private clock: () => number = Date.now) {}

  async *adapt(source: AsyncIterable<RawEngineEvent>, opts: AdaptOptions): AsyncGenerator<AgentEvent, void, undefined> {
    for await (const raw of source) {
      yield* this.translate(raw, opts);
    }
    const tail = this.filter.flush();
    if (tail) yield buildToken(tail);
  }

  translate(raw: RawEngineEvent, opts: AdaptOptions): AgentEvent[] {
    switch (raw.kind) {
      case 'chat_delta': {
        if (!raw.text) return [];
        const visible = this.filter.push(raw.text);
        return visible ? [buildToken(visible)] : [];
      }
      case 'chat_start': {
        const origin = opts.origin ?? raw.origin;
        this.calls.set(raw.runId, { startedAt: this.clock(), origin, model: raw.model });
        const input = formatDebugInput(opts.system, raw.messages, opts.instruction);
        return [{
          type: 'llm_start',
          runId: raw.runId,
          origin,
          model: raw.model,
          input: input.slice(0, LLM_INPUT_LIMIT),
          motivation: opts.motivation ?? MOTIVATIONS[origin] ?? 'Calling the model to handle the request',
        }];
      }
      case 'chat_end': {
        const tracked = this.calls.get(raw.runId);
        if (!tracked) return [];
        this.calls.delete(raw.runId);
        const reasoning = this.filter.takeReasoning();
        return [{
          type: 'llm_end',
          runId: raw.runId,
          origin: tracked.origin,
          model: tracked.model,
          durationMs: this.clock() - tracked.startedAt,
          output: raw.output,
          ...(reasoning ? { reasoning } : {}),
        }];
      }
      case 'tool_start': {
        this.tools.set(raw.runId, this.clock());
        return [{ type: 'tool_start', runId: raw.runId, tool: raw.name, input: stringifyInput(raw.input) }];
      }
      case 'tool_end': {
        const startedAt = this.tools.get(raw.runId);
        if (startedAt === undefined) return [];
        this.tools.delete(raw.runId);
        return [{ type: 'tool_end', runId: raw.runId, tool: raw.name, output: raw.output, durationMs: this.clock() - startedAt }];
      }
      case 'step_end': {
        // The list only grows; surface what was appended since last time.
        const fresh = raw.pendingEvents.slice(this.surfaced);
        this.surfaced = Math.max(this.surfaced, raw.pendingEvents.length);
        return fresh;
      }
      default: {
        const unreachable: never = raw;
        return unreachable;
      }
    }
  }
}
