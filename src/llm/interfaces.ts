import type { z } from 'zod';
import type { RunContext } from '../agent/context.js';
import type { AgentEvent } from '../agent/events.js';
import type { ToolSpec } from '../tools/types.js';

export type EngineToolCall = { id: string; name: string; args: unknown };

export type EngineMessage =
  | { role: 'user'; content: string }
  | { role: 'assistant'; content: string; toolCalls?: EngineToolCall[] }
  | { role: 'tool'; content: string; toolCallId: string };

export type EngineRequest = {
  system: string;
  messages: EngineMessage[];
  tools: ToolSpec[];
  context: RunContext;
  /** Maximum model calls before the loop gives up. */
  recursionLimit: number;
  /** Label carried on every raw event, e.g. "agent" or "executor". */
  origin: string;
  signal?: AbortSignal;
};

/**
 * Provider-neutral events produced while the engine reasons and calls tools.
 * `step_end.pendingEvents` is cumulative for the whole stream.
 */
export type RawEngineEvent =
  | { kind: 'chat_start'; runId: string; origin: string; model: string; messages: EngineMessage[] }
  | { kind: 'chat_delta'; runId: string; origin: string; text: string }
  | { kind: 'chat_end'; runId: string; origin: string; output: string }
  | { kind: 'tool_start'; runId: string; origin: string; name: string; input: unknown }
  | { kind: 'tool_end'; runId: string; origin: string; name: string; output: string }
  | { kind: 'step_end'; runId: string; origin: string; pendingEvents: AgentEvent[] };

export interface ReasoningEngine {
  readonly name: string;
  readonly model: string;
  stream(request: EngineRequest): AsyncIterable<RawEngineEvent>;
  decide<S extends z.ZodTypeAny>(prompt: string, schema: S, signal?: AbortSignal): Promise<z.infer<S>>;
}
