import type { z } from 'zod';
import type { RunContext } from '../agent/context.js';
import type { AgentEvent } from '../agent/events.js';

/** JSON Schema advertised to the model for a tool's arguments. */
export type JsonSchema = {
  type: 'object';
  properties: Record<string, unknown>;
  required?: string[];
};

export type ToolContext = {
  run: RunContext;
  signal?: AbortSignal;
  /**
   * Reports an event that belongs with this tool call, such as progress from a
   * tool that wraps a remote server. The engine carries it on the round's
   * `step_end` and the stream adapter surfaces it after the tool's result.
   * Plan tools publish through `run.emitPlanEvent` instead.
   */
  notify(event: AgentEvent): void;
};

export interface ToolSpec<T extends z.ZodTypeAny = z.ZodTypeAny> {
  name: string;
  description: string;
  schema: T;
  parameters: JsonSchema;
  run(args: z.infer<T>, ctx: ToolContext): Promise<string>;
}
