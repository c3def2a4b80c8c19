import type { AppConfig } from '../../config.js';
import type { ReasoningEngine } from '../../llm/interfaces.js';
import type { ToolRegistry } from '../../tools/registry.js';
import type { RunContext } from '../context.js';
import type { AgentEvent } from '../events.js';

/**
 * How a mode ended: ran to completion, handed a captured plan back to the
 * runner, or failed with an error event already emitted.
 */
export type ModeOutcome = 'completed' | 'handoff' | 'failed';

export type ModeDeps = {
  cfg: AppConfig;
  engine: ReasoningEngine;
  tools: ToolRegistry;
};

export interface ExecutionMode {
  readonly name: string;
  execute(ctx: RunContext): AsyncGenerator<AgentEvent, ModeOutcome, undefined>;
}
