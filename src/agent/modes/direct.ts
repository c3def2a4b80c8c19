import { describeError, isAbort } from '../../errors.js';
import type { EngineMessage } from '../../llm/interfaces.js';
import { createLogger } from '../../observability/logger.js';
import { PLAN_CREATE } from '../../tools/impl/plan_create.js';
import { EventStreamAdapter } from '../adapter.js';
import type { RunContext } from '../context.js';
import { buildError } from '../events.js';
import type { AgentEvent } from '../events.js';
import { buildSystemPrompt, convertHistory } from '../prompt.js';
import type { ExecutionMode, ModeDeps, ModeOutcome } from './base.js';

const log = createLogger('direct');

/** First phase: one ReAct loop with every tool, plan_create included. */
export class DirectMode implements ExecutionMode {
  readonly name = 'direct';

  constructor(private deps: ModeDeps) {}

  async *execute(ctx: RunContext): AsyncGenerator<AgentEvent, ModeOutcome, undefined> {
    const { cfg, engine } = this.deps;
    const tools = this.deps.tools.list();
    const system = buildSystemPrompt(tools);
    const messages: EngineMessage[] = [...convertHistory(ctx.history), { role: 'user', content: ctx.message }];

    const source = engine.stream({
      system,
      messages,
      tools,
      context: ctx,
      recursionLimit: cfg.RECURSION_LIMIT,
      origin: 'agent',
      signal: ctx.signal,
    });

    try {
      for await (const event of new EventStreamAdapter().adapt(source, { system })) {
        yield event;
        // A declared plan ends this phase; the runner takes over.
        if (event.type === 'tool_end' && event.tool === PLAN_CREATE && ctx.plan) return 'handoff';
      }
    } catch (err) {
      if (isAbort(err, ctx.signal)) throw err;
      log.error('direct mode failed', { session: ctx.sessionId, model: engine.model, error: describeError(err) });
      yield buildError(describeError(err));
      return 'failed';
    }
    return 'completed';
  }
}
