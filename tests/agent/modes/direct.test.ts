import { describe, expect, it } from 'vitest';
import { RunContext } from '../../../src/agent/context.js';
import type { AgentEvent } from '../../../src/agent/events.js';
import type { ModeOutcome } from '../../../src/agent/modes/base.js';
import { DirectMode } from '../../../src/agent/modes/direct.js';
import { RecursionLimitError } from '../../../src/errors.js';
import type { EngineRequest, RawEngineEvent } from '../../../src/llm/interfaces.js';
import planCreate from '../../../src/tools/impl/plan_create.js';
import planUpdate from '../../../src/tools/impl/plan_update.js';
import { ToolRegistry } from '../../../src/tools/registry.js';
import { ScriptedEngine, callTool, reply, testConfig } from '../../helpers/scriptedEngine.js';
import type { Script } from '../../helpers/scriptedEngine.js';

async function execute(scripts: Script[]) {
  const engine = new ScriptedEngine(scripts);
  const mode = new DirectMode({ cfg: testConfig(), engine, tools: new ToolRegistry([planCreate, planUpdate]) });
  const ctx = new RunContext({ sessionId: 'test-session' });
  ctx.message = 'hello';
  return ctx.run(async () => {
    const events: AgentEvent[] = [];
    const gen = mode.execute(ctx);
    let outcome: ModeOutcome;
    for (;;) {
      const step = await gen.next();
      if (step.done) {
        outcome = step.value;
        break;
      }
      events.push(step.value);
    }
    return { events, outcome, engine, ctx };
  });
}

describe('DirectMode', () => {
  it('forwards adapted events and completes', async () => {
    const { events, outcome, engine } = await execute([reply('r1', ['Hi ', 'there'])]);
    expect(outcome).toBe('completed');
    expect(events.map(e => e.type)).toEqual(['llm_start', 'token', 'token', 'llm_end']);
    const req = engine.requests[0];
    expect(req.origin).toBe('agent');
    expect(req.recursionLimit).toBe(25);
    expect(req.tools.map(t => t.name)).toEqual(['plan_create', 'plan_update']);
    expect(req.messages).toEqual([{ role: 'user', content: 'hello' }]);
  });

  it('hands off as soon as plan_create completes', async () => {
    let continued = false;
    async function* planning(req: EngineRequest): AsyncGenerator<RawEngineEvent, void, undefined> {
      yield* reply('r1', ['Planning.']);
      yield* callTool(req, 't1', 'plan_create', { title: 'Trip', steps: ['a', 'b', 'c'] });
      continued = true;
      yield* reply('r2', ['should not be read']);
    }
    const { events, outcome, ctx } = await execute([planning]);
    expect(outcome).toBe('handoff');
    expect(continued).toBe(false);
    expect(events.at(-1)).toMatchObject({ type: 'tool_end', tool: 'plan_create' });
    expect(ctx.plan?.steps).toHaveLength(3);
    expect(ctx.takePlanEvents().map(e => e.type)).toEqual(['plan_created']);
  });

  it('ends with an error event when the engine fails', async () => {
    async function* broken(): AsyncGenerator<RawEngineEvent, void, undefined> {
      yield* reply('r1', ['partial']);
      throw new RecursionLimitError(25);
    }
    const { events, outcome } = await execute([broken]);
    expect(outcome).toBe('failed');
    expect(events.map(e => e.type)).toEqual(['llm_start', 'token', 'llm_end', 'error']);
    expect(events.at(-1)).toEqual({ type: 'error', content: 'Recursion limit of 25 reached without a final answer' });
  });
});
