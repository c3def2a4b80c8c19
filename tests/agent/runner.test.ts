import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import { MemoryEventCache } from '../../src/agent/cache.js';
import type { EventCache } from '../../src/agent/cache.js';
import { RunContext } from '../../src/agent/context.js';
import type { AgentEvent, EventOf } from '../../src/agent/events.js';
import { DebugMiddleware } from '../../src/agent/middleware/debug.js';
import type { Middleware } from '../../src/agent/middleware/pipeline.js';
import { REJECTION_MESSAGE, runAgent } from '../../src/agent/runner.js';
import type { RunnerDeps } from '../../src/agent/runner.js';
import type { EngineRequest, RawEngineEvent } from '../../src/llm/interfaces.js';
import { ApprovalRegistry } from '../../src/policy/approvals.js';
import planCreate from '../../src/tools/impl/plan_create.js';
import planUpdate from '../../src/tools/impl/plan_update.js';
import { ToolRegistry } from '../../src/tools/registry.js';
import type { ToolSpec } from '../../src/tools/types.js';
import { ScriptedEngine, callTool, collect, reply, testConfig } from '../helpers/scriptedEngine.js';
import type { Script } from '../helpers/scriptedEngine.js';

const TRIP = { title: 'Book a trip', steps: ['Search flights', 'Book flight', 'Send confirmation'] };

async function* planning(req: EngineRequest): AsyncGenerator<RawEngineEvent, void, undefined> {
  yield* reply('r1', ['Planning.']);
  yield* callTool(req, 't1', 'plan_create', TRIP);
}

function deps(scripts: Script[], env: Record<string, string> = {}, extra: Partial<RunnerDeps> = {}) {
  const engine = new ScriptedEngine(scripts);
  const approvals = new ApprovalRegistry();
  const d: RunnerDeps = {
    cfg: testConfig(env),
    engine,
    tools: new ToolRegistry([planCreate, planUpdate]),
    approvals,
    ...extra,
  };
  return { d, engine, approvals };
}

function newCtx() {
  return new RunContext({ sessionId: 'test-session' });
}

/** Consumes a run, answering an approval request with `answer`. */
async function consume(stream: AsyncIterable<AgentEvent>, approvals: ApprovalRegistry, answer?: boolean) {
  const events: AgentEvent[] = [];
  for await (const event of stream) {
    events.push(event);
    if (event.type === 'plan_approval_request' && answer !== undefined) approvals.resolve(event.planId, answer);
  }
  return events;
}

function counting() {
  const calls = { start: 0, end: 0, seen: 0 };
  const mw: Middleware = {
    name: 'counting',
    onRunStart: () => { calls.start += 1; },
    onEvent: e => { calls.seen += 1; return e; },
    onRunEnd: () => { calls.end += 1; },
  };
  return { calls, mw };
}

describe('runAgent', () => {
  it('answers directly and ends with done', async () => {
    const { d } = deps([reply('r1', ['Hello'])]);
    const events = await collect(runAgent(d, { message: 'hi', ctx: newCtx() }));
    expect(events.map(e => e.type)).toEqual(['llm_start', 'token', 'llm_end', 'done']);
  });

  it('passes history to the engine', async () => {
    const { d, engine } = deps([reply('r1', ['ok'])]);
    await collect(runAgent(d, {
      message: 'and now?',
      history: [{ role: 'user', content: 'first' }, { role: 'assistant', content: 'answer' }],
      ctx: newCtx(),
    }));
    expect(engine.requests[0].messages).toEqual([
      { role: 'user', content: 'first' },
      { role: 'assistant', content: 'answer' },
      { role: 'user', content: 'and now?' },
    ]);
  });

  it('on rejection emits one rejection token and one done and never runs the plan', async () => {
    const { d, engine, approvals } = deps([planning]);
    const events = await consume(runAgent(d, { message: 'book it', ctx: newCtx() }), approvals, false);

    expect(events.map(e => e.type)).toEqual([
      'llm_start', 'token', 'llm_end', 'tool_start', 'plan_created', 'tool_end',
      'plan_approval_request', 'token', 'done',
    ]);
    const afterRequest = events.slice(events.findIndex(e => e.type === 'plan_approval_request') + 1);
    expect(afterRequest).toEqual([{ type: 'token', content: REJECTION_MESSAGE }, { type: 'done' }]);
    expect(engine.requests).toHaveLength(1);
    const request = events.find((e): e is EventOf<'plan_approval_request'> => e.type === 'plan_approval_request');
    expect(request?.title).toBe('Book a trip');
    expect(approvals.has(request?.planId ?? '')).toBe(false);
  });

  it('runs the plan once approved', async () => {
    const { d, engine, approvals } = deps([
      planning,
      reply('s1', ['flights found'], 'executor'),
      reply('s2', ['booked'], 'executor'),
      reply('s3', ['sent'], 'executor'),
    ]);
    const events = await consume(runAgent(d, { message: 'book it', ctx: newCtx() }), approvals, true);

    const statuses = events.flatMap(e => (e.type === 'plan_updated' ? [`${e.stepId}:${e.status}`] : []));
    expect(statuses).toEqual(['1:running', '1:completed', '2:running', '2:completed', '3:running', '3:completed']);
    expect(events.filter(e => e.type === 'done')).toHaveLength(1);
    expect(events.at(-1)).toEqual({ type: 'done' });
    expect(engine.requests.map(r => r.origin)).toEqual(['agent', 'executor', 'executor', 'executor']);
    expect(engine.requests[1].messages.at(-1)).toEqual({ role: 'user', content: 'Execute step 1: Search flights' });
  });

  it('skips the gate when approval is off', async () => {
    const { d, approvals } = deps(
      [planning, reply('s1', ['a'], 'executor'), reply('s2', ['b'], 'executor'), reply('s3', ['c'], 'executor')],
      { PLAN_REQUIRE_APPROVAL: 'false' },
    );
    const events = await consume(runAgent(d, { message: 'book it', ctx: newCtx() }), approvals);
    expect(events.some(e => e.type === 'plan_approval_request')).toBe(false);
    expect(events.filter(e => e.type === 'plan_updated' && e.status === 'completed')).toHaveLength(3);
  });

  it('applies the timeout policy to an unanswered request', async () => {
    const { d, approvals } = deps([planning], { APPROVAL_TIMEOUT_MS: '20', APPROVAL_TIMEOUT_POLICY: 'reject' });
    const events = await consume(runAgent(d, { message: 'book it', ctx: newCtx() }), approvals);
    expect(events.slice(-2)).toEqual([{ type: 'token', content: REJECTION_MESSAGE }, { type: 'done' }]);
  });

  it('ends with an error and no done when direct mode fails', async () => {
    const { d } = deps([]);
    const events = await collect(runAgent(d, { message: 'hi', ctx: newCtx() }));
    expect(events).toEqual([{ type: 'error', content: 'no script left' }]);
  });

  it('routes every event through the middleware chain', async () => {
    const { d } = deps([reply('r1', ['Hello'])]);
    const { calls, mw } = counting();
    const events = await collect(runAgent(d, { message: 'hi', ctx: newCtx(), middlewares: [new DebugMiddleware('off'), mw] }));
    expect(events.map(e => e.type)).toEqual(['token', 'done']);
    expect(calls).toEqual({ start: 1, end: 1, seen: 2 });
  });

  it('fires onRunEnd once when the consumer stops early', async () => {
    const { d } = deps([reply('r1', ['a', 'b', 'c'])]);
    const { calls, mw } = counting();
    const ctx = newCtx();
    for await (const event of runAgent(d, { message: 'hi', ctx, middlewares: [mw] })) {
      if (event.type === 'token') break;
    }
    expect(calls.start).toBe(1);
    expect(calls.end).toBe(1);
    expect(ctx.planEvents.isClosed).toBe(true);
  });

  it('fires onRunEnd once when a middleware throws', async () => {
    const { d } = deps([reply('r1', ['a'])]);
    const { calls, mw } = counting();
    const failing: Middleware = {
      name: 'failing',
      onEvent: e => {
        if (e.type === 'token') throw new Error('middleware broke');
        return e;
      },
    };
    await expect(collect(runAgent(d, { message: 'hi', ctx: newCtx(), middlewares: [mw, failing] }))).rejects.toThrow('middleware broke');
    expect(calls.end).toBe(1);
  });

  it('surfaces events a tool reports about its own call after the result', async () => {
    const schema = z.object({});
    const remote: ToolSpec<typeof schema> = {
      name: 'remote_job',
      description: 'Runs a job on a remote worker.',
      schema,
      parameters: { type: 'object', properties: {} },
      async run(_args, ctx) {
        ctx.notify({ type: 'token', content: '[job queued]' });
        return 'job finished';
      },
    };
    async function* useRemote(req: EngineRequest): AsyncGenerator<RawEngineEvent, void, undefined> {
      yield* reply('r1', ['Starting.']);
      yield* callTool(req, 't1', 'remote_job', {});
      yield* reply('r2', ['Finished.']);
    }
    const { d } = deps([useRemote], {}, { tools: new ToolRegistry([planCreate, planUpdate, remote]) });
    const events = await collect(runAgent(d, { message: 'run the job', ctx: newCtx() }));
    expect(events.map(e => (e.type === 'token' ? `token:${e.content}` : e.type))).toEqual([
      'llm_start', 'token:Starting.', 'llm_end',
      'tool_start', 'tool_end', 'token:[job queued]',
      'llm_start', 'token:Finished.', 'llm_end',
      'done',
    ]);
  });

  it('finishes the plan when an executor settles later steps itself', async () => {
    async function* jumpAhead(req: EngineRequest): AsyncGenerator<RawEngineEvent, void, undefined> {
      yield* callTool(req, 'u1', 'plan_update', { plan_id: req.context.plan?.planId, step_id: 3, status: 'running' });
      yield* reply('s1', ['searched'], 'executor');
    }
    const { d, engine } = deps(
      [planning, jumpAhead, reply('s3', ['sent'], 'executor')],
      { PLAN_REQUIRE_APPROVAL: 'false' },
    );
    const events = await collect(runAgent(d, { message: 'book it', ctx: newCtx() }));

    expect(events.some(e => e.type === 'error')).toBe(false);
    expect(events.at(-1)).toEqual({ type: 'done' });
    expect(engine.requests).toHaveLength(3);
    const statuses = events.flatMap(e => (e.type === 'plan_updated' ? [`${e.stepId}:${e.status}`] : []));
    expect(statuses).toContain('2:completed');
    expect(statuses.at(-1)).toBe('3:completed');
    expect(statuses.filter(s => s.endsWith(':running'))).toEqual(['1:running', '3:running']);
  });

  it('replays a cached run without calling the engine', async () => {
    const cache = new MemoryEventCache(60_000);
    const { d, engine } = deps([reply('r1', ['cached answer'])], { ENABLE_LLM_CACHE: 'true' }, { cache });
    const first = await collect(runAgent(d, { message: 'same question', ctx: newCtx() }));
    const second = await collect(runAgent(d, { message: 'same question', ctx: newCtx() }));
    expect(second).toEqual(first);
    expect(engine.requests).toHaveLength(1);
    expect(cache.size).toBe(1);
  });

  it('does not store runs that declared a plan', async () => {
    const cache = new MemoryEventCache(60_000);
    const { d, approvals } = deps([planning], { ENABLE_LLM_CACHE: 'true' }, { cache });
    await consume(runAgent(d, { message: 'book it', ctx: newCtx() }), approvals, false);
    expect(cache.size).toBe(0);
  });

  it('falls back to the uncached path when the cache fails', async () => {
    const broken: EventCache = {
      get: async () => { throw new Error('disk gone'); },
      set: async () => { throw new Error('disk gone'); },
      invalidate: async () => {},
    };
    const { d } = deps([reply('r1', ['fresh'])], { ENABLE_LLM_CACHE: 'true' }, { cache: broken });
    const events = await collect(runAgent(d, { message: 'hi', ctx: newCtx() }));
    expect(events.map(e => e.type)).toEqual(['llm_start', 'token', 'llm_end', 'done']);
  });
});
