import type { AppConfig } from '../config.js';
import type { ReasoningEngine } from '../llm/interfaces.js';
import type { EngineMessage } from '../llm/interfaces.js';
import { createLogger } from '../observability/logger.js';
import { ApprovalGate } from '../policy/approvals.js';
import type { ApprovalRegistry } from '../policy/approvals.js';
import type { ToolRegistry } from '../tools/registry.js';
import { cacheKey, getOrGenerate } from './cache.js';
import type { EventCache } from './cache.js';
import type { RunContext } from './context.js';
import { buildDone, buildToken } from './events.js';
import type { AgentEvent } from './events.js';
import { MiddlewarePipeline } from './middleware/pipeline.js';
import type { Middleware } from './middleware/pipeline.js';
import { DirectMode } from './modes/direct.js';
import type { ModeOutcome } from './modes/base.js';
import { PlanMode } from './modes/plan.js';
import { buildSystemPrompt, convertHistory } from './prompt.js';
import { Replanner } from './replanner.js';
import type { Plan, Turn } from './types.js';

export const REJECTION_MESSAGE = '\n\nThe plan was rejected; none of its steps were run.';

export type RunnerDeps = {
  cfg: AppConfig;
  engine: ReasoningEngine;
  tools: ToolRegistry;
  /** Used only when ENABLE_LLM_CACHE is on. */
  cache?: EventCache;
  /** Where a delivery layer finds the gate to answer an approval request. */
  approvals?: ApprovalRegistry;
};

export type RunRequest = {
  message: string;
  history?: readonly Turn[];
  ctx: RunContext;
  middlewares?: readonly Middleware[];
};

const log = createLogger('runner');

/**
 * Entry point for one request: Direct mode, then (when a plan was declared
 * and approved) Plan mode, with every event passed through the middleware
 * chain. The returned stream runs inside the context's scope.
 */
export function runAgent(deps: RunnerDeps, req: RunRequest): AsyncGenerator<AgentEvent, void, undefined> {
  return req.ctx.bind(runScoped(deps, req));
}

async function* runScoped(deps: RunnerDeps, req: RunRequest): AsyncGenerator<AgentEvent, void, undefined> {
  const { ctx } = req;
  ctx.message = req.message;
  ctx.history = [...(req.history ?? [])];
  const pipeline = new MiddlewarePipeline(req.middlewares ?? []);

  try {
    await pipeline.start(ctx);
    for await (const event of selectSource(deps, ctx)) {
      const out = await pipeline.process(event, ctx);
      if (out) yield out;
    }
  } finally {
    try {
      await pipeline.end(ctx);
    } finally {
      ctx.dispose();
    }
  }
}

function selectSource(deps: RunnerDeps, ctx: RunContext): AsyncGenerator<AgentEvent, void, undefined> {
  const { cfg, cache } = deps;
  if (!cfg.ENABLE_LLM_CACHE || !cache) return orchestrate(deps, ctx);

  const key = cacheKey({
    system: buildSystemPrompt(deps.tools.list()),
    history: ctx.history,
    message: ctx.message,
    model: deps.engine.model,
    temperature: cfg.LLM_TEMPERATURE,
    maxTokens: cfg.LLM_MAX_TOKENS,
  });
  return getOrGenerate(cache, key, () => orchestrate(deps, ctx), {
    // Plans depend on approval and tool side effects; never replay them.
    storable: events => events.at(-1)?.type === 'done' && !events.some(e => e.type === 'plan_created'),
    sessionId: ctx.sessionId,
    signal: ctx.signal,
  });
}

/**
 * Forwards a mode's events, slotting in plan-channel events published since
 * the previous one so the stream keeps the order in which things happened.
 */
async function* drive(mode: AsyncGenerator<AgentEvent, ModeOutcome, undefined>, ctx: RunContext): AsyncGenerator<AgentEvent, ModeOutcome, undefined> {
  let finished = false;
  try {
    for (;;) {
      const step = await mode.next();
      yield* ctx.takePlanEvents();
      if (step.done) {
        finished = true;
        return step.value;
      }
      yield step.value;
    }
  } finally {
    // Consumer stopped early: close the mode and the engine stream under it.
    if (!finished) await mode.return('failed');
  }
}

async function* orchestrate(deps: RunnerDeps, ctx: RunContext): AsyncGenerator<AgentEvent, void, undefined> {
  const outcome = yield* drive(new DirectMode(deps).execute(ctx), ctx);
  if (outcome === 'failed') return;

  const plan = ctx.plan;
  if (!plan) {
    yield buildDone();
    return;
  }

  if (deps.cfg.PLAN_REQUIRE_APPROVAL) {
    const approved = yield* awaitApproval(deps, ctx, plan);
    if (!approved) {
      log.info('plan rejected', { session: ctx.sessionId, planId: plan.planId });
      yield buildToken(REJECTION_MESSAGE);
      yield buildDone();
      return;
    }
  }

  const baseMessages: EngineMessage[] = [...convertHistory(ctx.history), { role: 'user', content: ctx.message }];
  const mode = new PlanMode({ ...deps, replanner: new Replanner(deps) }, plan, baseMessages);
  yield* drive(mode.execute(ctx), ctx);
}

async function* awaitApproval(deps: RunnerDeps, ctx: RunContext, plan: Plan): AsyncGenerator<AgentEvent, boolean, undefined> {
  const { cfg, approvals } = deps;
  const gate = new ApprovalGate(ctx);
  approvals?.register(plan.planId, gate);
  try {
    ctx.emitPlanEvent({ type: 'plan_approval_request', planId: plan.planId, title: plan.title, steps: plan.steps.map(s => ({ ...s })) });
    yield* ctx.takePlanEvents();
    log.info('waiting for plan approval', { session: ctx.sessionId, planId: plan.planId, steps: plan.steps.length });
    return await gate.wait(plan.planId, {
      timeoutMs: cfg.APPROVAL_TIMEOUT_MS,
      onTimeout: cfg.APPROVAL_TIMEOUT_POLICY,
      signal: ctx.signal,
    });
  } finally {
    approvals?.unregister(plan.planId);
  }
}
