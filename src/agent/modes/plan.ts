import { describeError, isAbort } from '../../errors.js';
import type { EngineMessage } from '../../llm/interfaces.js';
import { createLogger } from '../../observability/logger.js';
import { truncate } from '../../utils/text.js';
import { EventStreamAdapter } from '../adapter.js';
import type { RunContext } from '../context.js';
import { buildDone, buildPlanRevised, buildToken } from '../events.js';
import type { AgentEvent } from '../events.js';
import { clonePlan, failStep, forceComplete, reviseSteps, updateStepStatus } from '../plan.js';
import type { EmitFn } from '../plan.js';
import { buildExecutorPrompt, buildSystemPrompt } from '../prompt.js';
import { FAILURE_MARKER } from '../replanner.js';
import type { Replanner } from '../replanner.js';
import type { Plan, StepOutcome } from '../types.js';
import type { ExecutionMode, ModeDeps, ModeOutcome } from './base.js';

export const STEP_RESULT_CHARS = 1000;

const log = createLogger('plan');

export type PlanModeDeps = ModeDeps & { replanner: Replanner };

/**
 * Second phase: runs an approved plan one step at a time, each in its own
 * engine session with the executor tools, consulting the replanner between
 * steps.
 */
export class PlanMode implements ExecutionMode {
  readonly name = 'plan';
  private plan: Plan;
  private pastSteps: StepOutcome[] = [];

  constructor(
    private deps: PlanModeDeps,
    plan: Plan,
    private baseMessages: readonly EngineMessage[],
  ) {
    this.plan = clonePlan(plan);
  }

  get outcomes(): readonly StepOutcome[] {
    return this.pastSteps;
  }

  async *execute(ctx: RunContext): AsyncGenerator<AgentEvent, ModeOutcome, undefined> {
    const { cfg, replanner } = this.deps;
    const plan = this.plan;
    ctx.plan = plan;

    // Status changes go straight into the stream, in order with step output.
    const pending: AgentEvent[] = [];
    const emit: EmitFn = event => pending.push(event);
    const flush = () => pending.splice(0, pending.length);

    let index = 0;
    while (index < plan.steps.length && index < cfg.PLAN_MAX_STEPS) {
      const step = plan.steps[index];
      // An executor may already have settled this step through plan_update.
      if (step.status === 'completed' || step.status === 'failed') {
        log.info('step settled before it ran; skipping', { session: ctx.sessionId, step: step.id, status: step.status });
        this.pastSteps.push({ title: step.title, result: `(marked ${step.status} by an earlier step)` });
        index += 1;
        continue;
      }
      if (step.status === 'pending') updateStepStatus(plan, step.id, 'running', emit);
      yield* flush();

      let response = '';
      try {
        for await (const event of this.runStep(ctx, index)) {
          if (event.type === 'token') response += event.content;
          yield event;
        }
        if (step.status === 'running') updateStepStatus(plan, step.id, 'completed', emit);
      } catch (err) {
        if (isAbort(err, ctx.signal)) throw err;
        const message = describeError(err);
        log.error('plan step failed', { session: ctx.sessionId, step: step.id, title: step.title, model: this.deps.engine.model, error: message });
        yield buildToken(`\n\n> Step ${step.id} failed: ${message}\n`);
        failStep(plan, step.id, emit);
        response = `${FAILURE_MARKER} ${message}`;
      }
      yield* flush();

      this.pastSteps.push({ title: step.title, result: truncate(response, STEP_RESULT_CHARS) });
      index += 1;
      if (index >= plan.steps.length) break;

      const decision = await replanner.evaluate({
        planTitle: plan.title,
        steps: plan.steps,
        pastSteps: this.pastSteps,
        index,
        sessionId: ctx.sessionId,
        signal: ctx.signal,
      });

      if (decision.action === 'finish') {
        for (const rest of plan.steps.slice(index)) forceComplete(plan, rest.id, emit);
        yield* flush();
        if (decision.response) yield buildToken(decision.response);
        break;
      }
      if (decision.action === 'revise' && decision.revisedSteps.length > 0) {
        plan.steps = reviseSteps(plan.steps, index, decision.revisedSteps);
        yield buildPlanRevised(plan.planId, plan.steps.slice(index).map(s => ({ ...s })), index, decision.reason);
      }
    }

    if (index < plan.steps.length && index >= cfg.PLAN_MAX_STEPS) {
      log.warn('plan step ceiling reached', { session: ctx.sessionId, limit: cfg.PLAN_MAX_STEPS, remaining: plan.steps.length - index });
    }
    yield buildDone();
    return 'completed';
  }

  private runStep(ctx: RunContext, index: number): AsyncGenerator<AgentEvent, void, undefined> {
    const { cfg, engine } = this.deps;
    const plan = this.plan;
    const step = plan.steps[index];
    const tools = this.deps.tools.executorTools();
    const system = buildSystemPrompt(tools);
    const instruction = buildExecutorPrompt(system, plan.title, step.title, index, plan.steps.length, this.pastSteps);
    const source = engine.stream({
      system: instruction,
      messages: [...this.baseMessages, { role: 'user', content: `Execute step ${step.id}: ${step.title}` }],
      tools,
      context: ctx,
      recursionLimit: cfg.EXECUTOR_RECURSION_LIMIT,
      origin: 'executor',
      signal: ctx.signal,
    });
    return new EventStreamAdapter().adapt(source, {
      system,
      origin: 'executor',
      motivation: `Executing step ${step.id}: ${step.title}`,
      instruction: `Current step (${index + 1}/${plan.steps.length}): ${step.title}`,
    });
  }
}
