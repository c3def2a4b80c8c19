import type { AppConfig } from '../config.js';
import { ReplanningError, describeError, isAbort } from '../errors.js';
import type { ReasoningEngine } from '../llm/interfaces.js';
import { createLogger } from '../observability/logger.js';
import { truncate } from '../utils/text.js';
import { ReplanDecisionSchema } from './types.js';
import type { PlanStep, ReplanDecision, StepOutcome } from './types.js';

export const FAILURE_MARKER = '[ERROR]';

export const CONTINUE: Readonly<ReplanDecision> = { action: 'continue', response: '', revisedSteps: [], reason: '' };

export type ReplanInput = {
  planTitle: string;
  steps: readonly PlanStep[];
  pastSteps: readonly StepOutcome[];
  /** Index of the next step to run. */
  index: number;
  sessionId: string;
  signal?: AbortSignal;
};

const log = createLogger('replanner');

/**
 * Decides after each step whether to continue, revise the rest of the plan
 * or finish early. Only consults the model when something went wrong.
 */
export class Replanner {
  constructor(private deps: { cfg: AppConfig; engine: ReasoningEngine }) {}

  shouldSkip(pastSteps: readonly StepOutcome[], index: number, total: number): boolean {
    if (total - index <= 1) return true;
    const last = pastSteps[pastSteps.length - 1];
    return last !== undefined && !last.result.includes(FAILURE_MARKER);
  }

  async evaluate(input: ReplanInput): Promise<Readonly<ReplanDecision>> {
    const { planTitle, steps, pastSteps, index } = input;
    if (!this.deps.cfg.PLAN_REVISION_ENABLED) return CONTINUE;
    if (index >= steps.length) return CONTINUE;
    if (this.shouldSkip(pastSteps, index, steps.length)) return CONTINUE;

    try {
      const decision = await this.deps.engine.decide(this.buildPrompt(planTitle, steps, pastSteps, index), ReplanDecisionSchema, input.signal);
      log.info('replan decision', { session: input.sessionId, step: index, action: decision.action, reason: decision.reason });
      return decision;
    } catch (err) {
      if (isAbort(err, input.signal)) throw err;
      const failure = new ReplanningError(describeError(err), { session: input.sessionId, step: index, model: this.deps.engine.model }, { cause: err });
      log.warn('replanning failed; continuing with the current plan', { ...failure.context, error: failure.message });
      return CONTINUE;
    }
  }

  buildPrompt(planTitle: string, steps: readonly PlanStep[], pastSteps: readonly StepOutcome[], index: number): string {
    const done = pastSteps.map((s, i) => `Step ${i + 1} [${s.title}]: ${truncate(s.result, 200)}`).join('\n');
    const remaining = steps.slice(index).map(s => `Step ${s.id}: ${s.title}`).join('\n');
    return `You review the progress of an execution plan and decide whether it needs to change.

Plan: ${planTitle}

Steps already run:
${done}

Remaining steps:
${remaining}

Choose one action:
- continue: the remaining steps still make sense; run the next one
- revise: the results so far call for different remaining steps; list them in revisedSteps
- finish: the goal is already reached; put the final answer in response

Reply with a JSON object: {"action": "...", "reason": "...", "response": "...", "revisedSteps": ["..."]}`;
  }
}
