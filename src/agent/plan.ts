import { nanoid } from 'nanoid';
import { ValidationError } from '../errors.js';
import { buildPlanUpdated } from './events.js';
import type { AgentEvent } from './events.js';
import type { Plan, PlanStep, StepStatus } from './types.js';

export type StepInput = string | Record<string, unknown>;
export type EmitFn = (event: AgentEvent) => void;

const TRANSITIONS: Record<StepStatus, readonly StepStatus[]> = {
  pending: ['running'],
  running: ['completed', 'failed'],
  completed: [],
  failed: [],
};

export function canTransition(from: StepStatus, to: StepStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

// Models sometimes send {"step": "..."} records instead of plain strings.
export function normalizeStepTitle(entry: StepInput): string {
  if (typeof entry === 'string') return entry.trim();
  for (const key of ['step', 'title', 'description']) {
    const value = entry[key];
    if (typeof value === 'string' && value.trim()) return value.trim();
  }
  const first = Object.values(entry)[0];
  return first === undefined || first === null ? '' : String(first).trim();
}

/** Numbers a fresh generation of steps starting at `firstId`. */
export function numberSteps(titles: readonly string[], firstId: number): PlanStep[] {
  return titles.map((title, i) => ({ id: firstId + i, title: title.trim(), status: 'pending' }));
}

export function createPlan(title: string, steps: readonly StepInput[]): Plan {
  if (!title || !title.trim()) throw new ValidationError('Plan title cannot be empty.');
  if (steps.length === 0) throw new ValidationError('Plan must have at least one step.');
  return {
    planId: nanoid(8),
    title: title.trim(),
    steps: numberSteps(steps.map(normalizeStepTitle), 1),
  };
}

export function clonePlan(plan: Plan): Plan {
  return { ...plan, steps: plan.steps.map(s => ({ ...s })) };
}

/**
 * Replaces steps[index:] with a new generation numbered from index + 1.
 * steps[:index] are returned untouched.
 */
export function reviseSteps(steps: readonly PlanStep[], index: number, titles: readonly string[]): PlanStep[] {
  return [...steps.slice(0, index), ...numberSteps(titles, index + 1)];
}

function findStep(plan: Plan, stepId: number): PlanStep {
  const step = plan.steps.find(s => s.id === stepId);
  if (!step) throw new ValidationError(`Plan ${plan.planId} has no step ${stepId}.`, { planId: plan.planId, stepId });
  return step;
}

/**
 * Moves a step to `status` and emits plan_updated.
 * Marking step N running first force-completes every earlier step still
 * pending. That auto-advance is a best-effort repair for models that skip
 * their own bookkeeping; it does not check that those steps ran.
 */
export function updateStepStatus(plan: Plan, stepId: number, status: StepStatus, emit: EmitFn): void {
  const step = findStep(plan, stepId);
  // Repeating the current status (a model echoing the runner's bookkeeping) changes nothing.
  if (step.status === status) return;
  if (!canTransition(step.status, status)) {
    throw new ValidationError(`Step ${stepId} cannot move from ${step.status} to ${status}.`, { planId: plan.planId, stepId });
  }
  if (status === 'running') {
    for (const earlier of plan.steps) {
      if (earlier.id < stepId && earlier.status === 'pending') forceComplete(plan, earlier.id, emit);
    }
  }
  step.status = status;
  emit(buildPlanUpdated(plan.planId, stepId, status));
}

/** Marks a step completed without running it (auto-advance, replanner finish). */
export function forceComplete(plan: Plan, stepId: number, emit: EmitFn): void {
  const step = findStep(plan, stepId);
  if (step.status === 'completed' || step.status === 'failed') return;
  step.status = 'completed';
  emit(buildPlanUpdated(plan.planId, stepId, 'completed'));
}

/**
 * Marks a step whose session failed. A completed status reported by the model
 * during that session is overridden: the session's outcome wins.
 */
export function failStep(plan: Plan, stepId: number, emit: EmitFn): void {
  const step = findStep(plan, stepId);
  if (step.status === 'failed') return;
  step.status = 'failed';
  emit(buildPlanUpdated(plan.planId, stepId, 'failed'));
}
