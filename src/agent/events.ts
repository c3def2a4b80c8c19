import { z } from 'zod';
import { PlanSchema, PlanStepSchema, StepStatusSchema } from './types.js';
import type { PlanStep, StepStatus } from './types.js';

export const AgentEventSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('token'), content: z.string() }),
  z.object({ type: z.literal('tool_start'), runId: z.string(), tool: z.string(), input: z.string() }),
  z.object({
    type: z.literal('tool_end'),
    runId: z.string(),
    tool: z.string(),
    output: z.string(),
    durationMs: z.number(),
  }),
  z.object({
    type: z.literal('llm_start'),
    runId: z.string(),
    origin: z.string(),
    model: z.string(),
    input: z.string(),
    motivation: z.string(),
  }),
  z.object({
    type: z.literal('llm_end'),
    runId: z.string(),
    origin: z.string(),
    model: z.string(),
    durationMs: z.number(),
    output: z.string(),
    reasoning: z.string().optional(),
  }),
  z.object({ type: z.literal('plan_created'), plan: PlanSchema }),
  z.object({ type: z.literal('plan_updated'), planId: z.string(), stepId: z.number(), status: StepStatusSchema }),
  z.object({
    type: z.literal('plan_revised'),
    planId: z.string(),
    revisedSteps: z.array(PlanStepSchema),
    keepCompleted: z.number(),
    reason: z.string(),
  }),
  z.object({
    type: z.literal('plan_approval_request'),
    planId: z.string(),
    title: z.string(),
    steps: z.array(PlanStepSchema),
  }),
  z.object({ type: z.literal('done') }),
  z.object({ type: z.literal('error'), content: z.string() }),
]);

export type AgentEvent = z.infer<typeof AgentEventSchema>;
export type AgentEventType = AgentEvent['type'];
export type EventOf<T extends AgentEventType> = Extract<AgentEvent, { type: T }>;

export const buildToken = (content: string): EventOf<'token'> => ({ type: 'token', content });
export const buildDone = (): EventOf<'done'> => ({ type: 'done' });
export const buildError = (content: string): EventOf<'error'> => ({ type: 'error', content });

export const buildPlanUpdated = (planId: string, stepId: number, status: StepStatus): EventOf<'plan_updated'> =>
  ({ type: 'plan_updated', planId, stepId, status });

export const buildPlanRevised = (
  planId: string,
  revisedSteps: PlanStep[],
  keepCompleted: number,
  reason: string,
): EventOf<'plan_revised'> => ({ type: 'plan_revised', planId, revisedSteps, keepCompleted, reason });

/** Wire form handed to the delivery layer. */
export function serializeEvent(event: AgentEvent): string {
  return JSON.stringify(event);
}

export function toSseFrame(event: AgentEvent): string {
  return `data: ${serializeEvent(event)}\n\n`;
}
