import { z } from 'zod';

export const STEP_STATUSES = ['pending', 'running', 'completed', 'failed'] as const;

export const StepStatusSchema = z.enum(STEP_STATUSES);
export type StepStatus = z.infer<typeof StepStatusSchema>;

export const PlanStepSchema = z.object({
  id: z.number().int().positive(),
  title: z.string(),
  status: StepStatusSchema,
});
export type PlanStep = z.infer<typeof PlanStepSchema>;

export const PlanSchema = z.object({
  planId: z.string(),
  title: z.string(),
  steps: z.array(PlanStepSchema),
});
export type Plan = z.infer<typeof PlanSchema>;

export const ToolCallRecordSchema = z.object({
  tool: z.string(),
  input: z.unknown(),
  output: z.string().optional(),
  callId: z.string().optional(),
});
export type ToolCallRecord = z.infer<typeof ToolCallRecordSchema>;

export const TurnSchema = z.object({
  role: z.enum(['user', 'assistant']),
  content: z.string(),
  toolCalls: z.array(ToolCallRecordSchema).optional(),
});
export type Turn = z.infer<typeof TurnSchema>;

export const ReplanDecisionSchema = z.object({
  action: z.enum(['continue', 'revise', 'finish']),
  response: z.string().default(''),
  revisedSteps: z.array(z.string()).default([]),
  reason: z.string().default(''),
});
export type ReplanDecision = z.infer<typeof ReplanDecisionSchema>;

/** Title plus (possibly truncated) outcome of a step that already ran. */
export type StepOutcome = { title: string; result: string };
