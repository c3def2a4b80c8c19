import { z } from 'zod';
import { clonePlan, createPlan } from '../../agent/plan.js';
import type { ToolSpec } from '../types.js';

export const PLAN_CREATE = 'plan_create';

const schema = z.object({
  title: z.string(),
  steps: z.array(z.union([z.string(), z.record(z.unknown())])),
});

const tool: ToolSpec<typeof schema> = {
  name: PLAN_CREATE,
  description:
    'Create an execution plan. Only call this when the task genuinely needs three or more steps ' +
    'that combine different tools. Never use it for simple questions, chat or a single tool call.',
  schema,
  parameters: {
    type: 'object',
    properties: {
      title: { type: 'string', description: 'Short plan title.' },
      steps: {
        type: 'array',
        items: { type: 'string' },
        description: 'Step descriptions in execution order, about ten words each.',
      },
    },
    required: ['title', 'steps'],
  },
  async run({ title, steps }, ctx) {
    const plan = createPlan(title, steps);
    ctx.run.plan = plan;
    ctx.run.emitPlanEvent({ type: 'plan_created', plan: clonePlan(plan) });
    return `Plan created: plan_id=${plan.planId}, ${plan.steps.length} steps. System will now auto-execute each step.`;
  },
};

export default tool;
