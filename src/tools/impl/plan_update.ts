import { z } from 'zod';
import { updateStepStatus } from '../../agent/plan.js';
import { STEP_STATUSES, StepStatusSchema } from '../../agent/types.js';
import { ValidationError } from '../../errors.js';
import type { ToolSpec } from '../types.js';

export const PLAN_UPDATE = 'plan_update';

const schema = z.object({
  plan_id: z.string().min(1),
  step_id: z.number().int().positive(),
  status: z.string(),
});

const tool: ToolSpec<typeof schema> = {
  name: PLAN_UPDATE,
  description:
    'Report a plan step as completed or failed out of order. The system marks each step ' +
    'running and completed as it executes the plan; do not repeat that bookkeeping.',
  schema,
  parameters: {
    type: 'object',
    properties: {
      plan_id: { type: 'string', description: 'The plan id returned by plan_create.' },
      step_id: { type: 'integer', description: 'Step number, starting at 1.' },
      status: { type: 'string', enum: [...STEP_STATUSES] },
    },
    required: ['plan_id', 'step_id', 'status'],
  },
  async run({ plan_id, step_id, status }, ctx) {
    const parsed = StepStatusSchema.safeParse(status);
    if (!parsed.success) {
      throw new ValidationError(`Invalid status '${status}'. Must be one of: ${STEP_STATUSES.join(', ')}`);
    }
    const plan = ctx.run.plan;
    if (!plan || plan.planId !== plan_id) throw new ValidationError(`Unknown plan_id '${plan_id}'.`);
    updateStepStatus(plan, step_id, parsed.data, e => ctx.run.emitPlanEvent(e));
    return `Step ${step_id} -> ${parsed.data}`;
  },
};

export default tool;
