import { describe, expect, it } from 'vitest';
import { createPlan } from '../../src/agent/plan.js';
import { CONTINUE, Replanner } from '../../src/agent/replanner.js';
import type { StepOutcome } from '../../src/agent/types.js';
import { ScriptedEngine, testConfig } from '../helpers/scriptedEngine.js';

const steps = createPlan('Trip', ['Search', 'Book', 'Confirm']).steps;
const failed: StepOutcome[] = [{ title: 'Search', result: '[ERROR] timeout' }];
const ok: StepOutcome[] = [{ title: 'Search', result: 'found 3 flights' }];

function input(pastSteps: StepOutcome[], index: number) {
  return { planTitle: 'Trip', steps, pastSteps, index, sessionId: 'test-session' };
}

describe('Replanner', () => {
  it('makes no call when exactly one step remains', async () => {
    const engine = new ScriptedEngine();
    const replanner = new Replanner({ cfg: testConfig(), engine });
    const twoDone: StepOutcome[] = [...failed, { title: 'Book', result: '[ERROR] no seats' }];
    expect(await replanner.evaluate(input(twoDone, 2))).toEqual(CONTINUE);
    expect(engine.prompts).toHaveLength(0);
  });

  it('makes no call after a step that did not fail', async () => {
    const engine = new ScriptedEngine();
    const replanner = new Replanner({ cfg: testConfig(), engine });
    expect(await replanner.evaluate(input(ok, 1))).toEqual(CONTINUE);
    expect(engine.prompts).toHaveLength(0);
  });

  it('makes no call when revision is disabled', async () => {
    const engine = new ScriptedEngine();
    const replanner = new Replanner({ cfg: testConfig({ PLAN_REVISION_ENABLED: 'false' }), engine });
    expect(await replanner.evaluate(input(failed, 1))).toEqual(CONTINUE);
    expect(engine.prompts).toHaveLength(0);
  });

  it('asks the engine after a failure and fills decision defaults', async () => {
    const engine = new ScriptedEngine([], [{ action: 'revise', revisedSteps: ['Try trains'], reason: 'no flights' }]);
    const replanner = new Replanner({ cfg: testConfig(), engine });
    expect(await replanner.evaluate(input(failed, 1))).toEqual({
      action: 'revise',
      response: '',
      revisedSteps: ['Try trains'],
      reason: 'no flights',
    });
    expect(engine.prompts).toHaveLength(1);
    expect(engine.prompts[0]).toContain('Step 1 [Search]: [ERROR] timeout');
    expect(engine.prompts[0]).toContain('Step 2: Book\nStep 3: Confirm');
  });

  it('degrades to continue when the engine fails', async () => {
    const engine = new ScriptedEngine([], [new Error('rate limited')]);
    const replanner = new Replanner({ cfg: testConfig(), engine });
    expect(await replanner.evaluate(input(failed, 1))).toEqual(CONTINUE);
  });

  it('degrades to continue on a malformed decision', async () => {
    const engine = new ScriptedEngine([], [{ action: 'explode' }]);
    const replanner = new Replanner({ cfg: testConfig(), engine });
    expect(await replanner.evaluate(input(failed, 1))).toEqual(CONTINUE);
    expect(engine.prompts).toHaveLength(1);
  });
});
