import readline from 'node:readline/promises';
import { stdin as input, stdout as output } from 'node:process';
import type { RunContext } from '../agent/context.js';
import type { PlanStep } from '../agent/types.js';
import { AgentError, ApprovalTimeoutError } from '../errors.js';
import { createLogger } from '../observability/logger.js';

export type TimeoutPolicy = 'reject' | 'approve';

export type WaitOptions = {
  /** 0 waits until a decision arrives or the signal aborts. */
  timeoutMs?: number;
  onTimeout?: TimeoutPolicy;
  signal?: AbortSignal;
};

const log = createLogger('approvals');

/**
 * One per run. The runner waits on it after announcing a plan; a delivery
 * layer (or the CLI prompt) resolves it, possibly from outside the run.
 */
export class ApprovalGate {
  private awaited = false;

  constructor(private ctx: RunContext) {}

  get used(): boolean {
    return this.awaited;
  }

  resolve(planId: string, approved: boolean): void {
    this.ctx.resolveApproval(planId, approved);
  }

  async wait(planId: string, opts: WaitOptions = {}): Promise<boolean> {
    if (this.awaited) throw new AgentError('approval_reused', 'The approval gate was already awaited for this run', { planId });
    this.awaited = true;

    const timeoutMs = opts.timeoutMs ?? 0;
    const local = new AbortController();
    const onOuterAbort = () => local.abort(opts.signal?.reason);
    if (opts.signal?.aborted) throw opts.signal.reason;
    opts.signal?.addEventListener('abort', onOuterAbort, { once: true });
    const timer = timeoutMs > 0
      ? setTimeout(() => local.abort(new ApprovalTimeoutError(planId, timeoutMs)), timeoutMs)
      : undefined;

    try {
      for (;;) {
        const decision = await this.ctx.approvals.receive(local.signal);
        if (decision.planId === planId) return decision.approved;
        log.warn('approval for another plan ignored', { session: this.ctx.sessionId, expected: planId, got: decision.planId });
      }
    } catch (err) {
      if (err instanceof ApprovalTimeoutError) {
        const approved = (opts.onTimeout ?? 'reject') === 'approve';
        log.warn('approval timed out', { session: this.ctx.sessionId, planId, timeoutMs, approved });
        return approved;
      }
      throw err;
    } finally {
      if (timer) clearTimeout(timer);
      opts.signal?.removeEventListener('abort', onOuterAbort);
    }
  }
}

/** Live gates by plan id, for a delivery layer answering approval requests. */
export class ApprovalRegistry {
  private gates = new Map<string, ApprovalGate>();

  register(planId: string, gate: ApprovalGate): void {
    this.gates.set(planId, gate);
  }

  unregister(planId: string): void {
    this.gates.delete(planId);
  }

  has(planId: string): boolean {
    return this.gates.has(planId);
  }

  /** Returns false when no run is waiting on that plan. */
  resolve(planId: string, approved: boolean): boolean {
    const gate = this.gates.get(planId);
    if (!gate) return false;
    gate.resolve(planId, approved);
    return true;
  }
}

export function summarizePlan(title: string, steps: readonly PlanStep[]): string {
  return [title, ...steps.map(s => `  ${s.id}. ${s.title}`)].join('\n');
}

export async function promptApproval(summary: string): Promise<boolean> {
  const rl = readline.createInterface({ input, output });
  try {
    const ans = await rl.question(`\nApproval needed:\n${summary}\nApprove? [y/N] `);
    return ans.trim().toLowerCase().startsWith('y');
  } finally {
    rl.close();
  }
}
