import chalk from 'chalk';
import type { AgentEvent } from '../agent/events.js';
import { preview } from '../utils/text.js';

const STATUS_MARK = {
  pending: '○',
  running: '◐',
  completed: '●',
  failed: '✗',
} as const;

/**
 * One console line per non-token event; null for events with nothing to show.
 * Tokens are written raw by the caller so the answer reads as prose.
 */
export function renderEvent(event: AgentEvent): string | null {
  switch (event.type) {
    case 'token':
      return event.content;
    case 'tool_start':
      return chalk.yellow(`\n→ ${event.tool}(${preview(event.input, 120)})`);
    case 'tool_end':
      return chalk.gray(`← ${event.tool} ${event.durationMs}ms: ${preview(event.output, 160)}`);
    case 'llm_start':
      return chalk.gray(`· ${event.origin}/${event.model}: ${event.motivation}`);
    case 'llm_end':
      return event.reasoning
        ? chalk.gray(`· ${event.origin} done in ${event.durationMs}ms\n  thinking: ${preview(event.reasoning, 200)}`)
        : chalk.gray(`· ${event.origin} done in ${event.durationMs}ms`);
    case 'plan_created':
      return [chalk.bold(`\nPlan: ${event.plan.title}`), ...event.plan.steps.map(s => `  ${STATUS_MARK[s.status]} ${s.id}. ${s.title}`)].join('\n');
    case 'plan_updated':
      return chalk.cyan(`  ${STATUS_MARK[event.status]} step ${event.stepId} ${event.status}`);
    case 'plan_revised':
      return [
        chalk.magenta(`\nPlan revised after ${event.keepCompleted} step(s)${event.reason ? `: ${event.reason}` : ''}`),
        ...event.revisedSteps.map(s => `  ${STATUS_MARK[s.status]} ${s.id}. ${s.title}`),
      ].join('\n');
    case 'plan_approval_request':
      return chalk.bold(`\nPlan ${event.planId} is waiting for approval (${event.steps.length} steps)`);
    case 'done':
      return null;
    case 'error':
      return chalk.red(`\nError: ${event.content}`);
    default: {
      const unreachable: never = event;
      return unreachable;
    }
  }
}
