import type { EngineMessage, EngineToolCall } from '../llm/interfaces.js';
import type { ToolSpec } from '../tools/types.js';
import { truncate } from '../utils/text.js';
import type { StepOutcome, Turn } from './types.js';

const BASE_INSTRUCTIONS = `You are a task-execution agent. Work autonomously with the tools available to you.

- Answer simple questions directly, without tools, when you can.
- Use a tool when it gives you facts you do not have or performs an action the user asked for.
- Only when a task needs three or more distinct steps that combine different tools, call plan_create once
  with a short title and the ordered steps. The system then runs each step for you; do not execute the
  plan yourself in the same reply.
- Keep private reasoning inside <think></think>; everything else is shown to the user.`;

export function buildSystemPrompt(tools: readonly ToolSpec[]): string {
  if (tools.length === 0) return BASE_INSTRUCTIONS;
  const catalog = tools.map(t => `- ${t.name}: ${t.description}`).join('\n');
  return `${BASE_INSTRUCTIONS}\n\nAVAILABLE TOOLS:\n${catalog}`;
}

function callId(i: number, tool: string, given?: string): string {
  return given ?? `call_${i}_${tool}`;
}

/**
 * Turns stored session turns into engine messages. An assistant turn that used
 * tools becomes the assistant message carrying the calls, followed by one tool
 * message per call, so the model sees the full exchange.
 */
export function convertHistory(turns: readonly Turn[]): EngineMessage[] {
  const out: EngineMessage[] = [];
  for (const turn of turns) {
    if (turn.role === 'user') {
      out.push({ role: 'user', content: turn.content });
      continue;
    }
    const calls = turn.toolCalls ?? [];
    if (calls.length === 0) {
      out.push({ role: 'assistant', content: turn.content });
      continue;
    }
    const toolCalls: EngineToolCall[] = calls.map((c, i) => ({
      id: callId(i, c.tool, c.callId),
      name: c.tool,
      args: typeof c.input === 'string' ? { input: c.input } : c.input ?? {},
    }));
    out.push({ role: 'assistant', content: turn.content, toolCalls });
    calls.forEach((c, i) => out.push({ role: 'tool', content: c.output ?? '', toolCallId: callId(i, c.tool, c.callId) }));
  }
  return out;
}

export const STEP_SUMMARY_CHARS = 300;

export function buildExecutorPrompt(
  system: string,
  planTitle: string,
  stepTitle: string,
  stepIndex: number,
  totalSteps: number,
  pastSteps: readonly StepOutcome[],
): string {
  const lines = [
    system,
    '',
    `Plan: ${planTitle}`,
    `Current step (${stepIndex + 1}/${totalSteps}): ${stepTitle}`,
  ];
  if (pastSteps.length > 0) {
    lines.push('', 'Steps already done:');
    pastSteps.forEach((s, i) => lines.push(`Step ${i + 1} [${s.title}]: ${truncate(s.result, STEP_SUMMARY_CHARS)}`));
  }
  lines.push('', 'Focus on the current step only. When it is done, briefly summarize the result.');
  return lines.join('\n');
}

function formatMessages(messages: readonly EngineMessage[]): string {
  return messages
    .map(m => {
      const calls = m.role === 'assistant' && m.toolCalls?.length
        ? `\n(tool calls: ${m.toolCalls.map(c => c.name).join(', ')})`
        : '';
      return `[${m.role}]\n${m.content}${calls}`;
    })
    .join('\n---\n');
}

/** Model input as shown on llm_start, for debugging. */
export function formatDebugInput(system: string, messages: readonly EngineMessage[], instruction?: string): string {
  const parts = [`[System Prompt]\n${system}`];
  if (instruction) parts.push(`[Instruction]\n${instruction}`);
  parts.push(`[Messages]\n${formatMessages(messages)}`);
  return parts.join('\n\n');
}
