import { nanoid } from 'nanoid';
import OpenAI from 'openai';
import type { z } from 'zod';
import type { AgentEvent } from '../agent/events.js';
import type { AppConfig } from '../config.js';
import { CapabilityError, ConfigError, RecursionLimitError, describeError } from '../errors.js';
import { createLogger } from '../observability/logger.js';
import { invokeTool } from '../tools/registry.js';
import type { ToolContext, ToolSpec } from '../tools/types.js';
import { sanitizeToJson } from '../utils/text.js';
import type { EngineMessage, EngineRequest, EngineToolCall, RawEngineEvent, ReasoningEngine } from './interfaces.js';

const log = createLogger('openai');

const DECIDE_SYSTEM = 'Respond with ONLY a single JSON object matching the requested shape. No prose, no markdown.';

type PartialCall = { id: string; name: string; args: string };

export function toParams(system: string, messages: readonly EngineMessage[]): OpenAI.ChatCompletionMessageParam[] {
  const out: OpenAI.ChatCompletionMessageParam[] = [{ role: 'system', content: system }];
  for (const m of messages) {
    if (m.role === 'user') out.push({ role: 'user', content: m.content });
    else if (m.role === 'tool') out.push({ role: 'tool', content: m.content, tool_call_id: m.toolCallId });
    else if (m.toolCalls?.length) {
      out.push({
        role: 'assistant',
        content: m.content || null,
        tool_calls: m.toolCalls.map(c => ({
          id: c.id,
          type: 'function' as const,
          function: { name: c.name, arguments: JSON.stringify(c.args ?? {}) },
        })),
      });
    } else out.push({ role: 'assistant', content: m.content });
  }
  return out;
}

export function toTools(tools: readonly ToolSpec[]): OpenAI.ChatCompletionTool[] {
  return tools.map(t => ({
    type: 'function' as const,
    function: { name: t.name, description: t.description, parameters: t.parameters },
  }));
}

// Unparseable arguments go to the tool as-is; its schema rejects them.
export function parseArgs(raw: string): unknown {
  if (!raw.trim()) return {};
  try {
    return JSON.parse(raw);
  } catch {
    return raw;
  }
}

/**
 * ReAct loop on streaming chat completions with function calling. Each model
 * call is one round; tool calls it requests run before the next round.
 */
export class OpenAIEngine implements ReasoningEngine {
  readonly name = 'openai';
  readonly model: string;
  private client: OpenAI;

  constructor(private cfg: AppConfig, client?: OpenAI) {
    if (!client && !cfg.OPENAI_API_KEY) throw new ConfigError('OPENAI_API_KEY is not set');
    this.client = client ?? new OpenAI({ apiKey: cfg.OPENAI_API_KEY, baseURL: cfg.OPENAI_BASE_URL });
    this.model = cfg.LLM_MODEL;
  }

  async *stream(req: EngineRequest): AsyncGenerator<RawEngineEvent, void, undefined> {
    const { origin, signal } = req;
    const conversation: EngineMessage[] = [...req.messages];
    const byName = new Map(req.tools.map((t): [string, ToolSpec] => [t.name, t]));
    const tools = toTools(req.tools);
    // Grows for the whole stream; step_end always carries all of it.
    const pending: AgentEvent[] = [];
    const toolCtx: ToolContext = { run: req.context, signal, notify: event => pending.push(event) };

    for (let round = 0; round < req.recursionLimit; round++) {
      const runId = nanoid();
      yield { kind: 'chat_start', runId, origin, model: this.model, messages: [...conversation] };

      let text = '';
      const calls = new Map<number, PartialCall>();
      try {
        const stream = await this.client.chat.completions.create(
          {
            model: this.model,
            messages: toParams(req.system, conversation),
            tools: tools.length > 0 ? tools : undefined,
            temperature: this.cfg.LLM_TEMPERATURE,
            max_tokens: this.cfg.LLM_MAX_TOKENS,
            stream: true,
          },
          { signal },
        );
        for await (const chunk of stream) {
          const delta = chunk.choices[0]?.delta;
          if (!delta) continue;
          if (delta.content) {
            text += delta.content;
            yield { kind: 'chat_delta', runId, origin, text: delta.content };
          }
          for (const tc of delta.tool_calls ?? []) {
            const entry = calls.get(tc.index) ?? { id: '', name: '', args: '' };
            if (tc.id) entry.id = tc.id;
            if (tc.function?.name) entry.name += tc.function.name;
            if (tc.function?.arguments) entry.args += tc.function.arguments;
            calls.set(tc.index, entry);
          }
        }
      } catch (err) {
        if (signal?.aborted) throw err;
        throw new CapabilityError(`Model call failed: ${describeError(err)}`, { model: this.model, origin, round }, { cause: err });
      }
      yield { kind: 'chat_end', runId, origin, output: text };

      if (calls.size === 0) {
        yield { kind: 'step_end', runId, origin, pendingEvents: [...pending] };
        return;
      }

      const toolCalls: EngineToolCall[] = [...calls.values()].map(c => ({
        id: c.id || `call_${nanoid(8)}`,
        name: c.name,
        args: parseArgs(c.args),
      }));
      conversation.push({ role: 'assistant', content: text, toolCalls });
      for (const call of toolCalls) {
        const toolRunId = nanoid();
        yield { kind: 'tool_start', runId: toolRunId, origin, name: call.name, input: call.args };
        const output = await invokeTool(byName.get(call.name), call.name, call.args, toolCtx);
        yield { kind: 'tool_end', runId: toolRunId, origin, name: call.name, output };
        conversation.push({ role: 'tool', content: output, toolCallId: call.id });
      }
      yield { kind: 'step_end', runId, origin, pendingEvents: [...pending] };
    }

    log.warn('recursion limit reached', { session: req.context.sessionId, origin, model: this.model, limit: req.recursionLimit });
    throw new RecursionLimitError(req.recursionLimit, { model: this.model, origin });
  }

  async decide<S extends z.ZodTypeAny>(prompt: string, schema: S, signal?: AbortSignal): Promise<z.infer<S>> {
    const res = await this.client.chat.completions.create(
      {
        model: this.model,
        messages: [{ role: 'system', content: DECIDE_SYSTEM }, { role: 'user', content: prompt }],
        temperature: 0.2,
        response_format: { type: 'json_object' },
      },
      { signal },
    );
    const content = res.choices[0]?.message?.content || '';
    const json = sanitizeToJson(content);
    if (!json) throw new CapabilityError('Model did not return a JSON object', { model: this.model });
    return schema.parse(JSON.parse(json));
  }
}
