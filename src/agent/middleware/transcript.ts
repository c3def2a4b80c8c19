import { createLogger } from '../../observability/logger.js';
import type { RunContext } from '../context.js';
import type { AgentEvent } from '../events.js';
import type { SessionStore } from '../store.js';
import type { ToolCallRecord, Turn } from '../types.js';
import type { Middleware } from './pipeline.js';

const log = createLogger('transcript');

function parseInput(input: string): unknown {
  try {
    return JSON.parse(input);
  } catch {
    return input;
  }
}

/**
 * Builds the assistant turn from the stream and appends the exchange to the
 * session once the run reaches `done`. Tool calls are recorded at tool_start
 * and completed at the matching tool_end.
 */
export class TranscriptRecorder implements Middleware {
  readonly name = 'transcript';
  private content = '';
  private calls: ToolCallRecord[] = [];
  private open = new Map<string, ToolCallRecord>();
  private saved = false;

  constructor(private store: SessionStore) {}

  onRunStart(): void {
    this.content = '';
    this.calls = [];
    this.open.clear();
    this.saved = false;
  }

  onEvent(event: AgentEvent, ctx: RunContext): AgentEvent {
    switch (event.type) {
      case 'token':
        this.content += event.content;
        break;
      case 'tool_start': {
        const record: ToolCallRecord = { tool: event.tool, input: parseInput(event.input), callId: event.runId };
        this.calls.push(record);
        this.open.set(event.runId, record);
        break;
      }
      case 'tool_end': {
        const record = this.open.get(event.runId);
        if (record) {
          record.output = event.output;
          this.open.delete(event.runId);
        }
        break;
      }
      case 'done':
        this.save(ctx);
        break;
      default:
        break;
    }
    return event;
  }

  /** The assistant turn accumulated so far. */
  turn(): Turn {
    return this.calls.length > 0
      ? { role: 'assistant', content: this.content, toolCalls: this.calls }
      : { role: 'assistant', content: this.content };
  }

  private save(ctx: RunContext) {
    if (this.saved) return;
    this.saved = true;
    this.store.append(ctx.sessionId, [{ role: 'user', content: ctx.message }, this.turn()]);
    log.debug('session updated', { session: ctx.sessionId, toolCalls: this.calls.length, chars: this.content.length });
  }
}
