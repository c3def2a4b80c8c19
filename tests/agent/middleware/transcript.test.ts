import { describe, expect, it } from 'vitest';
import { RunContext } from '../../../src/agent/context.js';
import type { AgentEvent } from '../../../src/agent/events.js';
import { TranscriptRecorder } from '../../../src/agent/middleware/transcript.js';
import type { Session, SessionStore } from '../../../src/agent/store.js';
import type { Turn } from '../../../src/agent/types.js';

class MemoryStore implements SessionStore {
  appended: Turn[][] = [];
  load(): Session | null { return null; }
  history(): Turn[] { return []; }
  list(): string[] { return []; }
  append(sessionId: string, turns: Turn[]): Session {
    this.appended.push(turns);
    return { sessionId, createdAt: 0, updatedAt: 0, turns };
  }
}

function play(recorder: TranscriptRecorder, ctx: RunContext, events: AgentEvent[]) {
  recorder.onRunStart();
  for (const e of events) recorder.onEvent(e, ctx);
}

describe('TranscriptRecorder', () => {
  it('saves the exchange with completed tool calls on done', () => {
    const store = new MemoryStore();
    const recorder = new TranscriptRecorder(store);
    const ctx = new RunContext({ sessionId: 'test-session' });
    ctx.message = 'what is in a.txt?';
    play(recorder, ctx, [
      { type: 'token', content: 'It says ' },
      { type: 'tool_start', runId: 't1', tool: 'read_file', input: '{"path":"a.txt"}' },
      { type: 'tool_end', runId: 't1', tool: 'read_file', output: 'hello', durationMs: 2 },
      { type: 'token', content: 'hello.' },
      { type: 'done' },
    ]);
    expect(store.appended).toEqual([[
      { role: 'user', content: 'what is in a.txt?' },
      {
        role: 'assistant',
        content: 'It says hello.',
        toolCalls: [{ tool: 'read_file', input: { path: 'a.txt' }, callId: 't1', output: 'hello' }],
      },
    ]]);
  });

  it('keeps a tool call without output when its end never came', () => {
    const recorder = new TranscriptRecorder(new MemoryStore());
    const ctx = new RunContext({ sessionId: 'test-session' });
    play(recorder, ctx, [{ type: 'tool_start', runId: 't1', tool: 'fetch_url', input: 'not json' }]);
    expect(recorder.turn()).toEqual({ role: 'assistant', content: '', toolCalls: [{ tool: 'fetch_url', input: 'not json', callId: 't1' }] });
  });

  it('does not save a run that never reached done', () => {
    const store = new MemoryStore();
    const recorder = new TranscriptRecorder(store);
    play(recorder, new RunContext({ sessionId: 'test-session' }), [{ type: 'token', content: 'partial' }, { type: 'error', content: 'boom' }]);
    expect(store.appended).toEqual([]);
  });
});
