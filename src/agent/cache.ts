import { createHash } from 'node:crypto';
import { existsSync, mkdirSync, readFileSync, readdirSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import { CacheError, describeError, isAbort } from '../errors.js';
import { createLogger } from '../observability/logger.js';
import { AgentEventSchema } from './events.js';
import type { AgentEvent } from './events.js';
import type { Turn } from './types.js';

export const KEY_HISTORY_TURNS = 3;
export const KEY_TURN_CHARS = 500;

export type CacheKeyInput = {
  system: string;
  history: readonly Turn[];
  message: string;
  model: string;
  temperature: number;
  maxTokens: number;
};

/** SHA-256 over everything that shapes the model's answer. */
export function cacheKey(input: CacheKeyInput): string {
  const recent = input.history.slice(-KEY_HISTORY_TURNS).map(t => ({ role: t.role, content: t.content.slice(0, KEY_TURN_CHARS) }));
  const material = JSON.stringify({
    system: input.system,
    history: recent,
    message: input.message,
    model: input.model,
    temperature: input.temperature,
    maxTokens: input.maxTokens,
  });
  return createHash('sha256').update(material).digest('hex');
}

export interface EventCache {
  get(key: string): Promise<AgentEvent[] | null>;
  set(key: string, events: readonly AgentEvent[]): Promise<void>;
  /** Drops one entry, or everything when no key is given. */
  invalidate(key?: string): Promise<void>;
}

type Entry = { storedAt: number; events: AgentEvent[] };

const EntrySchema = z.object({ storedAt: z.number(), events: z.array(AgentEventSchema) });

export class MemoryEventCache implements EventCache {
  private entries = new Map<string, Entry>();

  constructor(private ttlMs: number, private clock: () => number = Date.now) {}

  get size(): number {
    return this.entries.size;
  }

  async get(key: string): Promise<AgentEvent[] | null> {
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (this.clock() - entry.storedAt > this.ttlMs) {
      this.entries.delete(key);
      return null;
    }
    return [...entry.events];
  }

  async set(key: string, events: readonly AgentEvent[]): Promise<void> {
    this.entries.set(key, { storedAt: this.clock(), events: [...events] });
  }

  async invalidate(key?: string): Promise<void> {
    if (key === undefined) this.entries.clear();
    else this.entries.delete(key);
  }
}

/** One JSON file per key under `<dir>`. */
export class JsonFileEventCache implements EventCache {
  constructor(private dir: string, private ttlMs: number, private clock: () => number = Date.now) {}

  private path(key: string) {
    if (!/^[a-f0-9]{64}$/.test(key)) throw new CacheError(`Malformed cache key '${key}'`, { key });
    return join(this.dir, `${key}.json`);
  }

  async get(key: string): Promise<AgentEvent[] | null> {
    const p = this.path(key);
    if (!existsSync(p)) return null;
    let entry: Entry;
    try {
      entry = EntrySchema.parse(JSON.parse(readFileSync(p, 'utf-8')));
    } catch (err) {
      throw new CacheError(`Unreadable cache entry: ${describeError(err)}`, { key }, { cause: err });
    }
    if (this.clock() - entry.storedAt > this.ttlMs) {
      rmSync(p, { force: true });
      return null;
    }
    return entry.events;
  }

  async set(key: string, events: readonly AgentEvent[]): Promise<void> {
    mkdirSync(this.dir, { recursive: true });
    const entry: Entry = { storedAt: this.clock(), events: [...events] };
    writeFileSync(this.path(key), JSON.stringify(entry), 'utf-8');
  }

  async invalidate(key?: string): Promise<void> {
    if (key !== undefined) {
      rmSync(this.path(key), { force: true });
      return;
    }
    if (!existsSync(this.dir)) return;
    for (const f of readdirSync(this.dir)) {
      if (f.endsWith('.json')) rmSync(join(this.dir, f), { force: true });
    }
  }
}

const log = createLogger('cache');

export type GenerateOptions = {
  /** Decides from the full recorded sequence whether it may be stored. */
  storable: (events: readonly AgentEvent[]) => boolean;
  sessionId?: string;
  signal?: AbortSignal;
};

/**
 * Replays a stored sequence on a hit; otherwise streams `generate()` and
 * stores what it produced. Cache faults never fail the run: a broken read
 * falls through to generation and a broken write is only logged.
 */
export async function* getOrGenerate(
  cache: EventCache,
  key: string,
  generate: () => AsyncGenerator<AgentEvent, void, undefined>,
  opts: GenerateOptions,
): AsyncGenerator<AgentEvent, void, undefined> {
  let hit: AgentEvent[] | null = null;
  try {
    hit = await cache.get(key);
  } catch (err) {
    log.warn('cache read failed; running uncached', { session: opts.sessionId, key: key.slice(0, 12), error: describeError(err) });
  }
  if (hit) {
    log.debug('cache hit', { session: opts.sessionId, key: key.slice(0, 12), events: hit.length });
    yield* hit;
    return;
  }

  const recorded: AgentEvent[] = [];
  for await (const event of generate()) {
    recorded.push(event);
    yield event;
  }
  if (!opts.storable(recorded)) return;
  try {
    await cache.set(key, recorded);
  } catch (err) {
    if (isAbort(err, opts.signal)) throw err;
    log.warn('cache write failed', { session: opts.sessionId, key: key.slice(0, 12), error: describeError(err) });
  }
}
