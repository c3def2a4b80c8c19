import { existsSync, mkdirSync, readFileSync, readdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import { ValidationError } from '../errors.js';
import { TurnSchema } from './types.js';
import type { Turn } from './types.js';

export const SessionSchema = z.object({
  sessionId: z.string(),
  createdAt: z.number(),
  updatedAt: z.number(),
  turns: z.array(TurnSchema),
});

export type Session = z.infer<typeof SessionSchema>;

export interface SessionStore {
  load(sessionId: string): Session | null;
  history(sessionId: string): Turn[];
  append(sessionId: string, turns: Turn[]): Session;
  list(): string[];
}

const SAFE_ID = /^[A-Za-z0-9_-]{1,64}$/;

/** Session transcripts as one JSON file each under `<baseDir>/sessions`. */
export class JsonSessionStore implements SessionStore {
  constructor(private baseDir: string) {}

  private dir() { return join(this.baseDir, 'sessions'); }

  private path(sessionId: string) {
    if (!SAFE_ID.test(sessionId)) throw new ValidationError(`Invalid session id '${sessionId}'.`, { sessionId });
    return join(this.dir(), `${sessionId}.json`);
  }

  load(sessionId: string): Session | null {
    const p = this.path(sessionId);
    if (!existsSync(p)) return null;
    const raw: unknown = JSON.parse(readFileSync(p, 'utf-8'));
    const parsed = SessionSchema.safeParse(raw);
    if (!parsed.success) throw new ValidationError(`Session file ${p} is malformed: ${parsed.error.message}`, { sessionId });
    return parsed.data;
  }

  history(sessionId: string): Turn[] {
    return this.load(sessionId)?.turns ?? [];
  }

  save(session: Session) {
    const p = this.path(session.sessionId);
    mkdirSync(this.dir(), { recursive: true });
    writeFileSync(p, JSON.stringify(session, null, 2), 'utf-8');
  }

  append(sessionId: string, turns: Turn[]): Session {
    const now = Date.now();
    const session: Session = this.load(sessionId) ?? { sessionId, createdAt: now, updatedAt: now, turns: [] };
    session.turns.push(...turns);
    session.updatedAt = now;
    this.save(session);
    return session;
  }

  list(): string[] {
    if (!existsSync(this.dir())) return [];
    return readdirSync(this.dir())
      .filter(f => f.endsWith('.json'))
      .map(f => f.slice(0, -'.json'.length))
      .sort();
  }
}
