export type ErrorContext = Record<string, string | number | boolean | undefined>;

export class AgentError extends Error {
  readonly code: string;
  readonly context: ErrorContext;

  constructor(code: string, message: string, context: ErrorContext = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.context = context;
  }
}

/** Malformed plan or step input. Tools report it back to the model as text. */
export class ValidationError extends AgentError {
  constructor(message: string, context: ErrorContext = {}) {
    super('validation_error', message, context);
  }
}

/** The reasoning engine or a tool could not complete an invocation. */
export class CapabilityError extends AgentError {
  constructor(message: string, context: ErrorContext = {}, options?: { cause?: unknown }) {
    super('capability_error', message, context, options);
  }
}

export class RecursionLimitError extends CapabilityError {
  constructor(limit: number, context: ErrorContext = {}) {
    super(`Recursion limit of ${limit} reached without a final answer`, { ...context, limit });
  }
}

export class ReplanningError extends AgentError {
  constructor(message: string, context: ErrorContext = {}, options?: { cause?: unknown }) {
    super('replanning_error', message, context, options);
  }
}

export class CacheError extends AgentError {
  constructor(message: string, context: ErrorContext = {}, options?: { cause?: unknown }) {
    super('cache_error', message, context, options);
  }
}

export class ApprovalTimeoutError extends AgentError {
  constructor(planId: string, timeoutMs: number) {
    super('approval_timeout', `No approval decision for plan ${planId} within ${timeoutMs}ms`, { planId, timeoutMs });
  }
}

export class ConfigError extends AgentError {
  constructor(message: string, context: ErrorContext = {}) {
    super('config_error', message, context);
  }
}

export class ChannelClosedError extends AgentError {
  constructor(name: string) {
    super('channel_closed', `Channel ${name} is closed`, { channel: name });
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message || err.name;
  if (typeof err === 'string') return err;
  try {
    return JSON.stringify(err) ?? String(err);
  } catch {
    return String(err);
  }
}

export function isAbort(err: unknown, signal?: AbortSignal): boolean {
  if (signal?.aborted) return true;
  return err instanceof Error && err.name === 'AbortError';
}
