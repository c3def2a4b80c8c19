export { runAgent, REJECTION_MESSAGE } from './agent/runner.js';
export type { RunnerDeps, RunRequest } from './agent/runner.js';
export { RunContext } from './agent/context.js';
export type { ApprovalSignal, RunContextInit } from './agent/context.js';
export { AsyncChannel } from './agent/channel.js';
export { AgentEventSchema, serializeEvent, toSseFrame } from './agent/events.js';
export type { AgentEvent, AgentEventType, EventOf } from './agent/events.js';
export { EventStreamAdapter } from './agent/adapter.js';
export { ReasoningFilter } from './agent/thinking.js';
export { DirectMode } from './agent/modes/direct.js';
export { PlanMode } from './agent/modes/plan.js';
export type { ExecutionMode, ModeDeps, ModeOutcome } from './agent/modes/base.js';
export { Replanner } from './agent/replanner.js';
export { MiddlewarePipeline } from './agent/middleware/pipeline.js';
export type { Middleware } from './agent/middleware/pipeline.js';
export { DebugMiddleware } from './agent/middleware/debug.js';
export type { DebugLevel } from './agent/middleware/debug.js';
export { TranscriptRecorder } from './agent/middleware/transcript.js';
export { MetricsMiddleware } from './agent/middleware/metrics.js';
export { JsonSessionStore } from './agent/store.js';
export type { Session, SessionStore } from './agent/store.js';
export { JsonFileEventCache, MemoryEventCache, cacheKey } from './agent/cache.js';
export type { EventCache } from './agent/cache.js';
export { ApprovalGate, ApprovalRegistry } from './policy/approvals.js';
export { OpenAIEngine } from './llm/openai.js';
export type { EngineMessage, EngineRequest, RawEngineEvent, ReasoningEngine } from './llm/interfaces.js';
export { ToolRegistry, createDefaultRegistry } from './tools/registry.js';
export type { ToolContext, ToolSpec } from './tools/types.js';
export { loadConfig } from './config.js';
export type { AppConfig } from './config.js';
export * from './errors.js';
export type { Plan, PlanStep, ReplanDecision, StepStatus, Turn } from './agent/types.js';
