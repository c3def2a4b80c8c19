import type { MetricsCollector } from '../../observability/metrics.js';
import type { RunContext } from '../context.js';
import type { AgentEvent } from '../events.js';
import type { Middleware } from './pipeline.js';

/** Counts events by type and records model and tool latencies. */
export class MetricsMiddleware implements Middleware {
  readonly name = 'metrics';
  private startedAt = 0;

  constructor(private metrics: MetricsCollector, private clock: () => number = Date.now) {}

  onRunStart(): void {
    this.startedAt = this.clock();
    this.metrics.incrementCounter('agent_runs_total');
  }

  onEvent(event: AgentEvent, _ctx: RunContext): AgentEvent {
    this.metrics.incrementCounter('agent_events_total', { type: event.type });
    if (event.type === 'llm_end') this.metrics.recordHistogram('agent_llm_duration_ms', event.durationMs, { origin: event.origin });
    if (event.type === 'tool_end') this.metrics.recordHistogram('agent_tool_duration_ms', event.durationMs, { tool: event.tool });
    if (event.type === 'error') this.metrics.incrementCounter('agent_errors_total');
    if (event.type === 'plan_updated' && event.status === 'failed') this.metrics.incrementCounter('agent_step_failures_total');
    return event;
  }

  onRunEnd(): void {
    this.metrics.recordHistogram('agent_run_duration_ms', this.clock() - this.startedAt);
  }
}
