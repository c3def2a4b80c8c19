import type { AppConfig } from '../config.js';
import { describeError, isAbort } from '../errors.js';
import { createLogger } from '../observability/logger.js';
import { createFetchUrlTool } from './impl/fetch_url.js';
import planCreate, { PLAN_CREATE } from './impl/plan_create.js';
import planUpdate from './impl/plan_update.js';
import { createReadFileTool } from './impl/read_file.js';
import type { ToolContext, ToolSpec } from './types.js';

const log = createLogger('tools');

export class ToolRegistry {
  private tools = new Map<string, ToolSpec>();

  constructor(tools: ToolSpec[] = []) {
    this.registerTools(tools);
  }

  registerTools(tools: ToolSpec[]): void {
    for (const tool of tools) {
      if (this.tools.has(tool.name)) log.warn('tool registered twice; keeping the latest', { tool: tool.name });
      this.tools.set(tool.name, tool);
    }
  }

  list(): ToolSpec[] {
    return Array.from(this.tools.values());
  }

  get(name: string): ToolSpec | undefined {
    return this.tools.get(name);
  }

  /** Everything except plan declaration: what a plan step may use. */
  executorTools(): ToolSpec[] {
    return this.list().filter(t => t.name !== PLAN_CREATE);
  }
}

export function createDefaultRegistry(cfg: AppConfig): ToolRegistry {
  return new ToolRegistry([
    planCreate,
    planUpdate,
    createReadFileTool(cfg.WORKSPACE_DIR),
    createFetchUrlTool(),
  ]);
}

function formatIssues(issues: { path: (string | number)[]; message: string }[]): string {
  return issues.map(i => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message)).join('; ');
}

/**
 * Validates and runs one tool call. Failures come back as "Error: ..." text
 * for the model to read; only cancellation propagates.
 */
export async function invokeTool(tool: ToolSpec | undefined, name: string, args: unknown, ctx: ToolContext): Promise<string> {
  if (!tool) return `Error: unknown tool '${name}'.`;
  const parsed = tool.schema.safeParse(args);
  if (!parsed.success) return `Error: invalid arguments for ${name}: ${formatIssues(parsed.error.issues)}`;
  try {
    return await tool.run(parsed.data, ctx);
  } catch (err) {
    if (isAbort(err, ctx.signal)) throw err;
    log.warn('tool call failed', { session: ctx.run.sessionId, tool: name, error: describeError(err) });
    return `Error: ${describeError(err)}`;
  }
}
