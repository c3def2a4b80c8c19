#!/usr/bin/env node
import { Command, Option } from 'commander';
import chalk from 'chalk';
import { nanoid } from 'nanoid';
import { join } from 'node:path';
import { loadConfig, ensureDataDirs } from './config.js';
import type { AppConfig } from './config.js';
import { JsonFileEventCache } from './agent/cache.js';
import { RunContext } from './agent/context.js';
import { DEBUG_LEVELS, DebugMiddleware, isDebugLevel } from './agent/middleware/debug.js';
import { MetricsMiddleware } from './agent/middleware/metrics.js';
import type { Middleware } from './agent/middleware/pipeline.js';
import { TranscriptRecorder } from './agent/middleware/transcript.js';
import { runAgent } from './agent/runner.js';
import { JsonSessionStore } from './agent/store.js';
import { renderEvent } from './cli/render.js';
import { ConfigError, describeError } from './errors.js';
import { OpenAIEngine } from './llm/openai.js';
import { MetricsCollector } from './observability/metrics.js';
import { createLogger, setLogLevel } from './observability/logger.js';
import { ApprovalRegistry, promptApproval, summarizePlan } from './policy/approvals.js';
import { createDefaultRegistry } from './tools/registry.js';

type RunOptions = {
  session?: string;
  approval: boolean;
  debugLevel: string;
  cache?: boolean;
  metrics?: boolean;
  dataDir?: string;
};

const log = createLogger('cli');

function setup(dataDir?: string): AppConfig {
  const cfg = loadConfig();
  setLogLevel(cfg.LOG_LEVEL);
  if (dataDir) cfg.DATA_DIR = dataDir;
  ensureDataDirs(cfg);
  return cfg;
}

// Reports the failure and sets the exit code instead of throwing out of the action.
function guard<A extends unknown[]>(action: (...args: A) => Promise<void>) {
  return async (...args: A) => {
    try {
      await action(...args);
    } catch (err) {
      log.error('command failed', { error: describeError(err) });
      console.error(chalk.red(`Error: ${describeError(err)}`));
      process.exitCode = 1;
    }
  };
}

const program = new Command();

program
  .name('stepwise')
  .description('Task-execution agent that plans, asks for approval and runs multi-step work')
  .version('0.1.0');

program.command('run')
  .description('Send a message to the agent and stream its work')
  .argument('<message...>', 'request for the agent')
  .option('--session <id>', 'session to continue (a new one is created otherwise)')
  .option('--no-approval', 'run declared plans without asking')
  .addOption(new Option('--debug-level <level>', 'how much of each model call to show').choices(DEBUG_LEVELS).default('basic'))
  .option('--cache', 'replay identical requests from the event cache')
  .option('--metrics', 'print run metrics in Prometheus text format')
  .option('--data-dir <dir>', 'directory for sessions, cache and metrics')
  .action(guard(async (parts: string[], opts: RunOptions) => {
    const message = parts.join(' ');
    const cfg = setup(opts.dataDir);
    if (!opts.approval) cfg.PLAN_REQUIRE_APPROVAL = false;
    if (opts.cache) cfg.ENABLE_LLM_CACHE = true;
    if (!isDebugLevel(opts.debugLevel)) throw new ConfigError(`Unknown debug level '${opts.debugLevel}'`);

    const sessionId = opts.session ?? nanoid(10);
    const store = new JsonSessionStore(cfg.DATA_DIR);
    const engine = new OpenAIEngine(cfg);
    const tools = createDefaultRegistry(cfg);
    const approvals = new ApprovalRegistry();
    const metrics = new MetricsCollector();
    const cache = new JsonFileEventCache(join(cfg.DATA_DIR, 'cache'), cfg.CACHE_TTL_MS);

    const controller = new AbortController();
    process.once('SIGINT', () => controller.abort());
    const ctx = new RunContext({ sessionId, signal: controller.signal, debug: opts.debugLevel === 'full' });

    const middlewares: Middleware[] = [new DebugMiddleware(opts.debugLevel), new TranscriptRecorder(store)];
    if (opts.metrics) middlewares.push(new MetricsMiddleware(metrics));

    console.log(chalk.cyan(`▶ session: ${sessionId}`));
    const stream = runAgent(
      { cfg, engine, tools, cache, approvals },
      { message, history: store.history(sessionId), ctx, middlewares },
    );
    for await (const event of stream) {
      if (event.type === 'token') {
        process.stdout.write(event.content);
        continue;
      }
      const line = renderEvent(event);
      if (line) console.log(line);
      if (event.type === 'plan_approval_request') {
        const approved = await promptApproval(summarizePlan(event.title, event.steps));
        approvals.resolve(event.planId, approved);
      }
    }
    process.stdout.write('\n');

    if (opts.metrics) {
      console.log(chalk.bold('\nMetrics:'));
      console.log(metrics.exportPrometheusMetrics());
      console.log(chalk.gray(`saved to ${metrics.saveMetrics(cfg.DATA_DIR)}`));
    }
  }));

const tools = program.command('tools').description('Tools related commands');

tools.command('list')
  .description('List the tools the agent can call')
  .action(guard(async () => {
    const cfg = setup();
    const list = createDefaultRegistry(cfg).list();
    console.log(chalk.bold(`Tools (${list.length}):`));
    for (const t of list) {
      console.log(`- ${t.name}: ${t.description}`);
    }
  }));

const sessions = program.command('sessions').description('Stored conversation sessions');

sessions.command('list')
  .option('--data-dir <dir>', 'directory for sessions, cache and metrics')
  .action(guard(async (opts: { dataDir?: string }) => {
    const cfg = setup(opts.dataDir);
    const ids = new JsonSessionStore(cfg.DATA_DIR).list();
    console.log(chalk.bold(`Sessions (${ids.length}):`));
    for (const id of ids) console.log(`- ${id}`);
  }));

sessions.command('show')
  .argument('<id>', 'session id')
  .option('--data-dir <dir>', 'directory for sessions, cache and metrics')
  .action(guard(async (id: string, opts: { dataDir?: string }) => {
    const cfg = setup(opts.dataDir);
    const session = new JsonSessionStore(cfg.DATA_DIR).load(id);
    if (!session) {
      console.log(chalk.yellow(`No session '${id}'.`));
      return;
    }
    console.log(chalk.cyan(`Session ${session.sessionId} (${session.turns.length} turns)`));
    for (const turn of session.turns) {
      const who = turn.role === 'user' ? chalk.green('user') : chalk.blue('assistant');
      console.log(`\n${who}: ${turn.content}`);
      for (const call of turn.toolCalls ?? []) {
        console.log(chalk.gray(`  ↳ ${call.tool}: ${call.output ?? '(no output)'}`));
      }
    }
  }));

await program.parseAsync();
