import * as dotenv from 'dotenv';
import { existsSync, mkdirSync } from 'node:fs';
import { z } from 'zod';
import { ConfigError } from './errors.js';

dotenv.config();

const flag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform(v => v === 'true' || v === '1' || v === 'yes');

const ConfigSchema = z.object({
  OPENAI_API_KEY: z.string().min(1).optional(),
  OPENAI_BASE_URL: z.string().url().optional(),
  LLM_MODEL: z.string().min(1).default('gpt-4o-mini'),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
  LLM_MAX_TOKENS: z.coerce.number().int().positive().default(4096),
  RECURSION_LIMIT: z.coerce.number().int().positive().default(25),
  EXECUTOR_RECURSION_LIMIT: z.coerce.number().int().positive().default(30),
  PLAN_MAX_STEPS: z.coerce.number().int().positive().default(10),
  PLAN_REQUIRE_APPROVAL: flag.default('true'),
  PLAN_REVISION_ENABLED: flag.default('true'),
  APPROVAL_TIMEOUT_MS: z.coerce.number().int().min(0).default(0),
  APPROVAL_TIMEOUT_POLICY: z.enum(['reject', 'approve']).default('reject'),
  ENABLE_LLM_CACHE: flag.default('false'),
  CACHE_TTL_MS: z.coerce.number().int().positive().default(3_600_000),
  DATA_DIR: z.string().min(1).default('./data'),
  WORKSPACE_DIR: z.string().min(1).default('.'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// Empty strings in .env mean "unset".
function pickEnv(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const key of Object.keys(ConfigSchema.shape)) {
    const value = env[key];
    if (value !== undefined && value.trim() !== '') out[key] = value.trim();
  }
  return out;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.safeParse(pickEnv(env));
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }
  return parsed.data;
}

export function ensureDataDirs(cfg: AppConfig) {
  for (const dir of [cfg.DATA_DIR, `${cfg.DATA_DIR}/sessions`, `${cfg.DATA_DIR}/cache`]) {
    if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
  }
}
