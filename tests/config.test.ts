import { describe, expect, it } from 'vitest';
import { loadConfig } from '../src/config.js';
import { ConfigError } from '../src/errors.js';

describe('loadConfig', () => {
  it('fills in defaults', () => {
    const cfg = loadConfig({});
    expect(cfg.LLM_MODEL).toBe('gpt-4o-mini');
    expect(cfg.PLAN_REQUIRE_APPROVAL).toBe(true);
    expect(cfg.ENABLE_LLM_CACHE).toBe(false);
    expect(cfg.APPROVAL_TIMEOUT_MS).toBe(0);
    expect(cfg.APPROVAL_TIMEOUT_POLICY).toBe('reject');
    expect(cfg.PLAN_MAX_STEPS).toBe(10);
    expect(cfg.OPENAI_API_KEY).toBeUndefined();
  });

  it('parses flags and numbers', () => {
    const cfg = loadConfig({ PLAN_REQUIRE_APPROVAL: 'no', ENABLE_LLM_CACHE: '1', PLAN_MAX_STEPS: '4', LLM_TEMPERATURE: '0.2' });
    expect(cfg.PLAN_REQUIRE_APPROVAL).toBe(false);
    expect(cfg.ENABLE_LLM_CACHE).toBe(true);
    expect(cfg.PLAN_MAX_STEPS).toBe(4);
    expect(cfg.LLM_TEMPERATURE).toBe(0.2);
  });

  it('treats empty values as unset', () => {
    expect(loadConfig({ LLM_MODEL: '  ', OPENAI_API_KEY: '' }).LLM_MODEL).toBe('gpt-4o-mini');
  });

  it('rejects invalid values', () => {
    expect(() => loadConfig({ LOG_LEVEL: 'loud' })).toThrow(ConfigError);
    expect(() => loadConfig({ PLAN_MAX_STEPS: '0' })).toThrow(/PLAN_MAX_STEPS/);
  });
});
