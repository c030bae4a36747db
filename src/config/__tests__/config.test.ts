// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION TESTS — Validation, Environment Loading, Cached Access
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  AppConfigSchema,
  validateConfig,
  safeValidateConfig,
  formatConfigErrors,
  getDefaultConfig,
} from '../schema.js';
import {
  envBool,
  envNumber,
  envList,
  loadConfig,
  getConfig,
  isConfigLoaded,
  resetConfig,
  loadTestConfig,
  ConfigValidationError,
} from '../loader.js';

const ENV_KEYS = [
  'NODE_ENV',
  'PORT',
  'OPENAI_API_KEY',
  'TAVILY_API_KEY',
  'LLM_MODEL',
  'LOG_LEVEL',
  'FACTCHECK_CONCURRENCY',
  'CONFIDENCE_PRECEDENCE',
  'LLM_DAILY_QUOTA',
  'TEST_FLAG',
  'TEST_NUMBER',
  'TEST_LIST',
];

let savedEnv: Record<string, string | undefined> = {};

beforeEach(() => {
  savedEnv = {};
  for (const key of ENV_KEYS) {
    savedEnv[key] = process.env[key];
    delete process.env[key];
  }
  resetConfig();
});

afterEach(() => {
  for (const key of ENV_KEYS) {
    const value = savedEnv[key];
    if (value === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }
  resetConfig();
});

// ─────────────────────────────────────────────────────────────────────────────────
// SCHEMA TESTS
// ─────────────────────────────────────────────────────────────────────────────────

describe('AppConfigSchema', () => {
  it('should accept empty object with all defaults', () => {
    const result = AppConfigSchema.safeParse({});
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.environment).toBe('development');
      expect(result.data.server.port).toBe(3001);
      expect(result.data.search.webMaxResults).toBe(5);
      expect(result.data.search.encyclopediaMaxResults).toBe(3);
      expect(result.data.search.excerptChars).toBe(500);
      expect(result.data.pipeline.maxQuestions).toBe(3);
      expect(result.data.pipeline.concurrency).toBe(1);
    }
  });

  it('should apply judge thresholds by default', () => {
    const config = getDefaultConfig();
    expect(config.judge).toEqual({ fakeConfidence: 0.7, realRatio: 0.6, realConfidence: 0.7 });
    expect(config.verifier.confidencePrecedence).toBe('explicit-first');
  });

  it('should default the language model limiter to slow pacing', () => {
    const config = getDefaultConfig();
    expect(config.rateLimit.llm).toEqual({
      minIntervalMs: 1000,
      baseDelayMs: 10000,
      maxRetries: 5,
      maxBackoffMs: 120000,
    });
  });

  it('should reject out-of-range thresholds', () => {
    const result = safeValidateConfig({ judge: { fakeConfidence: 1.5 } });
    expect(result.success).toBe(false);
  });

  it('should throw from validateConfig on invalid input', () => {
    expect(() => validateConfig({ server: { port: 0 } })).toThrow();
  });

  it('should format issues with their path', () => {
    const result = AppConfigSchema.safeParse({ pipeline: { concurrency: 0 } });
    expect(result.success).toBe(false);
    if (!result.success) {
      const lines = formatConfigErrors(result.error);
      expect(lines).toHaveLength(1);
      expect(lines[0]).toMatch(/^pipeline\.concurrency: /);
    }
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// ENVIRONMENT HELPERS
// ─────────────────────────────────────────────────────────────────────────────────

describe('environment helpers', () => {
  it('should parse booleans', () => {
    expect(envBool('TEST_FLAG', true)).toBe(true);
    process.env.TEST_FLAG = 'yes';
    expect(envBool('TEST_FLAG')).toBe(true);
    process.env.TEST_FLAG = 'off';
    expect(envBool('TEST_FLAG', true)).toBe(false);
  });

  it('should fall back on unparseable numbers', () => {
    process.env.TEST_NUMBER = 'abc';
    expect(envNumber('TEST_NUMBER', 7)).toBe(7);
    process.env.TEST_NUMBER = '42';
    expect(envNumber('TEST_NUMBER', 7)).toBe(42);
  });

  it('should split and trim lists', () => {
    process.env.TEST_LIST = ' a, b ,,c ';
    expect(envList('TEST_LIST')).toEqual(['a', 'b', 'c']);
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// LOADER
// ─────────────────────────────────────────────────────────────────────────────────

describe('loadConfig', () => {
  it('should read keys and overrides from the environment', () => {
    process.env.NODE_ENV = 'production';
    process.env.PORT = '8080';
    process.env.OPENAI_API_KEY = 'test-secret';
    process.env.LLM_MODEL = 'gpt-4o';
    process.env.LOG_LEVEL = 'DEBUG';
    process.env.FACTCHECK_CONCURRENCY = '2';
    process.env.CONFIDENCE_PRECEDENCE = 'votes-first';

    const config = loadConfig();

    expect(config.environment).toBe('production');
    expect(config.server.port).toBe(8080);
    expect(config.llm.apiKey).toBe('test-secret');
    expect(config.llm.model).toBe('gpt-4o');
    expect(config.logging.level).toBe('debug');
    expect(config.logging.pretty).toBe(false);
    expect(config.pipeline.concurrency).toBe(2);
    expect(config.verifier.confidencePrecedence).toBe('votes-first');
    expect(config.search.tavilyApiKey).toBeUndefined();
  });

  it('should leave the daily quota unset when zero', () => {
    expect(loadConfig().rateLimit.llm.dailyQuota).toBeUndefined();
    process.env.LLM_DAILY_QUOTA = '50';
    expect(loadConfig().rateLimit.llm.dailyQuota).toBe(50);
  });

  it('should throw ConfigValidationError on invalid values', () => {
    process.env.FACTCHECK_CONCURRENCY = '99';
    expect(() => loadConfig()).toThrow(ConfigValidationError);
  });

  it('should cache the loaded config', () => {
    expect(isConfigLoaded()).toBe(false);
    const first = getConfig();
    expect(isConfigLoaded()).toBe(true);
    expect(getConfig()).toBe(first);
  });

  it('should build a test config with overrides', () => {
    const config = loadTestConfig({ pipeline: { maxQuestions: 2 } });
    expect(config.environment).toBe('test');
    expect(config.pipeline.maxQuestions).toBe(2);
    expect(config.logging.level).toBe('error');
    expect(getConfig()).toBe(config);
  });
});
