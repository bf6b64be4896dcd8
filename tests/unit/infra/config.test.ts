/**
 * Unit tests for configuration module
 */

import { describe, expect, it } from 'vitest';

import { DEFAULT_USER_AGENT, createConfig, parseEnv } from '@/infra/config/index.js';

describe('Configuration', () => {
  describe('parseEnv', () => {
    it('returns default values when env is empty', () => {
      const env = parseEnv({});

      expect(env.NODE_ENV).toBe('development');
      expect(env.LOG_LEVEL).toBe('info');
      expect(env.FILING_USER_AGENT).toBe(DEFAULT_USER_AGENT);
      expect(env.FETCH_TIMEOUT_MS).toBe(30_000);
      expect(env.FLOW_GRAPH_TOP_N).toBe(15);
    });

    it('accepts valid LOG_LEVEL values', () => {
      const levels = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

      for (const level of levels) {
        const env = parseEnv({ LOG_LEVEL: level });
        expect(env.LOG_LEVEL).toBe(level);
      }
    });

    it('parses numeric settings', () => {
      const env = parseEnv({ FETCH_TIMEOUT_MS: '5000', FLOW_GRAPH_TOP_N: '8' });

      expect(env.FETCH_TIMEOUT_MS).toBe(5000);
      expect(env.FLOW_GRAPH_TOP_N).toBe(8);
    });

    it('falls back to the default client identifier when blank', () => {
      expect(parseEnv({ FILING_USER_AGENT: '' }).FILING_USER_AGENT).toBe(DEFAULT_USER_AGENT);
      expect(parseEnv({ FILING_USER_AGENT: 'test-agent/1.0' }).FILING_USER_AGENT).toBe('test-agent/1.0');
    });

    it('throws on invalid numbers', () => {
      expect(() => parseEnv({ FETCH_TIMEOUT_MS: 'soon' })).toThrow('Invalid environment configuration');
      expect(() => parseEnv({ FLOW_GRAPH_TOP_N: '0' })).toThrow('Invalid environment configuration');
    });

    it('throws on an unknown log level', () => {
      expect(() => parseEnv({ LOG_LEVEL: 'loud' })).toThrow('Invalid environment configuration');
    });
  });

  describe('createConfig', () => {
    it('sets pretty logging for development only', () => {
      expect(createConfig(parseEnv({ NODE_ENV: 'development' })).logger.pretty).toBe(true);
      expect(createConfig(parseEnv({ NODE_ENV: 'test' })).logger.pretty).toBe(false);
      expect(createConfig(parseEnv({ NODE_ENV: 'production' })).logger.pretty).toBe(false);
    });

    it('passes fetch and flow graph settings through', () => {
      const config = createConfig(
        parseEnv({ FILING_USER_AGENT: 'test-agent/1.0', FETCH_TIMEOUT_MS: '1000', FLOW_GRAPH_TOP_N: '5' })
      );

      expect(config.fetcher).toEqual({ userAgent: 'test-agent/1.0', timeoutMs: 1000 });
      expect(config.flowGraph).toEqual({ topN: 5 });
    });
  });
});
