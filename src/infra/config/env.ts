/**
 * Environment configuration with validation
 * Uses TypeBox for runtime type checking
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

export const DEFAULT_USER_AGENT = 'DisclosureExtractor/1.0 (public disclosure data aggregator)';

/**
 * Environment variable schema
 */
export const EnvSchema = Type.Object({
  NODE_ENV: Type.Union(
    [Type.Literal('development'), Type.Literal('production'), Type.Literal('test')],
    { default: 'development' }
  ),

  // Logging
  LOG_LEVEL: Type.Union(
    [
      Type.Literal('fatal'),
      Type.Literal('error'),
      Type.Literal('warn'),
      Type.Literal('info'),
      Type.Literal('debug'),
      Type.Literal('trace'),
      Type.Literal('silent'),
    ],
    { default: 'info' }
  ),

  // Fetch collaborator
  FILING_USER_AGENT: Type.String({ minLength: 1, default: DEFAULT_USER_AGENT }),
  FETCH_TIMEOUT_MS: Type.Integer({ minimum: 1, default: 30_000 }),

  // Flow graphs
  FLOW_GRAPH_TOP_N: Type.Integer({ minimum: 1, default: 15 }),
});

export type Env = Static<typeof EnvSchema>;

const parseInteger = (raw: string | undefined, fallback: number): number =>
  raw != null && raw !== '' ? Number(raw) : fallback;

/**
 * Parse and validate environment variables
 */
export const parseEnv = (env: NodeJS.ProcessEnv): Env => {
  const rawEnv = {
    NODE_ENV: env['NODE_ENV'] ?? 'development',
    LOG_LEVEL: env['LOG_LEVEL'] ?? 'info',
    FILING_USER_AGENT:
      env['FILING_USER_AGENT'] != null && env['FILING_USER_AGENT'] !== ''
        ? env['FILING_USER_AGENT']
        : DEFAULT_USER_AGENT,
    FETCH_TIMEOUT_MS: parseInteger(env['FETCH_TIMEOUT_MS'], 30_000),
    FLOW_GRAPH_TOP_N: parseInteger(env['FLOW_GRAPH_TOP_N'], 15),
  };

  // Validate against schema
  if (!Value.Check(EnvSchema, rawEnv)) {
    const errors = [...Value.Errors(EnvSchema, rawEnv)];
    const errorMessages = errors.map((e) => `${e.path}: ${e.message}`).join(', ');
    throw new Error(`Invalid environment configuration: ${errorMessages}`);
  }

  return rawEnv;
};

/**
 * Create a typed configuration object from environment
 */
export const createConfig = (env: Env) => ({
  logger: {
    level: env.LOG_LEVEL,
    pretty: env.NODE_ENV === 'development',
  },
  fetcher: {
    /** Client identifier sent as User-Agent by the HTTP filing source */
    userAgent: env.FILING_USER_AGENT,
    timeoutMs: env.FETCH_TIMEOUT_MS,
  },
  flowGraph: {
    /** Counterparties kept on each side of a flow graph */
    topN: env.FLOW_GRAPH_TOP_N,
  },
});

export type AppConfig = ReturnType<typeof createConfig>;
