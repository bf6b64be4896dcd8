/**
 * Disclosure filing extraction.
 *
 * Turns public-disclosure filing pages (campaign-finance reports, entity and
 * lobbyist registrations, lobbyist expenditure reports) into structured
 * records, and aggregates those records for flow diagrams.
 */

export * from './modules/document/index.js';
export * from './modules/extraction/index.js';
export * from './modules/analytics/index.js';
export * from './modules/filing-import/index.js';

export { createLogger, createChildLogger, type Logger, type LoggerConfig, type LogLevel } from './infra/logger/index.js';
export { parseEnv, createConfig, EnvSchema, type Env, type AppConfig } from './infra/config/index.js';
export type { AppError, InfraError } from './common/types/errors.js';
