export { parseEnv, createConfig, EnvSchema, DEFAULT_USER_AGENT } from './env.js';
export type { Env, AppConfig } from './env.js';
