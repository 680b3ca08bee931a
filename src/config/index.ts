/**
 * Environment configuration.
 *
 * Entry points import `dotenv/config` first, then call `loadAgentConfig()`.
 * Validation fails fast with a ConfigError naming every bad variable.
 */

import { z } from 'zod';
import { ConfigError } from '../agent/core/errors.js';

/** Unset and empty variables both fall back to the default. */
const optionalString = z.preprocess((value) => (value === '' ? undefined : value), z.string().optional());

function integer(defaultValue: number, min: number) {
  return z.preprocess(
    (value) => (value === undefined || value === '' ? defaultValue : Number(value)),
    z.number().int().min(min)
  );
}

export const envSchema = z.object({
  ANTHROPIC_API_KEY: z.string({ required_error: 'is required' }).min(1, 'is required'),
  MCP_SERVER_URL: z.preprocess(
    (value) => (value === undefined || value === '' ? 'http://localhost:8000' : value),
    z.string().url()
  ),
  PLANS_DIR: z.preprocess((value) => (value === undefined || value === '' ? './plans' : value), z.string()),
  INVENTORY_PATH: optionalString,
  LEARNING_STORE_PATH: z.preprocess(
    (value) => (value === undefined || value === '' ? './logs/learnings.json' : value),
    z.string()
  ),
  SESSION_LOGS_PATH: z.preprocess(
    (value) => (value === undefined || value === '' ? './logs/sessions' : value),
    z.string()
  ),
  LOG_FILE: optionalString,
  MAX_RETRIES: integer(3, 0),
  FANOUT_CONCURRENCY: integer(4, 1),
  SESSION_TIMEOUT_MS: integer(600_000, 0),
  DEFAULT_INTENT: optionalString,
  REASONER_MODEL: optionalString,
  ASSESSOR_MODEL: optionalString,
  PLANNER_MODEL: optionalString,
  REPORT_MODEL: optionalString,
  INSIGHTS_MODEL: optionalString,
  REDIS_HOST: z.preprocess((value) => (value === undefined || value === '' ? 'localhost' : value), z.string()),
  REDIS_PORT: integer(6379, 1),
  REDIS_PASSWORD: optionalString,
});

export interface ModelConfig {
  reasoner?: string;
  assessor?: string;
  planner?: string;
  report?: string;
  insights?: string;
}

export interface AgentConfig {
  anthropicApiKey: string;
  mcpServerUrl: string;
  plansDir: string;
  /** JSON inventory file; when unset the MCP server's inventory tool is used */
  inventoryPath?: string;
  learningStorePath: string;
  sessionLogsPath: string;
  logFile?: string;
  maxRetries: number;
  fanoutConcurrency: number;
  /** 0 disables the session timeout */
  sessionTimeoutMs: number;
  defaultIntent?: string;
  models: ModelConfig;
}

export interface RedisConfig {
  host: string;
  port: number;
  password?: string;
}

type Env = Record<string, string | undefined>;

function parseEnv(env: Env): z.infer<typeof envSchema> {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')} ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${problems.join('; ')}`);
  }
  return parsed.data;
}

export function loadAgentConfig(env: Env = process.env): AgentConfig {
  const vars = parseEnv(env);
  return {
    anthropicApiKey: vars.ANTHROPIC_API_KEY,
    mcpServerUrl: vars.MCP_SERVER_URL,
    plansDir: vars.PLANS_DIR,
    inventoryPath: vars.INVENTORY_PATH,
    learningStorePath: vars.LEARNING_STORE_PATH,
    sessionLogsPath: vars.SESSION_LOGS_PATH,
    logFile: vars.LOG_FILE,
    maxRetries: vars.MAX_RETRIES,
    fanoutConcurrency: vars.FANOUT_CONCURRENCY,
    sessionTimeoutMs: vars.SESSION_TIMEOUT_MS,
    defaultIntent: vars.DEFAULT_INTENT,
    models: {
      reasoner: vars.REASONER_MODEL,
      assessor: vars.ASSESSOR_MODEL,
      planner: vars.PLANNER_MODEL,
      report: vars.REPORT_MODEL,
      insights: vars.INSIGHTS_MODEL,
    },
  };
}

export function loadRedisConfig(env: Env = process.env): RedisConfig {
  const vars = parseEnv(env);
  return { host: vars.REDIS_HOST, port: vars.REDIS_PORT, password: vars.REDIS_PASSWORD };
}
