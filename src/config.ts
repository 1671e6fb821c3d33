/**
 * Configuration management using Zod for validation.
 */

import { z } from 'zod';
import dotenv from 'dotenv';
import { fileURLToPath } from 'url';
import { dirname, join, resolve } from 'path';
import { existsSync } from 'fs';
import type { Knex } from 'knex';
import { ConfigError } from './types/errors.js';
import { DEFAULT_MAX_ROWS } from './types/models.js';

// Get directory name in ES modules
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
export const rootDir = join(__dirname, '..');

// Load .env file if it exists
const envPath = join(rootDir, '.env');
if (existsSync(envPath)) {
  dotenv.config({ path: envPath });
}

/**
 * Supported text-generation providers.
 * `ollama` talks to any OpenAI-compatible chat endpoint.
 */
export type LLMProvider = 'anthropic' | 'openai' | 'ollama';

/**
 * Supported data stores. Both can scope a transaction as read-only.
 */
export type DatabaseType = 'pg' | 'sqlite3';

/**
 * Log levels accepted in LOG_LEVEL.
 */
export const LogLevelSchema = z.enum(['DEBUG', 'INFO', 'WARN', 'ERROR', 'FATAL']);

/**
 * Configuration schema with validation and defaults.
 */
const ConfigSchema = z.object({
  // Generation service
  LLM_PROVIDER: z.enum(['anthropic', 'openai', 'ollama']).default('ollama'),
  LLM_MODEL: z.string().optional(), // Provider-specific defaults applied in loadConfig()
  LLM_BASE_URL: z.string().url().optional(),
  LLM_MAX_TOKENS: z.coerce.number().int().positive().default(512),
  ANTHROPIC_API_KEY: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),
  GENERATION_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  SCHEMA_CONTEXT_PATH: z.string().default('schema/analytics.sql'),

  // Data store
  DATABASE_TYPE: z.enum(['pg', 'sqlite3']).default('sqlite3'),
  DATABASE_URL: z.string().optional(),
  DATABASE_PATH: z.string().default('./analytics.db'),
  STATEMENT_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),

  // Pipeline
  DEFAULT_MAX_ROWS: z.coerce.number().int().positive().default(DEFAULT_MAX_ROWS),

  // Server
  LOG_LEVEL: LogLevelSchema.default('INFO'),
  HOST: z.string().default('0.0.0.0'),
  PORT: z.coerce.number().int().positive().default(8000),
});

/**
 * Type for base configuration object.
 */
type BaseConfig = z.infer<typeof ConfigSchema>;

/**
 * Generation client settings.
 */
export interface LLMConfig {
  provider: LLMProvider;
  model: string;
  apiKey?: string;
  baseURL?: string;
  maxTokens: number;
  timeoutMs: number;
}

/**
 * Extended configuration with parsed KNEX_CONFIG and LLM_CONFIG.
 */
export interface Config extends Pick<BaseConfig,
  'DEFAULT_MAX_ROWS' | 'LOG_LEVEL' | 'HOST' | 'PORT' | 'STATEMENT_TIMEOUT_MS'
> {
  DATABASE_TYPE: DatabaseType;
  KNEX_CONFIG: Knex.Config;
  LLM_CONFIG: LLMConfig;
  SCHEMA_CONTEXT_PATH: string;
}

const DEFAULT_MODELS: Record<LLMProvider, string> = {
  anthropic: 'claude-sonnet-4-5',
  openai: 'gpt-4o-mini',
  ollama: 'sqlcoder:7b-q4_K_M',
};

const DEFAULT_OLLAMA_URL = 'http://localhost:11434/v1';

/**
 * Parse and validate configuration from environment variables.
 *
 * @throws ConfigError listing every problem found
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  const baseConfig = parsed.data;
  const issues: string[] = [];

  // Build Knex config based on database type
  let knexConfig: Knex.Config;

  switch (baseConfig.DATABASE_TYPE) {
    case 'pg':
      if (!baseConfig.DATABASE_URL) {
        issues.push('DATABASE_URL is required when DATABASE_TYPE is pg');
      }
      knexConfig = {
        client: 'pg',
        connection: baseConfig.DATABASE_URL,
        pool: { min: 0, max: 10 },
      };
      break;

    case 'sqlite3':
      knexConfig = {
        client: 'better-sqlite3',
        connection: {
          filename: baseConfig.DATABASE_PATH,
        },
        useNullAsDefault: true,
      };
      break;
  }

  // Determine API key based on provider
  let apiKey: string | undefined;
  switch (baseConfig.LLM_PROVIDER) {
    case 'anthropic':
      if (!baseConfig.ANTHROPIC_API_KEY) {
        issues.push('ANTHROPIC_API_KEY is required when LLM_PROVIDER is anthropic');
      }
      apiKey = baseConfig.ANTHROPIC_API_KEY;
      break;
    case 'openai':
      if (!baseConfig.OPENAI_API_KEY) {
        issues.push('OPENAI_API_KEY is required when LLM_PROVIDER is openai');
      }
      apiKey = baseConfig.OPENAI_API_KEY;
      break;
    case 'ollama':
      // Ollama ignores the key, but the OpenAI client insists on one
      apiKey = baseConfig.OPENAI_API_KEY ?? 'ollama';
      break;
  }

  if (issues.length > 0) {
    throw new ConfigError(issues);
  }

  const llmConfig: LLMConfig = {
    provider: baseConfig.LLM_PROVIDER,
    model: baseConfig.LLM_MODEL || DEFAULT_MODELS[baseConfig.LLM_PROVIDER],
    apiKey,
    baseURL:
      baseConfig.LLM_BASE_URL ??
      (baseConfig.LLM_PROVIDER === 'ollama' ? DEFAULT_OLLAMA_URL : undefined),
    maxTokens: baseConfig.LLM_MAX_TOKENS,
    timeoutMs: baseConfig.GENERATION_TIMEOUT_MS,
  };

  return {
    DEFAULT_MAX_ROWS: baseConfig.DEFAULT_MAX_ROWS,
    LOG_LEVEL: baseConfig.LOG_LEVEL,
    HOST: baseConfig.HOST,
    PORT: baseConfig.PORT,
    STATEMENT_TIMEOUT_MS: baseConfig.STATEMENT_TIMEOUT_MS,
    DATABASE_TYPE: baseConfig.DATABASE_TYPE,
    KNEX_CONFIG: knexConfig,
    LLM_CONFIG: llmConfig,
    SCHEMA_CONTEXT_PATH: resolve(rootDir, baseConfig.SCHEMA_CONTEXT_PATH),
  };
}

/**
 * Global configuration instance (lazy-loaded).
 */
let _config: Config | null = null;

export function getConfig(): Config {
  if (!_config) {
    _config = loadConfig();
  }
  return _config;
}
