/**
 * @fileoverview Service configuration loader
 *
 * Resolution order (later wins):
 *   1. schema defaults
 *   2. YAML file (`docintel.yaml` in the working directory, or `configPath`)
 *   3. environment variables
 *
 * The merged object is validated once; the first invalid key is reported as
 * a ConfigurationError.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigurationError } from '../core/errors.js';
import { getErrorMessage } from '../utils/errors.js';
import { RAGConfigSchema, toConfigurationError } from './rag_config.js';

// ============================================================================
// SCHEMA
// ============================================================================

export const LLM_PROVIDERS = ['openai', 'anthropic', 'none'] as const;
export const EMBEDDING_PROVIDERS = ['openai', 'hashed'] as const;
export const STORAGE_KINDS = ['sqlite', 'memory'] as const;

const LlmConfigSchema = z
  .object({
    provider: z.enum(LLM_PROVIDERS).default('openai'),
    apiKey: z.string().min(1).optional(),
    baseUrl: z.string().url().optional(),
    requestTimeoutMs: z.number().int().nonnegative().default(60_000),
  })
  .strict();

const EmbeddingConfigSchema = z
  .object({
    provider: z.enum(EMBEDDING_PROVIDERS).default('hashed'),
    model: z.string().min(1).default('text-embedding-3-small'),
    dimensions: z.number().int().positive().optional(),
    apiKey: z.string().min(1).optional(),
    baseUrl: z.string().url().optional(),
    requestTimeoutMs: z.number().int().nonnegative().default(60_000),
  })
  .strict();

const ChunkingConfigSchema = z
  .object({
    size: z.number().int().positive().default(1000),
    overlap: z.number().int().nonnegative().default(200),
  })
  .strict();

const RateLimitConfigSchema = z
  .object({
    maxRequests: z.number().int().positive().default(60),
    windowMs: z.number().int().positive().default(60_000),
  })
  .strict();

export const ServiceConfigSchema = z
  .object({
    storage: z.enum(STORAGE_KINDS).default('sqlite'),
    /** Directory holding the SQLite database; ':memory:' keeps it in process */
    dataDir: z.string().min(1).default('.docintel'),
    rag: RAGConfigSchema.default({}),
    llm: LlmConfigSchema.default({}),
    embedding: EmbeddingConfigSchema.default({}),
    chunking: ChunkingConfigSchema.default({}),
    rateLimit: RateLimitConfigSchema.default({}),
  })
  .strict();

export type ServiceConfig = z.infer<typeof ServiceConfigSchema>;
export type LlmProvider = (typeof LLM_PROVIDERS)[number];
export type ServiceConfigInput = z.input<typeof ServiceConfigSchema>;
export type LlmConfig = ServiceConfig['llm'];
export type EmbeddingConfig = ServiceConfig['embedding'];

export interface ProviderModelDefaults {
  model: string;
  rerankModel: string;
  judgeModel: string;
}

/**
 * Model names filled into `rag` for the selected provider when the user
 * leaves them unset.
 */
export const PROVIDER_MODEL_DEFAULTS: Readonly<Record<LlmProvider, ProviderModelDefaults>> = {
  openai: { model: 'gpt-4', rerankModel: 'gpt-3.5-turbo', judgeModel: 'gpt-4' },
  anthropic: {
    model: 'claude-3-5-sonnet-latest',
    rerankModel: 'claude-3-5-haiku-latest',
    judgeModel: 'claude-3-5-sonnet-latest',
  },
  none: { model: 'gpt-4', rerankModel: 'gpt-3.5-turbo', judgeModel: 'gpt-4' },
};

export const DEFAULT_CONFIG_FILE = 'docintel.yaml';
export const DATABASE_FILE = 'docintel.db';

// ============================================================================
// ENVIRONMENT
// ============================================================================

type RawSection = Record<string, unknown>;
type RawConfig = Record<string, unknown>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  return Number(raw);
}

function readString(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const raw = env[name]?.trim();
  return raw ? raw : undefined;
}

function compact(section: RawSection): RawSection | undefined {
  const entries = Object.entries(section).filter(([, value]) => value !== undefined);
  return entries.length > 0 ? Object.fromEntries(entries) : undefined;
}

/**
 * Map environment variables onto the config shape. Numbers that fail to
 * parse become NaN and are rejected by the schema.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): RawConfig {
  const llmProvider = readString(env, 'DOCINTEL_LLM_PROVIDER');
  const embeddingProvider = readString(env, 'DOCINTEL_EMBEDDING_PROVIDER');
  const llmApiKey =
    readString(env, 'DOCINTEL_LLM_API_KEY') ??
    (llmProvider === 'anthropic' ? readString(env, 'ANTHROPIC_API_KEY') : readString(env, 'OPENAI_API_KEY'));

  const raw: RawConfig = {
    storage: readString(env, 'DOCINTEL_STORAGE'),
    dataDir: readString(env, 'DOCINTEL_DATA_DIR'),
    rag: compact({
      model: readString(env, 'DOCINTEL_MODEL'),
      temperature: readNumber(env, 'DOCINTEL_TEMPERATURE'),
      maxTokens: readNumber(env, 'DOCINTEL_MAX_TOKENS'),
      maxContextLength: readNumber(env, 'DOCINTEL_MAX_CONTEXT_LENGTH'),
      topKRetrieval: readNumber(env, 'DOCINTEL_TOP_K'),
      finalContextChunks: readNumber(env, 'DOCINTEL_FINAL_CHUNKS'),
      minRelevanceScore: readNumber(env, 'DOCINTEL_MIN_RELEVANCE'),
      rerankModel: readString(env, 'DOCINTEL_RERANK_MODEL'),
      judgeModel: readString(env, 'DOCINTEL_JUDGE_MODEL'),
      rerankConcurrency: readNumber(env, 'DOCINTEL_RERANK_CONCURRENCY'),
      distanceMetric: readString(env, 'DOCINTEL_DISTANCE_METRIC'),
    }),
    llm: compact({
      provider: llmProvider,
      apiKey: llmApiKey,
      baseUrl: readString(env, 'DOCINTEL_LLM_BASE_URL'),
      requestTimeoutMs: readNumber(env, 'DOCINTEL_LLM_TIMEOUT_MS'),
    }),
    embedding: compact({
      provider: embeddingProvider,
      model: readString(env, 'DOCINTEL_EMBEDDING_MODEL'),
      dimensions: readNumber(env, 'DOCINTEL_EMBEDDING_DIMENSIONS'),
      apiKey: readString(env, 'DOCINTEL_EMBEDDING_API_KEY') ?? readString(env, 'OPENAI_API_KEY'),
      baseUrl: readString(env, 'DOCINTEL_EMBEDDING_BASE_URL'),
    }),
    chunking: compact({
      size: readNumber(env, 'DOCINTEL_CHUNK_SIZE'),
      overlap: readNumber(env, 'DOCINTEL_CHUNK_OVERLAP'),
    }),
    rateLimit: compact({
      maxRequests: readNumber(env, 'DOCINTEL_RATE_LIMIT_MAX'),
      windowMs: readNumber(env, 'DOCINTEL_RATE_LIMIT_WINDOW_MS'),
    }),
  };

  return compact(raw) ?? {};
}

// ============================================================================
// FILE
// ============================================================================

export function readConfigFile(filePath: string): RawConfig {
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    throw new ConfigurationError('configPath', `cannot read ${filePath}: ${getErrorMessage(error)}`);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(text);
  } catch (error) {
    throw new ConfigurationError('configPath', `invalid YAML in ${filePath}: ${getErrorMessage(error)}`);
  }

  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) {
    throw new ConfigurationError('configPath', `${filePath} must contain a mapping at the top level`);
  }
  return parsed;
}

/**
 * Two-level merge: top-level sections are merged key by key, scalars are
 * replaced.
 */
export function mergeConfig(base: RawConfig, override: RawConfig): RawConfig {
  const merged: RawConfig = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const existing = merged[key];
    merged[key] = isRecord(existing) && isRecord(value) ? { ...existing, ...value } : value;
  }
  return merged;
}

// ============================================================================
// LOADER
// ============================================================================

export interface LoadServiceConfigOptions {
  env?: NodeJS.ProcessEnv;
  /** Explicit YAML path; a missing explicit file is an error */
  configPath?: string;
  /** Directory searched for docintel.yaml when no path is given */
  cwd?: string;
  overrides?: ServiceConfigInput;
}

function isLlmProvider(value: unknown): value is LlmProvider {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(PROVIDER_MODEL_DEFAULTS, value);
}

/**
 * Fill unset `rag` model names from the provider's defaults. Input the
 * schema will reject anyway is returned untouched.
 */
export function applyProviderDefaults(raw: unknown): unknown {
  if (!isRecord(raw)) return raw;
  const llm = raw.llm ?? {};
  const rag = raw.rag ?? {};
  if (!isRecord(llm) || !isRecord(rag)) return raw;

  const provider = llm.provider ?? 'openai';
  if (!isLlmProvider(provider)) return raw;

  const defaults = PROVIDER_MODEL_DEFAULTS[provider];
  return {
    ...raw,
    rag: {
      model: defaults.model,
      rerankModel: defaults.rerankModel,
      judgeModel: defaults.judgeModel,
      ...compact(rag),
    },
  };
}

export function parseServiceConfig(raw: unknown): ServiceConfig {
  const parsed = ServiceConfigSchema.safeParse(applyProviderDefaults(raw));
  if (!parsed.success) {
    throw toConfigurationError(parsed.error);
  }
  return parsed.data;
}

export function loadServiceConfig(options: LoadServiceConfigOptions = {}): ServiceConfig {
  const env = options.env ?? process.env;
  const explicitPath = options.configPath ?? readString(env, 'DOCINTEL_CONFIG');

  let fileConfig: RawConfig = {};
  if (explicitPath) {
    fileConfig = readConfigFile(explicitPath);
  } else {
    const candidate = path.join(options.cwd ?? process.cwd(), DEFAULT_CONFIG_FILE);
    if (fs.existsSync(candidate)) {
      fileConfig = readConfigFile(candidate);
    }
  }

  let merged = mergeConfig(fileConfig, configFromEnv(env));
  if (options.overrides) {
    merged = mergeConfig(merged, options.overrides);
  }
  return parseServiceConfig(merged);
}

export function resolveDatabasePath(config: ServiceConfig): string {
  if (config.dataDir === ':memory:') return ':memory:';
  return path.resolve(config.dataDir, DATABASE_FILE);
}

/**
 * Config safe to print: API keys are replaced by a marker.
 */
export function redactServiceConfig(config: ServiceConfig): ServiceConfig {
  return {
    ...config,
    llm: { ...config.llm, apiKey: config.llm.apiKey ? '[redacted]' : undefined },
    embedding: { ...config.embedding, apiKey: config.embedding.apiKey ? '[redacted]' : undefined },
  };
}
