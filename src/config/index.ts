/**
 * @fileoverview Configuration
 *
 * - `rag_config`: retrieval, ranking and generation settings (frozen at startup)
 * - `service_config`: storage, providers, chunking and rate limiting, loaded
 *   from defaults, an optional YAML file and the environment
 */

export {
  RAGConfigSchema,
  DEFAULT_RAG_CONFIG,
  DISTANCE_METRICS,
  createRAGConfig,
  toConfigurationError,
  type RAGConfig,
  type RAGConfigInput,
  type DistanceMetric,
} from './rag_config.js';

export {
  ServiceConfigSchema,
  LLM_PROVIDERS,
  EMBEDDING_PROVIDERS,
  STORAGE_KINDS,
  DEFAULT_CONFIG_FILE,
  DATABASE_FILE,
  configFromEnv,
  readConfigFile,
  mergeConfig,
  parseServiceConfig,
  loadServiceConfig,
  resolveDatabasePath,
  redactServiceConfig,
  type ServiceConfig,
  type ServiceConfigInput,
  type LlmConfig,
  type EmbeddingConfig,
  type LoadServiceConfigOptions,
} from './service_config.js';
