import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigurationError } from '../../core/errors.js';
import {
  configFromEnv,
  loadServiceConfig,
  mergeConfig,
  parseServiceConfig,
  redactServiceConfig,
  resolveDatabasePath,
} from '../service_config.js';

describe('loadServiceConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'docintel-config-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('returns defaults with no file and no environment', () => {
    const config = loadServiceConfig({ env: {}, cwd: dir });

    expect(config.storage).toBe('sqlite');
    expect(config.dataDir).toBe('.docintel');
    expect(config.llm.provider).toBe('openai');
    expect(config.embedding.provider).toBe('hashed');
    expect(config.chunking).toEqual({ size: 1000, overlap: 200 });
    expect(config.rateLimit).toEqual({ maxRequests: 60, windowMs: 60_000 });
    expect(config.rag.model).toBe('gpt-4');
    expect(config.rag.topKRetrieval).toBe(10);
  });

  it('reads docintel.yaml from the working directory', () => {
    fs.writeFileSync(path.join(dir, 'docintel.yaml'), 'storage: memory\nrag:\n  topKRetrieval: 20\n  model: gpt-4o\n');

    const config = loadServiceConfig({ env: {}, cwd: dir });

    expect(config.storage).toBe('memory');
    expect(config.rag.topKRetrieval).toBe(20);
    expect(config.rag.model).toBe('gpt-4o');
  });

  it('lets the environment override the file key by key', () => {
    fs.writeFileSync(path.join(dir, 'docintel.yaml'), 'rag:\n  topKRetrieval: 20\n  model: gpt-4o\n');

    const config = loadServiceConfig({ env: { DOCINTEL_TOP_K: '15' }, cwd: dir });

    expect(config.rag.topKRetrieval).toBe(15);
    expect(config.rag.model).toBe('gpt-4o');
  });

  it('applies overrides last', () => {
    const config = loadServiceConfig({
      env: { DOCINTEL_DATA_DIR: '/var/lib/docintel' },
      cwd: dir,
      overrides: { dataDir: ':memory:' },
    });

    expect(config.dataDir).toBe(':memory:');
  });

  it('fails on a missing explicit file', () => {
    expect(() => loadServiceConfig({ env: {}, configPath: path.join(dir, 'absent.yaml') })).toThrow(
      ConfigurationError,
    );
  });

  it('fails on a file whose top level is not a mapping', () => {
    const file = path.join(dir, 'list.yaml');
    fs.writeFileSync(file, '- one\n- two\n');

    expect(() => loadServiceConfig({ env: {}, configPath: file })).toThrow(/must contain a mapping/);
  });

  it('names the key of an invalid value', () => {
    const error = (() => {
      try {
        loadServiceConfig({ env: { DOCINTEL_CHUNK_SIZE: 'big' }, cwd: dir });
      } catch (caught) {
        return caught;
      }
      return undefined;
    })();

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toMatchObject({ configKey: 'chunking.size' });
  });

  it('rejects unknown keys', () => {
    fs.writeFileSync(path.join(dir, 'docintel.yaml'), 'rag:\n  topK: 3\n');

    expect(() => loadServiceConfig({ env: {}, cwd: dir })).toThrow(ConfigurationError);
  });
});

describe('provider model defaults', () => {
  it('uses OpenAI model names by default', () => {
    const { rag } = parseServiceConfig({});

    expect(rag).toMatchObject({ model: 'gpt-4', rerankModel: 'gpt-3.5-turbo', judgeModel: 'gpt-4' });
  });

  it('switches every model to Claude when Anthropic is selected', () => {
    const config = loadServiceConfig({
      env: { DOCINTEL_LLM_PROVIDER: 'anthropic', ANTHROPIC_API_KEY: 'test-secret' },
      cwd: path.join(os.tmpdir(), 'docintel-no-config'),
    });

    expect(config.rag).toMatchObject({
      model: 'claude-3-5-sonnet-latest',
      rerankModel: 'claude-3-5-haiku-latest',
      judgeModel: 'claude-3-5-sonnet-latest',
    });
  });

  it('keeps model names the user set', () => {
    const { rag } = parseServiceConfig({
      llm: { provider: 'anthropic' },
      rag: { model: 'claude-3-opus-latest', rerankModel: undefined },
    });

    expect(rag.model).toBe('claude-3-opus-latest');
    expect(rag.rerankModel).toBe('claude-3-5-haiku-latest');
  });

  it('leaves an invalid provider for the schema to reject', () => {
    expect(() => parseServiceConfig({ llm: { provider: 'cohere' } })).toThrow(ConfigurationError);
  });
});

describe('configFromEnv', () => {
  it('returns nothing for an empty environment', () => {
    expect(configFromEnv({})).toEqual({});
  });

  it('takes the Anthropic key when that provider is selected', () => {
    expect(configFromEnv({ DOCINTEL_LLM_PROVIDER: 'anthropic', ANTHROPIC_API_KEY: 'test-secret' })).toEqual({
      llm: { provider: 'anthropic', apiKey: 'test-secret' },
    });
  });

  it('shares the OpenAI key between chat and embeddings', () => {
    expect(configFromEnv({ OPENAI_API_KEY: 'test-secret' })).toEqual({
      llm: { apiKey: 'test-secret' },
      embedding: { apiKey: 'test-secret' },
    });
  });
});

describe('mergeConfig', () => {
  it('merges sections and replaces scalars', () => {
    const merged = mergeConfig(
      { storage: 'sqlite', rag: { model: 'a', topKRetrieval: 3 } },
      { storage: 'memory', rag: { model: 'b' } },
    );

    expect(merged).toEqual({
      storage: 'memory',
      rag: { model: 'b', topKRetrieval: 3 },
    });
  });
});

describe('helpers', () => {
  const NO_CONFIG_DIR = path.join(os.tmpdir(), 'docintel-no-config');

  it('keeps :memory: as the database path', () => {
    const config = loadServiceConfig({ env: {}, overrides: { dataDir: ':memory:' }, cwd: NO_CONFIG_DIR });
    expect(resolveDatabasePath(config)).toBe(':memory:');
  });

  it('places the database file in the data directory', () => {
    const config = loadServiceConfig({ env: {}, overrides: { dataDir: '/srv/data' }, cwd: NO_CONFIG_DIR });
    expect(resolveDatabasePath(config)).toBe(path.resolve('/srv/data', 'docintel.db'));
  });

  it('redacts API keys', () => {
    const config = loadServiceConfig({
      env: { OPENAI_API_KEY: 'test-secret' },
      overrides: { dataDir: ':memory:' },
      cwd: NO_CONFIG_DIR,
    });

    const redacted = redactServiceConfig(config);

    expect(redacted.llm.apiKey).toBe('[redacted]');
    expect(redacted.embedding.apiKey).toBe('[redacted]');
    expect(config.llm.apiKey).toBe('test-secret');
  });
});
