import { describe, expect, it } from 'vitest';
import { join, resolve } from 'path';

import { ConfigError, loadConfig } from '../config.js';

describe('loadConfig', () => {
  it('applies defaults to an empty environment', () => {
    const config = loadConfig({});

    expect(config.dataDir).toBe(resolve('./data'));
    expect(config.dbPath).toBe(join(resolve('./data'), 'knowledge.db'));
    expect(config.transcriptsPath).toBe(join(resolve('./data'), 'transcripts'));
    expect(config.googleApiKey).toBeUndefined();
    expect(config.embeddingModel).toBe('gemini-embedding-001');
    expect(config.embeddingDimensions).toBe(768);
    expect(config.llmModel).toBe('gemini-2.0-flash');
    expect(config.llmType).toBe('gemini');
    expect(config.chunkSize).toBe(800);
    expect(config.chunkOverlap).toBe(120);
    expect(config.topK).toBe(5);
    expect(config.maxTokens).toBe(500);
    expect(config.temperature).toBe(0.7);
    expect(config.port).toBe(5000);
  });

  it('coerces numeric variables and derives paths from DATA_DIR', () => {
    const config = loadConfig({
      DATA_DIR: '/tmp/kb',
      EMBEDDING_DIMENSIONS: '256',
      TOP_K_RESULTS: '3',
      TEMPERATURE: '0.2',
      LLM_TYPE: 'fallback',
      GOOGLE_API_KEY: '  test-secret  ',
    });

    expect(config.dbPath).toBe('/tmp/kb/knowledge.db');
    expect(config.transcriptsPath).toBe('/tmp/kb/transcripts');
    expect(config.embeddingDimensions).toBe(256);
    expect(config.topK).toBe(3);
    expect(config.temperature).toBe(0.2);
    expect(config.llmType).toBe('fallback');
    expect(config.googleApiKey).toBe('test-secret');
  });

  it('treats blank keys as unset and keeps an in-memory database path', () => {
    const config = loadConfig({ GOOGLE_API_KEY: '   ', DB_PATH: ':memory:' });

    expect(config.googleApiKey).toBeUndefined();
    expect(config.dbPath).toBe(':memory:');
  });

  it('rejects an unknown LLM type', () => {
    expect(() => loadConfig({ LLM_TYPE: 'gpt4all' })).toThrow(ConfigError);
  });

  it('rejects an overlap that is not smaller than the chunk size', () => {
    expect(() => loadConfig({ CHUNK_SIZE: '100', CHUNK_OVERLAP: '100' })).toThrow(
      'CHUNK_OVERLAP: CHUNK_OVERLAP must be smaller than CHUNK_SIZE'
    );
  });

  it('lists every invalid variable', () => {
    try {
      loadConfig({ TOP_K_RESULTS: 'many', PORT: '70000' });
      expect.fail('expected loadConfig to throw');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      const message = error instanceof Error ? error.message : '';
      expect(message.startsWith('Invalid configuration:\n')).toBe(true);
      expect(message).toContain('TOP_K_RESULTS:');
      expect(message).toContain('PORT:');
    }
  });
});
