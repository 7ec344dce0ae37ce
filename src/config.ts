/**
 * Configuration loaded from the environment (and .env) and validated with zod.
 */

import { config as loadDotenv } from 'dotenv';
import { mkdirSync } from 'fs';
import { dirname, join, resolve } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export const LLM_TYPES = ['gemini', 'fallback'] as const;
export type LlmType = (typeof LLM_TYPES)[number];

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

const envSchema = z
  .object({
    DATA_DIR: z.string().min(1).default('./data'),
    DB_PATH: optionalString,
    TRANSCRIPTS_PATH: optionalString,
    GOOGLE_API_KEY: optionalString,
    ELEVENLABS_API_KEY: optionalString,
    EMBEDDING_MODEL: z.string().min(1).default('gemini-embedding-001'),
    EMBEDDING_DIMENSIONS: z.coerce.number().int().positive().default(768),
    LLM_MODEL: z.string().min(1).default('gemini-2.0-flash'),
    LLM_TYPE: z.enum(LLM_TYPES).default('gemini'),
    CHUNK_SIZE: z.coerce.number().int().positive().default(800),
    CHUNK_OVERLAP: z.coerce.number().int().nonnegative().default(120),
    TOP_K_RESULTS: z.coerce.number().int().positive().default(5),
    MAX_TOKENS: z.coerce.number().int().positive().default(500),
    TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
    PORT: z.coerce.number().int().min(0).max(65535).default(5000),
  })
  .refine((env) => env.CHUNK_OVERLAP < env.CHUNK_SIZE, {
    message: 'CHUNK_OVERLAP must be smaller than CHUNK_SIZE',
    path: ['CHUNK_OVERLAP'],
  });

export interface AppConfig {
  dataDir: string;
  dbPath: string;
  transcriptsPath: string;
  googleApiKey?: string;
  elevenLabsApiKey?: string;
  embeddingModel: string;
  embeddingDimensions: number;
  llmModel: string;
  llmType: LlmType;
  /** Target chunk size, in tokens */
  chunkSize: number;
  /** Tokens carried over between consecutive chunks */
  chunkOverlap: number;
  topK: number;
  maxTokens: number;
  temperature: number;
  port: number;
}

/**
 * Build the application config from an environment object.
 * @throws ConfigError listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(
      (issue) => `${issue.path.join('.') || 'environment'}: ${issue.message}`
    );
    throw new ConfigError(`Invalid configuration:\n  ${problems.join('\n  ')}`);
  }

  const e = parsed.data;
  const dataDir = resolve(e.DATA_DIR);

  return {
    dataDir,
    dbPath: e.DB_PATH === ':memory:' ? e.DB_PATH : resolve(e.DB_PATH ?? join(dataDir, 'knowledge.db')),
    transcriptsPath: resolve(e.TRANSCRIPTS_PATH ?? join(dataDir, 'transcripts')),
    googleApiKey: e.GOOGLE_API_KEY,
    elevenLabsApiKey: e.ELEVENLABS_API_KEY,
    embeddingModel: e.EMBEDDING_MODEL,
    embeddingDimensions: e.EMBEDDING_DIMENSIONS,
    llmModel: e.LLM_MODEL,
    llmType: e.LLM_TYPE,
    chunkSize: e.CHUNK_SIZE,
    chunkOverlap: e.CHUNK_OVERLAP,
    topK: e.TOP_K_RESULTS,
    maxTokens: e.MAX_TOKENS,
    temperature: e.TEMPERATURE,
    port: e.PORT,
  };
}

/**
 * Load .env from the project root into process.env (existing variables win).
 */
export function loadEnvFile(): void {
  const projectRoot = join(dirname(fileURLToPath(import.meta.url)), '..');
  loadDotenv({ path: join(projectRoot, '.env') });
}

/**
 * Create the data and transcript directories if they don't exist.
 */
export function ensureDirectories(config: AppConfig): void {
  mkdirSync(config.dataDir, { recursive: true });
  mkdirSync(config.transcriptsPath, { recursive: true });
  if (config.dbPath !== ':memory:') {
    mkdirSync(dirname(config.dbPath), { recursive: true });
  }
}
