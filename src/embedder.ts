/**
 * Embedder module using Google GenAI for text embeddings.
 */

import { GoogleGenAI } from '@google/genai';

import { ConfigError } from './config.js';

export class EmbeddingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EmbeddingError';
  }
}

export type EmbeddingTaskType = 'RETRIEVAL_QUERY' | 'RETRIEVAL_DOCUMENT';

/**
 * The slice of `GoogleGenAI.models` the embedder calls.
 */
export interface EmbedContentClient {
  embedContent(params: {
    model: string;
    contents: string[];
    config?: { outputDimensionality?: number; taskType?: string };
  }): Promise<{ embeddings?: Array<{ values?: number[] }> }>;
}

export interface Embedder {
  readonly model: string;
  readonly dimensions: number;
  embedQuery(text: string): Promise<number[]>;
  embedDocuments(texts: string[], onProgress?: (done: number, total: number) => void): Promise<number[][]>;
}

export interface GeminiEmbedderOptions {
  model: string;
  dimensions: number;
  batchSize?: number;
  /** Pause between batches, in milliseconds */
  batchDelayMs?: number;
  maxRetries?: number;
  /** Initial delay for exponential backoff, in milliseconds */
  retryDelayMs?: number;
}

const DEFAULT_BATCH_SIZE = 100;
const BATCH_DELAY = 100;
const MAX_RETRIES = 3;
const RETRY_DELAY = 1000;

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Scale a vector to unit length (required for dimensions < 3072).
 */
export function normalizeEmbedding(embedding: number[]): number[] {
  const magnitude = Math.sqrt(embedding.reduce((sum, val) => sum + val * val, 0));
  if (magnitude === 0) return embedding;
  return embedding.map(val => val / magnitude);
}

function isRateLimitError(error: unknown): boolean {
  const errorStr = String(error).toLowerCase();
  return errorStr.includes('rate') || errorStr.includes('quota') || errorStr.includes('429');
}

/**
 * Create a GenAI client.
 * @throws ConfigError if no API key is given.
 */
export function createGenAIClient(apiKey: string | undefined): GoogleGenAI {
  if (!apiKey) {
    throw new ConfigError(
      'GOOGLE_API_KEY environment variable is not set. ' +
      'Please set it with your Google AI API key.'
    );
  }
  return new GoogleGenAI({ apiKey });
}

/**
 * Embedder backed by the Gemini embedding API.
 */
export function createGeminiEmbedder(client: EmbedContentClient, options: GeminiEmbedderOptions): Embedder {
  const batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
  const batchDelay = options.batchDelayMs ?? BATCH_DELAY;
  const maxRetries = options.maxRetries ?? MAX_RETRIES;
  const retryDelay = options.retryDelayMs ?? RETRY_DELAY;

  async function embedWithRetry(texts: string[], taskType: EmbeddingTaskType): Promise<number[][]> {
    for (let attempt = 0; ; attempt++) {
      try {
        const response = await client.embedContent({
          model: options.model,
          contents: texts,
          config: { outputDimensionality: options.dimensions, taskType },
        });

        const embeddings = response.embeddings ?? [];
        if (embeddings.length !== texts.length) {
          throw new EmbeddingError(
            `Expected ${texts.length} embeddings from API, got ${embeddings.length}`
          );
        }

        return embeddings.map(embedding => {
          const values = embedding.values ?? [];
          if (values.length !== options.dimensions) {
            throw new EmbeddingError(
              `Expected ${options.dimensions}-dimension embedding, got ${values.length}`
            );
          }
          return normalizeEmbedding(values);
        });
      } catch (error) {
        if (isRateLimitError(error) && attempt < maxRetries - 1) {
          await sleep(retryDelay * Math.pow(2, attempt));
          continue;
        }
        throw error;
      }
    }
  }

  return {
    model: options.model,
    dimensions: options.dimensions,

    async embedQuery(text: string): Promise<number[]> {
      const [embedding] = await embedWithRetry([text], 'RETRIEVAL_QUERY');
      return embedding;
    },

    async embedDocuments(texts, onProgress): Promise<number[][]> {
      if (texts.length === 0) return [];

      const allEmbeddings: number[][] = [];
      for (let batchIdx = 0; batchIdx < texts.length; batchIdx += batchSize) {
        const batch = texts.slice(batchIdx, batchIdx + batchSize);
        allEmbeddings.push(...await embedWithRetry(batch, 'RETRIEVAL_DOCUMENT'));
        onProgress?.(allEmbeddings.length, texts.length);

        // Avoid rate limiting between batches
        if (batchIdx + batchSize < texts.length && batchDelay > 0) {
          await sleep(batchDelay);
        }
      }

      return allEmbeddings;
    },
  };
}

/**
 * Stand-in used when no API key is configured, so commands that never embed still work.
 */
function createUnavailableEmbedder(model: string, dimensions: number): Embedder {
  const unavailable = async (): Promise<never> => {
    throw new ConfigError('GOOGLE_API_KEY is required to embed text. Set it in .env or the environment.');
  };
  return {
    model,
    dimensions,
    embedQuery: unavailable,
    embedDocuments: unavailable,
  };
}

/**
 * Build the embedder for the given settings.
 */
export function createEmbedder(settings: {
  googleApiKey?: string;
  embeddingModel: string;
  embeddingDimensions: number;
}): Embedder {
  if (!settings.googleApiKey) {
    return createUnavailableEmbedder(settings.embeddingModel, settings.embeddingDimensions);
  }
  return createGeminiEmbedder(createGenAIClient(settings.googleApiKey).models, {
    model: settings.embeddingModel,
    dimensions: settings.embeddingDimensions,
  });
}
