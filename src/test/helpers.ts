import { mkdtempSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';

import type { AppConfig } from '../config.js';
import { createQaContext } from '../qa.js';
import type { Embedder } from '../embedder.js';
import type { AnswerGenerator } from '../llm.js';
import type { SearchResult } from '../search.js';
import { placeholderMetadata, type CaptionTrack, type FetchedVideo, type VideoSource } from '../youtube.js';

export const TEST_DIMENSIONS = 8;

function hashString(input: string): number {
  let hash = 2166136261;
  for (let i = 0; i < input.length; i++) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, 16777619);
  }
  return hash >>> 0;
}

function nextSeed(seed: number): number {
  return (seed * 1664525 + 1013904223) >>> 0;
}

function normalize(vector: number[]): number[] {
  let sumSq = 0;
  for (const value of vector) {
    sumSq += value * value;
  }
  const norm = Math.sqrt(sumSq) || 1;
  return vector.map((value) => value / norm);
}

export function makeDeterministicEmbedding(text: string, dimensions = TEST_DIMENSIONS): number[] {
  let seed = hashString(text);
  const values = new Array<number>(dimensions);

  for (let i = 0; i < dimensions; i++) {
    seed = nextSeed(seed);
    values[i] = (seed % 1000) / 1000;
  }

  return normalize(values);
}

/** Unit vector along one axis. */
export function axis(index: number, dimensions = TEST_DIMENSIONS): number[] {
  const values = new Array<number>(dimensions).fill(0);
  values[index] = 1;
  return values;
}

export interface FakeEmbedder extends Embedder {
  queries: string[];
  documents: string[];
}

/**
 * Embeds text with the hash-seeded vectors above. `queryVectors` pins the
 * embedding returned for specific queries.
 */
export function createFakeEmbedder(queryVectors: Record<string, number[]> = {}): FakeEmbedder {
  const queries: string[] = [];
  const documents: string[] = [];

  return {
    model: 'fake-embedding',
    dimensions: TEST_DIMENSIONS,
    queries,
    documents,
    async embedQuery(text) {
      queries.push(text);
      return queryVectors[text] ?? makeDeterministicEmbedding(text);
    },
    async embedDocuments(texts, onProgress) {
      documents.push(...texts);
      onProgress?.(texts.length, texts.length);
      return texts.map((text) => makeDeterministicEmbedding(text));
    },
  };
}

export function createEchoGenerator(): AnswerGenerator & { calls: Array<{ question: string; context: SearchResult[] }> } {
  const calls: Array<{ question: string; context: SearchResult[] }> = [];
  return {
    kind: 'fallback',
    model: 'echo',
    calls,
    async generateAnswer(question, context) {
      calls.push({ question, context });
      return `answer to "${question}" from ${context.length} sources`;
    },
  };
}

export interface FakeVideo extends FetchedVideo {
  captions?: string;
}

/**
 * In-memory stand-in for YouTube. Caption tracks are served from `captions`.
 */
export function createFakeSource(videos: Record<string, FakeVideo>): VideoSource & { fetched: string[] } {
  const fetched: string[] = [];
  return {
    fetched,
    async fetchVideo(videoId) {
      fetched.push(videoId);
      const video = videos[videoId];
      if (!video) {
        throw new Error(`Video not found: ${videoId}`);
      }
      return { metadata: video.metadata, captionTracks: video.captionTracks };
    },
    async downloadCaptions(track: CaptionTrack) {
      const videoId = new URL(track.base_url).searchParams.get('v') ?? '';
      const captions = videos[videoId]?.captions;
      if (captions === undefined) {
        throw new Error(`No captions for ${videoId}`);
      }
      return captions;
    },
    async downloadAudio(videoId, outputDir) {
      return join(outputDir, `${videoId}.mp3`);
    },
  };
}

export function captionTrackFor(videoId: string, languageCode = 'en', kind?: string): CaptionTrack {
  return {
    base_url: `https://captions.test/timedtext?v=${videoId}&lang=${languageCode}`,
    language_code: languageCode,
    kind,
  };
}

export function tempDir(prefix = 'video-qa-test-'): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

export function makeTestConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  const dataDir = overrides.dataDir ?? tempDir();
  return {
    dataDir,
    dbPath: ':memory:',
    transcriptsPath: join(dataDir, 'transcripts'),
    embeddingModel: 'fake-embedding',
    embeddingDimensions: TEST_DIMENSIONS,
    llmModel: 'fake-llm',
    llmType: 'fallback',
    chunkSize: 800,
    chunkOverlap: 120,
    topK: 5,
    maxTokens: 500,
    temperature: 0.7,
    port: 0,
    ...overrides,
  };
}

export const SAMPLE_VIDEO_ID = 'abcdefghijk';
export const SAMPLE_CHUNK_TEXT = 'Embeddings 101 | Welcome to the talk. Today we cover embeddings.';
export const SAMPLE_QUESTION = 'What does the talk cover?';

export const SAMPLE_CAPTIONS = [
  'WEBVTT',
  '',
  '00:00:00.000 --> 00:00:02.000',
  'Welcome to the talk.',
  '',
  '00:00:02.000 --> 00:00:05.000',
  'Today we cover embeddings.',
  '',
].join('\n');

/**
 * Knowledge base over an in-memory database with one sample video available
 * from the fake source. SAMPLE_QUESTION embeds onto that video's only chunk.
 */
export function createSampleContext(
  embedder: FakeEmbedder = createFakeEmbedder({
    [SAMPLE_QUESTION]: makeDeterministicEmbedding(SAMPLE_CHUNK_TEXT),
  })
) {
  const generator = createEchoGenerator();
  const source = createFakeSource({
    [SAMPLE_VIDEO_ID]: {
      metadata: { ...placeholderMetadata(SAMPLE_VIDEO_ID), title: 'Embeddings 101', uploader: 'Test Channel' },
      captionTracks: [captionTrackFor(SAMPLE_VIDEO_ID)],
      captions: SAMPLE_CAPTIONS,
    },
  });
  const ctx = createQaContext(makeTestConfig(), { embedder, generator, source });
  return { ctx, embedder, generator, source };
}
