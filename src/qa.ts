/**
 * Knowledge base operations: ingest videos, retrieve sources, answer questions.
 */

import chalk from 'chalk';

import type { AppConfig, LlmType } from './config.js';
import { ensureDirectories } from './config.js';
import {
  openDatabase,
  replaceVideoChunks,
  listVideos as listStoredVideos,
  deleteVideo,
  getStats as getDbStats,
  clearDatabase,
  type Db,
  type VideoSummary,
} from './database.js';
import { extractTranscript, type Transcribe } from './extractor.js';
import { chunkTranscript } from './chunker.js';
import { createEmbedder, type Embedder } from './embedder.js';
import { createGenerator, type AnswerGenerator } from './llm.js';
import { search, type SearchResult } from './search.js';
import { deleteTranscript } from './transcript-store.js';
import { youtubeSource, type VideoSource } from './youtube.js';

export interface QaContext {
  config: AppConfig;
  db: Db;
  embedder: Embedder;
  generator: AnswerGenerator;
  source: VideoSource;
  transcribe?: Transcribe;
}

export interface AddVideoOptions {
  forceRefresh?: boolean;
  onProgress?: (message: string) => void;
}

/**
 * Per-URL hooks for addVideos. A hook that is set replaces the default log line.
 */
export interface AddVideosOptions {
  forceRefresh?: boolean;
  onStart?: (url: string, index: number) => void;
  onProgress?: (url: string, message: string) => void;
  onAdded?: (url: string, result: AddVideoResult) => void;
  onFailed?: (url: string, message: string) => void;
}

export interface AddVideoResult {
  video_id: string;
  title: string;
  chunks: number;
}

export interface KnowledgeBaseStats {
  total_videos: number;
  total_chunks: number;
  database_path: string;
  embedding_model: string;
  embedding_dimensions: number;
  llm: string;
}

export const NO_SOURCES_MESSAGE =
  "I couldn't find any relevant information in the video transcripts to answer your question. " +
  "Please make sure you've added videos to the knowledge base.";

/**
 * Open the database and wire the real embedder, generator and YouTube source.
 */
export function createQaContext(
  config: AppConfig,
  overrides: Partial<Omit<QaContext, 'config' | 'db'>> & { llmType?: LlmType } = {}
): QaContext {
  ensureDirectories(config);

  const embedder = overrides.embedder ?? createEmbedder(config);

  return {
    config,
    db: openDatabase(config.dbPath, embedder.dimensions),
    embedder,
    generator: overrides.generator ?? createGenerator(config, overrides.llmType),
    source: overrides.source ?? youtubeSource,
    transcribe: overrides.transcribe,
  };
}

export function closeQaContext(ctx: QaContext): void {
  ctx.db.close();
}

/**
 * Add a single video to the knowledge base: extract, chunk, embed, store.
 */
export async function addVideo(
  ctx: QaContext,
  videoUrl: string,
  options: AddVideoOptions = {}
): Promise<AddVideoResult> {
  const progress = options.onProgress ?? (() => {});

  const transcript = await extractTranscript(ctx.source, videoUrl, {
    transcriptsPath: ctx.config.transcriptsPath,
    forceRefresh: options.forceRefresh,
    elevenLabsApiKey: ctx.config.elevenLabsApiKey,
    transcribe: ctx.transcribe,
    onProgress: progress,
  });

  progress(`Chunking transcript for ${transcript.video_id}...`);
  const chunks = chunkTranscript(
    transcript.segments,
    transcript.metadata.title,
    ctx.config.chunkSize,
    ctx.config.chunkOverlap
  );

  progress(`Generating embeddings for ${chunks.length} chunks...`);
  const embeddings = await ctx.embedder.embedDocuments(
    chunks.map(c => c.text),
    (done, total) => progress(`Embedded ${done}/${total} chunks...`)
  );

  progress(`Storing ${transcript.video_id} in database...`);
  replaceVideoChunks(
    ctx.db,
    {
      id: transcript.video_id,
      metadata: transcript.metadata,
      language: transcript.language,
      transcript_source: transcript.source,
    },
    chunks,
    embeddings
  );

  return {
    video_id: transcript.video_id,
    title: transcript.metadata.title,
    chunks: chunks.length,
  };
}

/**
 * Add several videos in order. Failures are reported as false, not thrown.
 */
export async function addVideos(
  ctx: QaContext,
  videoUrls: string[],
  options: AddVideosOptions = {}
): Promise<Map<string, boolean>> {
  const results = new Map<string, boolean>();

  for (const [index, url] of videoUrls.entries()) {
    options.onStart?.(url, index);
    try {
      const onProgress = options.onProgress;
      const added = await addVideo(ctx, url, {
        forceRefresh: options.forceRefresh,
        onProgress: onProgress && (message => onProgress(url, message)),
      });
      if (options.onAdded) {
        options.onAdded(url, added);
      } else {
        console.log(chalk.green(`Added "${added.title}" (${added.chunks} chunks)`));
      }
      results.set(url, true);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      if (options.onFailed) {
        options.onFailed(url, message);
      } else {
        console.log(chalk.red(`Error adding video ${url}: ${message}`));
      }
      results.set(url, false);
    }
  }

  return results;
}

/**
 * Retrieve the most relevant chunks for a question without generating an answer.
 */
export function getRelevantSources(
  ctx: QaContext,
  question: string,
  topK: number = ctx.config.topK
): Promise<SearchResult[]> {
  return search(ctx.db, ctx.embedder, question, topK);
}

/**
 * Answer a question from the indexed transcripts. Never throws.
 */
export async function askQuestion(
  ctx: QaContext,
  question: string,
  topK: number = ctx.config.topK
): Promise<string> {
  try {
    const context = await getRelevantSources(ctx, question, topK);
    if (context.length === 0) {
      return NO_SOURCES_MESSAGE;
    }
    return await ctx.generator.generateAnswer(question, context);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(chalk.red(`Error answering question: ${message}`));
    return `I encountered an error while processing your question: ${message}`;
  }
}

export function listVideos(ctx: QaContext): VideoSummary[] {
  return listStoredVideos(ctx.db);
}

/**
 * Remove a video and its cached transcript. Returns false if it wasn't indexed.
 */
export async function removeVideo(ctx: QaContext, videoId: string): Promise<boolean> {
  const removed = deleteVideo(ctx.db, videoId);
  if (removed === 0) {
    return false;
  }
  await deleteTranscript(ctx.config.transcriptsPath, videoId);
  return true;
}

export function getStats(ctx: QaContext): KnowledgeBaseStats {
  const stats = getDbStats(ctx.db);
  return {
    total_videos: stats.videos,
    total_chunks: stats.chunks,
    database_path: ctx.config.dbPath,
    embedding_model: ctx.embedder.model,
    embedding_dimensions: ctx.embedder.dimensions,
    llm: `${ctx.generator.kind} (${ctx.generator.model})`,
  };
}

/**
 * Remove every video from the knowledge base. Cached transcripts are kept.
 */
export function clearKnowledgeBase(ctx: QaContext): void {
  clearDatabase(ctx.db);
}
