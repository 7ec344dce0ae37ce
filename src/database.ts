/**
 * SQLite + sqlite-vec storage for videos, transcript chunks and their embeddings.
 */

import Database from 'better-sqlite3';
import * as sqliteVec from 'sqlite-vec';

import type { VideoMetadata } from './youtube.js';
import type { TranscriptSource } from './transcript-store.js';
import type { Chunk } from './chunker.js';

export type Db = Database.Database;

// Types
export interface VideoRow {
  id: string;
  title: string;
  uploader: string;
  url: string;
  duration: number;
  upload_date: string;
  description: string;
  view_count: number;
  language: string;
  transcript_source: TranscriptSource;
  indexed_at: string;
}

export interface VideoSummary extends VideoRow {
  chunks: number;
}

export interface ChunkRow {
  id: number;
  video_id: string;
  seq: number;
  start_time: number;
  end_time: number;
  text: string;
}

export interface ChunkMatch {
  chunk_id: number;
  distance: number;
  text: string;
  seq: number;
  start_time: number;
  end_time: number;
  video_id: string;
  video_title: string;
  uploader: string;
  upload_date: string;
  video_url: string;
}

export interface Stats {
  videos: number;
  chunks: number;
}

export interface NewVideo {
  id: string;
  metadata: VideoMetadata;
  language: string;
  transcript_source: TranscriptSource;
}

export class DimensionMismatchError extends Error {
  constructor(expected: number, actual: number) {
    super(
      `Database was created for ${actual}-dimension embeddings but ${expected} were requested. ` +
      'Clear the knowledge base or set EMBEDDING_DIMENSIONS to match.'
    );
    this.name = 'DimensionMismatchError';
  }
}

/**
 * Open a database connection with sqlite-vec loaded and the schema in place.
 */
export function openDatabase(path: string, dimensions: number): Db {
  const db = new Database(path);
  sqliteVec.load(db);
  db.pragma('foreign_keys = ON');
  try {
    initDb(db, dimensions);
  } catch (error) {
    db.close();
    throw error;
  }
  return db;
}

/**
 * Initialize database schema.
 */
export function initDb(db: Db, dimensions: number): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS meta (
      key TEXT PRIMARY KEY,
      value TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS videos (
      id TEXT PRIMARY KEY,
      title TEXT NOT NULL,
      uploader TEXT NOT NULL,
      url TEXT NOT NULL,
      duration INTEGER NOT NULL DEFAULT 0,
      upload_date TEXT NOT NULL DEFAULT 'Unknown',
      description TEXT NOT NULL DEFAULT '',
      view_count INTEGER NOT NULL DEFAULT 0,
      language TEXT NOT NULL DEFAULT 'unknown',
      transcript_source TEXT NOT NULL,
      indexed_at TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS chunks (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      video_id TEXT NOT NULL REFERENCES videos(id) ON DELETE CASCADE,
      seq INTEGER NOT NULL,
      start_time REAL NOT NULL,
      end_time REAL NOT NULL,
      text TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_chunks_video_id ON chunks(video_id);
  `);

  const storedDims = storedDimensions(db);
  if (storedDims !== null) {
    if (storedDims !== dimensions) {
      throw new DimensionMismatchError(dimensions, storedDims);
    }
  } else {
    db.prepare("INSERT INTO meta (key, value) VALUES ('dimensions', ?)").run(String(dimensions));
  }

  createVectorTable(db, dimensions);
}

function createVectorTable(db: Db, dimensions: number): void {
  const tableExists = db.prepare(
    "SELECT name FROM sqlite_master WHERE type='table' AND name='chunks_vec'"
  ).get();

  if (!tableExists) {
    db.exec(`
      CREATE VIRTUAL TABLE chunks_vec USING vec0(
        chunk_id INTEGER PRIMARY KEY,
        embedding float[${dimensions}]
      )
    `);
  }
}

function storedDimensions(db: Db): number | null {
  const row = db.prepare("SELECT value FROM meta WHERE key = 'dimensions'").get();
  return isValueRow(row) ? parseInt(row.value, 10) : null;
}

function isValueRow(row: unknown): row is { value: string } {
  return typeof row === 'object' && row !== null && 'value' in row && typeof row.value === 'string';
}

function toVectorBlob(embedding: number[]): Buffer {
  const floatArray = new Float32Array(embedding);
  return Buffer.from(floatArray.buffer);
}

// Video operations

/**
 * Insert or update a video.
 */
export function upsertVideo(db: Db, video: NewVideo): void {
  const m = video.metadata;
  db.prepare(`
    INSERT INTO videos (id, title, uploader, url, duration, upload_date, description, view_count, language, transcript_source, indexed_at)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    ON CONFLICT(id) DO UPDATE SET
      title = excluded.title,
      uploader = excluded.uploader,
      url = excluded.url,
      duration = excluded.duration,
      upload_date = excluded.upload_date,
      description = excluded.description,
      view_count = excluded.view_count,
      language = excluded.language,
      transcript_source = excluded.transcript_source,
      indexed_at = excluded.indexed_at
  `).run(
    video.id,
    m.title,
    m.uploader,
    m.url,
    Math.round(m.duration),
    m.upload_date,
    m.description,
    m.view_count,
    video.language,
    video.transcript_source,
    new Date().toISOString()
  );
}

/**
 * Get a video by ID.
 */
export function getVideo(db: Db, videoId: string): VideoRow | undefined {
  return db.prepare('SELECT * FROM videos WHERE id = ?').get(videoId) as VideoRow | undefined;
}

/**
 * List videos with their chunk counts, most recently indexed first.
 */
export function listVideos(db: Db): VideoSummary[] {
  return db.prepare(`
    SELECT videos.*, COUNT(chunks.id) AS chunks
    FROM videos
    LEFT JOIN chunks ON chunks.video_id = videos.id
    GROUP BY videos.id
    ORDER BY videos.indexed_at DESC, videos.id
  `).all() as VideoSummary[];
}

// Chunk operations

/**
 * Insert a chunk and return its ID.
 */
export function insertChunk(db: Db, videoId: string, chunk: Chunk): number {
  const result = db.prepare(`
    INSERT INTO chunks (video_id, seq, start_time, end_time, text)
    VALUES (?, ?, ?, ?, ?)
  `).run(videoId, chunk.seq, chunk.start_time, chunk.end_time, chunk.text);
  // lastInsertRowid may be a bigint, convert to number for sqlite-vec compatibility
  return Number(result.lastInsertRowid);
}

/**
 * Insert a chunk embedding into the vector table.
 */
export function insertChunkEmbedding(db: Db, chunkId: number, embedding: number[]): void {
  // sqlite-vec with better-sqlite3 needs BigInt for integer PK when using blob params
  db.prepare('INSERT INTO chunks_vec (chunk_id, embedding) VALUES (?, ?)').run(
    BigInt(chunkId),
    toVectorBlob(embedding)
  );
}

function deleteChunksOf(db: Db, videoId: string): number {
  const chunks = db.prepare('SELECT id FROM chunks WHERE video_id = ?').all(videoId) as { id: number }[];

  const deleteVec = db.prepare('DELETE FROM chunks_vec WHERE chunk_id = ?');
  for (const chunk of chunks) {
    deleteVec.run(BigInt(chunk.id));
  }

  db.prepare('DELETE FROM chunks WHERE video_id = ?').run(videoId);
  return chunks.length;
}

/**
 * Store a video with its chunks and embeddings, replacing anything stored for it before.
 */
export function replaceVideoChunks(
  db: Db,
  video: NewVideo,
  chunks: Chunk[],
  embeddings: number[][]
): void {
  if (chunks.length !== embeddings.length) {
    throw new Error(`Got ${embeddings.length} embeddings for ${chunks.length} chunks`);
  }

  const store = db.transaction(() => {
    upsertVideo(db, video);
    deleteChunksOf(db, video.id);
    for (let i = 0; i < chunks.length; i++) {
      const chunkId = insertChunk(db, video.id, chunks[i]);
      insertChunkEmbedding(db, chunkId, embeddings[i]);
    }
  });
  store();
}

/**
 * Get a video's chunks in order.
 */
export function getVideoChunks(db: Db, videoId: string): ChunkRow[] {
  return db.prepare(
    'SELECT * FROM chunks WHERE video_id = ? ORDER BY seq'
  ).all(videoId) as ChunkRow[];
}

/**
 * Delete a video with its chunks and vectors. Returns the number of chunks removed.
 */
export function deleteVideo(db: Db, videoId: string): number {
  const remove = db.transaction(() => {
    const removed = deleteChunksOf(db, videoId);
    db.prepare('DELETE FROM videos WHERE id = ?').run(videoId);
    return removed;
  });
  return remove();
}

/**
 * Find the chunks nearest to the query embedding (L2 distance, ascending).
 */
export function searchChunks(db: Db, queryEmbedding: number[], limit: number = 10): ChunkMatch[] {
  return db.prepare(`
    SELECT
      chunks_vec.chunk_id,
      chunks_vec.distance,
      chunks.text,
      chunks.seq,
      chunks.start_time,
      chunks.end_time,
      chunks.video_id,
      videos.title AS video_title,
      videos.uploader,
      videos.upload_date,
      videos.url AS video_url
    FROM chunks_vec
    JOIN chunks ON chunks.id = chunks_vec.chunk_id
    JOIN videos ON videos.id = chunks.video_id
    WHERE embedding MATCH ? AND k = ?
    ORDER BY distance
  `).all(toVectorBlob(queryEmbedding), limit) as ChunkMatch[];
}

/**
 * Get database statistics.
 */
export function getStats(db: Db): Stats {
  const videosRow = db.prepare('SELECT COUNT(*) AS count FROM videos').get() as { count: number };
  const chunksRow = db.prepare('SELECT COUNT(*) AS count FROM chunks').get() as { count: number };

  return {
    videos: videosRow.count,
    chunks: chunksRow.count,
  };
}

/**
 * Remove every video, chunk and vector.
 */
export function clearDatabase(db: Db): void {
  const dimensions = storedDimensions(db);
  db.transaction(() => {
    db.exec('DROP TABLE IF EXISTS chunks_vec');
    db.exec('DELETE FROM chunks');
    db.exec('DELETE FROM videos');
  })();
  if (dimensions !== null) {
    createVectorTable(db, dimensions);
  }
}
