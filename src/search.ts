/**
 * Vector similarity search over indexed transcript chunks.
 */

import { searchChunks, type Db } from './database.js';
import { stripTitlePrefix } from './chunker.js';
import type { Embedder } from './embedder.js';

export interface SearchResult {
  text: string;
  video_id: string;
  video_title: string;
  uploader: string;
  upload_date: string;
  start_time: number;
  end_time: number;
  youtube_url: string;
  distance: number;
  /** Cosine similarity in [-1, 1] */
  similarity: number;
}

/**
 * Format seconds into a human-readable timestamp.
 */
export function formatTimestamp(seconds: number): string {
  const totalSeconds = Math.floor(seconds);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const secs = totalSeconds % 60;

  if (hours > 0) {
    return `${hours}:${String(minutes).padStart(2, '0')}:${String(secs).padStart(2, '0')}`;
  }
  return `${minutes}:${String(secs).padStart(2, '0')}`;
}

/**
 * Cosine similarity from the L2 distance between two unit vectors.
 */
export function distanceToSimilarity(distance: number): number {
  return 1 - (distance * distance) / 2;
}

export function youtubeUrlAt(videoId: string, seconds: number): string {
  return `https://www.youtube.com/watch?v=${videoId}&t=${Math.round(seconds)}`;
}

/**
 * Search for chunks similar to the query.
 */
export async function search(
  db: Db,
  embedder: Embedder,
  query: string,
  topK: number = 5
): Promise<SearchResult[]> {
  if (!query.trim() || topK < 1) return [];

  const queryEmbedding = await embedder.embedQuery(query);
  const rows = searchChunks(db, queryEmbedding, Math.floor(topK));

  return rows.map(row => ({
    text: stripTitlePrefix(row.text, row.video_title),
    video_id: row.video_id,
    video_title: row.video_title,
    uploader: row.uploader,
    upload_date: row.upload_date,
    start_time: row.start_time,
    end_time: row.end_time,
    youtube_url: youtubeUrlAt(row.video_id, row.start_time),
    distance: row.distance,
    similarity: distanceToSimilarity(row.distance),
  }));
}
