/**
 * On-disk cache of extracted transcripts, one JSON file per video.
 */

import { readFile, writeFile, mkdir, rm } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';

import type { Segment } from './transcriber.js';
import type { VideoMetadata } from './youtube.js';

export type TranscriptSource = 'captions' | 'transcription';

export interface TranscriptRecord {
  video_id: string;
  metadata: VideoMetadata;
  /** Full transcript text */
  transcript: string;
  segments: Segment[];
  language: string;
  source: TranscriptSource;
}

const segmentSchema = z.object({
  text: z.string(),
  start_time: z.number(),
  end_time: z.number(),
});

const transcriptRecordSchema = z.object({
  video_id: z.string(),
  metadata: z.object({
    title: z.string(),
    uploader: z.string(),
    duration: z.number(),
    upload_date: z.string(),
    description: z.string(),
    view_count: z.number(),
    url: z.string(),
  }),
  transcript: z.string(),
  segments: z.array(segmentSchema),
  language: z.string(),
  source: z.enum(['captions', 'transcription']),
});

export function transcriptPath(dir: string, videoId: string): string {
  return join(dir, `${videoId}_transcript.json`);
}

/**
 * Save a transcript and return the file path.
 */
export async function saveTranscript(dir: string, record: TranscriptRecord): Promise<string> {
  await mkdir(dir, { recursive: true });
  const path = transcriptPath(dir, record.video_id);
  await writeFile(path, JSON.stringify(record, null, 2), 'utf-8');
  return path;
}

/**
 * Load a cached transcript. Returns null if missing or not a transcript file.
 */
export async function loadTranscript(dir: string, videoId: string): Promise<TranscriptRecord | null> {
  let raw: string;
  try {
    raw = await readFile(transcriptPath(dir, videoId), 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return null;
    throw error;
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    console.error(`Ignoring corrupt transcript cache for ${videoId}`);
    return null;
  }

  const parsed = transcriptRecordSchema.safeParse(json);
  return parsed.success ? parsed.data : null;
}

export async function deleteTranscript(dir: string, videoId: string): Promise<void> {
  await rm(transcriptPath(dir, videoId), { force: true });
}
