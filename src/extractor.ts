/**
 * Transcript extraction: cache lookup, captions, then audio transcription.
 */

import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';

import {
  extractVideoId,
  selectCaptionTrack,
  InvalidVideoUrlError,
  type VideoSource,
} from './youtube.js';
import {
  parseSubtitles,
  normalizeSegments,
  segmentsToText,
  transcribeAudio,
  TranscriptionError,
  type Segment,
} from './transcriber.js';
import { loadTranscript, saveTranscript, type TranscriptRecord, type TranscriptSource } from './transcript-store.js';

export type Transcribe = (audioPath: string, apiKey: string) => Promise<Segment[]>;

export interface ExtractOptions {
  transcriptsPath: string;
  forceRefresh?: boolean;
  /** Needed to transcribe videos without captions */
  elevenLabsApiKey?: string;
  languages?: string[];
  transcribe?: Transcribe;
  onProgress?: (message: string) => void;
}

/**
 * Get the transcript for a video URL or ID, using the cache unless forceRefresh is set.
 */
export async function extractTranscript(
  source: VideoSource,
  urlOrId: string,
  options: ExtractOptions
): Promise<TranscriptRecord> {
  const videoId = extractVideoId(urlOrId);
  if (!videoId) {
    throw new InvalidVideoUrlError(`Could not extract video ID from URL: ${urlOrId}`);
  }

  const progress = options.onProgress ?? (() => {});

  if (!options.forceRefresh) {
    const cached = await loadTranscript(options.transcriptsPath, videoId);
    if (cached) {
      progress(`Using cached transcript for ${videoId}`);
      return cached;
    }
  }

  progress(`Getting metadata for ${videoId}...`);
  const { metadata, captionTracks } = await source.fetchVideo(videoId);

  let segments: Segment[];
  let transcriptSource: TranscriptSource;
  let language: string;

  const track = selectCaptionTrack(captionTracks, options.languages);
  if (track) {
    progress(`Downloading captions for ${videoId} (${track.language_code})...`);
    const vtt = await source.downloadCaptions(track);
    segments = parseSubtitles(vtt, 'vtt');
    transcriptSource = 'captions';
    language = track.language_code;
  } else {
    if (!options.elevenLabsApiKey) {
      throw new TranscriptionError(
        `No captions for ${videoId} (set ELEVENLABS_API_KEY for transcription)`
      );
    }

    const transcribe = options.transcribe ?? transcribeAudio;
    const tempDir = await mkdtemp(join(tmpdir(), 'video-qa-'));
    try {
      progress(`Downloading audio for ${videoId}...`);
      const audioPath = await source.downloadAudio(videoId, tempDir);
      progress(`Transcribing ${videoId}...`);
      segments = await transcribe(audioPath, options.elevenLabsApiKey);
    } finally {
      await rm(tempDir, { recursive: true, force: true });
    }
    transcriptSource = 'transcription';
    language = 'unknown';
  }

  segments = normalizeSegments(segments);
  if (segments.length === 0) {
    throw new TranscriptionError(`No transcript data for ${videoId}`);
  }

  const record: TranscriptRecord = {
    video_id: videoId,
    metadata,
    transcript: segmentsToText(segments),
    segments,
    language,
    source: transcriptSource,
  };

  const path = await saveTranscript(options.transcriptsPath, record);
  progress(`Transcript saved to: ${path}`);

  return record;
}
