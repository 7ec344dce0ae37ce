/**
 * YouTube video source using youtubei.js
 */

import { Innertube } from 'youtubei.js';
import { mkdir } from 'fs/promises';
import { existsSync } from 'fs';
import { join } from 'path';
import { spawn } from 'child_process';

// Custom error types
export class YouTubeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'YouTubeError';
  }
}

export class InvalidVideoUrlError extends YouTubeError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidVideoUrlError';
  }
}

export class VideoNotFoundError extends YouTubeError {
  constructor(message: string) {
    super(message);
    this.name = 'VideoNotFoundError';
  }
}

export class AudioDownloadError extends YouTubeError {
  constructor(message: string) {
    super(message);
    this.name = 'AudioDownloadError';
  }
}

// Types
export interface VideoMetadata {
  title: string;
  uploader: string;
  duration: number;
  upload_date: string;
  description: string;
  view_count: number;
  url: string;
}

export interface CaptionTrack {
  base_url: string;
  language_code: string;
  /** 'asr' for auto-generated tracks */
  kind?: string;
}

export interface FetchedVideo {
  metadata: VideoMetadata;
  captionTracks: CaptionTrack[];
}

/**
 * Everything the extractor needs from YouTube. Swappable for tests.
 */
export interface VideoSource {
  fetchVideo(videoId: string): Promise<FetchedVideo>;
  downloadCaptions(track: CaptionTrack): Promise<string>;
  downloadAudio(videoId: string, outputDir: string): Promise<string>;
}

const VIDEO_URL_PATTERNS = [
  /(?:youtube\.com\/watch\?v=|youtu\.be\/|youtube\.com\/embed\/|youtube\.com\/shorts\/)([^&\n?#/]+)/,
  /youtube\.com\/watch\?.*v=([^&\n?#]+)/,
];

const BARE_VIDEO_ID = /^[a-zA-Z0-9_-]{11}$/;

/**
 * Extract the video ID from a YouTube URL, or accept a bare 11-character ID.
 */
export function extractVideoId(urlOrId: string): string | null {
  const input = urlOrId.trim();

  for (const pattern of VIDEO_URL_PATTERNS) {
    const match = input.match(pattern);
    if (match) {
      return match[1];
    }
  }

  if (BARE_VIDEO_ID.test(input)) {
    return input;
  }

  return null;
}

export function videoUrl(videoId: string): string {
  return `https://www.youtube.com/watch?v=${videoId}`;
}

export function placeholderMetadata(videoId: string): VideoMetadata {
  return {
    title: `Video ${videoId}`,
    uploader: 'Unknown',
    duration: 0,
    upload_date: 'Unknown',
    description: '',
    view_count: 0,
    url: videoUrl(videoId),
  };
}

/**
 * Pick the caption track to use.
 * Manual track in a preferred language first, then auto-generated English,
 * then any English track, then whatever is available.
 */
export function selectCaptionTrack(
  tracks: CaptionTrack[],
  languages: string[] = ['en', 'en-US', 'en-GB']
): CaptionTrack | null {
  if (tracks.length === 0) return null;

  for (const lang of languages) {
    const manual = tracks.find(t => t.language_code === lang && t.kind !== 'asr');
    if (manual) return manual;
  }

  const autoEnglish = tracks.find(t => t.kind === 'asr' && t.language_code.startsWith('en'));
  if (autoEnglish) return autoEnglish;

  const anyEnglish = tracks.find(t => t.language_code.startsWith('en'));
  if (anyEnglish) return anyEnglish;

  return tracks[0];
}

// Singleton Innertube instance
let _innertube: Innertube | null = null;

async function getInnertube(): Promise<Innertube> {
  if (!_innertube) {
    _innertube = await Innertube.create();
  }
  return _innertube;
}

/**
 * Get metadata and caption tracks for a video.
 */
export async function fetchVideo(videoId: string): Promise<FetchedVideo> {
  let info: Awaited<ReturnType<Innertube['getInfo']>>;
  try {
    const yt = await getInnertube();
    info = await yt.getInfo(videoId);
  } catch (error) {
    throw new VideoNotFoundError(`Failed to fetch video info for ${videoId}: ${error}`);
  }

  const basic = info.basic_info;
  const fallback = placeholderMetadata(videoId);
  const published = info.primary_info?.published?.toString();

  const metadata: VideoMetadata = {
    title: basic.title || fallback.title,
    uploader: basic.author || fallback.uploader,
    duration: basic.duration || 0,
    upload_date: published || fallback.upload_date,
    description: basic.short_description || '',
    view_count: basic.view_count || 0,
    url: fallback.url,
  };

  const captionTracks: CaptionTrack[] = (info.captions?.caption_tracks ?? [])
    .filter(t => Boolean(t.base_url))
    .map(t => ({
      base_url: t.base_url,
      language_code: t.language_code,
      kind: t.kind,
    }));

  return { metadata, captionTracks };
}

/**
 * Download a caption track as WebVTT.
 */
export async function downloadCaptions(track: CaptionTrack): Promise<string> {
  const captionUrl = new URL(track.base_url);
  captionUrl.searchParams.set('fmt', 'vtt');

  const response = await fetch(captionUrl.toString());
  if (!response.ok) {
    throw new YouTubeError(`Caption download failed with HTTP ${response.status}`);
  }
  return response.text();
}

/**
 * Download audio from a video for transcription.
 * Uses yt-dlp since youtubei.js audio download is complex.
 */
export async function downloadAudio(videoId: string, outputDir: string): Promise<string> {
  await mkdir(outputDir, { recursive: true });
  const outputPath = join(outputDir, `${videoId}.mp3`);

  return new Promise((resolve, reject) => {
    const ytdlp = spawn('yt-dlp', [
      '-x',
      '--audio-format', 'mp3',
      '--audio-quality', '192K',
      '-o', outputPath,
      videoUrl(videoId),
    ]);

    let stderr = '';
    ytdlp.stderr.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    ytdlp.on('close', (code) => {
      if (code === 0 && existsSync(outputPath)) {
        resolve(outputPath);
      } else {
        reject(new AudioDownloadError(`Failed to download audio: ${stderr}`));
      }
    });

    ytdlp.on('error', (err) => {
      reject(new AudioDownloadError(`yt-dlp not found. Install it with: pip install yt-dlp. Error: ${err.message}`));
    });
  });
}

export const youtubeSource: VideoSource = {
  fetchVideo,
  downloadCaptions,
  downloadAudio,
};
