/**
 * Subtitle parsing and audio transcription for YouTube videos.
 */

import { createReadStream } from 'fs';
import { ElevenLabsClient } from '@elevenlabs/elevenlabs-js';

// Types
export interface Segment {
  text: string;
  start_time: number;
  end_time: number;
}

export type SubtitleFormat = 'vtt' | 'srt';

export class SubtitleParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SubtitleParseError';
  }
}

export class TranscriptionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TranscriptionError';
  }
}

/**
 * Parse VTT timestamp to seconds.
 * Supports formats:
 * - 00:00:00.000 (hours:minutes:seconds.milliseconds)
 * - 00:00.000 (minutes:seconds.milliseconds)
 */
export function parseVttTimestamp(timestamp: string): number {
  const parts = timestamp.trim().split(':');
  let hours = 0;
  let minutes: number;
  let seconds: number;

  if (parts.length === 3) {
    hours = parseInt(parts[0], 10);
    minutes = parseInt(parts[1], 10);
    seconds = parseFloat(parts[2]);
  } else if (parts.length === 2) {
    minutes = parseInt(parts[0], 10);
    seconds = parseFloat(parts[1]);
  } else {
    throw new SubtitleParseError(`Invalid VTT timestamp format: ${timestamp}`);
  }

  const total = hours * 3600 + minutes * 60 + seconds;
  if (Number.isNaN(total)) {
    throw new SubtitleParseError(`Invalid VTT timestamp format: ${timestamp}`);
  }
  return total;
}

/**
 * Parse SRT timestamp to seconds.
 * Format: 00:00:00,000 (hours:minutes:seconds,milliseconds)
 */
export function parseSrtTimestamp(timestamp: string): number {
  // SRT uses comma as decimal separator
  const normalized = timestamp.trim().replace(',', '.');
  const parts = normalized.split(':');

  if (parts.length !== 3) {
    throw new SubtitleParseError(`Invalid SRT timestamp format: ${timestamp}`);
  }

  const hours = parseInt(parts[0], 10);
  const minutes = parseInt(parts[1], 10);
  const seconds = parseFloat(parts[2]);

  return hours * 3600 + minutes * 60 + seconds;
}

function splitLines(content: string): string[] {
  return content.replace(/\r\n?/g, '\n').split('\n');
}

/**
 * Deduplicate VTT segments that have rolling/scrolling text.
 * YouTube auto-captions repeat the previous line at the start of each cue.
 */
function deduplicateRollingSegments(segments: Segment[]): Segment[] {
  const result: Segment[] = [];
  let prevText = '';

  for (const segment of segments) {
    const text = segment.text;
    const newText = prevText && text.startsWith(prevText)
      ? text.slice(prevText.length).trim()
      : text;

    if (newText) {
      result.push({
        text: newText,
        start_time: segment.start_time,
        end_time: segment.end_time,
      });
    }

    prevText = text;
  }

  return result;
}

const INLINE_TIMING = /<c>|<\d{2}:\d{2}/;

/**
 * Parse WebVTT subtitle content.
 */
export function parseVtt(content: string): Segment[] {
  const lines = splitLines(content);
  const segments: Segment[] = [];

  let i = 0;
  while (i < lines.length) {
    const line = lines[i];
    const timestampMatch = line.includes('-->')
      ? line.match(/([\d:.]+)\s*-->\s*([\d:.]+)/)
      : null;

    if (!timestampMatch) {
      i++;
      continue;
    }

    const startTime = parseVttTimestamp(timestampMatch[1]);
    const endTime = parseVttTimestamp(timestampMatch[2]);

    // Cue payload runs until the next empty line
    const payload: string[] = [];
    i++;
    while (i < lines.length && lines[i] !== '' && !lines[i].includes('-->')) {
      if (lines[i].trim()) payload.push(lines[i]);
      i++;
    }

    // Auto-captions mark the newly spoken words with inline timing tags;
    // the untagged line in the same cue is a repeat of the previous one.
    const timed = payload.filter(l => INLINE_TIMING.test(l));
    const kept = timed.length > 0 ? timed : payload;

    const text = kept
      .map(l => l.replace(/<[^>]+>/g, ''))
      .join(' ')
      .replace(/\s+/g, ' ')
      .trim();

    if (text) {
      segments.push({ text, start_time: startTime, end_time: endTime });
    }
  }

  return deduplicateRollingSegments(segments);
}

/**
 * Parse SRT subtitle content.
 */
export function parseSrt(content: string): Segment[] {
  const segments: Segment[] = [];

  // Split by blank lines to get blocks
  const blocks = splitLines(content).join('\n').trim().split(/\n\s*\n+/);

  for (const block of blocks) {
    const lines = block.trim().split('\n');
    if (lines.length < 2) continue;

    const timestampIdx = lines.findIndex(l => l.includes('-->'));
    if (timestampIdx === -1) continue;

    const timestampMatch = lines[timestampIdx].match(/([\d:,.]+)\s*-->\s*([\d:,.]+)/);
    if (!timestampMatch) continue;

    const startTime = parseSrtTimestamp(timestampMatch[1]);
    const endTime = parseSrtTimestamp(timestampMatch[2]);

    // Text is everything after the timestamp line, minus formatting tags
    const text = lines
      .slice(timestampIdx + 1)
      .join(' ')
      .replace(/<[^>]+>/g, '')
      .replace(/\{[^}]+\}/g, '')
      .replace(/\s+/g, ' ')
      .trim();

    if (text) {
      segments.push({ text, start_time: startTime, end_time: endTime });
    }
  }

  return segments;
}

/**
 * Parse subtitles, using the format hint or detecting it from content.
 */
export function parseSubtitles(content: string, format?: SubtitleFormat): Segment[] {
  if (format === 'vtt') return parseVtt(content);
  if (format === 'srt') return parseSrt(content);

  const trimmed = content.replace(/^\uFEFF/, '').trim();
  if (trimmed.startsWith('WEBVTT')) {
    return parseVtt(trimmed);
  }
  if (/^\d+\s*\n\d{2}:\d{2}:\d{2},\d{3}/m.test(splitLines(trimmed).join('\n'))) {
    return parseSrt(trimmed);
  }

  throw new SubtitleParseError(
    'Cannot determine subtitle format. Expected WebVTT or SRT content.'
  );
}

export interface TranscribedWord {
  text: string;
  start?: number | null;
  end?: number | null;
  type?: string;
}

/**
 * Transcribe audio using ElevenLabs Scribe.
 */
export async function transcribeAudio(audioPath: string, apiKey: string): Promise<Segment[]> {
  const client = new ElevenLabsClient({ apiKey });

  const result = await client.speechToText.convert({
    file: createReadStream(audioPath),
    modelId: 'scribe_v1',
  });

  if (!('words' in result)) {
    throw new TranscriptionError('Unexpected multichannel transcription response');
  }

  return groupWordsIntoSegments(result.words ?? [], result.text);
}

/**
 * Group word-level timestamps into sentence segments.
 */
export function groupWordsIntoSegments(words: TranscribedWord[], fullText?: string): Segment[] {
  const spoken = words.filter(w => w.type !== 'spacing' && w.text.trim());

  if (spoken.length === 0) {
    // If no word-level data, return the full text as one segment
    const text = fullText?.trim();
    return text ? [{ text, start_time: 0, end_time: 0 }] : [];
  }

  const segments: Segment[] = [];
  const sentenceEndings = new Set(['.', '!', '?']);
  let currentWords: string[] = [];
  let currentStart: number | null = null;

  for (const word of spoken) {
    const wordText = word.text.trim();

    if (currentStart === null) {
      currentStart = word.start ?? 0;
    }

    currentWords.push(wordText);

    // Check if this word ends a sentence
    if (sentenceEndings.has(wordText[wordText.length - 1])) {
      segments.push({
        text: currentWords.join(' '),
        start_time: currentStart,
        end_time: word.end ?? currentStart,
      });
      currentWords = [];
      currentStart = null;
    }
  }

  // Handle remaining words
  if (currentWords.length > 0 && currentStart !== null) {
    const lastWord = spoken[spoken.length - 1];
    segments.push({
      text: currentWords.join(' '),
      start_time: currentStart,
      end_time: lastWord.end ?? currentStart,
    });
  }

  return segments;
}

/**
 * Normalize and clean up transcript segments.
 */
export function normalizeSegments(
  segments: Segment[],
  minDuration: number = 0.5,
  mergeThreshold: number = 1.0
): Segment[] {
  if (segments.length === 0) return [];

  const normalized: Segment[] = [];

  for (const segment of segments) {
    const text = segment.text.replace(/\s+/g, ' ').trim();
    if (!text) continue;

    let startTime = segment.start_time;
    let endTime = segment.end_time;

    // Ensure start_time < end_time
    if (startTime > endTime) {
      [startTime, endTime] = [endTime, startTime];
    } else if (startTime === endTime) {
      endTime = startTime + 0.1;
    }

    normalized.push({ text, start_time: startTime, end_time: endTime });
  }

  if (minDuration > 0) {
    return mergeShortSegments(normalized, minDuration, mergeThreshold);
  }

  return normalized;
}

/**
 * Merge segments that are too short with the following segment.
 */
function mergeShortSegments(
  segments: Segment[],
  minDuration: number,
  mergeThreshold: number
): Segment[] {
  if (segments.length === 0) return [];

  const result: Segment[] = [];
  let current = { ...segments[0] };

  for (let i = 1; i < segments.length; i++) {
    const nextSeg = segments[i];
    const currentDuration = current.end_time - current.start_time;
    const gap = nextSeg.start_time - current.end_time;

    if (currentDuration < minDuration && gap <= mergeThreshold) {
      current.text = current.text + ' ' + nextSeg.text;
      current.end_time = nextSeg.end_time;
    } else {
      result.push(current);
      current = { ...nextSeg };
    }
  }

  result.push(current);
  return result;
}

export function segmentsToText(segments: Segment[]): string {
  return segments.map(s => s.text).join(' ');
}
