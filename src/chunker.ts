/**
 * Token-based transcript chunking with overlap.
 */

import { encode } from 'gpt-tokenizer';

import type { Segment } from './transcriber.js';

export interface Chunk {
  text: string;
  start_time: number;
  end_time: number;
  seq: number;
}

export const DEFAULT_CHUNK_TOKENS = 800;
export const DEFAULT_OVERLAP_TOKENS = 120;

const TITLE_SEPARATOR = ' | ';

/**
 * Count the number of tokens in a text string using GPT tokenizer.
 */
export function countTokens(text: string): number {
  return encode(text).length;
}

function buildChunk(videoTitle: string, segments: Segment[], seq: number): Chunk {
  const combinedText = segments.map(s => s.text).join(' ');
  return {
    text: `${videoTitle}${TITLE_SEPARATOR}${combinedText}`,
    start_time: segments[0].start_time,
    end_time: segments[segments.length - 1].end_time,
    seq,
  };
}

/**
 * Remove the "<title> | " prefix that chunkTranscript adds.
 */
export function stripTitlePrefix(text: string, videoTitle: string): string {
  const prefix = `${videoTitle}${TITLE_SEPARATOR}`;
  return text.startsWith(prefix) ? text.slice(prefix.length) : text;
}

/**
 * Split transcript segments into overlapping chunks.
 *
 * Segments are never split and no chunk's segments exceed `targetTokens`.
 * Each chunk carries trailing segments of the previous one worth up to
 * `overlapTokens` (at least one, unless carrying it would overflow the
 * target). A segment longer than the target is emitted alone, with no
 * overlap on either side.
 */
export function chunkTranscript(
  segments: Segment[],
  videoTitle: string,
  targetTokens: number = DEFAULT_CHUNK_TOKENS,
  overlapTokens: number = DEFAULT_OVERLAP_TOKENS
): Chunk[] {
  if (segments.length === 0) return [];

  const chunks: Chunk[] = [];
  let seq = 0;

  let currentSegments: Segment[] = [];
  let currentTokenCount = 0;

  for (const segment of segments) {
    const segmentTokens = countTokens(segment.text);

    if (segmentTokens > targetTokens) {
      if (currentSegments.length > 0) {
        chunks.push(buildChunk(videoTitle, currentSegments, seq++));
      }
      chunks.push(buildChunk(videoTitle, [segment], seq++));
      currentSegments = [];
      currentTokenCount = 0;
      continue;
    }

    if (currentTokenCount + segmentTokens > targetTokens && currentSegments.length > 0) {
      chunks.push(buildChunk(videoTitle, currentSegments, seq++));

      // Keep segments from the end that total ~overlapTokens
      const overlapSegments: Segment[] = [];
      let overlapTokenCount = 0;
      for (let j = currentSegments.length - 1; j >= 0; j--) {
        const seg = currentSegments[j];
        const segTokens = countTokens(seg.text);
        if (overlapTokenCount + segTokens <= overlapTokens) {
          overlapSegments.unshift(seg);
          overlapTokenCount += segTokens;
        } else {
          if (overlapSegments.length === 0) {
            overlapSegments.unshift(seg);
            overlapTokenCount += segTokens;
          }
          break;
        }
      }

      // The carried overlap yields to the incoming segment
      while (overlapSegments.length > 0 && overlapTokenCount + segmentTokens > targetTokens) {
        const dropped = overlapSegments.shift();
        if (dropped) overlapTokenCount -= countTokens(dropped.text);
      }

      currentSegments = overlapSegments;
      currentTokenCount = overlapTokenCount;
    }

    currentSegments.push(segment);
    currentTokenCount += segmentTokens;
  }

  if (currentSegments.length > 0) {
    chunks.push(buildChunk(videoTitle, currentSegments, seq));
  }

  return chunks;
}
