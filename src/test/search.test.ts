import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { openDatabase, replaceVideoChunks, type Db } from '../database.js';
import { distanceToSimilarity, formatTimestamp, search, youtubeUrlAt } from '../search.js';
import { placeholderMetadata } from '../youtube.js';
import { axis, createFakeEmbedder, TEST_DIMENSIONS } from './helpers.js';

describe('formatTimestamp', () => {
  it('formats minutes and hours', () => {
    expect(formatTimestamp(0)).toBe('0:00');
    expect(formatTimestamp(65.9)).toBe('1:05');
    expect(formatTimestamp(3725)).toBe('1:02:05');
  });
});

describe('distanceToSimilarity', () => {
  it('maps L2 distance between unit vectors to cosine similarity', () => {
    expect(distanceToSimilarity(0)).toBe(1);
    expect(distanceToSimilarity(Math.SQRT2)).toBeCloseTo(0);
    expect(distanceToSimilarity(2)).toBe(-1);
  });
});

describe('youtubeUrlAt', () => {
  it('links to the rounded second', () => {
    expect(youtubeUrlAt('abcdefghijk', 90.6)).toBe('https://www.youtube.com/watch?v=abcdefghijk&t=91');
  });
});

describe('search', () => {
  let db: Db;

  beforeEach(() => {
    db = openDatabase(':memory:', TEST_DIMENSIONS);
    replaceVideoChunks(
      db,
      {
        id: 'abcdefghijk',
        metadata: { ...placeholderMetadata('abcdefghijk'), title: 'Space Talk', uploader: 'Astro' },
        language: 'en',
        transcript_source: 'captions',
      },
      [
        { text: 'Space Talk | rockets need fuel', seq: 0, start_time: 0, end_time: 30 },
        { text: 'Space Talk | orbits are ellipses', seq: 1, start_time: 75.4, end_time: 120 },
      ],
      [axis(0), axis(1)]
    );
  });

  afterEach(() => {
    db.close();
  });

  it('returns the closest chunks with links and similarity', async () => {
    const embedder = createFakeEmbedder({ 'how do orbits work': axis(1) });

    const results = await search(db, embedder, 'how do orbits work', 1);

    expect(results).toHaveLength(1);
    expect(results[0]).toMatchObject({
      text: 'orbits are ellipses',
      video_id: 'abcdefghijk',
      video_title: 'Space Talk',
      uploader: 'Astro',
      upload_date: 'Unknown',
      start_time: 75.4,
      end_time: 120,
      youtube_url: 'https://www.youtube.com/watch?v=abcdefghijk&t=75',
    });
    expect(results[0].similarity).toBeCloseTo(1);
    expect(embedder.queries).toEqual(['how do orbits work']);
  });

  it('orders results by similarity', async () => {
    const embedder = createFakeEmbedder({ fuel: axis(0) });

    const results = await search(db, embedder, 'fuel', 5);

    expect(results.map(r => r.text)).toEqual(['rockets need fuel', 'orbits are ellipses']);
    expect(results[0].similarity).toBeGreaterThan(results[1].similarity);
  });

  it('skips blank queries and non-positive limits', async () => {
    const embedder = createFakeEmbedder();

    expect(await search(db, embedder, '   ', 5)).toEqual([]);
    expect(await search(db, embedder, 'fuel', 0)).toEqual([]);
    expect(embedder.queries).toEqual([]);
  });
});
