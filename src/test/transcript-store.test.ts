import { describe, expect, it } from 'vitest';
import { existsSync } from 'fs';
import { writeFile } from 'fs/promises';
import { join } from 'path';

import {
  deleteTranscript,
  loadTranscript,
  saveTranscript,
  transcriptPath,
  type TranscriptRecord,
} from '../transcript-store.js';
import { placeholderMetadata } from '../youtube.js';
import { tempDir } from './helpers.js';

const record: TranscriptRecord = {
  video_id: 'abcdefghijk',
  metadata: placeholderMetadata('abcdefghijk'),
  transcript: 'first second',
  segments: [
    { text: 'first', start_time: 0, end_time: 1 },
    { text: 'second', start_time: 1, end_time: 2 },
  ],
  language: 'en',
  source: 'captions',
};

describe('transcript store', () => {
  it('saves and loads a transcript', async () => {
    const dir = join(tempDir(), 'nested');

    const path = await saveTranscript(dir, record);

    expect(path).toBe(join(dir, 'abcdefghijk_transcript.json'));
    expect(await loadTranscript(dir, 'abcdefghijk')).toEqual(record);
  });

  it('returns null for a missing transcript', async () => {
    expect(await loadTranscript(tempDir(), 'abcdefghijk')).toBeNull();
  });

  it('ignores corrupt or foreign files', async () => {
    const dir = tempDir();
    await writeFile(transcriptPath(dir, 'corrupt0000'), '{not json', 'utf-8');
    await writeFile(transcriptPath(dir, 'foreign0000'), JSON.stringify({ hello: 'world' }), 'utf-8');

    expect(await loadTranscript(dir, 'corrupt0000')).toBeNull();
    expect(await loadTranscript(dir, 'foreign0000')).toBeNull();
  });

  it('deletes a transcript and tolerates deleting it twice', async () => {
    const dir = tempDir();
    const path = await saveTranscript(dir, record);

    await deleteTranscript(dir, 'abcdefghijk');
    await deleteTranscript(dir, 'abcdefghijk');

    expect(existsSync(path)).toBe(false);
  });
});
