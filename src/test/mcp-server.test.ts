import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { callTool, TOOLS } from '../mcp-server.js';
import { closeQaContext, type QaContext } from '../qa.js';
import { createSampleContext, SAMPLE_QUESTION, SAMPLE_VIDEO_ID } from './helpers.js';

describe('MCP tools', () => {
  let ctx: QaContext;

  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    ctx = createSampleContext().ctx;
  });

  afterEach(() => {
    closeQaContext(ctx);
    vi.restoreAllMocks();
  });

  it('declares the five tools', () => {
    expect(TOOLS.map(t => t.name)).toEqual([
      'search_transcripts',
      'ask_question',
      'add_video',
      'list_videos',
      'get_stats',
    ]);
  });

  it('adds a video, then searches and answers from it', async () => {
    const added = await callTool(ctx, 'add_video', { url: SAMPLE_VIDEO_ID });
    expect(added).toEqual({
      content: [{ type: 'text', text: `Indexed "Embeddings 101" (${SAMPLE_VIDEO_ID}): 1 chunks` }],
    });

    const search = await callTool(ctx, 'search_transcripts', { query: SAMPLE_QUESTION, limit: 3 });
    const text = search.content[0].text;
    expect(text.startsWith(`Found 1 results for: ${SAMPLE_QUESTION}\n\n**Result 1** (Score: 100.0%)\n`)).toBe(true);
    expect(text).toContain('- Video: Embeddings 101\n');
    expect(text).toContain(`- Link: https://www.youtube.com/watch?v=${SAMPLE_VIDEO_ID}&t=0\n`);
    expect(text).toContain('- Excerpt: Welcome to the talk. Today we cover embeddings.\n');

    const answer = await callTool(ctx, 'ask_question', { question: SAMPLE_QUESTION });
    expect(answer.content[0].text).toBe(`answer to "${SAMPLE_QUESTION}" from 1 sources`);
  });

  it('lists videos and stats', async () => {
    expect((await callTool(ctx, 'list_videos')).content[0].text).toBe('No videos indexed yet.');

    await callTool(ctx, 'add_video', { url: SAMPLE_VIDEO_ID });

    expect((await callTool(ctx, 'list_videos')).content[0].text).toBe(
      `**Indexed Videos:**\n\n- **Embeddings 101** by Test Channel (1 chunks)\n  ID: ${SAMPLE_VIDEO_ID}\n`
    );
    expect((await callTool(ctx, 'get_stats')).content[0].text).toBe(
      '**Knowledge Base Stats:**\n' +
      '- Videos indexed: 1\n' +
      '- Transcript chunks: 1\n' +
      '- Embedding model: fake-embedding (8 dimensions)\n' +
      '- Answer generator: fallback (echo)\n'
    );
  });

  it('reports an empty search', async () => {
    const result = await callTool(ctx, 'search_transcripts', { query: 'anything' });
    expect(result.content[0].text).toBe('No results found.');
  });

  it('returns error results for bad input and failures', async () => {
    const invalid = await callTool(ctx, 'search_transcripts', { limit: 2 });
    expect(invalid.isError).toBe(true);
    expect(invalid.content[0].text.startsWith('Invalid arguments for search_transcripts: query:')).toBe(true);

    const failed = await callTool(ctx, 'add_video', { url: 'nope' });
    expect(failed).toEqual({
      content: [{ type: 'text', text: 'Error: Could not extract video ID from URL: nope' }],
      isError: true,
    });

    const unknown = await callTool(ctx, 'delete_everything');
    expect(unknown).toEqual({ content: [{ type: 'text', text: 'Unknown tool: delete_everything' }], isError: true });
  });
});
