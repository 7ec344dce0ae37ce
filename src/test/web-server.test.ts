import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { Server } from 'http';

import { addVideo, closeQaContext, type QaContext } from '../qa.js';
import { startWebServer } from '../web-server.js';
import { escapeHtml } from '../web-views.js';
import { createSampleContext, SAMPLE_QUESTION, SAMPLE_VIDEO_ID } from './helpers.js';

describe('escapeHtml', () => {
  it('escapes markup characters', () => {
    expect(escapeHtml(`<a href="x">Tom & Jerry's</a>`)).toBe(
      '&lt;a href=&quot;x&quot;&gt;Tom &amp; Jerry&#39;s&lt;/a&gt;'
    );
    expect(escapeHtml(42)).toBe('42');
  });
});

describe('web server', () => {
  let ctx: QaContext;
  let server: Server;
  let baseUrl: string;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    ctx = createSampleContext().ctx;
    server = await startWebServer(ctx, 0, '127.0.0.1');
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Server is not listening on a TCP port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => server.close(error => (error ? reject(error) : resolve())));
    closeQaContext(ctx);
    vi.restoreAllMocks();
  });

  const postForm = (path: string, fields: Record<string, string>) =>
    fetch(`${baseUrl}${path}`, { method: 'POST', body: new URLSearchParams(fields) });

  const postJson = (path: string, body: string) =>
    fetch(`${baseUrl}${path}`, { method: 'POST', headers: { 'Content-Type': 'application/json' }, body });

  it('serves the index page', async () => {
    const res = await fetch(`${baseUrl}/`);

    expect(res.status).toBe(200);
    expect(res.headers.get('content-type')).toBe('text/html; charset=utf-8');
    expect(await res.text()).toContain('<h1>Video transcript Q&amp;A</h1>');
  });

  it('returns 404 for unknown routes', async () => {
    expect((await fetch(`${baseUrl}/nowhere`)).status).toBe(404);

    const api = await fetch(`${baseUrl}/api/nowhere`);
    expect(api.status).toBe(404);
    expect(await api.json()).toEqual({ error: 'Not found' });
  });

  it('adds a video from the form', async () => {
    const res = await postForm('/add-video', { video_url: SAMPLE_VIDEO_ID });

    expect(res.status).toBe(200);
    expect(await res.text()).toContain('<div class="flash flash-success">Video added successfully!</div>');
  });

  it('flashes form errors', async () => {
    const empty = await postForm('/add-video', { video_url: '  ' });
    expect(await empty.text()).toContain('<div class="flash flash-error">Please provide a video URL</div>');

    const invalid = await postForm('/add-video', { video_url: 'nope' });
    expect(await invalid.text()).toContain(
      '<div class="flash flash-error">Error adding video: Could not extract video ID from URL: nope</div>'
    );

    const noQuestion = await postForm('/ask', { question: '' });
    expect(await noQuestion.text()).toContain('<div class="flash flash-error">Please enter a question</div>');
  });

  it('answers questions with sources', async () => {
    await addVideo(ctx, SAMPLE_VIDEO_ID);

    const res = await postForm('/ask', { question: SAMPLE_QUESTION, show_sources: 'on' });
    const html = await res.text();

    expect(html).toContain(`<div class="card answer">answer to &quot;${SAMPLE_QUESTION}&quot; from 1 sources</div>`);
    expect(html).toContain('<strong>Source 1: Embeddings 101</strong>');
    expect(html).toContain('<p>Welcome to the talk. Today we cover embeddings.</p>');
  });

  it('lists videos with stats', async () => {
    await addVideo(ctx, SAMPLE_VIDEO_ID);

    const html = await (await fetch(`${baseUrl}/videos`)).text();

    expect(html).toContain('<p class="muted">1 videos · 1 chunks · fallback (echo)</p>');
    expect(html).toContain(`<a href="https://www.youtube.com/watch?v=${SAMPLE_VIDEO_ID}">Embeddings 101</a>`);
  });

  it('removes videos through the API', async () => {
    await addVideo(ctx, SAMPLE_VIDEO_ID);

    const first = await fetch(`${baseUrl}/api/remove-video/${SAMPLE_VIDEO_ID}`, { method: 'POST' });
    expect(await first.json()).toEqual({ success: true });

    const second = await fetch(`${baseUrl}/api/remove-video/${SAMPLE_VIDEO_ID}`, { method: 'POST' });
    expect(await second.json()).toEqual({ success: false });
  });

  it('rejects a malformed video id escape', async () => {
    const res = await fetch(`${baseUrl}/api/remove-video/%E0`, { method: 'POST' });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ success: false, error: 'URI malformed' });
  });

  it('answers chat requests', async () => {
    await addVideo(ctx, SAMPLE_VIDEO_ID);

    const res = await postJson('/api/chat', JSON.stringify({ question: SAMPLE_QUESTION }));
    const body: unknown = await res.json();

    expect(res.status).toBe(200);
    expect(body).toMatchObject({
      answer: `answer to "${SAMPLE_QUESTION}" from 1 sources`,
      sources: [{ video_id: SAMPLE_VIDEO_ID, text: 'Welcome to the talk. Today we cover embeddings.' }],
      timestamp: expect.any(String),
    });
  });

  it('rejects chat requests without a question', async () => {
    const missing = await postJson('/api/chat', JSON.stringify({}));
    expect(missing.status).toBe(400);
    expect(await missing.json()).toEqual({ error: 'Question is required' });

    const malformed = await postJson('/api/chat', '{oops');
    expect(malformed.status).toBe(400);
    expect(await malformed.json()).toEqual({ error: 'Invalid JSON' });
  });

  it('reports health', async () => {
    const healthy = await fetch(`${baseUrl}/health`);
    expect(healthy.status).toBe(200);
    expect(await healthy.json()).toMatchObject({
      status: 'healthy',
      stats: { total_videos: 0, total_chunks: 0 },
    });

    ctx.db.close();

    const unhealthy = await fetch(`${baseUrl}/health`);
    expect(unhealthy.status).toBe(500);
    expect(await unhealthy.json()).toMatchObject({ status: 'unhealthy' });
  });
});
