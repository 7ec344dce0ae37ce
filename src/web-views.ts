// HTML views for the web UI. Each page is a template string; every
// interpolated value goes through escapeHtml.

import type { VideoSummary } from './database.js';
import type { KnowledgeBaseStats } from './qa.js';
import { formatTimestamp, type SearchResult } from './search.js';

export type FlashCategory = 'success' | 'error';

export interface Flash {
  category: FlashCategory;
  message: string;
}

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string | number): string {
  return String(value).replace(/[&<>"']/g, ch => HTML_ESCAPES[ch] ?? ch);
}

const STYLES = `
      :root {
        --bg: #faf7f0;
        --paper: #fffdf7;
        --ink: #121212;
        --muted: rgba(18, 18, 18, 0.68);
        --line: rgba(18, 18, 18, 0.14);
        --teal: #0b766c;
        --rose: #c2410c;
      }
      * { box-sizing: border-box; }
      body {
        margin: 0;
        color: var(--ink);
        background: var(--bg);
        font-family: ui-sans-serif, system-ui, -apple-system, Segoe UI, Roboto, Arial, sans-serif;
        line-height: 1.5;
      }
      header, main { max-width: 880px; margin: 0 auto; padding: 16px 20px; }
      header nav a { margin-right: 16px; color: var(--teal); text-decoration: none; font-weight: 600; }
      .card { background: var(--paper); border: 1px solid var(--line); border-radius: 14px; padding: 18px; margin: 16px 0; }
      .flash { border-radius: 10px; padding: 10px 14px; margin: 12px 0; }
      .flash-success { background: rgba(11, 118, 108, 0.12); color: var(--teal); }
      .flash-error { background: rgba(194, 65, 12, 0.12); color: var(--rose); }
      .muted { color: var(--muted); }
      input[type=text], textarea { width: 100%; padding: 10px; border: 1px solid var(--line); border-radius: 8px; font: inherit; }
      button { margin-top: 10px; padding: 8px 16px; border: 0; border-radius: 8px; background: var(--teal); color: #fff; font: inherit; cursor: pointer; }
      table { width: 100%; border-collapse: collapse; }
      th, td { text-align: left; padding: 6px 8px; border-bottom: 1px solid var(--line); }
      .answer { white-space: pre-wrap; }
`;

function renderFlash(flash: Flash | undefined): string {
  if (!flash) return '';
  return `<div class="flash flash-${flash.category}">${escapeHtml(flash.message)}</div>`;
}

function layout(title: string, body: string, flash?: Flash): string {
  return `<!doctype html>
<html lang="en">
  <head>
    <meta charset="utf-8" />
    <meta name="viewport" content="width=device-width, initial-scale=1" />
    <title>${escapeHtml(title)} · video-qa</title>
    <style>${STYLES}</style>
  </head>
  <body>
    <header>
      <nav>
        <a href="/">Home</a>
        <a href="/add-video">Add video</a>
        <a href="/ask">Ask</a>
        <a href="/videos">Videos</a>
      </nav>
    </header>
    <main>
      ${renderFlash(flash)}
      ${body}
    </main>
  </body>
</html>`;
}

export function indexPage(): string {
  return layout('Home', `
      <h1>Video transcript Q&amp;A</h1>
      <p class="muted">Add YouTube videos, then ask questions answered from their transcripts.</p>
      <div class="card">
        <p><a href="/add-video">Add a video</a> to the knowledge base.</p>
        <p><a href="/ask">Ask a question</a> about the videos you added.</p>
        <p><a href="/videos">Browse indexed videos</a>.</p>
      </div>`);
}

export function addVideoPage(flash?: Flash): string {
  return layout('Add video', `
      <h1>Add a video</h1>
      <form class="card" method="post" action="/add-video">
        <label for="video_url">YouTube URL or video ID</label>
        <input type="text" id="video_url" name="video_url" placeholder="https://www.youtube.com/watch?v=..." />
        <p><label><input type="checkbox" name="force_refresh" /> Re-extract even if the transcript is cached</label></p>
        <button type="submit">Add video</button>
      </form>`, flash);
}

function renderSource(source: SearchResult, index: number): string {
  return `
        <div class="card">
          <strong>Source ${index + 1}: ${escapeHtml(source.video_title)}</strong>
          <div class="muted">${escapeHtml(source.uploader)} · ${escapeHtml(formatTimestamp(source.start_time))} · similarity ${escapeHtml(source.similarity.toFixed(3))}</div>
          <p>${escapeHtml(source.text)}</p>
          <a href="${escapeHtml(source.youtube_url)}">Watch at ${escapeHtml(formatTimestamp(source.start_time))}</a>
        </div>`;
}

export interface AskPageOptions {
  question?: string;
  answer?: string;
  sources?: SearchResult[];
  flash?: Flash;
}

export function askPage(options: AskPageOptions = {}): string {
  const answer = options.answer === undefined
    ? ''
    : `
      <h2>Answer</h2>
      <div class="card answer">${escapeHtml(options.answer)}</div>`;

  const sources = options.sources && options.sources.length > 0
    ? `
      <h2>Sources</h2>${options.sources.map(renderSource).join('')}`
    : '';

  return layout('Ask', `
      <h1>Ask a question</h1>
      <form class="card" method="post" action="/ask">
        <label for="question">Question</label>
        <textarea id="question" name="question" rows="3">${escapeHtml(options.question ?? '')}</textarea>
        <p><label><input type="checkbox" name="show_sources" /> Show sources</label></p>
        <button type="submit">Ask</button>
      </form>${answer}${sources}`, options.flash);
}

export function videosPage(videos: VideoSummary[], stats: KnowledgeBaseStats | undefined, flash?: Flash): string {
  const summary = stats
    ? `<p class="muted">${stats.total_videos} videos · ${stats.total_chunks} chunks · ${escapeHtml(stats.llm)}</p>`
    : '';

  const rows = videos
    .map(video => `
          <tr>
            <td><a href="${escapeHtml(video.url)}">${escapeHtml(video.title)}</a></td>
            <td>${escapeHtml(video.uploader)}</td>
            <td>${escapeHtml(formatTimestamp(video.duration))}</td>
            <td>${video.chunks}</td>
            <td><button type="button" data-video-id="${escapeHtml(video.id)}">Remove</button></td>
          </tr>`)
    .join('');

  const table = videos.length === 0
    ? '<p>No videos indexed yet. <a href="/add-video">Add one</a>.</p>'
    : `
      <table>
        <thead><tr><th>Title</th><th>Uploader</th><th>Duration</th><th>Chunks</th><th></th></tr></thead>
        <tbody>${rows}
        </tbody>
      </table>
      <script>
        document.querySelectorAll('button[data-video-id]').forEach(button => {
          button.addEventListener('click', async () => {
            const id = button.getAttribute('data-video-id');
            const res = await fetch('/api/remove-video/' + encodeURIComponent(id), { method: 'POST' });
            const body = await res.json();
            if (body.success) button.closest('tr').remove();
          });
        });
      </script>`;

  return layout('Videos', `
      <h1>Indexed videos</h1>
      ${summary}${table}`, flash);
}

export function notFoundPage(): string {
  return layout('Not found', `
      <h1>Not found</h1>
      <p><a href="/">Back to the home page</a></p>`);
}
