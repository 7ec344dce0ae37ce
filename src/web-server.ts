/**
 * Minimal web UI and JSON API over the knowledge base.
 */

import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'http';
import { z } from 'zod';

import {
  addVideo,
  askQuestion,
  getRelevantSources,
  getStats,
  listVideos,
  removeVideo,
  type QaContext,
} from './qa.js';
import {
  addVideoPage,
  askPage,
  indexPage,
  notFoundPage,
  videosPage,
  type Flash,
} from './web-views.js';

const MAX_BODY_BYTES = 1024 * 1024;
const ASK_SOURCES = 3;
const CHAT_SOURCES = 2;

const chatRequestSchema = z.object({
  question: z.string().optional(),
});

class RequestError extends Error {
  constructor(readonly status: number, message: string) {
    super(message);
    this.name = 'RequestError';
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function readBody(req: IncomingMessage): Promise<string> {
  let body = '';
  for await (const chunk of req) {
    body += chunk;
    if (body.length > MAX_BODY_BYTES) {
      throw new RequestError(413, 'Request body too large');
    }
  }
  return body;
}

async function readForm(req: IncomingMessage): Promise<URLSearchParams> {
  return new URLSearchParams(await readBody(req));
}

async function readJson(req: IncomingMessage): Promise<unknown> {
  const body = await readBody(req);
  try {
    return body ? JSON.parse(body) : {};
  } catch {
    throw new RequestError(400, 'Invalid JSON');
  }
}

function sendHtml(res: ServerResponse, html: string, status = 200): void {
  res.writeHead(status, { 'Content-Type': 'text/html; charset=utf-8' });
  res.end(html);
}

function sendJson(res: ServerResponse, body: unknown, status = 200): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
}

async function handleAddVideo(ctx: QaContext, req: IncomingMessage, res: ServerResponse): Promise<void> {
  if (req.method !== 'POST') {
    sendHtml(res, addVideoPage());
    return;
  }

  const form = await readForm(req);
  const videoUrl = (form.get('video_url') ?? '').trim();
  const forceRefresh = form.get('force_refresh') === 'on';

  let flash: Flash;
  if (!videoUrl) {
    flash = { category: 'error', message: 'Please provide a video URL' };
  } else {
    try {
      const added = await addVideo(ctx, videoUrl, { forceRefresh });
      console.log(`[web] Added ${added.video_id} (${added.chunks} chunks)`);
      flash = { category: 'success', message: 'Video added successfully!' };
    } catch (error) {
      console.error(`[web] Failed to add ${videoUrl}: ${errorMessage(error)}`);
      flash = { category: 'error', message: `Error adding video: ${errorMessage(error)}` };
    }
  }

  sendHtml(res, addVideoPage(flash));
}

async function handleAsk(ctx: QaContext, req: IncomingMessage, res: ServerResponse): Promise<void> {
  if (req.method !== 'POST') {
    sendHtml(res, askPage());
    return;
  }

  const form = await readForm(req);
  const question = (form.get('question') ?? '').trim();
  const showSources = form.get('show_sources') === 'on';

  if (!question) {
    sendHtml(res, askPage({ flash: { category: 'error', message: 'Please enter a question' } }));
    return;
  }

  try {
    const answer = await askQuestion(ctx, question);
    const sources = showSources ? await getRelevantSources(ctx, question, ASK_SOURCES) : undefined;
    sendHtml(res, askPage({ question, answer, sources }));
  } catch (error) {
    sendHtml(res, askPage({
      question,
      flash: { category: 'error', message: `Error processing question: ${errorMessage(error)}` },
    }));
  }
}

function handleVideos(ctx: QaContext, res: ServerResponse): void {
  try {
    sendHtml(res, videosPage(listVideos(ctx), getStats(ctx)));
  } catch (error) {
    sendHtml(res, videosPage([], undefined, {
      category: 'error',
      message: `Error loading videos: ${errorMessage(error)}`,
    }));
  }
}

async function handleRemoveVideo(ctx: QaContext, videoId: string, res: ServerResponse): Promise<void> {
  try {
    sendJson(res, { success: await removeVideo(ctx, videoId) });
  } catch (error) {
    sendJson(res, { success: false, error: errorMessage(error) });
  }
}

async function handleChat(ctx: QaContext, req: IncomingMessage, res: ServerResponse): Promise<void> {
  const parsed = chatRequestSchema.safeParse(await readJson(req));
  const question = parsed.success ? (parsed.data.question ?? '').trim() : '';

  if (!question) {
    sendJson(res, { error: 'Question is required' }, 400);
    return;
  }

  try {
    const answer = await askQuestion(ctx, question);
    const sources = await getRelevantSources(ctx, question, CHAT_SOURCES);
    sendJson(res, { answer, sources, timestamp: new Date().toISOString() });
  } catch (error) {
    sendJson(res, { error: errorMessage(error) }, 500);
  }
}

function handleHealth(ctx: QaContext, res: ServerResponse): void {
  try {
    sendJson(res, { status: 'healthy', stats: getStats(ctx), timestamp: new Date().toISOString() });
  } catch (error) {
    sendJson(res, {
      status: 'unhealthy',
      error: errorMessage(error),
      timestamp: new Date().toISOString(),
    }, 500);
  }
}

/**
 * Route a request to its handler.
 */
export function createRequestHandler(ctx: QaContext) {
  return async (req: IncomingMessage, res: ServerResponse): Promise<void> => {
    const url = new URL(req.url ?? '/', 'http://localhost');
    const path = url.pathname;
    const method = req.method ?? 'GET';

    try {
      if (path === '/' && method === 'GET') {
        sendHtml(res, indexPage());
        return;
      }

      if (path === '/add-video' && (method === 'GET' || method === 'POST')) {
        await handleAddVideo(ctx, req, res);
        return;
      }

      if (path === '/ask' && (method === 'GET' || method === 'POST')) {
        await handleAsk(ctx, req, res);
        return;
      }

      if (path === '/videos' && method === 'GET') {
        handleVideos(ctx, res);
        return;
      }

      const removeMatch = path.match(/^\/api\/remove-video\/([^/]+)$/);
      if (removeMatch && method === 'POST') {
        let videoId: string;
        try {
          videoId = decodeURIComponent(removeMatch[1]);
        } catch (error) {
          sendJson(res, { success: false, error: errorMessage(error) }, 400);
          return;
        }
        await handleRemoveVideo(ctx, videoId, res);
        return;
      }

      if (path === '/api/chat' && method === 'POST') {
        await handleChat(ctx, req, res);
        return;
      }

      if (path === '/health' && method === 'GET') {
        handleHealth(ctx, res);
        return;
      }

      if (path.startsWith('/api/') || path === '/health') {
        sendJson(res, { error: 'Not found' }, 404);
      } else {
        sendHtml(res, notFoundPage(), 404);
      }
    } catch (error) {
      const status = error instanceof RequestError ? error.status : 500;
      console.error(`[web] ${method} ${path} failed: ${errorMessage(error)}`);
      if (!res.headersSent) {
        sendJson(res, { error: errorMessage(error) }, status);
      } else if (!res.writableEnded) {
        res.end();
      }
    }
  };
}

export function createWebServer(ctx: QaContext): Server {
  const handle = createRequestHandler(ctx);
  return createServer((req, res) => {
    handle(req, res).catch(error => {
      console.error(`[web] Unhandled error: ${errorMessage(error)}`);
    });
  });
}

/**
 * Start the web server and resolve once it is listening.
 */
export function startWebServer(ctx: QaContext, port: number, host = '0.0.0.0'): Promise<Server> {
  const server = createWebServer(ctx);
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      resolve(server);
    });
  });
}
