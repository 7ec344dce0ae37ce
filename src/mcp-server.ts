/**
 * MCP server for video-qa - search and question answering over indexed transcripts.
 * Runs over stdio; all logging goes to stderr.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';

import {
  addVideo,
  askQuestion,
  getRelevantSources,
  getStats,
  listVideos,
  type QaContext,
} from './qa.js';
import { formatTimestamp } from './search.js';

export type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

const searchArgs = z.object({
  query: z.string().min(1),
  limit: z.number().int().positive().optional(),
});

const askArgs = z.object({
  question: z.string().min(1),
  top_k: z.number().int().positive().optional(),
});

const addVideoArgs = z.object({
  url: z.string().min(1),
  force_refresh: z.boolean().optional(),
});

export const TOOLS = [
  {
    name: 'search_transcripts',
    description: 'Search indexed YouTube video transcripts using semantic search. Returns relevant excerpts with timestamps and YouTube links.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        query: {
          type: 'string',
          description: 'The search query - can be a question or topic',
        },
        limit: {
          type: 'integer',
          description: 'Maximum number of results (default: 5)',
          default: 5,
        },
      },
      required: ['query'],
    },
  },
  {
    name: 'ask_question',
    description: 'Answer a question from the indexed video transcripts.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        question: {
          type: 'string',
          description: 'The question to answer',
        },
        top_k: {
          type: 'integer',
          description: 'Number of transcript excerpts to use as context',
        },
      },
      required: ['question'],
    },
  },
  {
    name: 'add_video',
    description: 'Extract, chunk and index a YouTube video so it can be searched.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        url: {
          type: 'string',
          description: 'YouTube URL or 11-character video ID',
        },
        force_refresh: {
          type: 'boolean',
          description: 'Re-extract the transcript even if it is cached',
          default: false,
        },
      },
      required: ['url'],
    },
  },
  {
    name: 'list_videos',
    description: 'List the videos in the knowledge base.',
    inputSchema: {
      type: 'object' as const,
      properties: {},
    },
  },
  {
    name: 'get_stats',
    description: 'Get statistics about the knowledge base.',
    inputSchema: {
      type: 'object' as const,
      properties: {},
    },
  },
];

function text(value: string, isError = false): ToolResult {
  return isError
    ? { content: [{ type: 'text', text: value }], isError: true }
    : { content: [{ type: 'text', text: value }] };
}

function invalidArguments(name: string, error: z.ZodError): ToolResult {
  const issues = error.issues.map(issue => `${issue.path.join('.') || 'arguments'}: ${issue.message}`);
  return text(`Invalid arguments for ${name}: ${issues.join('; ')}`, true);
}

async function searchTranscripts(ctx: QaContext, args: z.infer<typeof searchArgs>): Promise<ToolResult> {
  const limit = args.limit ?? 5;
  console.error(`[MCP] Searching for: "${args.query}" (limit: ${limit})`);

  const results = await getRelevantSources(ctx, args.query, limit);
  console.error(`[MCP] Search returned ${results.length} results`);

  if (results.length === 0) {
    return text('No results found.');
  }

  let output = `Found ${results.length} results for: ${args.query}\n\n`;
  results.forEach((r, i) => {
    output += `**Result ${i + 1}** (Score: ${(r.similarity * 100).toFixed(1)}%)\n`;
    output += `- Video: ${r.video_title}\n`;
    output += `- Uploader: ${r.uploader}\n`;
    output += `- Timestamp: ${formatTimestamp(r.start_time)}\n`;
    output += `- Link: ${r.youtube_url}\n`;
    output += `- Excerpt: ${r.text.slice(0, 300)}${r.text.length > 300 ? '...' : ''}\n\n`;
  });

  return text(output);
}

function formatVideoList(ctx: QaContext): string {
  const videos = listVideos(ctx);
  if (videos.length === 0) {
    return 'No videos indexed yet.';
  }

  let output = '**Indexed Videos:**\n\n';
  for (const video of videos) {
    output += `- **${video.title}** by ${video.uploader} (${video.chunks} chunks)\n`;
    output += `  ID: ${video.id}\n`;
  }
  return output;
}

function formatStats(ctx: QaContext): string {
  const stats = getStats(ctx);
  let output = '**Knowledge Base Stats:**\n';
  output += `- Videos indexed: ${stats.total_videos}\n`;
  output += `- Transcript chunks: ${stats.total_chunks}\n`;
  output += `- Embedding model: ${stats.embedding_model} (${stats.embedding_dimensions} dimensions)\n`;
  output += `- Answer generator: ${stats.llm}\n`;
  return output;
}

/**
 * Run a tool by name. Errors become error results rather than protocol failures.
 */
export async function callTool(ctx: QaContext, name: string, args: unknown = {}): Promise<ToolResult> {
  console.error(`[MCP] Tool call: ${name}`);

  try {
    switch (name) {
      case 'search_transcripts': {
        const parsed = searchArgs.safeParse(args);
        return parsed.success ? await searchTranscripts(ctx, parsed.data) : invalidArguments(name, parsed.error);
      }

      case 'ask_question': {
        const parsed = askArgs.safeParse(args);
        if (!parsed.success) return invalidArguments(name, parsed.error);
        return text(await askQuestion(ctx, parsed.data.question, parsed.data.top_k));
      }

      case 'add_video': {
        const parsed = addVideoArgs.safeParse(args);
        if (!parsed.success) return invalidArguments(name, parsed.error);
        const added = await addVideo(ctx, parsed.data.url, {
          forceRefresh: parsed.data.force_refresh,
          onProgress: message => console.error(`[MCP] ${message}`),
        });
        return text(`Indexed "${added.title}" (${added.video_id}): ${added.chunks} chunks`);
      }

      case 'list_videos':
        return text(formatVideoList(ctx));

      case 'get_stats':
        return text(formatStats(ctx));

      default:
        return text(`Unknown tool: ${name}`, true);
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[MCP] ${name} failed: ${message}`);
    return text(`Error: ${message}`, true);
  }
}

export function createMcpServer(ctx: QaContext): Server {
  const server = new Server(
    { name: 'video-qa', version: '0.1.0' },
    { capabilities: { tools: {} } }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    console.error('[MCP] List tools requested');
    return { tools: TOOLS };
  });

  server.setRequestHandler(CallToolRequestSchema, async request => {
    const { name, arguments: args } = request.params;
    return callTool(ctx, name, args ?? {});
  });

  return server;
}

/**
 * Serve the tools over stdio until the client disconnects.
 */
export async function startMcpServer(ctx: QaContext): Promise<Server> {
  const server = createMcpServer(ctx);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error('[MCP] video-qa server running on stdio');
  return server;
}
