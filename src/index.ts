export * from './config.js';
export * from './youtube.js';
export * from './transcriber.js';
export * from './transcript-store.js';
export * from './extractor.js';
export * from './chunker.js';
export * from './embedder.js';
export {
  openDatabase,
  initDb,
  DimensionMismatchError,
  type Db,
  type VideoRow,
  type VideoSummary,
  type ChunkRow,
  type ChunkMatch,
  type NewVideo,
} from './database.js';
export * from './search.js';
export * from './llm.js';
export * from './qa.js';
export { createRequestHandler, createWebServer, startWebServer } from './web-server.js';
export { escapeHtml } from './web-views.js';
export { callTool, createMcpServer, startMcpServer, TOOLS, type ToolResult } from './mcp-server.js';
