#!/usr/bin/env node
/**
 * CLI for video-qa using Commander and Chalk.
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import Table from 'cli-table3';
import { createInterface } from 'readline/promises';

import { LLM_TYPES, loadConfig, loadEnvFile, type LlmType } from './config.js';
import {
  addVideos,
  askQuestion,
  clearKnowledgeBase,
  closeQaContext,
  createQaContext,
  getRelevantSources,
  getStats,
  listVideos,
  removeVideo,
  type QaContext,
} from './qa.js';
import { formatTimestamp, type SearchResult } from './search.js';
import { startWebServer } from './web-server.js';
import { startMcpServer } from './mcp-server.js';
import { withSpinner } from './spinner.js';

loadEnvFile();

const program = new Command();

// Global options
let llmType: LlmType | undefined;

function parsePositiveInt(value: string): number {
  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

function openContext(): QaContext {
  return createQaContext(loadConfig(), { llmType });
}

async function withContext(fn: (ctx: QaContext) => Promise<void> | void): Promise<void> {
  const ctx = openContext();
  try {
    await fn(ctx);
  } finally {
    closeQaContext(ctx);
  }
}

function preview(text: string): string {
  return text.length > 300 ? text.slice(0, 297) + '...' : text;
}

function printSources(question: string, results: SearchResult[]): void {
  if (results.length === 0) {
    console.log(chalk.yellow('No relevant sources found.'));
    return;
  }

  console.log('');
  console.log(chalk.bold(`Top ${results.length} relevant sources for: ${question}`));
  console.log('');

  results.forEach((result, i) => {
    console.log(chalk.blue.bold(`Source ${i + 1}`));
    console.log(`  ${chalk.dim('Video:')} ${chalk.bold(result.video_title)}`);
    console.log(`  ${chalk.dim('Uploader:')} ${result.uploader}`);
    console.log(`  ${chalk.dim('Time:')} ${chalk.cyan(formatTimestamp(result.start_time))}`);
    console.log(`  ${chalk.dim('Link:')} ${result.youtube_url}`);
    console.log(`  ${chalk.dim('Similarity:')} ${chalk.green(result.similarity.toFixed(2))}`);
    console.log(`  ${chalk.italic(preview(result.text))}`);
    console.log('');
  });
}

function printStats(ctx: QaContext): void {
  const stats = getStats(ctx);
  const table = new Table({ style: { head: ['cyan'] } });
  table.push(
    { 'Videos': String(stats.total_videos) },
    { 'Chunks': String(stats.total_chunks) },
    { 'Database': stats.database_path },
    { 'Embedding model': `${stats.embedding_model} (${stats.embedding_dimensions} dims)` },
    { 'Answer generator': stats.llm },
  );
  console.log(chalk.bold('Knowledge Base Statistics'));
  console.log(table.toString());
}

async function confirm(message: string): Promise<boolean> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    const answer = await rl.question(`${message} (y/N) `);
    return ['y', 'yes'].includes(answer.trim().toLowerCase());
  } finally {
    rl.close();
  }
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

async function runInteractive(ctx: QaContext): Promise<void> {
  console.log(chalk.bold('\nInteractive Video Q&A Session'));
  console.log(chalk.dim("Type 'quit' or 'exit' to end the session"));
  console.log(chalk.dim("Type 'stats' to see knowledge base statistics"));
  console.log(chalk.dim("Type 'videos' to list all videos in the knowledge base"));

  const rl = createInterface({ input: process.stdin, output: process.stdout });
  const controller = new AbortController();
  rl.on('SIGINT', () => controller.abort());
  rl.on('close', () => controller.abort());

  try {
    while (true) {
      let input: string;
      try {
        input = await rl.question(chalk.cyan('\nYour question: '), { signal: controller.signal });
      } catch (error) {
        if (isAbortError(error)) break;
        throw error;
      }

      const question = input.trim();
      const command = question.toLowerCase();

      if (['quit', 'exit', 'q'].includes(command)) break;
      if (!question) continue;

      if (command === 'stats') {
        printStats(ctx);
        continue;
      }

      if (command === 'videos') {
        const videos = listVideos(ctx);
        if (videos.length === 0) {
          console.log(chalk.yellow('No videos in knowledge base.'));
        } else {
          console.log(chalk.bold(`Videos in knowledge base (${videos.length}):`));
          for (const video of videos) {
            console.log(`  - ${video.title} ${chalk.dim(`(${video.chunks} chunks)`)}`);
          }
        }
        continue;
      }

      const answer = await withSpinner('Thinking...', () => askQuestion(ctx, question));
      console.log(`\n${chalk.green.bold('Answer:')} ${answer}`);
    }
  } finally {
    rl.close();
  }

  console.log('Goodbye!');
}

function printExamples(): void {
  const examples = [
    ['Add a single video', "video-qa add 'https://youtube.com/watch?v=VIDEO_ID'"],
    ['Add multiple videos', "video-qa add 'https://youtube.com/watch?v=ID1' 'https://youtu.be/ID2'"],
    ['Ask a question', "video-qa ask 'What is the main topic discussed?'"],
    ['Ask a question with sources shown', "video-qa ask 'What is machine learning?' --show-sources"],
    ['Search without generating an answer', "video-qa search 'neural networks' -k 3"],
    ['Start interactive session', 'video-qa interactive'],
    ['List all videos', 'video-qa list'],
    ['Show statistics', 'video-qa stats'],
    ['Start the web UI', 'video-qa serve --port 5000'],
    ['Answer without a language model', "video-qa --llm fallback ask 'What is discussed in the videos?'"],
  ];

  console.log(chalk.bold('Video Transcript Q&A'));
  console.log('No command provided. Here are some examples:\n');
  for (const [description, command] of examples) {
    console.log(chalk.dim(`# ${description}`));
    console.log(chalk.cyan(command));
    console.log('');
  }
  console.log(`For full help, run: ${chalk.cyan('video-qa --help')}`);
}

program
  .name('video-qa')
  .description('Ask questions about YouTube video content')
  .version('0.1.0')
  .addOption(new Option('--llm <type>', 'Answer generator to use').choices([...LLM_TYPES]))
  .hook('preAction', thisCommand => {
    const value: unknown = thisCommand.opts().llm;
    llmType = LLM_TYPES.find(type => type === value);
  });

program
  .command('add')
  .description('Add one or more YouTube videos to the knowledge base')
  .argument('<urls...>', 'YouTube URLs or video IDs')
  .option('--force-refresh', 'Re-extract transcripts even if they are cached')
  .action(async (urls: string[], options: { forceRefresh?: boolean }) => {
    await withContext(async ctx => {
      console.log(chalk.cyan(`Adding ${urls.length} video(s) to the knowledge base...`));

      const failed: string[] = [];
      let spinner = ora();
      let progress = '';

      await addVideos(ctx, urls, {
        forceRefresh: options.forceRefresh,
        onStart: (url, index) => {
          progress = `[${index + 1}/${urls.length}]`;
          spinner = ora(`${progress} ${url}`).start();
        },
        onProgress: (_url, message) => { spinner.text = `${progress} ${message}`; },
        onAdded: (_url, added) => {
          spinner.succeed(`${progress} Added "${added.title}" (${added.chunks} chunks)`);
        },
        onFailed: (url, message) => {
          spinner.fail(`${progress} ${url}: ${message}`);
          failed.push(url);
        },
      });

      console.log('');
      console.log(chalk.bold('Results'));
      console.log(chalk.green(`  Successful: ${urls.length - failed.length}`));
      console.log(chalk.red(`  Failed: ${failed.length}`));

      if (failed.length > 0) {
        console.log('');
        console.log(chalk.bold('Failed URLs:'));
        for (const url of failed) {
          console.log(chalk.red(`  - ${url}`));
        }
        process.exitCode = 1;
      }
    });
  });

program
  .command('ask')
  .description('Ask a question about the video content')
  .argument('<question>', 'The question to answer')
  .option('-k, --top-k <number>', 'Number of relevant sources to consider', parsePositiveInt)
  .option('--show-sources', 'Show the sources used for the answer')
  .action(async (question: string, options: { topK?: number; showSources?: boolean }) => {
    await withContext(async ctx => {
      const topK = options.topK ?? ctx.config.topK;

      if (options.showSources) {
        const sources = await withSpinner('Searching for relevant sources...', () =>
          getRelevantSources(ctx, question, topK)
        );
        printSources(question, sources);
      }

      const answer = await withSpinner('Generating answer...', () => askQuestion(ctx, question, topK));

      console.log(`\n${chalk.green.bold('Answer:')} ${answer}`);
    });
  });

program
  .command('search')
  .description('Search for relevant sources without generating an answer')
  .argument('<query>', 'The text to search for in video transcripts')
  .option('-k, --top-k <number>', 'Maximum number of results to return', parsePositiveInt)
  .action(async (query: string, options: { topK?: number }) => {
    await withContext(async ctx => {
      const results = await withSpinner('Searching...', () =>
        getRelevantSources(ctx, query, options.topK ?? ctx.config.topK)
      );
      printSources(query, results);
    });
  });

program
  .command('interactive')
  .description('Start an interactive Q&A session')
  .action(async () => {
    await withContext(runInteractive);
  });

program
  .command('list')
  .description('List all videos in the knowledge base')
  .action(async () => {
    await withContext(ctx => {
      const videos = listVideos(ctx);

      if (videos.length === 0) {
        console.log(chalk.yellow('No videos in the knowledge base.'));
        console.log(`Use ${chalk.cyan('video-qa add <url>')} to add a video.`);
        return;
      }

      const table = new Table({
        head: ['Title', 'Uploader', 'ID', 'Duration', 'Chunks', 'URL'],
        style: { head: ['cyan'] },
      });

      for (const video of videos) {
        const title = video.title.length > 47 ? video.title.slice(0, 44) + '...' : video.title;
        table.push([
          title,
          video.uploader,
          video.id,
          video.duration ? formatTimestamp(video.duration) : 'N/A',
          video.chunks.toString(),
          video.url,
        ]);
      }

      console.log(chalk.bold(`Videos in knowledge base (${videos.length}):`));
      console.log(table.toString());
    });
  });

program
  .command('remove')
  .description('Remove a video from the knowledge base')
  .argument('<video_id>', 'YouTube video ID (e.g., dQw4w9WgXcQ)')
  .action(async (videoId: string) => {
    await withContext(async ctx => {
      if (await removeVideo(ctx, videoId)) {
        console.log(chalk.green(`Video ${videoId} removed successfully.`));
      } else {
        console.log(chalk.red(`Video ${videoId} is not in the knowledge base.`));
        process.exitCode = 1;
      }
    });
  });

program
  .command('stats')
  .description('Show knowledge base statistics')
  .action(async () => {
    await withContext(printStats);
  });

program
  .command('clear')
  .description('Remove all videos from the knowledge base')
  .option('-y, --yes', 'Skip the confirmation prompt')
  .action(async (options: { yes?: boolean }) => {
    if (!options.yes && !(await confirm('Are you sure you want to clear all videos from the knowledge base?'))) {
      console.log(chalk.yellow('Operation cancelled.'));
      return;
    }
    await withContext(ctx => {
      clearKnowledgeBase(ctx);
      console.log(chalk.green('Knowledge base cleared successfully.'));
    });
  });

program
  .command('serve')
  .description('Start the web UI')
  .option('-p, --port <number>', 'Port to listen on', parsePositiveInt)
  .action(async (options: { port?: number }) => {
    const ctx = openContext();
    const port = options.port ?? ctx.config.port;

    try {
      const server = await startWebServer(ctx, port);
      console.log(chalk.green(`[web] Listening on http://localhost:${port}`));

      process.once('SIGINT', () => {
        server.close(() => closeQaContext(ctx));
      });
    } catch (error) {
      closeQaContext(ctx);
      throw error;
    }
  });

program
  .command('mcp')
  .description('Run the MCP server over stdio')
  .action(async () => {
    const ctx = openContext();
    try {
      const server = await startMcpServer(ctx);
      server.onclose = () => closeQaContext(ctx);
    } catch (error) {
      closeQaContext(ctx);
      throw error;
    }
  });

async function main(): Promise<void> {
  if (process.argv.length <= 2) {
    printExamples();
    return;
  }
  await program.parseAsync();
}

main().catch(error => {
  console.error(chalk.red(error instanceof Error ? error.message : String(error)));
  process.exitCode = 1;
});
