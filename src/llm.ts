/**
 * Answer generation from retrieved transcript excerpts.
 */

import chalk from 'chalk';

import type { AppConfig, LlmType } from './config.js';
import { createGenAIClient } from './embedder.js';
import { formatTimestamp, type SearchResult } from './search.js';

/**
 * The slice of `GoogleGenAI.models` the generator calls.
 */
export interface GenerateContentClient {
  generateContent(params: {
    model: string;
    contents: string;
    config?: { maxOutputTokens?: number; temperature?: number };
  }): Promise<{ text?: string }>;
}

export interface AnswerGenerator {
  readonly kind: LlmType;
  readonly model: string;
  generateAnswer(question: string, context: SearchResult[], maxTokens?: number): Promise<string>;
}

export interface GeminiGeneratorOptions {
  model: string;
  maxTokens: number;
  temperature: number;
}

export const NO_CONTEXT_MESSAGE = 'No relevant context found.';
export const UNCLEAR_ANSWER_MESSAGE = "I couldn't generate a clear answer based on the provided context.";
export const NOT_ENOUGH_INFORMATION_MESSAGE =
  "I don't have enough information to answer your question. " +
  "Please make sure you've added video transcripts to the database.";

/**
 * Format the retrieved excerpts for the prompt.
 */
export function formatContext(context: SearchResult[]): string {
  if (context.length === 0) {
    return NO_CONTEXT_MESSAGE;
  }

  return context
    .map((item, i) => {
      const title = item.video_title || 'Unknown Video';
      const uploader = item.uploader || 'Unknown';
      return (
        `Source ${i + 1}: ${title} by ${uploader} (at ${formatTimestamp(item.start_time)})\n` +
        `Content: ${item.text}\n`
      );
    })
    .join('\n');
}

export function buildPrompt(question: string, context: string): string {
  return `Based on the following video transcript excerpts, please answer the question. Be specific and cite which video the information comes from when possible.

Context from video transcripts:
${context}

Question: ${question}

Answer: `;
}

const ECHO_PREFIXES = ['Question:', 'Context:', 'Answer:'];
const MAX_ANSWER_CHARS = 300;

/**
 * Strip special tokens and echoed prompt lines from a model response.
 * Lines are collected until the answer passes MAX_ANSWER_CHARS.
 */
export function cleanResponse(response: string): string {
  const lines = response
    .replaceAll('<|endoftext|>', '')
    .replaceAll('<pad>', '')
    .split('\n');

  const kept: string[] = [];
  for (const raw of lines) {
    const line = raw.trim();
    if (!line || ECHO_PREFIXES.some(prefix => line.startsWith(prefix))) continue;
    kept.push(line);
    if (kept.join(' ').length > MAX_ANSWER_CHARS) break;
  }
  return kept.join(' ');
}

/**
 * Answer without a language model: name the videos and quote the excerpts.
 */
export function fallbackAnswer(question: string, context: SearchResult[]): string {
  if (context.length === 0) {
    return NOT_ENOUGH_INFORMATION_MESSAGE;
  }

  const videos = new Set<string>();
  const snippets: string[] = [];
  for (const item of context) {
    videos.add(item.video_title || 'Unknown Video');
    const sentences = item.text
      .split('.')
      .slice(0, 2)
      .map(s => s.trim())
      .filter(Boolean);
    snippets.push(...sentences);
  }

  const preview = snippets.slice(0, 3).join('. ').slice(0, 200) + '...';

  return `Based on the video transcripts from: ${[...videos].join(', ')}

Here's relevant content I found: ${preview}

I found this information related to your question: "${question}". For more detailed analysis, set GOOGLE_API_KEY to enable generated answers.`;
}

export function createFallbackGenerator(): AnswerGenerator {
  return {
    kind: 'fallback',
    model: 'rule-based',
    async generateAnswer(question, context) {
      return fallbackAnswer(question, context);
    },
  };
}

/**
 * Generator backed by a Gemini model. Falls back to the rule-based answer if the call fails.
 */
export function createGeminiGenerator(
  client: GenerateContentClient,
  options: GeminiGeneratorOptions
): AnswerGenerator {
  return {
    kind: 'gemini',
    model: options.model,
    async generateAnswer(question, context, maxTokens) {
      const prompt = buildPrompt(question, formatContext(context));

      try {
        const response = await client.generateContent({
          model: options.model,
          contents: prompt,
          config: {
            maxOutputTokens: maxTokens ?? options.maxTokens,
            temperature: options.temperature,
          },
        });

        const answer = cleanResponse(response.text ?? '');
        return answer || UNCLEAR_ANSWER_MESSAGE;
      } catch (error) {
        console.error(chalk.red(`Error generating answer with ${options.model}: ${error}`));
        return fallbackAnswer(question, context);
      }
    },
  };
}

/**
 * Handle a follow-up question with the context of the original one.
 */
export function askFollowup(
  generator: AnswerGenerator,
  originalQuestion: string,
  followupQuestion: string,
  context: SearchResult[]
): Promise<string> {
  const combined = `Original question: ${originalQuestion}\nFollow-up: ${followupQuestion}`;
  return generator.generateAnswer(combined, context);
}

/**
 * Pick the generator for the configured LLM type.
 */
export function createGenerator(config: AppConfig, llmType: LlmType = config.llmType): AnswerGenerator {
  if (llmType === 'fallback') {
    return createFallbackGenerator();
  }

  if (!config.googleApiKey) {
    console.error(chalk.yellow('GOOGLE_API_KEY is not set; using rule-based answers.'));
    return createFallbackGenerator();
  }

  const client = createGenAIClient(config.googleApiKey);
  return createGeminiGenerator(client.models, {
    model: config.llmModel,
    maxTokens: config.maxTokens,
    temperature: config.temperature,
  });
}
