/**
 * OpenAI-compatible chat completion provider.
 * Works against hosted OpenAI, Groq, or a local Ollama server by setting `baseURL`.
 * Makes a single attempt per call; retry policy lives in RetryingCompletionProvider.
 */

import OpenAI from 'openai';
import type { CompletionOptions, ICompletionProvider } from './ICompletionProvider.js';
import { CompletionError } from '../errors.js';

const DEFAULT_MODEL = 'gpt-4o-mini';
const DEFAULT_MAX_TOKENS = 1024;
const DEFAULT_TEMPERATURE = 0.7;
const DEFAULT_TIMEOUT_MS = 120_000;

export interface OpenAICompletionProviderOptions {
  apiKey?: string;
  /** e.g. https://api.groq.com/openai/v1 or http://localhost:11434/v1 */
  baseURL?: string;
  model?: string;
  maxTokens?: number;
  temperature?: number;
  timeoutMs?: number;
}

export class OpenAICompletionProvider implements ICompletionProvider {
  private client: OpenAI;
  readonly model: string;
  private maxTokens: number;
  private temperature: number;

  constructor(opts?: OpenAICompletionProviderOptions) {
    this.client = new OpenAI({
      apiKey: opts?.apiKey ?? process.env.LLM_API_KEY,
      baseURL: opts?.baseURL,
      timeout: opts?.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      maxRetries: 0,
    });
    this.model = opts?.model ?? DEFAULT_MODEL;
    this.maxTokens = opts?.maxTokens ?? DEFAULT_MAX_TOKENS;
    this.temperature = opts?.temperature ?? DEFAULT_TEMPERATURE;
  }

  async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
    options.signal?.throwIfAborted();
    let content: string | null | undefined;
    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: [{ role: 'user', content: prompt }],
          max_tokens: this.maxTokens,
          temperature: this.temperature,
        },
        { signal: options.signal }
      );
      content = response.choices[0]?.message?.content;
    } catch (err) {
      options.signal?.throwIfAborted();
      throw toCompletionError(err);
    }

    if (!content) {
      throw new CompletionError(`Model ${this.model} returned an empty completion`);
    }
    return content;
  }
}

function toCompletionError(err: unknown): CompletionError {
  if (err instanceof OpenAI.APIError) {
    const status = typeof err.status === 'number' ? err.status : undefined;
    return new CompletionError(
      `Completion request failed${status !== undefined ? ` (${status})` : ''}: ${err.message}`,
      { status, retryAfterMs: parseRetryAfter(err.headers?.['retry-after']), cause: err }
    );
  }
  const message = err instanceof Error ? err.message : String(err);
  return new CompletionError(`Completion request failed: ${message}`, { cause: err });
}

/** `Retry-After` in seconds → milliseconds. */
function parseRetryAfter(value: string | null | undefined): number | undefined {
  if (!value) return undefined;
  const seconds = Number(value);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : undefined;
}
