/**
 * LLM Batch Translation Client
 *
 * Sends dictionary misses to an OpenAI-compatible chat completions endpoint.
 * Each request has its own timeout (AbortController); transient failures are
 * retried with exponential backoff. Once retries are exhausted the last error
 * is thrown and the caller fails the unit.
 *
 * @module translation/llm-client
 */

import OpenAI from 'openai';
import { z } from 'zod';
import type { BatchTranslator, Logger, TranslateBatchOptions } from '../pipeline/types.js';
import { silentLogger } from '../pipeline/types.js';
import { buildSystemPrompt, buildUserPrompt, formatDictionaryContext } from './prompts.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Message in the chat conversation.
 */
export interface ChatMessage {
  role: 'system' | 'user';
  content: string;
}

export interface ChatRequest {
  model: string;
  temperature: number;
  messages: ChatMessage[];
}

/**
 * One chat completion. Resolves to the assistant message text.
 */
export type ChatCompletionFn = (request: ChatRequest, signal: AbortSignal) => Promise<string>;

/**
 * LLM API error with additional context.
 */
export class LlmApiError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly isRetryable: boolean,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'LlmApiError';
  }
}

/**
 * Source of reference entries for the prompt.
 */
export interface ContextProvider {
  relatedEntries(texts: readonly string[]): Array<[string, string]>;
}

export interface LlmClientOptions {
  model: string;
  temperature: number;
  /** Retries after the first attempt */
  maxRetries: number;
  targetLang: string;
  /** Performs the request; defaults to the OpenAI SDK */
  complete: ChatCompletionFn;
  context?: ContextProvider;
  logger?: Logger;
  /** Base delay for exponential backoff (default: 1000) */
  baseDelayMs?: number;
  /** Maximum backoff delay (default: 30000) */
  maxDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

// ============================================================================
// Retry Helpers
// ============================================================================

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Exponential backoff with up to 30% jitter.
 */
export function calculateDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  const exponential = Math.min(maxDelayMs, baseDelayMs * Math.pow(2, attempt));
  const jitter = Math.random() * 0.3 * exponential;
  return exponential + jitter;
}

/**
 * Error for a request cancelled through the caller's signal.
 */
export function cancelledError(cause?: unknown): LlmApiError {
  return new LlmApiError('Request cancelled', 499, false, { cause });
}

/**
 * Map any thrown value to an LlmApiError.
 *
 * Rate limits, server errors, timeouts and network failures are retryable;
 * other 4xx responses are not.
 */
export function toLlmApiError(error: unknown, timeoutMs: number): LlmApiError {
  if (error instanceof LlmApiError) {
    return error;
  }
  if (error instanceof OpenAI.APIConnectionTimeoutError) {
    return new LlmApiError(`Request timed out after ${timeoutMs}ms`, 408, true, { cause: error });
  }
  if (error instanceof OpenAI.APIUserAbortError || (error instanceof Error && error.name === 'AbortError')) {
    return new LlmApiError(`Request timed out after ${timeoutMs}ms`, 408, true, { cause: error });
  }
  if (error instanceof OpenAI.APIError) {
    const status = error.status ?? 500;
    const isRetryable = status === 429 || status >= 500;
    return new LlmApiError(error.message, status, isRetryable, { cause: error });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new LlmApiError(message, 500, true, { cause: error });
}

// ============================================================================
// Response Parsing
// ============================================================================

const ResponseObjectSchema = z.record(z.string(), z.unknown());

/**
 * Extract the JSON object from a model reply.
 *
 * Handles raw JSON, JSON in a markdown code fence, and JSON embedded in
 * prose.
 *
 * @throws LlmApiError (retryable) if no JSON object can be parsed
 */
export function extractJsonObject(text: string): Record<string, unknown> {
  let cleanText = text.trim();

  const codeBlockMatch = cleanText.match(/```(?:json)?\s*\n?([\s\S]*?)\n?```/);
  if (codeBlockMatch) {
    cleanText = codeBlockMatch[1].trim();
  }

  if (!cleanText.startsWith('{')) {
    const objectMatch = cleanText.match(/\{[\s\S]*\}/);
    if (objectMatch) {
      cleanText = objectMatch[0];
    }
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(cleanText);
  } catch (error) {
    throw new LlmApiError(
      `Failed to parse JSON from LLM response: ${text.substring(0, 200)}`,
      502,
      true,
      { cause: error }
    );
  }

  const result = ResponseObjectSchema.safeParse(parsed);
  if (!result.success) {
    throw new LlmApiError('LLM response is not a JSON object', 502, true);
  }
  return result.data;
}

/**
 * Map a reply keyed "1".."n" back to input order.
 * Missing, blank or non-string values become null.
 */
export function mapResponse(reply: Record<string, unknown>, count: number): Array<string | null> {
  const results: Array<string | null> = [];
  for (let index = 0; index < count; index++) {
    const value = reply[String(index + 1)];
    results.push(typeof value === 'string' && value.trim() !== '' ? value : null);
  }
  return results;
}

// ============================================================================
// Client
// ============================================================================

/**
 * Build a ChatCompletionFn over the OpenAI SDK. SDK-level retries are
 * disabled; the translator retries.
 */
export function createOpenAiCompletion(settings: { apiKey: string; baseUrl?: string }): ChatCompletionFn {
  const client = new OpenAI({
    apiKey: settings.apiKey,
    baseURL: settings.baseUrl,
    maxRetries: 0,
  });

  return async (request, signal) => {
    const response = await client.chat.completions.create(
      {
        model: request.model,
        temperature: request.temperature,
        messages: request.messages,
      },
      { signal }
    );

    const content = response.choices[0]?.message?.content;
    if (!content) {
      throw new LlmApiError('Empty response from LLM', 502, true);
    }
    return content;
  };
}

/**
 * BatchTranslator over a chat completion endpoint.
 *
 * @example
 * ```typescript
 * const translator = new LlmTranslator({
 *   model: 'gpt-4o-mini',
 *   temperature: 0.3,
 *   maxRetries: 3,
 *   targetLang: 'zh_cn',
 *   complete: createOpenAiCompletion({ apiKey }),
 *   context: dictionary,
 * });
 * const [text] = await translator.translateBatch(['Copper Ingot'], { timeoutMs: 30000 });
 * ```
 */
export class LlmTranslator implements BatchTranslator {
  private readonly logger: Logger;
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly options: LlmClientOptions) {
    this.logger = options.logger ?? silentLogger;
    this.baseDelayMs = options.baseDelayMs ?? 1000;
    this.maxDelayMs = options.maxDelayMs ?? 30000;
    this.sleep = options.sleep ?? sleep;
  }

  async translateBatch(
    texts: readonly string[],
    options: TranslateBatchOptions
  ): Promise<Array<string | null>> {
    if (texts.length === 0) {
      return [];
    }

    const related = this.options.context?.relatedEntries(texts) ?? [];
    const request: ChatRequest = {
      model: this.options.model,
      temperature: this.options.temperature,
      messages: [
        {
          role: 'system',
          content: buildSystemPrompt(this.options.targetLang, formatDictionaryContext(related)),
        },
        { role: 'user', content: buildUserPrompt(texts) },
      ],
    };

    let lastError: LlmApiError | undefined;
    for (let attempt = 0; attempt <= this.options.maxRetries; attempt++) {
      try {
        const content = await this.completeWithTimeout(request, options);
        return mapResponse(extractJsonObject(content), texts.length);
      } catch (error) {
        lastError = options.signal?.aborted ? cancelledError(error) : toLlmApiError(error, options.timeoutMs);

        if (options.signal?.aborted || !lastError.isRetryable || attempt >= this.options.maxRetries) {
          break;
        }

        const delay = calculateDelay(attempt, this.baseDelayMs, this.maxDelayMs);
        this.logger.warn(
          `LLM batch attempt ${attempt + 1}/${this.options.maxRetries + 1} failed ` +
            `(${lastError.message}), retrying in ${Math.round(delay)}ms`
        );
        await this.sleep(delay);
      }
    }

    throw lastError ?? new LlmApiError('Unknown error during LLM call', 500, false);
  }

  /**
   * One request bounded by timeoutMs and by the caller's signal.
   */
  private async completeWithTimeout(
    request: ChatRequest,
    options: TranslateBatchOptions
  ): Promise<string> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), options.timeoutMs);
    const onAbort = (): void => controller.abort();
    options.signal?.addEventListener('abort', onAbort, { once: true });

    try {
      return await this.raceAbort(
        this.options.complete(request, controller.signal),
        controller.signal,
        options
      );
    } finally {
      clearTimeout(timeoutId);
      options.signal?.removeEventListener('abort', onAbort);
    }
  }

  /**
   * Reject as soon as the signal aborts, even if the completion ignores it.
   * An abort from the caller's signal is a cancellation, anything else a timeout.
   */
  private raceAbort<T>(promise: Promise<T>, signal: AbortSignal, options: TranslateBatchOptions): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const onAbort = (): void => {
        reject(
          options.signal?.aborted
            ? cancelledError()
            : new LlmApiError(`Request timed out after ${options.timeoutMs}ms`, 408, true)
        );
      };
      if (signal.aborted) {
        onAbort();
        return;
      }
      signal.addEventListener('abort', onAbort, { once: true });
      promise.then(
        (value) => {
          signal.removeEventListener('abort', onAbort);
          resolve(value);
        },
        (error: unknown) => {
          signal.removeEventListener('abort', onAbort);
          reject(error);
        }
      );
    });
  }
}
