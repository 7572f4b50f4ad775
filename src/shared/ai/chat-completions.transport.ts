import { Logger } from '@nestjs/common';
import OpenAI from 'openai';
import type { ChatCompletionCreateParamsNonStreaming } from 'openai/resources/chat/completions';

import { ProviderError, type ProviderErrorType } from '../../modules/pdf-context/pdf-context.errors';

export const CHAT_COMPLETIONS_TRANSPORT = Symbol('CHAT_COMPLETIONS_TRANSPORT');

export type CompletionRequestOptions = {
  timeoutMs?: number;
};

/** Sends one chat-completions request and returns the provider's response body unparsed. */
export interface ChatCompletionsTransport {
  complete(payload: ChatCompletionCreateParamsNonStreaming, options?: CompletionRequestOptions): Promise<unknown>;
}

/** The slice of the OpenAI client this transport calls. */
export type ChatCompletionsClient = {
  chat: {
    completions: {
      create(body: ChatCompletionCreateParamsNonStreaming, options?: { timeout?: number }): Promise<unknown>;
    };
  };
};

export type OpenAiTransportOptions = {
  apiKey?: string;
  baseUrl?: string;
  maxRetries?: number;
};

export class OpenAiChatTransport implements ChatCompletionsTransport {
  private readonly log = new Logger(OpenAiChatTransport.name);
  private readonly apiKey: string | null;
  private readonly baseURL: string | undefined;
  private readonly maxRetries: number | undefined;
  private client: ChatCompletionsClient | null;

  constructor(options: OpenAiTransportOptions = {}, client?: ChatCompletionsClient) {
    this.apiKey = options.apiKey?.trim() ? options.apiKey.trim() : null;
    this.baseURL = normalizeBaseUrl(options.baseUrl);
    this.maxRetries = options.maxRetries;
    this.client = client ?? null;
  }

  async complete(payload: ChatCompletionCreateParamsNonStreaming, options: CompletionRequestOptions = {}) {
    const client = this.getClient();
    const startedAt = Date.now();

    try {
      const response = await client.chat.completions.create(
        payload,
        options.timeoutMs ? { timeout: options.timeoutMs } : undefined
      );
      this.log.debug(`ok model=${payload.model} latencyMs=${Date.now() - startedAt}`);
      return response;
    } catch (error) {
      const mapped = mapProviderError(error);
      this.log.warn(`fail model=${payload.model} latencyMs=${Date.now() - startedAt} errorType=${mapped.type}`);
      throw mapped;
    }
  }

  private getClient(): ChatCompletionsClient {
    if (this.client) {
      return this.client;
    }
    if (!this.apiKey) {
      throw new ProviderError({
        type: 'auth',
        message: 'Missing API key; set LLM_API_KEY (or OPENAI_API_KEY / OPENROUTER_API_KEY).'
      });
    }
    const client = new OpenAI({ apiKey: this.apiKey, baseURL: this.baseURL, maxRetries: this.maxRetries });
    this.client = client;
    return client;
  }
}

const readStatus = (error: unknown): number | undefined => {
  if (error && typeof error === 'object' && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
};

function typeForStatus(status: number | undefined): ProviderErrorType | undefined {
  if (status === undefined) return undefined;
  if (status === 401 || status === 403) return 'auth';
  if (status === 429) return 'rate_limit';
  if (status >= 500) return 'server';
  if (status >= 400) return 'invalid_request';
  return undefined;
}

const isTimeout = (error: unknown, message: string) =>
  error instanceof OpenAI.APIConnectionTimeoutError ||
  (error instanceof Error && error.name === 'AbortError') ||
  /timed? ?out/i.test(message);

/** An HTTP status decides the type when there is one; otherwise the error is a timeout or unknown. */
export function mapProviderError(error: unknown): ProviderError {
  if (error instanceof ProviderError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error ?? 'unknown error');
  const status = readStatus(error);
  const type = typeForStatus(status) ?? (isTimeout(error, message) ? 'timeout' : 'unknown');
  const retryAfterMs = type === 'rate_limit' ? parseRetryAfterMs(message) : undefined;

  return new ProviderError({ type, message, status, retryAfterMs, cause: error });
}

export function parseRetryAfterMs(message: string): number | undefined {
  const match = message.match(/try again in ([0-9.]+)(ms|s)/i);
  if (!match) {
    return undefined;
  }
  const value = Number(match[1]);
  if (!Number.isFinite(value)) {
    return undefined;
  }
  return match[2].toLowerCase() === 's' ? value * 1000 : value;
}

const normalizeBaseUrl = (value: string | undefined) => value?.trim().replace(/\/+$/, '') || undefined;
