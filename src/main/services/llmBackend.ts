/**
 * Text-Generation Backends
 *
 * One capability, `send(prompt) → reply text`, with an implementation per
 * provider. The provider is chosen once, when the backend is built:
 *  - openai:    POST /v1/chat/completions, reply in choices[0].message.content
 *  - anthropic: POST /v1/messages, reply in the first text content block
 *
 * Both use temperature 0.1 and a 500-token reply limit. Every failure while
 * calling the provider surfaces as a TransportFailure.
 */

import axios from 'axios';
import { LLM_PROVIDERS, isLlmProvider } from '../../shared/types';
import type { LlmProvider } from '../../shared/types';
import { ConfigurationError, TransportFailure } from './errors';

// ─── Constants ───────────────────────────────────────────────────────────────

export const TEMPERATURE = 0.1;
export const MAX_REPLY_TOKENS = 500;

export const OPENAI_MODEL = 'gpt-4o';
export const ANTHROPIC_MODEL = 'claude-3-5-sonnet-20241022';

const OPENAI_BASE_URL = 'https://api.openai.com/v1';
const ANTHROPIC_BASE_URL = 'https://api.anthropic.com/v1';
const ANTHROPIC_VERSION = '2023-06-01';
const DEFAULT_REQUEST_TIMEOUT_MS = 60_000;

// ─── Interfaces ──────────────────────────────────────────────────────────────

/** Sends a prompt to a text-generation service and returns the raw reply */
export interface LlmBackend {
  readonly provider: LlmProvider;
  readonly model: string;
  send(prompt: string): Promise<string>;
}

/** Provider credentials, as read from configuration */
export interface LlmCredentials {
  openaiApiKey?: string;
  anthropicApiKey?: string;
}

/** Transport options (overridable for tests) */
export interface LlmBackendOptions {
  /** API base URL, without trailing slash */
  baseUrl?: string;
  /** HTTP request timeout in milliseconds */
  requestTimeout?: number;
}

interface OpenAIChatResponse {
  choices?: Array<{
    message?: {
      content?: string | null;
    };
  }>;
}

interface AnthropicMessageResponse {
  content?: Array<{
    type: string;
    text?: string;
  }>;
}

// ─── Axios Error Detection ──────────────────────────────────────────────────

/** Type guard for axios-like errors (works with both real and mocked axios) */
interface AxiosLikeError extends Error {
  isAxiosError: boolean;
  response?: {
    status: number;
    data?: unknown;
  };
}

function isAxiosLikeError(error: unknown): error is AxiosLikeError {
  return (
    error !== null &&
    typeof error === 'object' &&
    'isAxiosError' in error &&
    error.isAxiosError === true
  );
}

/**
 * Converts anything thrown by an HTTP call into a TransportFailure.
 */
export function toTransportFailure(error: unknown, provider: LlmProvider): TransportFailure {
  if (error instanceof TransportFailure) {
    return error;
  }

  if (isAxiosLikeError(error)) {
    const status = error.response?.status;
    let reason: string;
    if (status === 401 || status === 403) {
      reason = 'authentication rejected';
    } else if (status === 429) {
      reason = 'rate limit exceeded';
    } else if (status !== undefined) {
      reason = `HTTP ${status}`;
    } else {
      reason = 'network error';
    }
    return new TransportFailure(`${provider} request failed (${reason}): ${error.message}`, {
      provider,
      statusCode: status,
      cause: error,
    });
  }

  const cause = error instanceof Error ? error : new Error(String(error));
  return new TransportFailure(`${provider} request failed: ${cause.message}`, { provider, cause });
}

// ─── Implementations ─────────────────────────────────────────────────────────

/**
 * OpenAI chat completions backend.
 */
export class OpenAIBackend implements LlmBackend {
  readonly provider = 'openai' as const;
  readonly model = OPENAI_MODEL;
  private readonly baseUrl: string;
  private readonly requestTimeout: number;

  constructor(
    private readonly apiKey: string,
    options: LlmBackendOptions = {},
  ) {
    this.baseUrl = options.baseUrl ?? OPENAI_BASE_URL;
    this.requestTimeout = options.requestTimeout ?? DEFAULT_REQUEST_TIMEOUT_MS;
  }

  async send(prompt: string): Promise<string> {
    try {
      const response = await axios.post<OpenAIChatResponse>(
        `${this.baseUrl}/chat/completions`,
        {
          model: this.model,
          messages: [{ role: 'user', content: prompt }],
          temperature: TEMPERATURE,
          max_tokens: MAX_REPLY_TOKENS,
        },
        {
          headers: {
            Authorization: `Bearer ${this.apiKey}`,
            'Content-Type': 'application/json',
          },
          timeout: this.requestTimeout,
        },
      );

      const content = response.data?.choices?.[0]?.message?.content;
      if (typeof content !== 'string') {
        throw new TransportFailure('openai reply contained no message content', { provider: this.provider });
      }
      return content;
    } catch (error: unknown) {
      throw toTransportFailure(error, this.provider);
    }
  }
}

/**
 * Anthropic messages backend.
 */
export class AnthropicBackend implements LlmBackend {
  readonly provider = 'anthropic' as const;
  readonly model = ANTHROPIC_MODEL;
  private readonly baseUrl: string;
  private readonly requestTimeout: number;

  constructor(
    private readonly apiKey: string,
    options: LlmBackendOptions = {},
  ) {
    this.baseUrl = options.baseUrl ?? ANTHROPIC_BASE_URL;
    this.requestTimeout = options.requestTimeout ?? DEFAULT_REQUEST_TIMEOUT_MS;
  }

  async send(prompt: string): Promise<string> {
    try {
      const response = await axios.post<AnthropicMessageResponse>(
        `${this.baseUrl}/messages`,
        {
          model: this.model,
          max_tokens: MAX_REPLY_TOKENS,
          temperature: TEMPERATURE,
          messages: [{ role: 'user', content: prompt }],
        },
        {
          headers: {
            'x-api-key': this.apiKey,
            'anthropic-version': ANTHROPIC_VERSION,
            'Content-Type': 'application/json',
          },
          timeout: this.requestTimeout,
        },
      );

      const textBlock = response.data?.content?.find((block) => block.type === 'text');
      if (typeof textBlock?.text !== 'string') {
        throw new TransportFailure('anthropic reply contained no text block', { provider: this.provider });
      }
      return textBlock.text;
    } catch (error: unknown) {
      throw toTransportFailure(error, this.provider);
    }
  }
}

// ─── Factory ─────────────────────────────────────────────────────────────────

/**
 * Builds the backend for a provider identifier.
 *
 * @throws ConfigurationError for an unknown provider or a missing credential
 */
export function createLlmBackend(
  provider: string,
  credentials: LlmCredentials,
  options: LlmBackendOptions = {},
): LlmBackend {
  if (!isLlmProvider(provider)) {
    throw new ConfigurationError(
      `Unsupported provider: ${provider}. Use one of: ${LLM_PROVIDERS.join(', ')}`,
    );
  }

  switch (provider) {
    case 'openai': {
      const apiKey = credentials.openaiApiKey?.trim();
      if (!apiKey) {
        throw new ConfigurationError('OPENAI_API_KEY environment variable not set');
      }
      return new OpenAIBackend(apiKey, options);
    }
    case 'anthropic': {
      const apiKey = credentials.anthropicApiKey?.trim();
      if (!apiKey) {
        throw new ConfigurationError('ANTHROPIC_API_KEY environment variable not set');
      }
      return new AnthropicBackend(apiKey, options);
    }
  }
}
