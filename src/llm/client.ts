/**
 * Scoring oracle client: OpenAI-compatible chat completions over HTTP.
 */

import { createChildLogger } from '@/utils/logger';
import { sleep as defaultSleep, type Sleep } from '@/utils/timing';

const logger = createChildLogger('llm_client');

export interface ScoringClient {
  /** Returns the raw reply text for a single prompt. */
  complete(prompt: string): Promise<string>;
}

export interface OpenAiChatConfig {
  apiKey: string;
  model: string;
  baseUrl: string;
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
  maxRetries: number;
}

interface ChatCompletionResponse {
  choices?: Array<{ message?: { content?: string | null } }>;
  error?: { message?: string };
}

export class ScoringClientError extends Error {
  constructor(
    message: string,
    public readonly status: number | null = null
  ) {
    super(message);
    this.name = 'ScoringClientError';
  }
}

function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

export class OpenAiChatClient implements ScoringClient {
  constructor(
    private readonly config: OpenAiChatConfig,
    private readonly fetchFn: typeof fetch = fetch,
    private readonly sleep: Sleep = defaultSleep
  ) {}

  async complete(prompt: string): Promise<string> {
    const response = await this.fetchWithRetry(`${this.config.baseUrl.replace(/\/+$/, '')}/chat/completions`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${this.config.apiKey}`,
      },
      body: JSON.stringify({
        model: this.config.model,
        temperature: this.config.temperature,
        max_tokens: this.config.maxTokens,
        response_format: { type: 'json_object' },
        messages: [
          {
            role: 'system',
            content: 'You are a financial analyst. Respond with a single JSON object.',
          },
          { role: 'user', content: prompt },
        ],
      }),
    });

    const body: ChatCompletionResponse = await response.json();
    const content = body.choices?.[0]?.message?.content;
    if (typeof content !== 'string') {
      throw new ScoringClientError('Chat completion returned no message content', response.status);
    }
    return content;
  }

  private async fetchWithRetry(url: string, init: RequestInit): Promise<Response> {
    let lastError: Error | null = null;

    for (let attempt = 0; attempt <= this.config.maxRetries; attempt++) {
      if (attempt > 0) {
        const delay = 1000 * 2 ** (attempt - 1);
        logger.debug({ attempt, delay }, 'Retrying chat completion');
        await this.sleep(delay);
      }

      let response: Response;
      try {
        response = await this.fetchFn(url, {
          ...init,
          signal: AbortSignal.timeout(this.config.timeoutMs),
        });
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));
        logger.warn({ attempt, error: lastError.message }, 'Chat completion request failed');
        continue;
      }

      if (response.ok) {
        return response;
      }

      const error = new ScoringClientError(
        `Chat completion returned HTTP ${response.status}`,
        response.status
      );
      if (!isRetryableStatus(response.status)) {
        throw error;
      }
      lastError = error;
      logger.warn({ attempt, status: response.status }, 'Chat completion throttled or unavailable');
    }

    throw lastError ?? new ScoringClientError('Chat completion failed');
  }
}
