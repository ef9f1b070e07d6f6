import Anthropic from '@anthropic-ai/sdk';
import { env } from '../config/env';
import { logger } from '../utils/logger';
import { errorStatus, ServiceError, toError } from '../utils/errors';

// The SDK's own retries are off; attempts are counted here.
const anthropic = new Anthropic({
  apiKey: env.ANTHROPIC_API_KEY,
  timeout: env.LLM_TIMEOUT_MS,
  maxRetries: 0,
});

export interface ChatTurn {
  role: 'user' | 'assistant';
  content: string;
}

export interface CompletionRequest {
  system: string;
  messages: ChatTurn[];
  maxTokens: number;
  temperature: number;
}

export interface CompletionClient {
  complete(request: CompletionRequest): Promise<string>;
}

export interface AnthropicOptions {
  model: string;
  maxAttempts: number;
  /** Base delay for the 429 backoff, doubled per attempt. */
  backoffMs: number;
}

export class AnthropicService implements CompletionClient {
  private options: AnthropicOptions;

  constructor(options: Partial<AnthropicOptions> = {}) {
    this.options = {
      model: env.ANTHROPIC_MODEL,
      maxAttempts: env.LLM_MAX_ATTEMPTS,
      backoffMs: 500,
      ...options,
    };
  }

  async complete(request: CompletionRequest): Promise<string> {
    const { model, maxAttempts, backoffMs } = this.options;
    let lastError: Error = new Error('No attempts made');

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        const response = await anthropic.messages.create({
          model,
          system: request.system,
          messages: request.messages,
          temperature: request.temperature,
          max_tokens: request.maxTokens,
        });

        const content = response.content
          .map((block) => (block.type === 'text' ? block.text : ''))
          .join('')
          .trim();

        logger.debug('Anthropic response generated', {
          attempt,
          tokens: { prompt: response.usage?.input_tokens || 0, completion: response.usage?.output_tokens || 0 },
        });
        return content;
      } catch (error: unknown) {
        lastError = toError(error);
        const status = errorStatus(error);

        if (status === 400 || status === 401) {
          throw new ServiceError('Anthropic', 'complete', lastError, false);
        }

        if (status === 429 && attempt < maxAttempts) {
          const delay = Math.pow(2, attempt - 1) * backoffMs;
          logger.warn('Anthropic rate limited, backing off', { attempt, delay });
          await new Promise((resolve) => setTimeout(resolve, delay));
          continue;
        }

        logger.error('Anthropic error', { attempt, status, error: lastError.message });
      }
    }

    throw new ServiceError('Anthropic', 'complete', lastError, true);
  }
}
