/**
 * Text Generator Module
 *
 * Anthropic-backed implementation of the TextGenerator contract used by the
 * draft nodes. Rate-limit and overload errors are retried with exponential
 * backoff; anything else propagates to the calling node.
 */

import Anthropic from '@anthropic-ai/sdk';
import type { ContentBlock } from '@anthropic-ai/sdk/resources/messages';
import { CollaboratorUnavailableError, toErrorMessage } from '../errors/index.js';
import { createLogger, noopMetrics } from '../logger/index.js';
import type { Logger, Metrics, Observability, TextGenerator } from '../types/index.js';

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_MODEL = 'claude-3-5-sonnet-20241022';
export const DEFAULT_MAX_TOKENS = 1024;
const DEFAULT_TEMPERATURE = 0.7;
const DEFAULT_TIMEOUT = 60000;

/** Exponential backoff delays for rate limit handling */
export const RATE_LIMIT_DELAYS_MS = [1000, 2000, 4000, 8000, 16000];

const defaultLogger: Logger = createLogger('generator');

// ============================================================================
// Types
// ============================================================================

export interface GeneratorConfig {
  /** Anthropic API key (from ANTHROPIC_API_KEY env var) */
  apiKey: string;
  model?: string;
  maxTokens?: number;
  temperature?: number;
  timeout?: number;
  /** Backoff schedule; the number of entries bounds the attempts */
  retryDelaysMs?: number[];
}

export interface MessageRequest {
  model: string;
  max_tokens: number;
  temperature: number;
  system: string;
  prompt: string;
}

export interface GeneratedMessage {
  text: string | null;
  input_tokens: number;
  output_tokens: number;
  stop_reason: string | null;
}

/**
 * Seam over the messages API so tests can supply responses in process
 */
export interface MessageClient {
  createMessage(request: MessageRequest): Promise<GeneratedMessage>;
}

// ============================================================================
// Helpers
// ============================================================================

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function isRateLimitError(error: unknown): boolean {
  if (error instanceof Anthropic.APIError && (error.status === 429 || error.status === 529)) {
    return true;
  }
  const message = toErrorMessage(error);
  return message.includes('rate_limit') || message.includes('429') || message.includes('overloaded');
}

/**
 * MessageClient backed by the Anthropic SDK
 */
export function createAnthropicClient(apiKey: string, timeout: number = DEFAULT_TIMEOUT): MessageClient {
  const client = new Anthropic({ apiKey, timeout });
  return {
    async createMessage(request) {
      const response = await client.messages.create({
        model: request.model,
        max_tokens: request.max_tokens,
        temperature: request.temperature,
        system: request.system,
        messages: [{ role: 'user', content: request.prompt }],
      });
      const textBlock = response.content.find((block: ContentBlock) => block.type === 'text');
      return {
        text: textBlock && textBlock.type === 'text' ? textBlock.text : null,
        input_tokens: response.usage.input_tokens,
        output_tokens: response.usage.output_tokens,
        stop_reason: response.stop_reason,
      };
    },
  };
}

// ============================================================================
// Generator
// ============================================================================

export class AnthropicTextGenerator implements TextGenerator {
  private readonly client: MessageClient;
  private readonly model: string;
  private readonly maxTokens: number;
  private readonly temperature: number;
  private readonly retryDelaysMs: number[];
  private readonly logger: Logger;
  private readonly metrics: Metrics;

  constructor(config: GeneratorConfig, observability: Observability = {}, client?: MessageClient) {
    if (!config.apiKey && !client) {
      throw new CollaboratorUnavailableError(
        'text_generator',
        'ANTHROPIC_API_KEY is required. Set it in config or environment variable.'
      );
    }
    this.client = client ?? createAnthropicClient(config.apiKey, config.timeout);
    this.model = config.model ?? DEFAULT_MODEL;
    this.maxTokens = config.maxTokens ?? DEFAULT_MAX_TOKENS;
    this.temperature = config.temperature ?? DEFAULT_TEMPERATURE;
    this.retryDelaysMs = config.retryDelaysMs ?? RATE_LIMIT_DELAYS_MS;
    this.logger = observability.logger ?? defaultLogger;
    this.metrics = observability.metrics ?? noopMetrics;
  }

  async generate(systemPrompt: string, userPrompt: string): Promise<string> {
    const startTime = Date.now();
    const model = this.model;

    this.logger.debug('Calling text generator', {
      model,
      maxTokens: this.maxTokens,
      promptLength: userPrompt.length,
    });
    this.metrics.increment('generator.calls', { model });

    let lastError: unknown = null;
    const attempts = Math.max(this.retryDelaysMs.length, 1);

    for (let attempt = 0; attempt < attempts; attempt++) {
      try {
        const response = await this.client.createMessage({
          model,
          max_tokens: this.maxTokens,
          temperature: this.temperature,
          system: systemPrompt,
          prompt: userPrompt,
        });

        if (response.text === null) {
          throw new Error('No text content in generator response');
        }

        this.metrics.timing('generator.duration', Date.now() - startTime, { model });
        this.metrics.gauge('generator.input_tokens', response.input_tokens, { model });
        this.metrics.gauge('generator.output_tokens', response.output_tokens, { model });
        this.logger.info('Generator response received', {
          model,
          inputTokens: response.input_tokens,
          outputTokens: response.output_tokens,
          stopReason: response.stop_reason,
        });

        return response.text.trim();
      } catch (error) {
        lastError = error;

        if (isRateLimitError(error) && attempt < attempts - 1) {
          const delay = this.retryDelaysMs[attempt] ?? 1000;
          this.logger.warn(`Rate limited, retrying in ${delay}ms`, {
            attempt: attempt + 1,
            error: toErrorMessage(error),
          });
          this.metrics.increment('generator.rate_limit', { model });
          await sleep(delay);
          continue;
        }

        break;
      }
    }

    this.logger.error('Text generation failed', { model, error: toErrorMessage(lastError) });
    this.metrics.increment('generator.errors', { model });
    throw new CollaboratorUnavailableError('text_generator', toErrorMessage(lastError), { cause: lastError });
  }
}
