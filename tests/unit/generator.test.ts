/**
 * Unit tests for the Anthropic-backed text generator
 */

import { describe, it, expect, jest } from '@jest/globals';
import {
  AnthropicTextGenerator,
  isRateLimitError,
  DEFAULT_MODEL,
  DEFAULT_MAX_TOKENS,
  type GeneratedMessage,
  type MessageClient,
} from '../../src/generator/index.js';
import { CollaboratorUnavailableError } from '../../src/errors/index.js';
import { createMockLogger, createMockMetrics } from '../helpers/fakes.js';

const message = (text: string | null): GeneratedMessage => ({
  text,
  input_tokens: 120,
  output_tokens: 80,
  stop_reason: 'end_turn',
});

const createMockClient = () => ({ createMessage: jest.fn<MessageClient['createMessage']>() });

const observability = () => ({ logger: createMockLogger(), metrics: createMockMetrics() });

describe('AnthropicTextGenerator', () => {
  it('requires an API key when no client is supplied', () => {
    expect(() => new AnthropicTextGenerator({ apiKey: '' })).toThrow(CollaboratorUnavailableError);
  });

  it('sends the prompts with default model settings and trims the reply', async () => {
    const client = createMockClient();
    client.createMessage.mockResolvedValue(message('  Hi Jane,\n\nQuick idea.  '));
    const generator = new AnthropicTextGenerator({ apiKey: 'test-secret' }, observability(), client);

    const text = await generator.generate('system prompt', 'user prompt');

    expect(text).toBe('Hi Jane,\n\nQuick idea.');
    expect(client.createMessage).toHaveBeenCalledWith({
      model: DEFAULT_MODEL,
      max_tokens: DEFAULT_MAX_TOKENS,
      temperature: 0.7,
      system: 'system prompt',
      prompt: 'user prompt',
    });
  });

  it('honors configured model settings', async () => {
    const client = createMockClient();
    client.createMessage.mockResolvedValue(message('ok'));
    const generator = new AnthropicTextGenerator(
      { apiKey: 'test-secret', model: 'claude-3-5-haiku-20241022', maxTokens: 300, temperature: 0.2 },
      observability(),
      client
    );

    await generator.generate('s', 'u');

    expect(client.createMessage.mock.calls[0]?.[0]).toMatchObject({
      model: 'claude-3-5-haiku-20241022',
      max_tokens: 300,
      temperature: 0.2,
    });
  });

  it('retries rate-limited calls and then succeeds', async () => {
    const client = createMockClient();
    client.createMessage
      .mockRejectedValueOnce(new Error('429 rate_limit_error'))
      .mockResolvedValueOnce(message('Recovered'));
    const obs = observability();
    const generator = new AnthropicTextGenerator({ apiKey: 'test-secret', retryDelaysMs: [0, 0] }, obs, client);

    await expect(generator.generate('s', 'u')).resolves.toBe('Recovered');
    expect(client.createMessage).toHaveBeenCalledTimes(2);
    expect(obs.metrics.increment).toHaveBeenCalledWith('generator.rate_limit', { model: DEFAULT_MODEL });
  });

  it('gives up after the configured number of attempts', async () => {
    const client = createMockClient();
    client.createMessage.mockRejectedValue(new Error('overloaded_error'));
    const generator = new AnthropicTextGenerator({ apiKey: 'test-secret', retryDelaysMs: [0, 0] }, observability(), client);

    await expect(generator.generate('s', 'u')).rejects.toThrow('text_generator: overloaded_error');
    expect(client.createMessage).toHaveBeenCalledTimes(2);
  });

  it('does not retry other errors', async () => {
    const client = createMockClient();
    client.createMessage.mockRejectedValue(new Error('invalid_request_error: prompt too long'));
    const generator = new AnthropicTextGenerator({ apiKey: 'test-secret', retryDelaysMs: [0, 0, 0] }, observability(), client);

    await expect(generator.generate('s', 'u')).rejects.toThrow(CollaboratorUnavailableError);
    expect(client.createMessage).toHaveBeenCalledTimes(1);
  });

  it('fails when the response has no text block', async () => {
    const client = createMockClient();
    client.createMessage.mockResolvedValue(message(null));
    const generator = new AnthropicTextGenerator({ apiKey: 'test-secret', retryDelaysMs: [0] }, observability(), client);

    await expect(generator.generate('s', 'u')).rejects.toThrow(
      'text_generator: No text content in generator response'
    );
  });
});

describe('isRateLimitError', () => {
  it('recognizes rate limit and overload messages', () => {
    expect(isRateLimitError(new Error('rate_limit_error'))).toBe(true);
    expect(isRateLimitError(new Error('overloaded_error'))).toBe(true);
    expect(isRateLimitError('HTTP 429')).toBe(true);
    expect(isRateLimitError(new Error('bad request'))).toBe(false);
  });
});
