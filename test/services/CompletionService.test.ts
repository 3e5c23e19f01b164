import { describe, it, expect } from 'vitest';
import Anthropic from '@anthropic-ai/sdk';
import {
  AnthropicCompletionService,
  CompletionRequest,
  MessagesClient,
  withTimeout,
} from '../../src/services/CompletionService.js';
import { ExternalServiceError } from '../../src/types/index.js';

const REQUEST: CompletionRequest = {
  taskType: 'general',
  prompt: 'Say hello',
  model: 'claude-test',
  maxTokens: 100,
};

type CreateBody = Parameters<MessagesClient['create']>[0];

class FakeMessages implements MessagesClient {
  readonly bodies: CreateBody[] = [];

  constructor(private readonly respond: (signal?: AbortSignal) => ReturnType<MessagesClient['create']>) {}

  create(body: CreateBody, options?: { signal?: AbortSignal }): ReturnType<MessagesClient['create']> {
    this.bodies.push(body);
    return this.respond(options?.signal);
  }
}

const usage = { input_tokens: 3, output_tokens: 5 };

describe('withTimeout', () => {
  it('returns the value of a call that finishes in time', async () => {
    expect(await withTimeout(async () => 'done', 100)).toBe('done');
  });

  it('aborts a slow call and reports a timeout', async () => {
    let seen: AbortSignal | undefined;
    const error: unknown = await withTimeout(signal => {
      seen = signal;
      return new Promise<string>(() => {});
    }, 20).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ExternalServiceError);
    expect(error instanceof ExternalServiceError && error.timedOut).toBe(true);
    expect(error instanceof Error && error.message).toBe('Completion timed out after 20ms');
    expect(seen?.aborted).toBe(true);
  });

  it('passes other failures through', async () => {
    await expect(withTimeout(async () => Promise.reject(new Error('broken')), 100)).rejects.toThrow('broken');
  });
});

describe('AnthropicCompletionService', () => {
  it('sends the prompt as one user message and joins the text blocks', async () => {
    const messages = new FakeMessages(async () => ({
      content: [
        { type: 'text', text: 'Hello' },
        { type: 'tool_use' },
        { type: 'text', text: ', world' },
      ],
      usage,
    }));
    const service = new AnthropicCompletionService('test-key', messages);

    expect(await service.complete(REQUEST)).toEqual({ generatedText: 'Hello, world' });
    expect(messages.bodies).toEqual([
      { model: 'claude-test', max_tokens: 100, messages: [{ role: 'user', content: 'Say hello' }] },
    ]);
  });

  it('treats an answer without text as a service error', async () => {
    const service = new AnthropicCompletionService('test-key', new FakeMessages(async () => ({ content: [], usage })));
    await expect(service.complete(REQUEST)).rejects.toThrow('Completion returned no text');
  });

  it('wraps API errors', async () => {
    const service = new AnthropicCompletionService(
      'test-key',
      new FakeMessages(async () => {
        throw new Anthropic.APIError(429, undefined, 'slow down', undefined);
      })
    );

    const error: unknown = await service.complete(REQUEST).catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(ExternalServiceError);
    expect(error instanceof Error && error.message.startsWith('Anthropic API error 429:')).toBe(true);
  });

  it('wraps unexpected failures', async () => {
    const service = new AnthropicCompletionService(
      'test-key',
      new FakeMessages(async () => {
        throw new Error('socket hang up');
      })
    );
    await expect(service.complete(REQUEST)).rejects.toThrow('Completion failed: socket hang up');
  });

  it('reports an aborted call', async () => {
    const controller = new AbortController();
    controller.abort();
    const service = new AnthropicCompletionService(
      'test-key',
      new FakeMessages(async () => {
        throw new Error('aborted');
      })
    );

    const error: unknown = await service.complete(REQUEST, { signal: controller.signal }).catch((caught: unknown) => caught);
    expect(error instanceof ExternalServiceError && error.timedOut).toBe(true);
    expect(error instanceof Error && error.message).toBe('Completion aborted');
  });
});
