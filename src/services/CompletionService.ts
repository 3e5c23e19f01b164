import Anthropic from '@anthropic-ai/sdk';
import { ExternalServiceError, TaskType } from '../types/index.js';
import { asError } from '../utils/index.js';
import { logger } from '../utils/logger.js';

export interface CompletionRequest {
  taskType: TaskType;
  prompt: string;
  model: string;
  maxTokens: number;
}

export interface CompletionResponse {
  generatedText: string;
}

export interface CompletionOptions {
  signal?: AbortSignal;
}

/**
 * The single external dependency of the agent: text in, text out.
 */
export interface CompletionService {
  complete(request: CompletionRequest, options?: CompletionOptions): Promise<CompletionResponse>;
}

/**
 * The slice of the Anthropic client this service calls. The SDK's
 * `messages` resource satisfies it.
 */
export interface MessagesClient {
  create(
    body: {
      model: string;
      max_tokens: number;
      messages: { role: 'user'; content: string }[];
    },
    options?: { signal?: AbortSignal }
  ): Promise<{
    content: { type: string; text?: string }[];
    usage: { input_tokens: number; output_tokens: number };
  }>;
}

export class AnthropicCompletionService implements CompletionService {
  private messages: MessagesClient;

  constructor(apiKey: string, messages?: MessagesClient) {
    this.messages = messages ?? new Anthropic({ apiKey }).messages;
  }

  async complete(request: CompletionRequest, options: CompletionOptions = {}): Promise<CompletionResponse> {
    try {
      const message = await this.messages.create(
        {
          model: request.model,
          max_tokens: request.maxTokens,
          messages: [{ role: 'user', content: request.prompt }],
        },
        { signal: options.signal }
      );

      const generatedText = message.content
        .flatMap(block => (block.type === 'text' && block.text !== undefined ? [block.text] : []))
        .join('');
      if (generatedText === '') {
        throw new ExternalServiceError('Completion returned no text');
      }

      logger.debug('Completion received', {
        taskType: request.taskType,
        model: request.model,
        inputTokens: message.usage.input_tokens,
        outputTokens: message.usage.output_tokens,
      });
      return { generatedText };
    } catch (error) {
      throw toCompletionError(error, options.signal);
    }
  }
}

function toCompletionError(error: unknown, signal?: AbortSignal): ExternalServiceError {
  if (error instanceof ExternalServiceError) {
    return error;
  }
  if (signal?.aborted) {
    return new ExternalServiceError('Completion aborted', true);
  }
  if (error instanceof Anthropic.APIError) {
    return new ExternalServiceError(`Anthropic API error ${error.status ?? 'unknown'}: ${error.message}`);
  }
  return new ExternalServiceError(`Completion failed: ${asError(error).message}`);
}

/**
 * Run `fn` with an abort signal that fires after `ms`. A call that is still
 * running then fails with a timed-out ExternalServiceError, whether or not
 * `fn` honours the signal.
 */
export async function withTimeout<T>(fn: (signal: AbortSignal) => Promise<T>, ms: number): Promise<T> {
  const controller = new AbortController();
  const timeoutError = new ExternalServiceError(`Completion timed out after ${ms}ms`, true);
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(timeoutError);
    }, ms);
  });

  try {
    return await Promise.race([fn(controller.signal), timeout]);
  } catch (error) {
    throw controller.signal.aborted ? timeoutError : error;
  } finally {
    clearTimeout(timer);
  }
}
