import OpenAI from 'openai';
import { OpenAIConfig } from '../../config/openai.js';
import { BackendRequestError, ResponseParseError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';
import { ChatMessage, ModelBackend } from './ModelBackend.js';

/**
 * The slice of the OpenAI SDK this backend uses
 */
export interface ChatCompletionsApi {
  create(body: {
    model: string;
    messages: ChatMessage[];
    response_format: { type: 'json_object' };
  }): Promise<{ choices: Array<{ message: { content: string | null } }> }>;
}

export interface OpenAIBackendOptions {
  model?: string;
  /** Defaults to the shared client from OpenAIConfig */
  completions?: ChatCompletionsApi;
}

/**
 * OpenAI Backend
 *
 * Hosted chat completions endpoint with JSON-object response format.
 */
export class OpenAIBackend implements ModelBackend {
  private completions: ChatCompletionsApi;
  private model: string;
  private logger = createLogger('OpenAIBackend');

  constructor(options: OpenAIBackendOptions = {}) {
    this.completions = options.completions ?? OpenAIConfig.getClient().chat.completions;
    this.model = options.model ?? OpenAIConfig.getModel();
  }

  async complete(messages: ChatMessage[]): Promise<string> {
    let response: Awaited<ReturnType<ChatCompletionsApi['create']>>;

    try {
      response = await this.completions.create({
        model: this.model,
        messages,
        response_format: { type: 'json_object' },
      });
    } catch (error) {
      if (error instanceof OpenAI.APIError) {
        // APIConnectionError is an APIError without a status
        throw new BackendRequestError(
          error.status
            ? `OpenAI API returned status ${error.status}: ${error.message}`
            : `Could not reach OpenAI API: ${error.message}`,
          error.status,
          { cause: error }
        );
      }
      throw new BackendRequestError(
        `OpenAI request failed: ${error instanceof Error ? error.message : String(error)}`,
        undefined,
        { cause: error }
      );
    }

    const content = response.choices[0]?.message.content;
    if (!content) {
      throw new ResponseParseError('OpenAI response contained no message content');
    }

    this.logger.debug('Completion received', { model: this.model, length: content.length });
    return content;
  }

  getBackendName(): string {
    return `openai:${this.model}`;
  }
}
