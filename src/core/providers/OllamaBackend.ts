import { OllamaConfig } from '../../config/ollama.js';
import { BackendRequestError, ResponseParseError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';
import { ChatMessage, ModelBackend } from './ModelBackend.js';

interface OllamaChatResponse {
  model?: string;
  message: {
    role: string;
    content: string;
  };
  done?: boolean;
}

function isOllamaChatResponse(value: unknown): value is OllamaChatResponse {
  if (typeof value !== 'object' || value === null || !('message' in value)) {
    return false;
  }
  const message = value.message;
  return (
    typeof message === 'object' &&
    message !== null &&
    'content' in message &&
    typeof message.content === 'string'
  );
}

export interface OllamaBackendOptions {
  baseUrl?: string;
  model?: string;
}

/**
 * Ollama Backend
 *
 * Talks to a locally hosted model server through its native /api/chat
 * endpoint. Same external contract as the hosted backend; the request asks
 * for `format: "json"` and a single non-streamed reply.
 */
export class OllamaBackend implements ModelBackend {
  private chatUrl: string;
  private model: string;
  private logger = createLogger('OllamaBackend');

  constructor(options: OllamaBackendOptions = {}) {
    const config = OllamaConfig.getConfig();
    const baseUrl = (options.baseUrl ?? config.baseUrl).replace(/\/+$/, '');
    this.chatUrl = `${baseUrl}/api/chat`;
    this.model = options.model ?? config.model;
  }

  async complete(messages: ChatMessage[]): Promise<string> {
    let response: Response;

    try {
      response = await fetch(this.chatUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model: this.model,
          messages,
          stream: false,
          format: 'json',
        }),
      });
    } catch (error) {
      // fetch wraps ECONNREFUSED and friends in a TypeError with a cause
      const cause = error instanceof Error && error.cause instanceof Error ? error.cause : error;
      throw new BackendRequestError(
        `Could not reach Ollama at ${this.chatUrl}: ${cause instanceof Error ? cause.message : String(cause)}`,
        undefined,
        { cause: error }
      );
    }

    if (!response.ok) {
      const detail = await response.text();
      throw new BackendRequestError(
        `Ollama returned status ${response.status}${detail ? `: ${detail.slice(0, 200)}` : ''}`,
        response.status
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch {
      throw new ResponseParseError('Ollama response body is not valid JSON');
    }

    if (!isOllamaChatResponse(body)) {
      throw new ResponseParseError('Ollama response has no message content');
    }

    this.logger.debug('Completion received', {
      model: this.model,
      length: body.message.content.length,
    });
    return body.message.content;
  }

  getBackendName(): string {
    return `ollama:${this.model}`;
  }
}
