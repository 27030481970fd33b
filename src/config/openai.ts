import OpenAI from 'openai';
import dotenv from 'dotenv';
import { createLogger } from '../utils/logger.js';
import { BackendConfigError } from '../utils/errors.js';

dotenv.config();

const logger = createLogger('OpenAIConfig');

/**
 * OpenAI Configuration
 *
 * Manages connection to the hosted OpenAI chat completions API.
 */
export class OpenAIConfig {
  private static client: OpenAI | null = null;

  static readonly DEFAULT_MODEL = 'gpt-4-turbo';

  /**
   * Get required environment variables
   */
  static getConfig() {
    const apiKey = process.env.OPENAI_API_KEY;
    const organization = process.env.OPENAI_ORG_ID; // Optional
    const model = process.env.OPENAI_MODEL || this.DEFAULT_MODEL;

    if (!apiKey) {
      throw new BackendConfigError(
        'Missing required OpenAI configuration. ' +
          'Please ensure OPENAI_API_KEY is set in .env'
      );
    }

    return {
      apiKey,
      organization,
      model,
    };
  }

  /**
   * Reset cached client (useful when environment variables change)
   */
  static resetClient(): void {
    dotenv.config({ override: true });
    this.client = null;
  }

  /**
   * Get or create OpenAI client
   *
   * The SDK's own retries are disabled: every row gets exactly one attempt.
   */
  static getClient(): OpenAI {
    if (!this.client) {
      const config = this.getConfig();

      this.client = new OpenAI({
        apiKey: config.apiKey,
        organization: config.organization,
        maxRetries: 0,
      });

      logger.info('OpenAI client initialized', {
        model: config.model,
        organization: config.organization,
      });
    }

    return this.client;
  }

  static getModel(): string {
    return process.env.OPENAI_MODEL || this.DEFAULT_MODEL;
  }
}
