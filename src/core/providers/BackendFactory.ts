import { AppConfig, BackendType } from '../../config/app.js';
import { BackendConfigError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';
import { ModelBackend } from './ModelBackend.js';
import { OllamaBackend } from './OllamaBackend.js';
import { OpenAIBackend } from './OpenAIBackend.js';

const logger = createLogger('BackendFactory');

/**
 * Backend Factory
 *
 * Creates the model backend selected by configuration
 */
export class BackendFactory {
  /**
   * Get default backend from COMPLIANCE_BACKEND
   */
  static getDefaultBackend(): BackendType {
    return AppConfig.getBackendType();
  }

  /**
   * Create backend instance
   *
   * @throws BackendConfigError when the backend cannot be configured
   */
  static createBackend(backendType: BackendType = this.getDefaultBackend()): ModelBackend {
    switch (backendType) {
      case 'openai':
        logger.info('Using hosted OpenAI backend');
        return new OpenAIBackend();

      case 'ollama':
        logger.info('Using local Ollama backend');
        logger.info('Make sure Ollama is running locally (ollama serve) and the model is pulled');
        return new OllamaBackend();

      default: {
        const unknown: never = backendType;
        throw new BackendConfigError(`Unknown backend type: ${String(unknown)}`);
      }
    }
  }
}
