import dotenv from 'dotenv';

dotenv.config();

/**
 * Ollama Configuration
 *
 * Locally hosted model server (`ollama serve`). No credentials are needed;
 * the model has to be pulled beforehand (`ollama pull deepseek-r1`).
 */
export class OllamaConfig {
  static readonly DEFAULT_BASE_URL = 'http://localhost:11434';
  static readonly DEFAULT_MODEL = 'deepseek-r1';

  static getConfig() {
    const baseUrl = (process.env.OLLAMA_BASE_URL || this.DEFAULT_BASE_URL).replace(/\/+$/, '');
    const model = process.env.OLLAMA_MODEL || this.DEFAULT_MODEL;

    return {
      baseUrl,
      model,
    };
  }
}
