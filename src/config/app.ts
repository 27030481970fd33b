import dotenv from 'dotenv';
import { BackendConfigError } from '../utils/errors.js';

dotenv.config();

/**
 * Backend type
 */
export type BackendType = 'openai' | 'ollama';

export const BACKEND_TYPES: readonly BackendType[] = ['openai', 'ollama'];

function isBackendType(value: string): value is BackendType {
  return (BACKEND_TYPES as readonly string[]).includes(value);
}

/**
 * Application Configuration
 *
 * Run-wide settings that are not tied to one backend.
 */
export class AppConfig {
  static readonly DEFAULT_INPUT_PATH = 'sample_data.csv';
  static readonly DEFAULT_OUTPUT_PATH = 'analysis_results.csv';
  static readonly DEFAULT_GLOSSARY_PATH = 'data_set.csv';

  /**
   * Backend selected by COMPLIANCE_BACKEND (defaults to 'openai')
   */
  static getBackendType(): BackendType {
    const value = (process.env.COMPLIANCE_BACKEND || 'openai').trim().toLowerCase();

    if (!isBackendType(value)) {
      throw new BackendConfigError(
        `Unknown backend type: ${value}. Valid options: ${BACKEND_TYPES.join(', ')}`
      );
    }

    return value;
  }

  static getGlossaryPath(): string {
    return process.env.GLOSSARY_PATH || this.DEFAULT_GLOSSARY_PATH;
  }
}
