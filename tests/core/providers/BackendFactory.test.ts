import { describe, it, expect, vi, afterEach } from 'vitest';
import { BackendFactory } from '../../../src/core/providers/BackendFactory.js';
import { OllamaBackend } from '../../../src/core/providers/OllamaBackend.js';
import { OpenAIBackend } from '../../../src/core/providers/OpenAIBackend.js';
import { OpenAIConfig } from '../../../src/config/openai.js';
import { BackendConfigError } from '../../../src/utils/errors.js';

describe('BackendFactory', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    OpenAIConfig.resetClient();
  });

  it('creates the local backend', () => {
    expect(BackendFactory.createBackend('ollama')).toBeInstanceOf(OllamaBackend);
  });

  it('creates the hosted backend when an API key is set', () => {
    vi.stubEnv('OPENAI_API_KEY', 'test-key');
    vi.stubEnv('OPENAI_MODEL', 'test-model');

    const backend = BackendFactory.createBackend('openai');

    expect(backend).toBeInstanceOf(OpenAIBackend);
    expect(backend.getBackendName()).toBe('openai:test-model');
  });

  it('refuses the hosted backend without an API key', () => {
    vi.stubEnv('OPENAI_API_KEY', '');

    expect(() => BackendFactory.createBackend('openai')).toThrow(BackendConfigError);
  });

  it('selects the backend from COMPLIANCE_BACKEND', () => {
    vi.stubEnv('COMPLIANCE_BACKEND', 'Ollama');

    expect(BackendFactory.getDefaultBackend()).toBe('ollama');
    expect(BackendFactory.createBackend()).toBeInstanceOf(OllamaBackend);
  });

  it('rejects unknown backend types', () => {
    vi.stubEnv('COMPLIANCE_BACKEND', 'mystery');

    expect(() => BackendFactory.createBackend()).toThrow('Unknown backend type: mystery. Valid options: openai, ollama');
  });
});
