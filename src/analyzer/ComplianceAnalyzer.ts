import { BackendFactory } from '../core/providers/BackendFactory.js';
import { ModelBackend } from '../core/providers/ModelBackend.js';
import { BackendType } from '../config/app.js';
import { GlossaryLoader } from '../glossary/GlossaryLoader.js';
import { BackendRequestError, ResponseParseError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { parseAnalysisReply } from '../utils/validators.js';
import { buildCompliancePrompt, SYSTEM_INSTRUCTION } from './prompt.js';
import { AnalysisResult, FeatureClassifier, failedResult } from './types.js';

const logger = createLogger('ComplianceAnalyzer');

/**
 * Compliance Analyzer
 *
 * Asks a model backend whether a feature description implements
 * geography-specific legal compliance. One round trip per call, no retries.
 * Every failure is folded into a null-flagged result.
 */
export class ComplianceAnalyzer implements FeatureClassifier {
  private readonly backend: ModelBackend | null;
  private readonly glossary: GlossaryLoader;
  private readonly initError: string | null;

  /**
   * @param backend Null when the backend could not be set up; `initError` says why
   */
  constructor(backend: ModelBackend | null, glossary: GlossaryLoader, initError: string | null = null) {
    this.backend = backend;
    this.glossary = glossary;
    this.initError = backend ? null : initError ?? 'no backend configured';
  }

  /**
   * Build an analyzer for the configured backend.
   *
   * A backend that cannot be created is reported here, once; every later
   * classify() call then short-circuits to a null result.
   */
  static create(glossary: GlossaryLoader, backendType?: BackendType): ComplianceAnalyzer {
    try {
      const backend = BackendFactory.createBackend(backendType);
      logger.info(`Analyzer using backend ${backend.getBackendName()}`);
      return new ComplianceAnalyzer(backend, glossary);
    } catch (error) {
      logger.error('Model backend could not be initialized', { error: errorMessage(error) });
      return new ComplianceAnalyzer(null, glossary, errorMessage(error));
    }
  }

  getBackendName(): string | null {
    return this.backend ? this.backend.getBackendName() : null;
  }

  async classify(description: string): Promise<AnalysisResult> {
    if (!this.backend) {
      return failedResult(`Model backend is not initialized: ${this.initError}`);
    }

    const glossaryText = await this.glossary.getText();
    const prompt = buildCompliancePrompt({
      glossary: glossaryText,
      featureDescription: description,
    });

    try {
      const content = await this.backend.complete([
        { role: 'system', content: SYSTEM_INSTRUCTION },
        { role: 'user', content: prompt },
      ]);
      return parseAnalysisReply(content);
    } catch (error) {
      const reasoning = describeFailure(error);
      logger.warn('Analysis failed', {
        backend: this.backend.getBackendName(),
        reasoning,
        ...(error instanceof ResponseParseError && error.content !== undefined ? { reply: error.content } : {}),
      });
      return failedResult(reasoning);
    }
  }
}

function describeFailure(error: unknown): string {
  if (error instanceof BackendRequestError) {
    return `Backend request failed: ${error.message}`;
  }
  if (error instanceof ResponseParseError) {
    return `Malformed model response: ${error.message}`;
  }
  return `An error occurred: ${errorMessage(error)}`;
}
