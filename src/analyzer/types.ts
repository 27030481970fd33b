/**
 * Analyzer Types
 */

/**
 * Outcome of screening one feature description.
 * `is_geo_compliance_needed` is null when the analysis was skipped or failed.
 */
export interface AnalysisResult {
  is_geo_compliance_needed: boolean | null;
  reasoning: string;
  relevant_regulation: string;
}

/**
 * Column names appended to every output row, in output order
 */
export const ANALYSIS_FIELDS = [
  'is_geo_compliance_needed',
  'reasoning',
  'relevant_regulation',
] as const satisfies ReadonlyArray<keyof AnalysisResult>;

/**
 * Capability consumed by the batch runner.
 * Implementations must resolve (never reject) for a non-empty description.
 */
export interface FeatureClassifier {
  classify(description: string): Promise<AnalysisResult>;
}

export const NOT_APPLICABLE = 'N/A';

export function failedResult(reasoning: string): AnalysisResult {
  return {
    is_geo_compliance_needed: null,
    reasoning,
    relevant_regulation: NOT_APPLICABLE,
  };
}
