import { AnalysisResult, NOT_APPLICABLE } from '../analyzer/types.js';
import { ResponseParseError } from './errors.js';

/**
 * Model Reply Validation
 *
 * Turns raw model output into an AnalysisResult. Only presence and type
 * checks on the three result keys are performed.
 */

const MAX_CONTENT_LENGTH = 100000; // 100KB is far beyond any valid reply

/**
 * Extract and parse JSON content from model response
 * Handles replies wrapped in markdown code blocks or preceded by
 * <think>...</think> reasoning (local reasoning models emit these)
 */
export function extractJsonFromResponse(content: string): unknown {
  const cleaned = content.replace(/<think>[\s\S]*?<\/think>/g, '').trim();

  // The limit applies to the answer, not to the reasoning that preceded it
  if (cleaned.length > MAX_CONTENT_LENGTH) {
    throw new ResponseParseError(
      `Response content too large (${cleaned.length} chars, max ${MAX_CONTENT_LENGTH})`,
      cleaned.slice(0, 500)
    );
  }

  // Try direct JSON parse first
  try {
    return JSON.parse(cleaned);
  } catch {
    // Try to extract JSON from markdown code blocks
    const jsonBlockMatch = cleaned.match(/```(?:json)?\s*([\s\S]*?)\s*```/);
    if (jsonBlockMatch) {
      try {
        return JSON.parse(jsonBlockMatch[1]);
      } catch {
        // Fall through to the outermost-braces attempt
      }
    }

    const start = cleaned.indexOf('{');
    const end = cleaned.lastIndexOf('}');
    if (start !== -1 && end > start) {
      try {
        return JSON.parse(cleaned.slice(start, end + 1));
      } catch {
        // Fall through
      }
    }

    throw new ResponseParseError('Could not extract valid JSON from response content', cleaned.slice(0, 500));
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Check a parsed reply for the expected keys and keep exactly those.
 *
 * `relevant_regulation` falls back to "N/A" when absent or empty.
 */
export function validateAnalysisResult(value: unknown): AnalysisResult {
  if (!isRecord(value)) {
    throw new ResponseParseError('Expected a JSON object');
  }

  const flag = value.is_geo_compliance_needed;
  if (typeof flag !== 'boolean') {
    throw new ResponseParseError("Missing or non-boolean 'is_geo_compliance_needed'");
  }

  const reasoning = value.reasoning;
  if (typeof reasoning !== 'string') {
    throw new ResponseParseError("Missing or non-string 'reasoning'");
  }

  const regulation = value.relevant_regulation;
  if (regulation !== undefined && regulation !== null && typeof regulation !== 'string') {
    throw new ResponseParseError("Non-string 'relevant_regulation'");
  }

  return {
    is_geo_compliance_needed: flag,
    reasoning,
    relevant_regulation: regulation ? regulation : NOT_APPLICABLE,
  };
}

/**
 * Parse raw model text into an AnalysisResult
 */
export function parseAnalysisReply(content: string): AnalysisResult {
  return validateAnalysisResult(extractJsonFromResponse(content));
}
