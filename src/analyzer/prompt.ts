/**
 * Geo-Compliance Screening Prompt
 *
 * Policy: flag a feature only when it exists to satisfy an explicit legal
 * mandate of a specific jurisdiction.
 *
 * Template variables to replace:
 * - {{glossary}}
 * - {{featureDescription}}
 */

export const SYSTEM_INSTRUCTION = 'You are an expert compliance analyst AI.';

export const COMPLIANCE_PROMPT = `You are an expert compliance analyst AI. Your task is to determine if a feature
requires geo-specific compliance logic based on its description.

A feature requires geo-specific compliance if it is being implemented to
comply with a specific law, regulation, or legal mandate in a particular
geographic region (e.g., a country, state, or union like the EU).

Do NOT flag features for the following reasons:
- Business-driven decisions, such as market testing, phased rollouts, or A/B tests in specific regions.
- General safety or policy features that apply globally, even if they mention a region for context.

To help you understand the feature description, here is a glossary of internal terms that may be used:
---
<GLOSSARY>
{{glossary}}
</GLOSSARY>
---

Now, analyze the following feature description:
---
<FEATURE_DESCRIPTION>
{{featureDescription}}
</FEATURE_DESCRIPTION>
---

Provide your analysis as a JSON object with the following three keys:
1. "is_geo_compliance_needed": boolean (true if it requires geo-specific compliance, false otherwise)
2. "reasoning": string (a clear, concise explanation for your decision)
3. "relevant_regulation": string (the name of the law or regulation if mentioned, otherwise "N/A")`;

export interface PromptVariables {
  glossary: string;
  featureDescription: string;
}

/**
 * Fill the template in a single pass, so placeholder-like text inside the
 * glossary or the description is left as is
 */
export function buildCompliancePrompt(variables: PromptVariables): string {
  return COMPLIANCE_PROMPT.replace(/\{\{(glossary|featureDescription)\}\}/g, (_match, key: keyof PromptVariables) =>
    variables[key]
  );
}
