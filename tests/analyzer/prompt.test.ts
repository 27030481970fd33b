import { describe, it, expect } from 'vitest';
import { buildCompliancePrompt, COMPLIANCE_PROMPT } from '../../src/analyzer/prompt.js';

describe('buildCompliancePrompt', () => {
  it('embeds the glossary and the description', () => {
    const prompt = buildCompliancePrompt({
      glossary: '- GH: Geo-handler',
      featureDescription: 'Block logins for minors in Utah',
    });

    expect(prompt).toContain('<GLOSSARY>\n- GH: Geo-handler\n</GLOSSARY>');
    expect(prompt).toContain('<FEATURE_DESCRIPTION>\nBlock logins for minors in Utah\n</FEATURE_DESCRIPTION>');
    expect(prompt).not.toContain('{{');
  });

  it('leaves placeholder-like text in the inputs untouched', () => {
    const prompt = buildCompliancePrompt({
      glossary: '',
      featureDescription: 'Mentions {{glossary}} and $& literally',
    });

    expect(prompt).toContain('<FEATURE_DESCRIPTION>\nMentions {{glossary}} and $& literally\n</FEATURE_DESCRIPTION>');
    expect(prompt).toContain('<GLOSSARY>\n\n</GLOSSARY>');
  });

  it('asks for the three result keys', () => {
    expect(COMPLIANCE_PROMPT).toContain('"is_geo_compliance_needed": boolean');
    expect(COMPLIANCE_PROMPT).toContain('"reasoning": string');
    expect(COMPLIANCE_PROMPT).toContain('"relevant_regulation": string');
  });
});
