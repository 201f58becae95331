/**
 * Prompt builder for AI code review
 */

import { ISSUE_CATEGORIES, type Language } from '@critique/core';

export const SYSTEM_PROMPT =
  'You are an expert code reviewer. Validate static-analysis findings against the code, ' +
  'find problems static analysis cannot see, and respond ONLY with valid JSON.';

const RESPONSE_FORMAT = `{
  "validated_issues": [
    { "line": <line_number>, "type": "<category>", "message": "<explanation>", "recommendation": "<how_to_fix>" }
  ],
  "false_positives": [
    { "line": <line_number>, "type": "<category>", "reason": "<why_this_is_not_a_problem>" }
  ],
  "new_findings": [
    { "line": <line_number>, "severity": "critical|medium|low", "type": "<category_or_short_label>", "message": "<explanation>", "recommendation": "<how_to_fix>" }
  ],
  "summary": "<overall_assessment>",
  "score": <0-100>,
  "strengths": ["<what_the_code_does_well>"],
  "key_improvements": ["<prioritized_improvement>"]
}`;

/**
 * Frame the pre-analysis context and the code, and ask for the JSON review.
 */
export function buildReviewPrompt(context: string, source: string, language: Language): string {
  const categories = ISSUE_CATEGORIES.filter(c => c !== 'LLM_FINDING').join(', ');

  return `Static pre-analysis has already run over the file below. Its findings are a head start, not ground truth.

${context}
---

Review the code and:

1. **Validate pre-identified issues**: list the true positives under \`validated_issues\` and the false positives under \`false_positives\`. Reference each one by its line and category.
2. **Find new issues** static analysis cannot detect: logic errors, race conditions, security flaws beyond simple patterns, error handling gaps, performance problems.
3. **Recommend** specific, actionable fixes.

Known categories: ${categories}. Use one of them as \`type\` when it fits; otherwise give a short label.

**Code to review:**
\`\`\`${language}
${source}
\`\`\`

**Respond with a complete JSON object in exactly this format, no other text:**

${RESPONSE_FORMAT}

Close every bracket and brace. If space is limited, keep the most severe issues and shorten messages.`;
}
