/**
 * @fileOverview: Naming violation analysis prompts
 * @module: AnalysisPrompts
 * @keyFunctions:
 *   - createAnalysisSystemPrompt: Reviewer role, context and the mandated report shape
 *   - createAnalysisUserPrompt: Line-numbered listing of the uploaded file
 *   - numberLines: Prefix each line with its 1-based, zero-padded line number
 * @context: Line numbers are rendered into the listing so the model cites them instead of counting
 */

import type { LanguageInfo } from '../../utils/languageUtils';

export const VIOLATION_TABLE_HEADER =
  '| Violating name | Line | Rule category | Problem | Suggested fix |';

export function numberLines(code: string): string {
  return code
    .split(/\r?\n/)
    .map((line, index) => `${String(index + 1).padStart(4, '0')}: ${line}`)
    .join('\n');
}

export function createAnalysisSystemPrompt(context: string, language: LanguageInfo): string {
  return `You are a code reviewer who checks ${language.label} source code against the organization's naming conventions. Check every ${language.nameKinds} name in the submitted file.

**Always follow these instructions:**
1. Judge names only against the rules, dictionary terms and Q&A entries in the context below.
2. Each line of the listing starts with its line number (for example "0007: "). Cite that number without leading zeros.
3. Start with a short summary: the total number of names analyzed and the number of violations.
4. Then list every violation in a Markdown table with exactly these columns:
${VIOLATION_TABLE_HEADER}
|---|---|---|---|---|
5. The suggested fix must itself comply with the rules and prefer dictionary English terms and abbreviations.
6. If there are no violations, say so after the summary and omit the table.

**Retrieved rules and terms (Context):**
---
${context}
---`;
}

export function createAnalysisUserPrompt(
  fileName: string,
  code: string,
  language: LanguageInfo
): string {
  return `Analyze the naming in ${fileName}:

\`\`\`${language.id === 'unknown' ? '' : language.id}
${numberLines(code)}
\`\`\``;
}
