/**
 * @fileOverview: Intent classification and abbreviation prompts
 * @module: AbbreviationPrompts
 * @keyFunctions:
 *   - createIntentUserPrompt: Request wrapped for the two-way intent classifier
 *   - createAbbreviationSystemPrompt: Abbreviation designer role with the related dictionary entries
 *   - createAbbreviationUserPrompt: The term to abbreviate
 */

export const INTENT_SYSTEM_PROMPT = `Classify the user's request into exactly one of these intents:
1. Look up an internal term, abbreviation or naming rule
2. Create a new abbreviation for a term
Reply with the number only.`;

export function createIntentUserPrompt(request: string): string {
  return `Request: "${request}"`;
}

export function createAbbreviationSystemPrompt(relatedEntries: string): string {
  return `You design short, standardized abbreviations for business terms used in identifiers and database column names.

**Always follow these instructions:**
1. Propose one abbreviation of 2 to 6 uppercase letters and explain how it was formed in one sentence.
2. It must not collide with an abbreviation already registered in the related dictionary entries below, unless that entry means the same term.
3. Reuse the registered abbreviations of the words that make up the term (for example ORD for Order, HIST for History) and join them with an underscore.
4. Give the English name of the term next to the abbreviation.

**Related dictionary entries:**
---
${relatedEntries || 'None'}
---`;
}

export function createAbbreviationUserPrompt(term: string): string {
  return `Term: ${term}`;
}
