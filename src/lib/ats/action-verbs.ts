import type { ActionVerbReport } from './types';

/**
 * Strong action verbs used anywhere in the text, reported in the order of
 * the verb list.
 */
export function detectActionVerbs(text: string, verbs: readonly string[]): ActionVerbReport {
  const words = new Set(text.toLowerCase().split(/[^a-z]+/).filter(Boolean));
  const found_verbs = verbs.filter((verb) => words.has(verb));
  return { found_verbs, verb_count: found_verbs.length };
}
