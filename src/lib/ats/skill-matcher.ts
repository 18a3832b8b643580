// ---------------------------------------------------------------------------
// Skill Matcher: taxonomy lookup over word n-grams
// ---------------------------------------------------------------------------

import type { SkillEntry, SkillTaxonomy } from './knowledge';
import type { JdAnalysis, SkillSet } from './types';

// Punctuation that ends a phrase; n-grams never cross these
const PHRASE_BREAK = /[,;:|()[\]{}\n!?"]|\.(?=\s|$)/;
// Tokens may carry + # . / - inside ("c++", "node.js", "ci/cd", "scikit-learn")
const TOKEN = /[a-z0-9][a-z0-9+#./-]*/g;

export function tokenize(text: string): string[] {
  const tokens = text.toLowerCase().match(TOKEN) || [];
  return tokens.map((t) => t.replace(/[./-]+$/, '')).filter((t) => t.length > 0);
}

function compoundParts(token: string): string[] {
  if (!/[/-]/.test(token)) return [];
  return tokenize(token.replace(/[/-]+/g, ' '));
}

function normalizeTerm(term: string): string {
  return tokenize(term).join(' ');
}

function termsFor(entry: SkillEntry): string[] {
  const terms = entry.aliasOnly ? [...entry.aliases] : [entry.name, ...entry.aliases];
  return terms.map(normalizeTerm).filter((t) => t.length > 0);
}

/**
 * Maps every n-gram (n ≤ maxN) to the position of its first occurrence,
 * counted in tokens from the start of the text.
 */
function indexNgrams(text: string, maxN: number): Map<string, number> {
  const firstSeen = new Map<string, number>();
  let offset = 0;

  for (const phrase of text.toLowerCase().split(PHRASE_BREAK)) {
    const tokens = tokenize(phrase);
    for (let i = 0; i < tokens.length; i++) {
      let gram = '';
      for (let n = 0; n < maxN && i + n < tokens.length; n++) {
        gram = n === 0 ? tokens[i] : `${gram} ${tokens[i + n]}`;
        if (!firstSeen.has(gram)) firstSeen.set(gram, offset + i);
      }
      // "python/sql" also stands for "python" and "sql"
      for (const part of compoundParts(tokens[i])) {
        if (!firstSeen.has(part)) firstSeen.set(part, offset + i);
      }
    }
    offset += tokens.length;
  }
  return firstSeen;
}

/**
 * Finds taxonomy skills mentioned in the text. Results use the taxonomy's
 * canonical casing, deduplicated, in order of first appearance (taxonomy
 * order breaks ties).
 */
export function matchSkills(text: string, taxonomy: SkillTaxonomy): SkillSet {
  const candidates = taxonomy.map((entry, order) => ({ entry, order, terms: termsFor(entry) }));
  const maxN = candidates.reduce(
    (max, c) => Math.max(max, ...c.terms.map((t) => t.split(' ').length)),
    0
  );
  if (maxN === 0 || !text.trim()) {
    return { found_skills: [], skill_count: 0 };
  }

  const ngrams = indexNgrams(text, maxN);
  const hits: { name: string; position: number; order: number }[] = [];

  for (const { entry, order, terms } of candidates) {
    let position = Infinity;
    for (const term of terms) {
      const at = ngrams.get(term);
      if (at !== undefined && at < position) position = at;
    }
    if (position !== Infinity) hits.push({ name: entry.name, position, order });
  }

  hits.sort((a, b) => a.position - b.position || a.order - b.order);
  const found_skills = hits.map((h) => h.name);
  return { found_skills, skill_count: found_skills.length };
}

/**
 * Gap analysis: JD skills the resume lacks, in JD order.
 */
export function findSkillGap(
  resumeSkills: SkillSet,
  jdSkills: SkillSet
): Omit<JdAnalysis, 'tfidf_similarity'> {
  const owned = new Set(resumeSkills.found_skills.map((s) => s.toLowerCase()));
  const matching_skills = jdSkills.found_skills.filter((s) => owned.has(s.toLowerCase()));
  const missing_skills = jdSkills.found_skills.filter((s) => !owned.has(s.toLowerCase()));

  const overlap_percentage = jdSkills.skill_count > 0
    ? Math.round((matching_skills.length / jdSkills.skill_count) * 10000) / 100
    : 0;

  return { missing_skills, matching_skills, overlap_percentage };
}
