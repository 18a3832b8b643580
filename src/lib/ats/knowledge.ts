// ---------------------------------------------------------------------------
// Knowledge base: skill taxonomy, heading lexicon, action verbs, stopwords.
// Built once per process, deep-frozen, and passed into the engine explicitly.
// ---------------------------------------------------------------------------

import { z } from 'zod';
import type { SectionName } from './types';
import { createLogger } from '@/lib/logger';
import skillTaxonomyData from '@/data/skill-taxonomy.json';
import sectionLexiconData from '@/data/section-lexicon.json';
import actionVerbsData from '@/data/action-verbs.json';
import stopwordsData from '@/data/stopwords.json';

export interface SkillEntry {
  /** Canonical casing, reported in results. */
  name: string;
  aliases: readonly string[];
  category: string;
  /** The name is too ambiguous to match on its own ("Go", "R"); only aliases match. */
  aliasOnly: boolean;
}

export type SkillTaxonomy = readonly SkillEntry[];
export type SectionLexicon = Readonly<Record<SectionName, readonly string[]>>;

export interface KnowledgeBase {
  taxonomy: SkillTaxonomy;
  lexicon: SectionLexicon;
  actionVerbs: readonly string[];
  stopwords: ReadonlySet<string>;
}

export interface KnowledgeSources {
  taxonomy?: unknown;
  lexicon?: unknown;
  actionVerbs?: unknown;
  stopwords?: unknown;
}

const log = createLogger('knowledge');

const skillEntrySchema = z.object({
  name: z.string().trim().min(1),
  aliases: z.array(z.string().trim().min(1)).default([]),
  aliasOnly: z.boolean().default(false),
});

const wordListSchema = z.array(z.string());

/**
 * Parses a `{ category: SkillEntry[] }` taxonomy. Invalid entries are
 * dropped one by one; anything that isn't a category map yields an empty
 * taxonomy so matching degrades to "no skills found".
 */
export function parseSkillTaxonomy(raw: unknown): SkillTaxonomy {
  const categories = z.record(z.string(), z.array(z.unknown())).safeParse(raw);
  if (!categories.success) {
    log.warn('Skill taxonomy is malformed; continuing with an empty taxonomy');
    return [];
  }

  const entries: SkillEntry[] = [];
  const seen = new Set<string>();
  for (const [category, items] of Object.entries(categories.data)) {
    for (const item of items) {
      const parsed = skillEntrySchema.safeParse(item);
      if (!parsed.success) {
        log.warn(`Dropping malformed skill entry in "${category}"`);
        continue;
      }
      const key = parsed.data.name.toLowerCase();
      if (seen.has(key)) continue;
      seen.add(key);
      entries.push({
        name: parsed.data.name,
        aliases: parsed.data.aliases.map((alias) => alias.toLowerCase()),
        category,
        aliasOnly: parsed.data.aliasOnly,
      });
    }
  }
  return entries;
}

export function parseSectionLexicon(raw: unknown): SectionLexicon {
  const result = z.record(z.string(), wordListSchema).safeParse(raw);
  const source: Record<string, string[]> = result.success ? result.data : {};
  if (!result.success) {
    log.warn('Section lexicon is malformed; no headings will be recognized');
  }

  const phrasesFor = (name: SectionName) =>
    (source[name] ?? []).map((p) => p.trim().toLowerCase()).filter((p) => p.length > 0);

  return {
    summary: phrasesFor('summary'),
    skills: phrasesFor('skills'),
    experience: phrasesFor('experience'),
    education: phrasesFor('education'),
    other: phrasesFor('other'),
  };
}

function parseWordList(raw: unknown, label: string): string[] {
  const result = wordListSchema.safeParse(raw);
  if (!result.success) {
    log.warn(`${label} list is malformed; using an empty list`);
    return [];
  }
  return result.data.map((w) => w.trim().toLowerCase()).filter((w) => w.length > 0);
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

export function buildKnowledgeBase(sources: KnowledgeSources = {}): KnowledgeBase {
  const knowledge: KnowledgeBase = {
    taxonomy: parseSkillTaxonomy(sources.taxonomy ?? skillTaxonomyData),
    lexicon: parseSectionLexicon(sources.lexicon ?? sectionLexiconData),
    actionVerbs: parseWordList(sources.actionVerbs ?? actionVerbsData, 'Action verb'),
    stopwords: new Set(parseWordList(sources.stopwords ?? stopwordsData, 'Stopword')),
  };
  return deepFreeze(knowledge);
}

let defaultKnowledge: KnowledgeBase | null = null;

export function getKnowledgeBase(): KnowledgeBase {
  if (!defaultKnowledge) {
    defaultKnowledge = buildKnowledgeBase();
    log.info(`Loaded ${defaultKnowledge.taxonomy.length} skills and ${defaultKnowledge.actionVerbs.length} action verbs`);
  }
  return defaultKnowledge;
}
