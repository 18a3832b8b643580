import {
  SECTION_LABELS,
  SECTION_NAMES,
  type Section,
  type SectionMap,
  type SectionName,
} from '@/lib/ats/types';
import type { SectionLexicon } from '@/lib/ats/knowledge';

export interface SegmentedResume {
  sections: SectionMap;
  /** Lines before the first recognized heading (usually name and contact). */
  header: string;
}

interface HeadingEntry {
  phrase: string;
  section: SectionName;
}

export interface HeadingMatch {
  section: SectionName;
  /** Text after "Heading:" on the same line. */
  inline: string;
}

type Region = SectionName | 'header';

interface SegmenterState {
  current: Region;
  buffers: Record<Region, string[]>;
  seen: Set<SectionName>;
  /** True at the start of the text and after a blank line. */
  atBlockStart: boolean;
}

// Shorter than this and a section counts as empty even if its heading exists
const MIN_SECTION_CHARS = 10;

// Longest phrase first, so "volunteer experience" wins over "experience"
export function buildHeadingIndex(lexicon: SectionLexicon): HeadingEntry[] {
  const entries: HeadingEntry[] = [];
  for (const section of SECTION_NAMES) {
    for (const phrase of lexicon[section]) {
      entries.push({ phrase, section });
    }
  }
  return entries.sort((a, b) => b.phrase.length - a.phrase.length);
}

/**
 * Strips heading decoration: markdown markers (`## Skills`, `**Skills**`),
 * rule characters (`== Skills ==`) and surrounding whitespace.
 */
function cleanHeadingLine(line: string): string {
  return line
    .trim()
    .toLowerCase()
    .replace(/^#{1,6}\s+/, '')
    .replace(/\*\*/g, '')
    .replace(/^[=_~|\s]+|[=_~|\s]+$/g, '')
    .trim();
}

export function matchHeading(line: string, index: HeadingEntry[]): HeadingMatch | null {
  const cleaned = cleanHeadingLine(line);
  if (!cleaned) return null;

  for (const { phrase, section } of index) {
    if (cleaned === phrase || cleaned === `${phrase}:`) {
      return { section, inline: '' };
    }
    if (cleaned.startsWith(`${phrase}:`)) {
      return { section, inline: cleaned.slice(phrase.length + 1).trim() };
    }
  }
  return null;
}

function createState(): SegmenterState {
  return {
    current: 'header',
    buffers: { header: [], summary: [], skills: [], experience: [], education: [], other: [] },
    seen: new Set(),
    atBlockStart: true,
  };
}

function feedLine(state: SegmenterState, line: string, index: HeadingEntry[]): void {
  const heading = matchHeading(line, index);
  const atBlockStart = state.atBlockStart;
  state.atBlockStart = line === '';

  // Inside an open block "Languages: Python, Java" is a sub-label, not a new section
  const opensSection =
    heading !== null && (heading.inline === '' || state.current === 'header' || atBlockStart);
  if (heading && opensSection) {
    state.current = heading.section;
    state.seen.add(heading.section);
    if (heading.inline) state.buffers[heading.section].push(heading.inline);
    return;
  }
  state.buffers[state.current].push(line);
}

// ---------------------------------------------------------------------------
// Per-section observations
// ---------------------------------------------------------------------------

interface Assessment {
  score: number;
  observation: string;
  flagged: boolean;
}

function countWords(text: string): number {
  return text.split(/\s+/).filter((w) => /[a-z0-9]/i.test(w)).length;
}

function countSkillItems(content: string): number {
  return content
    .split(/[,;|\n]/)
    .map((item) => item.replace(/^-\s*/, '').trim())
    .filter((item) => item.length > 0).length;
}

function assessSection(name: SectionName, content: string): Assessment {
  const words = countWords(content);
  const lines = content.split('\n').filter((l) => l.trim());
  const bulletLines = lines.filter((l) => l.startsWith('- ')).length;

  switch (name) {
    case 'skills': {
      const items = countSkillItems(content);
      if (items >= 10) return { score: 90, observation: `Strong list of skills (${items} items)`, flagged: false };
      if (items >= 5) return { score: 70, observation: `Good skills coverage (${items} items)`, flagged: false };
      return { score: 50, observation: `Limited skills listed (${items} items)`, flagged: true };
    }
    case 'experience':
      if (words < 50) return { score: 50, observation: 'Brief experience description', flagged: true };
      if (lines.length >= 4 && bulletLines === 0) {
        return { score: 60, observation: 'Experience is written as paragraphs; no bullet points detected', flagged: true };
      }
      if (words >= 100) return { score: 90, observation: 'Well-detailed experience', flagged: false };
      return { score: 70, observation: 'Adequate experience details', flagged: false };
    case 'education':
      if (words >= 20) return { score: 85, observation: 'Complete education details', flagged: false };
      return { score: 60, observation: 'Basic education info', flagged: false };
    case 'summary':
      if (words < 15) return { score: 55, observation: 'Summary is very short', flagged: true };
      if (words > 120) return { score: 60, observation: 'Summary is long; keep it to a few sentences', flagged: true };
      return { score: 80, observation: 'Concise professional summary', flagged: false };
    case 'other':
      if (words >= 50) return { score: 85, observation: 'Detailed supporting sections such as projects or certifications', flagged: false };
      return { score: 70, observation: 'Supporting sections present', flagged: false };
  }
}

function absentSection(name: SectionName, rawText: string, headingSeen: boolean): Section {
  const label = SECTION_LABELS[name];
  return {
    name,
    label,
    present: false,
    raw_text: rawText,
    observation: headingSeen ? `${label} heading found but the section is empty` : `No ${label} section detected`,
    score: 0,
    flagged: false,
    word_count: 0,
  };
}

function finish(state: SegmenterState): SegmentedResume {
  const header = state.buffers.header.join('\n').trim();

  // No headings at all: nothing is attributable, keep the whole text under Other
  if (state.seen.size === 0) {
    return {
      header,
      sections: {
        summary: absentSection('summary', '', false),
        skills: absentSection('skills', '', false),
        experience: absentSection('experience', '', false),
        education: absentSection('education', '', false),
        other: absentSection('other', header, false),
      },
    };
  }

  const build = (name: SectionName): Section => {
    const content = state.buffers[name].join('\n').trim();
    const headingSeen = state.seen.has(name);
    if (!headingSeen || content.length < MIN_SECTION_CHARS) {
      return absentSection(name, content, headingSeen);
    }
    const { score, observation, flagged } = assessSection(name, content);
    return {
      name,
      label: SECTION_LABELS[name],
      present: true,
      raw_text: content,
      observation,
      score,
      flagged,
      word_count: countWords(content),
    };
  };

  return {
    header,
    sections: {
      summary: build('summary'),
      skills: build('skills'),
      experience: build('experience'),
      education: build('education'),
      other: build('other'),
    },
  };
}

/**
 * Splits normalized resume text into the canonical sections. Never throws;
 * a document without recognizable headings comes back with every section
 * absent.
 */
export function segmentResume(text: string, lexicon: SectionLexicon): SegmentedResume {
  const index = buildHeadingIndex(lexicon);
  const state = createState();

  for (const line of text.split('\n')) {
    feedLine(state, line.trim(), index);
  }

  return finish(state);
}
