// ---------------------------------------------------------------------------
// ATS Scoring Engine: pure and deterministic
// ---------------------------------------------------------------------------

import { EXPECTED_SKILLS, generateRecommendations } from './recommendations';
import {
  SECTION_NAMES,
  type ActionVerbReport,
  type FormattingReport,
  type Interpretations,
  type JdAnalysis,
  type Recommendation,
  type ScoreLevel,
  type ScoreResult,
  type SectionMap,
  type SectionName,
  type SkillSet,
} from './types';

export interface ScoreInput {
  sections: SectionMap;
  skills: SkillSet;
  actionVerbs: ActionVerbReport;
  formatting: FormattingReport;
  /** Present only when a job description was supplied. */
  jd?: JdAnalysis;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const COMPONENT_WEIGHTS = {
  sections: 0.35,
  skills: 0.30,
  formatting: 0.20,
  actionVerbs: 0.15,
} as const;

// Critical sections count three times, the summary twice
const SECTION_WEIGHTS: Record<SectionName, number> = {
  skills: 3,
  experience: 3,
  education: 3,
  summary: 2,
  other: 1,
};

const EXPECTED_ACTION_VERBS = 10;

// JD match = TF-IDF similarity 60% + skill overlap 40%
const JD_SIMILARITY_WEIGHT = 0.6;
const JD_OVERLAP_WEIGHT = 0.4;

interface Band {
  min: number;
  level: ScoreLevel;
  interpretation: string;
}

// Highest threshold first; the last band catches everything down to 0
export const ATS_BANDS: readonly Band[] = [
  { min: 85, level: 'excellent', interpretation: 'Excellent - Your resume is highly ATS-compatible' },
  { min: 70, level: 'good', interpretation: 'Good - Your resume should pass most ATS systems' },
  { min: 50, level: 'fair', interpretation: 'Fair - Consider improvements to increase ATS compatibility' },
  { min: 0, level: 'poor', interpretation: 'Needs Improvement - Significant changes recommended' },
];

export const JD_BANDS: readonly Band[] = [
  { min: 75, level: 'excellent', interpretation: 'Strong Match - Your resume aligns well with the job description' },
  { min: 60, level: 'good', interpretation: 'Good Match - Your resume is relevant to the position' },
  { min: 40, level: 'fair', interpretation: 'Moderate Match - Consider highlighting relevant skills' },
  { min: 0, level: 'poor', interpretation: 'Weak Match - Your resume may not align with this position' },
];

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function clampScore(value: number): number {
  return Math.min(100, Math.max(0, value));
}

export function classify(score: number, bands: readonly Band[]): Band {
  return bands.find((band) => score >= band.min) ?? bands[bands.length - 1];
}

function saturating(count: number, expected: number): number {
  return (Math.min(count, expected) / expected) * 100;
}

export function scoreSectionCompleteness(sections: SectionMap): number {
  let weighted = 0;
  let total = 0;
  for (const name of SECTION_NAMES) {
    weighted += sections[name].score * SECTION_WEIGHTS[name];
    total += SECTION_WEIGHTS[name];
  }
  return weighted / total;
}

export function computeAtsScore(input: Omit<ScoreInput, 'jd'>): number {
  const raw =
    scoreSectionCompleteness(input.sections) * COMPONENT_WEIGHTS.sections +
    saturating(input.skills.skill_count, EXPECTED_SKILLS) * COMPONENT_WEIGHTS.skills +
    input.formatting.score * COMPONENT_WEIGHTS.formatting +
    saturating(input.actionVerbs.verb_count, EXPECTED_ACTION_VERBS) * COMPONENT_WEIGHTS.actionVerbs;
  return round2(clampScore(raw));
}

export function computeJdMatchScore(jd: JdAnalysis): number {
  const jdSkillCount = jd.matching_skills.length + jd.missing_skills.length;
  if (jdSkillCount === 0) return round2(clampScore(jd.tfidf_similarity));
  return round2(clampScore(
    jd.tfidf_similarity * JD_SIMILARITY_WEIGHT + jd.overlap_percentage * JD_OVERLAP_WEIGHT
  ));
}

// ---------------------------------------------------------------------------
// Strengths & summary
// ---------------------------------------------------------------------------

function identifyStrengths(input: ScoreInput, jdMatchScore?: number): string[] {
  const strengths: string[] = [];

  for (const name of SECTION_NAMES) {
    const section = input.sections[name];
    if (section.present && section.score >= 80) {
      strengths.push(`Strong ${section.label} section`);
    }
  }

  if (input.skills.skill_count >= EXPECTED_SKILLS) {
    strengths.push(`Comprehensive skills coverage (${input.skills.skill_count} skills identified)`);
  }

  if (input.actionVerbs.verb_count >= 8) {
    strengths.push(`Excellent use of action verbs (${input.actionVerbs.verb_count} strong verbs)`);
  }

  if (input.formatting.score >= 90) {
    strengths.push('Clean, ATS-friendly formatting');
  }

  if (jdMatchScore !== undefined && jdMatchScore >= 60) {
    strengths.push(`Strong alignment with the job description (${jdMatchScore}%)`);
  }

  return strengths;
}

function lowerFirst(text: string): string {
  return text.charAt(0).toLowerCase() + text.slice(1);
}

function buildSummary(
  atsScore: number,
  interpretations: Interpretations,
  recommendations: Recommendation[],
  strengths: string[],
  jdMatchScore?: number,
): string {
  const jdClause = jdMatchScore !== undefined && interpretations.jd_level
    ? ` and a ${interpretations.jd_level} match (${jdMatchScore}%) with the job description`
    : '';
  const lead = `Your resume scores ${atsScore}/100 (${interpretations.ats_level}) for ATS compatibility${jdClause}`;

  const worstGap = recommendations.find((r) => r.priority === 'high');
  if (worstGap) return `${lead}; priority action: ${lowerFirst(worstGap.message)}.`;
  if (strengths.length > 0) return `${lead}; key strength: ${lowerFirst(strengths[0])}.`;
  if (recommendations.length > 0) return `${lead}; next step: ${lowerFirst(recommendations[0].message)}.`;
  return `${lead}.`;
}

// ---------------------------------------------------------------------------
// Main: Compute Score
// ---------------------------------------------------------------------------

export function computeScore(input: ScoreInput): ScoreResult {
  const atsScore = computeAtsScore(input);
  const atsBand = classify(atsScore, ATS_BANDS);

  const jdMatchScore = input.jd ? computeJdMatchScore(input.jd) : undefined;
  const interpretations: Interpretations = {
    ats_level: atsBand.level,
    ats_interpretation: atsBand.interpretation,
  };
  if (jdMatchScore !== undefined) {
    const jdBand = classify(jdMatchScore, JD_BANDS);
    interpretations.jd_level = jdBand.level;
    interpretations.jd_interpretation = jdBand.interpretation;
  }

  const recommendations = generateRecommendations({
    atsScore,
    sections: input.sections,
    skills: input.skills,
    actionVerbs: input.actionVerbs,
    formatting: input.formatting,
    jd: input.jd,
  });
  const strengths = identifyStrengths(input, jdMatchScore);
  const summary = buildSummary(atsScore, interpretations, recommendations, strengths, jdMatchScore);

  return {
    ats_score: atsScore,
    ...(jdMatchScore !== undefined && { jd_match_score: jdMatchScore }),
    sections: input.sections,
    skills: input.skills,
    ...(input.jd && { jd_analysis: input.jd }),
    action_verbs: input.actionVerbs,
    formatting: input.formatting,
    recommendations,
    strengths,
    summary,
    interpretations,
  };
}
