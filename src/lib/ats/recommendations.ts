// ---------------------------------------------------------------------------
// Recommendation Engine: declarative rule table, evaluated in table order,
// then stable-sorted by priority (high → medium → low)
// ---------------------------------------------------------------------------

import {
  SECTION_LABELS,
  SECTION_NAMES,
  type ActionVerbReport,
  type FormattingReport,
  type JdAnalysis,
  type Priority,
  type Recommendation,
  type RecommendationCategory,
  type SectionMap,
  type SectionName,
  type SkillSet,
} from './types';

export interface RuleContext {
  atsScore: number;
  sections: SectionMap;
  skills: SkillSet;
  actionVerbs: ActionVerbReport;
  formatting: FormattingReport;
  jd?: JdAnalysis;
}

export type RuleId =
  | 'missing_critical_section'
  | 'missing_jd_skills'
  | 'low_skill_count'
  | 'missing_summary'
  | 'low_jd_overlap'
  | 'moderate_skill_count'
  | 'weak_section'
  | 'few_action_verbs'
  | 'some_action_verbs'
  | 'formatting_issue'
  | 'missing_supporting_section'
  | 'general_layout';

export interface RecommendationRule {
  id: RuleId;
  priority: Priority;
  category: RecommendationCategory;
  /** One message per unmet condition; empty when the rule doesn't fire. */
  evaluate: (ctx: RuleContext) => string[];
}

export const CRITICAL_SECTIONS: readonly SectionName[] = ['skills', 'experience', 'education'];

export const MIN_SKILLS = 5;
export const EXPECTED_SKILLS = 10;
export const MAX_LISTED_MISSING_SKILLS = 5;

const WEAK_SECTION_ADVICE: Record<SectionName, string> = {
  summary: 'Rework your Summary into two to four focused sentences about your experience and goals',
  skills: 'List more specific skills and technologies in your Skills section',
  experience: 'Expand your Experience section with bullet points, concrete accomplishments and metrics',
  education: 'Add degree, institution and dates to your Education section',
  other: 'Add detail to your supporting sections such as projects and certifications',
};

function withArticle(label: string): string {
  return /^[aeiou]/i.test(label) ? `an ${label}` : `a ${label}`;
}

export const PRIORITY_RANK: Record<Priority, number> = { high: 0, medium: 1, low: 2 };

export const RECOMMENDATION_RULES: readonly RecommendationRule[] = [
  {
    id: 'missing_critical_section',
    priority: 'high',
    category: 'missing_section',
    evaluate: ({ sections }) =>
      CRITICAL_SECTIONS.filter((name) => !sections[name].present).map(
        (name) => `Add ${withArticle(SECTION_LABELS[name])} section - this is essential for ATS parsing`
      ),
  },
  {
    id: 'missing_jd_skills',
    priority: 'high',
    category: 'jd_match',
    evaluate: ({ jd }) =>
      jd && jd.missing_skills.length > 0
        ? [`Add these job-relevant skills if you have them: ${jd.missing_skills.slice(0, MAX_LISTED_MISSING_SKILLS).join(', ')}`]
        : [],
  },
  {
    id: 'low_skill_count',
    priority: 'high',
    category: 'skills',
    evaluate: ({ skills }) =>
      skills.skill_count < MIN_SKILLS
        ? ['Add more technical skills - aim for at least 8-10 relevant skills']
        : [],
  },
  {
    id: 'missing_summary',
    priority: 'medium',
    category: 'missing_section',
    evaluate: ({ sections }) =>
      sections.summary.present ? [] : ['Consider adding a Summary section to strengthen your resume'],
  },
  {
    id: 'low_jd_overlap',
    priority: 'medium',
    category: 'jd_match',
    evaluate: ({ jd }) => {
      if (!jd) return [];
      const jdSkillCount = jd.matching_skills.length + jd.missing_skills.length;
      return jdSkillCount > 0 && jd.overlap_percentage < 40
        ? ['Your resume has limited overlap with the job description - tailor it to match key requirements']
        : [];
    },
  },
  {
    id: 'moderate_skill_count',
    priority: 'medium',
    category: 'skills',
    evaluate: ({ skills }) =>
      skills.skill_count >= MIN_SKILLS && skills.skill_count < EXPECTED_SKILLS
        ? ['Expand your skills section with more relevant technologies']
        : [],
  },
  {
    id: 'weak_section',
    priority: 'medium',
    category: 'section_quality',
    evaluate: ({ sections }) =>
      SECTION_NAMES.filter((name) => sections[name].present && sections[name].flagged).map(
        (name) => WEAK_SECTION_ADVICE[name]
      ),
  },
  {
    id: 'few_action_verbs',
    priority: 'medium',
    category: 'action_verbs',
    evaluate: ({ actionVerbs }) =>
      actionVerbs.verb_count < 3
        ? ["Use stronger action verbs like 'achieved', 'led', 'implemented', 'optimized'"]
        : [],
  },
  {
    id: 'some_action_verbs',
    priority: 'low',
    category: 'action_verbs',
    evaluate: ({ actionVerbs }) =>
      actionVerbs.verb_count >= 3 && actionVerbs.verb_count < 6
        ? ['Increase use of action verbs to make your accomplishments more impactful']
        : [],
  },
  {
    id: 'formatting_issue',
    priority: 'low',
    category: 'formatting',
    evaluate: ({ formatting }) => formatting.issues.map((issue) => issue.message),
  },
  {
    id: 'missing_supporting_section',
    priority: 'low',
    category: 'missing_section',
    evaluate: ({ sections }) =>
      sections.other.present
        ? []
        : ['Consider adding supporting sections such as Projects, Certifications or Awards'],
  },
  {
    id: 'general_layout',
    priority: 'low',
    category: 'general',
    evaluate: ({ atsScore }) =>
      atsScore < 50 ? ['Use a simple, clean format with clear section headings'] : [],
  },
];

export function generateRecommendations(
  ctx: RuleContext,
  rules: readonly RecommendationRule[] = RECOMMENDATION_RULES
): Recommendation[] {
  const recommendations: Recommendation[] = [];
  for (const rule of rules) {
    for (const message of rule.evaluate(ctx)) {
      recommendations.push({ priority: rule.priority, category: rule.category, message });
    }
  }
  // Stable sort: table order holds within a priority
  return recommendations.sort((a, b) => PRIORITY_RANK[a.priority] - PRIORITY_RANK[b.priority]);
}
