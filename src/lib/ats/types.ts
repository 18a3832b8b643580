// ---------------------------------------------------------------------------
// Result types: field names are the JSON contract with the presentation layer
// ---------------------------------------------------------------------------

export const SECTION_NAMES = ['summary', 'skills', 'experience', 'education', 'other'] as const;
export type SectionName = (typeof SECTION_NAMES)[number];

export const SECTION_LABELS: Record<SectionName, string> = {
  summary: 'Summary',
  skills: 'Skills',
  experience: 'Experience',
  education: 'Education',
  other: 'Other',
};

export interface Section {
  name: SectionName;
  label: string;
  present: boolean;
  raw_text: string;
  observation: string;
  score: number;               // 0-100 quality, 0 when absent
  flagged: boolean;            // weak or problematic, drives recommendations
  word_count: number;
}

export type SectionMap = Record<SectionName, Section>;

export interface SkillSet {
  found_skills: string[];
  skill_count: number;
}

export interface JdAnalysis {
  missing_skills: string[];
  matching_skills: string[];
  overlap_percentage: number;
  tfidf_similarity: number;
}

export type Priority = 'high' | 'medium' | 'low';

export type RecommendationCategory =
  | 'missing_section'
  | 'jd_match'
  | 'skills'
  | 'section_quality'
  | 'action_verbs'
  | 'formatting'
  | 'general';

export interface Recommendation {
  priority: Priority;
  category: RecommendationCategory;
  message: string;
}

export type ScoreLevel = 'excellent' | 'good' | 'fair' | 'poor';

export interface Interpretations {
  ats_level: ScoreLevel;
  ats_interpretation: string;
  jd_level?: ScoreLevel;
  jd_interpretation?: string;
}

export interface ActionVerbReport {
  found_verbs: string[];
  verb_count: number;
}

export type FormattingIssueCode =
  | 'table_layout'
  | 'multi_column'
  | 'excessive_caps'
  | 'too_short'
  | 'too_long'
  | 'missing_contact'
  | 'decorative_glyphs';

export interface FormattingIssue {
  code: FormattingIssueCode;
  message: string;
  penalty: number;
}

export interface FormattingReport {
  score: number;
  is_compatible: boolean;
  issues: FormattingIssue[];
}

export interface ScoreResult {
  ats_score: number;
  jd_match_score?: number;
  sections: SectionMap;
  skills: SkillSet;
  jd_analysis?: JdAnalysis;
  action_verbs: ActionVerbReport;
  formatting: FormattingReport;
  recommendations: Recommendation[];
  strengths: string[];
  summary: string;
  interpretations: Interpretations;
}
