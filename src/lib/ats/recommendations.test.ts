import { describe, expect, it } from 'vitest';
import { generateRecommendations, type RuleContext } from './recommendations';
import { absent, section, sectionMap, skillSet, verbs } from '@/test/builders';

function context(overrides: Partial<RuleContext> = {}): RuleContext {
  return {
    atsScore: 90,
    sections: sectionMap(),
    skills: skillSet(12),
    actionVerbs: verbs(8),
    formatting: { score: 100, is_compatible: true, issues: [] },
    ...overrides,
  };
}

const messages = (ctx: RuleContext) => generateRecommendations(ctx).map((r) => r.message);

describe('generateRecommendations', () => {
  it('has nothing to say about a strong resume', () => {
    expect(generateRecommendations(context())).toEqual([]);
  });

  it('asks for missing critical sections first', () => {
    const recs = generateRecommendations(
      context({ sections: sectionMap({ experience: absent('experience'), education: absent('education') }) })
    );

    expect(recs).toEqual([
      {
        priority: 'high',
        category: 'missing_section',
        message: 'Add an Experience section - this is essential for ATS parsing',
      },
      {
        priority: 'high',
        category: 'missing_section',
        message: 'Add an Education section - this is essential for ATS parsing',
      },
    ]);
  });

  it('lists at most five missing job skills', () => {
    const recs = generateRecommendations(
      context({
        jd: {
          missing_skills: ['Docker', 'Kafka', 'GraphQL', 'Redis', 'Go', 'Rust'],
          matching_skills: [],
          overlap_percentage: 0,
          tfidf_similarity: 10,
        },
      })
    );

    expect(recs.map((r) => [r.priority, r.category, r.message])).toEqual([
      ['high', 'jd_match', 'Add these job-relevant skills if you have them: Docker, Kafka, GraphQL, Redis, Go'],
      [
        'medium',
        'jd_match',
        'Your resume has limited overlap with the job description - tailor it to match key requirements',
      ],
    ]);
  });

  it('does not judge overlap when the job description names no skills', () => {
    const ctx = context({
      jd: { missing_skills: [], matching_skills: [], overlap_percentage: 0, tfidf_similarity: 5 },
    });
    expect(generateRecommendations(ctx)).toEqual([]);
  });

  it('scales skill advice with the skill count', () => {
    expect(messages(context({ skills: skillSet(3) }))).toEqual([
      'Add more technical skills - aim for at least 8-10 relevant skills',
    ]);
    expect(messages(context({ skills: skillSet(7) }))).toEqual([
      'Expand your skills section with more relevant technologies',
    ]);
  });

  it('scales action verb advice with the verb count', () => {
    expect(messages(context({ actionVerbs: verbs(2) }))).toEqual([
      "Use stronger action verbs like 'achieved', 'led', 'implemented', 'optimized'",
    ]);
    expect(generateRecommendations(context({ actionVerbs: verbs(4) }))).toEqual([
      {
        priority: 'low',
        category: 'action_verbs',
        message: 'Increase use of action verbs to make your accomplishments more impactful',
      },
    ]);
  });

  it('gives advice for flagged sections', () => {
    const sections = sectionMap({ experience: section('experience', { score: 50, flagged: true }) });
    expect(generateRecommendations(context({ sections }))).toEqual([
      {
        priority: 'medium',
        category: 'section_quality',
        message: 'Expand your Experience section with bullet points, concrete accomplishments and metrics',
      },
    ]);
  });

  it('orders by priority and keeps rule order within a priority', () => {
    const ctx = context({
      atsScore: 40,
      sections: sectionMap({ summary: absent('summary') }),
      skills: skillSet(2),
      actionVerbs: verbs(4),
      formatting: {
        score: 80,
        is_compatible: true,
        issues: [{ code: 'too_short', message: 'Resume appears too short', penalty: 20 }],
      },
    });

    expect(generateRecommendations(ctx).map((r) => `${r.priority}: ${r.message}`)).toEqual([
      'high: Add more technical skills - aim for at least 8-10 relevant skills',
      'medium: Consider adding a Summary section to strengthen your resume',
      'low: Increase use of action verbs to make your accomplishments more impactful',
      'low: Resume appears too short',
      'low: Use a simple, clean format with clear section headings',
    ]);
  });

  it('accepts a custom rule table', () => {
    const recs = generateRecommendations(context(), [
      { id: 'general_layout', priority: 'low', category: 'general', evaluate: () => ['later'] },
      { id: 'low_skill_count', priority: 'high', category: 'skills', evaluate: () => ['first'] },
    ]);
    expect(recs.map((r) => r.message)).toEqual(['first', 'later']);
  });
});
