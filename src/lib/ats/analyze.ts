// ---------------------------------------------------------------------------
// Resume Analysis pipeline:
// extract → segment → match skills → (JD) similarity + gap → score
// ---------------------------------------------------------------------------

import {
  extractDocument,
  fromRawText,
  type ExtractedDocument,
  type SourceDocument,
} from '@/lib/document/parser';
import { buildHeadingIndex, matchHeading, segmentResume } from '@/lib/document/parse-sections';
import { ValidationError } from '@/lib/errors';
import { createLogger } from '@/lib/logger';
import { detectActionVerbs } from './action-verbs';
import { computeScore } from './ats-scorer';
import { checkFormatting } from './formatting';
import { getKnowledgeBase, type KnowledgeBase } from './knowledge';
import { scoreSimilarity } from './similarity';
import { findSkillGap, matchSkills } from './skill-matcher';
import type { JdAnalysis, ScoreResult } from './types';

export interface AnalysisRequest {
  resume?: SourceDocument;
  jobDescription?: SourceDocument;
}

const log = createLogger('analyze');

/**
 * Scores already-extracted documents. Synchronous and pure: the same
 * inputs always produce the same result.
 */
export function analyzeExtracted(
  resume: ExtractedDocument,
  jobDescription: ExtractedDocument | undefined,
  knowledge: KnowledgeBase,
): ScoreResult {
  const { sections } = segmentResume(resume.text, knowledge.lexicon);
  const skills = matchSkills(resume.text, knowledge.taxonomy);
  const actionVerbs = detectActionVerbs(resume.text, knowledge.actionVerbs);

  const headingIndex = buildHeadingIndex(knowledge.lexicon);
  const formatting = checkFormatting({
    text: resume.text,
    diagnostics: resume.diagnostics,
    isHeading: (line) => matchHeading(line, headingIndex) !== null,
  });

  let jd: JdAnalysis | undefined;
  if (jobDescription) {
    const jdSkills = matchSkills(jobDescription.text, knowledge.taxonomy);
    jd = {
      ...findSkillGap(skills, jdSkills),
      tfidf_similarity: scoreSimilarity(resume.text, jobDescription.text, {
        stopwords: knowledge.stopwords,
      }),
    };
  }

  return computeScore({ sections, skills, actionVerbs, formatting, jd });
}

/**
 * Analyzes plain resume text and, optionally, plain job description text.
 */
export function analyzeResumeText(
  resumeText: string,
  jobDescriptionText?: string,
  knowledge: KnowledgeBase = getKnowledgeBase(),
): ScoreResult {
  const jobDescription = jobDescriptionText === undefined ? undefined : fromRawText(jobDescriptionText);
  return analyzeExtracted(fromRawText(resumeText), jobDescription, knowledge);
}

/**
 * Full pipeline from uploaded bytes. Fails atomically: an unreadable job
 * description fails the whole request rather than dropping the JD analysis.
 */
export async function analyzeDocuments(
  request: AnalysisRequest,
  knowledge: KnowledgeBase = getKnowledgeBase(),
): Promise<ScoreResult> {
  if (!request.resume) {
    throw new ValidationError('Resume file is required');
  }

  const [resume, jobDescription] = await Promise.all([
    extractDocument(request.resume),
    request.jobDescription ? extractDocument(request.jobDescription) : Promise.resolve(undefined),
  ]);

  const result = analyzeExtracted(resume, jobDescription, knowledge);
  log.info(
    `Scored resume at ${result.ats_score}` +
      (result.jd_match_score !== undefined ? ` (JD match ${result.jd_match_score})` : '')
  );
  return result;
}
