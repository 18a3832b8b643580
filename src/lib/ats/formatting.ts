// ---------------------------------------------------------------------------
// Formatting checks: layout signals that trip up ATS parsers
// ---------------------------------------------------------------------------

import type { ExtractionDiagnostics } from '@/lib/document/parser';
import type { FormattingIssue, FormattingReport } from './types';

export const MIN_WORDS = 100;
export const MAX_WORDS = 1500;

const EMAIL = /[a-z0-9._%+-]+@[a-z0-9.-]+\.[a-z]{2,}/i;
const PHONE = /(?:\+?\d{1,3}[\s.-]?)?\(?\d{3}\)?[\s.-]?\d{3}[\s.-]?\d{4}/;

export interface FormattingInput {
  text: string;
  diagnostics: ExtractionDiagnostics;
  /** Column detection only looks at the lines before the first heading. */
  isHeading: (line: string) => boolean;
}

/**
 * Lines before the first recognized heading. Column layouts scramble the
 * reading order, so their fragments pile up ahead of any heading the
 * segmenter can find; content under a heading never counts.
 */
function layoutRegion(text: string, isHeading: (line: string) => boolean): string[] {
  const region: string[] = [];
  for (const line of text.split('\n')) {
    const trimmed = line.trim();
    if (isHeading(trimmed)) break;
    region.push(trimmed);
  }
  return region;
}

function countWords(text: string): number {
  return text.split(/\s+/).filter((w) => /[a-z0-9]/i.test(w)).length;
}

export function checkFormatting({ text, diagnostics, isHeading }: FormattingInput): FormattingReport {
  const issues: FormattingIssue[] = [];

  if (diagnostics.tableGlyphCount > 10) {
    issues.push({
      code: 'table_layout',
      message: 'Contains table formatting that may not parse well',
      penalty: 20,
    });
  }

  const contentLines = layoutRegion(text, isHeading).filter((l) => l.length > 0 && !l.startsWith('- '));
  const shortLines = contentLines.filter((l) => l.length < 20).length;
  if (contentLines.length >= 10 && shortLines > contentLines.length * 0.3) {
    issues.push({
      code: 'multi_column',
      message: 'Multiple short lines detected - avoid multi-column layouts',
      penalty: 15,
    });
  }

  if (diagnostics.uppercaseRatio > 0.8 && diagnostics.wordCount >= 20) {
    issues.push({
      code: 'excessive_caps',
      message: 'Excessive capitalization - use mixed case',
      penalty: 10,
    });
  }

  const words = countWords(text);
  if (words < MIN_WORDS) {
    issues.push({ code: 'too_short', message: 'Resume appears too short', penalty: 20 });
  } else if (words > MAX_WORDS) {
    issues.push({
      code: 'too_long',
      message: 'Resume may be too long - consider condensing',
      penalty: 10,
    });
  }

  if (!EMAIL.test(text) && !PHONE.test(text)) {
    issues.push({
      code: 'missing_contact',
      message: 'No contact information (email or phone) detected in document body',
      penalty: 10,
    });
  }

  if (diagnostics.decorativeGlyphCount > 0) {
    issues.push({
      code: 'decorative_glyphs',
      message: 'Decorative characters or emojis detected - use standard bullets',
      penalty: 5,
    });
  }

  const score = Math.max(0, 100 - issues.reduce((sum, issue) => sum + issue.penalty, 0));
  return { score, is_compatible: score >= 70, issues };
}
