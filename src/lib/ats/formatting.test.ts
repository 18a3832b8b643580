import { describe, expect, it } from 'vitest';
import type { ExtractionDiagnostics } from '@/lib/document/parser';
import { checkFormatting } from './formatting';

function diagnostics(overrides: Partial<ExtractionDiagnostics> = {}): ExtractionDiagnostics {
  return {
    format: 'txt',
    lineCount: 0,
    wordCount: 0,
    uppercaseRatio: 0.1,
    tableGlyphCount: 0,
    decorativeGlyphCount: 0,
    ...overrides,
  };
}

const noHeadings = () => false;
const body = Array.from({ length: 120 }, () => 'word').join(' ');
const contact = 'jane@example.com';

describe('checkFormatting', () => {
  it('passes a plain single-column resume', () => {
    expect(checkFormatting({ text: `${contact}\n${body}`, diagnostics: diagnostics(), isHeading: noHeadings })).toEqual({
      score: 100,
      is_compatible: true,
      issues: [],
    });
  });

  it('penalizes a short resume without contact details', () => {
    const report = checkFormatting({ text: 'hello world', diagnostics: diagnostics(), isHeading: noHeadings });

    expect(report.issues.map((i) => i.code)).toEqual(['too_short', 'missing_contact']);
    expect(report.score).toBe(70);
    expect(report.is_compatible).toBe(true);
  });

  it('accepts a phone number as contact information', () => {
    const report = checkFormatting({ text: `(555) 123-4567\n${body}`, diagnostics: diagnostics(), isHeading: noHeadings });
    expect(report.issues).toEqual([]);
  });

  it('penalizes tables and decorative glyphs found during extraction', () => {
    const report = checkFormatting({
      text: `${contact}\n${body}`,
      diagnostics: diagnostics({ tableGlyphCount: 11, decorativeGlyphCount: 2 }),
      isHeading: noHeadings,
    });

    expect(report.issues.map((i) => i.code)).toEqual(['table_layout', 'decorative_glyphs']);
    expect(report.score).toBe(75);
  });

  it('detects a multi-column layout from many short lines', () => {
    const shortLines = Array.from({ length: 10 }, () => 'short line').join('\n');
    const report = checkFormatting({ text: `${contact}\n${shortLines}\n${body}`, diagnostics: diagnostics(), isHeading: noHeadings });

    expect(report.issues).toEqual([
      { code: 'multi_column', message: 'Multiple short lines detected - avoid multi-column layouts', penalty: 15 },
    ]);
    expect(report.score).toBe(85);
  });

  it('does not count bullets as short lines', () => {
    const bullets = Array.from({ length: 10 }, () => '- go').join('\n');
    const report = checkFormatting({ text: `${contact}\n${bullets}\n${body}`, diagnostics: diagnostics(), isHeading: noHeadings });

    expect(report.issues).toEqual([]);
  });

  it('only looks for columns before the first heading', () => {
    const shortLines = Array.from({ length: 10 }, () => 'short line').join('\n');
    const report = checkFormatting({
      text: `${contact}\n${body}\nskills\n${shortLines}`,
      diagnostics: diagnostics(),
      isHeading: (line) => line === 'skills',
    });

    expect(report.issues).toEqual([]);
  });

  it('penalizes text that is mostly upper case', () => {
    const report = checkFormatting({
      text: `${contact}\n${body}`,
      diagnostics: diagnostics({ uppercaseRatio: 0.9, wordCount: 121 }),
      isHeading: noHeadings,
    });

    expect(report.issues.map((i) => i.code)).toEqual(['excessive_caps']);
    expect(report.score).toBe(90);
  });

  it('penalizes an overly long resume', () => {
    const long = Array.from({ length: 1501 }, () => 'word').join(' ');
    const report = checkFormatting({ text: `${contact}\n${long}`, diagnostics: diagnostics(), isHeading: noHeadings });

    expect(report.issues.map((i) => i.code)).toEqual(['too_long']);
    expect(report.score).toBe(90);
  });

  it('marks a heavily penalized resume as incompatible', () => {
    const report = checkFormatting({
      text: 'hello',
      diagnostics: diagnostics({ tableGlyphCount: 40, decorativeGlyphCount: 1 }),
      isHeading: noHeadings,
    });

    expect(report.score).toBe(45);
    expect(report.is_compatible).toBe(false);
  });
});
