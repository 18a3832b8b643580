import mammoth from 'mammoth';
import { PDFParse } from 'pdf-parse';
import { ExtractionError, UnsupportedFormatError } from '@/lib/errors';
import { createLogger } from '@/lib/logger';

export type DocumentType = 'pdf' | 'docx' | 'txt';
export type DocumentRole = 'resume' | 'job_description';

export interface SourceDocument {
  bytes: Buffer;
  /** Extension (`pdf`), file name (`cv.pdf`) or MIME type. */
  declaredType: string;
  role: DocumentRole;
  fileName?: string;
}

export interface ExtractionDiagnostics {
  format: DocumentType;
  lineCount: number;
  wordCount: number;
  /** Share of letters that are upper case, measured before lowercasing. */
  uppercaseRatio: number;
  tableGlyphCount: number;
  decorativeGlyphCount: number;
}

export interface ExtractedDocument {
  text: string;
  diagnostics: ExtractionDiagnostics;
}

const log = createLogger('extract');

const MIME_TYPES: Record<string, DocumentType> = {
  'application/pdf': 'pdf',
  'application/vnd.openxmlformats-officedocument.wordprocessingml.document': 'docx',
  'text/plain': 'txt',
};

const EXTENSIONS: Record<string, DocumentType> = {
  pdf: 'pdf',
  docx: 'docx',
  txt: 'txt',
  text: 'txt',
};

const BULLET_GLYPHS = /^(?:[•●○◦▪▫■□‣∙·►▶➢➤✓✔✦❖]+|\*(?!\*))\s*/;
const SEPARATOR_LINE = /^[-=_~*]{3,}$/;
const TABLE_GLYPHS = /[│┃┤├┼┬┴╪═║╔╗╚╝╠╣╦╩╬─━┌┐└┘]/g;
const DECORATIVE_GLYPHS = /[\u{1F300}-\u{1FAFF}]|[\u{2600}-\u{26FF}]|[\u{2700}-\u{27BF}]|[★☆✗→⇒]/gu;
// "3", "Page 2 of 5", "2/5" and pdf-parse's "-- 1 of 2 --" page separators
const PAGE_NUMBER_LINE = /^(?:--\s*)?(?:page\s+)?\d{1,3}(?:\s*(?:of|\/)\s*\d{1,3})?(?:\s*--)?$/i;

export function resolveDocumentType(declared: string): DocumentType | null {
  const value = declared.trim().toLowerCase().split(';')[0].trim();
  if (!value) return null;

  if (MIME_TYPES[value]) return MIME_TYPES[value];

  const extension = value.includes('.') ? value.slice(value.lastIndexOf('.') + 1) : value;
  return EXTENSIONS[extension] ?? null;
}

/**
 * Normalizes raw extracted text for the analysis pipeline.
 * Line breaks survive so headings can still be found; everything else
 * (bullets, page numbers, table borders, runs of spaces) is flattened.
 */
export function normalizeExtractedText(raw: string): string {
  let text = raw.replace(/\r\n?/g, '\n');

  text = text.replace(/[\u200B\u200C\u200D\uFEFF\u00AD]/g, '');
  text = text.replace(/[\u2018\u2019\u201A\u201B]/g, "'");
  text = text.replace(/[\u201C\u201D\u201E\u201F]/g, '"');
  text = text.replace(/[\u2013\u2014]/g, '-');
  text = text.replace(TABLE_GLYPHS, ' ');

  const lines: string[] = [];
  for (const rawLine of text.split('\n')) {
    let line = rawLine.replace(/[ \t\f\v\u00A0]+/g, ' ').trim();

    if (PAGE_NUMBER_LINE.test(line) || SEPARATOR_LINE.test(line)) continue;

    if (BULLET_GLYPHS.test(line)) {
      line = `- ${line.replace(BULLET_GLYPHS, '')}`.trim();
    } else if (/^-\s*\S/.test(line)) {
      line = `- ${line.replace(/^-\s*/, '')}`;
    }

    line = line.replace(DECORATIVE_GLYPHS, '').replace(/ {2,}/g, ' ').trim();
    lines.push(line);
  }

  return lines
    .join('\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim()
    .toLowerCase();
}

function countMatches(text: string, pattern: RegExp): number {
  return (text.match(pattern) || []).length;
}

function measure(raw: string, text: string, format: DocumentType): ExtractionDiagnostics {
  const letters = raw.match(/\p{L}/gu) || [];
  const upper = letters.filter((ch) => ch !== ch.toLowerCase()).length;
  const words = text.split(/\s+/).filter((w) => /[a-z0-9]/.test(w));

  return {
    format,
    lineCount: text ? text.split('\n').length : 0,
    wordCount: words.length,
    uppercaseRatio: letters.length > 0 ? upper / letters.length : 0,
    tableGlyphCount: countMatches(raw, TABLE_GLYPHS),
    decorativeGlyphCount: countMatches(raw, DECORATIVE_GLYPHS),
  };
}

/**
 * Builds an ExtractedDocument from text already in hand (pasted text,
 * fixtures). Same normalization and diagnostics as a file upload.
 */
export function fromRawText(raw: string, format: DocumentType = 'txt'): ExtractedDocument {
  const text = normalizeExtractedText(raw);
  return { text, diagnostics: measure(raw, text, format) };
}

export async function parsePDF(buffer: Buffer): Promise<string> {
  const parser = new PDFParse({ data: buffer });
  try {
    const result = await parser.getText();
    return result.text;
  } finally {
    await parser.destroy();
  }
}

export async function parseDOCX(buffer: Buffer): Promise<string> {
  const result = await mammoth.extractRawText({ buffer });
  return result.value;
}

export function parseTXT(buffer: Buffer): string {
  return new TextDecoder('utf-8').decode(buffer).replace(/^\uFEFF/, '');
}

async function readRaw(buffer: Buffer, format: DocumentType): Promise<string> {
  switch (format) {
    case 'pdf':
      return parsePDF(buffer);
    case 'docx':
      return parseDOCX(buffer);
    case 'txt':
      return parseTXT(buffer);
  }
}

export async function extractDocument(document: SourceDocument): Promise<ExtractedDocument> {
  const format = resolveDocumentType(document.declaredType);
  if (!format) {
    throw new UnsupportedFormatError(document.declaredType);
  }

  const label = document.role === 'resume' ? 'resume' : 'job description';
  let raw: string;
  try {
    raw = await readRaw(document.bytes, format);
  } catch (error) {
    log.warn(`Failed to read ${format} ${label}`, document.fileName ?? '', error);
    const reason = error instanceof Error ? error.message : String(error);
    throw new ExtractionError(`Could not read the ${label} file: ${reason}`, {
      cause: error,
      context: { format, role: document.role },
    });
  }

  const extracted = fromRawText(raw, format);
  if (extracted.text.length === 0) {
    throw new ExtractionError(`Could not extract text from the ${label} file`, {
      context: { format, role: document.role },
    });
  }

  log.debug(`Extracted ${extracted.diagnostics.wordCount} words from ${format} ${label}`);
  return extracted;
}

export async function extractText(document: SourceDocument): Promise<string> {
  const { text } = await extractDocument(document);
  return text;
}
