import { NextRequest, NextResponse } from 'next/server';
import { analyzeDocuments } from '@/lib/ats/analyze';
import { getConfig } from '@/lib/config';
import { resolveDocumentType, type DocumentRole, type SourceDocument } from '@/lib/document/parser';
import { FileTooLargeError, ValidationError, isAppError } from '@/lib/errors';
import { createLogger } from '@/lib/logger';

export const runtime = 'nodejs';

const log = createLogger('api/analyze');

/**
 * Reads one multipart field. A file is taken as-is; a text value is treated
 * as pasted plain text. Empty fields (no file chosen) count as absent.
 */
async function readField(
  formData: FormData,
  field: string,
  role: DocumentRole,
  maxBytes: number
): Promise<SourceDocument | undefined> {
  const value = formData.get(field);
  if (value === null) return undefined;

  if (typeof value === 'string') {
    if (!value.trim()) return undefined;
    const bytes = Buffer.from(value, 'utf-8');
    if (bytes.length > maxBytes) throw new FileTooLargeError(field, maxBytes);
    return { bytes, declaredType: 'txt', role };
  }

  if (value.size === 0 && !value.name) return undefined;
  if (value.size > maxBytes) throw new FileTooLargeError(field, maxBytes);

  // Prefer the extension; fall back to the browser-reported MIME type
  const declaredType = resolveDocumentType(value.name) ? value.name : value.type || value.name;
  return {
    bytes: Buffer.from(await value.arrayBuffer()),
    declaredType,
    role,
    fileName: value.name,
  };
}

export async function POST(request: NextRequest) {
  try {
    let formData: FormData;
    try {
      formData = await request.formData();
    } catch {
      throw new ValidationError('Expected a multipart/form-data upload');
    }

    const { maxFileSizeBytes } = getConfig();
    const resume = await readField(formData, 'resume', 'resume', maxFileSizeBytes);
    if (!resume) {
      throw new ValidationError('Resume file is required');
    }
    const jobDescription = await readField(formData, 'job_description', 'job_description', maxFileSizeBytes);

    const result = await analyzeDocuments({ resume, jobDescription });
    return NextResponse.json(result);
  } catch (error) {
    if (isAppError(error)) {
      log.warn(`${error.code}: ${error.message}`);
      return NextResponse.json({ error: error.message }, { status: error.statusCode });
    }

    log.error('Error analyzing resume:', error);
    return NextResponse.json({ error: 'Failed to analyze resume' }, { status: 500 });
  }
}
