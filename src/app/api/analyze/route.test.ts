import { describe, expect, it, vi } from 'vitest';
import { NextRequest } from 'next/server';
import { POST } from './route';
import { SCENARIO_JD, SCENARIO_RESUME } from '@/test/fixtures';

vi.mock('pdf-parse', () => import('@/test/pdf-parse-stub'));

function upload(fields: Record<string, File | string>): NextRequest {
  const formData = new FormData();
  for (const [name, value] of Object.entries(fields)) {
    formData.append(name, value);
  }
  return new NextRequest('http://localhost/api/analyze', { method: 'POST', body: formData });
}

function file(content: string, name: string, type = ''): File {
  return new File([content], name, { type });
}

describe('POST /api/analyze', () => {
  it('scores a resume against a pasted job description', async () => {
    const response = await POST(
      upload({ resume: file(SCENARIO_RESUME, 'resume.txt', 'text/plain'), job_description: SCENARIO_JD })
    );
    const body = await response.json();

    expect(response.status).toBe(200);
    expect(body.ats_score).toBe(34);
    expect(body.jd_analysis.missing_skills).toEqual(['Docker']);
    expect(body.interpretations.jd_level).toBeDefined();
  });

  it('leaves out the job match without a job description', async () => {
    const response = await POST(upload({ resume: file(`%PDF-1.7\n${SCENARIO_RESUME}`, 'resume.pdf') }));
    const body = await response.json();

    expect(response.status).toBe(200);
    expect(body.ats_score).toBe(34);
    expect(body).not.toHaveProperty('jd_match_score');
    expect(body).not.toHaveProperty('jd_analysis');
  });

  it('requires a resume', async () => {
    const response = await POST(upload({ job_description: SCENARIO_JD }));

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: 'Resume file is required' });
  });

  it('rejects a body that is not multipart', async () => {
    const request = new NextRequest('http://localhost/api/analyze', {
      method: 'POST',
      body: JSON.stringify({ resume: 'text' }),
      headers: { 'content-type': 'application/json' },
    });
    const response = await POST(request);

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: 'Expected a multipart/form-data upload' });
  });

  it('rejects unsupported file types', async () => {
    const response = await POST(upload({ resume: file('legacy', 'resume.doc', 'application/msword') }));

    expect(response.status).toBe(415);
    expect(await response.json()).toEqual({
      error: 'Unsupported file type "application/msword". Please upload a PDF, DOCX, or TXT file.',
    });
  });

  it('reports unreadable documents', async () => {
    const response = await POST(upload({ resume: file('garbage', 'resume.pdf', 'application/pdf') }));

    expect(response.status).toBe(422);
    expect(await response.json()).toEqual({ error: 'Could not read the resume file: Invalid PDF structure.' });
  });

  it('rejects files over the size limit', async () => {
    const oversized = 'a'.repeat(10 * 1024 * 1024 + 1);
    const response = await POST(upload({ resume: file(oversized, 'resume.txt', 'text/plain') }));

    expect(response.status).toBe(413);
    expect(await response.json()).toEqual({ error: 'File size must be less than 10MB' });
  });
});
