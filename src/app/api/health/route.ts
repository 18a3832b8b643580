import { NextResponse } from 'next/server';

export function GET() {
  return NextResponse.json({ status: 'healthy', message: 'ATS Resume Analyzer API is running' });
}
