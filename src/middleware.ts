import { NextRequest, NextResponse } from 'next/server';
import { getConfig } from '@/lib/config';
import { SlidingWindowRateLimiter } from '@/lib/rate-limit';

const limiter = new SlidingWindowRateLimiter(getConfig().rateLimit);

function getClientIP(request: NextRequest): string {
  return (
    request.headers.get('x-forwarded-for')?.split(',')[0]?.trim() ||
    request.headers.get('x-real-ip') ||
    'anonymous'
  );
}

function addSecurityHeaders(response: NextResponse): NextResponse {
  response.headers.set('X-Frame-Options', 'DENY');
  response.headers.set('X-Content-Type-Options', 'nosniff');
  response.headers.set('Referrer-Policy', 'strict-origin-when-cross-origin');
  response.headers.set('Permissions-Policy', 'camera=(), microphone=(), geolocation=()');

  if (getConfig().isProduction) {
    response.headers.set('Strict-Transport-Security', 'max-age=63072000; includeSubDomains; preload');
  }

  // JSON-only API: nothing may be framed, scripted or embedded
  response.headers.set('Content-Security-Policy', "default-src 'none'; frame-ancestors 'none'");

  return response;
}

export function middleware(request: NextRequest) {
  const { pathname } = request.nextUrl;

  // Health checks are never throttled
  if (pathname.startsWith('/api/') && pathname !== '/api/health') {
    const result = limiter.check(getClientIP(request));

    if (!result.allowed) {
      const errorResponse = NextResponse.json(
        { error: 'Too many requests. Please try again later.' },
        { status: 429 }
      );
      errorResponse.headers.set('Retry-After', String(Math.ceil(result.retryAfterMs / 1000)));
      errorResponse.headers.set('X-RateLimit-Limit', String(result.limit));
      errorResponse.headers.set('X-RateLimit-Remaining', '0');
      return addSecurityHeaders(errorResponse);
    }

    const response = NextResponse.next();
    response.headers.set('X-RateLimit-Limit', String(result.limit));
    response.headers.set('X-RateLimit-Remaining', String(result.remaining));
    return addSecurityHeaders(response);
  }

  return addSecurityHeaders(NextResponse.next());
}

export const config = {
  matcher: ['/api/:path*'],
};
