/**
 * CORS and security headers
 */

import { describe, test, expect } from 'vitest';
import { createTestApp } from '../../helpers/app';

describe('CORS', () => {
  test('echoes any origin when CORS_ORIGINS is *', async () => {
    const { app } = createTestApp({ env: { CORS_ORIGINS: '*' } });

    const res = await app.request('/health', { headers: { origin: 'https://anywhere.example.test' } });

    expect(res.headers.get('access-control-allow-origin')).toBe('https://anywhere.example.test');
    expect(res.headers.get('access-control-allow-credentials')).toBeNull();
  });

  test('allows a listed origin', async () => {
    const { app } = createTestApp({
      env: { CORS_ORIGINS: 'https://app.example.test, https://admin.example.test' },
    });

    const res = await app.request('/health', { headers: { origin: 'https://admin.example.test' } });

    expect(res.headers.get('access-control-allow-origin')).toBe('https://admin.example.test');
  });

  test('omits the allow-origin header for an unlisted origin', async () => {
    const { app } = createTestApp({ env: { CORS_ORIGINS: 'https://app.example.test' } });

    const res = await app.request('/health', { headers: { origin: 'https://evil.example.test' } });

    expect(res.headers.get('access-control-allow-origin')).toBeNull();
  });

  test('answers preflight requests without authentication', async () => {
    const { app } = createTestApp({ env: { CORS_ORIGINS: 'https://app.example.test' } });

    const res = await app.request('/chat', {
      method: 'OPTIONS',
      headers: {
        origin: 'https://app.example.test',
        'access-control-request-method': 'POST',
      },
    });

    expect(res.status).toBe(204);
    expect(res.headers.get('access-control-allow-methods')).toBe('GET,POST,DELETE,OPTIONS');
    expect(res.headers.get('access-control-max-age')).toBe('86400');
  });
});

describe('Security headers', () => {
  test('are set on every response', async () => {
    const { app } = createTestApp();

    const res = await app.request('/does-not-exist');

    expect(res.status).toBe(404);
    expect(res.headers.get('X-Frame-Options')).toBe('DENY');
    expect(res.headers.get('X-Content-Type-Options')).toBe('nosniff');
    expect(res.headers.get('Referrer-Policy')).toBe('no-referrer');
    expect(res.headers.get('Content-Security-Policy')).toBe("default-src 'none'; frame-ancestors 'none'");
  });
});
