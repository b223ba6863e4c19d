/**
 * Tests for CORS origin handling
 */

import { describe, it, expect } from 'vitest';
import { Hono } from 'hono';
import { computeAllowedOrigins, createCorsMiddleware } from '../cors.js';

describe('computeAllowedOrigins', () => {
  it('should add the www twin of a bare host', () => {
    expect([...computeAllowedOrigins('https://ledger.example.com/app')]).toEqual([
      'https://ledger.example.com',
      'https://www.ledger.example.com',
    ]);
  });

  it('should add the bare twin of a www host, keeping the port', () => {
    expect([...computeAllowedOrigins('https://www.example.com:8443')]).toEqual([
      'https://www.example.com:8443',
      'https://example.com:8443',
    ]);
  });

  it('should not add a www twin for localhost', () => {
    expect([...computeAllowedOrigins('http://localhost:5173')]).toEqual(['http://localhost:5173']);
  });
});

describe('createCorsMiddleware', () => {
  const app = new Hono();
  app.use('*', createCorsMiddleware('https://ledger.example.com'));
  app.get('/v1/entries', (c) => c.json({ ok: true }));

  const preflight = (origin: string) =>
    app.request('/v1/entries', {
      method: 'OPTIONS',
      headers: { Origin: origin, 'Access-Control-Request-Method': 'GET' },
    });

  it('should allow the configured web app origin', async () => {
    const response = await preflight('https://ledger.example.com');

    expect(response.headers.get('access-control-allow-origin')).toBe('https://ledger.example.com');
  });

  it('should allow localhost during development', async () => {
    const response = await preflight('http://localhost:3001');

    expect(response.headers.get('access-control-allow-origin')).toBe('http://localhost:3001');
  });

  it('should not allow other origins', async () => {
    const response = await preflight('https://elsewhere.example.org');

    expect(response.headers.get('access-control-allow-origin')).toBeNull();
  });

  it('should expose the download and correlation headers', async () => {
    const response = await app.request('/v1/entries', {
      headers: { Origin: 'https://ledger.example.com' },
    });

    expect(response.headers.get('access-control-expose-headers')).toBe(
      'Content-Disposition,X-Request-Id'
    );
  });
});
