/**
 * Tests for caller detail extraction
 */

import express from 'express';
import request from 'supertest';
import { extractIpAddress, extractUserAgent } from '../../src/index.js';

function echoApp() {
  const app = express();
  app.get('/whoami', (req, res) => {
    res.json({ userAgent: extractUserAgent(req) ?? null, ipAddress: extractIpAddress(req) ?? null });
  });
  return app;
}

describe('client info', () => {
  it('reads the user agent header', async () => {
    const response = await request(echoApp()).get('/whoami').set('User-Agent', 'test-browser/1.0');

    expect(response.body.userAgent).toBe('test-browser/1.0');
  });

  it('prefers the first X-Forwarded-For hop', async () => {
    const response = await request(echoApp())
      .get('/whoami')
      .set('X-Forwarded-For', ' 198.51.100.7 , 10.0.0.1')
      .set('X-Real-IP', '203.0.113.1');

    expect(response.body.ipAddress).toBe('198.51.100.7');
  });

  it('falls back to X-Real-IP', async () => {
    const response = await request(echoApp()).get('/whoami').set('X-Real-IP', '203.0.113.1');

    expect(response.body.ipAddress).toBe('203.0.113.1');
  });

  it('falls back to the socket address', async () => {
    const response = await request(echoApp()).get('/whoami');

    expect(response.body.ipAddress).toMatch(/127\.0\.0\.1|::1/);
  });
});
