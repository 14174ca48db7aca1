/**
 * Tests for RPC error to HTTP status mapping
 */

import express from 'express';
import request from 'supertest';
import { NotFoundError, PermissionDeniedError, UnauthenticatedError } from '@sessiongate/auth';
import { httpStatusFor, sendRpcError } from '../../src/index.js';

describe('httpStatusFor', () => {
  it('maps every code', () => {
    expect(httpStatusFor('invalid_argument')).toBe(400);
    expect(httpStatusFor('unauthenticated')).toBe(401);
    expect(httpStatusFor('permission_denied')).toBe(403);
    expect(httpStatusFor('not_found')).toBe(404);
    expect(httpStatusFor('failed_precondition')).toBe(400);
    expect(httpStatusFor('internal')).toBe(500);
    expect(httpStatusFor('canceled')).toBe(499);
    expect(httpStatusFor('deadline_exceeded')).toBe(504);
  });
});

describe('sendRpcError', () => {
  function appSending(error: Parameters<typeof sendRpcError>[1]) {
    const app = express();
    app.get('/', (_req, res) => sendRpcError(res, error));
    return app;
  }

  it('sends code and message only', async () => {
    const response = await request(appSending(new NotFoundError('user not found'))).get('/').expect(404);

    expect(response.body).toEqual({ code: 'not_found', message: 'user not found' });
  });

  it('adds a bearer challenge to unauthenticated replies', async () => {
    await request(appSending(new UnauthenticatedError('invalid token')))
      .get('/')
      .expect(401)
      .expect('WWW-Authenticate', 'Bearer');
  });

  it('sends no challenge for permission errors', async () => {
    const response = await request(appSending(new PermissionDeniedError('insufficient permissions'))).get('/').expect(403);

    expect(response.headers['www-authenticate']).toBeUndefined();
  });
});
