import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { Hono } from 'hono';
import type { LoanStore } from '@loan-amort/engine';
import { createApp } from '../src/app.js';
import { openStore } from '../src/db.js';

async function api(app: Hono, method: string, path: string, body?: unknown) {
  const init: RequestInit = {
    method,
    headers: { 'Content-Type': 'application/json' },
  };
  if (body !== undefined) init.body = JSON.stringify(body);
  const res = await app.request(path, init);
  return { status: res.status, data: await res.json() };
}

describe('Users API', () => {
  let app: Hono;

  beforeEach(() => {
    app = createApp(openStore(':memory:'));
  });

  it('GET /api/v1/users returns empty list initially', async () => {
    const { status, data } = await api(app, 'GET', '/api/v1/users');
    expect(status).toBe(200);
    expect(data).toEqual([]);
  });

  it('POST /api/v1/users creates a user', async () => {
    const { status, data } = await api(app, 'POST', '/api/v1/users', {
      username: 'alice',
      email: 'alice@example.com',
    });
    expect(status).toBe(201);
    expect(data.id).toEqual(expect.any(String));
    expect(data.username).toBe('alice');
    expect(data.email).toBe('alice@example.com');

    const list = await api(app, 'GET', '/api/v1/users');
    expect(list.data).toHaveLength(1);
    expect(list.data[0].id).toBe(data.id);
  });

  it('POST /api/v1/users rejects a taken username', async () => {
    await api(app, 'POST', '/api/v1/users', { username: 'alice', email: 'alice@example.com' });
    const { status, data } = await api(app, 'POST', '/api/v1/users', {
      username: 'alice',
      email: 'someone@example.com',
    });
    expect(status).toBe(400);
    expect(data.error.code).toBe('DUPLICATE_USER');
  });

  it('POST /api/v1/users rejects a taken email', async () => {
    await api(app, 'POST', '/api/v1/users', { username: 'alice', email: 'alice@example.com' });
    const { status, data } = await api(app, 'POST', '/api/v1/users', {
      username: 'alice2',
      email: 'alice@example.com',
    });
    expect(status).toBe(400);
    expect(data.error.message).toBe('Username or email already exists');
  });

  it('POST /api/v1/users rejects an invalid email', async () => {
    const { status, data } = await api(app, 'POST', '/api/v1/users', {
      username: 'bob',
      email: 'not-an-email',
    });
    expect(status).toBe(400);
    expect(data.error.code).toBe('VALIDATION_ERROR');
  });

  it('GET /api/v1/users/:id/loans lists only that user\'s loans', async () => {
    const owner = await api(app, 'POST', '/api/v1/users', { username: 'owner', email: 'owner@example.com' });
    const other = await api(app, 'POST', '/api/v1/users', { username: 'other', email: 'other@example.com' });

    const loan = await api(app, 'POST', '/api/v1/loans', {
      userId: owner.data.id,
      principalCents: 500000,
      annualRatePercent: '5',
      termMonths: 24,
    });
    await api(app, 'POST', '/api/v1/loans', {
      userId: other.data.id,
      principalCents: 100000,
      annualRatePercent: '0',
      termMonths: 12,
    });

    const { status, data } = await api(app, 'GET', `/api/v1/users/${owner.data.id}/loans`);
    expect(status).toBe(200);
    expect(data).toHaveLength(1);
    expect(data[0].id).toBe(loan.data.id);
    expect(data[0].principal).toBe('5000.00');
  });

  it('GET /api/v1/users/:id/loans returns 404 for unknown user', async () => {
    const { status, data } = await api(app, 'GET', '/api/v1/users/nobody/loans');
    expect(status).toBe(404);
    expect(data.error.message).toBe("User 'nobody' not found");
    expect(data.error.suggestion).toBe('Use GET /api/v1/users to list available IDs');
  });
});

describe('error handling', () => {
  it('renders unexpected errors as INTERNAL_ERROR', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const store: LoanStore = {
      ...openStore(':memory:'),
      listUsers: () => {
        throw new Error('disk I/O error');
      },
    };
    const app = createApp(store);

    const { status, data } = await api(app, 'GET', '/api/v1/users');
    expect(status).toBe(500);
    expect(data.error).toEqual({
      code: 'INTERNAL_ERROR',
      message: 'disk I/O error',
      suggestion: 'Check server logs',
    });
    expect(errorSpy).toHaveBeenCalledTimes(1);
    errorSpy.mockRestore();
  });
});
