import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';
import type { LoanStore } from '@loan-amort/engine';
import { userRoutes } from './routes/users.js';
import { loanRoutes } from './routes/loans.js';
import { apiKeyAuth } from './middleware/auth.js';
import { AppError } from './errors.js';

export interface AppOptions {
  apiKey?: string;
  /** ISO code used for the *Formatted money fields. */
  currency?: string;
}

export function createApp(store: LoanStore, options: AppOptions = {}) {
  const app = new Hono();
  const currency = options.currency ?? 'USD';

  app.use('*', cors());
  app.use('*', logger());

  app.onError((err, c) => {
    if (err instanceof AppError) {
      return c.json(
        {
          error: {
            code: err.code,
            message: err.message,
            suggestion: err.suggestion,
          },
        },
        err.status,
      );
    }

    console.error(err);
    return c.json(
      {
        error: {
          code: 'INTERNAL_ERROR',
          message: err.message,
          suggestion: 'Check server logs',
        },
      },
      500,
    );
  });

  app.get('/health', (c) => c.json({ status: 'ok', version: '0.1.0' }));

  app.use('/api/v1/*', apiKeyAuth(options.apiKey));

  app.route('/api/v1/users', userRoutes(store, currency));
  app.route('/api/v1/loans', loanRoutes(store, currency));

  return app;
}
