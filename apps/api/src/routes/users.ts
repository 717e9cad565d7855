import { Hono } from 'hono';
import { z } from 'zod';
import type { LoanStore, User } from '@loan-amort/engine';
import { AppError, notFound } from '../errors.js';
import { parseJson } from '../validation.js';
import { formatLoan } from './loans.js';

const createUserSchema = z.object({
  username: z.string().trim().min(1),
  email: z.string().email(),
});

function formatUser(user: User) {
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    createdAt: user.createdAt,
  };
}

export function userRoutes(store: LoanStore, currency: string) {
  const router = new Hono();

  // GET / — list users
  router.get('/', (c) => {
    return c.json(store.listUsers().map(formatUser));
  });

  // POST / — create user with unique username and email
  router.post('/', async (c) => {
    const data = await parseJson(c, createUserSchema);

    if (store.findUserByUsernameOrEmail(data.username, data.email)) {
      throw new AppError(
        'DUPLICATE_USER',
        'Username or email already exists',
        400,
        'Choose a different username or email',
      );
    }

    const created = store.createUser(data);
    return c.json(formatUser(created), 201);
  });

  // GET /:id/loans — loans owned by a user
  router.get('/:id/loans', (c) => {
    const id = c.req.param('id');
    if (!store.getUser(id)) throw notFound('User', id);

    return c.json(store.listLoansForUser(id).map((loan) => formatLoan(loan, currency)));
  });

  return router;
}
