import express from 'express';
import { createAuthRouter } from '../modules/auth/auth.routes';
import { createUsersRouter } from '../modules/users/users.routes';
import type { UsersRouterOptions } from '../modules/users/users.routes';
import { createContactsRouter } from '../modules/contacts/contacts.routes';

export const createApiRouter = (users: UsersRouterOptions) => {
  const router = express.Router();

  // API Routes
  router.use('/auth', createAuthRouter());
  router.use('/users', createUsersRouter(users));
  router.use('/contacts', createContactsRouter());

  return router;
};
