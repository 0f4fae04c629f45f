import type { NextFunction, Response } from 'express';
import type { Queryable, SessionClient, SessionPool } from '../connections/db/session';
import { RequestSession } from '../connections/db/session';
import type { CacheStore } from '../connections/redis/cache.store';
import type { AuthRequest } from '../types/request.types';
import type { Mailer } from '../utils/email.service';
import type { PasswordHasher } from '../modules/auth/password';
import type { TokenService } from '../modules/auth/token.service';
import { AuthService } from '../modules/auth/auth.service';
import type { UserStore } from '../modules/users/users.repository';
import { UserRepository } from '../modules/users/users.repository';
import { UserService } from '../modules/users/users.service';
import type { ContactStore } from '../modules/contacts/contacts.repository';
import { ContactRepository } from '../modules/contacts/contacts.repository';
import type { Clock } from '../modules/contacts/contacts.service';
import { ContactService } from '../modules/contacts/contacts.service';
import { logger } from '../utils/logging';

export interface Stores {
  users: UserStore;
  contacts: ContactStore;
}

export type StoreFactory = (db: Queryable) => Stores;

export const createPgStores: StoreFactory = (db) => ({
  users: new UserRepository(db),
  contacts: new ContactRepository(db),
});

/**
 * Process-wide collaborators shared by every request.
 */
export interface ScopeDependencies {
  pool: SessionPool;
  cache: CacheStore;
  cacheTtlSeconds: number;
  hasher: PasswordHasher;
  tokens: TokenService;
  mailer: Mailer;
  createStores?: StoreFactory;
  clock?: Clock;
}

export interface RequestScope {
  tokens: TokenService;
  users: UserService;
  auth: AuthService;
  contacts: ContactService;
}

export const buildScope = (db: Queryable, deps: ScopeDependencies): RequestScope => {
  const stores = (deps.createStores ?? createPgStores)(db);
  const users = new UserService(stores.users, deps.cache, deps.cacheTtlSeconds);

  return {
    tokens: deps.tokens,
    users,
    auth: new AuthService({
      users,
      hasher: deps.hasher,
      tokens: deps.tokens,
      mailer: deps.mailer,
    }),
    contacts: new ContactService(stores.contacts, deps.clock),
  };
};

/**
 * Borrow one pooled client for the lifetime of the request. It goes back to
 * the pool after the response finishes or the connection closes, and only
 * once the handler's queries and transactions have settled.
 */
export const requestScope = (deps: ScopeDependencies) => {
  return async (req: AuthRequest, res: Response, next: NextFunction) => {
    let client: SessionClient;
    try {
      client = await deps.pool.connect();
    } catch (error: unknown) {
      logger.error('[Scope] Could not acquire a database session', {
        error: error instanceof Error ? error.message : String(error),
      });
      next(error);
      return;
    }

    const session = new RequestSession(client);
    res.on('finish', () => session.end());
    res.on('close', () => session.end());

    req.scope = buildScope(session, deps);
    next();
  };
};

export const getScope = (req: AuthRequest): RequestScope => {
  if (!req.scope) {
    throw new Error('Request scope is not initialized; is requestScope mounted?');
  }
  return req.scope;
};
