import type { Request } from 'express';
import type { PublicUser } from '../connections/db/models/user.model';
import type { RequestScope } from '../middlewares/scope.middleware';

/**
 * Request after the scope and auth middlewares have run.
 * Both fields stay optional so handlers typed with it remain plain Express handlers.
 */
export interface AuthRequest extends Request {
  /** Services bound to this request's database session */
  scope?: RequestScope;
  /** Set by `authenticate` */
  user?: PublicUser;
}

