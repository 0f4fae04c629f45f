import type { Response, NextFunction } from 'express';
import type { AuthRequest } from '../types/request.types';
import type { PublicUser } from '../connections/db/models/user.model';
import type { TokenService } from '../modules/auth/token.service';
import type { UserService } from '../modules/users/users.service';
import { UnauthorizedError } from '../utils/errors';
import { logger } from '../utils/logging';
import { getScope } from './scope.middleware';

const BEARER_PATTERN = /^Bearer\s+(\S+)\s*$/i;

export const extractBearerToken = (header: string | undefined): string | null => {
  const match = header ? BEARER_PATTERN.exec(header) : null;
  return match ? match[1] : null;
};

/**
 * Map a session token to its user. A bad signature, an expired token, an
 * empty subject and an unknown user all fail the same way.
 */
export const resolveUserFromToken = async (
  tokens: TokenService,
  users: UserService,
  token: string
): Promise<PublicUser> => {
  let username: string;
  try {
    username = tokens.verifySessionToken(token).sub;
  } catch (error: unknown) {
    logger.debug('[Auth] Token rejected', { error: error instanceof Error ? error.message : String(error) });
    throw new UnauthorizedError();
  }

  const user = await users.getProfileByUsername(username);
  if (!user) {
    throw new UnauthorizedError();
  }

  return user;
};

export const authenticate = async (
  req: AuthRequest,
  _res: Response,
  next: NextFunction
) => {
  try {
    const token = extractBearerToken(req.headers.authorization);

    if (!token) {
      throw new UnauthorizedError('Not authenticated');
    }

    const scope = getScope(req);
    req.user = await resolveUserFromToken(scope.tokens, scope.users, token);

    next();
  } catch (error: unknown) {
    next(error);
  }
};

export const getCurrentUser = (req: AuthRequest): PublicUser => {
  if (!req.user) {
    throw new UnauthorizedError();
  }
  return req.user;
};
