import type { Response, NextFunction } from 'express';
import type { AuthRequest } from '../../types/request.types';
import { getScope } from '../../middlewares/scope.middleware';
import {
  registerSchema,
  loginSchema,
  requestEmailSchema,
  confirmEmailParamsSchema,
} from './auth.validation';
import { ResponseHandler } from '../../utils/response';

/**
 * Origin the confirmation link should point back to
 */
const requestBaseUrl = (req: AuthRequest): string => `${req.protocol}://${req.get('host') ?? 'localhost'}`;

export const register = async (req: AuthRequest, res: Response, next: NextFunction) => {
  try {
    const validated = registerSchema.parse(req.body);
    const user = await getScope(req).auth.register(validated, requestBaseUrl(req));

    ResponseHandler.created(res, user, 'User registered. Check your email for confirmation link');
  } catch (error: unknown) {
    next(error);
  }
};

export const login = async (req: AuthRequest, res: Response, next: NextFunction) => {
  try {
    const { username, password } = loginSchema.parse(req.body);
    const token = await getScope(req).auth.login(username, password);

    ResponseHandler.success(res, token, 'Login successful');
  } catch (error: unknown) {
    next(error);
  }
};

export const confirmEmail = async (req: AuthRequest, res: Response, next: NextFunction) => {
  try {
    const { token } = confirmEmailParamsSchema.parse(req.params);
    const message = await getScope(req).auth.confirmEmail(token);

    ResponseHandler.success(res, undefined, message);
  } catch (error: unknown) {
    next(error);
  }
};

export const requestEmail = async (req: AuthRequest, res: Response, next: NextFunction) => {
  try {
    const { email } = requestEmailSchema.parse(req.body);
    const message = await getScope(req).auth.requestEmail(email, requestBaseUrl(req));

    ResponseHandler.success(res, undefined, message);
  } catch (error: unknown) {
    next(error);
  }
};
