import express from 'express';
import type { RequestHandler } from 'express';
import * as usersController from './users.controller';
import type { AvatarStorage } from '../upload/storage.service';
import { authenticate } from '../../middlewares/auth.middleware';
import { createProfileLimiter } from '../../middlewares/rateLimit.middleware';
import { createAvatarUpload } from '../../middlewares/upload.middleware';

export interface UsersRouterOptions {
  storage: AvatarStorage;
  maxFileSize: number;
  profileLimiter?: RequestHandler;
}

export const createUsersRouter = ({ storage, maxFileSize, profileLimiter }: UsersRouterOptions) => {
  const router = express.Router();

  router.get('/me', profileLimiter ?? createProfileLimiter(), authenticate, usersController.me);

  router.patch('/avatar', authenticate, createAvatarUpload(maxFileSize), usersController.updateAvatar(storage));

  return router;
};
