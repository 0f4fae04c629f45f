import type { Response, NextFunction } from 'express';
import type { AuthRequest } from '../../types/request.types';
import type { AvatarStorage } from '../upload/storage.service';
import { getScope } from '../../middlewares/scope.middleware';
import { getCurrentUser } from '../../middlewares/auth.middleware';
import { BadRequestError } from '../../utils/errors';
import { ResponseHandler } from '../../utils/response';
import { auditLog } from '../../utils/logging';

export const me = (req: AuthRequest, res: Response, next: NextFunction) => {
  try {
    ResponseHandler.success(res, getCurrentUser(req));
  } catch (error: unknown) {
    next(error);
  }
};

export const updateAvatar =
  (storage: AvatarStorage) => async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const user = getCurrentUser(req);

      if (!req.file) {
        throw new BadRequestError('No file provided');
      }

      const { buffer, originalname, mimetype } = req.file;
      const url = await storage.uploadAvatar({
        buffer,
        fileName: originalname,
        mimeType: mimetype,
        username: user.username,
      });

      const updated = await getScope(req).users.updateAvatar(user, url);
      auditLog('AVATAR_UPDATED', { userId: updated.id, avatar: url });

      ResponseHandler.success(res, updated, 'Avatar updated');
    } catch (error: unknown) {
      next(error);
    }
  };
