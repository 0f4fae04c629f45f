import multer from 'multer';
import { BadRequestError } from '../utils/errors';

export const AVATAR_MIME_TYPES = ['image/jpeg', 'image/jpg', 'image/png', 'image/gif', 'image/webp'];

/**
 * Single `file` field kept in memory, images only
 */
export const createAvatarUpload = (maxFileSize: number) =>
  multer({
    storage: multer.memoryStorage(),
    limits: {
      fileSize: maxFileSize,
      files: 1,
    },
    fileFilter: (_req, file, cb) => {
      if (AVATAR_MIME_TYPES.includes(file.mimetype)) {
        cb(null, true);
      } else {
        cb(new BadRequestError(`File type ${file.mimetype} is not supported`));
      }
    },
  }).single('file');
