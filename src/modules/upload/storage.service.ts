/**
 * Storage Service - routes avatar uploads to the configured backends
 */

import type { StorageConfig } from '../../connections/config/app.config';
import type { StorageMode } from './storage.config';
import { resolveStorageMode } from './storage.config';
import { CloudflareImagesClient } from './cloudflare.service';
import { LocalFileStorage } from './localStorage.service';
import { logger } from '../../utils/logging';

export interface AvatarUpload {
  buffer: Buffer;
  fileName: string;
  mimeType: string;
  username: string;
}

/**
 * What the users module needs: put an image somewhere public, get its URL back.
 */
export interface AvatarStorage {
  uploadAvatar(upload: AvatarUpload): Promise<string>;
}

const AVATAR_DIR = 'avatars';

const errorMessage = (error: unknown) => (error instanceof Error ? error.message : String(error));

/**
 * With both backends enabled the Cloudflare URL wins and the local copy is
 * the fallback; the upload fails only when no backend stored the file.
 */
export class StorageService implements AvatarStorage {
  constructor(
    private readonly mode: StorageMode,
    private readonly cloudflare: CloudflareImagesClient | null,
    private readonly local: LocalFileStorage | null
  ) {}

  async uploadAvatar({ buffer, fileName, mimeType, username }: AvatarUpload): Promise<string> {
    let url: string | null = null;

    if (this.mode.useCloudflare && this.cloudflare) {
      try {
        url = await this.cloudflare.uploadImage(buffer, fileName, mimeType, { username, kind: 'avatar' });
      } catch (error: unknown) {
        logger.error('Cloudflare upload failed', { username, error: errorMessage(error) });
        if (!this.mode.useLocal) {
          throw new Error(`Cloudflare upload failed: ${errorMessage(error)}`);
        }
      }
    }

    if (this.mode.useLocal && this.local) {
      try {
        const localUrl = await this.local.save(buffer, fileName, AVATAR_DIR, username);
        url = url ?? localUrl;
      } catch (error: unknown) {
        logger.error('Local storage save failed', { username, error: errorMessage(error) });
        if (!url) {
          throw new Error(`Local storage save failed: ${errorMessage(error)}`);
        }
      }
    }

    if (!url) {
      throw new Error('Failed to upload file to any storage');
    }

    return url;
  }
}

export const createAvatarStorage = (config: StorageConfig): StorageService => {
  const mode = resolveStorageMode(config);

  const cloudflare = mode.useCloudflare
    ? new CloudflareImagesClient({
        accountId: config.cloudflareAccountId,
        apiToken: config.cloudflareApiToken,
      })
    : null;
  const local = mode.useLocal ? new LocalFileStorage(config.uploadDir, config.baseUrl) : null;

  return new StorageService(mode, cloudflare, local);
};
