/**
 * Storage Configuration
 * Decides which backends an upload goes to: cloudflare, local, or both
 */

import type { StorageConfig, StorageType } from '../../connections/config/app.config';
import { logger } from '../../utils/logging';

export interface StorageMode {
  type: StorageType;
  useCloudflare: boolean;
  useLocal: boolean;
}

/**
 * Resolve the effective storage mode. A Cloudflare mode without credentials
 * degrades to local only.
 */
export const resolveStorageMode = (config: StorageConfig): StorageMode => {
  const useCloudflare = config.type === 'cloudflare' || config.type === 'both';
  const useLocal = config.type === 'local' || config.type === 'both';

  if (useCloudflare && !(config.cloudflareAccountId && config.cloudflareApiToken)) {
    logger.warn('STORAGE_TYPE requires Cloudflare but config is missing. Falling back to local only.');
    return {
      type: 'local',
      useCloudflare: false,
      useLocal: true,
    };
  }

  return {
    type: config.type,
    useCloudflare,
    useLocal,
  };
};
