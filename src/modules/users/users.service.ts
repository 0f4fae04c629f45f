import { z } from 'zod';
import type { UserStore } from './users.repository';
import type { CacheStore } from '../../connections/redis/cache.store';
import { NullCacheStore } from '../../connections/redis/cache.store';
import type { PublicUser, User } from '../../connections/db/models/user.model';
import { toPublicUser } from '../../connections/db/models/user.model';
import { gravatarUrl } from '../../utils/gravatar';
import { NotFoundError } from '../../utils/errors';
import { getLogger } from '../../utils/logging';

const log = getLogger('users');

const DEFAULT_CACHE_TTL_SECONDS = 900;

const cachedUserSchema = z.object({
  id: z.number().int(),
  username: z.string(),
  email: z.string(),
  avatar: z.string().nullable(),
  confirmed: z.boolean(),
  created_at: z.coerce.date(),
});

export interface Registration {
  username: string;
  email: string;
  /** Already hashed by the caller */
  password_hash: string;
}

const cacheKey = (username: string) => `user:${username}`;

/**
 * User directory: lookups, creation and the two mutations a user goes
 * through (email confirmation, avatar change). Resolved users are cached
 * by username; every mutation evicts the entry.
 */
export class UserService {
  constructor(
    private readonly store: UserStore,
    private readonly cache: CacheStore = new NullCacheStore(),
    private readonly cacheTtlSeconds: number = DEFAULT_CACHE_TTL_SECONDS
  ) {}

  getById(id: number): Promise<User | null> {
    return this.store.findById(id);
  }

  getByUsername(username: string): Promise<User | null> {
    return this.store.findByUsername(username);
  }

  getByEmail(email: string): Promise<User | null> {
    return this.store.findByEmail(email);
  }

  /**
   * Public view of a user by username, served from cache when possible.
   */
  async getProfileByUsername(username: string): Promise<PublicUser | null> {
    const cached = await this.cache.get(cacheKey(username));
    if (cached) {
      const parsed = cachedUserSchema.safeParse(safeJsonParse(cached));
      if (parsed.success) {
        return parsed.data;
      }
      log.warn('Discarding malformed cache entry', { username });
    }

    const user = await this.store.findByUsername(username);
    if (!user) {
      return null;
    }

    const profile = toPublicUser(user);
    await this.cache.set(cacheKey(username), JSON.stringify(profile), this.cacheTtlSeconds);
    return profile;
  }

  /**
   * Without an explicit avatar the user starts with their Gravatar image.
   */
  create(registration: Registration, avatar?: string | null): Promise<User> {
    return this.store.create({
      ...registration,
      avatar: avatar ?? gravatarUrl(registration.email),
    });
  }

  async confirmEmail(user: Pick<User, 'email' | 'username'>): Promise<void> {
    await this.store.confirmEmail(user.email);
    await this.cache.del(cacheKey(user.username));
  }

  async updateAvatar(user: Pick<User, 'email' | 'username'>, url: string): Promise<PublicUser> {
    const updated = await this.store.updateAvatar(user.email, url);
    if (!updated) {
      throw new NotFoundError('User is not found');
    }
    await this.cache.del(cacheKey(user.username));
    return toPublicUser(updated);
  }
}

const safeJsonParse = (raw: string): unknown => {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
};
