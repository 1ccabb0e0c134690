import { z } from 'zod';
import redisClient from '../config/redis';
import { config } from '../config/environment';
import { User, UserRole } from '../types';
import { logWarn } from '../utils/logger';

export interface UserCache {
  get(id: string): Promise<User | null>;
  set(user: User): Promise<void>;
  invalidate(id: string): Promise<void>;
}

const cachedUserSchema = z.object({
  id: z.string(),
  role: z.nativeEnum(UserRole),
  username: z.string(),
  firstName: z.string(),
  lastName: z.string(),
  email: z.string(),
  phoneNumber: z.string(),
  createdAt: z.coerce.date(),
  updatedAt: z.coerce.date()
});

const userKey = (id: string) => `user:${id}`;

/** The redis commands the cache issues */
export type UserCacheClient = Pick<typeof redisClient, 'get' | 'setEx' | 'del'>;

function parseCachedUser(cached: string): User | null {
  try {
    const parsed = cachedUserSchema.safeParse(JSON.parse(cached));
    return parsed.success ? parsed.data : null;
  } catch (error) {
    logWarn('Discarding unreadable cached user', { error: error instanceof Error ? error.message : String(error) });
    return null;
  }
}

/**
 * Short-lived redis copy of user records, read by ride validation on every
 * create/update. Entries that no longer parse are treated as misses.
 */
export class RedisUserCache implements UserCache {
  constructor(
    private readonly client: UserCacheClient = redisClient,
    private readonly ttlSeconds: number = config.cache.userTtlSeconds
  ) {}

  async get(id: string): Promise<User | null> {
    const cached = await this.client.get(userKey(id));
    if (!cached) {
      return null;
    }
    return parseCachedUser(cached);
  }

  async set(user: User): Promise<void> {
    await this.client.setEx(userKey(user.id), this.ttlSeconds, JSON.stringify(user));
  }

  async invalidate(id: string): Promise<void> {
    await this.client.del(userKey(id));
  }
}
