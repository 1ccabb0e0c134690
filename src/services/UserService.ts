import { Page, User, UserChanges, UserInput } from '../types';
import { UserListQuery, UserRepository } from '../database/repositories';
import { ConflictError, isUniqueViolation, NotFoundError } from '../utils/errors';
import { logInfo } from '../utils/logger';
import { UserCache } from './UserCache';

export class UserService {
  constructor(
    private readonly users: UserRepository,
    private readonly cache?: UserCache
  ) {}

  /**
   * Look a user up, cache first. Returns null when the user does not exist.
   */
  async findUser(userId: string): Promise<User | null> {
    if (this.cache) {
      const cached = await this.cache.get(userId);
      if (cached) {
        return cached;
      }
    }

    const user = await this.users.findById(userId);
    if (user && this.cache) {
      await this.cache.set(user);
    }
    return user;
  }

  async getUser(userId: string): Promise<User> {
    const user = await this.findUser(userId);
    if (!user) {
      throw new NotFoundError('User not found', { userId });
    }
    return user;
  }

  async listUsers(query: UserListQuery): Promise<Page<User>> {
    return this.users.list(query);
  }

  async createUser(input: UserInput): Promise<User> {
    const data = { ...input, email: input.email.trim(), username: input.username.trim() };
    await this.assertUnique(data.email, data.username);

    try {
      const user = await this.users.create(data);
      logInfo('User created', { userId: user.id, role: user.role });
      return user;
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError('A user with this username or email already exists.');
      }
      throw error;
    }
  }

  async updateUser(userId: string, changes: UserChanges): Promise<User> {
    const data: UserChanges = { ...changes };
    if (data.email !== undefined) data.email = data.email.trim();
    if (data.username !== undefined) data.username = data.username.trim();

    const existing = await this.users.findById(userId);
    if (!existing) {
      throw new NotFoundError('User not found', { userId });
    }
    await this.assertUnique(data.email, data.username, userId);

    let updated: User | null;
    try {
      updated = await this.users.update(userId, data);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError('A user with this username or email already exists.');
      }
      throw error;
    }
    if (!updated) {
      throw new NotFoundError('User not found', { userId });
    }

    await this.cache?.invalidate(userId);
    return updated;
  }

  /**
   * Delete a user. Their rides, as rider or driver, and those rides' events
   * go with them.
   */
  async deleteUser(userId: string): Promise<void> {
    const deleted = await this.users.delete(userId);
    if (!deleted) {
      throw new NotFoundError('User not found', { userId });
    }
    await this.cache?.invalidate(userId);
    logInfo('User deleted', { userId });
  }

  private async assertUnique(email: string | undefined, username: string | undefined, excludeId?: string): Promise<void> {
    if (email !== undefined && (await this.users.emailTaken(email, excludeId))) {
      throw new ConflictError('A user with this email already exists.', { field: 'email' });
    }
    if (username !== undefined && (await this.users.usernameTaken(username, excludeId))) {
      throw new ConflictError('A user with this username already exists.', { field: 'username' });
    }
  }
}
