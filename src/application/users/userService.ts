import type { Logger } from 'pino';
import type { RequestContext } from '../context.js';
import type { UserRepository } from './userRepository.js';
import { InternalError } from '../errors.js';
import { Password } from '../../domain/users/password.js';
import { InvalidEmailError, InvalidPasswordError } from '../../domain/users/errors.js';
import { applyUserUpdate, type User, type UserUpdate } from '../../domain/users/user.js';

export const DEFAULT_PAGE_SIZE = 10;
export const MAX_PAGE_SIZE = 100;

export interface CreateUserCommand {
  email: string;
  password: string;
  firstName?: string;
  lastName?: string;
  phone?: string;
}

export interface ListUsersQuery {
  page: number;
  pageSize: number;
  filter?: string;
}

export interface UserPage {
  users: User[];
  total: number;
  page: number;
  pageSize: number;
}

export interface UserService {
  createUser(command: CreateUserCommand, ctx?: RequestContext): Promise<User>;
  getUser(id: string, ctx?: RequestContext): Promise<User>;
  getUserByEmail(email: string, ctx?: RequestContext): Promise<User>;
  updateUser(id: string, updates: UserUpdate, ctx?: RequestContext): Promise<User>;
  deleteUser(id: string, ctx?: RequestContext): Promise<void>;
  listUsers(query: ListUsersQuery, ctx?: RequestContext): Promise<UserPage>;
  validateCredential(email: string, password: string, ctx?: RequestContext): Promise<User>;
}

/**
 * Page below 1 becomes 1; a page size outside [1, MAX_PAGE_SIZE] becomes the default.
 */
export function clampPagination(page: number, pageSize: number): { page: number; pageSize: number } {
  return {
    page: Number.isInteger(page) && page >= 1 ? page : 1,
    pageSize:
      Number.isInteger(pageSize) && pageSize >= 1 && pageSize <= MAX_PAGE_SIZE
        ? pageSize
        : DEFAULT_PAGE_SIZE,
  };
}

export class DefaultUserService implements UserService {
  constructor(
    private userRepo: UserRepository,
    private logger: Logger
  ) {}

  async createUser(command: CreateUserCommand, ctx: RequestContext = {}): Promise<User> {
    this.logger.info({ email: command.email, requestId: ctx.requestId }, 'Creating new user');

    if (command.email === '') {
      throw new InvalidEmailError();
    }
    // Length in code points, so a surrogate pair counts once
    if (command.password === '' || [...command.password].length < Password.MIN_LENGTH) {
      throw new InvalidPasswordError();
    }

    let passwordHash: string;
    try {
      passwordHash = await Password.hash(command.password);
    } catch (error) {
      throw new InternalError('Failed to hash password', { cause: error });
    }

    const user = await this.userRepo.create(
      {
        email: command.email,
        passwordHash,
        firstName: command.firstName ?? '',
        lastName: command.lastName ?? '',
        phone: command.phone ?? '',
        status: 'active',
      },
      ctx
    );

    this.logger.info({ userId: user.id, email: user.email, requestId: ctx.requestId }, 'User created');
    return user;
  }

  async getUser(id: string, ctx: RequestContext = {}): Promise<User> {
    this.logger.debug({ userId: id, requestId: ctx.requestId }, 'Getting user');
    return await this.userRepo.getById(id, ctx);
  }

  async getUserByEmail(email: string, ctx: RequestContext = {}): Promise<User> {
    this.logger.debug({ email, requestId: ctx.requestId }, 'Getting user by email');
    return await this.userRepo.getByEmail(email, ctx);
  }

  async updateUser(id: string, updates: UserUpdate, ctx: RequestContext = {}): Promise<User> {
    this.logger.info({ userId: id, fields: Object.keys(updates), requestId: ctx.requestId }, 'Updating user');

    const existing = await this.userRepo.getById(id, ctx);
    const updated = await this.userRepo.update(applyUserUpdate(existing, updates), ctx);

    this.logger.info({ userId: id, requestId: ctx.requestId }, 'User updated');
    return updated;
  }

  async deleteUser(id: string, ctx: RequestContext = {}): Promise<void> {
    this.logger.info({ userId: id, requestId: ctx.requestId }, 'Deleting user');
    await this.userRepo.delete(id, ctx);
    this.logger.info({ userId: id, requestId: ctx.requestId }, 'User deleted');
  }

  async listUsers(query: ListUsersQuery, ctx: RequestContext = {}): Promise<UserPage> {
    const { page, pageSize } = clampPagination(query.page, query.pageSize);
    const filter = query.filter ?? '';
    this.logger.debug({ page, pageSize, filter, requestId: ctx.requestId }, 'Listing users');

    const { users, total } = await this.userRepo.list(page, pageSize, filter, ctx);
    return { users, total, page, pageSize };
  }

  async validateCredential(email: string, password: string, ctx: RequestContext = {}): Promise<User> {
    this.logger.debug({ email, requestId: ctx.requestId }, 'Validating user credential');

    const user = await this.userRepo.getByEmail(email, ctx);

    let matches: boolean;
    try {
      matches = await Password.verify(password, user.passwordHash);
    } catch (error) {
      throw new InternalError('Failed to verify password', { cause: error });
    }

    if (!matches) {
      this.logger.warn({ email, requestId: ctx.requestId }, 'Invalid password attempt');
      throw new InvalidPasswordError();
    }

    return user;
  }
}
