import type { RequestContext } from '../context.js';
import type { NewUser, User, UserChanges } from '../../domain/users/user.js';

export interface UserListResult {
  users: User[];
  total: number;
}

/**
 * Storage contract for users. Implementations only ever see rows that are
 * not soft-deleted, and report outcomes through the errors in
 * `application/errors.ts`:
 *
 * - `InvalidInputError` for a malformed argument (e.g. empty id on update)
 * - `NotFoundError` when no active row matches
 * - `AlreadyExistsError` when an active row already holds the email
 * - `InternalError` for any storage failure, wrapping the cause
 */
export interface UserRepository {
  create(user: NewUser, ctx?: RequestContext): Promise<User>;
  getById(id: string, ctx?: RequestContext): Promise<User>;
  getByEmail(email: string, ctx?: RequestContext): Promise<User>;
  update(user: UserChanges, ctx?: RequestContext): Promise<User>;
  delete(id: string, ctx?: RequestContext): Promise<void>;
  /**
   * `page` and `pageSize` are already validated (>= 1) by the caller.
   * An empty `filter` matches every active row.
   */
  list(page: number, pageSize: number, filter: string, ctx?: RequestContext): Promise<UserListResult>;
}
