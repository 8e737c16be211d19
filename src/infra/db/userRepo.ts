import type { Pool, PoolClient, QueryResult, QueryResultRow } from 'pg';
import { z } from 'zod';
import type { RequestContext } from '../../application/context.js';
import type { UserListResult, UserRepository } from '../../application/users/userRepository.js';
import {
  AlreadyExistsError,
  InternalError,
  InvalidInputError,
  NotFoundError,
} from '../../application/errors.js';
import {
  USER_STATUSES,
  isUserStatus,
  type NewUser,
  type User,
  type UserChanges,
} from '../../domain/users/user.js';
import { withSignal } from './withSignal.js';

/**
 * The slice of `pg.Pool` the repository needs: `connect` to run a statement
 * on a client of its own, `query` to cancel that client's backend.
 */
export type Queryable = Pick<Pool, 'query' | 'connect'>;

type UserRow = {
  id: string;
  email: string;
  password_hash: string;
  first_name: string;
  last_name: string;
  phone: string;
  status: string;
  created_at: Date;
  updated_at: Date;
  deleted_at: Date | null;
};

const USER_COLUMNS = `id, email, password_hash, first_name, last_name, phone,
       status, created_at, updated_at, deleted_at`;

const PG_UNIQUE_VIOLATION = '23505';

const newUserSchema = z.object({
  email: z.string().min(1),
  passwordHash: z.string().min(1),
  firstName: z.string(),
  lastName: z.string(),
  phone: z.string(),
  status: z.enum(USER_STATUSES).optional(),
});

const userIdSchema = z.string().uuid();

function mapRow(row: UserRow): User {
  return {
    id: row.id,
    email: row.email,
    passwordHash: row.password_hash,
    firstName: row.first_name,
    lastName: row.last_name,
    phone: row.phone,
    // The column carries a CHECK constraint, so this only guards hand-edited rows
    status: isUserStatus(row.status) ? row.status : 'active',
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    deletedAt: row.deleted_at,
  };
}

function pgErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function backendPid(client: PoolClient): number | undefined {
  // Set by the driver from the server's BackendKeyData message
  return 'processID' in client && typeof client.processID === 'number' ? client.processID : undefined;
}

/**
 * Escape LIKE metacharacters so the filter is matched as a literal substring.
 */
export function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

/**
 * PostgreSQL-backed user repository. Soft-deleted rows are excluded by an
 * explicit `deleted_at IS NULL` predicate in every statement.
 */
export class PgUserRepo implements UserRepository {
  constructor(private db: Queryable) {}

  async create(user: NewUser, ctx: RequestContext = {}): Promise<User> {
    if (!newUserSchema.safeParse(user).success) {
      throw new InvalidInputError('Invalid user data');
    }

    // Not atomic with the insert: the partial unique index settles races
    const existing = await this.run<{ id: string }>(
      'SELECT id FROM users WHERE email = $1 AND deleted_at IS NULL LIMIT 1',
      [user.email],
      ctx,
      'Failed to check existing user'
    );
    if (existing.rows.length > 0) {
      throw new AlreadyExistsError('User already exists');
    }

    const result = await this.run<UserRow>(
      `INSERT INTO users (email, password_hash, first_name, last_name, phone, status)
       VALUES ($1, $2, $3, $4, $5, $6)
       RETURNING ${USER_COLUMNS}`,
      [user.email, user.passwordHash, user.firstName, user.lastName, user.phone, user.status ?? 'active'],
      ctx,
      'Failed to create user'
    );

    return mapRow(result.rows[0]);
  }

  async getById(id: string, ctx: RequestContext = {}): Promise<User> {
    // The id column is a UUID; anything else cannot match a row
    if (!userIdSchema.safeParse(id).success) {
      throw new NotFoundError('User not found');
    }

    const result = await this.run<UserRow>(
      `SELECT ${USER_COLUMNS}
       FROM users
       WHERE id = $1 AND deleted_at IS NULL`,
      [id],
      ctx,
      'Failed to get user'
    );

    if (result.rows.length === 0) {
      throw new NotFoundError('User not found');
    }
    return mapRow(result.rows[0]);
  }

  async getByEmail(email: string, ctx: RequestContext = {}): Promise<User> {
    const result = await this.run<UserRow>(
      `SELECT ${USER_COLUMNS}
       FROM users
       WHERE email = $1 AND deleted_at IS NULL`,
      [email],
      ctx,
      'Failed to get user by email'
    );

    if (result.rows.length === 0) {
      throw new NotFoundError('User not found');
    }
    return mapRow(result.rows[0]);
  }

  async update(user: UserChanges, ctx: RequestContext = {}): Promise<User> {
    if (!user || !user.id) {
      throw new InvalidInputError('Invalid user data');
    }
    if (!userIdSchema.safeParse(user.id).success) {
      throw new NotFoundError('User not found');
    }

    const result = await this.run<UserRow>(
      `UPDATE users
       SET email = $2, first_name = $3, last_name = $4, phone = $5, status = $6,
           updated_at = NOW()
       WHERE id = $1 AND deleted_at IS NULL
       RETURNING ${USER_COLUMNS}`,
      [user.id, user.email, user.firstName, user.lastName, user.phone, user.status],
      ctx,
      'Failed to update user'
    );

    if (result.rows.length === 0) {
      throw new NotFoundError('User not found');
    }
    return mapRow(result.rows[0]);
  }

  async delete(id: string, ctx: RequestContext = {}): Promise<void> {
    if (!userIdSchema.safeParse(id).success) {
      throw new NotFoundError('User not found');
    }

    const result = await this.run(
      `UPDATE users
       SET deleted_at = NOW(), updated_at = NOW()
       WHERE id = $1 AND deleted_at IS NULL`,
      [id],
      ctx,
      'Failed to delete user'
    );

    if (!result.rowCount) {
      throw new NotFoundError('User not found');
    }
  }

  async list(
    page: number,
    pageSize: number,
    filter: string,
    ctx: RequestContext = {}
  ): Promise<UserListResult> {
    let where = 'deleted_at IS NULL';
    const params: unknown[] = [];

    if (filter !== '') {
      params.push(`%${escapeLike(filter)}%`);
      where += ' AND (first_name LIKE $1 OR last_name LIKE $1 OR email LIKE $1)';
    }

    const countResult = await this.run<{ total: string }>(
      `SELECT COUNT(*) AS total FROM users WHERE ${where}`,
      params,
      ctx,
      'Failed to count users'
    );

    const offset = (page - 1) * pageSize;
    const limitParam = params.length + 1;
    const rowsResult = await this.run<UserRow>(
      `SELECT ${USER_COLUMNS}
       FROM users
       WHERE ${where}
       ORDER BY created_at ASC, id ASC
       LIMIT $${limitParam} OFFSET $${limitParam + 1}`,
      [...params, pageSize, offset],
      ctx,
      'Failed to list users'
    );

    return {
      users: rowsResult.rows.map(mapRow),
      total: Number(countResult.rows[0].total),
    };
  }

  /**
   * Run one statement under the request's signal and translate driver errors.
   */
  private async run<R extends QueryResultRow = QueryResultRow>(
    text: string,
    values: unknown[],
    ctx: RequestContext,
    failure: string
  ): Promise<QueryResult<R>> {
    try {
      ctx.signal?.throwIfAborted();
      const client = await this.db.connect();
      return await this.runOnClient<R>(client, text, values, ctx.signal);
    } catch (error) {
      if (pgErrorCode(error) === PG_UNIQUE_VIOLATION) {
        throw new AlreadyExistsError('User already exists');
      }
      throw new InternalError(failure, { cause: error });
    }
  }

  /**
   * An abort stops the caller waiting and cancels the statement on the
   * server. The client goes back to the pool only after the statement has
   * settled and any cancel request has been answered.
   */
  private runOnClient<R extends QueryResultRow>(
    client: PoolClient,
    text: string,
    values: unknown[],
    signal?: AbortSignal
  ): Promise<QueryResult<R>> {
    if (signal?.aborted) {
      client.release();
      return Promise.reject(signal.reason);
    }

    const statement = client.query<R>(text, values);

    // Resolves with the cancel request's failure, if any
    let cancelFailure: Promise<unknown> = Promise.resolve(undefined);
    const onAbort = (): void => {
      cancelFailure = this.cancelBackend(client).then(
        () => undefined,
        (error: unknown) => error
      );
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    const releaseClient = async (): Promise<void> => {
      signal?.removeEventListener('abort', onAbort);
      const failure = await cancelFailure;
      if (failure === undefined) {
        client.release();
        return;
      }
      // A failed cancel leaves the connection in an unknown state: destroy it
      client.release(failure instanceof Error ? failure : true);
    };
    void statement.then(releaseClient, releaseClient);

    return withSignal(statement, signal);
  }

  private async cancelBackend(client: PoolClient): Promise<void> {
    const pid = backendPid(client);
    if (pid === undefined) {
      throw new Error('Backend process id unknown, cannot cancel statement');
    }
    await this.db.query('SELECT pg_cancel_backend($1)', [pid]);
  }
}
