import { status } from '@grpc/grpc-js';
import type { Logger } from 'pino';
import type { RequestContext } from '../../application/context.js';
import type { UserService } from '../../application/users/userService.js';
import { toRpcError } from './rpcError.js';
import {
  createUserRequestSchema,
  deleteUserRequestSchema,
  getUserByEmailRequestSchema,
  getUserRequestSchema,
  listUsersRequestSchema,
  toWireUser,
  updateUserRequestSchema,
  type EmptyResponse,
  type ListUsersResponse,
  type UserResponse,
} from './userMessages.js';

/**
 * Decodes wire requests, calls the user service and encodes the result.
 * Every failure leaves as an RpcError.
 */
export class UserGrpcHandler {
  constructor(
    private userService: UserService,
    private logger: Logger
  ) {}

  async createUser(raw: unknown, ctx: RequestContext = {}): Promise<UserResponse> {
    return this.handle('create user', ctx, async () => {
      const request = createUserRequestSchema.parse(raw);
      const user = await this.userService.createUser(request, ctx);
      return { user: toWireUser(user) };
    });
  }

  async getUser(raw: unknown, ctx: RequestContext = {}): Promise<UserResponse> {
    return this.handle('get user', ctx, async () => {
      const { id } = getUserRequestSchema.parse(raw);
      const user = await this.userService.getUser(id, ctx);
      return { user: toWireUser(user) };
    });
  }

  async getUserByEmail(raw: unknown, ctx: RequestContext = {}): Promise<UserResponse> {
    return this.handle('get user', ctx, async () => {
      const { email } = getUserByEmailRequestSchema.parse(raw);
      const user = await this.userService.getUserByEmail(email, ctx);
      return { user: toWireUser(user) };
    });
  }

  async updateUser(raw: unknown, ctx: RequestContext = {}): Promise<UserResponse> {
    return this.handle('update user', ctx, async () => {
      const { id, ...updates } = updateUserRequestSchema.parse(raw);
      const user = await this.userService.updateUser(id, updates, ctx);
      return { user: toWireUser(user) };
    });
  }

  async deleteUser(raw: unknown, ctx: RequestContext = {}): Promise<EmptyResponse> {
    return this.handle('delete user', ctx, async () => {
      const { id } = deleteUserRequestSchema.parse(raw);
      await this.userService.deleteUser(id, ctx);
      return {};
    });
  }

  async listUsers(raw: unknown, ctx: RequestContext = {}): Promise<ListUsersResponse> {
    return this.handle('list users', ctx, async () => {
      const request = listUsersRequestSchema.parse(raw);
      const result = await this.userService.listUsers(request, ctx);
      return {
        users: result.users.map(toWireUser),
        total: result.total,
        page: result.page,
        pageSize: result.pageSize,
      };
    });
  }

  private async handle<T>(operation: string, ctx: RequestContext, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (error) {
      const rpcError = toRpcError(error, `failed to ${operation}`);
      if (rpcError.code === status.INTERNAL) {
        this.logger.error({ err: error, operation, requestId: ctx.requestId }, `Failed to ${operation}`);
      }
      throw rpcError;
    }
  }
}
