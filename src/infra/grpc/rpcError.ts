import { status } from '@grpc/grpc-js';
import { AlreadyExistsError, NotFoundError } from '../../application/errors.js';

/**
 * The only error a client ever sees. `message` is sent as the status details.
 */
export class RpcError extends Error {
  constructor(
    readonly code: status,
    message: string
  ) {
    super(message);
    this.name = 'RpcError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Anything that is not a known "already exists" or "not found" becomes
 * INTERNAL with the generic `failure` message.
 */
export function toRpcError(error: unknown, failure: string): RpcError {
  if (error instanceof RpcError) {
    return error;
  }
  if (error instanceof AlreadyExistsError) {
    return new RpcError(status.ALREADY_EXISTS, 'user already exists');
  }
  if (error instanceof NotFoundError) {
    return new RpcError(status.NOT_FOUND, 'user not found');
  }
  return new RpcError(status.INTERNAL, failure);
}
