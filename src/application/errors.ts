/**
 * Application-level errors shared by the repository and the service.
 * The gRPC layer is the only place that turns these into status codes.
 */
export class InvalidInputError extends Error {
  constructor(message = 'Invalid input') {
    super(message);
    this.name = 'InvalidInputError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class NotFoundError extends Error {
  constructor(message = 'Resource not found') {
    super(message);
    this.name = 'NotFoundError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class AlreadyExistsError extends Error {
  constructor(message = 'Resource already exists') {
    super(message);
    this.name = 'AlreadyExistsError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Unexpected failure (storage, hashing, aborted request). `cause` keeps the original.
 */
export class InternalError extends Error {
  constructor(message = 'Internal error', options?: ErrorOptions) {
    super(message, options);
    this.name = 'InternalError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
