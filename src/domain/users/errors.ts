export class DomainError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class InvalidEmailError extends DomainError {
  constructor(message = 'Invalid email') {
    super(message);
  }
}

export class InvalidPasswordError extends DomainError {
  constructor(message = 'Invalid password') {
    super(message);
  }
}
