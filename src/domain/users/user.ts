export const USER_STATUSES = ['active', 'inactive', 'suspended'] as const;

export type UserStatus = (typeof USER_STATUSES)[number];

export function isUserStatus(value: string): value is UserStatus {
  return USER_STATUSES.some((status) => status === value);
}

/**
 * User entity as stored. `passwordHash` is a one-way Argon2 hash and never
 * leaves the service boundary; rows with a non-null `deletedAt` are never
 * returned by the repository.
 */
export interface User {
  readonly id: string;
  readonly email: string;
  readonly passwordHash: string;
  readonly firstName: string;
  readonly lastName: string;
  readonly phone: string;
  readonly status: UserStatus;
  readonly createdAt: Date;
  readonly updatedAt: Date;
  readonly deletedAt: Date | null;
}

/**
 * Fields supplied on insert. Storage assigns id and timestamps.
 */
export interface NewUser {
  email: string;
  passwordHash: string;
  firstName: string;
  lastName: string;
  phone: string;
  status?: UserStatus;
}

/**
 * The mutable part of a user, written back as a whole by the repository.
 */
export type UserChanges = Pick<User, 'id' | 'email' | 'firstName' | 'lastName' | 'phone' | 'status'>;

/**
 * Sparse update: an absent key leaves the field unchanged.
 * The credential is not part of it.
 */
export interface UserUpdate {
  email?: string;
  firstName?: string;
  lastName?: string;
  phone?: string;
  status?: UserStatus;
}

export function applyUserUpdate(user: User, update: UserUpdate): UserChanges {
  return {
    id: user.id,
    email: update.email ?? user.email,
    firstName: update.firstName ?? user.firstName,
    lastName: update.lastName ?? user.lastName,
    phone: update.phone ?? user.phone,
    status: update.status ?? user.status,
  };
}
