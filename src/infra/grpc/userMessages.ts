import { z } from 'zod';
import type { User, UserStatus } from '../../domain/users/user.js';

export const WIRE_USER_STATUSES = [
  'USER_STATUS_UNSPECIFIED',
  'USER_STATUS_ACTIVE',
  'USER_STATUS_INACTIVE',
  'USER_STATUS_SUSPENDED',
] as const;

export type WireUserStatus = (typeof WIRE_USER_STATUSES)[number];

// Enum values arrive as names from proto-loader, but raw numbers are accepted too
const STATUS_FROM_WIRE = new Map<string | number, UserStatus>([
  ['USER_STATUS_ACTIVE', 'active'],
  ['USER_STATUS_INACTIVE', 'inactive'],
  ['USER_STATUS_SUSPENDED', 'suspended'],
  [1, 'active'],
  [2, 'inactive'],
  [3, 'suspended'],
]);

const STATUS_TO_WIRE = new Map<string, WireUserStatus>([
  ['active', 'USER_STATUS_ACTIVE'],
  ['inactive', 'USER_STATUS_INACTIVE'],
  ['suspended', 'USER_STATUS_SUSPENDED'],
]);

/** UNSPECIFIED and unknown values decode to `active`. */
export function statusFromWire(value: string | number): UserStatus {
  return STATUS_FROM_WIRE.get(value) ?? 'active';
}

export function statusToWire(status: string): WireUserStatus {
  return STATUS_TO_WIRE.get(status) ?? 'USER_STATUS_UNSPECIFIED';
}

export interface WireTimestamp {
  seconds: number;
  nanos: number;
}

export interface WireUser {
  id: string;
  email: string;
  firstName: string;
  lastName: string;
  phone: string;
  status: WireUserStatus;
  createdAt: WireTimestamp;
  updatedAt: WireTimestamp;
}

export interface UserResponse {
  user: WireUser;
}

export interface ListUsersResponse {
  users: WireUser[];
  total: number;
  page: number;
  pageSize: number;
}

export type EmptyResponse = Record<string, never>;

export function toWireTimestamp(date: Date): WireTimestamp {
  const ms = date.getTime();
  const seconds = Math.floor(ms / 1000);
  return { seconds, nanos: (ms - seconds * 1000) * 1_000_000 };
}

export function toWireUser(user: User): WireUser {
  return {
    id: user.id,
    email: user.email,
    firstName: user.firstName,
    lastName: user.lastName,
    phone: user.phone,
    status: statusToWire(user.status),
    createdAt: toWireTimestamp(user.createdAt),
    updatedAt: toWireTimestamp(user.updatedAt),
  };
}

// Requests are decoded with `defaults: false`, so unset scalars are missing
const text = z.string().default('');
const int32 = z.number().default(0);
const wireStatus = z.union([z.string(), z.number()]).transform(statusFromWire);

export const createUserRequestSchema = z.object({
  email: text,
  password: text,
  firstName: text,
  lastName: text,
  phone: text,
});

export const getUserRequestSchema = z.object({
  id: text,
});

export const getUserByEmailRequestSchema = z.object({
  email: text,
});

export const updateUserRequestSchema = z.object({
  id: text,
  email: z.string().optional(),
  firstName: z.string().optional(),
  lastName: z.string().optional(),
  phone: z.string().optional(),
  status: wireStatus.optional(),
});

export const deleteUserRequestSchema = z.object({
  id: text,
});

export const listUsersRequestSchema = z.object({
  page: int32,
  pageSize: int32,
  filter: text,
});
