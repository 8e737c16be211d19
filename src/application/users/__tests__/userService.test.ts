import { describe, it, expect, beforeEach, vi } from 'vitest';
import { pino } from 'pino';
import {
  DEFAULT_PAGE_SIZE,
  DefaultUserService,
  MAX_PAGE_SIZE,
  clampPagination,
} from '../userService.js';
import { AlreadyExistsError, InternalError, NotFoundError } from '../../errors.js';
import { InvalidEmailError, InvalidPasswordError } from '../../../domain/users/errors.js';
import { Password } from '../../../domain/users/password.js';
import { InMemoryUserRepository } from './fakes/inMemoryUserRepository.js';

const logger = pino({ level: 'silent' });

describe('clampPagination', () => {
  it('should keep values inside the bounds', () => {
    expect(clampPagination(3, 25)).toEqual({ page: 3, pageSize: 25 });
    expect(clampPagination(1, MAX_PAGE_SIZE)).toEqual({ page: 1, pageSize: 100 });
  });

  it('should raise a page below 1 to 1', () => {
    expect(clampPagination(0, 10).page).toBe(1);
    expect(clampPagination(-4, 10).page).toBe(1);
  });

  it('should reset an out-of-range page size to the default', () => {
    expect(clampPagination(1, 0).pageSize).toBe(DEFAULT_PAGE_SIZE);
    expect(clampPagination(1, -1).pageSize).toBe(DEFAULT_PAGE_SIZE);
    expect(clampPagination(1, 101).pageSize).toBe(DEFAULT_PAGE_SIZE);
  });
});

describe('DefaultUserService', () => {
  let repo: InMemoryUserRepository;
  let service: DefaultUserService;

  beforeEach(() => {
    repo = new InMemoryUserRepository();
    service = new DefaultUserService(repo, logger);
  });

  describe('createUser', () => {
    it('should store an active user with a hashed password', async () => {
      const user = await service.createUser({
        email: 'ada@example.com',
        password: 'password123',
        firstName: 'Ada',
        lastName: 'Lovelace',
      });

      expect(user.email).toBe('ada@example.com');
      expect(user.firstName).toBe('Ada');
      expect(user.lastName).toBe('Lovelace');
      expect(user.phone).toBe('');
      expect(user.status).toBe('active');
      expect(user.passwordHash).not.toBe('password123');
      expect(await Password.verify('password123', user.passwordHash)).toBe(true);
    });

    it('should reject an empty email before touching storage', async () => {
      await expect(service.createUser({ email: '', password: 'password123' })).rejects.toBeInstanceOf(
        InvalidEmailError
      );
      expect(repo.calls).toBe(0);
    });

    it('should reject an empty password before touching storage', async () => {
      await expect(
        service.createUser({ email: 'ada@example.com', password: '' })
      ).rejects.toBeInstanceOf(InvalidPasswordError);
      expect(repo.calls).toBe(0);
    });

    it('should reject a password shorter than 8 characters', async () => {
      await expect(
        service.createUser({ email: 'ada@example.com', password: 'short12' })
      ).rejects.toBeInstanceOf(InvalidPasswordError);
      expect(repo.calls).toBe(0);
    });

    it('should count characters rather than UTF-16 units', async () => {
      const fourEmoji = '\u{1F511}\u{1F512}\u{1F513}\u{1F510}';
      expect(fourEmoji.length).toBe(8);

      await expect(
        service.createUser({ email: 'ada@example.com', password: fourEmoji })
      ).rejects.toBeInstanceOf(InvalidPasswordError);
      expect(repo.calls).toBe(0);
    });

    it('should accept eight non-ASCII characters', async () => {
      const user = await service.createUser({ email: 'ada@example.com', password: '\u{1F511}'.repeat(8) });
      expect(user.email).toBe('ada@example.com');
    });

    it('should accept a password of exactly 8 characters', async () => {
      const user = await service.createUser({ email: 'ada@example.com', password: 'exactly8' });
      expect(user.email).toBe('ada@example.com');
    });

    it('should propagate AlreadyExistsError for a duplicate email', async () => {
      await service.createUser({ email: 'ada@example.com', password: 'password123' });

      await expect(
        service.createUser({ email: 'ada@example.com', password: 'password456' })
      ).rejects.toBeInstanceOf(AlreadyExistsError);
    });

    it('should turn a hashing failure into InternalError', async () => {
      const spy = vi.spyOn(Password, 'hash').mockRejectedValueOnce(new Error('out of memory'));

      await expect(
        service.createUser({ email: 'ada@example.com', password: 'password123' })
      ).rejects.toBeInstanceOf(InternalError);
      expect(repo.calls).toBe(0);
      spy.mockRestore();
    });
  });

  describe('getUser / getUserByEmail', () => {
    it('should return a stored user by id and by email', async () => {
      const created = await service.createUser({ email: 'ada@example.com', password: 'password123' });

      expect((await service.getUser(created.id)).email).toBe('ada@example.com');
      expect((await service.getUserByEmail('ada@example.com')).id).toBe(created.id);
    });

    it('should propagate NotFoundError', async () => {
      await expect(service.getUser('00000000-0000-4000-8000-000000000099')).rejects.toBeInstanceOf(
        NotFoundError
      );
      await expect(service.getUserByEmail('nobody@example.com')).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('updateUser', () => {
    it('should change only the supplied fields', async () => {
      const created = await service.createUser({
        email: 'ada@example.com',
        password: 'password123',
        firstName: 'Ada',
        lastName: 'Lovelace',
        phone: '555-0100',
      });

      const updated = await service.updateUser(created.id, { lastName: 'King', status: 'inactive' });

      expect(updated.firstName).toBe('Ada');
      expect(updated.lastName).toBe('King');
      expect(updated.phone).toBe('555-0100');
      expect(updated.email).toBe('ada@example.com');
      expect(updated.status).toBe('inactive');
      expect(updated.passwordHash).toBe(created.passwordHash);
      expect(updated.updatedAt.getTime()).toBeGreaterThan(created.updatedAt.getTime());
    });

    it('should ignore keys that are not part of a user update', async () => {
      const created = await service.createUser({ email: 'ada@example.com', password: 'password123' });
      const updates = { firstName: 'X', passwordHash: 'replaced', id: 'other' };

      const updated = await service.updateUser(created.id, updates);

      expect(updated.id).toBe(created.id);
      expect(updated.firstName).toBe('X');
      expect(updated.passwordHash).toBe(created.passwordHash);
    });

    it('should fail with NotFoundError for a deleted user', async () => {
      const created = await service.createUser({ email: 'ada@example.com', password: 'password123' });
      await service.deleteUser(created.id);

      await expect(service.updateUser(created.id, { firstName: 'X' })).rejects.toBeInstanceOf(
        NotFoundError
      );
    });
  });

  describe('deleteUser', () => {
    it('should hide the user from reads and report a second delete as not found', async () => {
      const created = await service.createUser({ email: 'ada@example.com', password: 'password123' });

      await service.deleteUser(created.id);

      await expect(service.getUser(created.id)).rejects.toBeInstanceOf(NotFoundError);
      await expect(service.deleteUser(created.id)).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should free the email for a new account', async () => {
      const first = await service.createUser({ email: 'ada@example.com', password: 'password123' });
      await service.deleteUser(first.id);

      const second = await service.createUser({ email: 'ada@example.com', password: 'password123' });

      expect(second.id).not.toBe(first.id);
    });
  });

  describe('listUsers', () => {
    beforeEach(async () => {
      await repo.create({ email: 'ada@example.com', passwordHash: 'h', firstName: 'Ada', lastName: 'Lovelace', phone: '' });
      await repo.create({ email: 'alan@example.com', passwordHash: 'h', firstName: 'Alan', lastName: 'Turing', phone: '' });
      await repo.create({ email: 'grace@example.com', passwordHash: 'h', firstName: 'Grace', lastName: 'Hopper', phone: '' });
    });

    it('should return the requested page with the total', async () => {
      const result = await service.listUsers({ page: 2, pageSize: 2 });

      expect(result.total).toBe(3);
      expect(result.page).toBe(2);
      expect(result.pageSize).toBe(2);
      expect(result.users.map((u) => u.email)).toEqual(['grace@example.com']);
    });

    it('should report the clamped page values', async () => {
      const result = await service.listUsers({ page: 0, pageSize: 500 });

      expect(result.page).toBe(1);
      expect(result.pageSize).toBe(10);
      expect(result.users).toHaveLength(3);
    });

    it('should filter on name or email', async () => {
      const result = await service.listUsers({ page: 1, pageSize: 10, filter: 'Al' });

      expect(result.total).toBe(1);
      expect(result.users[0].email).toBe('alan@example.com');
    });
  });

  describe('validateCredential', () => {
    it('should return the user for the right password', async () => {
      const created = await service.createUser({ email: 'ada@example.com', password: 'password123' });

      const user = await service.validateCredential('ada@example.com', 'password123');

      expect(user.id).toBe(created.id);
    });

    it('should reject a wrong password', async () => {
      await service.createUser({ email: 'ada@example.com', password: 'password123' });

      await expect(service.validateCredential('ada@example.com', 'password124')).rejects.toBeInstanceOf(
        InvalidPasswordError
      );
    });

    it('should propagate NotFoundError for an unknown email', async () => {
      await expect(service.validateCredential('nobody@example.com', 'password123')).rejects.toBeInstanceOf(
        NotFoundError
      );
    });

    it('should turn an unreadable stored hash into InternalError', async () => {
      await repo.create({ email: 'ada@example.com', passwordHash: 'not-a-hash', firstName: '', lastName: '', phone: '' });

      await expect(service.validateCredential('ada@example.com', 'password123')).rejects.toBeInstanceOf(
        InternalError
      );
    });
  });
});
