import { describe, it, expect, beforeEach } from 'vitest';
import { createStore, StoreFixture } from '../support/fixtures';
import { ErrorCode } from '../../src/types/error.types';
import { UserRole } from '../../src/types/user.types';
import { verifyPassword } from '../../src/utils/password';

describe('UserService', () => {
  let store: StoreFixture;

  beforeEach(async () => {
    store = await createStore();
  });

  it('creates a customer with a hashed password', async () => {
    const user = await store.services.userService.createUser({
      firstName: 'New',
      lastName: 'Buyer',
      email: 'new@example.test',
      password: 'test-secret',
    });

    expect(user).toMatchObject({ email: 'new@example.test', role: UserRole.CUSTOMER, phone: '' });
    expect('passwordHash' in user).toBe(false);

    const stored = await store.repos.users.findByEmail('new@example.test');
    expect(stored?.passwordHash).not.toBe('test-secret');
    expect(await verifyPassword('test-secret', stored?.passwordHash ?? '')).toBe(true);
  });

  it('rejects a short password', async () => {
    await expect(
      store.services.userService.createUser({
        firstName: 'New',
        lastName: 'Buyer',
        email: 'new@example.test',
        password: 'abc',
      })
    ).rejects.toMatchObject({
      code: ErrorCode.VALIDATION_ERROR,
      message: 'Password must be at least 6 characters',
    });
  });

  it('rejects an email that is already taken, ignoring case', async () => {
    await expect(
      store.services.userService.createUser({
        firstName: 'Copy',
        lastName: 'Cat',
        email: 'CUSTOMER@example.test',
        password: 'test-secret',
      })
    ).rejects.toMatchObject({
      code: ErrorCode.DUPLICATE_EMAIL,
      message: 'User with email CUSTOMER@example.test already exists.',
    });
  });

  it('reports the loser of two overlapping registrations as a duplicate email', async () => {
    const register = () =>
      store.services.userService.createUser({
        firstName: 'Twin',
        lastName: 'Buyer',
        email: 'twin@example.test',
        password: 'test-secret',
      });

    const results = await Promise.allSettled([register(), register()]);
    const rejected = results.flatMap((result) => (result.status === 'rejected' ? [result.reason] : []));

    expect(results.filter((result) => result.status === 'fulfilled')).toHaveLength(1);
    expect(rejected).toHaveLength(1);
    expect(rejected[0]).toMatchObject({ code: ErrorCode.DUPLICATE_EMAIL, statusCode: 400 });
  });

  describe('updateUser', () => {
    it('merges a partial update', async () => {
      const updated = await store.services.userService.updateUser(store.customer.id, {
        phone: '555-0199',
        role: UserRole.MANAGER,
      });

      expect(updated).toMatchObject({ firstName: 'Test', phone: '555-0199', role: UserRole.MANAGER });
    });

    it('keeps email unique', async () => {
      await store.repos.users.create({
        firstName: 'Other',
        lastName: 'User',
        email: 'other@example.test',
        passwordHash: 'unused',
        phone: '',
        address: '',
        role: UserRole.CUSTOMER,
      });

      await expect(
        store.services.userService.updateUser(store.customer.id, { email: 'other@example.test' })
      ).rejects.toMatchObject({ code: ErrorCode.DUPLICATE_EMAIL });
    });

    it('accepts the same email in another case', async () => {
      const updated = await store.services.userService.updateUser(store.customer.id, {
        email: 'Customer@Example.test',
      });

      expect(updated?.email).toBe('customer@example.test');
    });

    it('returns null for a missing user', async () => {
      expect(await store.services.userService.updateUser(999, { phone: '1' })).toBeNull();
    });
  });

  it('deletes a user', async () => {
    expect(await store.services.userService.deleteUser(store.customer.id)).toBe(true);
    expect(await store.services.userService.getUserById(store.customer.id)).toBeNull();
    expect(await store.services.userService.deleteUser(store.customer.id)).toBe(false);
  });
});
