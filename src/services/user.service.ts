import { UserRepository } from '../repositories/user.repository';
import { CreateUserInput, User, UserPatch, UserRole } from '../types/user.types';
import { ErrorCode, validationError } from '../types/error.types';
import { applyPatch } from '../utils/patch';
import { hashPassword, MIN_PASSWORD_LENGTH } from '../utils/password';
import { logger } from '../config/logger';

/**
 * User Service
 *
 * Business logic for user accounts. Password hashes never leave this layer.
 */
export class UserService {
  constructor(private userRepo: UserRepository) {}

  async getAllUsers(): Promise<User[]> {
    return this.userRepo.findAll();
  }

  async getUserById(id: number): Promise<User | null> {
    return this.userRepo.findById(id);
  }

  async createUser(input: CreateUserInput): Promise<User> {
    logger.info('Creating user', { role: input.role ?? UserRole.CUSTOMER });

    if (input.password.length < MIN_PASSWORD_LENGTH) {
      throw validationError(
        ErrorCode.VALIDATION_ERROR,
        `Password must be at least ${MIN_PASSWORD_LENGTH} characters`
      );
    }

    await this.assertEmailAvailable(input.email);

    const user = await this.userRepo.create({
      firstName: input.firstName,
      lastName: input.lastName,
      email: input.email,
      passwordHash: await hashPassword(input.password),
      phone: input.phone ?? '',
      address: input.address ?? '',
      role: input.role ?? UserRole.CUSTOMER,
    });

    logger.info('User created successfully', { userId: user.id });
    return user;
  }

  async updateUser(id: number, patch: UserPatch): Promise<User | null> {
    const existing = await this.userRepo.findById(id);
    if (!existing) return null;

    if (patch.email && patch.email.toLowerCase() !== existing.email.toLowerCase()) {
      await this.assertEmailAvailable(patch.email, id);
    }

    const merged = applyPatch(
      {
        firstName: existing.firstName,
        lastName: existing.lastName,
        email: existing.email,
        phone: existing.phone,
        address: existing.address,
        role: existing.role,
      },
      patch
    );

    return this.userRepo.update(id, merged);
  }

  async deleteUser(id: number): Promise<boolean> {
    const deleted = await this.userRepo.delete(id);
    if (deleted) logger.info('User deleted', { userId: id });
    return deleted;
  }

  private async assertEmailAvailable(email: string, exceptUserId?: number): Promise<void> {
    const owner = await this.userRepo.findByEmail(email);
    if (owner && owner.id !== exceptUserId) {
      throw validationError(ErrorCode.DUPLICATE_EMAIL, `User with email ${email} already exists.`, {
        email,
      });
    }
  }
}
