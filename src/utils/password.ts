import bcrypt from 'bcryptjs';
import { env } from '../config/environment';

/**
 * Password hashing (bcrypt)
 */

export const MIN_PASSWORD_LENGTH = 6;

export async function hashPassword(plain: string, rounds: number = env.BCRYPT_ROUNDS): Promise<string> {
  const salt = await bcrypt.genSalt(rounds);
  return bcrypt.hash(plain, salt);
}

export async function verifyPassword(plain: string, passwordHash: string): Promise<boolean> {
  if (!plain || !passwordHash) return false;
  return bcrypt.compare(plain, passwordHash);
}
