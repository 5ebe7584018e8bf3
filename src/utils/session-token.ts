import { createHash, randomBytes } from 'crypto';

/**
 * Opaque bearer tokens. Only the SHA-256 hash is stored server-side.
 */

export function generateSessionToken(bytes = 32): string {
  return randomBytes(bytes).toString('base64url');
}

export function hashSessionToken(token: string): string {
  return createHash('sha256').update(token).digest('hex');
}

export function bearerToken(header: string | undefined): string | null {
  if (!header) return null;
  const [scheme, token] = header.trim().split(/\s+/);
  if (!scheme || scheme.toLowerCase() !== 'bearer' || !token) return null;
  return token;
}
