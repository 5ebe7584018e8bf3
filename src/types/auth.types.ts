/**
 * Authentication types
 */

import { User } from './user.types';

export interface Session {
  id: number;
  userId: number;
  tokenHash: string;
  expiresAt: Date;
  createdAt: Date;
}

export interface SessionRow {
  id: number;
  user_id: number;
  token_hash: string;
  expires_at: string;
  created_at: string;
}

export interface CreateSessionParams {
  userId: number;
  tokenHash: string;
  expiresAt: Date;
}

export interface LoginResult {
  token: string;
  tokenType: 'Bearer';
  expiresIn: number;
  user: User;
}

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      /** Set by the authenticate middleware */
      user?: User;
      /** Raw bearer token the user was resolved from */
      sessionToken?: string;
    }
  }
}
