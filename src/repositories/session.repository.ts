import { SupabaseClient } from '@supabase/supabase-js';
import { CreateSessionParams, Session, SessionRow } from '../types/auth.types';
import { databaseError, NO_ROWS } from './supabase-errors';

export interface SessionRepository {
  create(params: CreateSessionParams): Promise<Session>;
  findActiveByTokenHash(tokenHash: string, now: Date): Promise<Session | null>;
  deleteByTokenHash(tokenHash: string): Promise<boolean>;
  deleteExpired(now: Date): Promise<number>;
}

/**
 * Session Repository
 *
 * Bearer sessions keyed by the token hash
 */
export class SupabaseSessionRepository implements SessionRepository {
  constructor(private client: SupabaseClient) {}

  async create(params: CreateSessionParams): Promise<Session> {
    const { data, error } = await this.client
      .from('sessions')
      .insert({
        user_id: params.userId,
        token_hash: params.tokenHash,
        expires_at: params.expiresAt.toISOString(),
      })
      .select('*')
      .single();

    if (error) throw databaseError('create session', error, { userId: params.userId });

    return this.mapToSession(data);
  }

  async findActiveByTokenHash(tokenHash: string, now: Date): Promise<Session | null> {
    const { data, error } = await this.client
      .from('sessions')
      .select('*')
      .eq('token_hash', tokenHash)
      .gt('expires_at', now.toISOString())
      .single();

    if (error) {
      if (error.code === NO_ROWS) return null;
      throw databaseError('find session', error);
    }

    return data ? this.mapToSession(data) : null;
  }

  async deleteByTokenHash(tokenHash: string): Promise<boolean> {
    const { data, error } = await this.client
      .from('sessions')
      .delete()
      .eq('token_hash', tokenHash)
      .select('id');

    if (error) throw databaseError('delete session', error);

    return (data ?? []).length > 0;
  }

  /**
   * Remove sessions that expired before `now`; returns how many went
   */
  async deleteExpired(now: Date): Promise<number> {
    const { data, error } = await this.client
      .from('sessions')
      .delete()
      .lte('expires_at', now.toISOString())
      .select('id');

    if (error) throw databaseError('delete expired sessions', error);

    return (data ?? []).length;
  }

  private mapToSession(row: SessionRow): Session {
    return {
      id: row.id,
      userId: row.user_id,
      tokenHash: row.token_hash,
      expiresAt: new Date(row.expires_at),
      createdAt: new Date(row.created_at),
    };
  }
}
