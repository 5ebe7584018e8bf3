import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { logger } from './logger';
import { env } from './environment';

// Tables created by supabase/migrations/0001_store_schema.sql
const STORE_TABLES = ['categories', 'products', 'users', 'sessions', 'orders', 'order_items'] as const;

type StoreTable = (typeof STORE_TABLES)[number];

let supabaseClient: SupabaseClient | null = null;

/**
 * Process-wide Supabase client.
 *
 * Uses the service role key, so row level security is bypassed and the API
 * is the only gatekeeper. No auth session is persisted on the server.
 */
export const getSupabaseClient = (): SupabaseClient => {
  if (!supabaseClient) {
    supabaseClient = createClient(env.SUPABASE_URL, env.SUPABASE_SERVICE_ROLE_KEY, {
      auth: { autoRefreshToken: false, persistSession: false },
    });
    logger.info('Supabase client initialized', { url: env.SUPABASE_URL });
  }

  return supabaseClient;
};

/**
 * Tables of the store schema that cannot be read with the configured key
 */
export const findUnreachableTables = async (client: SupabaseClient): Promise<StoreTable[]> => {
  const checks = await Promise.all(
    STORE_TABLES.map(async (table) => {
      const { error } = await client.from(table).select('id', { count: 'exact', head: true });
      if (error) {
        logger.error('Store table not reachable', { table, code: error.code, error: error.message });
      }
      return { table, reachable: !error };
    })
  );

  return checks.filter((check) => !check.reachable).map((check) => check.table);
};

/**
 * Start-up check: every store table answers
 */
export const testConnection = async (): Promise<boolean> => {
  try {
    const unreachable = await findUnreachableTables(getSupabaseClient());

    if (unreachable.length > 0) {
      logger.error('Database check failed; has the migration been applied?', { unreachable });
      return false;
    }

    logger.info('Database check passed', { tables: STORE_TABLES.length });
    return true;
  } catch (error) {
    logger.error('Database check failed', {
      error: error instanceof Error ? error.message : String(error),
    });
    return false;
  }
};

/**
 * Drop the client reference on shutdown; pooling lives on the Supabase side
 */
export const closeConnection = (): void => {
  if (supabaseClient) {
    supabaseClient = null;
    logger.info('Supabase client released');
  }
};
