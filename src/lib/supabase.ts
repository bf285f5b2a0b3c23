import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { serverEnv } from './env';
import { logger } from './logger';

/**
 * Creates the remote store client from SUPABASE_URL / SUPABASE_ANON_KEY.
 * Returns null when either is missing so callers can fall back to another TraceReader.
 */
export function createStoreClient(): SupabaseClient | null {
    const supabaseUrl = serverEnv.SUPABASE_URL;
    const supabaseAnonKey = serverEnv.SUPABASE_ANON_KEY;

    if (!supabaseUrl || !supabaseAnonKey) {
        logger.sync.warn('[SUPABASE] Missing environment variables - remote trace store disabled', {
            hasUrl: !!supabaseUrl,
            hasKey: !!supabaseAnonKey,
        });
        return null;
    }

    return createClient(supabaseUrl, supabaseAnonKey, {
        auth: { persistSession: false, autoRefreshToken: false },
    });
}
