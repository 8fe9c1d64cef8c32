import { createClient, type SupabaseClient } from '@supabase/supabase-js';

import type { AppConfig } from './config.js';

/** `fetchImpl` replaces the global fetch for every PostgREST call. */
export function createSupabaseClient(config: AppConfig['supabase'], fetchImpl?: typeof fetch): SupabaseClient {
    const debug = process.env.SUPABASE_DEBUG === '1' || process.env.NODE_ENV !== 'production';

    if (debug) {
        console.log('[Supabase] SUPABASE_URL exists:', !!config.url);
        console.log('[Supabase] SUPABASE_SERVICE_ROLE_KEY exists:', !!config.serviceRoleKey);
    }

    if (!config.url) {
        console.warn('[Supabase] Missing SUPABASE_URL');
    }

    if (!config.serviceRoleKey) {
        throw new Error('[Supabase] Missing SUPABASE_SERVICE_ROLE_KEY (required for writes with RLS enabled)');
    }

    return createClient(config.url, config.serviceRoleKey, {
        auth: {
            persistSession: false,
            autoRefreshToken: false,
        },
        global: fetchImpl ? { fetch: fetchImpl } : undefined,
    });
}
