import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { getSupabaseConfig } from './config';

let client: SupabaseClient | null = null;

// Created on first use so that parsing never needs credentials
export function getSupabase(): SupabaseClient {
  if (!client) {
    const { url, serviceKey } = getSupabaseConfig();
    client = createClient(url, serviceKey, { auth: { persistSession: false } });
  }
  return client;
}
