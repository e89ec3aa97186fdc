import { AppError } from './errors';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

// Matches the 300 dpi the sheets are scanned at
const DEFAULT_SHEET_DPI = 300;

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export function getLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const raw = String(env.LOG_LEVEL || '').trim().toLowerCase();
  return isLogLevel(raw) ? raw : 'info';
}

export function getSheetDpi(env: NodeJS.ProcessEnv = process.env): number {
  const n = Number(env.SHEET_DPI);
  return Number.isFinite(n) && n > 0 ? n : DEFAULT_SHEET_DPI;
}

export interface SupabaseConfig {
  url: string;
  serviceKey: string;
}

export function getSupabaseConfig(env: NodeJS.ProcessEnv = process.env): SupabaseConfig {
  const url = env.SUPABASE_URL;
  const serviceKey = env.SUPABASE_SERVICE_ROLE_KEY;
  if (!url || !serviceKey) {
    throw new AppError('CONFIG_MISSING', 'SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY must be set');
  }
  return { url, serviceKey };
}
