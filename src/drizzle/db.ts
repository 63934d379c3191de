import { drizzle } from 'drizzle-orm/neon-http';
import { neon, neonConfig } from '@neondatabase/serverless';
import * as schema from './schema';

const FETCH_TIMEOUT_MS = 30000;

// Longer timeout for app -> Neon round trips
neonConfig.fetchFunction = async (url: string, options: Parameters<typeof fetch>[1]) => {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), FETCH_TIMEOUT_MS);

  try {
    return await fetch(url, {
      ...options,
      signal: controller.signal,
    });
  } finally {
    clearTimeout(timeoutId);
  }
};

export function createDatabase(databaseUrl: string) {
  return drizzle(neon(databaseUrl), { schema });
}

export type DbType = ReturnType<typeof createDatabase>;
