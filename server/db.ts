import { drizzle } from "drizzle-orm/mysql2";
import { ENV } from "./_core/env";

let _db: ReturnType<typeof drizzle> | null = null;

/**
 * Lazily create the drizzle instance. Returns null when no DATABASE_URL is
 * configured so callers can fall back to in-memory behaviour.
 */
export async function getDb() {
  if (!_db && ENV.databaseUrl) {
    try {
      _db = drizzle(ENV.databaseUrl);
    } catch (error) {
      console.warn("[Database] Failed to connect:", (error as Error).message);
      _db = null;
    }
  }
  return _db;
}
