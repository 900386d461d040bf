import { drizzle } from "drizzle-orm/mysql2";

let _db: ReturnType<typeof drizzle> | null = null;

/**
 * Lazily create the drizzle instance. Returns null when no database is configured,
 * so callers can fall back to in-memory behaviour.
 */
export async function getDb() {
  if (!_db && process.env.DATABASE_URL) {
    try {
      _db = drizzle(process.env.DATABASE_URL);
    } catch (error) {
      console.warn("[Database] Failed to connect:", error);
      _db = null;
    }
  }
  return _db;
}

export type Database = NonNullable<Awaited<ReturnType<typeof getDb>>>;
