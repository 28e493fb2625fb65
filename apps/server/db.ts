import { Pool } from "pg";
import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";

export type Database = NodePgDatabase;

export function createDatabase(connectionString: string): Database {
  const pool = new Pool({ connectionString });
  pool.on("error", (error) => {
    console.error("[db] Idle client error:", error);
  });
  return drizzle(pool);
}
