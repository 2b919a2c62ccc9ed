import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { Pool } from "pg";
import { config } from "../config";
import { logger } from "../logger";

export const db = new Pool({
  host: config.db.host,
  port: config.db.port,
  user: config.db.user,
  password: config.db.password,
  database: config.db.database
});

function resolveMigration(name: string): string {
  const besideCode = join(__dirname, "migrations", name);
  if (existsSync(besideCode)) {
    return besideCode;
  }
  // tsc does not copy .sql files, so a build in dist/ reads them from src/.
  return join(__dirname, "..", "..", "..", "..", "..", "services", "onboarding-service", "src", "db", "migrations", name);
}

export async function migrate(pool: Pool = db): Promise<void> {
  const sql = readFileSync(resolveMigration("001_init.sql"), "utf8");
  await pool.query(sql);
  logger.info({ traceId: "system" }, "Database migrations applied");
}
