import { Pool } from "pg";
import { config } from "./config";
import { logger } from "./logger";

export const pool = new Pool({
  host: config.database.host,
  port: config.database.port,
  user: config.database.user,
  password: config.database.password,
  database: config.database.database,
  max: config.scheduler.maxWorkers + 4,
});

pool.on("error", (error) => {
  logger.error({ error }, "Idle PostgreSQL client error");
});
