import { Pool } from "pg";
import type { DatabaseEnv } from "../../shared/config/env";
import { consoleLog, type Log } from "../../shared/logging/logger";
import type { PgPoolLike } from "./PostgresMigrationDatabase";

export const poolDefaults = {
  idleTimeoutMs: 30_000,
  connectionTimeoutMs: 10_000
} as const;

/**
 * One connection per worker: every in-flight item holds a client for the
 * length of its statement.
 */
export const createPgPool = (env: DatabaseEnv, maxConnections: number, log: Log = consoleLog): PgPoolLike => {
  const pool = new Pool({
    database: env.DBNAME,
    host: env.DBHOST,
    port: env.DBPORT,
    user: env.DBUSER,
    password: env.DBPASS,
    max: maxConnections,
    idleTimeoutMillis: poolDefaults.idleTimeoutMs,
    connectionTimeoutMillis: poolDefaults.connectionTimeoutMs
  });

  // Idle clients can error when the server goes away; unhandled, that kills the process.
  pool.on("error", (err) => {
    log("error", { event: "postgres.idle_client_error", error: err });
  });

  log("info", {
    event: "postgres.pool_created",
    database: env.DBNAME,
    host: env.DBHOST,
    port: env.DBPORT,
    max: maxConnections
  });

  return pool;
};
