import { drizzle } from "drizzle-orm/postgres-js";
import postgres from "postgres";
import * as schema from "./schema/index.js";

export interface DbClientOptions {
  url: string;
  maxConnections?: number;
}

// The pipeline writes through a single serial worker, so a small pool suffices.
const DEFAULT_WORKER_POOL = { max: 4 };

function connect(options: DbClientOptions) {
  const connection = postgres(options.url, {
    max: options.maxConnections ?? DEFAULT_WORKER_POOL.max,
    idle_timeout: 30,
    connect_timeout: 10,
  });

  return {
    db: drizzle(connection, { schema }),
    close: () => connection.end({ timeout: 5 }),
  };
}

export type DbClient = ReturnType<typeof connect>["db"];

export interface DbConnection {
  db: DbClient;
  /** Drain the pool; queries still running get five seconds to finish. */
  close: () => Promise<void>;
}

export function createDbClient(options: DbClientOptions): DbConnection {
  return connect(options);
}
