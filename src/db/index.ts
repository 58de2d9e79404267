import postgres from "postgres";
import type { Config } from "../config";
import { logger } from "../utils/logger";

export function createSql(options: Config["database"]) {
  return postgres(options.url, {
    max: options.max,
    idle_timeout: options.idleTimeout,
    transform: {
      undefined: null,
    },
    onnotice: (notice) => logger.debug({ notice }, "Postgres notice"),
  });
}
