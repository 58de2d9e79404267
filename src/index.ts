import { serve } from "@hono/node-server";
import { createApp } from "./app";
import { config } from "./config";
import { createSql } from "./db/index";
import { PostgresStore } from "./db/postgres.store";
import { createRedis } from "./db/redis";
import { seed } from "./db/seed";
import { logger } from "./utils/logger";
import { shutdown } from "./utils/shutdown";

async function main() {
  const store = new PostgresStore(createSql(config.database));
  const { redisUrl, windowMs, max } = config.rateLimit;
  const redis = redisUrl ? createRedis(redisUrl) : undefined;

  await store.migrate();
  await seed(store);

  const app = createApp({
    store,
    rateLimit: redis ? { store: redis, windowMs, max } : undefined,
  });

  logger.info(`Server is starting on port ${config.port}`);

  const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
    logger.info({ port: info.port }, "Server is listening");
  });

  const resources: Array<() => Promise<unknown>> = [() => store.close()];
  if (redis) resources.push(() => redis.quit());

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      logger.info({ signal }, "Shutting down");
      shutdown(server, resources)
        .then(() => process.exit(0))
        .catch((err) => {
          logger.error({ err }, "Shutdown failed");
          process.exit(1);
        });
    });
  }
}

main().catch((err) => {
  logger.fatal({ err }, "Failed to start");
  process.exit(1);
});
