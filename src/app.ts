import { OpenAPIHono } from "@hono/zod-openapi";
import { swaggerUI } from "@hono/swagger-ui";
import { logger as honoLogger } from "hono/logger";
import type { Store } from "./db/store";
import { NotFoundError } from "./errors";
import { rateLimiter, type RateLimitConfig } from "./middlewares/rateLimiter";
import {
  metrics as defaultMetrics,
  metricsMiddleware,
  type MetricsCollector,
} from "./monitoring/metrics";
import { createBlogRoutes } from "./routes/blog";
import { createMetricsRoutes } from "./routes/metrics";
import { createShopRoutes } from "./routes/shop";
import { PlayerService } from "./services/player.service";
import { PostService } from "./services/post.service";
import { logger } from "./utils/logger";

export interface AppDependencies {
  store: Store;
  metrics?: MetricsCollector;
  rateLimit?: RateLimitConfig;
}

export function createApp({
  store,
  metrics = defaultMetrics,
  rateLimit,
}: AppDependencies) {
  const app = new OpenAPIHono();

  app.use(honoLogger((str) => logger.info(str)));
  app.use("*", metricsMiddleware(metrics));

  if (rateLimit) {
    app.use("*", rateLimiter({ keyPrefix: "global", ...rateLimit }));
  }

  app.get("/", (c) => {
    return c.json({
      service: "Race-safe counters",
      version: "1.0.0",
      status: "running",
      endpoints: {
        post: "/post/{id}",
        view: "/view/{id}",
        player: "/player/{id}",
        upgrade: "/upgrade/{id}",
        metrics: "/metrics",
        health: "/metrics/health",
        swagger: "/swagger",
        docs: "/doc",
      },
    });
  });

  app.route("/", createBlogRoutes(new PostService(store, metrics)));
  app.route("/", createShopRoutes(new PlayerService(store, metrics)));
  app.route("/metrics", createMetricsRoutes(metrics, store));

  app.doc("/doc", {
    openapi: "3.0.0",
    info: {
      version: "1.0.0",
      title: "Race-safe counters API",
      description:
        "Blog view counter and game shop, both updated with atomic conditional SQL statements",
    },
  });

  app.get(
    "/swagger",
    swaggerUI({
      url: "/doc",
    }),
  );

  app.onError((err, c) => {
    if (err instanceof NotFoundError) {
      return c.json({ error: err.message }, 404);
    }

    logger.error({ err, path: c.req.path }, "Request failed");
    return c.json({ error: "Internal Server Error" }, 500);
  });

  return app;
}
