import { createMiddleware } from "hono/factory";
import { logger } from "../utils/logger";

// The subset of an ioredis client the limiter needs
export interface RateLimitStore {
  incr(key: string): Promise<number>;
  pexpire(key: string, milliseconds: number, mode: "NX"): Promise<number>;
}

export interface RateLimitConfig {
  store: RateLimitStore;
  windowMs: number;
  max: number;
  keyPrefix?: string;
}

// Fixed window per client address. INCR both counts and reads the hit in
// one command, so concurrent requests cannot slip past the limit.
// PEXPIRE ... NX (Redis 7+) runs on every hit and only sets a TTL the key
// lacks, so a failed expiry is repaired by the next request.
export const rateLimiter = (config: RateLimitConfig) => {
  const { store, windowMs, max, keyPrefix = "rl" } = config;

  return createMiddleware(async (c, next) => {
    const ip = c.req.header("x-forwarded-for") ?? "unknown";
    const key = `${keyPrefix}:${ip}`;

    let count: number;
    try {
      count = await store.incr(key);
      await store.pexpire(key, windowMs, "NX");
    } catch (err) {
      // Fail open so a Redis outage does not take the API down
      logger.error({ err, key }, "Rate limiter error");
      await next();
      return;
    }

    if (count > max) {
      logger.warn({ ip, key, count }, "Rate limit exceeded");
      return c.json({ error: "Too many requests" }, 429);
    }

    await next();
  });
};
