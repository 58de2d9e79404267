import Redis from "ioredis";
import { logger } from "../utils/logger";

export function createRedis(url: string) {
  const redis = new Redis(url, {
    maxRetriesPerRequest: 3,
  });

  redis.on("connect", () => {
    logger.info("Connected to Redis");
  });

  redis.on("error", (err) => {
    logger.error(err, "Redis error");
  });

  return redis;
}
