import Redis from "ioredis";
import { createLogger } from "@tierwise/observability";

const log = createLogger({ component: "redis" });

let redisClient: Redis | null = null;

export function getRedisClient(redisUrl: string | undefined = process.env.REDIS_URL): Redis | null {
  if (redisClient) {
    return redisClient;
  }

  if (!redisUrl) {
    // Redis is optional
    return null;
  }

  redisClient = new Redis(redisUrl, {
    maxRetriesPerRequest: 3,
    retryStrategy: (times) => {
      return Math.min(times * 50, 2000);
    },
    enableReadyCheck: true,
    lazyConnect: false
  });

  redisClient.on("error", (error: Error) => {
    log.error({ err: error }, "redis connection error");
  });

  redisClient.on("connect", () => {
    log.info("redis connected");
  });

  return redisClient;
}

export async function closeRedis(): Promise<void> {
  if (redisClient) {
    await redisClient.quit();
    redisClient = null;
  }
}
