import { createClient } from "redis";
import { serverConfig } from "./options";

export type RedisClient = ReturnType<typeof createClient>;

const createRedisClient = (url: string): RedisClient => {
  const client = createClient({
    url,
    socket: {
      connectTimeout: 5000,
      reconnectStrategy: (retries) => {
        if (retries > 10) {
          console.error(
            "Redis: Max retries reached. Stopping reconnection attempts.",
          );
          return false;
        }
        return Math.min(retries * 100, 3000);
      },
    },
  });

  client.on("error", (err: Error) => {
    if (err.name === "ConnectionTimeoutError") {
      console.error("Redis Status: Connection Timeout (Local/Down)");
    } else {
      console.error("Redis Status: Error", err.message);
    }
  });
  client.on("connect", () => console.log("Redis Status: Connected"));
  client.on("ready", () => console.log("Redis Status: Ready"));
  return client;
};

// Only used by the rate limiter; without REDIS_URL there is no client at all.
const redisClient: RedisClient | null = serverConfig.redisUrl
  ? createRedisClient(serverConfig.redisUrl)
  : null;

export const connectRedis = async (): Promise<void> => {
  if (!redisClient || redisClient.isOpen) return;
  try {
    await redisClient.connect();
  } catch (error) {
    console.warn(
      "Redis Status: Could not establish initial connection. Rate limiting disabled.",
      error,
    );
  }
};

export default redisClient;
