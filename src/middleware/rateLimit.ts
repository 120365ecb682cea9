import { Request, Response, NextFunction } from "express";
import redisClient from "../config/redis";
import { errorMessage } from "../utils/errors";

export interface RateLimitOptions {
  // Names the counter, e.g. "sale" or "checkout".
  scope: string;
  windowSeconds: number;
  maxRequests: number;
}

/**
 * Tills identify themselves with `user_id`; requests without one are
 * counted per client address.
 */
export const callerKey = (req: Request): string => {
  const body: unknown = req.body;
  if (typeof body === "object" && body !== null && "user_id" in body) {
    const id = body.user_id;
    const text = typeof id === "number" ? String(id) : typeof id === "string" ? id.trim() : "";
    if (text !== "") return `user:${text}`;
  }
  const ip = req.ip || req.socket.remoteAddress || "unknown";
  return `ip:${ip.replace(/:/g, "_")}`;
};

/**
 * Fixed-window limiter over Redis INCR/EXPIRE. Without a ready Redis
 * client, or when Redis fails mid-request, requests pass through.
 */
export const rateLimit = ({ scope, windowSeconds, maxRequests }: RateLimitOptions) => {
  return async (req: Request, res: Response, next: NextFunction) => {
    try {
      if (!redisClient || !redisClient.isOpen || !redisClient.isReady) {
        return next();
      }

      const key = `ratelimit:pos:${scope}:${callerKey(req)}`;

      const requests = await redisClient.incr(key);
      if (requests === 1) {
        await redisClient.expire(key, windowSeconds);
      }

      res.setHeader("X-RateLimit-Limit", String(maxRequests));
      res.setHeader("X-RateLimit-Remaining", String(Math.max(maxRequests - requests, 0)));

      if (requests > maxRequests) {
        let retryAfter = await redisClient.ttl(key);
        // counter lost its expiry (e.g. EXPIRE never ran); start a new window
        if (retryAfter < 0) {
          await redisClient.expire(key, windowSeconds);
          retryAfter = windowSeconds;
        }
        console.warn(`⏳ Rate limit hit on ${scope} for ${key} (${requests}/${maxRequests})`);
        res.setHeader("Retry-After", String(retryAfter));
        res.status(429).json({
          error: "Too many requests, please try again later.",
          retryAfter,
        });
        return;
      }

      next();
    } catch (error) {
      console.error(
        `❌ Rate limit check failed on ${scope}, letting request through:`,
        errorMessage(error),
      );
      next();
    }
  };
};
