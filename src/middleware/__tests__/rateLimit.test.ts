import express from "express";
import { Server } from "http";
import { rateLimit } from "../rateLimit";

interface FakeRedis {
  isOpen: boolean;
  isReady: boolean;
  counts: Map<string, number>;
  incr: jest.Mock<Promise<number>, [string]>;
  expire: jest.Mock<Promise<boolean>, [string, number]>;
  ttl: jest.Mock<Promise<number>, [string]>;
}

jest.mock("../../config/redis", () => {
  const mockClient = {
    isOpen: true,
    isReady: true,
    counts: new Map<string, number>(),
    incr: jest.fn(),
    expire: jest.fn(),
    ttl: jest.fn(),
  };
  return { __esModule: true, default: mockClient, mockClient };
});

const redis = jest.requireMock<{ mockClient: FakeRedis }>("../../config/redis").mockClient;

describe("rateLimit", () => {
  let server: Server;
  let baseUrl: string;

  const post = (body: Record<string, unknown>) =>
    fetch(`${baseUrl}/pos/sale`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
    });

  beforeAll(async () => {
    const app = express();
    app.use(express.json());
    app.post(
      "/pos/sale",
      rateLimit({ scope: "sale", windowSeconds: 60, maxRequests: 2 }),
      (_req, res) => {
        res.json({ status: "ok" });
      },
    );
    server = app.listen(0, "127.0.0.1");
    await new Promise<void>((resolve) => server.once("listening", () => resolve()));
    const address = server.address();
    const port = typeof address === "object" && address !== null ? address.port : 0;
    baseUrl = `http://127.0.0.1:${port}`;
  });

  afterAll(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) =>
      server.close((err) => (err ? reject(err) : resolve())),
    );
  });

  beforeEach(() => {
    jest.spyOn(console, "warn").mockImplementation(() => undefined);
    jest.spyOn(console, "error").mockImplementation(() => undefined);
    redis.isOpen = true;
    redis.isReady = true;
    redis.counts.clear();
    redis.incr.mockReset().mockImplementation(async (key) => {
      const count = (redis.counts.get(key) ?? 0) + 1;
      redis.counts.set(key, count);
      return count;
    });
    redis.expire.mockReset().mockResolvedValue(true);
    redis.ttl.mockReset().mockResolvedValue(42);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("starts the window on the first request only", async () => {
    const first = await post({ user_id: "U1" });
    expect(first.status).toBe(200);
    expect(first.headers.get("x-ratelimit-limit")).toBe("2");
    expect(first.headers.get("x-ratelimit-remaining")).toBe("1");
    expect(redis.expire).toHaveBeenCalledTimes(1);
    expect(redis.expire).toHaveBeenCalledWith("ratelimit:pos:sale:user:U1", 60);

    const second = await post({ user_id: "U1" });
    expect(second.status).toBe(200);
    expect(second.headers.get("x-ratelimit-remaining")).toBe("0");
    expect(redis.expire).toHaveBeenCalledTimes(1);
  });

  it("answers 429 with the remaining window once the limit is passed", async () => {
    await post({ user_id: "U1" });
    await post({ user_id: "U1" });

    const third = await post({ user_id: "U1" });

    expect(third.status).toBe(429);
    expect(third.headers.get("retry-after")).toBe("42");
    expect(await third.json()).toEqual({
      error: "Too many requests, please try again later.",
      retryAfter: 42,
    });
    expect(redis.ttl).toHaveBeenCalledWith("ratelimit:pos:sale:user:U1");
  });

  it("counts each till separately", async () => {
    await post({ user_id: "U1" });
    await post({ user_id: "U1" });

    const other = await post({ user_id: 7 });

    expect(other.status).toBe(200);
    expect(redis.incr).toHaveBeenLastCalledWith("ratelimit:pos:sale:user:7");
  });

  it("falls back to the client address without a user_id", async () => {
    await post({ product_id: "P1" });
    expect(redis.incr).toHaveBeenCalledWith("ratelimit:pos:sale:ip:127.0.0.1");
  });

  it("restarts a window whose counter has no expiry", async () => {
    redis.counts.set("ratelimit:pos:sale:user:U1", 5);
    redis.ttl.mockResolvedValue(-1);

    const res = await post({ user_id: "U1" });

    expect(res.status).toBe(429);
    expect(redis.expire).toHaveBeenCalledWith("ratelimit:pos:sale:user:U1", 60);
    expect(await res.json()).toEqual({
      error: "Too many requests, please try again later.",
      retryAfter: 60,
    });
  });

  it("lets requests through when Redis is not ready", async () => {
    redis.isReady = false;
    const res = await post({ user_id: "U1" });
    expect(res.status).toBe(200);
    expect(redis.incr).not.toHaveBeenCalled();
  });

  it("lets requests through when Redis fails", async () => {
    redis.incr.mockRejectedValue(new Error("connection reset"));
    const res = await post({ user_id: "U1" });
    expect(res.status).toBe(200);
    expect(console.error).toHaveBeenCalledWith(
      "❌ Rate limit check failed on sale, letting request through:",
      "connection reset",
    );
  });
});
