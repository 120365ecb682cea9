import { Request, Response, NextFunction } from "express";
import { v4 as uuidv4 } from "uuid";

/**
 * Logs every request with a request id (echoed back as X-Request-Id),
 * then the status code and duration once the response is finished.
 */
export const requestLogger = (req: Request, res: Response, next: NextFunction) => {
  const startTime = Date.now();
  const requestId = req.header("x-request-id") || uuidv4();
  res.setHeader("X-Request-Id", requestId);

  console.log(`📥 [${requestId}] ${req.method} ${req.originalUrl}`);
  if (req.body && Object.keys(req.body).length > 0) {
    console.log(`📦 [${requestId}] Body:`, JSON.stringify(req.body));
  }

  res.on("finish", () => {
    const duration = Date.now() - startTime;
    const icon = res.statusCode >= 500 ? "❌" : res.statusCode >= 400 ? "⚠️" : "📤";
    console.log(
      `${icon} [${requestId}] ${req.method} ${req.path} -> ${res.statusCode} (${duration}ms)`,
    );
  });

  next();
};
