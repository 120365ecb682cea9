import express from "express";
import cors from "cors";
import { PosController } from "./controllers/PosController";
import { requestLogger } from "./middleware/logger";
import { rateLimit } from "./middleware/rateLimit";

export function createApp() {
  const app = express();

  app.use(cors());
  app.use(express.json());
  app.use(requestLogger);

  app.get("/health", PosController.health);

  // Reads
  app.get("/pos/users", PosController.listUsers);
  app.get("/pos/customers", PosController.listCustomers);
  app.get("/pos/stock", PosController.listStock);

  // Sales
  app.post(
    "/pos/sale",
    rateLimit({ scope: "sale", windowSeconds: 60, maxRequests: 120 }),
    PosController.recordSale,
  );
  app.post(
    "/pos/checkout",
    rateLimit({ scope: "checkout", windowSeconds: 60, maxRequests: 60 }),
    PosController.checkout,
  );

  return app;
}
