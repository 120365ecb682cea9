import { Request, Response } from "express";
import { ZodError } from "zod";
import { readOptions, serverConfig } from "../config/options";
import { createStore } from "../config/sheets";
import { PosServices, createPosServices } from "../services/posServices";
import { PosError, ValidationError } from "../utils/errors";
import {
  checkoutRequestSchema,
  saleRequestSchema,
  stockQuerySchema,
} from "../validators/sale.schema";

// Options are re-read for every request; only the Sheets client is cached.
const servicesForRequest = (): PosServices => {
  const options = readOptions();
  return createPosServices(createStore(options), options);
};

const handleError = (res: Response, error: unknown): Response => {
  if (error instanceof ZodError) {
    const message = error.issues.map((issue) => issue.message).join("; ");
    return handleError(res, new ValidationError(message));
  }
  if (error instanceof PosError) {
    if (error.status >= 500) console.error(error);
    return res.status(error.status).json({ error: error.message });
  }
  console.error(error);
  return res.status(500).json({ error: "Internal Server Error" });
};

export class PosController {
  static health(req: Request, res: Response) {
    res.json({ status: "ok", port: serverConfig.port });
  }

  static async listUsers(req: Request, res: Response) {
    try {
      const { catalog } = servicesForRequest();
      res.json(await catalog.listUsers());
    } catch (error) {
      handleError(res, error);
    }
  }

  static async listCustomers(req: Request, res: Response) {
    try {
      const { catalog } = servicesForRequest();
      res.json(await catalog.listCustomers());
    } catch (error) {
      handleError(res, error);
    }
  }

  static async listStock(req: Request, res: Response) {
    try {
      const q = stockQuerySchema.parse(req.query);
      const { catalog } = servicesForRequest();
      res.json(await catalog.listStock(q.reseller_id, q.user_id));
    } catch (error) {
      handleError(res, error);
    }
  }

  static async recordSale(req: Request, res: Response) {
    try {
      const body = saleRequestSchema.parse(req.body ?? {});
      if (!body.product_id && !body.short_id) {
        throw new ValidationError("product_id or short_id required");
      }

      const { sales } = servicesForRequest();
      const result = await sales.recordSale({
        userId: body.user_id,
        resellerId: body.reseller_id,
        productId: body.product_id,
        shortId: body.short_id,
        qty: body.qty,
        customerId: body.customer_id,
        paymentMethod: body.payment_method,
      });

      res.json({
        status: "ok",
        total: result.total,
        customer_id: result.customerId,
        payment_method: result.paymentMethod,
        price: result.price,
        commission_pct: result.commissionPct,
      });
    } catch (error) {
      handleError(res, error);
    }
  }

  static async checkout(req: Request, res: Response) {
    try {
      const body = checkoutRequestSchema.parse(req.body ?? {});

      const { sales } = servicesForRequest();
      const result = await sales.checkout({
        items: body.items,
        userId: body.user_id,
        resellerId: body.reseller_id,
        customerId: body.customer_id,
        paymentMethod: body.payment_method,
      });

      console.log(
        `✅ Checkout: ${result.linesWritten} line(s), total ${result.grandTotal}`,
      );
      res.json({
        status: "ok",
        total: result.grandTotal,
        lines: result.linesWritten,
        customer_id: result.customerId,
        payment_method: result.paymentMethod,
      });
    } catch (error) {
      handleError(res, error);
    }
  }
}
