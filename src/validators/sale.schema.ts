import { z } from "zod";
import { parseQuantity } from "../utils/parse";

// Ids arrive as strings or bare numbers from the POS front end.
const identifier = z
  .union([z.string(), z.number()])
  .transform((v) => String(v).trim());

const optionalIdentifier = identifier
  .optional()
  .nullable()
  .transform((v) => v || undefined);

const quantity = z.unknown().transform(parseQuantity);

export const saleRequestSchema = z.object({
  user_id: identifier.default(""),
  reseller_id: identifier.default(""),
  product_id: optionalIdentifier,
  short_id: optionalIdentifier,
  qty: quantity,
  customer_id: identifier.default("C-000"),
  payment_method: z.string().default("cash"),
});

export const checkoutItemSchema = z.object({
  product_id: optionalIdentifier,
  short_id: optionalIdentifier,
  qty: quantity,
});

export const checkoutRequestSchema = z.object({
  items: z.array(checkoutItemSchema).min(1, "No items"),
  user_id: identifier.default(""),
  reseller_id: identifier.default(""),
  customer_id: identifier.default("C-000"),
  payment_method: z.string().default("cash"),
});

export const stockQuerySchema = z.object({
  reseller_id: z.string().optional(),
  user_id: z.string().optional(),
});

export type SaleRequestInput = z.infer<typeof saleRequestSchema>;
export type CheckoutRequestInput = z.infer<typeof checkoutRequestSchema>;
export type StockQueryInput = z.infer<typeof stockQuerySchema>;
