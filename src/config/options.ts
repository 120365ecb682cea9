import fs from "fs";
import dotenv from "dotenv";
import { z } from "zod";
import { ConfigurationError } from "../utils/errors";

dotenv.config();

export const optionsSchema = z.object({
  google_sheet_id: z.string().min(1, "google_sheet_id is required"),
  service_account_json: z.string().min(1, "service_account_json is required"),
  ha_event: z.string().min(1).default("pos_sale"),
  serialize_stock_updates: z.boolean().default(true),
  product_key_precedence: z
    .enum(["scan_order", "product_id_first"])
    .default("scan_order"),
});

export type PosOptions = z.infer<typeof optionsSchema>;

export const OPTIONS_PATH = process.env.OPTIONS_PATH || "/data/options.json";

const fileSchema = z.record(z.unknown());

const readOptionsFile = (path: string): Record<string, unknown> => {
  if (!fs.existsSync(path)) return {};
  const parsed = fileSchema.safeParse(JSON.parse(fs.readFileSync(path, "utf-8")));
  if (!parsed.success) {
    throw new ConfigurationError(`Options file ${path} must hold a JSON object`);
  }
  return parsed.data;
};

// Read on every request so edits to the options file apply without a restart.
export function readOptions(path: string = OPTIONS_PATH): PosOptions {
  let fromFile: Record<string, unknown>;
  try {
    fromFile = readOptionsFile(path);
  } catch (error) {
    if (error instanceof ConfigurationError) throw error;
    throw new ConfigurationError(`Options file ${path} is not valid JSON`);
  }

  const result = optionsSchema.safeParse({
    google_sheet_id: process.env.GOOGLE_SHEET_ID,
    service_account_json: process.env.GOOGLE_SERVICE_ACCOUNT_JSON,
    ...fromFile,
  });
  if (!result.success) {
    throw new ConfigurationError(
      result.error.issues.map((issue) => issue.message).join("; "),
    );
  }
  return result.data;
}

export const serverConfig = {
  port: parseInt(process.env.PORT || "8091"),
  haUrl: process.env.HA_URL || "http://supervisor/core/api",
  haToken: process.env.SUPERVISOR_TOKEN,
  notifyTimeoutMs: parseInt(process.env.NOTIFY_TIMEOUT_MS || "5000"),
  redisUrl: process.env.REDIS_URL,
};
