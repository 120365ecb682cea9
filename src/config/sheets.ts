import fs from "fs";
import { google, sheets_v4 } from "googleapis";
import { z } from "zod";
import { PosOptions } from "./options";
import { SheetsStore } from "../services/SheetsStore";
import { TabularStore } from "../models/types";
import { ConfigurationError } from "../utils/errors";

const SCOPES = ["https://www.googleapis.com/auth/spreadsheets"];

const serviceAccountKeySchema = z.object({
  client_email: z.string().min(1),
  private_key: z.string().min(1),
});

export type ServiceAccountKey = z.infer<typeof serviceAccountKeySchema>;

/**
 * Reads the service account key up front, so a missing or broken file is
 * reported as configuration rather than as a failing Sheets call.
 */
export function readServiceAccountKey(keyFile: string): ServiceAccountKey {
  let raw: string;
  try {
    raw = fs.readFileSync(keyFile, "utf-8");
  } catch {
    throw new ConfigurationError(`Service account key ${keyFile} is missing or unreadable`);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new ConfigurationError(`Service account key ${keyFile} is not valid JSON`);
  }

  const parsed = serviceAccountKeySchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Service account key ${keyFile} needs client_email and private_key`,
    );
  }
  return parsed.data;
}

// One authenticated client per service account key file.
const clients = new Map<string, sheets_v4.Sheets>();

export function getSheetsClient(keyFile: string): sheets_v4.Sheets {
  let client = clients.get(keyFile);
  if (!client) {
    const { client_email, private_key } = readServiceAccountKey(keyFile);
    const auth = new google.auth.GoogleAuth({
      credentials: { client_email, private_key },
      scopes: SCOPES,
    });
    client = google.sheets({ version: "v4", auth });
    clients.set(keyFile, client);
  }
  return client;
}

export const createStore = (options: PosOptions): TabularStore =>
  new SheetsStore(
    getSheetsClient(options.service_account_json),
    options.google_sheet_id,
  );
