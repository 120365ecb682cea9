import { Row, SheetRecord } from "../models/types";

/**
 * Maps a tab's rows to records keyed by the header row. Missing trailing
 * cells become "". Header-only or empty tabs give no records.
 */
export function mapRows(rows: Row[]): SheetRecord[] {
  if (rows.length < 2) return [];
  const [header, ...body] = rows;
  return body.map((row) => {
    const record: SheetRecord = {};
    header.forEach((name, i) => {
      record[name] = i < row.length ? row[i] : "";
    });
    return record;
  });
}

export const field = (record: SheetRecord, name: string): string =>
  record[name] ?? "";
