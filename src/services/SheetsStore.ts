import { sheets_v4 } from "googleapis";
import { Cell, Row, TabName, TabularStore } from "../models/types";
import { TransientStoreError, errorMessage } from "../utils/errors";

// 1 -> A, 26 -> Z, 27 -> AA
export function columnLetter(column: number): string {
  let letters = "";
  let n = column;
  while (n > 0) {
    const rem = (n - 1) % 26;
    letters = String.fromCharCode(65 + rem) + letters;
    n = Math.floor((n - 1) / 26);
  }
  return letters;
}

export const rowRange = (tab: string, rowIndex: number, width: number): string =>
  `${tab}!A${rowIndex}:${columnLetter(Math.max(width, 1))}${rowIndex}`;

export class SheetsStore implements TabularStore {
  constructor(
    private sheets: sheets_v4.Sheets,
    private spreadsheetId: string,
  ) {}

  async readTab(tab: TabName): Promise<Row[]> {
    try {
      const res = await this.sheets.spreadsheets.values.get({
        spreadsheetId: this.spreadsheetId,
        range: `${tab}!A:Z`,
      });
      const values: unknown[][] = res.data.values ?? [];
      return values.map((row) => row.map((cell) => String(cell ?? "")));
    } catch (error) {
      throw new TransientStoreError(
        `Failed to read tab ${tab}: ${errorMessage(error)}`,
        error,
      );
    }
  }

  async appendRow(tab: TabName, row: Cell[]): Promise<void> {
    try {
      await this.sheets.spreadsheets.values.append({
        spreadsheetId: this.spreadsheetId,
        range: `${tab}!A:Z`,
        valueInputOption: "RAW",
        requestBody: { values: [row] },
      });
    } catch (error) {
      throw new TransientStoreError(
        `Failed to append to tab ${tab}: ${errorMessage(error)}`,
        error,
      );
    }
  }

  async updateRow(tab: TabName, rowIndex: number, row: Cell[]): Promise<void> {
    try {
      await this.sheets.spreadsheets.values.update({
        spreadsheetId: this.spreadsheetId,
        range: rowRange(tab, rowIndex, row.length),
        valueInputOption: "RAW",
        requestBody: { values: [row] },
      });
    } catch (error) {
      throw new TransientStoreError(
        `Failed to update row ${rowIndex} of tab ${tab}: ${errorMessage(error)}`,
        error,
      );
    }
  }
}
