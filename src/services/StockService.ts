import { Cell, TABS, TabularStore } from "../models/types";
import { KeyedLock } from "../utils/lock";
import { toNumber } from "../utils/parse";

export interface StockAdjustment {
  rowIndex: number;
  previousQty: number;
  newQty: number;
}

// Shared by every request in this process.
export const stockLocks = new KeyedLock();

export class StockService {
  constructor(
    private store: TabularStore,
    private serialize: boolean = true,
    private locks: KeyedLock = stockLocks,
  ) {}

  /**
   * Best-effort decrement of the first Stock row for this product and
   * reseller. Returns null when nothing was adjusted: no reseller, missing
   * columns, no matching row, or a quantity cell that is not a number.
   * Empty quantities count as 0 and results may go negative.
   */
  async decrement(
    productId: string,
    resellerId: string,
    qty: number,
  ): Promise<StockAdjustment | null> {
    if (!resellerId) return null;
    if (!this.serialize) return this.readModifyWrite(productId, resellerId, qty);
    return this.locks.run(`${productId}\u0000${resellerId}`, () =>
      this.readModifyWrite(productId, resellerId, qty),
    );
  }

  private async readModifyWrite(
    productId: string,
    resellerId: string,
    qty: number,
  ): Promise<StockAdjustment | null> {
    const rows = await this.store.readTab(TABS.STOCK);
    if (rows.length === 0) return null;

    const [header, ...body] = rows;
    const pidIdx = header.indexOf("product_id");
    const ridIdx = header.indexOf("reseller_id");
    const qtyIdx = header.indexOf("reseller_qty");
    // Stock tracking is optional per deployment.
    if (pidIdx < 0 || ridIdx < 0 || qtyIdx < 0) return null;

    const i = body.findIndex(
      (r) =>
        String(r[pidIdx] ?? "") === String(productId) &&
        String(r[ridIdx] ?? "") === String(resellerId),
    );
    if (i < 0) return null;

    const row = body[i];
    const cell = String(row[qtyIdx] ?? "").trim();
    const previousQty = cell === "" ? 0 : toNumber(cell);
    // A count we cannot read (e.g. "1,200") is left untouched.
    if (previousQty === undefined) return null;
    const newQty = previousQty - qty;

    const out: Cell[] = [...row];
    while (out.length < header.length) out.push("");
    out[qtyIdx] = newQty;

    // +2: 1-based rows and the header row
    const rowIndex = i + 2;
    await this.store.updateRow(TABS.STOCK, rowIndex, out);
    return { rowIndex, previousQty, newQty };
  }
}
