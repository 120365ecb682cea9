import {
  AppliedPrice,
  Product,
  ResellerPrice,
  TABS,
  TabularStore,
} from "../models/types";
import {
  EARLIEST_DAY,
  LATEST_DAY,
  dayOf,
  parseDay,
  parseNumber,
} from "../utils/parse";
import { field, mapRows } from "../utils/records";

export class PricingService {
  constructor(private store: TabularStore) {}

  // Latest-starting window that contains onDate; ties go to the later row.
  async resolvePrice(
    resellerId: string,
    productId: string,
    onDate: Date = new Date(),
  ): Promise<ResellerPrice | null> {
    const rows = mapRows(await this.store.readTab(TABS.RESELLER_PRICING));
    const today = dayOf(onDate);

    let best: ResellerPrice | null = null;
    let bestFrom = EARLIEST_DAY;

    for (const r of rows) {
      if (field(r, "reseller_id") !== resellerId) continue;
      if (field(r, "product_id") !== productId) continue;

      const from = parseDay(field(r, "valid_from"), EARLIEST_DAY);
      const to = parseDay(field(r, "valid_to"), LATEST_DAY);
      if (from > today || today > to) continue;

      if (!best || from >= bestFrom) {
        best = r;
        bestFrom = from;
      }
    }
    return best;
  }

  static applyPrice(product: Product, resellerPrice: ResellerPrice | null): AppliedPrice {
    const basePrice = parseNumber(field(product, "base_price"), 0);
    if (!resellerPrice) return { price: basePrice, commissionPct: 0 };
    return {
      price: parseNumber(field(resellerPrice, "price"), basePrice),
      commissionPct: parseNumber(field(resellerPrice, "commission_pct"), 0),
    };
  }
}
