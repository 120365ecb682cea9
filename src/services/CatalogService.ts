import {
  Product,
  ProductKeyPrecedence,
  SheetRecord,
  StockEntry,
  TABS,
  TabularStore,
  User,
} from "../models/types";
import { field, mapRows } from "../utils/records";

export class CatalogService {
  constructor(
    private store: TabularStore,
    private precedence: ProductKeyPrecedence = "scan_order",
  ) {}

  async listUsers(): Promise<User[]> {
    return mapRows(await this.store.readTab(TABS.USERS));
  }

  async listCustomers(): Promise<SheetRecord[]> {
    return mapRows(await this.store.readTab(TABS.CUSTOMERS));
  }

  async findUserById(userId?: string): Promise<User | null> {
    if (!userId) return null;
    const users = await this.listUsers();
    return users.find((u) => field(u, "user_id") === userId) ?? null;
  }

  /**
   * Looks a product up by product_id or short_id in one scan.
   *
   * With "scan_order" the first row matching either key wins, so a short_id
   * hit can beat a product_id hit further down the tab. With
   * "product_id_first" a product_id hit anywhere in the tab wins.
   */
  async findProduct(productId?: string, shortId?: string): Promise<Product | null> {
    const products = mapRows(await this.store.readTab(TABS.PRODUCTS));
    let shortIdMatch: Product | null = null;

    for (const p of products) {
      if (productId && field(p, "product_id") === productId) return p;
      if (shortId && field(p, "short_id") === shortId) {
        if (this.precedence === "scan_order") return p;
        shortIdMatch = shortIdMatch ?? p;
      }
    }
    return shortIdMatch;
  }

  /**
   * A userId takes over from resellerId when the user resolves to a
   * reseller; otherwise the resellerId filter (if any) applies.
   */
  async listStock(resellerId?: string, userId?: string): Promise<StockEntry[]> {
    const items = mapRows(await this.store.readTab(TABS.STOCK));

    let filter = resellerId || "";
    if (userId) {
      const user = await this.findUserById(userId);
      const linked = user ? field(user, "reseller_id") : "";
      if (linked) filter = linked;
    }

    if (!filter) return items;
    return items.filter((x) => field(x, "reseller_id") === filter);
  }
}
