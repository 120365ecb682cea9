export type Cell = string | number;

// One row as read from a tab: every cell comes back as a string.
export type Row = string[];

export type SheetRecord = Record<string, string>;

export const TABS = {
  USERS: "Users",
  CUSTOMERS: "Customers",
  PRODUCTS: "Products",
  RESELLER_PRICING: "ResellerPricing",
  STOCK: "Stock",
  SALES: "Sales",
} as const;

export type TabName = (typeof TABS)[keyof typeof TABS];

export interface TabularStore {
  readTab(tab: TabName): Promise<Row[]>;
  appendRow(tab: TabName, row: Cell[]): Promise<void>;
  // rowIndex is the 1-based sheet row, header included
  updateRow(tab: TabName, rowIndex: number, row: Cell[]): Promise<void>;
}

export interface EventPublisher {
  publish(eventName: string, payload: Record<string, unknown>): Promise<void>;
}

export type ProductKeyPrecedence = "scan_order" | "product_id_first";

// Records keep every cell as a string; consumers parse what they need.
export type Product = SheetRecord;
export type User = SheetRecord;
export type ResellerPrice = SheetRecord;
export type StockEntry = SheetRecord;

export interface AppliedPrice {
  price: number;
  commissionPct: number;
}

export interface SaleRequest {
  userId: string;
  resellerId: string;
  productId?: string;
  shortId?: string;
  qty: number;
  customerId: string;
  paymentMethod: string;
}

export interface CheckoutItem {
  product_id?: string;
  short_id?: string;
  qty: number;
}

export interface CheckoutRequest {
  items: CheckoutItem[];
  userId: string;
  resellerId: string;
  customerId: string;
  paymentMethod: string;
}

export interface SaleResult {
  total: number;
  price: number;
  commissionPct: number;
  customerId: string;
  paymentMethod: string;
}

export interface CheckoutResult {
  grandTotal: number;
  linesWritten: number;
  customerId: string;
  paymentMethod: string;
}
