import {
  Cell,
  CheckoutItem,
  CheckoutRequest,
  CheckoutResult,
  EventPublisher,
  Product,
  SaleRequest,
  SaleResult,
  TABS,
  TabularStore,
  User,
} from "../models/types";
import { NotFoundError, ValidationError, errorMessage } from "../utils/errors";
import { field } from "../utils/records";
import { CatalogService } from "./CatalogService";
import { PricingService } from "./PricingService";
import { StockService } from "./StockService";

export interface SaleServiceDeps {
  store: TabularStore;
  catalog: CatalogService;
  pricing: PricingService;
  stock: StockService;
  publisher: EventPublisher;
  eventName: string;
  now?: () => Date;
}

interface LineContext {
  userId: string;
  personEntityId: string;
  resellerId: string;
  customerId: string;
  paymentMethod: string;
}

interface WrittenLine {
  productId: string;
  qty: number;
  price: number;
  commissionPct: number;
  total: number;
}

export class SaleService {
  private store: TabularStore;
  private catalog: CatalogService;
  private pricing: PricingService;
  private stock: StockService;
  private publisher: EventPublisher;
  private eventName: string;
  private now: () => Date;

  constructor(deps: SaleServiceDeps) {
    this.store = deps.store;
    this.catalog = deps.catalog;
    this.pricing = deps.pricing;
    this.stock = deps.stock;
    this.publisher = deps.publisher;
    this.eventName = deps.eventName;
    this.now = deps.now ?? (() => new Date());
  }

  async recordSale(req: SaleRequest): Promise<SaleResult> {
    if (!req.productId && !req.shortId) {
      throw new ValidationError("product_id or short_id required");
    }

    const user = await this.catalog.findUserById(req.userId);
    const product = await this.catalog.findProduct(req.productId, req.shortId);
    if (!product) throw new NotFoundError("Product not found");

    const line = await this.writeLine(this.contextFor(req, user), product, req.qty);

    this.notify({
      user_id: req.userId,
      reseller_id: req.resellerId,
      customer_id: req.customerId,
      total: line.total,
      product_id: line.productId,
      qty: line.qty,
    });

    return {
      total: line.total,
      price: line.price,
      commissionPct: line.commissionPct,
      customerId: req.customerId,
      paymentMethod: req.paymentMethod,
    };
  }

  /**
   * Records each item as its own Sales line. A missing product aborts the
   * remaining items; lines already written stay in the log.
   */
  async checkout(req: CheckoutRequest): Promise<CheckoutResult> {
    if (req.items.length === 0) throw new ValidationError("No items");

    const user = await this.catalog.findUserById(req.userId);
    const ctx = this.contextFor(req, user);

    let grandTotal = 0;
    let linesWritten = 0;
    for (const item of req.items) {
      const product = await this.catalog.findProduct(item.product_id, item.short_id);
      if (!product) {
        console.error(
          `❌ Checkout aborted after ${linesWritten} line(s): product not found`,
          item,
        );
        throw new NotFoundError(`Product not found: ${JSON.stringify(item)}`);
      }
      const line = await this.writeLine(ctx, product, item.qty);
      grandTotal += line.total;
      linesWritten += 1;
    }

    this.notify({
      user_id: req.userId,
      reseller_id: req.resellerId,
      customer_id: req.customerId,
      total: grandTotal,
      items: req.items.map((item: CheckoutItem) => ({ ...item })),
    });

    return {
      grandTotal,
      linesWritten,
      customerId: req.customerId,
      paymentMethod: req.paymentMethod,
    };
  }

  private contextFor(
    req: Pick<SaleRequest, "userId" | "resellerId" | "customerId" | "paymentMethod">,
    user: User | null,
  ): LineContext {
    return {
      userId: req.userId,
      personEntityId: user ? field(user, "person_entity_id") : "",
      resellerId: req.resellerId,
      customerId: req.customerId,
      paymentMethod: req.paymentMethod,
    };
  }

  private async writeLine(
    ctx: LineContext,
    product: Product,
    qty: number,
  ): Promise<WrittenLine> {
    const productId = field(product, "product_id");
    const shortId = field(product, "short_id");
    const soldAt = this.now();

    const resellerPrice = await this.pricing.resolvePrice(
      ctx.resellerId,
      productId,
      soldAt,
    );
    const { price, commissionPct } = PricingService.applyPrice(product, resellerPrice);
    const total = price * qty;

    const saleRow: Cell[] = [
      soldAt.toISOString(),
      ctx.userId,
      ctx.personEntityId,
      ctx.customerId,
      productId,
      shortId,
      qty,
      price,
      commissionPct,
      total,
      ctx.paymentMethod,
    ];
    await this.store.appendRow(TABS.SALES, saleRow);
    console.log(
      `🧾 Sale recorded: ${productId} x${qty} @ ${price} = ${total} (${ctx.paymentMethod})`,
    );

    await this.stock.decrement(productId, ctx.resellerId, qty);

    return { productId, qty, price, commissionPct, total };
  }

  private notify(payload: Record<string, unknown>) {
    this.publisher.publish(this.eventName, payload).catch((error: unknown) => {
      console.warn(`⚠️ Event ${this.eventName} not delivered: ${errorMessage(error)}`);
    });
  }
}
