import { PosOptions, serverConfig } from "../config/options";
import { EventPublisher, TabularStore } from "../models/types";
import { CatalogService } from "./CatalogService";
import { NotificationService } from "./NotificationService";
import { PricingService } from "./PricingService";
import { SaleService } from "./SaleService";
import { StockService } from "./StockService";

export interface PosServices {
  catalog: CatalogService;
  sales: SaleService;
}

export function createPosServices(
  store: TabularStore,
  options: PosOptions,
  publisher: EventPublisher = new NotificationService({
    baseUrl: serverConfig.haUrl,
    token: serverConfig.haToken,
    timeoutMs: serverConfig.notifyTimeoutMs,
  }),
): PosServices {
  const catalog = new CatalogService(store, options.product_key_precedence);
  const sales = new SaleService({
    store,
    catalog,
    pricing: new PricingService(store),
    stock: new StockService(store, options.serialize_stock_updates),
    publisher,
    eventName: options.ha_event,
  });
  return { catalog, sales };
}
