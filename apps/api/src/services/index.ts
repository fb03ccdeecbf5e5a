import type { Store } from "../store/types.js";
import { CartStore } from "./cartStore.js";
import type { CatalogPort } from "./catalog.js";
import { InventoryLedger } from "./inventoryLedger.js";
import type { OrderStatusNotifier } from "./notificationQueue.js";
import { OrderService } from "./orderService.js";
import { PaymentProcessor } from "./paymentProcessor.js";
import type { PaymentAuthorizer } from "./paymentSimulator.js";
import { SalesRecorder } from "./salesRecorder.js";

export type ServiceDeps = {
  store: Store;
  catalog: CatalogPort;
  authorizer: PaymentAuthorizer;
  notify: OrderStatusNotifier;
  currency: string;
  now?: () => Date;
};

export type Services = {
  inventory: InventoryLedger;
  carts: CartStore;
  orders: OrderService;
  payments: PaymentProcessor;
  sales: SalesRecorder;
};

export function createServices(deps: ServiceDeps): Services {
  const { store, catalog, authorizer, notify, currency, now } = deps;

  const inventory = new InventoryLedger({ store, now });
  const sales = new SalesRecorder({ store, now });
  const carts = new CartStore({ store, catalog, currency, now });
  const orders = new OrderService({ store, ledger: inventory, catalog, sales, notify, currency, now });
  const payments = new PaymentProcessor({ store, orders, sales, authorizer, notify, now });

  return { inventory, carts, orders, payments, sales };
}
