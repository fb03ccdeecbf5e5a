import { vi } from "vitest";
import type { Identity } from "../../src/services/accessControl.js";
import type { CatalogPort, CatalogProduct } from "../../src/services/catalog.js";
import { createServices } from "../../src/services/index.js";
import type { OrderStatusNotifier } from "../../src/services/notificationQueue.js";
import { createSimulatedAuthorizer, type PaymentAuthorizer } from "../../src/services/paymentSimulator.js";
import { signAccessToken } from "../../src/utils/tokens.js";
import { MemoryStore } from "./memoryStore.js";

export const alice: Identity = { customerId: "customer-alice", role: "customer", email: "alice@example.com" };
export const bob: Identity = { customerId: "customer-bob", role: "customer", email: "bob@example.com" };
export const admin: Identity = { customerId: "admin-1", role: "admin" };

export const tomatoes: CatalogProduct = { id: "prod-tomato", name: "Roma Tomatoes (1kg)", price: 350, active: true };
export const maize: CatalogProduct = { id: "prod-maize", name: "Maize Seed (5kg)", price: 1200, active: true };
export const fertilizer: CatalogProduct = { id: "prod-fertilizer", name: "NPK Fertilizer (25kg)", price: 4500, active: true };

export class MemoryCatalog implements CatalogPort {
  private readonly products = new Map<string, CatalogProduct>();

  constructor(products: CatalogProduct[]) {
    for (const product of products) {
      this.products.set(product.id, { ...product });
    }
  }

  async getProduct(productId: string) {
    const product = this.products.get(productId);
    return product ? { ...product } : null;
  }

  setPrice(productId: string, price: number) {
    const product = this.products.get(productId);
    if (product) {
      product.price = price;
    }
  }

  deactivate(productId: string) {
    const product = this.products.get(productId);
    if (product) {
      product.active = false;
    }
  }
}

type HarnessOptions = {
  stock?: Record<string, number>;
  products?: CatalogProduct[];
  authorizer?: PaymentAuthorizer;
};

export function createHarness(options: HarnessOptions = {}) {
  const store = new MemoryStore();
  for (const [productId, quantity] of Object.entries(options.stock ?? {})) {
    store.seedStock(productId, quantity);
  }

  const catalog = new MemoryCatalog(options.products ?? [tomatoes, maize, fertilizer]);
  const notify = vi.fn<OrderStatusNotifier>(async () => ({ enqueued: true }));
  const services = createServices({
    store,
    catalog,
    authorizer: options.authorizer ?? createSimulatedAuthorizer({ mode: "approve" }),
    notify,
    currency: "USD"
  });

  return { store, catalog, notify, services };
}

export type Harness = ReturnType<typeof createHarness>;

/** Fills the cart and places an order for `identity`. */
export async function placeOrder(harness: Harness, identity: Identity, lines: Array<[string, number]>) {
  for (const [productId, quantity] of lines) {
    await harness.services.carts.addItem(identity, productId, quantity);
  }
  return harness.services.orders.createOrder(identity, {
    shippingAddress: { address: "14 Farm Road", city: "Nakuru" }
  });
}

export function bearer(identity: Identity) {
  return `Bearer ${signAccessToken({ userId: identity.customerId, role: identity.role, email: identity.email })}`;
}

/**
 * Authorizer whose decisions are released by the test, for interleaving a
 * pending authorization with other requests.
 */
export function createGatedAuthorizer(approved: boolean) {
  let release: () => void = () => undefined;
  const gate = new Promise<void>((resolve) => {
    release = resolve;
  });
  const authorizer: PaymentAuthorizer = {
    async authorize() {
      await gate;
      return approved ? { approved: true } : { approved: false, reason: "Payment declined by issuer" };
    }
  };
  return { authorizer, release: () => release() };
}
