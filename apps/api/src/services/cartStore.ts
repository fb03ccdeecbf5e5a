import { NotFoundError, ValidationError } from "../lib/errors.js";
import type { CartLine, Store } from "../store/types.js";
import { lineSubtotal } from "../utils/totals.js";
import { requireAdmin, requireCustomer, type Identity } from "./accessControl.js";
import type { CatalogPort } from "./catalog.js";

export type CartLineView = {
  productId: string;
  name: string;
  quantity: number;
  unitPrice: number;
  subtotal: number;
  availableQuantity: number;
  // informational only, nothing is reserved until checkout
  inStock: boolean;
  addedAt: Date;
};

export type CartView = {
  customerId: string;
  lines: CartLineView[];
  currency: string;
  total: number;
};

type CartStoreDeps = {
  store: Store;
  catalog: CatalogPort;
  currency: string;
  now?: () => Date;
};

function assertQuantity(quantity: number, allowZero: boolean) {
  const min = allowZero ? 0 : 1;
  if (!Number.isInteger(quantity) || quantity < min) {
    throw new ValidationError(allowZero ? "Quantity must be a non-negative integer" : "Quantity must be a positive integer", {
      quantity
    });
  }
}

export class CartStore {
  private readonly store: Store;
  private readonly catalog: CatalogPort;
  private readonly currency: string;
  private readonly now: () => Date;

  constructor(deps: CartStoreDeps) {
    this.store = deps.store;
    this.catalog = deps.catalog;
    this.currency = deps.currency;
    this.now = deps.now ?? (() => new Date());
  }

  async addItem(identity: Identity | undefined, productId: string, quantity: number): Promise<CartView> {
    const customer = requireCustomer(identity);
    assertQuantity(quantity, false);
    await this.requireProduct(productId);

    await this.store.withTransaction((uow) =>
      uow.carts.addQuantity(customer.customerId, productId, quantity, this.now())
    );
    return this.view(customer);
  }

  async updateItem(identity: Identity | undefined, productId: string, quantity: number): Promise<CartView> {
    const customer = requireCustomer(identity);
    assertQuantity(quantity, true);

    if (quantity === 0) {
      return this.removeItem(customer, productId);
    }

    const updated = await this.store.withTransaction((uow) =>
      uow.carts.setQuantity(customer.customerId, productId, quantity)
    );
    if (!updated) {
      throw new NotFoundError("Cart line", productId);
    }
    return this.view(customer);
  }

  async removeItem(identity: Identity | undefined, productId: string): Promise<CartView> {
    const customer = requireCustomer(identity);
    const removed = await this.store.withTransaction((uow) => uow.carts.removeLine(customer.customerId, productId));
    if (!removed) {
      throw new NotFoundError("Cart line", productId);
    }
    return this.view(customer);
  }

  async clear(identity: Identity | undefined): Promise<number> {
    const customer = requireCustomer(identity);
    return this.store.withTransaction((uow) => uow.carts.clear(customer.customerId));
  }

  async view(identity: Identity | undefined): Promise<CartView> {
    const customer = requireCustomer(identity);
    const lines = await this.store.read((uow) => uow.carts.listLines(customer.customerId));
    return this.describe(customer.customerId, lines);
  }

  async listAll(identity: Identity | undefined): Promise<CartView[]> {
    requireAdmin(identity);
    const lines = await this.store.read((uow) => uow.carts.listAll());

    const byCustomer = new Map<string, CartLine[]>();
    for (const line of lines) {
      byCustomer.set(line.customerId, [...(byCustomer.get(line.customerId) ?? []), line]);
    }
    return Promise.all([...byCustomer.entries()].map(([customerId, customerLines]) => this.describe(customerId, customerLines)));
  }

  private async requireProduct(productId: string) {
    const product = await this.catalog.getProduct(productId);
    if (!product || !product.active) {
      throw new NotFoundError("Product", productId);
    }
    return product;
  }

  private async describe(customerId: string, lines: CartLine[]): Promise<CartView> {
    const views = await Promise.all(
      lines.map(async (line): Promise<CartLineView> => {
        const [product, stock] = await Promise.all([
          this.catalog.getProduct(line.productId),
          this.store.read((uow) => uow.inventory.find(line.productId))
        ]);
        const unitPrice = product?.price ?? 0;
        const availableQuantity = stock?.availableQuantity ?? 0;
        return {
          productId: line.productId,
          name: product?.name ?? "Unavailable product",
          quantity: line.quantity,
          unitPrice,
          subtotal: lineSubtotal({ quantity: line.quantity, unitPrice }),
          availableQuantity,
          inStock: Boolean(product?.active) && availableQuantity >= line.quantity,
          addedAt: line.addedAt
        };
      })
    );

    return {
      customerId,
      lines: views,
      currency: this.currency,
      total: views.reduce((acc, line) => acc + line.subtotal, 0)
    };
  }
}
