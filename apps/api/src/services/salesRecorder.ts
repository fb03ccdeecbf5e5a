import type { SalesQuery } from "@agromarket/shared-types";
import { DuplicateSaleError, InvalidTransitionError, NotFoundError } from "../lib/errors.js";
import type { SaleRecord, Store, UnitOfWork } from "../store/types.js";
import { lineSubtotal } from "../utils/totals.js";
import { requireAdmin, requireIdentity, requireOwnerOrAdmin, type Identity } from "./accessControl.js";
import type { SaleRegistrar } from "./saleRegistrar.js";

type SalesRecorderDeps = {
  store: Store;
  now?: () => Date;
};

/**
 * Writes one immutable sale record per completed order. The unique index on
 * the sale's order id decides concurrent registrations; the loser reads the
 * winner's record.
 */
export class SalesRecorder implements SaleRegistrar {
  private readonly store: Store;
  private readonly now: () => Date;

  constructor(deps: SalesRecorderDeps) {
    this.store = deps.store;
    this.now = deps.now ?? (() => new Date());
  }

  async registerWithin(uow: UnitOfWork, orderId: string): Promise<SaleRecord> {
    const existing = await uow.sales.findByOrder(orderId);
    if (existing) {
      return existing;
    }

    const order = await uow.orders.findById(orderId);
    if (!order) {
      throw new NotFoundError("Order", orderId);
    }
    if (order.status !== "completed") {
      throw new InvalidTransitionError(
        order.id,
        order.status,
        "completed",
        `Order ${order.orderRef} must be completed before a sale is recorded`
      );
    }

    // Orders completed by an administrator after delivery carry no approved payment.
    const payments = await uow.payments.listByOrder(order.id);
    const approved = payments.find((payment) => payment.status === "approved");

    return uow.sales.insert({
      orderId: order.id,
      customerId: order.customerId,
      date: this.now(),
      total: order.total,
      currency: order.currency,
      status: "completed",
      settlement: approved ? "payment" : "on_delivery",
      transactionRef: approved?.transactionRef ?? null,
      lines: order.lines.map((line) => ({
        productId: line.productId,
        name: line.name,
        quantity: line.quantity,
        unitPrice: line.unitPrice,
        subtotal: lineSubtotal(line)
      }))
    });
  }

  async registerSaleFromOrder(orderId: string): Promise<SaleRecord> {
    try {
      return await this.store.withTransaction((uow) => this.registerWithin(uow, orderId));
    } catch (error) {
      if (!(error instanceof DuplicateSaleError)) {
        throw error;
      }
      const winner = await this.store.read((uow) => uow.sales.findByOrder(orderId));
      if (!winner) {
        throw error;
      }
      return winner;
    }
  }

  async getSaleByOrder(identity: Identity | undefined, orderId: string): Promise<SaleRecord> {
    const caller = requireIdentity(identity);
    const sale = await this.store.read((uow) => uow.sales.findByOrder(orderId));
    if (!sale) {
      throw new NotFoundError("Sale", orderId);
    }
    requireOwnerOrAdmin(caller, sale.customerId);
    return sale;
  }

  async listMySales(identity: Identity | undefined): Promise<SaleRecord[]> {
    const caller = requireIdentity(identity);
    return this.store.read((uow) => uow.sales.list({ customerId: caller.customerId }));
  }

  async listSales(identity: Identity | undefined, query: SalesQuery = {}): Promise<SaleRecord[]> {
    requireAdmin(identity);
    return this.store.read((uow) => uow.sales.list(query));
  }
}
