import { randomBytes } from "crypto";
import type { OrderStatus, OrderStatusUpdateRequest, ShippingAddressInput } from "@agromarket/shared-types";
import { InsufficientStockError, InvalidTransitionError, NotFoundError, ValidationError } from "../lib/errors.js";
import type { Order, OrderFilter, OrderLine, OrderStatusEvent, Store, UnitOfWork } from "../store/types.js";
import { calculateTotal } from "../utils/totals.js";
import { requireAdmin, requireCustomer, requireIdentity, requireOwnerOrAdmin, type Identity } from "./accessControl.js";
import type { CatalogPort } from "./catalog.js";
import type { InventoryLedger, MovementRef } from "./inventoryLedger.js";
import { notifyOrderStatus, type OrderStatusNotifier } from "./notificationQueue.js";
import { CANCELLABLE_STATUSES, canTransition, isSettleable, isTerminal, SETTLEABLE_STATUSES } from "./orderStatus.js";
import type { SaleRegistrar } from "./saleRegistrar.js";

export type CreateOrderInput = {
  shippingAddress: ShippingAddressInput;
};

/** Who caused a change, as written to the timeline and the inventory ledger. */
export type Actor = {
  id: string;
  role: string;
};

const SYSTEM_ACTOR: Actor = { id: "system", role: "system" };

type OrderServiceDeps = {
  store: Store;
  ledger: InventoryLedger;
  catalog: CatalogPort;
  sales: SaleRegistrar;
  notify: OrderStatusNotifier;
  currency: string;
  now?: () => Date;
};

export function createOrderRef(at: Date) {
  return `AGR-${at.getTime()}-${randomBytes(3).toString("hex").toUpperCase()}`;
}

function actorOf(identity: Identity): Actor {
  return { id: identity.customerId, role: identity.role };
}

export class OrderService {
  private readonly store: Store;
  private readonly ledger: InventoryLedger;
  private readonly catalog: CatalogPort;
  private readonly sales: SaleRegistrar;
  private readonly notify: OrderStatusNotifier;
  private readonly currency: string;
  private readonly now: () => Date;

  constructor(deps: OrderServiceDeps) {
    this.store = deps.store;
    this.ledger = deps.ledger;
    this.catalog = deps.catalog;
    this.sales = deps.sales;
    this.notify = deps.notify;
    this.currency = deps.currency;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Converts the caller's cart into a pending order. Reservation, order insert
   * and cart clearing share one transaction, so a line that cannot be reserved
   * leaves stock, cart and orders exactly as they were.
   */
  async createOrder(identity: Identity | undefined, input: CreateOrderInput): Promise<Order> {
    const customer = requireCustomer(identity);

    const order = await this.store.withTransaction(async (uow) => {
      const cartLines = await uow.carts.listLines(customer.customerId);
      if (cartLines.length === 0) {
        throw new ValidationError("Cart is empty", { customerId: customer.customerId });
      }

      const createdAt = this.now();
      const orderRef = createOrderRef(createdAt);
      const lines: OrderLine[] = [];

      for (const cartLine of cartLines) {
        const product = await this.catalog.getProduct(cartLine.productId);
        if (!product || !product.active) {
          throw new NotFoundError("Product", cartLine.productId);
        }
        if (!Number.isInteger(product.price) || product.price < 0) {
          throw new ValidationError("Product price must be a non-negative integer", {
            productId: product.id,
            price: product.price
          });
        }

        await this.ledger.reserve(uow, cartLine.productId, cartLine.quantity, {
          reference: orderRef,
          actorId: customer.customerId,
          actorRole: customer.role
        });

        lines.push({
          productId: cartLine.productId,
          name: product.name,
          quantity: cartLine.quantity,
          unitPrice: product.price
        });
      }

      const created = await uow.orders.insert({
        orderRef,
        customerId: customer.customerId,
        contactEmail: customer.email ?? null,
        status: "pending",
        total: calculateTotal(lines),
        currency: this.currency,
        shippingAddress: {
          address: input.shippingAddress.address,
          city: input.shippingAddress.city,
          phone: input.shippingAddress.phone ?? null
        },
        inventoryReserved: true,
        trackingNumber: null,
        lines,
        timeline: [
          {
            status: "pending",
            note: "Order created and awaiting payment confirmation.",
            trackingNumber: null,
            actor: customer.role,
            at: createdAt
          }
        ]
      });

      await uow.carts.clear(customer.customerId);
      return created;
    });

    console.info("[api][orders] order created", {
      orderRef: order.orderRef,
      lines: order.lines.length,
      total: order.total
    });
    return order;
  }

  async cancelOrder(identity: Identity | undefined, orderId: string, note?: string): Promise<Order> {
    const caller = requireIdentity(identity);

    const cancelled = await this.store.withTransaction(async (uow) => {
      const order = await this.requireOrder(uow, orderId);
      requireOwnerOrAdmin(caller, order.customerId);
      return this.cancelWithin(uow, order, actorOf(caller), note ?? "Order cancelled.");
    });

    console.info("[api][orders] order cancelled", { orderRef: cancelled.orderRef, by: caller.role });
    await notifyOrderStatus(this.notify, cancelled, note);
    return cancelled;
  }

  async advanceStatus(
    identity: Identity | undefined,
    orderId: string,
    update: OrderStatusUpdateRequest
  ): Promise<Order> {
    const admin = requireAdmin(identity);

    if (update.status === "cancelled") {
      return this.cancelOrder(admin, orderId, update.note);
    }

    const target = update.status;
    const updated = await this.store.withTransaction(async (uow) => {
      const order = await this.requireOrder(uow, orderId);
      if (!canTransition(order.status, target)) {
        throw new InvalidTransitionError(
          order.id,
          order.status,
          target,
          isTerminal(order.status) ? `Order ${order.orderRef} is ${order.status} and can no longer change` : undefined
        );
      }

      const trackingNumber = update.trackingNumber ?? order.trackingNumber;
      if (target === "shipped" && !trackingNumber) {
        throw new ValidationError("Tracking number is required when marking an order as shipped", {
          orderId: order.id
        });
      }

      // A declined payment gave the stock back; fulfilment has to hold it again.
      if (!order.inventoryReserved && (await this.holdReservation(uow, order, actorOf(admin), [order.status]))) {
        await uow.orders.appendEvent(
          order.id,
          this.event(order.status, "Stock reserved again for fulfilment.", admin.role, order.trackingNumber)
        );
      }

      const next = await uow.orders.transition(order.id, [order.status], {
        status: target,
        trackingNumber,
        event: this.event(target, update.note ?? `Order marked as ${target}`, admin.role, trackingNumber)
      });
      if (!next) {
        throw await this.staleTransition(uow, order, target);
      }
      if (!next.inventoryReserved) {
        throw new InvalidTransitionError(
          order.id,
          order.status,
          target,
          `Reserved stock for order ${order.orderRef} was released by another request`
        );
      }

      if (target === "completed") {
        await this.sales.registerWithin(uow, next.id);
      }
      return next;
    });

    console.info("[api][orders] status changed", { orderRef: updated.orderRef, status: updated.status });
    await notifyOrderStatus(this.notify, updated, update.note);
    return updated;
  }

  /**
   * Takes a fresh reservation for a settleable order whose stock was released
   * by a rejected payment. When stock has run out the order is cancelled in a
   * separate transaction and the shortage is rethrown.
   */
  async reserveInventory(orderId: string): Promise<Order> {
    try {
      return await this.store.withTransaction(async (uow) => {
        const order = await this.requireOrder(uow, orderId);
        if (!isSettleable(order.status)) {
          throw new InvalidTransitionError(
            order.id,
            order.status,
            "completed",
            `Order ${order.orderRef} is ${order.status} and cannot reserve stock`
          );
        }

        if (!(await this.holdReservation(uow, order, SYSTEM_ACTOR, SETTLEABLE_STATUSES))) {
          return order;
        }

        const reserved = await uow.orders.appendEvent(
          order.id,
          this.event(order.status, "Stock reserved again for a new payment attempt.", SYSTEM_ACTOR.role, order.trackingNumber)
        );
        return reserved ?? { ...order, inventoryReserved: true };
      });
    } catch (error) {
      if (error instanceof InsufficientStockError) {
        await this.cancelForShortage(orderId, error);
      }
      throw error;
    }
  }

  /**
   * Gives back the order's reserved stock once, and only while the order is in
   * one of `when`. The guarded flag flip means a second caller racing on the
   * same order releases nothing.
   */
  async releaseReservation(
    uow: UnitOfWork,
    order: Order,
    actor: Actor,
    when: readonly OrderStatus[]
  ): Promise<boolean> {
    const released = await uow.orders.setInventoryReserved(order.id, false, when);
    if (!released) {
      return false;
    }

    for (const line of order.lines) {
      await this.ledger.release(uow, line.productId, line.quantity, {
        reference: order.orderRef,
        actorId: actor.id,
        actorRole: actor.role
      });
    }
    return true;
  }

  async getOrder(identity: Identity | undefined, orderId: string): Promise<Order> {
    const caller = requireIdentity(identity);
    const order = await this.store.read((uow) => this.requireOrder(uow, orderId));
    requireOwnerOrAdmin(caller, order.customerId);
    return order;
  }

  async listMyOrders(identity: Identity | undefined): Promise<Order[]> {
    const caller = requireIdentity(identity);
    return this.store.read((uow) => uow.orders.listByCustomer(caller.customerId));
  }

  async listOrders(identity: Identity | undefined, filter: OrderFilter = {}): Promise<Order[]> {
    requireAdmin(identity);
    return this.store.read((uow) => uow.orders.list(filter));
  }

  private async cancelWithin(uow: UnitOfWork, order: Order, actor: Actor, note: string): Promise<Order> {
    if (!CANCELLABLE_STATUSES.includes(order.status)) {
      throw new InvalidTransitionError(
        order.id,
        order.status,
        "cancelled",
        `Order ${order.orderRef} is ${order.status} and can no longer be cancelled`
      );
    }

    const cancelled = await uow.orders.transition(order.id, CANCELLABLE_STATUSES, {
      status: "cancelled",
      event: this.event("cancelled", note, actor.role, order.trackingNumber)
    });
    if (!cancelled) {
      throw await this.staleTransition(uow, order, "cancelled");
    }

    if (await this.releaseReservation(uow, cancelled, actor, ["cancelled"])) {
      return { ...cancelled, inventoryReserved: false };
    }
    return cancelled;
  }

  private async cancelForShortage(orderId: string, shortage: InsufficientStockError) {
    const note = `Cancelled: product ${shortage.productId} is out of stock (available ${shortage.available}, requested ${shortage.requested}).`;
    const cancelled = await this.store.withTransaction((uow) =>
      uow.orders.transition(orderId, SETTLEABLE_STATUSES, {
        status: "cancelled",
        event: this.event("cancelled", note, SYSTEM_ACTOR.role, null)
      })
    );

    if (cancelled) {
      console.warn("[api][orders] order cancelled after failed re-reservation", {
        orderRef: cancelled.orderRef,
        productId: shortage.productId
      });
      await notifyOrderStatus(this.notify, cancelled, note);
    }
  }

  private async holdReservation(
    uow: UnitOfWork,
    order: Order,
    actor: Actor,
    when: readonly OrderStatus[]
  ): Promise<boolean> {
    if (!(await uow.orders.setInventoryReserved(order.id, true, when))) {
      return false;
    }

    const ref: MovementRef = { reference: order.orderRef, actorId: actor.id, actorRole: actor.role };
    for (const line of order.lines) {
      await this.ledger.reserve(uow, line.productId, line.quantity, ref);
    }
    return true;
  }

  private async requireOrder(uow: UnitOfWork, orderId: string): Promise<Order> {
    const order = await uow.orders.findById(orderId);
    if (!order) {
      throw new NotFoundError("Order", orderId);
    }
    return order;
  }

  // The order moved between our read and the guarded update.
  private async staleTransition(uow: UnitOfWork, order: Order, to: OrderStatus) {
    const latest = await uow.orders.findById(order.id);
    return new InvalidTransitionError(order.id, latest?.status ?? order.status, to);
  }

  private event(status: OrderStatus, note: string, actor: string, trackingNumber: string | null): OrderStatusEvent {
    return { status, note, trackingNumber, actor, at: this.now() };
  }
}
