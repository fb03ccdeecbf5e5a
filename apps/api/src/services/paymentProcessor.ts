import { randomUUID } from "crypto";
import type { PaymentCreateRequest } from "@agromarket/shared-types";
import { AmountMismatchError, InvalidTransitionError, NotFoundError, ValidationError } from "../lib/errors.js";
import type { Order, Payment, SaleRecord, Store } from "../store/types.js";
import { requireAdmin, requireIdentity, requireOwner, requireOwnerOrAdmin, type Identity } from "./accessControl.js";
import { notifyOrderStatus, type OrderStatusNotifier } from "./notificationQueue.js";
import type { Actor, OrderService } from "./orderService.js";
import { isSettleable, SETTLEABLE_STATUSES } from "./orderStatus.js";
import type { PaymentAuthorizer } from "./paymentSimulator.js";
import type { SaleRegistrar } from "./saleRegistrar.js";

export type PaymentOutcome = {
  payment: Payment;
  order: Order;
  /** Present only when the payment was approved. */
  sale: SaleRecord | null;
};

type PaymentProcessorDeps = {
  store: Store;
  orders: OrderService;
  sales: SaleRegistrar;
  authorizer: PaymentAuthorizer;
  notify: OrderStatusNotifier;
  now?: () => Date;
};

const SYSTEM_ACTOR: Actor = { id: "system", role: "system" };

function requireSettleable(orderId: string, order: Order | null): Order {
  if (!order) {
    throw new NotFoundError("Order", orderId);
  }
  if (!isSettleable(order.status)) {
    throw new InvalidTransitionError(
      order.id,
      order.status,
      "completed",
      `Order ${order.orderRef} is ${order.status} and cannot accept a payment`
    );
  }
  return order;
}

export class PaymentProcessor {
  private readonly store: Store;
  private readonly orders: OrderService;
  private readonly sales: SaleRegistrar;
  private readonly authorizer: PaymentAuthorizer;
  private readonly notify: OrderStatusNotifier;
  private readonly now: () => Date;

  constructor(deps: PaymentProcessorDeps) {
    this.store = deps.store;
    this.orders = deps.orders;
    this.sales = deps.sales;
    this.authorizer = deps.authorizer;
    this.notify = deps.notify;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Settles an order with a single payment attempt. Preconditions are checked
   * before anything is written: a mismatched amount or an order that already
   * settled leaves no payment row behind.
   */
  async processPayment(identity: Identity | undefined, request: PaymentCreateRequest): Promise<PaymentOutcome> {
    const caller = requireIdentity(identity);
    if (!Number.isInteger(request.amount) || request.amount < 0) {
      throw new ValidationError("Amount must be a non-negative integer in minor units", { amount: request.amount });
    }

    const order = await this.store.read((uow) => uow.orders.findById(request.orderId));
    if (!order) {
      throw new NotFoundError("Order", request.orderId);
    }
    requireOwner(caller, order.customerId);

    requireSettleable(order.id, order);
    if (request.amount !== order.total) {
      throw new AmountMismatchError(order.id, order.total, request.amount);
    }

    // A previous attempt was declined and gave the stock back.
    const reserved = order.inventoryReserved ? order : await this.orders.reserveInventory(order.id);

    const decision = await this.authorizer.authorize({
      order: reserved,
      amount: request.amount,
      method: request.method
    });

    if (!decision.approved) {
      return this.decline(caller, reserved, request, decision.reason);
    }
    return this.approve(caller, reserved, request);
  }

  async getPayment(identity: Identity | undefined, paymentId: string): Promise<Payment> {
    const caller = requireIdentity(identity);
    const payment = await this.store.read((uow) => uow.payments.findById(paymentId));
    if (!payment) {
      throw new NotFoundError("Payment", paymentId);
    }
    requireOwnerOrAdmin(caller, payment.customerId);
    return payment;
  }

  async listPaymentsForOrder(identity: Identity | undefined, orderId: string): Promise<Payment[]> {
    const caller = requireIdentity(identity);

    return this.store.read(async (uow) => {
      const order = await uow.orders.findById(orderId);
      if (!order) {
        throw new NotFoundError("Order", orderId);
      }
      requireOwnerOrAdmin(caller, order.customerId);
      return uow.payments.listByOrder(order.id);
    });
  }

  async listPayments(identity: Identity | undefined): Promise<Payment[]> {
    requireAdmin(identity);
    return this.store.read((uow) => uow.payments.list());
  }

  private async approve(caller: Identity, order: Order, request: PaymentCreateRequest): Promise<PaymentOutcome> {
    const outcome = await this.store.withTransaction(async (uow) => {
      const completed = await uow.orders.transition(order.id, SETTLEABLE_STATUSES, {
        status: "completed",
        event: {
          status: "completed",
          note: "Payment approved.",
          trackingNumber: order.trackingNumber,
          actor: "system",
          at: this.now()
        }
      });
      if (!completed) {
        const latest = await uow.orders.findById(order.id);
        throw new InvalidTransitionError(
          order.id,
          latest?.status ?? order.status,
          "completed",
          `Order ${order.orderRef} was settled or cancelled by another request`
        );
      }
      if (!completed.inventoryReserved) {
        throw new InvalidTransitionError(
          order.id,
          order.status,
          "completed",
          `Reserved stock for order ${order.orderRef} was released; retry the payment`
        );
      }

      const payment = await uow.payments.insert({
        orderId: completed.id,
        customerId: completed.customerId,
        amount: request.amount,
        currency: completed.currency,
        method: request.method,
        status: "approved",
        transactionRef: `TXN-${randomUUID()}`,
        reason: null
      });
      const sale = await this.sales.registerWithin(uow, completed.id);
      return { payment, order: completed, sale };
    });

    console.info("[api][payments] payment approved", {
      orderRef: outcome.order.orderRef,
      transactionRef: outcome.payment.transactionRef,
      by: caller.customerId
    });
    await notifyOrderStatus(this.notify, outcome.order, "Payment approved.");
    return outcome;
  }

  private async decline(
    caller: Identity,
    order: Order,
    request: PaymentCreateRequest,
    reason: string
  ): Promise<PaymentOutcome> {
    const outcome = await this.store.withTransaction(async (uow) => {
      const latest = requireSettleable(order.id, await uow.orders.findById(order.id));

      const released = await this.orders.releaseReservation(uow, latest, SYSTEM_ACTOR, SETTLEABLE_STATUSES);
      if (!released) {
        // The flip is guarded on status; a miss may mean the order just left it.
        requireSettleable(order.id, await uow.orders.findById(order.id));
      }

      const payment = await uow.payments.insert({
        orderId: order.id,
        customerId: order.customerId,
        amount: request.amount,
        currency: order.currency,
        method: request.method,
        status: "rejected",
        transactionRef: `TXN-${randomUUID()}`,
        reason
      });

      const updated = await uow.orders.appendEvent(latest.id, {
        status: latest.status,
        note: released ? `Payment declined: ${reason}. Reserved stock released.` : `Payment declined: ${reason}.`,
        trackingNumber: latest.trackingNumber,
        actor: "system",
        at: this.now()
      });

      return {
        payment,
        order: updated ?? { ...latest, inventoryReserved: false },
        sale: null
      };
    });

    console.warn("[api][payments] payment declined", {
      orderRef: outcome.order.orderRef,
      reason,
      by: caller.customerId
    });
    return outcome;
  }
}
