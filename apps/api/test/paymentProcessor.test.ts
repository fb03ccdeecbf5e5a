import { describe, expect, it } from "vitest";
import {
  AmountMismatchError,
  ForbiddenError,
  InsufficientStockError,
  InvalidTransitionError,
  NotFoundError
} from "../src/lib/errors.js";
import { createSimulatedAuthorizer, type PaymentAuthorizer } from "../src/services/paymentSimulator.js";
import { admin, alice, bob, createGatedAuthorizer, createHarness, placeOrder } from "./support/fixtures.js";

function createSwitchableAuthorizer() {
  const state = { approve: false };
  const authorizer: PaymentAuthorizer = {
    async authorize() {
      return state.approve ? { approved: true } : { approved: false, reason: "Payment declined by issuer" };
    }
  };
  return { state, authorizer };
}

describe("PaymentProcessor.processPayment", () => {
  it("rejects a mismatched amount without writing anything", async () => {
    const harness = createHarness({ stock: { "prod-tomato": 5 } });
    const order = await placeOrder(harness, alice, [["prod-tomato", 3]]);

    const attempt = harness.services.payments.processPayment(alice, { orderId: order.id, amount: 1000, method: "card" });

    await expect(attempt).rejects.toBeInstanceOf(AmountMismatchError);
    await expect(attempt).rejects.toMatchObject({ context: { orderId: order.id, expected: 1050, received: 1000 } });
    expect(harness.store.payments.size).toBe(0);
    expect((await harness.services.orders.getOrder(alice, order.id)).status).toBe("pending");
  });

  it("completes the order and records exactly one sale when approved", async () => {
    const harness = createHarness({ stock: { "prod-tomato": 5, "prod-maize": 4 } });
    const order = await placeOrder(harness, alice, [
      ["prod-tomato", 3],
      ["prod-maize", 1]
    ]);

    const outcome = await harness.services.payments.processPayment(alice, {
      orderId: order.id,
      amount: 2250,
      method: "mobile_wallet"
    });

    expect(outcome.payment).toMatchObject({
      orderId: order.id,
      customerId: "customer-alice",
      amount: 2250,
      currency: "USD",
      method: "mobile_wallet",
      status: "approved",
      reason: null
    });
    expect(outcome.payment.transactionRef).toMatch(/^TXN-/);
    expect(outcome.order.status).toBe("completed");
    expect(outcome.sale).toMatchObject({
      orderId: order.id,
      customerId: "customer-alice",
      total: 2250,
      status: "completed",
      lines: [
        { productId: "prod-tomato", quantity: 3, unitPrice: 350, subtotal: 1050 },
        { productId: "prod-maize", quantity: 1, unitPrice: 1200, subtotal: 1200 }
      ]
    });
    expect(outcome.sale?.settlement).toBe("payment");
    expect(outcome.sale?.transactionRef).toBe(outcome.payment.transactionRef);
    expect(harness.store.sales.size).toBe(1);
    expect(harness.store.stockOf("prod-tomato")).toBe(2);
    expect(harness.notify).toHaveBeenCalledWith(expect.objectContaining({ status: "completed", orderId: order.id }));
  });

  it("refuses a second payment for a completed order", async () => {
    const harness = createHarness({ stock: { "prod-tomato": 5 } });
    const order = await placeOrder(harness, alice, [["prod-tomato", 3]]);
    await harness.services.payments.processPayment(alice, { orderId: order.id, amount: 1050, method: "card" });

    await expect(
      harness.services.payments.processPayment(alice, { orderId: order.id, amount: 1050, method: "card" })
    ).rejects.toBeInstanceOf(InvalidTransitionError);
    expect(harness.store.payments.size).toBe(1);
    expect(harness.store.sales.size).toBe(1);
  });

  it("settles once when two payments race", async () => {
    const harness = createHarness({ stock: { "prod-tomato": 5 } });
    const order = await placeOrder(harness, alice, [["prod-tomato", 3]]);

    const results = await Promise.allSettled([
      harness.services.payments.processPayment(alice, { orderId: order.id, amount: 1050, method: "card" }),
      harness.services.payments.processPayment(alice, { orderId: order.id, amount: 1050, method: "bank_transfer" })
    ]);

    expect(results.filter((result) => result.status === "fulfilled")).toHaveLength(1);
    expect(results.filter((result) => result.status === "rejected")).toHaveLength(1);
    expect(harness.store.payments.size).toBe(1);
    expect(harness.store.sales.size).toBe(1);
  });

  it("releases stock on a declined payment and completes on a later approval", async () => {
    const { state, authorizer } = createSwitchableAuthorizer();
    const harness = createHarness({ stock: { "prod-tomato": 5 }, authorizer });
    const order = await placeOrder(harness, alice, [["prod-tomato", 3]]);

    const declined = await harness.services.payments.processPayment(alice, { orderId: order.id, amount: 1050, method: "card" });

    expect(declined.payment).toMatchObject({ status: "rejected", reason: "Payment declined by issuer" });
    expect(declined.sale).toBeNull();
    expect(declined.order.status).toBe("pending");
    expect(declined.order.inventoryReserved).toBe(false);
    expect(declined.order.timeline.at(-1)?.note).toBe("Payment declined: Payment declined by issuer. Reserved stock released.");
    expect(harness.store.stockOf("prod-tomato")).toBe(5);
    expect(harness.store.sales.size).toBe(0);

    state.approve = true;
    const approved = await harness.services.payments.processPayment(alice, { orderId: order.id, amount: 1050, method: "card" });

    expect(approved.order.status).toBe("completed");
    expect(approved.order.inventoryReserved).toBe(true);
    expect(approved.sale?.total).toBe(1050);
    expect(harness.store.stockOf("prod-tomato")).toBe(2);
    expect(harness.store.payments.size).toBe(2);
    expect(harness.store.sales.size).toBe(1);
  });

  it("cancels the order when stock is gone before the retry", async () => {
    const { authorizer } = createSwitchableAuthorizer();
    const harness = createHarness({ stock: { "prod-tomato": 5 }, authorizer });
    const order = await placeOrder(harness, alice, [["prod-tomato", 3]]);
    await harness.services.payments.processPayment(alice, { orderId: order.id, amount: 1050, method: "card" });
    await placeOrder(harness, bob, [["prod-tomato", 4]]);

    await expect(
      harness.services.payments.processPayment(alice, { orderId: order.id, amount: 1050, method: "card" })
    ).rejects.toBeInstanceOf(InsufficientStockError);

    const cancelled = await harness.services.orders.getOrder(alice, order.id);
    expect(cancelled.status).toBe("cancelled");
    expect(cancelled.inventoryReserved).toBe(false);
    expect(harness.store.stockOf("prod-tomato")).toBe(1);
    expect(harness.notify).toHaveBeenCalledWith(expect.objectContaining({ status: "cancelled", orderId: order.id }));
  });

  it("fails an approval that lands after the order was cancelled", async () => {
    const { authorizer, release } = createGatedAuthorizer(true);
    const harness = createHarness({ stock: { "prod-tomato": 5 }, authorizer });
    const order = await placeOrder(harness, alice, [["prod-tomato", 3]]);

    const payment = harness.services.payments.processPayment(alice, { orderId: order.id, amount: 1050, method: "card" });
    await harness.services.orders.cancelOrder(alice, order.id);
    release();

    await expect(payment).rejects.toBeInstanceOf(InvalidTransitionError);
    expect(harness.store.payments.size).toBe(0);
    expect(harness.store.sales.size).toBe(0);
    expect(harness.store.stockOf("prod-tomato")).toBe(5);
  });

  it("fails a decline that lands after the order was shipped", async () => {
    const { authorizer, release } = createGatedAuthorizer(false);
    const harness = createHarness({ stock: { "prod-tomato": 5 }, authorizer });
    const order = await placeOrder(harness, alice, [["prod-tomato", 3]]);

    const payment = harness.services.payments.processPayment(alice, { orderId: order.id, amount: 1050, method: "card" });
    await harness.services.orders.advanceStatus(admin, order.id, { status: "processing" });
    await harness.services.orders.advanceStatus(admin, order.id, { status: "shipped", trackingNumber: "TRK-400" });
    release();

    await expect(payment).rejects.toMatchObject({
      kind: "invalid_transition",
      context: { orderId: order.id, from: "shipped", to: "completed" }
    });
    const shipped = await harness.services.orders.getOrder(admin, order.id);
    expect(shipped.status).toBe("shipped");
    expect(shipped.inventoryReserved).toBe(true);
    expect(harness.store.payments.size).toBe(0);
    expect(harness.store.stockOf("prod-tomato")).toBe(2);
  });

  it("re-reserves at shipping when a decline released stock during processing", async () => {
    const { authorizer, release } = createGatedAuthorizer(false);
    const harness = createHarness({ stock: { "prod-tomato": 5 }, authorizer });
    const order = await placeOrder(harness, alice, [["prod-tomato", 3]]);

    const payment = harness.services.payments.processPayment(alice, { orderId: order.id, amount: 1050, method: "card" });
    await harness.services.orders.advanceStatus(admin, order.id, { status: "processing" });
    release();

    const declined = await payment;
    expect(declined.order.status).toBe("processing");
    expect(declined.order.inventoryReserved).toBe(false);
    expect(harness.store.stockOf("prod-tomato")).toBe(5);

    const shipped = await harness.services.orders.advanceStatus(admin, order.id, { status: "shipped", trackingNumber: "TRK-401" });

    expect(shipped.inventoryReserved).toBe(true);
    expect(harness.store.stockOf("prod-tomato")).toBe(2);
  });

  it("applies the approval limit in limit mode", async () => {
    const harness = createHarness({
      stock: { "prod-tomato": 10 },
      authorizer: createSimulatedAuthorizer({ mode: "limit", approvalLimit: 1000 })
    });
    const large = await placeOrder(harness, alice, [["prod-tomato", 3]]);
    const small = await placeOrder(harness, alice, [["prod-tomato", 2]]);

    const declined = await harness.services.payments.processPayment(alice, { orderId: large.id, amount: 1050, method: "card" });
    const approved = await harness.services.payments.processPayment(alice, { orderId: small.id, amount: 700, method: "card" });

    expect(declined.payment.reason).toBe("Amount exceeds approval limit of 1000");
    expect(approved.payment.status).toBe("approved");
  });

  it("only lets the order owner pay", async () => {
    const harness = createHarness({ stock: { "prod-tomato": 5 } });
    const order = await placeOrder(harness, alice, [["prod-tomato", 1]]);

    await expect(
      harness.services.payments.processPayment(bob, { orderId: order.id, amount: 350, method: "card" })
    ).rejects.toBeInstanceOf(ForbiddenError);
    await expect(
      harness.services.payments.processPayment(admin, { orderId: order.id, amount: 350, method: "card" })
    ).rejects.toBeInstanceOf(ForbiddenError);
    await expect(
      harness.services.payments.processPayment(alice, { orderId: "ord_missing", amount: 350, method: "card" })
    ).rejects.toBeInstanceOf(NotFoundError);
  });
});

describe("createSimulatedAuthorizer", () => {
  it("requires a limit in limit mode", () => {
    expect(() => createSimulatedAuthorizer({ mode: "limit" })).toThrow(
      "PAYMENT_APPROVAL_LIMIT is required when PAYMENT_SIMULATION_MODE is limit"
    );
  });
});

describe("PaymentProcessor queries", () => {
  it("scopes payment reads to the owner and administrators", async () => {
    const harness = createHarness({ stock: { "prod-tomato": 5 } });
    const order = await placeOrder(harness, alice, [["prod-tomato", 1]]);
    const { payment } = await harness.services.payments.processPayment(alice, { orderId: order.id, amount: 350, method: "card" });

    await expect(harness.services.payments.getPayment(alice, payment.id)).resolves.toMatchObject({ id: payment.id });
    await expect(harness.services.payments.getPayment(admin, payment.id)).resolves.toMatchObject({ id: payment.id });
    await expect(harness.services.payments.getPayment(bob, payment.id)).rejects.toBeInstanceOf(ForbiddenError);
    await expect(harness.services.payments.listPaymentsForOrder(bob, order.id)).rejects.toBeInstanceOf(ForbiddenError);
    expect((await harness.services.payments.listPaymentsForOrder(alice, order.id)).map((row) => row.id)).toEqual([payment.id]);
    expect(await harness.services.payments.listPayments(admin)).toHaveLength(1);
    await expect(harness.services.payments.listPayments(alice)).rejects.toBeInstanceOf(ForbiddenError);
  });
});
