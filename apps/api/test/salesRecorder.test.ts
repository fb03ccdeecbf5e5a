import { describe, expect, it } from "vitest";
import { ForbiddenError, InvalidTransitionError, NotFoundError } from "../src/lib/errors.js";
import { admin, alice, bob, createHarness, placeOrder, type Harness } from "./support/fixtures.js";

// Puts an order into `completed` without a sale, the state a failed back-office step would leave.
function forceCompleted(harness: Harness, orderId: string) {
  const stored = harness.store.orders.get(orderId);
  if (!stored) {
    throw new Error(`order ${orderId} missing from store`);
  }
  stored.status = "completed";
}

describe("SalesRecorder.registerSaleFromOrder", () => {
  it("returns the sale already recorded by the payment", async () => {
    const harness = createHarness({ stock: { "prod-maize": 5 } });
    const order = await placeOrder(harness, alice, [["prod-maize", 2]]);
    const { sale } = await harness.services.payments.processPayment(alice, { orderId: order.id, amount: 2400, method: "card" });

    const again = await harness.services.sales.registerSaleFromOrder(order.id);

    expect(again.id).toBe(sale?.id);
    expect(harness.store.sales.size).toBe(1);
  });

  it("copies the order's snapshot lines", async () => {
    const harness = createHarness({ stock: { "prod-maize": 5, "prod-fertilizer": 5 } });
    const order = await placeOrder(harness, bob, [
      ["prod-maize", 2],
      ["prod-fertilizer", 1]
    ]);
    forceCompleted(harness, order.id);
    harness.catalog.setPrice("prod-fertilizer", 5000);

    const sale = await harness.services.sales.registerSaleFromOrder(order.id);

    expect(sale).toMatchObject({
      orderId: order.id,
      customerId: "customer-bob",
      total: 6900,
      currency: "USD",
      status: "completed",
      settlement: "on_delivery",
      transactionRef: null,
      lines: [
        { productId: "prod-maize", name: "Maize Seed (5kg)", quantity: 2, unitPrice: 1200, subtotal: 2400 },
        { productId: "prod-fertilizer", name: "NPK Fertilizer (25kg)", quantity: 1, unitPrice: 4500, subtotal: 4500 }
      ]
    });
  });

  it("creates one record under concurrent registration", async () => {
    const harness = createHarness({ stock: { "prod-maize": 5 } });
    const order = await placeOrder(harness, alice, [["prod-maize", 1]]);
    forceCompleted(harness, order.id);

    const sales = await Promise.all(
      Array.from({ length: 5 }, () => harness.services.sales.registerSaleFromOrder(order.id))
    );

    expect(new Set(sales.map((sale) => sale.id)).size).toBe(1);
    expect(harness.store.sales.size).toBe(1);
  });

  it("refuses orders that are not completed", async () => {
    const harness = createHarness({ stock: { "prod-maize": 5 } });
    const order = await placeOrder(harness, alice, [["prod-maize", 1]]);

    await expect(harness.services.sales.registerSaleFromOrder(order.id)).rejects.toBeInstanceOf(InvalidTransitionError);
    await expect(harness.services.sales.registerSaleFromOrder("ord_missing")).rejects.toBeInstanceOf(NotFoundError);
    expect(harness.store.sales.size).toBe(0);
  });
});

describe("SalesRecorder queries", () => {
  it("scopes sale reads by owner and filters the admin list", async () => {
    const harness = createHarness({ stock: { "prod-maize": 5, "prod-tomato": 5 } });
    const aliceOrder = await placeOrder(harness, alice, [["prod-maize", 1]]);
    const bobOrder = await placeOrder(harness, bob, [["prod-tomato", 1]]);
    await harness.services.payments.processPayment(alice, { orderId: aliceOrder.id, amount: 1200, method: "card" });
    await harness.services.payments.processPayment(bob, { orderId: bobOrder.id, amount: 350, method: "card" });

    await expect(harness.services.sales.getSaleByOrder(bob, aliceOrder.id)).rejects.toBeInstanceOf(ForbiddenError);
    await expect(harness.services.sales.getSaleByOrder(admin, aliceOrder.id)).resolves.toMatchObject({ total: 1200 });
    expect((await harness.services.sales.listMySales(alice)).map((sale) => sale.orderId)).toEqual([aliceOrder.id]);
    expect((await harness.services.sales.listSales(admin, { customerId: "customer-bob" })).map((sale) => sale.total)).toEqual([350]);
    expect(await harness.services.sales.listSales(admin, { from: new Date("2999-01-01T00:00:00Z") })).toEqual([]);
    expect(await harness.services.sales.listSales(admin)).toHaveLength(2);
    await expect(harness.services.sales.listSales(alice)).rejects.toBeInstanceOf(ForbiddenError);
  });
});
