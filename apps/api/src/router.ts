import { Router } from "express";
import { optionalAuth } from "./middleware/auth.js";
import { createCartRouter } from "./modules/cart.js";
import { createInventoryRouter } from "./modules/inventory.js";
import { createOrdersRouter } from "./modules/orders.js";
import { createPaymentsRouter } from "./modules/payments.js";
import { createSalesRouter } from "./modules/sales.js";
import type { Services } from "./services/index.js";

export function createRouter(services: Services) {
  const router = Router();

  router.use(optionalAuth);

  router.use("/cart", createCartRouter(services));
  router.use("/orders", createOrdersRouter(services));
  router.use("/payments", createPaymentsRouter(services));
  router.use("/sales", createSalesRouter(services));
  router.use("/inventory", createInventoryRouter(services));

  return router;
}
