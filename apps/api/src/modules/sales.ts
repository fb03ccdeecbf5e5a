import { Router } from "express";
import { salesQuerySchema } from "@agromarket/shared-types";
import { route } from "../middleware/errors.js";
import { requireAdmin } from "../services/accessControl.js";
import type { Services } from "../services/index.js";

export function createSalesRouter({ sales }: Services) {
  const salesRouter = Router();

  salesRouter.get(
    "/me",
    route(async (req, res) => {
      res.json(await sales.listMySales(req.identity));
    })
  );

  salesRouter.get(
    "/",
    route(async (req, res) => {
      const parsed = salesQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        res.status(400).json({ message: "Invalid sales query", issues: parsed.error.issues });
        return;
      }

      res.json(await sales.listSales(req.identity, parsed.data));
    })
  );

  salesRouter.get(
    "/:orderId",
    route(async (req, res) => {
      res.json(await sales.getSaleByOrder(req.identity, String(req.params.orderId)));
    })
  );

  // Back-office repair path; payment and completion already register sales.
  salesRouter.post(
    "/:orderId/register",
    route(async (req, res) => {
      requireAdmin(req.identity);
      res.json(await sales.registerSaleFromOrder(String(req.params.orderId)));
    })
  );

  return salesRouter;
}
