import { Router } from "express";
import { inventoryAdjustmentSchema } from "@agromarket/shared-types";
import { route } from "../middleware/errors.js";
import type { Services } from "../services/index.js";

export function createInventoryRouter({ inventory }: Services) {
  const inventoryRouter = Router();

  inventoryRouter.get(
    "/",
    route(async (_req, res) => {
      res.json(await inventory.listStock());
    })
  );

  inventoryRouter.get(
    "/ledger",
    route(async (req, res) => {
      const productId = typeof req.query.productId === "string" ? req.query.productId.trim() : "";
      res.json(await inventory.listMovements(req.identity, productId || undefined));
    })
  );

  inventoryRouter.get(
    "/:productId",
    route(async (req, res) => {
      res.json(await inventory.getStock(String(req.params.productId)));
    })
  );

  inventoryRouter.post(
    "/:productId/restock",
    route(async (req, res) => {
      const parsed = inventoryAdjustmentSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ message: "Invalid restock payload", issues: parsed.error.issues });
        return;
      }

      const record = await inventory.restock(req.identity, String(req.params.productId), parsed.data.quantity, parsed.data.note);
      res.json(record);
    })
  );

  inventoryRouter.post(
    "/:productId/write-off",
    route(async (req, res) => {
      const parsed = inventoryAdjustmentSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ message: "Invalid write-off payload", issues: parsed.error.issues });
        return;
      }

      const record = await inventory.writeOff(req.identity, String(req.params.productId), parsed.data.quantity, parsed.data.note);
      res.json(record);
    })
  );

  return inventoryRouter;
}
