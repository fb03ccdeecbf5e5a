import { Router } from "express";
import { cartItemSchema, updateCartItemSchema } from "@agromarket/shared-types";
import { route } from "../middleware/errors.js";
import type { Services } from "../services/index.js";

export function createCartRouter({ carts }: Services) {
  const cartRouter = Router();

  cartRouter.get(
    "/",
    route(async (req, res) => {
      res.json(await carts.view(req.identity));
    })
  );

  cartRouter.get(
    "/all",
    route(async (req, res) => {
      res.json(await carts.listAll(req.identity));
    })
  );

  cartRouter.post(
    "/items",
    route(async (req, res) => {
      const parsed = cartItemSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ message: "Invalid cart item payload", issues: parsed.error.issues });
        return;
      }

      const cart = await carts.addItem(req.identity, parsed.data.productId, parsed.data.quantity);
      res.status(201).json(cart);
    })
  );

  cartRouter.patch(
    "/items/:productId",
    route(async (req, res) => {
      const parsed = updateCartItemSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ message: "Invalid update payload", issues: parsed.error.issues });
        return;
      }

      res.json(await carts.updateItem(req.identity, String(req.params.productId), parsed.data.quantity));
    })
  );

  cartRouter.delete(
    "/items/:productId",
    route(async (req, res) => {
      res.json(await carts.removeItem(req.identity, String(req.params.productId)));
    })
  );

  cartRouter.delete(
    "/",
    route(async (req, res) => {
      const removed = await carts.clear(req.identity);
      res.json({ removed });
    })
  );

  return cartRouter;
}
