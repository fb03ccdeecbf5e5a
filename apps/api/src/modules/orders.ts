import { Router } from "express";
import { orderCancelSchema, orderCreateSchema, orderStatusSchema, orderStatusUpdateSchema } from "@agromarket/shared-types";
import { route } from "../middleware/errors.js";
import type { Services } from "../services/index.js";

export function createOrdersRouter({ orders }: Services) {
  const ordersRouter = Router();

  ordersRouter.post(
    "/",
    route(async (req, res) => {
      const parsed = orderCreateSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ message: "Invalid order payload", issues: parsed.error.issues });
        return;
      }

      const order = await orders.createOrder(req.identity, parsed.data);
      res.status(201).json(order);
    })
  );

  ordersRouter.get(
    "/me",
    route(async (req, res) => {
      res.json(await orders.listMyOrders(req.identity));
    })
  );

  ordersRouter.get(
    "/",
    route(async (req, res) => {
      const status = req.query.status === undefined ? undefined : orderStatusSchema.safeParse(req.query.status);
      if (status && !status.success) {
        res.status(400).json({ message: "Invalid status filter", issues: status.error.issues });
        return;
      }

      res.json(await orders.listOrders(req.identity, { status: status?.data }));
    })
  );

  ordersRouter.get(
    "/:id",
    route(async (req, res) => {
      res.json(await orders.getOrder(req.identity, String(req.params.id)));
    })
  );

  ordersRouter.post(
    "/:id/cancel",
    route(async (req, res) => {
      const parsed = orderCancelSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        res.status(400).json({ message: "Invalid cancel payload", issues: parsed.error.issues });
        return;
      }

      res.json(await orders.cancelOrder(req.identity, String(req.params.id), parsed.data.note));
    })
  );

  ordersRouter.patch(
    "/:id/status",
    route(async (req, res) => {
      const parsed = orderStatusUpdateSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ message: "Invalid status payload", issues: parsed.error.issues });
        return;
      }

      res.json(await orders.advanceStatus(req.identity, String(req.params.id), parsed.data));
    })
  );

  return ordersRouter;
}
