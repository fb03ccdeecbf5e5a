import { Router } from "express";
import { paymentCreateSchema } from "@agromarket/shared-types";
import { route } from "../middleware/errors.js";
import type { Services } from "../services/index.js";

export function createPaymentsRouter({ payments }: Services) {
  const paymentsRouter = Router();

  paymentsRouter.post(
    "/",
    route(async (req, res) => {
      const parsed = paymentCreateSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ message: "Invalid payment payload", issues: parsed.error.issues });
        return;
      }

      const outcome = await payments.processPayment(req.identity, parsed.data);
      // a declined payment is recorded, but the caller still has to pay
      res.status(outcome.payment.status === "approved" ? 201 : 402).json(outcome);
    })
  );

  paymentsRouter.get(
    "/",
    route(async (req, res) => {
      res.json(await payments.listPayments(req.identity));
    })
  );

  paymentsRouter.get(
    "/order/:orderId",
    route(async (req, res) => {
      res.json(await payments.listPaymentsForOrder(req.identity, String(req.params.orderId)));
    })
  );

  paymentsRouter.get(
    "/:id",
    route(async (req, res) => {
      res.json(await payments.getPayment(req.identity, String(req.params.id)));
    })
  );

  return paymentsRouter;
}
