import { Schema, model, type InferSchemaType } from "mongoose";
import { PAYMENT_METHODS, PAYMENT_STATUSES } from "@agromarket/shared-types";

const paymentSchema = new Schema(
  {
    orderId: { type: Schema.Types.ObjectId, ref: "Order", required: true, index: true },
    customerId: { type: String, required: true, index: true },
    method: { type: String, enum: PAYMENT_METHODS, required: true },
    status: { type: String, enum: PAYMENT_STATUSES, default: "pending" },
    amount: { type: Number, required: true, min: 0 },
    currency: { type: String, required: true },
    transactionRef: { type: String, required: true, unique: true },
    reason: { type: String, default: null }
  },
  { timestamps: true }
);

export type PaymentDocument = InferSchemaType<typeof paymentSchema>;
export const PaymentModel = model("Payment", paymentSchema);
