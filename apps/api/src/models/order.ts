import { Schema, model, type InferSchemaType } from "mongoose";
import { ORDER_STATUSES } from "@agromarket/shared-types";

const orderLineSchema = new Schema(
  {
    productId: { type: String, required: true },
    name: { type: String, required: true },
    quantity: { type: Number, required: true, min: 1 },
    unitPrice: { type: Number, required: true, min: 0, immutable: true }
  },
  { _id: false }
);

const statusEventSchema = new Schema(
  {
    status: { type: String, enum: ORDER_STATUSES, required: true },
    note: { type: String, default: "" },
    trackingNumber: { type: String, default: null },
    actor: { type: String, default: "system" },
    at: { type: Date, default: Date.now }
  },
  { _id: false }
);

const orderSchema = new Schema(
  {
    orderRef: { type: String, required: true, unique: true },
    customerId: { type: String, required: true, index: true },
    contactEmail: { type: String, default: null },
    status: { type: String, enum: ORDER_STATUSES, default: "pending" },
    currency: { type: String, required: true },
    total: { type: Number, required: true, min: 0, immutable: true },
    shippingAddress: {
      address: { type: String, required: true },
      city: { type: String, required: true },
      phone: { type: String, default: null }
    },
    inventoryReserved: { type: Boolean, default: true },
    trackingNumber: { type: String, default: null },
    lines: { type: [orderLineSchema], default: [] },
    timeline: { type: [statusEventSchema], default: [] }
  },
  { timestamps: true }
);

orderSchema.index({ customerId: 1, createdAt: -1 });
orderSchema.index({ status: 1, createdAt: -1 });

export type OrderDocument = InferSchemaType<typeof orderSchema>;
export const OrderModel = model("Order", orderSchema);
