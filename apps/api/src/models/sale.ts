import { SALE_SETTLEMENTS } from "@agromarket/shared-types";
import { Schema, model, type InferSchemaType } from "mongoose";

const saleLineSchema = new Schema(
  {
    productId: { type: String, required: true },
    name: { type: String, required: true },
    quantity: { type: Number, required: true, min: 1 },
    unitPrice: { type: Number, required: true, min: 0 },
    subtotal: { type: Number, required: true, min: 0 }
  },
  { _id: false }
);

const saleSchema = new Schema({
  orderId: { type: Schema.Types.ObjectId, ref: "Order", required: true },
  customerId: { type: String, required: true, index: true },
  date: { type: Date, required: true },
  total: { type: Number, required: true, min: 0 },
  currency: { type: String, required: true },
  status: { type: String, enum: ["completed"], default: "completed" },
  settlement: { type: String, enum: SALE_SETTLEMENTS, required: true },
  transactionRef: { type: String, default: null },
  lines: { type: [saleLineSchema], default: [] }
});

// One sale per order. The transactional insert relies on this index.
saleSchema.index({ orderId: 1 }, { unique: true });
saleSchema.index({ date: -1 });

export type SaleDocument = InferSchemaType<typeof saleSchema>;
export const SaleModel = model("Sale", saleSchema);
