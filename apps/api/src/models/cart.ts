import { Schema, model, type InferSchemaType } from "mongoose";

const cartLineSchema = new Schema({
  customerId: { type: String, required: true, index: true },
  productId: { type: String, required: true },
  quantity: { type: Number, required: true, min: 1 },
  addedAt: { type: Date, required: true, default: Date.now }
});

cartLineSchema.index({ customerId: 1, productId: 1 }, { unique: true });

export type CartLineDocument = InferSchemaType<typeof cartLineSchema>;
export const CartLineModel = model("CartLine", cartLineSchema, "cart_lines");
