import { Schema, model, type InferSchemaType } from "mongoose";

const inventorySchema = new Schema({
  productId: { type: String, required: true, unique: true },
  availableQuantity: { type: Number, required: true, min: 0 },
  lastUpdated: { type: Date, required: true, default: Date.now }
});

export type InventoryDocument = InferSchemaType<typeof inventorySchema>;
export const InventoryModel = model("Inventory", inventorySchema, "inventory");
