import { Schema, model, type InferSchemaType } from "mongoose";

const inventoryLedgerSchema = new Schema(
  {
    productId: { type: String, required: true, index: true },
    operation: { type: String, enum: ["reserve", "release", "restock", "write_off"], required: true },
    delta: { type: Number, required: true },
    previousQuantity: { type: Number, required: true, min: 0 },
    nextQuantity: { type: Number, required: true, min: 0 },
    reference: { type: String, default: null },
    note: { type: String, default: null },
    actorId: { type: String, required: true },
    actorRole: { type: String, required: true }
  },
  { timestamps: { createdAt: true, updatedAt: false } }
);

inventoryLedgerSchema.index({ productId: 1, createdAt: -1 });

export type InventoryLedgerDocument = InferSchemaType<typeof inventoryLedgerSchema>;
export const InventoryLedgerModel = model("InventoryLedger", inventoryLedgerSchema);
