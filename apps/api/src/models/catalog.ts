import { Schema, model, type InferSchemaType } from "mongoose";

// Read model of the catalog collection; products are maintained by the catalog service.
const productSchema = new Schema(
  {
    slug: { type: String, required: true, unique: true },
    name: { type: String, required: true },
    description: { type: String, default: "" },
    // sale unit, e.g. "kg", "50kg bag", "crate"
    unit: { type: String, default: "unit" },
    // minor currency units
    price: { type: Number, required: true, min: 0 },
    active: { type: Boolean, default: true }
  },
  { timestamps: true }
);

export type ProductDocument = InferSchemaType<typeof productSchema>;
export const ProductModel = model("Product", productSchema);
