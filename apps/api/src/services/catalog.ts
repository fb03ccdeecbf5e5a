import { ProductModel } from "../models/catalog.js";
import { isObjectId } from "../utils/ids.js";

export type CatalogProduct = {
  id: string;
  name: string;
  /** Current price in minor currency units. */
  price: number;
  active: boolean;
};

/** Read-only view of the catalog owned by the catalog service. */
export interface CatalogPort {
  getProduct(productId: string): Promise<CatalogProduct | null>;
}

type LeanProduct = { _id: { toString(): string }; name: string; price: number; active: boolean };

export const mongoCatalog: CatalogPort = {
  async getProduct(productId) {
    if (!isObjectId(productId)) {
      return null;
    }
    const product = await ProductModel.findById(productId).select({ name: 1, price: 1, active: 1 }).lean<LeanProduct>();
    if (!product) {
      return null;
    }
    return { id: product._id.toString(), name: product.name, price: product.price, active: product.active };
  }
};
