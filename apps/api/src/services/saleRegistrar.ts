import type { SaleRecord, UnitOfWork } from "../store/types.js";

/**
 * Capability to turn a completed order into its sale record inside an
 * already-open unit of work. Implementations must return the existing record
 * when the order already has one.
 */
export interface SaleRegistrar {
  registerWithin(uow: UnitOfWork, orderId: string): Promise<SaleRecord>;
}
