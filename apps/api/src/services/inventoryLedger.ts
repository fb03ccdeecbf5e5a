import { InsufficientStockError, NotFoundError, ValidationError } from "../lib/errors.js";
import type { InventoryMovement, InventoryOperation, InventoryRecord, Store, UnitOfWork } from "../store/types.js";
import { requireAdmin, type Identity } from "./accessControl.js";

export type MovementRef = {
  /** Order reference the movement belongs to, if any. */
  reference: string | null;
  actorId: string;
  actorRole: string;
  note?: string | null;
};

type InventoryLedgerDeps = {
  store: Store;
  now?: () => Date;
};

const MOVEMENT_PAGE_SIZE = 200;

function assertQuantity(productId: string, quantity: number) {
  if (!Number.isInteger(quantity) || quantity <= 0) {
    throw new ValidationError("Quantity must be a positive integer", { productId, quantity });
  }
}

/**
 * Sole writer of inventory records. Every change goes through one guarded
 * update on the record and is appended to the movement ledger in the same
 * unit of work.
 */
export class InventoryLedger {
  private readonly store: Store;
  private readonly now: () => Date;

  constructor(deps: InventoryLedgerDeps) {
    this.store = deps.store;
    this.now = deps.now ?? (() => new Date());
  }

  async reserve(uow: UnitOfWork, productId: string, quantity: number, ref: MovementRef): Promise<InventoryRecord> {
    return this.decrement(uow, productId, quantity, "reserve", ref);
  }

  async release(uow: UnitOfWork, productId: string, quantity: number, ref: MovementRef): Promise<InventoryRecord> {
    return this.increment(uow, productId, quantity, "release", ref);
  }

  async restock(identity: Identity | undefined, productId: string, quantity: number, note?: string) {
    const admin = requireAdmin(identity);
    assertQuantity(productId, quantity);

    return this.store.withTransaction(async (uow) => {
      await uow.inventory.ensure(productId, this.now());
      return this.increment(uow, productId, quantity, "restock", {
        reference: null,
        actorId: admin.customerId,
        actorRole: admin.role,
        note: note ?? null
      });
    });
  }

  async writeOff(identity: Identity | undefined, productId: string, quantity: number, note?: string) {
    const admin = requireAdmin(identity);

    return this.store.withTransaction((uow) =>
      this.decrement(uow, productId, quantity, "write_off", {
        reference: null,
        actorId: admin.customerId,
        actorRole: admin.role,
        note: note ?? null
      })
    );
  }

  async getStock(productId: string): Promise<InventoryRecord> {
    const record = await this.store.read((uow) => uow.inventory.find(productId));
    if (!record) {
      throw new NotFoundError("Inventory record", productId);
    }
    return record;
  }

  async listStock(): Promise<InventoryRecord[]> {
    return this.store.read((uow) => uow.inventory.list());
  }

  async listMovements(identity: Identity | undefined, productId?: string): Promise<InventoryMovement[]> {
    requireAdmin(identity);
    return this.store.read((uow) => uow.inventory.listMovements({ productId }, MOVEMENT_PAGE_SIZE));
  }

  private async decrement(
    uow: UnitOfWork,
    productId: string,
    quantity: number,
    operation: InventoryOperation,
    ref: MovementRef
  ): Promise<InventoryRecord> {
    assertQuantity(productId, quantity);

    const updated = await uow.inventory.decrementIfAvailable(productId, quantity, this.now());
    if (!updated) {
      const current = await uow.inventory.find(productId);
      throw new InsufficientStockError(productId, quantity, current?.availableQuantity ?? 0);
    }

    await uow.inventory.recordMovement({
      productId,
      operation,
      delta: -quantity,
      previousQuantity: updated.availableQuantity + quantity,
      nextQuantity: updated.availableQuantity,
      reference: ref.reference,
      note: ref.note ?? null,
      actorId: ref.actorId,
      actorRole: ref.actorRole
    });
    return updated;
  }

  private async increment(
    uow: UnitOfWork,
    productId: string,
    quantity: number,
    operation: InventoryOperation,
    ref: MovementRef
  ): Promise<InventoryRecord> {
    assertQuantity(productId, quantity);

    const updated = await uow.inventory.increment(productId, quantity, this.now());
    if (!updated) {
      throw new NotFoundError("Inventory record", productId);
    }

    await uow.inventory.recordMovement({
      productId,
      operation,
      delta: quantity,
      previousQuantity: updated.availableQuantity - quantity,
      nextQuantity: updated.availableQuantity,
      reference: ref.reference,
      note: ref.note ?? null,
      actorId: ref.actorId,
      actorRole: ref.actorRole
    });
    return updated;
  }
}
