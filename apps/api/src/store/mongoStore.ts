import mongoose, { Types, type ClientSession } from "mongoose";
import type { OrderStatus, PaymentMethod, PaymentStatus, SaleSettlement } from "@agromarket/shared-types";
import { CartLineModel } from "../models/cart.js";
import { InventoryModel } from "../models/inventory.js";
import { InventoryLedgerModel } from "../models/inventoryLedger.js";
import { OrderModel } from "../models/order.js";
import { PaymentModel } from "../models/payment.js";
import { SaleModel } from "../models/sale.js";
import { DuplicateSaleError, StorageFailureError, isDomainError } from "../lib/errors.js";
import { isObjectId, toObjectId } from "../utils/ids.js";
import type {
  CartLine,
  CartRepository,
  InventoryMovement,
  InventoryOperation,
  InventoryRecord,
  InventoryRepository,
  Order,
  OrderRepository,
  OrderStatusEvent,
  Payment,
  PaymentRepository,
  SaleRecord,
  SaleRepository,
  Store,
  UnitOfWork
} from "./types.js";

type LeanInventory = { productId: string; availableQuantity: number; lastUpdated: Date };

type LeanMovement = {
  _id: Types.ObjectId;
  productId: string;
  operation: InventoryOperation;
  delta: number;
  previousQuantity: number;
  nextQuantity: number;
  reference?: string | null;
  note?: string | null;
  actorId: string;
  actorRole: string;
  createdAt: Date;
};

type LeanCartLine = { customerId: string; productId: string; quantity: number; addedAt: Date };

type LeanOrder = {
  _id: Types.ObjectId;
  orderRef: string;
  customerId: string;
  contactEmail?: string | null;
  status: OrderStatus;
  total: number;
  currency: string;
  shippingAddress: { address: string; city: string; phone?: string | null };
  inventoryReserved: boolean;
  trackingNumber?: string | null;
  lines: Array<{ productId: string; name: string; quantity: number; unitPrice: number }>;
  timeline: Array<{ status: OrderStatus; note?: string | null; trackingNumber?: string | null; actor?: string | null; at: Date }>;
  createdAt: Date;
  updatedAt: Date;
};

type LeanPayment = {
  _id: Types.ObjectId;
  orderId: Types.ObjectId;
  customerId: string;
  amount: number;
  currency: string;
  method: PaymentMethod;
  status: PaymentStatus;
  transactionRef: string;
  reason?: string | null;
  createdAt: Date;
};

type LeanSale = {
  _id: Types.ObjectId;
  orderId: Types.ObjectId;
  customerId: string;
  date: Date;
  total: number;
  currency: string;
  settlement: SaleSettlement;
  transactionRef?: string | null;
  lines: Array<{ productId: string; name: string; quantity: number; unitPrice: number; subtotal: number }>;
};

function toInventoryRecord(doc: LeanInventory): InventoryRecord {
  return { productId: doc.productId, availableQuantity: doc.availableQuantity, lastUpdated: doc.lastUpdated };
}

function toMovement(doc: LeanMovement): InventoryMovement {
  return {
    id: doc._id.toString(),
    productId: doc.productId,
    operation: doc.operation,
    delta: doc.delta,
    previousQuantity: doc.previousQuantity,
    nextQuantity: doc.nextQuantity,
    reference: doc.reference ?? null,
    note: doc.note ?? null,
    actorId: doc.actorId,
    actorRole: doc.actorRole,
    createdAt: doc.createdAt
  };
}

function toCartLine(doc: LeanCartLine): CartLine {
  return { customerId: doc.customerId, productId: doc.productId, quantity: doc.quantity, addedAt: doc.addedAt };
}

function toOrder(doc: LeanOrder): Order {
  return {
    id: doc._id.toString(),
    orderRef: doc.orderRef,
    customerId: doc.customerId,
    contactEmail: doc.contactEmail ?? null,
    status: doc.status,
    total: doc.total,
    currency: doc.currency,
    shippingAddress: {
      address: doc.shippingAddress.address,
      city: doc.shippingAddress.city,
      phone: doc.shippingAddress.phone ?? null
    },
    inventoryReserved: doc.inventoryReserved,
    trackingNumber: doc.trackingNumber ?? null,
    lines: doc.lines.map((line) => ({
      productId: line.productId,
      name: line.name,
      quantity: line.quantity,
      unitPrice: line.unitPrice
    })),
    timeline: doc.timeline.map((event) => ({
      status: event.status,
      note: event.note ?? "",
      trackingNumber: event.trackingNumber ?? null,
      actor: event.actor ?? "system",
      at: event.at
    })),
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt
  };
}

function toPayment(doc: LeanPayment): Payment {
  return {
    id: doc._id.toString(),
    orderId: doc.orderId.toString(),
    customerId: doc.customerId,
    amount: doc.amount,
    currency: doc.currency,
    method: doc.method,
    status: doc.status,
    transactionRef: doc.transactionRef,
    reason: doc.reason ?? null,
    createdAt: doc.createdAt
  };
}

function toSale(doc: LeanSale): SaleRecord {
  return {
    id: doc._id.toString(),
    orderId: doc.orderId.toString(),
    customerId: doc.customerId,
    date: doc.date,
    total: doc.total,
    currency: doc.currency,
    status: "completed",
    settlement: doc.settlement,
    transactionRef: doc.transactionRef ?? null,
    lines: doc.lines.map((line) => ({
      productId: line.productId,
      name: line.name,
      quantity: line.quantity,
      unitPrice: line.unitPrice,
      subtotal: line.subtotal
    }))
  };
}

function sessionOption(session: ClientSession | null) {
  return session ? { session } : {};
}

function isDuplicateKeyError(error: unknown) {
  return typeof error === "object" && error !== null && "code" in error && error.code === 11000;
}

function createInventoryRepository(session: ClientSession | null): InventoryRepository {
  return {
    async find(productId) {
      const doc = await InventoryModel.findOne({ productId }).session(session).lean<LeanInventory>();
      return doc ? toInventoryRecord(doc) : null;
    },
    async list() {
      const docs = await InventoryModel.find().sort({ productId: 1 }).session(session).lean<LeanInventory[]>();
      return docs.map(toInventoryRecord);
    },
    async ensure(productId, at) {
      await InventoryModel.updateOne(
        { productId },
        { $setOnInsert: { productId, availableQuantity: 0, lastUpdated: at } },
        { upsert: true, ...sessionOption(session) }
      );
    },
    async decrementIfAvailable(productId, quantity, at) {
      const doc = await InventoryModel.findOneAndUpdate(
        { productId, availableQuantity: { $gte: quantity } },
        { $inc: { availableQuantity: -quantity }, $set: { lastUpdated: at } },
        { new: true, ...sessionOption(session) }
      ).lean<LeanInventory>();
      return doc ? toInventoryRecord(doc) : null;
    },
    async increment(productId, quantity, at) {
      const doc = await InventoryModel.findOneAndUpdate(
        { productId },
        { $inc: { availableQuantity: quantity }, $set: { lastUpdated: at } },
        { new: true, ...sessionOption(session) }
      ).lean<LeanInventory>();
      return doc ? toInventoryRecord(doc) : null;
    },
    async recordMovement(movement) {
      const [created] = await InventoryLedgerModel.create([movement], sessionOption(session));
      const doc = await InventoryLedgerModel.findById(created._id).session(session).lean<LeanMovement>();
      if (!doc) {
        throw new StorageFailureError();
      }
      return toMovement(doc);
    },
    async listMovements(filter, limit) {
      const docs = await InventoryLedgerModel.find(filter.productId ? { productId: filter.productId } : {})
        .sort({ createdAt: -1 })
        .limit(limit)
        .session(session)
        .lean<LeanMovement[]>();
      return docs.map(toMovement);
    }
  };
}

function createCartRepository(session: ClientSession | null): CartRepository {
  return {
    async listLines(customerId) {
      const docs = await CartLineModel.find({ customerId }).sort({ addedAt: 1 }).session(session).lean<LeanCartLine[]>();
      return docs.map(toCartLine);
    },
    async listAll() {
      const docs = await CartLineModel.find().sort({ customerId: 1, addedAt: 1 }).session(session).lean<LeanCartLine[]>();
      return docs.map(toCartLine);
    },
    async addQuantity(customerId, productId, quantity, at) {
      const doc = await CartLineModel.findOneAndUpdate(
        { customerId, productId },
        { $inc: { quantity }, $setOnInsert: { addedAt: at } },
        { new: true, upsert: true, ...sessionOption(session) }
      ).lean<LeanCartLine>();
      if (!doc) {
        throw new StorageFailureError();
      }
      return toCartLine(doc);
    },
    async setQuantity(customerId, productId, quantity) {
      const doc = await CartLineModel.findOneAndUpdate(
        { customerId, productId },
        { $set: { quantity } },
        { new: true, ...sessionOption(session) }
      ).lean<LeanCartLine>();
      return doc ? toCartLine(doc) : null;
    },
    async removeLine(customerId, productId) {
      const result = await CartLineModel.deleteOne({ customerId, productId }, sessionOption(session));
      return result.deletedCount === 1;
    },
    async clear(customerId) {
      const result = await CartLineModel.deleteMany({ customerId }, sessionOption(session));
      return result.deletedCount;
    }
  };
}

function createOrderRepository(session: ClientSession | null): OrderRepository {
  async function findById(id: string) {
    if (!isObjectId(id)) {
      return null;
    }
    const doc = await OrderModel.findById(id).session(session).lean<LeanOrder>();
    return doc ? toOrder(doc) : null;
  }

  return {
    async insert(order) {
      const [created] = await OrderModel.create([order], sessionOption(session));
      const stored = await findById(created._id.toString());
      if (!stored) {
        throw new StorageFailureError();
      }
      return stored;
    },
    findById,
    async listByCustomer(customerId) {
      const docs = await OrderModel.find({ customerId }).sort({ createdAt: -1 }).session(session).lean<LeanOrder[]>();
      return docs.map(toOrder);
    },
    async list(filter) {
      const docs = await OrderModel.find(filter.status ? { status: filter.status } : {})
        .sort({ createdAt: -1 })
        .limit(200)
        .session(session)
        .lean<LeanOrder[]>();
      return docs.map(toOrder);
    },
    async transition(id, from, change) {
      if (!isObjectId(id)) {
        return null;
      }
      const doc = await OrderModel.findOneAndUpdate(
        { _id: toObjectId(id), status: { $in: [...from] } },
        {
          $set: {
            status: change.status,
            ...(change.trackingNumber !== undefined ? { trackingNumber: change.trackingNumber } : {})
          },
          $push: { timeline: change.event }
        },
        { new: true, ...sessionOption(session) }
      ).lean<LeanOrder>();
      return doc ? toOrder(doc) : null;
    },
    async setInventoryReserved(id, reserved, when) {
      if (!isObjectId(id)) {
        return false;
      }
      const result = await OrderModel.updateOne(
        { _id: toObjectId(id), inventoryReserved: !reserved, status: { $in: [...when] } },
        { $set: { inventoryReserved: reserved } },
        sessionOption(session)
      );
      return result.modifiedCount === 1;
    },
    async appendEvent(id: string, event: OrderStatusEvent) {
      if (!isObjectId(id)) {
        return null;
      }
      const doc = await OrderModel.findOneAndUpdate(
        { _id: toObjectId(id) },
        { $push: { timeline: event } },
        { new: true, ...sessionOption(session) }
      ).lean<LeanOrder>();
      return doc ? toOrder(doc) : null;
    }
  };
}

function createPaymentRepository(session: ClientSession | null): PaymentRepository {
  return {
    async insert(payment) {
      const [created] = await PaymentModel.create([{ ...payment, orderId: toObjectId(payment.orderId) }], sessionOption(session));
      const doc = await PaymentModel.findById(created._id).session(session).lean<LeanPayment>();
      if (!doc) {
        throw new StorageFailureError();
      }
      return toPayment(doc);
    },
    async findById(id) {
      if (!isObjectId(id)) {
        return null;
      }
      const doc = await PaymentModel.findById(id).session(session).lean<LeanPayment>();
      return doc ? toPayment(doc) : null;
    },
    async listByOrder(orderId) {
      if (!isObjectId(orderId)) {
        return [];
      }
      const docs = await PaymentModel.find({ orderId: toObjectId(orderId) })
        .sort({ createdAt: -1 })
        .session(session)
        .lean<LeanPayment[]>();
      return docs.map(toPayment);
    },
    async list() {
      const docs = await PaymentModel.find().sort({ createdAt: -1 }).limit(200).session(session).lean<LeanPayment[]>();
      return docs.map(toPayment);
    }
  };
}

function createSaleRepository(session: ClientSession | null): SaleRepository {
  return {
    async insert(sale) {
      try {
        const [created] = await SaleModel.create([{ ...sale, orderId: toObjectId(sale.orderId) }], sessionOption(session));
        const doc = await SaleModel.findById(created._id).session(session).lean<LeanSale>();
        if (!doc) {
          throw new StorageFailureError();
        }
        return toSale(doc);
      } catch (error) {
        if (isDuplicateKeyError(error)) {
          throw new DuplicateSaleError(sale.orderId);
        }
        throw error;
      }
    },
    async findByOrder(orderId) {
      if (!isObjectId(orderId)) {
        return null;
      }
      const doc = await SaleModel.findOne({ orderId: toObjectId(orderId) }).session(session).lean<LeanSale>();
      return doc ? toSale(doc) : null;
    },
    async list(filter) {
      const date: { $gte?: Date; $lte?: Date } = {};
      if (filter.from) {
        date.$gte = filter.from;
      }
      if (filter.to) {
        date.$lte = filter.to;
      }
      const docs = await SaleModel.find({
        ...(filter.customerId ? { customerId: filter.customerId } : {}),
        ...(filter.from || filter.to ? { date } : {})
      })
        .sort({ date: -1 })
        .limit(200)
        .session(session)
        .lean<LeanSale[]>();
      return docs.map(toSale);
    }
  };
}

function createUnitOfWork(session: ClientSession | null): UnitOfWork {
  return {
    inventory: createInventoryRepository(session),
    carts: createCartRepository(session),
    orders: createOrderRepository(session),
    payments: createPaymentRepository(session),
    sales: createSaleRepository(session)
  };
}

/**
 * MongoDB-backed store. Each transaction gets its own session; the driver's
 * `withTransaction` retries transient write conflicts, so two checkouts racing
 * on one inventory document serialize instead of failing with a conflict.
 */
export function createMongoStore(): Store {
  return {
    async withTransaction<T>(work: (uow: UnitOfWork) => Promise<T>): Promise<T> {
      const session = await mongoose.startSession();
      try {
        // the callback runs again when the driver retries a transient conflict
        const attempts: T[] = [];
        await session.withTransaction(async () => {
          attempts.push(await work(createUnitOfWork(session)));
        });
        if (attempts.length === 0) {
          throw new StorageFailureError();
        }
        return attempts[attempts.length - 1];
      } catch (error) {
        if (isDomainError(error)) {
          throw error;
        }
        console.error("[api][store] transaction aborted", error);
        throw new StorageFailureError();
      } finally {
        await session.endSession();
      }
    },

    async read<T>(work: (uow: UnitOfWork) => Promise<T>): Promise<T> {
      try {
        return await work(createUnitOfWork(null));
      } catch (error) {
        if (isDomainError(error)) {
          throw error;
        }
        console.error("[api][store] read failed", error);
        throw new StorageFailureError();
      }
    }
  };
}
