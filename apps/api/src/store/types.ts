import type { OrderStatus, PaymentMethod, PaymentStatus, SaleSettlement } from "@agromarket/shared-types";

export type InventoryRecord = {
  productId: string;
  availableQuantity: number;
  lastUpdated: Date;
};

export type InventoryOperation = "reserve" | "release" | "restock" | "write_off";

export type InventoryMovement = {
  id: string;
  productId: string;
  operation: InventoryOperation;
  delta: number;
  previousQuantity: number;
  nextQuantity: number;
  reference: string | null;
  note: string | null;
  actorId: string;
  actorRole: string;
  createdAt: Date;
};

export type NewInventoryMovement = Omit<InventoryMovement, "id" | "createdAt">;

export type CartLine = {
  customerId: string;
  productId: string;
  quantity: number;
  addedAt: Date;
};

export type ShippingAddress = {
  address: string;
  city: string;
  phone: string | null;
};

export type OrderLine = {
  productId: string;
  name: string;
  quantity: number;
  /** Price captured when the order was created; never updated afterwards. */
  unitPrice: number;
};

export type OrderStatusEvent = {
  status: OrderStatus;
  note: string;
  trackingNumber: string | null;
  actor: string;
  at: Date;
};

export type Order = {
  id: string;
  orderRef: string;
  customerId: string;
  contactEmail: string | null;
  status: OrderStatus;
  total: number;
  currency: string;
  shippingAddress: ShippingAddress;
  /** True while the order holds stock reservations for all of its lines. */
  inventoryReserved: boolean;
  trackingNumber: string | null;
  lines: OrderLine[];
  timeline: OrderStatusEvent[];
  createdAt: Date;
  updatedAt: Date;
};

export type NewOrder = Omit<Order, "id" | "createdAt" | "updatedAt">;

export type OrderTransition = {
  status: OrderStatus;
  event: OrderStatusEvent;
  trackingNumber?: string | null;
};

export type OrderFilter = {
  status?: OrderStatus;
};

export type Payment = {
  id: string;
  orderId: string;
  customerId: string;
  amount: number;
  currency: string;
  method: PaymentMethod;
  status: PaymentStatus;
  transactionRef: string;
  reason: string | null;
  createdAt: Date;
};

export type NewPayment = Omit<Payment, "id" | "createdAt">;

export type SaleLine = {
  productId: string;
  name: string;
  quantity: number;
  unitPrice: number;
  subtotal: number;
};

export type SaleRecord = {
  id: string;
  orderId: string;
  customerId: string;
  date: Date;
  total: number;
  currency: string;
  status: "completed";
  settlement: SaleSettlement;
  /** Reference of the approved payment; null for orders settled on delivery. */
  transactionRef: string | null;
  lines: SaleLine[];
};

export type NewSaleRecord = Omit<SaleRecord, "id">;

export type SaleFilter = {
  customerId?: string;
  from?: Date;
  to?: Date;
};

export interface InventoryRepository {
  find(productId: string): Promise<InventoryRecord | null>;
  list(): Promise<InventoryRecord[]>;
  /** Creates a record at zero when none exists yet. */
  ensure(productId: string, at: Date): Promise<void>;
  /**
   * Single guarded update: decrements only while at least `quantity` units are
   * available. Returns the updated record, or null when the guard failed.
   */
  decrementIfAvailable(productId: string, quantity: number, at: Date): Promise<InventoryRecord | null>;
  /** Returns null when the product has no inventory record. */
  increment(productId: string, quantity: number, at: Date): Promise<InventoryRecord | null>;
  recordMovement(movement: NewInventoryMovement): Promise<InventoryMovement>;
  listMovements(filter: { productId?: string }, limit: number): Promise<InventoryMovement[]>;
}

export interface CartRepository {
  listLines(customerId: string): Promise<CartLine[]>;
  listAll(): Promise<CartLine[]>;
  /** Inserts the line or adds `quantity` to the existing one in one update. */
  addQuantity(customerId: string, productId: string, quantity: number, at: Date): Promise<CartLine>;
  setQuantity(customerId: string, productId: string, quantity: number): Promise<CartLine | null>;
  removeLine(customerId: string, productId: string): Promise<boolean>;
  clear(customerId: string): Promise<number>;
}

export interface OrderRepository {
  insert(order: NewOrder): Promise<Order>;
  findById(id: string): Promise<Order | null>;
  listByCustomer(customerId: string): Promise<Order[]>;
  list(filter: OrderFilter): Promise<Order[]>;
  /** Compare-and-set on status. Null when the order is no longer in one of `from`. */
  transition(id: string, from: readonly OrderStatus[], change: OrderTransition): Promise<Order | null>;
  /**
   * Guarded flip of `inventoryReserved`. False when the flag already had that
   * value or the order is no longer in one of `when`.
   */
  setInventoryReserved(id: string, reserved: boolean, when: readonly OrderStatus[]): Promise<boolean>;
  appendEvent(id: string, event: OrderStatusEvent): Promise<Order | null>;
}

export interface PaymentRepository {
  insert(payment: NewPayment): Promise<Payment>;
  findById(id: string): Promise<Payment | null>;
  listByOrder(orderId: string): Promise<Payment[]>;
  list(): Promise<Payment[]>;
}

export interface SaleRepository {
  /** Throws DuplicateSaleError when a sale for the order already exists. */
  insert(sale: NewSaleRecord): Promise<SaleRecord>;
  findByOrder(orderId: string): Promise<SaleRecord | null>;
  list(filter: SaleFilter): Promise<SaleRecord[]>;
}

/** Repositories bound to one transaction. */
export type UnitOfWork = {
  inventory: InventoryRepository;
  carts: CartRepository;
  orders: OrderRepository;
  payments: PaymentRepository;
  sales: SaleRepository;
};

export interface Store {
  /** Runs `work` atomically: every write commits together or none does. */
  withTransaction<T>(work: (uow: UnitOfWork) => Promise<T>): Promise<T>;
  read<T>(work: (uow: UnitOfWork) => Promise<T>): Promise<T>;
}
