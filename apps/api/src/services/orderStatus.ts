import type { OrderStatus } from "@agromarket/shared-types";

// Edges an administrator may request. Payment settles separately (see SETTLEABLE_STATUSES).
const allowedTransition: Record<OrderStatus, readonly OrderStatus[]> = {
  pending: ["processing", "cancelled"],
  processing: ["shipped", "cancelled"],
  shipped: ["completed"],
  completed: [],
  cancelled: []
};

/** Statuses from which a payment may settle the order, and from which it may be cancelled. */
export const SETTLEABLE_STATUSES: readonly OrderStatus[] = ["pending", "processing"];
export const CANCELLABLE_STATUSES: readonly OrderStatus[] = SETTLEABLE_STATUSES;

export function canTransition(from: OrderStatus, to: OrderStatus) {
  return allowedTransition[from].includes(to);
}

export function isTerminal(status: OrderStatus) {
  return allowedTransition[status].length === 0;
}

export function isSettleable(status: OrderStatus) {
  return SETTLEABLE_STATUSES.includes(status);
}
