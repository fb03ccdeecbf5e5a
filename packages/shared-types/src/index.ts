import { z } from "zod";

export const ORDER_STATUSES = ["pending", "processing", "shipped", "completed", "cancelled"] as const;
export const PAYMENT_STATUSES = ["pending", "approved", "rejected"] as const;
export const PAYMENT_METHODS = ["card", "bank_transfer", "mobile_wallet", "cash_on_delivery"] as const;
// How a sale was settled: an approved gateway payment, or an administrator completing a delivered order.
export const SALE_SETTLEMENTS = ["payment", "on_delivery"] as const;

export const NOTIFICATION_QUEUE_NAME = "agromarket-notifications";
export const ORDER_STATUS_JOB = "order-status";

export const orderStatusSchema = z.enum(ORDER_STATUSES);
export const paymentStatusSchema = z.enum(PAYMENT_STATUSES);
export const paymentMethodSchema = z.enum(PAYMENT_METHODS);

export const authClaimsSchema = z.object({
  userId: z.string().min(1),
  role: z.enum(["customer", "admin"]),
  email: z.string().email().optional()
});

const productIdSchema = z.string().trim().min(1);

export const cartItemSchema = z.object({
  productId: productIdSchema,
  quantity: z.number().int().min(1).max(10000)
});

// 0 removes the line
export const updateCartItemSchema = z.object({
  quantity: z.number().int().min(0).max(10000)
});

export const shippingAddressSchema = z.object({
  address: z.string().trim().min(5),
  city: z.string().trim().min(2),
  phone: z.string().trim().min(7).optional()
});

export const orderCreateSchema = z.object({
  shippingAddress: shippingAddressSchema
});

export const orderCancelSchema = z.object({
  note: z.string().trim().max(240).optional()
});

export const orderStatusUpdateSchema = z.object({
  status: orderStatusSchema,
  trackingNumber: z.string().trim().min(3).optional(),
  note: z.string().trim().max(240).optional()
});

export const paymentCreateSchema = z.object({
  orderId: z.string().min(1),
  amount: z.number().int().min(0),
  method: paymentMethodSchema
});

export const inventoryAdjustmentSchema = z.object({
  quantity: z.number().int().positive(),
  note: z.string().trim().max(240).optional()
});

export const salesQuerySchema = z.object({
  customerId: z.string().min(1).optional(),
  from: z.coerce.date().optional(),
  to: z.coerce.date().optional()
});

export const orderStatusNotificationSchema = z.object({
  customerId: z.string().min(1),
  email: z.string().email(),
  orderId: z.string().min(1),
  orderRef: z.string().min(1),
  status: z.enum(["shipped", "completed", "cancelled"]),
  total: z.number().int().min(0),
  currency: z.string().length(3),
  trackingNumber: z.string().nullable().optional(),
  note: z.string().optional()
});

export type OrderStatus = z.infer<typeof orderStatusSchema>;
export type PaymentStatus = z.infer<typeof paymentStatusSchema>;
export type PaymentMethod = z.infer<typeof paymentMethodSchema>;
export type SaleSettlement = (typeof SALE_SETTLEMENTS)[number];
export type AuthClaims = z.infer<typeof authClaimsSchema>;
export type CartItemInput = z.infer<typeof cartItemSchema>;
export type UpdateCartItemInput = z.infer<typeof updateCartItemSchema>;
export type ShippingAddressInput = z.infer<typeof shippingAddressSchema>;
export type OrderCreateRequest = z.infer<typeof orderCreateSchema>;
export type OrderStatusUpdateRequest = z.infer<typeof orderStatusUpdateSchema>;
export type PaymentCreateRequest = z.infer<typeof paymentCreateSchema>;
export type InventoryAdjustmentRequest = z.infer<typeof inventoryAdjustmentSchema>;
export type SalesQuery = z.infer<typeof salesQuerySchema>;
export type OrderStatusNotificationPayload = z.infer<typeof orderStatusNotificationSchema>;
