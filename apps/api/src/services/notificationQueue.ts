import { Queue } from "bullmq";
import { Redis } from "ioredis";
import {
  NOTIFICATION_QUEUE_NAME,
  ORDER_STATUS_JOB,
  type OrderStatusNotificationPayload
} from "@agromarket/shared-types";
import type { Order } from "../store/types.js";

export type EnqueueResult = { enqueued: true } | { enqueued: false; reason: string };

export type OrderStatusNotifier = (payload: OrderStatusNotificationPayload) => Promise<EnqueueResult>;

let queue: Queue | null = null;

function getQueue() {
  if (!process.env.REDIS_URL) {
    return null;
  }

  if (queue) {
    return queue;
  }

  const connection = new Redis(process.env.REDIS_URL, {
    maxRetriesPerRequest: null
  });

  queue = new Queue(NOTIFICATION_QUEUE_NAME, { connection });
  return queue;
}

export const enqueueOrderStatusNotification: OrderStatusNotifier = async (payload) => {
  const notificationQueue = getQueue();
  if (!notificationQueue) {
    return { enqueued: false, reason: "REDIS_URL not set" };
  }

  await notificationQueue.add(ORDER_STATUS_JOB, payload, {
    attempts: 5,
    backoff: { type: "exponential", delay: 2000 },
    removeOnComplete: true,
    removeOnFail: false
  });

  return { enqueued: true };
};

/**
 * Sends the post-commit notification for a status change. The order change is
 * already durable at this point, so a queue outage is logged and not rethrown.
 */
export async function notifyOrderStatus(notifier: OrderStatusNotifier, order: Order, note?: string) {
  if (!order.contactEmail) {
    return;
  }
  if (order.status !== "shipped" && order.status !== "completed" && order.status !== "cancelled") {
    return;
  }

  try {
    await notifier({
      customerId: order.customerId,
      email: order.contactEmail,
      orderId: order.id,
      orderRef: order.orderRef,
      status: order.status,
      total: order.total,
      currency: order.currency,
      trackingNumber: order.trackingNumber,
      note
    });
  } catch (error) {
    console.error("[api][notify] failed to enqueue order status notification", {
      orderRef: order.orderRef,
      status: order.status,
      error: error instanceof Error ? error.message : String(error)
    });
  }
}
