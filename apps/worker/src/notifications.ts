import nodemailer, { type SendMailOptions } from "nodemailer";
import { ORDER_STATUS_JOB, orderStatusNotificationSchema, type OrderStatusNotificationPayload } from "@agromarket/shared-types";

export type RenderedEmail = {
  subject: string;
  text: string;
  html: string;
};

export interface MailSender {
  sendMail(message: SendMailOptions): Promise<unknown>;
}

const STORE_NAME = "Agro Market";

const subjectMap = {
  shipped: (orderRef: string) => `Order Shipped - ${orderRef}`,
  completed: (orderRef: string) => `Order Completed - ${orderRef}`,
  cancelled: (orderRef: string) => `Order Cancelled - ${orderRef}`
} as const;

const introMap = {
  shipped: "Good news. Your order is on its way.",
  completed: "Your order is complete. Thank you for your purchase.",
  cancelled: "Your order has been cancelled and any reserved stock was returned."
} as const;

export function formatAmount(total: number, currency: string) {
  return `${currency} ${(total / 100).toFixed(2)}`;
}

function escapeHtml(value: string) {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

export function renderOrderStatusEmail(payload: OrderStatusNotificationPayload): RenderedEmail {
  const amount = formatAmount(payload.total, payload.currency);
  const intro = introMap[payload.status];

  const text = [
    "Hello,",
    "",
    intro,
    `Order Reference: ${payload.orderRef}`,
    `Order Total: ${amount}`,
    payload.trackingNumber ? `Tracking Number: ${payload.trackingNumber}` : null,
    payload.note ? `Update: ${payload.note}` : null,
    "",
    `Thank you for shopping with ${STORE_NAME}.`
  ]
    .filter((line): line is string => line !== null)
    .join("\n");

  const html = `
    <div style="font-family: Arial, sans-serif; color: #1f3b1a; line-height: 1.5;">
      <h2 style="margin: 0 0 12px;">${STORE_NAME}</h2>
      <p>Hello,</p>
      <p>${intro}</p>
      <p><strong>Order Reference:</strong> ${escapeHtml(payload.orderRef)}</p>
      <p><strong>Order Total:</strong> ${amount}</p>
      ${payload.trackingNumber ? `<p><strong>Tracking Number:</strong> ${escapeHtml(payload.trackingNumber)}</p>` : ""}
      ${payload.note ? `<p><strong>Update:</strong> ${escapeHtml(payload.note)}</p>` : ""}
      <p>Thank you for shopping with ${STORE_NAME}.</p>
    </div>
  `;

  return { subject: subjectMap[payload.status](payload.orderRef), text, html };
}

export function createTransporter(env: NodeJS.ProcessEnv = process.env): MailSender | null {
  const host = env.SMTP_HOST;
  const port = env.SMTP_PORT ? Number(env.SMTP_PORT) : undefined;
  const secure = (env.SMTP_SECURE ?? "true").toLowerCase() === "true";
  const user = env.SMTP_USER;
  const pass = env.SMTP_PASS;

  if (!host || !port || !user || !pass) {
    return null;
  }

  return nodemailer.createTransport({
    host,
    port,
    secure,
    auth: {
      user,
      pass
    }
  });
}

export type NotificationDeps = {
  transporter: MailSender | null;
  fromAddress: string;
};

export async function processOrderStatusNotification(payload: OrderStatusNotificationPayload, deps: NotificationDeps) {
  const { subject, text, html } = renderOrderStatusEmail(payload);

  if (!deps.transporter) {
    console.warn("[worker][notify] SMTP not configured. Logging notification payload instead.", {
      to: payload.email,
      subject,
      payload
    });
    return;
  }

  await deps.transporter.sendMail({
    from: deps.fromAddress,
    to: payload.email,
    subject,
    text,
    html
  });

  console.log("[worker][notify] email sent", {
    to: payload.email,
    subject,
    orderRef: payload.orderRef,
    status: payload.status
  });
}

export type NotificationJob = {
  name: string;
  data: unknown;
};

/** Returns false for jobs this worker does not handle. Malformed payloads throw so BullMQ records the failure. */
export async function handleNotificationJob(job: NotificationJob, deps: NotificationDeps): Promise<boolean> {
  if (job.name !== ORDER_STATUS_JOB) {
    console.log("[worker] skipped unknown job", job.name);
    return false;
  }

  const payload = orderStatusNotificationSchema.parse(job.data);
  await processOrderStatusNotification(payload, deps);
  return true;
}
