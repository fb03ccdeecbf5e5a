import { afterEach, describe, expect, it, vi } from "vitest";
import type { OrderStatusNotificationPayload } from "@agromarket/shared-types";
import {
  createTransporter,
  formatAmount,
  handleNotificationJob,
  renderOrderStatusEmail,
  type MailSender
} from "../src/notifications.js";

const shippedPayload: OrderStatusNotificationPayload = {
  customerId: "customer-1",
  email: "buyer@example.com",
  orderId: "order-1",
  orderRef: "AGR-1700000000000-ABC123",
  status: "shipped",
  total: 4350,
  currency: "USD",
  trackingNumber: "TRK-001",
  note: "Left the depot <today>"
};

function fakeSender() {
  const sendMail = vi.fn<(message: Parameters<MailSender["sendMail"]>[0]) => Promise<unknown>>(async () => ({}));
  return { sender: { sendMail }, sendMail };
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("notification rendering", () => {
  it("formats minor units with two decimals", () => {
    expect(formatAmount(4350, "USD")).toBe("USD 43.50");
    expect(formatAmount(7, "KES")).toBe("KES 0.07");
  });

  it("renders subject and text lines for a shipped order", () => {
    const email = renderOrderStatusEmail(shippedPayload);

    expect(email.subject).toBe("Order Shipped - AGR-1700000000000-ABC123");
    expect(email.text.split("\n")).toEqual([
      "Hello,",
      "",
      "Good news. Your order is on its way.",
      "Order Reference: AGR-1700000000000-ABC123",
      "Order Total: USD 43.50",
      "Tracking Number: TRK-001",
      "Update: Left the depot <today>",
      "",
      "Thank you for shopping with Agro Market."
    ]);
    expect(email.html).toContain("<p><strong>Update:</strong> Left the depot &lt;today&gt;</p>");
  });

  it("omits tracking and note lines when absent", () => {
    const email = renderOrderStatusEmail({
      ...shippedPayload,
      status: "cancelled",
      trackingNumber: null,
      note: undefined
    });

    expect(email.subject).toBe("Order Cancelled - AGR-1700000000000-ABC123");
    expect(email.text).not.toContain("Tracking Number");
    expect(email.text).not.toContain("Update:");
  });
});

describe("createTransporter", () => {
  it("returns null when SMTP settings are incomplete", () => {
    expect(createTransporter({ SMTP_HOST: "smtp.example.com" })).toBeNull();
  });
});

describe("handleNotificationJob", () => {
  it("sends the rendered email through the transporter", async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    const { sender, sendMail } = fakeSender();

    const handled = await handleNotificationJob(
      { name: "order-status", data: shippedPayload },
      { transporter: sender, fromAddress: "Agro Market <orders@example.com>" }
    );

    expect(handled).toBe(true);
    expect(sendMail).toHaveBeenCalledTimes(1);
    expect(sendMail.mock.calls[0][0]).toMatchObject({
      from: "Agro Market <orders@example.com>",
      to: "buyer@example.com",
      subject: "Order Shipped - AGR-1700000000000-ABC123"
    });
  });

  it("logs instead of sending when SMTP is not configured", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    await handleNotificationJob({ name: "order-status", data: shippedPayload }, { transporter: null, fromAddress: "x@example.com" });

    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toBe("[worker][notify] SMTP not configured. Logging notification payload instead.");
  });

  it("skips jobs it does not handle", async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    const { sender, sendMail } = fakeSender();

    const handled = await handleNotificationJob({ name: "system-startup", data: {} }, { transporter: sender, fromAddress: "x@example.com" });

    expect(handled).toBe(false);
    expect(sendMail).not.toHaveBeenCalled();
  });

  it("rejects malformed payloads", async () => {
    const { sender, sendMail } = fakeSender();

    await expect(
      handleNotificationJob({ name: "order-status", data: { orderRef: "AGR-1" } }, { transporter: sender, fromAddress: "x@example.com" })
    ).rejects.toThrow();
    expect(sendMail).not.toHaveBeenCalled();
  });
});
