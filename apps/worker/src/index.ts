import dotenv from "dotenv";
import path from "path";
import { fileURLToPath } from "url";
import { Worker } from "bullmq";
import { Redis } from "ioredis";
import { NOTIFICATION_QUEUE_NAME } from "@agromarket/shared-types";
import { createTransporter, handleNotificationJob } from "./notifications.js";

const currentFile = fileURLToPath(import.meta.url);
const currentDir = path.dirname(currentFile);
dotenv.config({ path: path.resolve(process.cwd(), ".env") });
dotenv.config({ path: path.resolve(currentDir, "../../../.env") });

const redisUrl = process.env.REDIS_URL;
if (!redisUrl) {
  throw new Error("REDIS_URL is required for worker startup");
}
const connection = new Redis(redisUrl, {
  maxRetriesPerRequest: null
});

const deps = {
  transporter: createTransporter(),
  fromAddress: process.env.EMAIL_FROM ?? "Agro Market <orders@agromarket.example>"
};

const worker = new Worker(
  NOTIFICATION_QUEUE_NAME,
  async (job) => {
    await handleNotificationJob({ name: job.name, data: job.data }, deps);
  },
  { connection }
);

worker.on("failed", (job, error) => {
  console.error("[worker][notify] job failed", { id: job?.id, name: job?.name, error: error.message });
});

console.log(`[worker] listening on ${NOTIFICATION_QUEUE_NAME}`);
