import { z } from "zod";
import dotenv from "dotenv";
import path from "path";
import { fileURLToPath } from "url";

const currentFile = fileURLToPath(import.meta.url);
const currentDir = path.dirname(currentFile);

// Load .env from both package cwd and repo root so running from apps/api or repo root both work.
dotenv.config({ path: path.resolve(process.cwd(), ".env") });
dotenv.config({ path: path.resolve(currentDir, "../../../../.env") });

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().default(5000),
  CORS_ORIGIN: z.string().default("*"),
  MONGODB_URI: z.string().min(1),
  MONGODB_DB_NAME: z.string().min(1).default("agro_market"),
  JWT_SECRET: z.string().min(16),
  STORE_CURRENCY: z.string().length(3).default("USD"),
  PAYMENT_SIMULATION_MODE: z.enum(["approve", "reject", "limit"]).default("approve"),
  PAYMENT_APPROVAL_LIMIT: z.coerce.number().int().positive().optional(),
  REDIS_URL: z.string().optional()
});

export type Env = z.infer<typeof envSchema>;

export const env = envSchema.parse(process.env);
