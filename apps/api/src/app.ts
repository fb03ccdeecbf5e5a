import cors from "cors";
import express from "express";
import helmet from "helmet";
import morgan from "morgan";
import { errorHandler } from "./middleware/errors.js";
import { createRouter } from "./router.js";
import type { Services } from "./services/index.js";

export function createApp(services: Services) {
  const app = express();

  app.use(helmet());
  app.use(cors({ origin: process.env.CORS_ORIGIN?.split(",") ?? "*" }));
  app.use(express.json({ limit: "1mb" }));
  if (process.env.NODE_ENV !== "test") {
    app.use(morgan("dev"));
  }

  app.get("/health", (_req, res) => {
    res.status(200).json({ status: "ok", service: "api", timestamp: new Date().toISOString() });
  });

  app.use("/api/v1", createRouter(services));

  app.use(errorHandler);

  return app;
}
