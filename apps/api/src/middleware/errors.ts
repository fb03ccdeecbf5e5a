import type { NextFunction, Request, Response } from "express";
import { isDomainError, type ErrorKind } from "../lib/errors.js";
import type { AuthRequest } from "./auth.js";

const statusByKind: Record<ErrorKind, number> = {
  validation: 400,
  amount_mismatch: 400,
  unauthorized: 401,
  forbidden: 403,
  not_found: 404,
  insufficient_stock: 409,
  invalid_transition: 409,
  duplicate_sale: 409,
  storage_failure: 503
};

type AsyncHandler = (req: AuthRequest, res: Response) => Promise<void>;

/** Forwards rejected handler promises to the error middleware. */
export function route(handler: AsyncHandler) {
  return (req: AuthRequest, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}

export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction) {
  if (isDomainError(err)) {
    res.status(statusByKind[err.kind]).json({ message: err.message, error: err.kind, context: err.context });
    return;
  }

  // express.json() rejects unparseable bodies with a SyntaxError
  if (err instanceof SyntaxError) {
    res.status(400).json({ message: "Malformed JSON body", error: "validation", context: {} });
    return;
  }

  console.error("[api] unhandled error", err);
  res.status(500).json({ message: "Internal server error" });
}
