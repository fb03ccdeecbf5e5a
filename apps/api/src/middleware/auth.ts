import type { NextFunction, Request, Response } from "express";
import { authClaimsSchema } from "@agromarket/shared-types";
import type { Identity } from "../services/accessControl.js";
import { verifyAccessToken } from "../utils/tokens.js";

export type AuthRequest = Request & { identity?: Identity };

function parseBearerToken(authorizationHeader?: string) {
  if (!authorizationHeader || !authorizationHeader.startsWith("Bearer ")) {
    return null;
  }
  return authorizationHeader.slice("Bearer ".length);
}

/**
 * Attaches the caller's identity when a valid access token is present.
 * Anonymous and badly signed requests continue without one; services reject
 * them where an identity is required.
 */
export function optionalAuth(req: AuthRequest, _res: Response, next: NextFunction) {
  const token = parseBearerToken(req.header("authorization"));
  if (!token) {
    next();
    return;
  }

  const parsed = authClaimsSchema.safeParse(decodeToken(token));
  req.identity = parsed.success
    ? { customerId: parsed.data.userId, role: parsed.data.role, email: parsed.data.email }
    : undefined;

  next();
}

function decodeToken(token: string): unknown {
  try {
    return verifyAccessToken(token);
  } catch (error) {
    console.warn("[api][auth] rejected access token", {
      error: error instanceof Error ? error.message : String(error)
    });
    return null;
  }
}
