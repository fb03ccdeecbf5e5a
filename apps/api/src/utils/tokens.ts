import jwt from "jsonwebtoken";
import { env } from "../config/env.js";
import type { AuthClaims } from "@agromarket/shared-types";

// Tokens are issued by the identity service; signing lives here for local tooling and tests.
export function signAccessToken(claims: AuthClaims) {
  return jwt.sign(claims, env.JWT_SECRET, { expiresIn: "15m" });
}

export function verifyAccessToken(token: string) {
  return jwt.verify(token, env.JWT_SECRET);
}
