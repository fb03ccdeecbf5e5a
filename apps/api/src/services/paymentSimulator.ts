import type { PaymentMethod } from "@agromarket/shared-types";
import type { Order } from "../store/types.js";

export type AuthorizationRequest = {
  order: Order;
  amount: number;
  method: PaymentMethod;
};

export type AuthorizationDecision = { approved: true } | { approved: false; reason: string };

/** Decides a payment. Must be deterministic for a given request. */
export interface PaymentAuthorizer {
  authorize(request: AuthorizationRequest): Promise<AuthorizationDecision>;
}

export type SimulationMode = "approve" | "reject" | "limit";

export type SimulatedAuthorizerOptions = {
  mode: SimulationMode;
  /** Largest amount approved in `limit` mode, in minor units. */
  approvalLimit?: number;
};

export function createSimulatedAuthorizer(options: SimulatedAuthorizerOptions): PaymentAuthorizer {
  const { mode, approvalLimit } = options;
  if (mode === "limit" && approvalLimit === undefined) {
    throw new Error("PAYMENT_APPROVAL_LIMIT is required when PAYMENT_SIMULATION_MODE is limit");
  }

  return {
    async authorize({ amount }) {
      if (mode === "reject") {
        return { approved: false, reason: "Payment declined by issuer" };
      }
      if (mode === "limit" && approvalLimit !== undefined && amount > approvalLimit) {
        return { approved: false, reason: `Amount exceeds approval limit of ${approvalLimit}` };
      }
      return { approved: true };
    }
  };
}
