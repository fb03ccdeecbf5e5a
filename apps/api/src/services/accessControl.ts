import { ForbiddenError, UnauthorizedError } from "../lib/errors.js";

export type Role = "customer" | "admin";

export type Identity = {
  customerId: string;
  role: Role;
  email?: string;
};

export function requireIdentity(identity: Identity | undefined): Identity {
  if (!identity) {
    throw new UnauthorizedError();
  }
  return identity;
}

export function requireCustomer(identity: Identity | undefined): Identity {
  const caller = requireIdentity(identity);
  if (caller.role !== "customer") {
    throw new ForbiddenError("Customer account required");
  }
  return caller;
}

export function requireAdmin(identity: Identity | undefined): Identity {
  const caller = requireIdentity(identity);
  if (caller.role !== "admin") {
    throw new ForbiddenError("Administrator role required");
  }
  return caller;
}

export function requireOwner(identity: Identity | undefined, ownerId: string): Identity {
  const caller = requireIdentity(identity);
  if (caller.customerId !== ownerId) {
    throw new ForbiddenError("Resource belongs to another customer");
  }
  return caller;
}

export function requireOwnerOrAdmin(identity: Identity | undefined, ownerId: string): Identity {
  const caller = requireIdentity(identity);
  if (caller.role !== "admin" && caller.customerId !== ownerId) {
    throw new ForbiddenError("Resource belongs to another customer");
  }
  return caller;
}
