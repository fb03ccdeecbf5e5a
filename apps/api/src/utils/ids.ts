import { Types } from "mongoose";
import { ValidationError } from "../lib/errors.js";

export function isObjectId(id: string) {
  return Types.ObjectId.isValid(id) && String(new Types.ObjectId(id)) === id;
}

export function toObjectId(id: string) {
  if (!isObjectId(id)) {
    throw new ValidationError("Invalid ObjectId", { id });
  }
  return new Types.ObjectId(id);
}
