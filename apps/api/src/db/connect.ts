import mongoose from "mongoose";
import { env } from "../config/env.js";

let isConnected = false;

export async function connectDatabase() {
  if (isConnected) {
    return;
  }

  await mongoose.connect(env.MONGODB_URI, {
    dbName: env.MONGODB_DB_NAME,
    serverSelectionTimeoutMS: 15000,
    family: 4
  });
  // Transactions cannot build indexes, and the unique sale index must exist before the first checkout.
  await mongoose.connection.syncIndexes();
  isConnected = true;
}
