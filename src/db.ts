import mongoose from "mongoose";
import { PersistenceError, describeError } from "./errors";

export async function connectMongo(uri: string) {
  if (!uri) throw new PersistenceError("MONGODB_URI não definido");
  try {
    await mongoose.connect(uri);
  } catch (err) {
    throw new PersistenceError(`failed to connect to MongoDB: ${describeError(err)}`, { cause: err });
  }
  return mongoose.connection;
}

export async function disconnectMongo() {
  await mongoose.disconnect();
}
