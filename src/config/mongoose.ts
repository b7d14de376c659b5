import mongoose from "mongoose";
import { logger } from "../utils/logger";

export async function connectToDatabase(uri: string): Promise<typeof mongoose> {
  mongoose.set("strictQuery", true);
  const connection = await mongoose.connect(uri, {
    serverSelectionTimeoutMS: 10_000,
  });
  logger.info(`MongoDB connected to ${connection.connection.name}`);
  return connection;
}

export async function disconnectFromDatabase(): Promise<void> {
  await mongoose.disconnect();
  logger.info("MongoDB disconnected");
}
