import mongoose from 'mongoose';
import type { Logger } from 'pino';

export async function connectDatabase(uri: string, dbName: string, logger: Logger): Promise<typeof mongoose> {
  mongoose.connection.on('disconnected', () => {
    logger.warn('MongoDB connection lost');
  });
  mongoose.connection.on('reconnected', () => {
    logger.info('MongoDB connection restored');
  });

  const connection = await mongoose.connect(uri, { dbName, serverSelectionTimeoutMS: 10_000 });
  logger.info({ dbName }, 'Connected to MongoDB');
  return connection;
}

export async function disconnectDatabase(): Promise<void> {
  await mongoose.disconnect();
}

export function isDatabaseConnected(): boolean {
  return mongoose.connection.readyState === mongoose.ConnectionStates.connected;
}
