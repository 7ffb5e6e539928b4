import mongoose from 'mongoose';
import logger from 'jet-logger';

/**
 * Open the shared mongoose connection. Clause batches are written in
 * transactions, so the server must be a replica set (Atlas clusters are).
 */
const connectDB = async (mongoURI: string): Promise<typeof mongoose> => {
  const conn = await mongoose.connect(mongoURI, {
    maxPoolSize: 50,
    minPoolSize: 5,
    serverSelectionTimeoutMS: 5000,  // Timeout after 5s if can't connect
    socketTimeoutMS: 45000,
    family: 4,              // Use IPv4, skip IPv6
  });

  logger.info('MongoDB connected successfully');

  const dbName = mongoose.connection.db?.databaseName;
  if (dbName) {
    logger.info(`Database: ${dbName}`);
  }
  return conn;
};

// Handle connection events
mongoose.connection.on('disconnected', () => {
  logger.warn('MongoDB disconnected');
});

mongoose.connection.on('error', (err: Error) => {
  logger.err(`MongoDB error: ${err.message}`);
});

export const disconnectDB = async (): Promise<void> => {
  await mongoose.connection.close();
  logger.info('MongoDB connection closed');
};

export default connectDB;
