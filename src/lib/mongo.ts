import mongoose, { Connection } from "mongoose";
import type { Document as MongoDocument } from "mongodb";
import { DatabaseConfig, loadDatabaseConfig } from "./config";
import { StoreFilter, StoreHandle, StoreRecord } from "./store";

/**
 * StoreHandle over a mongoose connection, issuing the native driver calls
 * per collection.
 */
export class MongoStoreHandle implements StoreHandle {
  constructor(private readonly connection: Connection) {}

  async insertOne(collection: string, record: StoreRecord): Promise<void> {
    await this.connection.collection(collection).insertOne(record);
  }

  async insertMany(collection: string, records: StoreRecord[]): Promise<void> {
    await this.connection
      .collection(collection)
      .insertMany(records, { ordered: true });
  }

  async findOne(
    collection: string,
    filter: StoreFilter,
  ): Promise<StoreRecord | null> {
    const query: MongoDocument = { ...filter };
    return await this.connection.collection(collection).findOne(query);
  }

  async findMany(
    collection: string,
    filter: StoreFilter,
  ): Promise<StoreRecord[]> {
    const query: MongoDocument = { ...filter };
    return await this.connection.collection(collection).find(query).toArray();
  }
}

let storeInstance: MongoStoreHandle | null = null;

export async function connectToDatabase(
  config: DatabaseConfig = loadDatabaseConfig(),
): Promise<MongoStoreHandle> {
  if (storeInstance) {
    return storeInstance;
  }

  try {
    // Enable strict query and strict mode
    mongoose.set("strict", true);
    mongoose.set("strictQuery", true);
    const conn = await mongoose.connect(config.connectionString, {
      dbName: config.dbName,
      maxPoolSize: config.maxPoolSize,
      minPoolSize: config.minPoolSize,
      retryReads: true,
      serverSelectionTimeoutMS: 5000,
      socketTimeoutMS: 45000,
    });

    storeInstance = new MongoStoreHandle(conn.connection);
    console.log("MongoDB Connected");

    // Handle connection errors
    conn.connection.on("error", (err) => {
      console.error("MongoDB connection error:", err);
    });

    conn.connection.on("disconnected", () => {
      console.warn("MongoDB disconnected");
      storeInstance = null;
    });

    return storeInstance;
  } catch (error) {
    console.error("Error connecting to MongoDB:", error);
    throw error;
  }
}

export async function disconnectFromDatabase(): Promise<void> {
  if (storeInstance) {
    await mongoose.disconnect();
    storeInstance = null;
  }
}
