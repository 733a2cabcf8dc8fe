/**
 * Mongo client singleton for the native driver.
 * Purpose: provide a single entrypoint to obtain the client (`getMongoClient`, needed to
 * open sessions), the database handle (`getDb`) and to close it (`disconnectDb`).
 * Connection settings come from `@/configuration/env`.
 */
import { MongoClient, type Db } from "mongodb";
import { loadEnvConfig } from "@/configuration/env";

let client: MongoClient | null = null;
let dbInstance: Db | null = null;
let connectPromise: Promise<MongoClient> | null = null;

const getUri = (): string => {
  const uri = loadEnvConfig().mongoUri;
  if (!uri) throw new Error("MongoDB URI not configured (MONGO_URI).");
  return uri;
};

/**
 * Establish (or reuse) the client. Repeated calls reuse the same in-flight promise
 * to avoid opening multiple pools.
 */
export async function getMongoClient(): Promise<MongoClient> {
  if (client) return client;
  if (!connectPromise) {
    connectPromise = new MongoClient(getUri())
      .connect()
      .then((connected) => {
        client = connected;
        return connected;
      })
      .catch((err) => {
        connectPromise = null;
        throw err;
      });
  }
  return connectPromise;
}

export async function getDb(): Promise<Db> {
  if (dbInstance) return dbInstance;
  const connected = await getMongoClient();
  dbInstance = connected.db(loadEnvConfig().dbName);
  return dbInstance;
}

export async function disconnectDb(): Promise<void> {
  if (client) {
    await client.close();
  }
  client = null;
  dbInstance = null;
  connectPromise = null;
}
