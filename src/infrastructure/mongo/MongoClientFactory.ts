import { MongoClient } from "mongodb";

export const DEFAULT_DB_NAME = "mobility_sync";

/** Not connected yet; repositories connect on first use. */
export const createMongoClient = (mongoUri: string): MongoClient => new MongoClient(mongoUri);
