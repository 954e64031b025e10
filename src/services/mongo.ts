import dns from "dns";
import type { Db, Collection, MongoClientOptions } from "mongodb";
import { MongoClient } from "mongodb";
import { config } from "../config";
import type { CalendarDay, CompletionRecord, TrackablePrayerId } from "../types";
import type { PersistenceOperation } from "../errors";
import { PersistenceError } from "../errors";
import type { KeyValueStore } from "./keyValueStore";
import type { CompletionRepository } from "./completionRepository";
import logger from "../utils/logger";

// Prefer IPv4 to avoid querySrv ETIMEOUT / secureConnect timeout on some networks
if (typeof dns.setDefaultResultOrder === "function") {
  dns.setDefaultResultOrder("ipv4first");
}

let client: MongoClient | null = null;
let db: Db | null = null;
/** Single in-flight connection promise so concurrent getDb() calls reuse one connect */
let connectPromise: Promise<Db> | null = null;

/** Returns true if the error indicates a lost/stale connection that needs reconnect */
export function isConnectionError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  if (error.name === "MongoServerSelectionError") return true;
  const msg = error.message.toLowerCase();
  if (msg.includes("econnreset")) return true;
  if (msg.includes("etimeout") || msg.includes("querysrv") || msg.includes("query_srv")) return true;
  if (msg.includes("timed out") || msg.includes("secureconnect")) return true;
  const cause = error.cause;
  return typeof cause === "object" && cause !== null && "code" in cause && cause.code === "ECONNRESET";
}

/** Close the current client and clear cached db so next getDb() reconnects */
async function resetConnection(): Promise<void> {
  if (client) {
    try {
      await client.close();
    } catch (closeErr) {
      logger.warn("Error closing MongoDB client during reset:", closeErr);
    }
    client = null;
    db = null;
    connectPromise = null;
    logger.info("MongoDB connection reset; next operation will reconnect");
  }
}

/**
 * Runs a Mongo operation; on connection error (e.g. ECONNRESET from idle close),
 * resets the connection and retries once. Any remaining failure is wrapped in
 * a PersistenceError.
 */
async function withMongoRetry<T>(
  operation: PersistenceOperation,
  key: string,
  fn: () => Promise<T>
): Promise<T> {
  try {
    try {
      return await fn();
    } catch (error) {
      if (isConnectionError(error)) {
        logger.warn("MongoDB connection error, resetting and retrying once", error);
        await resetConnection();
        return await fn();
      }
      throw error;
    }
  } catch (error) {
    throw new PersistenceError(`MongoDB ${operation} failed for ${key}`, operation, {
      key,
      cause: error,
    });
  }
}

function databaseName(uri: string): string {
  if (config.storage.dbName) return config.storage.dbName;
  try {
    return new URL(uri).pathname.replace("/", "") || "prayer_reminders";
  } catch {
    return "prayer_reminders";
  }
}

/**
 * Returns the singleton DB instance. Connects once and reuses the same connection
 * for all callers (stores, schedulers, routes).
 */
export async function getDb(): Promise<Db> {
  if (db) return db;
  if (connectPromise) return connectPromise;

  const uri = config.storage.mongoUri;
  if (!uri) {
    throw new PersistenceError("MONGODB_URI is not set in environment variables", "connect");
  }

  const options: MongoClientOptions = {
    serverSelectionTimeoutMS: 30000,
    connectTimeoutMS: 20000,
    retryWrites: true,
    retryReads: true,
    maxPoolSize: 10,
    minPoolSize: 1,
    // Refresh connections before Atlas closes idle ones (~30 min)
    maxIdleTimeMS: 25 * 60 * 1000,
  };

  connectPromise = (async (): Promise<Db> => {
    try {
      const newClient = new MongoClient(uri, options);
      await newClient.connect();
      client = newClient;
      db = client.db(databaseName(uri));
      logger.info(`Connected to MongoDB database: ${db.databaseName}`);
      return db;
    } catch (error) {
      connectPromise = null;
      logger.error("Error connecting to MongoDB:", error);
      throw new PersistenceError("Could not connect to MongoDB", "connect", { cause: error });
    }
  })();

  return connectPromise;
}

/**
 * Connect to MongoDB once at startup and create the indexes the stores rely on.
 * Idempotent.
 */
export async function connectMongo(): Promise<Db> {
  const database = await getDb();
  await database
    .collection<CompletionDocument>(COMPLETIONS_COLLECTION)
    .createIndex({ prayer_id: 1, date: 1 }, { unique: true });
  return database;
}

/** Close the MongoDB connection (e.g. on graceful shutdown). */
export async function closeMongo(): Promise<void> {
  await resetConnection();
}

interface KeyValueDocument {
  _id: string;
  value: string;
  updated_at: Date;
}

interface CompletionDocument {
  prayer_id: TrackablePrayerId;
  date: CalendarDay;
  completed: boolean;
  updated_at: Date;
}

const KV_COLLECTION = "kv_store";
const COMPLETIONS_COLLECTION = "prayer_completions";

async function getKeyValueCollection(): Promise<Collection<KeyValueDocument>> {
  const database = await getDb();
  return database.collection<KeyValueDocument>(KV_COLLECTION);
}

async function getCompletionsCollection(): Promise<Collection<CompletionDocument>> {
  const database = await getDb();
  return database.collection<CompletionDocument>(COMPLETIONS_COLLECTION);
}

/**
 * Key-value store over one collection. Values of the keys named at
 * construction are mirrored in memory so `peek` answers synchronously once
 * they are warm; other keys always go to the database.
 */
export class MongoKeyValueStore implements KeyValueStore {
  private readonly mirroredKeys: ReadonlySet<string>;
  private mirror = new Map<string, string | null>();

  constructor(mirroredKeys: readonly string[] = []) {
    this.mirroredKeys = new Set(mirroredKeys);
  }

  async get(key: string): Promise<string | null> {
    const doc = await withMongoRetry("read", key, async () => {
      const collection = await getKeyValueCollection();
      return collection.findOne({ _id: key });
    });
    const value = doc?.value ?? null;
    this.remember(key, value);
    return value;
  }

  async set(key: string, value: string): Promise<void> {
    await withMongoRetry("write", key, async () => {
      const collection = await getKeyValueCollection();
      await collection.updateOne(
        { _id: key },
        { $set: { value, updated_at: new Date() } },
        { upsert: true }
      );
    });
    this.remember(key, value);
  }

  peek(key: string): string | null | undefined {
    return this.mirror.get(key);
  }

  /** Loads the mirrored keys ahead of first use. */
  async preload(): Promise<void> {
    const keys = [...this.mirroredKeys];
    if (keys.length === 0) return;
    const docs = await withMongoRetry("read", keys.join(","), async () => {
      const collection = await getKeyValueCollection();
      return collection.find({ _id: { $in: keys } }).toArray();
    });
    for (const key of keys) {
      this.mirror.set(key, docs.find((doc) => doc._id === key)?.value ?? null);
    }
  }

  private remember(key: string, value: string | null): void {
    if (this.mirroredKeys.has(key)) {
      this.mirror.set(key, value);
    }
  }
}

function toRecord(doc: CompletionDocument): CompletionRecord {
  return { prayerId: doc.prayer_id, date: doc.date, completed: doc.completed };
}

export class MongoCompletionRepository implements CompletionRepository {
  async get(prayerId: TrackablePrayerId, date: CalendarDay): Promise<CompletionRecord | null> {
    const doc = await withMongoRetry("read", `${prayerId}:${date}`, async () => {
      const collection = await getCompletionsCollection();
      return collection.findOne({ prayer_id: prayerId, date });
    });
    return doc ? toRecord(doc) : null;
  }

  async upsert(record: CompletionRecord): Promise<void> {
    await withMongoRetry("write", `${record.prayerId}:${record.date}`, async () => {
      const collection = await getCompletionsCollection();
      await collection.updateOne(
        { prayer_id: record.prayerId, date: record.date },
        { $set: { completed: record.completed, updated_at: new Date() } },
        { upsert: true }
      );
    });
  }

  async listRange(from: CalendarDay, to: CalendarDay): Promise<CompletionRecord[]> {
    const docs = await withMongoRetry("read", `${from}..${to}`, async () => {
      const collection = await getCompletionsCollection();
      return collection
        .find({ date: { $gte: from, $lte: to } })
        .sort({ date: 1 })
        .toArray();
    });
    return docs.map(toRecord);
  }

  async listForPrayer(prayerId: TrackablePrayerId): Promise<CompletionRecord[]> {
    const docs = await withMongoRetry("read", prayerId, async () => {
      const collection = await getCompletionsCollection();
      return collection.find({ prayer_id: prayerId }).sort({ date: 1 }).toArray();
    });
    return docs.map(toRecord);
  }
}
