import { describe, it, expect, beforeAll, afterAll, vi } from "vitest";
import { config } from "../src/config";
import { MongoKeyValueStore, closeMongo } from "../src/services/mongo";
import { SETTINGS_KEY } from "../src/services/settingsStore";

interface StoredDocument {
  _id: string;
  value: string;
}

const documents = vi.hoisted(() => new Map<string, { _id: string; value: string }>());

// In-process stand-in for the driver: one collection backed by `documents`.
vi.mock("mongodb", () => {
  class MongoClient {
    async connect(): Promise<this> {
      return this;
    }

    db(name: string) {
      return {
        databaseName: name,
        collection: () => ({
          findOne: async (filter: { _id: string }) => documents.get(filter._id) ?? null,
          updateOne: async (filter: { _id: string }, update: { $set: { value: string } }) => {
            documents.set(filter._id, { _id: filter._id, value: update.$set.value });
          },
          find: (filter: { _id: { $in: string[] } }) => ({
            toArray: async () =>
              filter._id.$in.flatMap((id): StoredDocument[] => {
                const doc = documents.get(id);
                return doc ? [doc] : [];
              }),
          }),
        }),
      };
    }

    async close(): Promise<void> {}
  }
  return { MongoClient };
});

describe("MongoKeyValueStore", () => {
  beforeAll(() => {
    config.storage.mongoUri = "mongodb://localhost:27017/prayer_reminders_test";
  });

  afterAll(async () => {
    await closeMongo();
  });

  it("preloads the settings key so peek answers synchronously", async () => {
    documents.set(SETTINGS_KEY, { _id: SETTINGS_KEY, value: "{\"timeFormat\":\"24h\"}" });
    const store = new MongoKeyValueStore([SETTINGS_KEY]);
    expect(store.peek(SETTINGS_KEY)).toBeUndefined();

    await store.preload();

    expect(store.peek(SETTINGS_KEY)).toBe("{\"timeFormat\":\"24h\"}");
  });

  it("keeps the mirror current on writes to the settings key", async () => {
    const store = new MongoKeyValueStore([SETTINGS_KEY]);
    await store.set(SETTINGS_KEY, "{\"timeFormat\":\"12h\"}");
    expect(store.peek(SETTINGS_KEY)).toBe("{\"timeFormat\":\"12h\"}");
  });

  it("does not mirror per-day prayer time entries", async () => {
    const store = new MongoKeyValueStore([SETTINGS_KEY]);
    await store.set("prayer_times:2026-03-10", "{}");
    await store.get("prayer_times:2026-03-11");

    expect(await store.get("prayer_times:2026-03-10")).toBe("{}");
    expect(store.peek("prayer_times:2026-03-10")).toBeUndefined();
    expect(store.peek("prayer_times:2026-03-11")).toBeUndefined();
  });
});
