import { MongoClient, type Collection, type Db } from "mongodb";
import type { MongoConfig } from "../config.ts";
import { ConnectionError } from "../errors.ts";
import type { BackendAdapter, BenchRecord, Logger } from "../types.ts";
import { resolvePackageVersion } from "../util.ts";
import { TABLE, patchEntries, releaseAfterFailure } from "./shared.ts";

export const COLLECTION = TABLE;

function toRecord(doc: BenchRecord): BenchRecord {
  return { seq: doc.seq, name: doc.name, price: doc.price, quantity: doc.quantity };
}

/**
 * Document store backend. MongoDB's ObjectId is not an integer, so records are
 * addressed by their `seq` field (unique index). Creating a record whose `seq`
 * is already stored replaces that document, as a Redis hash write does, so a
 * warm run over leftover documents goes ahead.
 */
export function mongodbAdapter(config: MongoConfig, log: Logger = console): BackendAdapter {
  let client: MongoClient | undefined;
  let db: Db | undefined;
  let records: Collection<BenchRecord> | undefined;

  const coll = () => {
    if (!records) throw new Error("mongodb: not connected");
    return records;
  };

  return {
    id: "mongodb",
    getPackageVersion() {
      return resolvePackageVersion("mongodb");
    },
    async getEngineVersion() {
      if (!db) throw new Error("mongodb: not connected");
      const info = await db.admin().buildInfo();
      return typeof info.version === "string" ? info.version : undefined;
    },
    async connect() {
      let opened: MongoClient | undefined;
      try {
        opened = new MongoClient(config.uri);
        await opened.connect();
        const database = opened.db(config.database);
        const collection = database.collection<BenchRecord>(COLLECTION);
        await collection.createIndex({ seq: 1 }, { unique: true });
        client = opened;
        db = database;
        records = collection;
      } catch (e) {
        const c = opened;
        if (c) await releaseAfterFailure("mongodb", () => c.close(), log);
        throw new ConnectionError("mongodb", e);
      }
    },
    async reset() {
      // Only the benchmark collection is touched; there is no identity counter to reset.
      await coll().deleteMany({});
    },
    async create(record) {
      await coll().replaceOne({ seq: record.seq }, { ...record }, { upsert: true });
      return record.seq;
    },
    async read(id) {
      const doc = await coll().findOne({ seq: id });
      return doc ? toRecord(doc) : null;
    },
    async readAll() {
      const docs = await coll().find({}).sort({ seq: 1 }).toArray();
      return docs.map(toRecord);
    },
    async update(id, patch) {
      const res = await coll().updateOne({ seq: id }, { $set: Object.fromEntries(patchEntries(patch)) });
      return res.matchedCount > 0;
    },
    async delete(id) {
      const res = await coll().deleteOne({ seq: id });
      return res.deletedCount > 0;
    },
    async close() {
      const c = client;
      client = undefined;
      db = undefined;
      records = undefined;
      await c?.close();
    },
  };
}
