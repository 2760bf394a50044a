import { beforeEach, describe, it, expect, vi } from "vitest";

type Doc = { _id?: string; seq: number; name: string; price: number; quantity: number };

const mocks = vi.hoisted(() => {
  const docs = new Map<number, Doc>();
  const collection = {
    createIndex: vi.fn(async () => "seq_1"),
    deleteMany: vi.fn(async () => {
      const deletedCount = docs.size;
      docs.clear();
      return { deletedCount };
    }),
    replaceOne: vi.fn(async (filter: { seq: number }, doc: Doc, options: { upsert?: boolean }) => {
      const existing = docs.get(filter.seq);
      if (!existing && !options.upsert) return { matchedCount: 0, upsertedCount: 0 };
      docs.set(filter.seq, { ...doc, _id: existing?._id ?? `oid-${filter.seq}` });
      return { matchedCount: existing ? 1 : 0, upsertedCount: existing ? 0 : 1 };
    }),
    find: vi.fn((_filter: Record<string, never>) => ({
      sort: (_order: { seq: 1 }) => ({
        toArray: async () => [...docs.values()].sort((a, b) => a.seq - b.seq).map((d) => ({ ...d })),
      }),
    })),
    findOne: vi.fn(async (filter: { seq: number }) => {
      const d = docs.get(filter.seq);
      return d ? { ...d } : null;
    }),
    updateOne: vi.fn(async (filter: { seq: number }, update: { $set: Record<string, unknown> }) => {
      const d = docs.get(filter.seq);
      if (!d) return { matchedCount: 0, modifiedCount: 0 };
      docs.set(filter.seq, { ...d, ...update.$set });
      return { matchedCount: 1, modifiedCount: 1 };
    }),
    deleteOne: vi.fn(async (filter: { seq: number }) => ({ deletedCount: docs.delete(filter.seq) ? 1 : 0 })),
  };
  const database = {
    collection: vi.fn(() => collection),
    admin: () => ({ buildInfo: async () => ({ version: "7.0.12" }) }),
  };
  const connect = vi.fn(async () => undefined);
  const close = vi.fn(async () => undefined);
  const uris: string[] = [];
  class MongoClient {
    constructor(uri: string) {
      uris.push(uri);
    }
    connect = connect;
    close = close;
    db = vi.fn(() => database);
  }
  return { docs, collection, database, connect, close, uris, MongoClient };
});

vi.mock("mongodb", () => ({ MongoClient: mocks.MongoClient }));

import { mongodbAdapter } from "../adapters/mongodb.ts";
import { runPhases } from "../core.ts";
import { generateDataset, makeRecord } from "../dataset.ts";
import { ConnectionError } from "../errors.ts";
import type { Logger } from "../types.ts";

describe("mongodbAdapter", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    mocks.docs.clear();
    mocks.uris.length = 0;
  });

  const connected = async () => {
    const adapter = mongodbAdapter({ uri: "mongodb://localhost:27017", database: "benchmark" });
    await adapter.connect();
    return adapter;
  };

  it("connects to the configured database and indexes seq", async () => {
    const adapter = await connected();
    expect(mocks.uris).toEqual(["mongodb://localhost:27017"]);
    expect(mocks.database.collection).toHaveBeenCalledWith("bench_records");
    expect(mocks.collection.createIndex).toHaveBeenCalledWith({ seq: 1 }, { unique: true });
    expect(await adapter.getEngineVersion()).toBe("7.0.12");
    await adapter.close();
    expect(mocks.close).toHaveBeenCalledTimes(1);
  });

  it("addresses records by seq and reads them back without _id", async () => {
    const adapter = await connected();
    const record = makeRecord(4);
    expect(await adapter.create(record)).toBe(4);
    expect(mocks.collection.replaceOne).toHaveBeenLastCalledWith({ seq: 4 }, record, { upsert: true });
    expect(record).not.toHaveProperty("_id");
    expect(await adapter.read(4)).toEqual(record);
    expect(await adapter.read(5)).toBeNull();
  });

  it("applies patches and reports missing documents", async () => {
    const adapter = await connected();
    await adapter.create(makeRecord(1));
    expect(await adapter.update(1, { quantity: 42 })).toBe(true);
    expect(mocks.collection.updateOne).toHaveBeenLastCalledWith({ seq: 1 }, { $set: { quantity: 42 } });
    expect(await adapter.read(1)).toEqual({ ...makeRecord(1), quantity: 42 });
    expect(await adapter.update(2, { quantity: 1 })).toBe(false);
  });

  it("deletes documents", async () => {
    const adapter = await connected();
    await adapter.create(makeRecord(1));
    expect(await adapter.delete(1)).toBe(true);
    expect(await adapter.read(1)).toBeNull();
    expect(await adapter.delete(1)).toBe(false);
  });

  it("empties only the benchmark collection on reset, repeatedly", async () => {
    const adapter = await connected();
    await adapter.create(makeRecord(1));
    await adapter.create(makeRecord(2));
    await adapter.reset();
    await adapter.reset();
    expect(mocks.collection.deleteMany).toHaveBeenCalledTimes(2);
    expect(mocks.collection.deleteMany).toHaveBeenCalledWith({});
    expect(mocks.docs.size).toBe(0);
  });

  it("wraps connection failures and releases the client", async () => {
    mocks.connect.mockRejectedValueOnce(new Error("ECONNREFUSED 127.0.0.1:27017"));
    const adapter = mongodbAdapter({ uri: "mongodb://localhost:27017", database: "benchmark" });
    const err = await adapter.connect().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ConnectionError);
    expect(err).toHaveProperty("message", "mongodb: connection failed: ECONNREFUSED 127.0.0.1:27017");
    await expect(adapter.connect()).resolves.toBeUndefined();
    expect(mocks.close).toHaveBeenCalledTimes(1);
    await adapter.close();
  });

  it("rejects operations before connect", async () => {
    const adapter = mongodbAdapter({ uri: "mongodb://localhost:27017", database: "benchmark" });
    await expect(adapter.read(1)).rejects.toThrow("mongodb: not connected");
    await expect(adapter.reset()).rejects.toThrow("mongodb: not connected");
    await expect(adapter.getEngineVersion()).rejects.toThrow("mongodb: not connected");
  });

  it("replaces a document whose seq is already stored", async () => {
    const adapter = await connected();
    mocks.docs.set(1, { _id: "oid-old", seq: 1, name: "Leftover", price: 0.5, quantity: 99 });
    expect(await adapter.create(makeRecord(1))).toBe(1);
    expect(await adapter.read(1)).toEqual(makeRecord(1));
    expect(mocks.docs.size).toBe(1);
  });

  it("runs every phase in warm mode over a collection with leftover documents", async () => {
    const adapter = await connected();
    mocks.docs.set(1, { _id: "oid-old", seq: 1, name: "Leftover", price: 0.5, quantity: 99 });
    mocks.docs.set(2, { _id: "oid-old-2", seq: 2, name: "Leftover", price: 0.5, quantity: 99 });
    const log: Logger = { log: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const { phases, readAll } = await runPhases(adapter, generateDataset(3), 1, { log });
    expect(phases.create.count).toBe(1);
    expect(phases.delete.count).toBe(1);
    expect(readAll.count).toBe(1);
    expect(log.error).not.toHaveBeenCalled();
    expect(mocks.docs.size).toBe(0);
  });

  it("reads every document back in seq order", async () => {
    const adapter = await connected();
    await adapter.create(makeRecord(3));
    await adapter.create(makeRecord(1));
    expect(await adapter.readAll()).toEqual([makeRecord(1), makeRecord(3)]);
    expect(mocks.collection.find).toHaveBeenCalledWith({});
  });

  it("keeps the ConnectionError when closing the half-open client also fails", async () => {
    mocks.collection.createIndex.mockRejectedValueOnce(new Error("not authorized on benchmark"));
    mocks.close.mockRejectedValueOnce(new Error("client already closed"));
    const log: Logger = { log: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const adapter = mongodbAdapter({ uri: "mongodb://localhost:27017", database: "benchmark" }, log);
    const err = await adapter.connect().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ConnectionError);
    expect(err).toHaveProperty("message", "mongodb: connection failed: not authorized on benchmark");
    expect(log.warn).toHaveBeenCalledWith("[warn] mongodb: release after failed connect: client already closed");
    await expect(adapter.read(1)).rejects.toThrow("mongodb: not connected");
  });
});
