import { createClient } from "redis";
import type { RedisConfig } from "../config.ts";
import { ConnectionError } from "../errors.ts";
import type { BackendAdapter, BenchRecord, Logger, RecordId } from "../types.ts";
import { resolvePackageVersion } from "../util.ts";
import { patchEntries, releaseAfterFailure } from "./shared.ts";

type RedisClient = ReturnType<typeof createClient>;

export const KEY_PREFIX = "bench:record:";
const DELETE_BATCH = 500;

export function recordKey(id: RecordId): string {
  return `${KEY_PREFIX}${id}`;
}

function fromHash(hash: Record<string, string>): BenchRecord | null {
  if (!Object.keys(hash).length) return null;
  return {
    seq: Number(hash.seq),
    name: hash.name,
    price: Number(hash.price),
    quantity: Number(hash.quantity),
  };
}

/**
 * Key-value backend. Each record is a hash under `bench:record:<seq>`; the
 * sequence number is the address since Redis has no identity column.
 */
export function redisAdapter(config: RedisConfig, log: Logger = console): BackendAdapter {
  let client: RedisClient | undefined;
  let lastError: Error | undefined;

  const redis = () => {
    if (!client) throw new Error("redis: not connected");
    return client;
  };

  const recordKeys = async (r: RedisClient) => {
    const keys: string[] = [];
    for await (const key of r.scanIterator({ MATCH: `${KEY_PREFIX}*`, COUNT: 100 })) keys.push(key);
    return keys;
  };

  return {
    id: "redis",
    getPackageVersion() {
      return resolvePackageVersion("redis");
    },
    async getEngineVersion() {
      const info = await redis().info("server");
      return /^redis_version:(\S+)/m.exec(info)?.[1];
    },
    async connect() {
      lastError = undefined;
      const c = createClient({
        socket: { host: config.host, port: config.port, reconnectStrategy: false },
        database: config.db,
      });
      // Errors also reject the pending command; keep the latest for the connect failure.
      c.on("error", (err: Error) => {
        lastError = err;
      });
      try {
        await c.connect();
        client = c;
      } catch (e) {
        const cause = lastError ?? e;
        if (c.isOpen) await releaseAfterFailure("redis", () => c.disconnect(), log);
        throw new ConnectionError("redis", cause);
      }
    },
    async reset() {
      const r = redis();
      const keys = await recordKeys(r);
      for (let i = 0; i < keys.length; i += DELETE_BATCH) {
        await r.del(keys.slice(i, i + DELETE_BATCH));
      }
    },
    async create(record) {
      await redis().hSet(recordKey(record.seq), {
        seq: record.seq,
        name: record.name,
        price: record.price,
        quantity: record.quantity,
      });
      return record.seq;
    },
    async read(id) {
      return fromHash(await redis().hGetAll(recordKey(id)));
    },
    async readAll() {
      const r = redis();
      const ids = (await recordKeys(r))
        .map((key) => Number(key.slice(KEY_PREFIX.length)))
        .filter((id) => Number.isInteger(id))
        .sort((a, b) => a - b);
      const records: BenchRecord[] = [];
      for (const id of ids) {
        // A key can expire or be deleted between the scan and the read.
        const record = fromHash(await r.hGetAll(recordKey(id)));
        if (record) records.push(record);
      }
      return records;
    },
    async update(id, patch) {
      const r = redis();
      const key = recordKey(id);
      if (!(await r.exists(key))) return false;
      const entries = patchEntries(patch);
      if (entries.length) await r.hSet(key, Object.fromEntries(entries));
      return true;
    },
    async delete(id) {
      return (await redis().del(recordKey(id))) > 0;
    },
    async close() {
      const c = client;
      client = undefined;
      if (c?.isOpen) await c.quit();
    },
  };
}
