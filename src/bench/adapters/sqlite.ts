import fs from "node:fs";
import path from "node:path";
import { createClient, type Client, type InValue, type Row } from "@libsql/client";
import type { SqliteConfig } from "../config.ts";
import { ConnectionError } from "../errors.ts";
import type { BackendAdapter, BenchRecord, Logger, RecordPatch } from "../types.ts";
import { resolvePackageVersion } from "../util.ts";
import { SELECT_COLUMNS, TABLE, patchEntries, releaseAfterFailure, updateSql } from "./shared.ts";

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS ${TABLE} (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    seq INTEGER NOT NULL,
    name TEXT NOT NULL,
    price REAL NOT NULL,
    quantity INTEGER NOT NULL
  )
`;

const INSERT = `INSERT INTO ${TABLE} (seq, name, price, quantity) VALUES (?, ?, ?, ?)`;
const SELECT_BY_ID = `SELECT ${SELECT_COLUMNS} FROM ${TABLE} WHERE id = ?`;
const SELECT_ALL = `SELECT ${SELECT_COLUMNS} FROM ${TABLE} ORDER BY id`;
const DELETE_BY_ID = `DELETE FROM ${TABLE} WHERE id = ?`;

// sqlite_sequence holds the AUTOINCREMENT counter; clearing it restarts ids at 1.
const RESET = `
  DELETE FROM ${TABLE};
  DELETE FROM sqlite_sequence WHERE name = '${TABLE}'
`;

/** `:memory:` and `file:` URLs pass through; plain paths get the `file:` scheme. */
export function sqliteUrl(dbPath: string): string {
  if (dbPath === ":memory:" || dbPath.startsWith("file:")) return dbPath;
  return `file:${dbPath}`;
}

function toRecord(row: Row): BenchRecord {
  return {
    seq: Number(row.seq),
    name: String(row.name),
    price: Number(row.price),
    quantity: Number(row.quantity),
  };
}

/** Embedded relational backend. Records are addressed by the AUTOINCREMENT rowid. */
export function sqliteAdapter(config: SqliteConfig, log: Logger = console): BackendAdapter {
  let client: Client | undefined;

  const db = () => {
    if (!client) throw new Error("sqlite: not connected");
    return client;
  };

  // The client takes one statement per call.
  const exec = async (c: Client, sql: string) => {
    const stmts = sql
      .split(";")
      .map((s) => s.trim())
      .filter(Boolean);
    for (const s of stmts) await c.execute(s);
  };

  const read = async (id: number) => {
    const res = await db().execute({ sql: SELECT_BY_ID, args: [id] });
    const row = res.rows[0];
    return row ? toRecord(row) : null;
  };

  return {
    id: "sqlite",
    getPackageVersion() {
      return resolvePackageVersion("@libsql/client");
    },
    async getEngineVersion() {
      const res = await db().execute("select sqlite_version() as v");
      const v = res.rows[0]?.v;
      return v === undefined || v === null ? undefined : String(v);
    },
    async connect() {
      let c: Client | undefined;
      try {
        const local = config.path.replace(/^file:/, "");
        if (local !== ":memory:") fs.mkdirSync(path.dirname(path.resolve(local)), { recursive: true });
        c = createClient({ url: sqliteUrl(config.path) });
        await exec(c, SCHEMA);
        client = c;
      } catch (e) {
        const opened = c;
        if (opened) await releaseAfterFailure("sqlite", () => opened.close(), log);
        throw new ConnectionError("sqlite", e);
      }
    },
    async reset() {
      await exec(db(), RESET);
    },
    async create(record) {
      const args: InValue[] = [record.seq, record.name, record.price, record.quantity];
      const res = await db().execute({ sql: INSERT, args });
      if (res.lastInsertRowid === undefined) throw new Error("sqlite: insert returned no rowid");
      return Number(res.lastInsertRowid);
    },
    read,
    async readAll() {
      const res = await db().execute(SELECT_ALL);
      return res.rows.map(toRecord);
    },
    async update(id, patch: RecordPatch) {
      const entries = patchEntries(patch);
      if (!entries.length) return (await read(id)) !== null;
      const res = await db().execute({
        sql: updateSql(entries.map(([col]) => col)),
        args: [...entries.map(([, v]) => v), id],
      });
      return res.rowsAffected > 0;
    },
    async delete(id) {
      const res = await db().execute({ sql: DELETE_BY_ID, args: [id] });
      return res.rowsAffected > 0;
    },
    async close() {
      const c = client;
      client = undefined;
      c?.close();
    },
  };
}
