import {
  createConnection,
  type Connection,
  type ResultSetHeader,
  type RowDataPacket,
} from "mysql2/promise";
import type { MysqlConfig } from "../config.ts";
import { ConnectionError } from "../errors.ts";
import type { BackendAdapter, BenchRecord, Logger } from "../types.ts";
import { resolvePackageVersion } from "../util.ts";
import { SELECT_COLUMNS, TABLE, patchEntries, releaseAfterFailure, updateSql } from "./shared.ts";

interface RecordRow extends RowDataPacket, BenchRecord {}

interface VersionRow extends RowDataPacket {
  v: string;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS ${TABLE} (
    id INT AUTO_INCREMENT PRIMARY KEY,
    seq INT NOT NULL,
    name VARCHAR(255) NOT NULL,
    price DOUBLE NOT NULL,
    quantity INT NOT NULL
  )
`;

function toRecord(row: RecordRow): BenchRecord {
  return { seq: row.seq, name: row.name, price: row.price, quantity: row.quantity };
}

/** Server relational backend. Records are addressed by the AUTO_INCREMENT id. */
export function mysqlAdapter(config: MysqlConfig, log: Logger = console): BackendAdapter {
  let conn: Connection | undefined;

  const client = () => {
    if (!conn) throw new Error("mysql: not connected");
    return conn;
  };

  return {
    id: "mysql",
    getPackageVersion() {
      return resolvePackageVersion("mysql2");
    },
    async getEngineVersion() {
      const [rows] = await client().query<VersionRow[]>("SELECT VERSION() AS v");
      return rows[0]?.v;
    },
    async connect() {
      let opened: Connection | undefined;
      try {
        opened = await createConnection({
          host: config.host,
          port: config.port,
          user: config.user,
          password: config.password,
          database: config.database,
        });
        await opened.query(SCHEMA);
        conn = opened;
      } catch (e) {
        const c = opened;
        if (c) await releaseAfterFailure("mysql", () => c.end(), log);
        throw new ConnectionError("mysql", e);
      }
    },
    async reset() {
      // TRUNCATE also restarts AUTO_INCREMENT at 1.
      await client().query(`TRUNCATE TABLE ${TABLE}`);
    },
    async create(record) {
      const [res] = await client().execute<ResultSetHeader>(
        `INSERT INTO ${TABLE} (seq, name, price, quantity) VALUES (?, ?, ?, ?)`,
        [record.seq, record.name, record.price, record.quantity],
      );
      return res.insertId;
    },
    async read(id) {
      const [rows] = await client().execute<RecordRow[]>(
        `SELECT ${SELECT_COLUMNS} FROM ${TABLE} WHERE id = ?`,
        [id],
      );
      const row = rows[0];
      return row ? toRecord(row) : null;
    },
    async readAll() {
      const [rows] = await client().query<RecordRow[]>(`SELECT ${SELECT_COLUMNS} FROM ${TABLE} ORDER BY id`);
      return rows.map(toRecord);
    },
    async update(id, patch) {
      const entries = patchEntries(patch);
      if (!entries.length) return (await this.read(id)) !== null;
      // mysql2 connects with FOUND_ROWS, so affectedRows counts matched rows.
      const [res] = await client().execute<ResultSetHeader>(
        updateSql(entries.map(([col]) => col)),
        [...entries.map(([, v]) => v), id],
      );
      return res.affectedRows > 0;
    },
    async delete(id) {
      const [res] = await client().execute<ResultSetHeader>(`DELETE FROM ${TABLE} WHERE id = ?`, [id]);
      return res.affectedRows > 0;
    },
    async close() {
      const c = conn;
      conn = undefined;
      await c?.end();
    },
  };
}
