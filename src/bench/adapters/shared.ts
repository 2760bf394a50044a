import type { BackendId, Logger, RecordPatch } from "../types.ts";

// Table and collection name of the benchmark namespace.
export const TABLE = "bench_records";

export const SELECT_COLUMNS = "seq, name, price, quantity";

const PATCHABLE = ["name", "price", "quantity"] as const;
export type PatchColumn = (typeof PATCHABLE)[number];

// Column names come from this fixed list, never from the patch keys themselves.
export function patchEntries(patch: RecordPatch): Array<[PatchColumn, string | number]> {
  const entries: Array<[PatchColumn, string | number]> = [];
  for (const col of PATCHABLE) {
    const v = patch[col];
    if (v !== undefined) entries.push([col, v]);
  }
  return entries;
}

const updateStatements = new Map<string, string>();

/** UPDATE text for a set of patch columns, built once per column set. */
export function updateSql(columns: readonly PatchColumn[]): string {
  const key = columns.join(",");
  let sql = updateStatements.get(key);
  if (sql === undefined) {
    sql = `UPDATE ${TABLE} SET ${columns.map((c) => `${c} = ?`).join(", ")} WHERE id = ?`;
    updateStatements.set(key, sql);
  }
  return sql;
}

/**
 * Releases a half-opened client after a failed connect. A failure here is
 * logged so the connect error stays the one the caller sees.
 */
export async function releaseAfterFailure(
  backend: BackendId,
  release: () => Promise<unknown> | unknown,
  log: Logger,
): Promise<void> {
  try {
    await release();
  } catch (e) {
    log.warn(`[warn] ${backend}: release after failed connect: ${e instanceof Error ? e.message : String(e)}`);
  }
}
