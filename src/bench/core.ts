import { createAdapter } from "./adapters/index.ts";
import type { BenchConfig } from "./config.ts";
import { generateDataset } from "./dataset.ts";
import { InvalidRepeatCountError, InvalidSizeError, NotFoundError } from "./errors.ts";
import { measure } from "./harness.ts";
import { formatSummaryBlock, writeLatestJson, writeReport } from "./report.ts";
import {
  PHASES,
  type BackendAdapter,
  type BenchRecord,
  type BenchResult,
  type Logger,
  type OperationSummary,
  type Phase,
  type RecordId,
  type RecordPatch,
  type RunReportRow,
} from "./types.ts";
import { envInfo } from "./util.ts";

export type RunOptions = {
  log?: Logger;
  clock?: () => number;
  now?: () => Date;
  adapterFactory?: (config: BenchConfig) => BackendAdapter;
};

export function updatePatch(record: BenchRecord): RecordPatch {
  return { name: `${record.name} (updated)`, quantity: record.quantity + 1 };
}

export type PhaseTimings = {
  phases: Record<Phase, OperationSummary>;
  readAll: OperationSummary;
};

/**
 * Times create, read, update and delete over the whole dataset, in that order.
 * Each phase yields `repeats` samples, one per pass over every record. Between
 * create passes the records are deleted again, and between delete passes they
 * are re-created; neither is timed. A full-namespace read is timed after the
 * read phase, while every record still exists.
 */
export async function runPhases(
  adapter: BackendAdapter,
  records: readonly BenchRecord[],
  repeats: number,
  options: Pick<RunOptions, "log" | "clock"> = {},
): Promise<PhaseTimings> {
  const log = options.log ?? console;
  let ids: RecordId[] = [];

  const createAll = async () => {
    const next: RecordId[] = [];
    for (const r of records) next.push(await adapter.create(r));
    ids = next;
  };
  const deleteAll = async (phase: Phase) => {
    for (const id of ids) {
      if (!(await adapter.delete(id))) throw new NotFoundError(adapter.id, phase, id);
    }
  };
  const patches = records.map(updatePatch);

  const work: Record<Phase | "read-all", () => Promise<void>> = {
    create: createAll,
    read: async () => {
      for (const id of ids) {
        if (!(await adapter.read(id))) throw new NotFoundError(adapter.id, "read", id);
      }
    },
    // Warm runs may find older records beside this run's, so only a shortfall fails.
    "read-all": async () => {
      const all = await adapter.readAll();
      if (all.length < ids.length) {
        throw new Error(`${adapter.id}: read-all returned ${all.length} of ${ids.length} records`);
      }
    },
    update: async () => {
      for (let i = 0; i < ids.length; i++) {
        if (!(await adapter.update(ids[i], patches[i]))) throw new NotFoundError(adapter.id, "update", ids[i]);
      }
    },
    delete: () => deleteAll("delete"),
  };

  const timePhase = async (phase: Phase | "read-all"): Promise<OperationSummary> => {
    const { summary } = await measure(work[phase], repeats, {
      clock: options.clock,
      beforeEach: phase === "delete" ? (i) => (i > 0 ? createAll() : undefined) : undefined,
      afterEach: phase === "create" ? (i) => (i < repeats - 1 ? deleteAll("create") : undefined) : undefined,
      onError: (e, i) => {
        const msg = e instanceof Error ? e.message : String(e);
        log.error(`[fail] ${adapter.id} ${phase} (repetition ${i + 1}/${repeats}): ${msg}`);
      },
    });
    return summary;
  };

  // Fixed order: later phases address the records created first.
  const create = await timePhase("create");
  const read = await timePhase("read");
  const readAll = await timePhase("read-all");
  const update = await timePhase("update");
  const del = await timePhase("delete");
  return { phases: { create, read, update, delete: del }, readAll };
}

/**
 * One full benchmark cycle against the configured backend. The adapter is
 * closed on every exit path once it has been created; when the run already
 * failed, a close failure is logged and the run's own error propagates.
 */
export async function runBenchmark(config: BenchConfig, options: RunOptions = {}): Promise<BenchResult> {
  const log = options.log ?? console;
  if (!Number.isInteger(config.rows) || config.rows <= 0) throw new InvalidSizeError(config.rows);
  if (!Number.isInteger(config.repeats) || config.repeats <= 0) throw new InvalidRepeatCountError(config.repeats);

  const adapter = (options.adapterFactory ?? ((c: BenchConfig) => createAdapter(c, log)))(config);
  const started = (options.now ?? (() => new Date()))();
  let failed = false;
  try {
    await adapter.connect();
    if (config.mode === "cold") await adapter.reset();
    const records = generateDataset(config.rows);
    const { phases, readAll } = await runPhases(adapter, records, config.repeats, { log, clock: options.clock });

    const engineVersion = await adapter.getEngineVersion().catch((e: unknown) => {
      log.warn(`[warn] ${adapter.id}: engine version unavailable: ${e instanceof Error ? e.message : String(e)}`);
      return undefined;
    });
    const row: RunReportRow = {
      backend: adapter.id,
      mode: config.mode,
      rows: config.rows,
      repeats: config.repeats,
      timestamp: started.toISOString(),
      phases,
    };
    const reportPath = await writeReport(row, config.outDir);
    const result: BenchResult = {
      ...row,
      supplementary: { readAll },
      packageVersion: adapter.getPackageVersion(),
      engineVersion,
      environment: envInfo(),
      reportPath,
    };
    await writeLatestJson(result, config.outDir);

    for (const phase of PHASES) {
      log.log(formatSummaryBlock(row.backend, phase, row.rows, row.mode, phases[phase]));
    }
    log.log(formatSummaryBlock(row.backend, "read-all", row.rows, row.mode, readAll));
    return result;
  } catch (e) {
    failed = true;
    throw e;
  } finally {
    try {
      await adapter.close();
    } catch (e) {
      if (!failed) throw e;
      log.error(`[fail] ${adapter.id} close: ${e instanceof Error ? e.message : String(e)}`);
    }
  }
}
