import fs from "node:fs";
import path from "node:path";
import { PHASES, type BenchResult, type OperationSummary, type Phase, type RunReportRow } from "./types.ts";
import { ensureDir, formatMarkdownTable } from "./util.ts";

const STATS = ["mean", "median", "min", "max"] as const;

export const REPORT_HEADER = [
  "timestamp",
  "backend",
  "run_mode",
  "dataset_size",
  "repeats",
  ...PHASES.flatMap((p) => STATS.map((s) => `${p}_${s}_ms`)),
];

/** `<YYYY-MM-DD>_<backend>_<mode>_<size>.csv`, dated in UTC from the row timestamp. */
export function reportFileName(row: RunReportRow): string {
  const date = row.timestamp.slice(0, 10);
  return `${date}_${row.backend}_${row.mode}_${row.rows}.csv`;
}

function csvField(v: string): string {
  return /[",\n]/.test(v) ? `"${v.replace(/"/g, '""')}"` : v;
}

export function formatReportLine(row: RunReportRow): string {
  const cells = [
    row.timestamp,
    row.backend,
    row.mode,
    String(row.rows),
    String(row.repeats),
    ...PHASES.flatMap((p) => STATS.map((s) => row.phases[p][s].toFixed(6))),
  ];
  return cells.map(csvField).join(",");
}

/**
 * Appends one row to the run's CSV file, writing the header when the file is
 * new. Same-day reruns with the same parameters add rows; nothing is overwritten.
 */
export async function writeReport(row: RunReportRow, dir: string): Promise<string> {
  await ensureDir(dir);
  const file = path.join(dir, reportFileName(row));
  const isNew = !fs.existsSync(file);
  const body = (isNew ? REPORT_HEADER.join(",") + "\n" : "") + formatReportLine(row) + "\n";
  await fs.promises.appendFile(file, body, "utf8");
  return file;
}

export async function writeLatestJson(result: BenchResult, dir: string): Promise<string> {
  await ensureDir(dir);
  const file = path.join(dir, "latest.json");
  await fs.promises.writeFile(file, JSON.stringify(result, null, 2));
  return file;
}

export function formatSummaryBlock(
  backend: string,
  phase: Phase | "read-all",
  rows: number,
  mode: string,
  s: OperationSummary,
): string {
  return [
    `${backend} ${phase.toUpperCase()} (${mode})`,
    `  runs=${s.count}  records=${rows}`,
    `  mean=${s.mean.toFixed(3)}ms  median=${s.median.toFixed(3)}ms`,
    `  min=${s.min.toFixed(3)}ms  max=${s.max.toFixed(3)}ms`,
  ].join("\n");
}

export function formatPhaseTable(results: readonly RunReportRow[]): string {
  const rows = results.flatMap((r) =>
    PHASES.map((p) => ({
      backend: r.backend,
      mode: r.mode,
      rows: r.rows,
      phase: p,
      runs: r.phases[p].count,
      "mean ms": r.phases[p].mean.toFixed(3),
      "median ms": r.phases[p].median.toFixed(3),
      "min ms": r.phases[p].min.toFixed(3),
      "max ms": r.phases[p].max.toFixed(3),
    })),
  );
  return rows.length ? formatMarkdownTable(rows) : "No results.";
}
