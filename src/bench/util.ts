import os from "node:os";
import fs from "node:fs";
import path from "node:path";
import { createRequire } from "node:module";

export function envInfo() {
  const cpus = os.cpus();
  const cpu = cpus && cpus.length ? `${cpus[0].model} x${cpus.length}` : "unknown";
  const platform = `${os.platform()} ${os.release()} (${os.arch()})`;
  return {
    node: process.version,
    os: platform,
    cpu,
  };
}

export function ensureDir(p: string) {
  return fs.promises.mkdir(p, { recursive: true });
}

export function formatMarkdownTable(rows: Array<Record<string, string | number>>): string {
  if (!rows.length) return "";
  const headers = Object.keys(rows[0]);
  const lines: string[] = [];
  lines.push(`| ${headers.join(" | ")} |`);
  lines.push(`| ${headers.map(() => "-").join(" | ")} |`);
  for (const r of rows) {
    lines.push(`| ${headers.map((h) => String(r[h] ?? "")).join(" | ")} |`);
  }
  return lines.join("\n");
}

export function parseArgs(argv: readonly string[]): Map<string, string> {
  const args = new Map<string, string>();
  for (const a of argv) {
    const [k, v] = a.includes("=") ? a.split("=", 2) : [a, "true"];
    args.set(k.replace(/^--/, ""), v);
  }
  return args;
}

const reqFromCwd = createRequire(process.cwd() + "/package.json");

function readVersion(pkgPath: string): string | undefined {
  const json: unknown = JSON.parse(fs.readFileSync(pkgPath, "utf8"));
  if (json && typeof json === "object" && "version" in json && typeof json.version === "string") {
    return json.version;
  }
  return undefined;
}

export function resolvePackageVersion(pkgId: string): string | undefined {
  let entry: string;
  try {
    entry = reqFromCwd.resolve(pkgId);
  } catch {
    // not installed beside the working directory
    return undefined;
  }
  let dir = path.dirname(entry);
  // Walk up a few levels to find the package.json owning this entry
  for (let i = 0; i < 6; i++) {
    const pkgPath = path.join(dir, "package.json");
    if (fs.existsSync(pkgPath)) {
      const version = readVersion(pkgPath);
      if (version) return version;
    }
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return undefined;
}
