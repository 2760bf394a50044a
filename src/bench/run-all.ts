import { config as loadDotenv } from "dotenv";
import { loadConfig } from "./config.ts";
import { runBenchmark } from "./core.ts";
import { formatPhaseTable } from "./report.ts";
import { BACKEND_IDS, type BenchResult } from "./types.ts";
import { parseArgs } from "./util.ts";

async function main() {
  loadDotenv();
  const argv = process.argv.slice(2);
  const backends = (parseArgs(argv).get("backends") ?? BACKEND_IDS.join(","))
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);

  const results: BenchResult[] = [];
  let failed = 0;
  for (const backend of backends) {
    try {
      // the trailing flag wins over any --backend passed on the command line
      const config = loadConfig([...argv, `--backend=${backend}`], process.env);
      const r = await runBenchmark(config);
      results.push(r);
      console.log(`[ok] ${backend} (${r.mode}) -> ${r.reportPath}`);
    } catch (e) {
      failed++;
      console.error(`[fail] ${backend}:`, e instanceof Error ? e.message : String(e));
    }
  }

  console.log(formatPhaseTable(results));
  if (failed) process.exitCode = 1;
}

main().catch((e: unknown) => {
  console.error(e);
  process.exitCode = 1;
});
