import { config as loadDotenv } from "dotenv";
import { loadConfig } from "./config.ts";
import { runBenchmark } from "./core.ts";
import { BenchError } from "./errors.ts";
import { formatPhaseTable } from "./report.ts";

async function main() {
  loadDotenv();
  const config = loadConfig(process.argv.slice(2), process.env);
  console.log(`[run] ${config.backend} (${config.mode}) rows=${config.rows} repeats=${config.repeats}`);
  const result = await runBenchmark(config);
  console.log(formatPhaseTable([result]));
  console.log(`[ok] ${result.backend} (${result.mode}) -> ${result.reportPath}`);
}

main().catch((e: unknown) => {
  if (e instanceof BenchError) console.error(`[fail] ${e.name}: ${e.message}`);
  else console.error(e);
  process.exitCode = 1;
});
