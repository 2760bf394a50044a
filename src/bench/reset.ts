import { config as loadDotenv } from "dotenv";
import { createAdapter } from "./adapters/index.ts";
import { loadConfig } from "./config.ts";
import { BenchError } from "./errors.ts";

async function main() {
  loadDotenv();
  const config = loadConfig(process.argv.slice(2), process.env);
  const adapter = createAdapter(config);
  try {
    await adapter.connect();
    await adapter.reset();
  } finally {
    await adapter.close();
  }
  console.log(`Reset ${config.backend} benchmark data`);
}

main().catch((e: unknown) => {
  if (e instanceof BenchError) console.error(`[fail] ${e.name}: ${e.message}`);
  else console.error(e);
  process.exitCode = 1;
});
