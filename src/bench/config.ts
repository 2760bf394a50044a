import { z } from "zod";
import { ConfigurationError } from "./errors.ts";
import { BACKEND_IDS } from "./types.ts";
import { parseArgs } from "./util.ts";

export const SqliteConfigSchema = z.object({
  path: z.string().min(1),
});

export const MysqlConfigSchema = z.object({
  host: z.string({ required_error: "MYSQL_HOST is required" }).min(1, "MYSQL_HOST is required"),
  port: z.coerce.number().int().positive().default(3306),
  user: z.string({ required_error: "MYSQL_USER is required" }).min(1, "MYSQL_USER is required"),
  password: z.string().default(""),
  database: z
    .string({ required_error: "MYSQL_DATABASE is required" })
    .min(1, "MYSQL_DATABASE is required"),
});

export const MongoConfigSchema = z.object({
  uri: z.string().min(1).default("mongodb://localhost:27017"),
  database: z.string().min(1).default("benchmark"),
});

export const RedisConfigSchema = z.object({
  host: z.string().min(1).default("localhost"),
  port: z.coerce.number().int().positive().default(6379),
  db: z.coerce.number().int().nonnegative().default(0),
});

const CommonSchema = z.object({
  mode: z.enum(["cold", "warm"]).default("cold"),
  // Numeric bounds are checked by the runner so they surface as
  // InvalidSizeError / InvalidRepeatCountError rather than here.
  repeats: z.coerce.number().default(5),
  rows: z.coerce.number().default(100),
  outDir: z.string().min(1).default("results"),
});

export const BenchConfigSchema = z.discriminatedUnion("backend", [
  CommonSchema.extend({ backend: z.literal("sqlite"), sqlite: SqliteConfigSchema }),
  CommonSchema.extend({ backend: z.literal("mysql"), mysql: MysqlConfigSchema }),
  CommonSchema.extend({ backend: z.literal("mongodb"), mongodb: MongoConfigSchema }),
  CommonSchema.extend({ backend: z.literal("redis"), redis: RedisConfigSchema }),
]);

export type BenchConfig = z.infer<typeof BenchConfigSchema>;
export type SqliteConfig = z.infer<typeof SqliteConfigSchema>;
export type MysqlConfig = z.infer<typeof MysqlConfigSchema>;
export type MongoConfig = z.infer<typeof MongoConfigSchema>;
export type RedisConfig = z.infer<typeof RedisConfigSchema>;

export type Env = Record<string, string | undefined>;

function blankToUndefined(v: string | undefined): string | undefined {
  return v === undefined || v.trim() === "" ? undefined : v;
}

/**
 * Assembles the run configuration once at start-up. `--key=value` flags win
 * over environment variables; only the selected backend's settings are read.
 */
export function loadConfig(argv: readonly string[], env: Env): BenchConfig {
  const args = parseArgs(argv);
  const pick = (flag: string | null, name: string) =>
    blankToUndefined((flag ? args.get(flag) : undefined) ?? env[name]);

  const backend = pick("backend", "DB_TYPE") ?? "sqlite";
  const raw = {
    backend,
    mode: pick("mode", "RUN_MODE"),
    repeats: pick("repeats", "REPEATS"),
    rows: pick("rows", "DATASET_SIZE"),
    outDir: pick("outDir", "RESULTS_DIR"),
    sqlite: { path: pick("sqlitePath", "SQLITE_PATH") ?? "tmp/benchmark.db" },
    mysql: {
      host: pick(null, "MYSQL_HOST"),
      port: pick(null, "MYSQL_PORT"),
      user: pick(null, "MYSQL_USER"),
      password: env.MYSQL_PASSWORD,
      database: pick(null, "MYSQL_DATABASE"),
    },
    mongodb: { uri: pick(null, "MONGO_URI"), database: pick(null, "MONGO_DATABASE") },
    redis: {
      host: pick(null, "REDIS_HOST"),
      port: pick(null, "REDIS_PORT"),
      db: pick(null, "REDIS_DB"),
    },
  };

  const result = BenchConfigSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((e) => (e.path.length ? `${e.path.join(".")}: ${e.message}` : e.message))
      .join("; ");
    throw new ConfigurationError(
      `Invalid configuration for backend "${backend}" (expected one of ${BACKEND_IDS.join(", ")}): ${details}`,
      result.error,
    );
  }
  return result.data;
}
