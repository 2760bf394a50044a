import type { BenchConfig } from "../config.ts";
import type { BackendAdapter, Logger } from "../types.ts";
import { mongodbAdapter } from "./mongodb.ts";
import { mysqlAdapter } from "./mysql.ts";
import { redisAdapter } from "./redis.ts";
import { sqliteAdapter } from "./sqlite.ts";

export function createAdapter(config: BenchConfig, log: Logger = console): BackendAdapter {
  switch (config.backend) {
    case "sqlite":
      return sqliteAdapter(config.sqlite, log);
    case "mysql":
      return mysqlAdapter(config.mysql, log);
    case "mongodb":
      return mongodbAdapter(config.mongodb, log);
    case "redis":
      return redisAdapter(config.redis, log);
    default: {
      const unknown: never = config;
      throw new Error(`unknown backend: ${JSON.stringify(unknown)}`);
    }
  }
}
