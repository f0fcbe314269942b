import { z } from "zod";

const flag = z
  .enum(["1", "0", "true", "false", "yes", "no"])
  .transform((v) => v === "1" || v === "true" || v === "yes");

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  HOST: z.string().min(1).default("0.0.0.0"),
  DATA_DIR: z.string().min(1).default("data"),
  BACKUP_RETENTION: z.coerce.number().int().min(1).default(5),
  AUTOSAVE: flag.default("true"),
  LOG_LEVEL: z.enum(["silent", "fatal", "error", "warn", "info", "debug", "trace", "verbose"]).default("info"),
  SEARCH_DEFAULT_LIMIT: z.coerce.number().int().min(1).default(10),
  SEARCH_MAX_LIMIT: z.coerce.number().int().min(1).default(100),
});

export interface AppConfig {
  port: number;
  host: string;
  dataDir: string;
  backupRetention: number;
  /** save a snapshot after every add/remove */
  autosave: boolean;
  logLevel: z.infer<typeof EnvSchema>["LOG_LEVEL"];
  search: {
    defaultLimit: number;
    maxLimit: number;
  };
}

export class ConfigError extends Error {
  name = "ConfigError" as const;

  constructor(public readonly issues: string[]) {
    super(`invalid configuration: ${issues.join("; ")}`);
  }
}

/** Reads configuration from environment variables. Throws ConfigError on bad values. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`));
  }

  const e = parsed.data;
  if (e.SEARCH_DEFAULT_LIMIT > e.SEARCH_MAX_LIMIT) {
    throw new ConfigError(["SEARCH_DEFAULT_LIMIT: must not exceed SEARCH_MAX_LIMIT"]);
  }

  return {
    port: e.PORT,
    host: e.HOST,
    dataDir: e.DATA_DIR,
    backupRetention: e.BACKUP_RETENTION,
    autosave: e.AUTOSAVE,
    logLevel: e.LOG_LEVEL,
    search: {
      defaultLimit: e.SEARCH_DEFAULT_LIMIT,
      maxLimit: e.SEARCH_MAX_LIMIT,
    },
  };
}
