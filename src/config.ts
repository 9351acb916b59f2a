/**
 * Gateway configuration: CLI flags over environment variables over defaults.
 */

import { z } from "zod";
import { LOG_LEVELS, parseLogLevel, type LogLevel } from "./logging.js";

export interface GatewayConfig {
  port: number;
  /** Path to the provider registry JSON file */
  registryPath: string;
  /** SQLite database path; undefined keeps sessions in memory only */
  databasePath?: string;
  logLevel: LogLevel;
  backendTimeoutMs: number;
  /** How long a tools/list result is reused; 0 disables the cache */
  toolsCacheTtlMs: number;
  retry: {
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
  };
}

export const DEFAULT_CONFIG = {
  port: 8080,
  registryPath: "registry.json",
  logLevel: "info",
  backendTimeoutMs: 10_000,
  toolsCacheTtlMs: 600_000,
  retry: {
    maxAttempts: 3,
    baseDelayMs: 500,
    maxDelayMs: 8000,
  },
} satisfies GatewayConfig;

const LogLevelSchema = z.string().transform((value, ctx) => {
  const level = parseLogLevel(value);
  if (level === undefined) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Expected one of ${LOG_LEVELS.join(", ")}, received '${value}'`,
    });
    return z.NEVER;
  }
  return level;
});

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).optional(),
  REGISTRY_PATH: z.string().min(1).optional(),
  DATABASE_PATH: z.string().min(1).optional(),
  LOG_LEVEL: LogLevelSchema.optional(),
  BACKEND_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  TOOLS_CACHE_TTL_MS: z.coerce.number().int().min(0).optional(),
  RETRY_MAX_ATTEMPTS: z.coerce.number().int().positive().optional(),
  RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).optional(),
  RETRY_MAX_DELAY_MS: z.coerce.number().int().min(0).optional(),
});

interface CliArgs {
  port?: string;
  registry?: string;
  db?: string;
  logLevel?: string;
}

const FLAGS = new Map<string, keyof CliArgs>([
  ["--port", "port"],
  ["--registry", "registry"],
  ["--db", "db"],
  ["--log-level", "logLevel"],
]);

/**
 * Parse `--flag value` and `--flag=value` pairs. Unknown arguments are an error.
 */
export function parseArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;

    const eq = arg.indexOf("=");
    const flag = eq === -1 ? arg : arg.slice(0, eq);
    const key = FLAGS.get(flag);
    if (key === undefined) {
      throw new Error(`Unknown argument: ${arg}`);
    }

    if (eq !== -1) {
      args[key] = arg.slice(eq + 1);
    } else {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith("--")) {
        throw new Error(`Missing value for ${flag}`);
      }
      args[key] = value;
      i++;
    }
  }

  return args;
}

/**
 * Resolve the gateway configuration.
 *
 * @throws Error naming the offending variable or flag
 */
export function loadGatewayConfig(
  argv: readonly string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env
): GatewayConfig {
  const cli = parseArgs(argv);

  const envResult = EnvSchema.safeParse(env);
  if (!envResult.success) {
    const issue = envResult.error.issues[0];
    throw new Error(
      `Invalid environment variable ${issue ? issue.path.join(".") : ""}: ${issue?.message ?? "unknown error"}`
    );
  }
  const fromEnv = envResult.data;

  const overrides = EnvSchema.pick({ PORT: true, LOG_LEVEL: true }).safeParse({
    PORT: cli.port,
    LOG_LEVEL: cli.logLevel,
  });
  if (!overrides.success) {
    const issue = overrides.error.issues[0];
    const flag = issue?.path[0] === "PORT" ? "--port" : "--log-level";
    throw new Error(`Invalid value for ${flag}: ${issue?.message ?? "unknown error"}`);
  }

  const retry = {
    maxAttempts: fromEnv.RETRY_MAX_ATTEMPTS ?? DEFAULT_CONFIG.retry.maxAttempts,
    baseDelayMs: fromEnv.RETRY_BASE_DELAY_MS ?? DEFAULT_CONFIG.retry.baseDelayMs,
    maxDelayMs: fromEnv.RETRY_MAX_DELAY_MS ?? DEFAULT_CONFIG.retry.maxDelayMs,
  };
  if (retry.maxDelayMs < retry.baseDelayMs) {
    throw new Error(
      `RETRY_MAX_DELAY_MS (${String(retry.maxDelayMs)}) must not be below RETRY_BASE_DELAY_MS (${String(retry.baseDelayMs)})`
    );
  }

  return {
    port: overrides.data.PORT ?? fromEnv.PORT ?? DEFAULT_CONFIG.port,
    registryPath: cli.registry ?? fromEnv.REGISTRY_PATH ?? DEFAULT_CONFIG.registryPath,
    databasePath: cli.db ?? fromEnv.DATABASE_PATH,
    logLevel: overrides.data.LOG_LEVEL ?? fromEnv.LOG_LEVEL ?? DEFAULT_CONFIG.logLevel,
    backendTimeoutMs: fromEnv.BACKEND_TIMEOUT_MS ?? DEFAULT_CONFIG.backendTimeoutMs,
    toolsCacheTtlMs: fromEnv.TOOLS_CACHE_TTL_MS ?? DEFAULT_CONFIG.toolsCacheTtlMs,
    retry,
  };
}
