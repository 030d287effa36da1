import { z } from "zod";
import { printConfigError } from "../../shared/cli.js";

const booleanFlag = z
  .enum(["true", "false"])
  .transform((v) => v === "true");

/**
 * Application config: validated at boot via Zod.
 * Fails fast with clear messages if env vars are missing or malformed.
 */
const configSchema = z
  .object({
    env: z.enum(["development", "production", "test"]).default("development"),
    port: z.coerce.number().int().min(1).max(65535).default(3000),
    host: z.string().min(1).default("0.0.0.0"),

    log: z.object({
      level: z.enum(["debug", "info", "warn", "error", "fatal"]).default("info"),
      format: z.enum(["pretty", "json"]).default("pretty"),
    }),

    session: z.object({
      cookieName: z
        .string()
        .regex(/^[A-Za-z0-9_-]+$/, "must be a valid cookie name")
        .default("sid"),
      ttlMs: z.coerce.number().int().positive().default(1_209_600_000), // 14 days
      secureCookie: booleanFlag.default("false"),
      pruneIntervalMs: z.coerce.number().int().positive().default(3_600_000),
    }),

    store: z.object({
      driver: z.enum(["memory", "sqlite", "mssql"]).default("sqlite"),
      path: z.string().default("data/fragments.sqlite"),
      url: z.string().min(1).optional(),
    }),

    urls: z.object({
      login: z.string().startsWith("/").default("/accounts/login/"),
      tenantCreate: z.string().startsWith("/").default("/teams/new"),
    }),

    /** Fixed caller identity for local development without a login service */
    devUserId: z.string().min(1).optional(),
  })
  .superRefine((cfg, ctx) => {
    if (cfg.store.driver === "mssql" && cfg.store.url === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["store", "url"],
        message: "DATABASE_URL is required when STORE_DRIVER=mssql",
      });
    }
    if (cfg.env === "production" && cfg.devUserId !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["devUserId"],
        message: "DEV_USER_ID must not be set in production",
      });
    }
  });

export type AppConfig = z.infer<typeof configSchema>;

export type ConfigParseResult =
  | { readonly ok: true; readonly config: AppConfig }
  | { readonly ok: false; readonly errors: Record<string, string[]> };

/**
 * Parse a config from an environment map without side effects.
 */
export const parseConfig = (env: NodeJS.ProcessEnv): ConfigParseResult => {
  const result = configSchema.safeParse({
    env: env["NODE_ENV"],
    port: env["PORT"],
    host: env["HOST"],
    log: {
      level: env["LOG_LEVEL"],
      format: env["LOG_FORMAT"],
    },
    session: {
      cookieName: env["SESSION_COOKIE_NAME"],
      ttlMs: env["SESSION_TTL_MS"],
      secureCookie: env["SESSION_SECURE_COOKIE"],
      pruneIntervalMs: env["SESSION_PRUNE_INTERVAL_MS"],
    },
    store: {
      driver: env["STORE_DRIVER"],
      path: env["DATABASE_PATH"],
      url: env["DATABASE_URL"],
    },
    urls: {
      login: env["LOGIN_URL"],
      tenantCreate: env["TENANT_CREATE_URL"],
    },
    devUserId: env["DEV_USER_ID"],
  });

  if (!result.success) {
    const errors: Record<string, string[]> = {};
    for (const issue of result.error.issues) {
      const field = issue.path.length > 0 ? issue.path.join(".") : "config";
      (errors[field] ??= []).push(issue.message);
    }
    return { ok: false, errors };
  }

  return { ok: true, config: result.data };
};

export const loadConfig = (): AppConfig => {
  const result = parseConfig(process.env);
  if (!result.ok) {
    printConfigError(result.errors);
    process.exit(1);
  }
  return result.config;
};
