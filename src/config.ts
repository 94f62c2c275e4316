import { config as loadDotenv } from "dotenv";
import { z } from "zod";
import { ConfigError } from "./proxy/errors.js";
import type { HealthPolicy } from "./proxy/health.js";
import type { RetryPolicy } from "./proxy/http.js";
import type { FilterPolicy } from "./proxy/node.js";
import type { JobName, WatcherJobConfig } from "./watcher/watcher.js";

const boolFromEnv = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((raw) => {
      if (!raw || !raw.trim()) return fallback;
      return ["1", "true", "yes", "on"].includes(raw.trim().toLowerCase());
    });

const blankAsUndefined = (value: unknown): unknown =>
  typeof value === "string" && !value.trim() ? undefined : value;

const intFromEnv = (fallback: number, min = 0) =>
  z.preprocess(blankAsUndefined, z.coerce.number().int().min(min).default(fallback));

const textFromEnv = (fallback: string) => z.preprocess(blankAsUndefined, z.string().trim().min(1).default(fallback));

const urlFromEnv = (fallback: string) => z.preprocess(blankAsUndefined, z.string().trim().url().default(fallback));

const listFromEnv = z
  .string()
  .optional()
  .transform((raw) =>
    (raw || "")
      .split(",")
      .map((item) => item.trim())
      .filter(Boolean),
  );

const optionalText = z
  .string()
  .optional()
  .transform((raw) => (raw && raw.trim() ? raw.trim() : undefined));

export const EnvSchema = z.object({
  SUBSCRIPTION_URL: z.string().trim().min(1, "SUBSCRIPTION_URL is required"),
  SUBSCRIPTION_INCLUDE: listFromEnv,
  SUBSCRIPTION_EXCLUDE: listFromEnv,
  SUBSCRIPTION_TIMEOUT_MS: intFromEnv(15_000, 1),
  SUBSCRIPTION_USER_AGENT: optionalText,

  MIHOMO_API_URL: urlFromEnv("http://127.0.0.1:9090"),
  MIHOMO_SECRET: optionalText,
  MIHOMO_GROUP: textFromEnv("PROXY"),
  MIHOMO_PROXY_URL: optionalText,
  BACKEND_TIMEOUT_MS: intFromEnv(10_000, 1),
  BACKEND_RETRY_ATTEMPTS: intFromEnv(3, 1),
  BACKEND_RETRY_BASE_MS: intFromEnv(250),

  PROXY_CHECK_URL: urlFromEnv("https://www.cloudflare.com/cdn-cgi/trace"),
  PROXY_CHECK_TIMEOUT_MS: intFromEnv(5_000, 1),
  PROXY_LATENCY_MAX_MS: intFromEnv(3_000, 1),
  PROXY_STALENESS_MS: intFromEnv(120_000, 1),
  PROXY_SWITCH_MARGIN_MS: intFromEnv(0),
  PROXY_PROBE_CONCURRENCY: intFromEnv(8, 1),

  WATCHER_BLOCKING: boolFromEnv(true),
  WATCHER_SHUTDOWN_TIMEOUT_MS: intFromEnv(10_000),
  WATCHER_WORKERS: intFromEnv(3, 1),
  WATCHER_UPDATER_ENABLED: boolFromEnv(true),
  WATCHER_UPDATER_TRIGGER: textFromEnv("0 2 * * *"),
  WATCHER_UPDATER_RUN_ON_START: boolFromEnv(true),
  WATCHER_CHANGER_ENABLED: boolFromEnv(true),
  WATCHER_CHANGER_TRIGGER: textFromEnv("1h"),
  WATCHER_CHANGER_ROTATE: boolFromEnv(false),
  WATCHER_CHECKER_ENABLED: boolFromEnv(true),
  WATCHER_CHECKER_TRIGGER: textFromEnv("30s"),

  EGRESS_CHECK: boolFromEnv(false),
  IPINFO_TOKEN: optionalText,
  LOG_LEVEL: z.preprocess(
    blankAsUndefined,
    z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  ),
});

export type EnvConfig = z.infer<typeof EnvSchema>;

export interface AppConfig {
  subscription: {
    url: string;
    filter: FilterPolicy;
    timeoutMs: number;
    userAgent?: string;
  };
  mihomo: {
    apiBaseUrl: string;
    secret?: string;
    groupName: string;
    checkUrl: string;
    proxyServer?: string;
    requestTimeoutMs: number;
    retry: RetryPolicy;
  };
  health: HealthPolicy;
  probe: { timeoutMs: number; concurrency: number };
  watcher: {
    blocking: boolean;
    shutdownTimeoutMs: number;
    workers: number;
    rotate: boolean;
    jobs: Record<JobName, WatcherJobConfig>;
  };
  egress: { enabled: boolean; ipinfoToken?: string };
  logLevel: EnvConfig["LOG_LEVEL"];
}

export function parseConfig(env: Record<string, string | undefined>): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join(".") || "env"}: ${issue.message}`));
  }
  const e = parsed.data;
  return {
    subscription: {
      url: e.SUBSCRIPTION_URL,
      filter: { include: e.SUBSCRIPTION_INCLUDE, exclude: e.SUBSCRIPTION_EXCLUDE },
      timeoutMs: e.SUBSCRIPTION_TIMEOUT_MS,
      userAgent: e.SUBSCRIPTION_USER_AGENT,
    },
    mihomo: {
      apiBaseUrl: e.MIHOMO_API_URL,
      secret: e.MIHOMO_SECRET,
      groupName: e.MIHOMO_GROUP,
      checkUrl: e.PROXY_CHECK_URL,
      proxyServer: e.MIHOMO_PROXY_URL,
      requestTimeoutMs: e.BACKEND_TIMEOUT_MS,
      retry: {
        attempts: e.BACKEND_RETRY_ATTEMPTS,
        baseDelayMs: e.BACKEND_RETRY_BASE_MS,
        maxDelayMs: Math.max(e.BACKEND_RETRY_BASE_MS, 2_000),
      },
    },
    health: {
      stalenessMs: e.PROXY_STALENESS_MS,
      maxLatencyMs: e.PROXY_LATENCY_MAX_MS,
      switchMarginMs: e.PROXY_SWITCH_MARGIN_MS,
    },
    probe: { timeoutMs: e.PROXY_CHECK_TIMEOUT_MS, concurrency: e.PROXY_PROBE_CONCURRENCY },
    watcher: {
      blocking: e.WATCHER_BLOCKING,
      shutdownTimeoutMs: e.WATCHER_SHUTDOWN_TIMEOUT_MS,
      workers: e.WATCHER_WORKERS,
      rotate: e.WATCHER_CHANGER_ROTATE,
      jobs: {
        updater: {
          enabled: e.WATCHER_UPDATER_ENABLED,
          trigger: e.WATCHER_UPDATER_TRIGGER,
          runOnStart: e.WATCHER_UPDATER_RUN_ON_START,
        },
        changer: { enabled: e.WATCHER_CHANGER_ENABLED, trigger: e.WATCHER_CHANGER_TRIGGER },
        checker: { enabled: e.WATCHER_CHECKER_ENABLED, trigger: e.WATCHER_CHECKER_TRIGGER },
      },
    },
    egress: { enabled: e.EGRESS_CHECK, ipinfoToken: e.IPINFO_TOKEN },
    logLevel: e.LOG_LEVEL,
  };
}

export function loadConfig(envFile = ".env.local"): AppConfig {
  loadDotenv({ path: envFile, quiet: true });
  return parseConfig(process.env);
}
