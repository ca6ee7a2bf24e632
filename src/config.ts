import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import * as yaml from "js-yaml";
import type { ZodError } from "zod";
import { ConfigError, errorMessage } from "./errors.js";
import { configSchema, type RawConfig } from "./schema.js";

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace";

export type Auth = { readonly username: string; readonly password: string };

export type ArrKind = "sonarr" | "radarr" | "lidarr" | "readarr" | "whisparr";

export type DownloadClientKind = "qbittorrent" | "transmission" | "sabnzbd";

export type ArrInstanceConfig = {
  readonly kind: ArrKind;
  readonly name: string;
  readonly url: string;
  readonly apiKey: string;
  readonly enabled: boolean;
};

export type DownloadClientConfig =
  | {
      readonly kind: "qbittorrent";
      readonly name: string;
      readonly url: string;
      readonly auth: Auth;
      readonly enabled: boolean;
    }
  | {
      readonly kind: "transmission";
      readonly name: string;
      readonly url: string;
      readonly auth: Auth | undefined;
      readonly enabled: boolean;
    }
  | {
      readonly kind: "sabnzbd";
      readonly name: string;
      readonly url: string;
      readonly apiKey: string;
      readonly enabled: boolean;
    };

export type RemovalJobConfig = {
  readonly enabled: boolean;
  readonly maxStrikes: number;
};

export type SearchJobConfig = {
  readonly enabled: boolean;
  readonly minDaysBetweenSearches: number;
  readonly maxConcurrentSearches: number;
};

export type Config = {
  readonly general: {
    readonly logLevel: LogLevel;
    readonly logPretty: boolean;
    readonly testRun: boolean;
    readonly schedule: string | undefined;
    readonly requestTimeoutMs: number;
    readonly dataDir: string;
    readonly privateTrackerHandling: string;
    readonly publicTrackerHandling: string;
    readonly protectedTag: string | undefined;
    readonly obsoleteTag: string | undefined;
    readonly strikeMaxAgeDays: number;
  };
  readonly jobs: {
    readonly removeStalled: RemovalJobConfig;
    readonly removeSlow: RemovalJobConfig & { readonly minDownloadSpeed: number };
    readonly removeFailedImports: RemovalJobConfig & { readonly messagePatterns: readonly string[] };
    readonly removeFailedDownloads: RemovalJobConfig;
    readonly removeOrphans: RemovalJobConfig;
    readonly removeMissingFiles: RemovalJobConfig;
    readonly removeUnmonitored: RemovalJobConfig;
    readonly removeBadFiles: RemovalJobConfig;
    readonly removeMetadataMissing: RemovalJobConfig;
    readonly removeDoneSeeding: RemovalJobConfig & {
      readonly targetTags: readonly string[];
      readonly targetCategories: readonly string[];
    };
    readonly searchMissing: SearchJobConfig;
    readonly searchCutoffUnmet: SearchJobConfig;
  };
  readonly instances: readonly ArrInstanceConfig[];
  readonly downloadClients: readonly DownloadClientConfig[];
};

// Parsers
const parseBool = (value?: string): boolean => {
  if (!value) return false;
  if (value === "true" || value === "1") return true;
  if (value === "false" || value === "0") return false;
  throw new Error(`Invalid boolean: ${value}`);
};

const parseLevel = (value?: string): LogLevel => {
  const levels: readonly LogLevel[] = ["fatal", "error", "warn", "info", "debug", "trace"];
  const level = levels.find((l) => l === value);
  if (!level) throw new Error(`Invalid log level: ${value}`);
  return level;
};

const parseNum = (value?: string): number => {
  const n = Number(value);
  if (!value || isNaN(n) || n <= 0) throw new Error(`Invalid number: ${value}`);
  return n;
};

const parseSchedule = (value?: string): string | null => value?.trim() || null;

const parseText = (value?: string): string => {
  if (!value?.trim()) throw new Error("Invalid value: empty");
  return value.trim();
};

/** ENV_VAR -> [config path, parser]. */
const ENV_MAPPING: Record<string, [string, (value?: string) => unknown]> = {
  LOG_LEVEL: ["general.log_level", parseLevel],
  LOG_PRETTY: ["general.log_pretty", parseBool],
  DRY_RUN: ["general.test_run", parseBool],
  SCHEDULE: ["general.schedule", parseSchedule],
  DATA_DIR: ["general.data_dir", parseText],
  REQUEST_TIMEOUT_MS: ["general.request_timeout_ms", parseNum],
};

const DEFAULT_PATHS = ["config.yaml", "config.yml", "/app/config.yaml"];

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const keys = path.split(".");
  const last = keys.pop();
  if (last === undefined) return;

  let current = obj;
  for (const key of keys) {
    const next = current[key];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[key] = created;
      current = created;
    }
  }
  current[last] = value;
}

function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result = { ...target };
  for (const [key, value] of Object.entries(source)) {
    const existing = result[key];
    result[key] = isRecord(value) && isRecord(existing) ? deepMerge(existing, value) : value;
  }
  return result;
}

function formatIssues(error: ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
}

function findConfigFile(env: NodeJS.ProcessEnv): string | undefined {
  if (env.CONFIG_PATH) {
    const configPath = resolve(env.CONFIG_PATH);
    if (!existsSync(configPath)) {
      throw new ConfigError([`CONFIG_PATH: file not found: ${configPath}`]);
    }
    return configPath;
  }
  return DEFAULT_PATHS.map((p) => resolve(p)).find((p) => existsSync(p));
}

function loadConfigFile(configPath: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = yaml.load(readFileSync(configPath, "utf-8"));
  } catch (err) {
    throw new ConfigError([`${configPath}: ${errorMessage(err)}`]);
  }
  if (parsed === undefined || parsed === null) return {};
  if (!isRecord(parsed)) {
    throw new ConfigError([`${configPath}: top level must be a mapping`]);
  }
  return parsed;
}

function loadFromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const config: Record<string, unknown> = {};
  const issues: string[] = [];

  for (const [envVar, [path, parse]] of Object.entries(ENV_MAPPING)) {
    const value = env[envVar];
    if (value === undefined) continue;
    try {
      setNestedValue(config, path, parse(value));
    } catch (err) {
      issues.push(`${envVar}: ${errorMessage(err)}`);
    }
  }

  if (issues.length > 0) throw new ConfigError(issues);
  return config;
}

function toConfig(raw: RawConfig): Config {
  const { general, job_defaults: defaults, jobs } = raw;
  const removal = (job: { enabled: boolean; max_strikes?: number }): RemovalJobConfig => ({
    enabled: job.enabled,
    maxStrikes: job.max_strikes ?? defaults.max_strikes,
  });
  const search = (job: RawConfig["jobs"]["search_missing"]): SearchJobConfig => ({
    enabled: job.enabled,
    minDaysBetweenSearches: job.min_days_between_searches,
    maxConcurrentSearches: job.max_concurrent_searches,
  });

  const kinds: readonly ArrKind[] = ["sonarr", "radarr", "lidarr", "readarr", "whisparr"];
  const instances = kinds.flatMap((kind) =>
    raw.instances[kind].map(
      (i): ArrInstanceConfig => ({ kind, name: i.name, url: i.url, apiKey: i.api_key, enabled: i.enabled })
    )
  );

  const clients = raw.download_clients;
  const downloadClients: DownloadClientConfig[] = [
    ...clients.qbittorrent.map(
      (c): DownloadClientConfig => ({
        kind: "qbittorrent",
        name: c.name,
        url: c.url,
        auth: { username: c.username, password: c.password },
        enabled: c.enabled,
      })
    ),
    ...clients.transmission.map(
      (c): DownloadClientConfig => ({
        kind: "transmission",
        name: c.name,
        url: c.url,
        auth: c.username ? { username: c.username, password: c.password ?? "" } : undefined,
        enabled: c.enabled,
      })
    ),
    ...clients.sabnzbd.map(
      (c): DownloadClientConfig => ({
        kind: "sabnzbd",
        name: c.name,
        url: c.url,
        apiKey: c.api_key,
        enabled: c.enabled,
      })
    ),
  ];

  return {
    general: {
      logLevel: general.log_level,
      logPretty: general.log_pretty,
      testRun: general.test_run,
      schedule: general.schedule?.trim() || undefined,
      requestTimeoutMs: general.request_timeout_ms,
      dataDir: general.data_dir,
      privateTrackerHandling: general.private_tracker_handling.toLowerCase(),
      publicTrackerHandling: general.public_tracker_handling.toLowerCase(),
      protectedTag: general.protected_tag,
      obsoleteTag: general.obsolete_tag,
      strikeMaxAgeDays: general.strike_max_age_days,
    },
    jobs: {
      removeStalled: removal(jobs.remove_stalled),
      removeSlow: {
        ...removal(jobs.remove_slow),
        minDownloadSpeed: jobs.remove_slow.min_download_speed ?? defaults.min_download_speed,
      },
      removeFailedImports: {
        ...removal(jobs.remove_failed_imports),
        messagePatterns: jobs.remove_failed_imports.message_patterns,
      },
      removeFailedDownloads: removal(jobs.remove_failed_downloads),
      removeOrphans: removal(jobs.remove_orphans),
      removeMissingFiles: removal(jobs.remove_missing_files),
      removeUnmonitored: removal(jobs.remove_unmonitored),
      removeBadFiles: removal(jobs.remove_bad_files),
      removeMetadataMissing: removal(jobs.remove_metadata_missing),
      removeDoneSeeding: {
        ...removal(jobs.remove_done_seeding),
        targetTags: jobs.remove_done_seeding.target_tags,
        targetCategories: jobs.remove_done_seeding.target_categories,
      },
      searchMissing: search(jobs.search_missing),
      searchCutoffUnmet: search(jobs.search_cutoff_unmet),
    },
    instances,
    downloadClients,
  };
}

/** Validates an already-parsed configuration object. */
export function parseConfig(input: unknown): Config {
  const result = configSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(formatIssues(result.error));
  }
  return Object.freeze(toConfig(result.data));
}

/**
 * Load and validate configuration.
 * Priority: environment variables > YAML file > defaults.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const configFile = findConfigFile(env);
  const fileConfig = configFile ? loadConfigFile(configFile) : {};
  return parseConfig(deepMerge(fileConfig, loadFromEnv(env)));
}
