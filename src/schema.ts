import { z } from "zod";

/**
 * YAML configuration schema. Keys are snake_case as they appear in the file;
 * `loadConfig` maps the validated result onto the camelCase `Config`.
 */

const httpUrl = z
  .string()
  .url()
  .refine((value) => /^https?:\/\//i.test(value), { message: "must be an http(s) URL" });

const generalSchema = z
  .object({
    log_level: z.enum(["fatal", "error", "warn", "info", "debug", "trace"]).default("info"),
    log_pretty: z.boolean().default(false),
    test_run: z.boolean().default(false),
    // null or empty runs a single cycle and exits
    schedule: z.string().nullable().default("*/5 * * * *"),
    request_timeout_ms: z.number().int().min(1000).max(300_000).default(30_000),
    data_dir: z.string().min(1).default("./data"),
    private_tracker_handling: z.string().default("skip"),
    public_tracker_handling: z.string().default("remove"),
    protected_tag: z.string().min(1).optional(),
    obsolete_tag: z.string().min(1).optional(),
    strike_max_age_days: z.number().positive().default(7),
  })
  .default({});

const jobDefaultsSchema = z
  .object({
    max_strikes: z.number().int().min(1).default(3),
    // KB/s
    min_download_speed: z.number().min(0).default(100),
  })
  .default({});

const removalJobSchema = z
  .object({
    enabled: z.boolean().default(false),
    max_strikes: z.number().int().min(1).optional(),
  })
  .default({});

const slowJobSchema = z
  .object({
    enabled: z.boolean().default(false),
    max_strikes: z.number().int().min(1).optional(),
    min_download_speed: z.number().min(0).optional(),
  })
  .default({});

const failedImportsJobSchema = z
  .object({
    enabled: z.boolean().default(false),
    max_strikes: z.number().int().min(1).optional(),
    message_patterns: z.array(z.string().min(1)).default([]),
  })
  .default({});

const doneSeedingJobSchema = z
  .object({
    enabled: z.boolean().default(false),
    max_strikes: z.number().int().min(1).default(1),
    target_tags: z.array(z.string().min(1)).default([]),
    target_categories: z.array(z.string().min(1)).default([]),
  })
  .default({});

const searchJobSchema = z
  .object({
    enabled: z.boolean().default(false),
    min_days_between_searches: z.number().min(0).default(7),
    max_concurrent_searches: z.number().int().min(1).max(20).default(3),
  })
  .default({});

const jobsSchema = z
  .object({
    remove_stalled: removalJobSchema,
    remove_slow: slowJobSchema,
    remove_failed_imports: failedImportsJobSchema,
    remove_failed_downloads: removalJobSchema,
    remove_orphans: removalJobSchema,
    remove_missing_files: removalJobSchema,
    remove_unmonitored: removalJobSchema,
    remove_bad_files: removalJobSchema,
    remove_metadata_missing: removalJobSchema,
    remove_done_seeding: doneSeedingJobSchema,
    search_missing: searchJobSchema,
    search_cutoff_unmet: searchJobSchema,
  })
  .default({});

const instanceSchema = z.object({
  name: z.string().min(1),
  url: httpUrl,
  api_key: z.string().min(1),
  enabled: z.boolean().default(true),
});

const instancesSchema = z
  .object({
    sonarr: z.array(instanceSchema).default([]),
    radarr: z.array(instanceSchema).default([]),
    lidarr: z.array(instanceSchema).default([]),
    readarr: z.array(instanceSchema).default([]),
    whisparr: z.array(instanceSchema).default([]),
  })
  .default({});

const downloadClientsSchema = z
  .object({
    qbittorrent: z
      .array(
        z.object({
          name: z.string().min(1),
          url: httpUrl,
          username: z.string().default(""),
          password: z.string().default(""),
          enabled: z.boolean().default(true),
        })
      )
      .default([]),
    transmission: z
      .array(
        z.object({
          name: z.string().min(1),
          url: httpUrl,
          username: z.string().optional(),
          password: z.string().optional(),
          enabled: z.boolean().default(true),
        })
      )
      .default([]),
    sabnzbd: z
      .array(
        z.object({
          name: z.string().min(1),
          url: httpUrl,
          api_key: z.string().min(1),
          enabled: z.boolean().default(true),
        })
      )
      .default([]),
  })
  .default({});

export const configSchema = z
  .object({
    general: generalSchema,
    job_defaults: jobDefaultsSchema,
    jobs: jobsSchema,
    instances: instancesSchema,
    download_clients: downloadClientsSchema,
  })
  .superRefine((config, ctx) => {
    const instances = Object.values(config.instances).flat();
    if (instances.length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["instances"],
        message: "at least one *arr instance must be configured",
      });
    }

    const seen = new Set<string>();
    for (const { name } of instances) {
      if (seen.has(name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["instances"],
          message: `duplicate instance name "${name}"`,
        });
      }
      seen.add(name);
    }

    const clientNames = new Set<string>();
    for (const { name } of Object.values(config.download_clients).flat()) {
      if (clientNames.has(name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["download_clients"],
          message: `duplicate download client name "${name}"`,
        });
      }
      clientNames.add(name);
    }
  });

export type RawConfig = z.infer<typeof configSchema>;
