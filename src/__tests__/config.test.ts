import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join, resolve } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { loadConfig, parseConfig } from "../config.js";
import { ConfigError } from "../errors.js";

const MINIMAL = { instances: { sonarr: [{ name: "sonarr", url: "http://sonarr:8989", api_key: "test-key" }] } };

function issuesOf(fn: () => unknown): readonly string[] {
  try {
    fn();
  } catch (err) {
    if (err instanceof ConfigError) return err.issues;
    throw err;
  }
  throw new Error("expected a ConfigError");
}

describe("loadConfig", () => {
  let tempDir: string;
  let configPath: string;

  const writeConfig = (content: string): void => writeFileSync(configPath, content);

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), "config-test-"));
    configPath = join(tempDir, "config.yaml");
    writeConfig(`
instances:
  sonarr:
    - name: sonarr
      url: http://sonarr:8989
      api_key: test-key
`);
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it("reads the YAML file named by CONFIG_PATH", () => {
    writeConfig(`
general:
  log_level: debug
  private_tracker_handling: Obsolete_Tag
  obsolete_tag: obsolete
job_defaults:
  max_strikes: 4
jobs:
  remove_stalled:
    enabled: true
    max_strikes: 5
  remove_orphans:
    enabled: true
instances:
  radarr:
    - name: radarr
      url: http://radarr:7878
      api_key: test-key
  sonarr:
    - name: sonarr
      url: http://sonarr:8989
      api_key: test-key
download_clients:
  qbittorrent:
    - name: qbit
      url: http://qbit:8080
      username: admin
      password: test-password
  transmission:
    - name: transmission
      url: http://transmission:9091
`);

    const config = loadConfig({ CONFIG_PATH: configPath });

    expect(config.general.logLevel).toBe("debug");
    expect(config.general.privateTrackerHandling).toBe("obsolete_tag");
    expect(config.general.obsoleteTag).toBe("obsolete");
    expect(config.jobs.removeStalled).toEqual({ enabled: true, maxStrikes: 5 });
    expect(config.jobs.removeOrphans).toEqual({ enabled: true, maxStrikes: 4 });
    expect(config.jobs.removeDoneSeeding.maxStrikes).toBe(1);
    expect(config.instances.map((i) => `${i.kind}:${i.name}`)).toEqual(["sonarr:sonarr", "radarr:radarr"]);
    expect(config.downloadClients).toEqual([
      {
        kind: "qbittorrent",
        name: "qbit",
        url: "http://qbit:8080",
        auth: { username: "admin", password: "test-password" },
        enabled: true,
      },
      { kind: "transmission", name: "transmission", url: "http://transmission:9091", auth: undefined, enabled: true },
    ]);
  });

  it("lets environment variables override the file", () => {
    writeConfig(`
general:
  log_level: debug
  test_run: false
instances:
  sonarr:
    - name: sonarr
      url: http://sonarr:8989
      api_key: test-key
`);

    const config = loadConfig({
      CONFIG_PATH: configPath,
      LOG_LEVEL: "warn",
      DRY_RUN: "true",
      DATA_DIR: " /var/lib/sweeper ",
      REQUEST_TIMEOUT_MS: "5000",
    });

    expect(config.general.logLevel).toBe("warn");
    expect(config.general.testRun).toBe(true);
    expect(config.general.dataDir).toBe("/var/lib/sweeper");
    expect(config.general.requestTimeoutMs).toBe(5000);
  });

  it("switches to a single run when SCHEDULE is empty", () => {
    expect(loadConfig({ CONFIG_PATH: configPath }).general.schedule).toBe("*/5 * * * *");
    expect(loadConfig({ CONFIG_PATH: configPath, SCHEDULE: "" }).general.schedule).toBeUndefined();
    expect(loadConfig({ CONFIG_PATH: configPath, SCHEDULE: "0 * * * *" }).general.schedule).toBe("0 * * * *");
  });

  it("collects every invalid environment variable", () => {
    expect(issuesOf(() => loadConfig({ CONFIG_PATH: configPath, LOG_LEVEL: "loud", DRY_RUN: "maybe" }))).toEqual([
      "LOG_LEVEL: Invalid log level: loud",
      "DRY_RUN: Invalid boolean: maybe",
    ]);
  });

  it("validates environment values against the schema", () => {
    expect(issuesOf(() => loadConfig({ CONFIG_PATH: configPath, REQUEST_TIMEOUT_MS: "500" }))).toEqual([
      "general.request_timeout_ms: Number must be greater than or equal to 1000",
    ]);
  });

  it("fails when CONFIG_PATH does not exist", () => {
    const missing = join(tempDir, "missing.yaml");
    expect(issuesOf(() => loadConfig({ CONFIG_PATH: missing }))).toEqual([
      `CONFIG_PATH: file not found: ${resolve(missing)}`,
    ]);
  });

  it("rejects malformed YAML", () => {
    writeConfig("general: [unclosed");
    const issues = issuesOf(() => loadConfig({ CONFIG_PATH: configPath }));
    expect(issues).toHaveLength(1);
    expect(issues[0]?.startsWith(`${resolve(configPath)}: `)).toBe(true);
  });

  it("rejects a file whose top level is not a mapping", () => {
    writeConfig("- one\n- two\n");
    expect(issuesOf(() => loadConfig({ CONFIG_PATH: configPath }))).toEqual([
      `${resolve(configPath)}: top level must be a mapping`,
    ]);
  });
});

describe("parseConfig", () => {
  it("fills in defaults", () => {
    const config = parseConfig(MINIMAL);

    expect(config.general).toEqual({
      logLevel: "info",
      logPretty: false,
      testRun: false,
      schedule: "*/5 * * * *",
      requestTimeoutMs: 30_000,
      dataDir: "./data",
      privateTrackerHandling: "skip",
      publicTrackerHandling: "remove",
      protectedTag: undefined,
      obsoleteTag: undefined,
      strikeMaxAgeDays: 7,
    });
    expect(config.jobs.removeSlow).toEqual({ enabled: false, maxStrikes: 3, minDownloadSpeed: 100 });
    expect(config.jobs.removeFailedImports.messagePatterns).toEqual([]);
    expect(config.jobs.searchMissing).toEqual({ enabled: false, minDaysBetweenSearches: 7, maxConcurrentSearches: 3 });
    expect(config.instances).toEqual([
      { kind: "sonarr", name: "sonarr", url: "http://sonarr:8989", apiKey: "test-key", enabled: true },
    ]);
    expect(config.downloadClients).toEqual([]);
  });

  it("treats a null schedule as a single run", () => {
    expect(parseConfig({ ...MINIMAL, general: { schedule: null } }).general.schedule).toBeUndefined();
  });

  it("requires at least one instance", () => {
    expect(issuesOf(() => parseConfig({}))).toEqual(["instances: at least one *arr instance must be configured"]);
  });

  it("rejects duplicate instance names across kinds", () => {
    const input = {
      instances: {
        sonarr: [{ name: "main", url: "http://sonarr:8989", api_key: "test-key" }],
        radarr: [{ name: "main", url: "http://radarr:7878", api_key: "test-key" }],
      },
    };
    expect(issuesOf(() => parseConfig(input))).toEqual(['instances: duplicate instance name "main"']);
  });

  it("rejects non-http URLs", () => {
    const input = { instances: { sonarr: [{ name: "sonarr", url: "ftp://sonarr", api_key: "test-key" }] } };
    expect(issuesOf(() => parseConfig(input))).toEqual(["instances.sonarr.0.url: must be an http(s) URL"]);
  });

  it("rejects a zero strike limit", () => {
    const input = { ...MINIMAL, jobs: { remove_stalled: { enabled: true, max_strikes: 0 } } };
    expect(issuesOf(() => parseConfig(input))).toEqual([
      "jobs.remove_stalled.max_strikes: Number must be greater than or equal to 1",
    ]);
  });
});
