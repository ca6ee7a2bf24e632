import { join } from "node:path";
import cron, { type ScheduledTask } from "node-cron";
import pino from "pino";
import { createManager } from "./app.js";
import { loadConfig, type Config } from "./config.js";
import { ConfigError, errorMessage } from "./errors.js";
import { createLogger } from "./logger.js";
import { StrikeLedger } from "./strikes.js";

function readConfig(): Config {
  try {
    const config = loadConfig();
    const { schedule } = config.general;
    if (schedule && !cron.validate(schedule)) {
      throw new ConfigError([`general.schedule: invalid cron expression "${schedule}"`]);
    }
    return config;
  } catch (err) {
    pino().fatal(errorMessage(err));
    process.exit(1);
  }
}

const config = readConfig();
const { general } = config;
const logger = createLogger(general.logLevel, general.logPretty);

const enabledJobs = Object.entries(config.jobs)
  .filter(([, job]) => job.enabled)
  .map(([name]) => name);

logger.info("═══════════════════════════════════════════════════════════");
logger.info("arr-sweeper Starting");
logger.info("───────────────────────────────────────────────────────────");
logger.info(`  Instances: ${config.instances.map((i) => `${i.name} (${i.kind})`).join(", ")}`);
logger.info(`  Download Clients: ${config.downloadClients.map((c) => `${c.name} (${c.kind})`).join(", ") || "(none)"}`);
logger.info(`  Jobs: ${enabledJobs.join(", ") || "(none)"}`);
logger.info(`  Tracker Handling: private=${general.privateTrackerHandling} public=${general.publicTrackerHandling}`);
logger.info(`  Data Dir: ${general.dataDir}`);
logger.info(`  Dry Run: ${general.testRun ? "YES ⚠️" : "NO"}`);
logger.info(`  Schedule: ${general.schedule ?? "(one-shot)"}`);
logger.info("═══════════════════════════════════════════════════════════\n");

async function main(): Promise<void> {
  const strikes = await StrikeLedger.open({ path: join(general.dataDir, "strikes.json"), logger });
  const manager = createManager(config, logger, strikes);
  const controller = new AbortController();
  let running: Promise<void> | undefined;
  let task: ScheduledTask | undefined;

  const runCycle = async (): Promise<void> => {
    if (general.testRun) {
      logger.warn("TEST MODE – no items will be removed, tagged or searched");
    }
    try {
      await manager.runAll(controller.signal);
    } catch (err) {
      logger.error(`Cycle failed: ${errorMessage(err)}`);
    }
  };

  // Cycles never overlap; a tick that arrives mid-cycle is dropped
  const trigger = (): Promise<void> => {
    if (running) {
      logger.warn("Previous cycle still running, skipping this run");
      return running;
    }
    running = runCycle().finally(() => {
      running = undefined;
    });
    return running;
  };

  const shutdown = async (signal: string): Promise<void> => {
    logger.info(`→ Received ${signal}, shutting down`);
    task?.stop();
    controller.abort();
    await running;
    await manager.close();
    logger.info("✓ Done");
    process.exit(0);
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        logger.error(`Shutdown failed: ${errorMessage(err)}`);
        process.exit(1);
      });
    });
  }

  // Run immediately on startup
  logger.info("→ Running cleanup cycle...");
  await trigger();

  if (general.schedule) {
    logger.info(`→ Scheduling periodic runs (${general.schedule})`);
    task = cron.schedule(general.schedule, async () => {
      logger.info("→ Scheduled run triggered");
      await trigger();
    });
  } else {
    logger.info("✓ Done");
    process.exit(0);
  }
}

main().catch((err: unknown) => {
  logger.error(`Startup failed: ${errorMessage(err)}`);
  process.exit(1);
});
