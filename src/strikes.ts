import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import type { Logger } from "pino";
import { z } from "zod";
import { errorMessage } from "./errors.js";

export interface StrikeRecord {
  count: number;
  firstSeen: Date;
  lastSeen: Date;
  job: string;
  name: string;
}

export interface CycleCounters {
  added: number;
  reset: number;
}

export interface StrikeLedgerOptions {
  /** File the ledger persists to. Without one, save and load are no-ops. */
  path?: string;
  logger: Logger;
  now?: () => Date;
}

const persistedSchema = z.record(
  z.object({
    count: z.number().int().positive(),
    first_seen: z.string().datetime({ offset: true }),
    last_seen: z.string().datetime({ offset: true }),
    job: z.string(),
    name: z.string().optional(),
  })
);

type PersistedLedger = z.infer<typeof persistedSchema>;

const copy = (record: StrikeRecord): StrikeRecord => ({
  ...record,
  firstSeen: new Date(record.firstSeen),
  lastSeen: new Date(record.lastSeen),
});

const isNotFound = (err: unknown): boolean =>
  err instanceof Error && "code" in err && err.code === "ENOENT";

/**
 * Per-item strike counts that survive restarts.
 *
 * Every method except save/load runs synchronously, so no other caller can
 * observe a half-applied update. A record exists only while its count is
 * positive.
 */
export class StrikeLedger {
  private records = new Map<string, StrikeRecord>();
  private strikesAdded = 0;
  private strikesReset = 0;
  private saving: Promise<void> = Promise.resolve();

  private readonly path: string | undefined;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: StrikeLedgerOptions) {
    this.path = options.path;
    this.logger = options.logger.child({ component: "strikes" });
    this.now = options.now ?? (() => new Date());
  }

  /** Creates a ledger and loads it from disk, starting empty if that fails. */
  static async open(options: StrikeLedgerOptions): Promise<StrikeLedger> {
    const ledger = new StrikeLedger(options);
    try {
      await ledger.load();
    } catch (err) {
      ledger.logger.warn({ path: options.path }, `Failed to load strikes, starting fresh: ${errorMessage(err)}`);
    }
    return ledger;
  }

  add(id: string, job: string, name: string): number {
    const now = this.now();
    const existing = this.records.get(id);

    if (existing) {
      existing.count++;
      existing.lastSeen = now;
      existing.job = job;
      if (name) existing.name = name;
    } else {
      this.records.set(id, { count: 1, firstSeen: now, lastSeen: now, job, name });
    }
    this.strikesAdded++;

    const count = this.records.get(id)?.count ?? 0;
    this.logger.debug({ id, job, name, count }, "Strike added");
    return count;
  }

  get(id: string): number {
    return this.records.get(id)?.count ?? 0;
  }

  getRecord(id: string): StrikeRecord | undefined {
    const record = this.records.get(id);
    return record ? copy(record) : undefined;
  }

  hasExceeded(id: string, maxStrikes: number): boolean {
    return this.get(id) >= maxStrikes;
  }

  reset(id: string): void {
    if (this.records.delete(id)) {
      this.strikesReset++;
      this.logger.debug({ id }, "Strikes reset");
    }
  }

  clear(): void {
    this.records.clear();
  }

  count(): number {
    return this.records.size;
  }

  getAllRecords(): Map<string, StrikeRecord> {
    return new Map([...this.records].map(([id, record]) => [id, copy(record)]));
  }

  /** Drops records not seen within `maxAgeMs`, whatever their count. */
  cleanup(maxAgeMs: number): number {
    const cutoff = this.now().getTime() - maxAgeMs;
    let removed = 0;
    for (const [id, record] of this.records) {
      if (record.lastSeen.getTime() < cutoff) {
        this.records.delete(id);
        removed++;
      }
    }
    if (removed > 0) {
      this.logger.debug({ removed }, "Cleaned up stale strikes");
    }
    return removed;
  }

  /** Returns the counters accumulated since the previous call and zeroes them. */
  resetCycleCounters(): CycleCounters {
    const counters = { added: this.strikesAdded, reset: this.strikesReset };
    this.strikesAdded = 0;
    this.strikesReset = 0;
    return counters;
  }

  async save(): Promise<void> {
    const path = this.path;
    if (!path) return;

    // Snapshot now; writes run one after another so the temp file is never shared.
    const data = `${JSON.stringify(this.serialize(), null, 2)}\n`;
    const write = this.saving.then(() => this.write(path, data));
    this.saving = write.catch(() => undefined);
    return write;
  }

  async load(): Promise<void> {
    if (!this.path) return;

    let content: string;
    try {
      content = await readFile(this.path, "utf-8");
    } catch (err) {
      if (isNotFound(err)) return;
      throw err;
    }

    let parsed: PersistedLedger;
    try {
      parsed = persistedSchema.parse(JSON.parse(content));
    } catch (err) {
      throw new Error(`Invalid strikes file ${this.path}: ${errorMessage(err)}`);
    }

    this.records = new Map(
      Object.entries(parsed).map(([id, r]) => [
        id,
        {
          count: r.count,
          firstSeen: new Date(r.first_seen),
          lastSeen: new Date(r.last_seen),
          job: r.job,
          name: r.name ?? "",
        },
      ])
    );
    this.logger.info({ path: this.path, records: this.records.size }, "Loaded strikes");
  }

  private serialize(): PersistedLedger {
    const out: PersistedLedger = {};
    for (const [id, r] of this.records) {
      out[id] = {
        count: r.count,
        first_seen: r.firstSeen.toISOString(),
        last_seen: r.lastSeen.toISOString(),
        job: r.job,
        ...(r.name ? { name: r.name } : {}),
      };
    }
    return out;
  }

  private async write(path: string, data: string): Promise<void> {
    const tmp = `${path}.tmp`;
    await mkdir(dirname(path), { recursive: true });
    try {
      await writeFile(tmp, data, "utf-8");
      await rename(tmp, path);
    } catch (err) {
      await rm(tmp, { force: true });
      throw new Error(`Failed to replace ${path}: ${errorMessage(err)}`);
    }
  }
}
