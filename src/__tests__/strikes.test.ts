import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { StrikeLedger } from "../strikes.js";
import { silentLogger } from "./setup.js";

const DAY_MS = 24 * 60 * 60 * 1000;

describe("StrikeLedger", () => {
  let tempDir: string;
  let path: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), "strikes-test-"));
    path = join(tempDir, "data", "strikes.json");
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  describe("counting", () => {
    it("add increments and returns the new count", () => {
      const ledger = new StrikeLedger({ logger: silentLogger });

      expect(ledger.add("abc", "remove_stalled", "Show")).toBe(1);
      expect(ledger.add("abc", "remove_stalled", "Show")).toBe(2);
      expect(ledger.get("abc")).toBe(2);
      expect(ledger.get("missing")).toBe(0);
    });

    it("hasExceeded is true once the count reaches the limit", () => {
      const ledger = new StrikeLedger({ logger: silentLogger });
      ledger.add("abc", "remove_stalled", "Show");
      ledger.add("abc", "remove_stalled", "Show");

      expect(ledger.hasExceeded("abc", 3)).toBe(false);
      ledger.add("abc", "remove_stalled", "Show");
      expect(ledger.hasExceeded("abc", 3)).toBe(true);
      expect(ledger.hasExceeded("other", 1)).toBe(false);
    });

    it("keeps the previous name when a later strike has none", () => {
      const ledger = new StrikeLedger({ logger: silentLogger });
      ledger.add("abc", "remove_stalled", "Show");
      ledger.add("abc", "remove_slow", "");

      const record = ledger.getRecord("abc");
      expect(record?.name).toBe("Show");
      expect(record?.job).toBe("remove_slow");
      expect(record?.count).toBe(2);
    });

    it("reset removes the record entirely", () => {
      const ledger = new StrikeLedger({ logger: silentLogger });
      ledger.add("abc", "remove_stalled", "Show");
      ledger.reset("abc");

      expect(ledger.get("abc")).toBe(0);
      expect(ledger.getRecord("abc")).toBeUndefined();
      expect(ledger.count()).toBe(0);
    });

    it("getRecord and getAllRecords return copies", () => {
      const ledger = new StrikeLedger({ logger: silentLogger });
      ledger.add("abc", "remove_stalled", "Show");

      const record = ledger.getRecord("abc");
      if (!record) throw new Error("expected a record");
      record.count = 99;
      record.lastSeen.setFullYear(2000);
      ledger.getAllRecords().get("abc")?.lastSeen.setFullYear(2001);

      expect(ledger.get("abc")).toBe(1);
      expect(ledger.getRecord("abc")?.lastSeen.getFullYear()).not.toBe(2000);
      expect(ledger.getRecord("abc")?.lastSeen.getFullYear()).not.toBe(2001);
    });

    it("clear empties the ledger", () => {
      const ledger = new StrikeLedger({ logger: silentLogger });
      ledger.add("a", "job", "A");
      ledger.add("b", "job", "B");
      ledger.clear();

      expect(ledger.count()).toBe(0);
    });
  });

  describe("cycle counters", () => {
    it("counts adds and only resets of existing records", () => {
      const ledger = new StrikeLedger({ logger: silentLogger });
      ledger.add("a", "job", "A");
      ledger.add("a", "job", "A");
      ledger.add("b", "job", "B");
      ledger.reset("a");
      ledger.reset("never-struck");

      expect(ledger.resetCycleCounters()).toEqual({ added: 3, reset: 1 });
      expect(ledger.resetCycleCounters()).toEqual({ added: 0, reset: 0 });
    });
  });

  describe("cleanup", () => {
    it("removes records not seen within the max age, regardless of count", () => {
      let now = new Date("2024-01-01T00:00:00Z");
      const ledger = new StrikeLedger({ logger: silentLogger, now: () => now });

      ledger.add("old", "job", "Old");
      ledger.add("old", "job", "Old");
      now = new Date("2024-01-06T00:00:00Z");
      ledger.add("recent", "job", "Recent");
      now = new Date("2024-01-09T00:00:00Z");

      expect(ledger.cleanup(7 * DAY_MS)).toBe(1);
      expect(ledger.get("old")).toBe(0);
      expect(ledger.get("recent")).toBe(1);
    });
  });

  describe("persistence", () => {
    it("round-trips records through save and open", async () => {
      const now = new Date("2024-03-01T12:00:00.000Z");
      const ledger = new StrikeLedger({ path, logger: silentLogger, now: () => now });
      ledger.add("abc", "remove_stalled", "Show");
      ledger.add("abc", "remove_stalled", "Show");
      ledger.add("def", "remove_orphans", "");
      await ledger.save();

      const reopened = await StrikeLedger.open({ path, logger: silentLogger });
      expect(reopened.getRecord("abc")).toEqual({
        count: 2,
        firstSeen: now,
        lastSeen: now,
        job: "remove_stalled",
        name: "Show",
      });
      expect(reopened.get("def")).toBe(1);
      expect(reopened.count()).toBe(2);
    });

    it("writes the documented layout and leaves no temp file", async () => {
      const now = new Date("2024-03-01T12:00:00.000Z");
      const ledger = new StrikeLedger({ path, logger: silentLogger, now: () => now });
      ledger.add("abc", "remove_stalled", "Show");
      ledger.add("def", "remove_orphans", "");
      await ledger.save();

      expect(JSON.parse(readFileSync(path, "utf-8"))).toEqual({
        abc: {
          count: 1,
          first_seen: "2024-03-01T12:00:00.000Z",
          last_seen: "2024-03-01T12:00:00.000Z",
          job: "remove_stalled",
          name: "Show",
        },
        def: {
          count: 1,
          first_seen: "2024-03-01T12:00:00.000Z",
          last_seen: "2024-03-01T12:00:00.000Z",
          job: "remove_orphans",
        },
      });
      expect(existsSync(`${path}.tmp`)).toBe(false);
    });

    it("starts empty when the file does not exist", async () => {
      const ledger = await StrikeLedger.open({ path, logger: silentLogger });
      expect(ledger.count()).toBe(0);
    });

    it("starts empty when the file is corrupt", async () => {
      writeFileSync(join(tempDir, "strikes.json"), "{not json");
      const ledger = await StrikeLedger.open({ path: join(tempDir, "strikes.json"), logger: silentLogger });
      expect(ledger.count()).toBe(0);
    });

    it("saves over a corrupt file it started from", async () => {
      const file = join(tempDir, "strikes.json");
      writeFileSync(file, "{not json");
      const ledger = await StrikeLedger.open({ path: file, logger: silentLogger });
      ledger.add("abc", "remove_stalled", "Show");

      await ledger.save();

      expect((await StrikeLedger.open({ path: file, logger: silentLogger })).get("abc")).toBe(1);
    });

    it("removes the temp file when the final rename fails", async () => {
      mkdirSync(join(path, "occupied"), { recursive: true });
      const ledger = new StrikeLedger({ path, logger: silentLogger });
      ledger.add("abc", "remove_stalled", "Show");

      await expect(ledger.save()).rejects.toThrow(`Failed to replace ${path}`);
      expect(existsSync(`${path}.tmp`)).toBe(false);
    });

    it("load rejects on a malformed record", async () => {
      const file = join(tempDir, "strikes.json");
      writeFileSync(file, JSON.stringify({ abc: { count: "three" } }));
      const ledger = new StrikeLedger({ path: file, logger: silentLogger });

      await expect(ledger.load()).rejects.toThrow(/Invalid strikes file/);
    });

    it("save and load are no-ops without a path", async () => {
      const ledger = new StrikeLedger({ logger: silentLogger });
      ledger.add("abc", "job", "Show");

      await ledger.save();
      await ledger.load();
      expect(ledger.get("abc")).toBe(1);
    });

    it("serialises concurrent saves and keeps the latest snapshot", async () => {
      const ledger = new StrikeLedger({ path, logger: silentLogger });
      ledger.add("a", "job", "A");
      const first = ledger.save();
      ledger.add("b", "job", "B");
      const second = ledger.save();
      await Promise.all([first, second]);

      expect(Object.keys(JSON.parse(readFileSync(path, "utf-8")))).toEqual(["a", "b"]);
    });
  });

  describe("concurrent use", () => {
    it("loses no updates when many callers strike at once", async () => {
      const ledger = new StrikeLedger({ logger: silentLogger });
      const ids = ["a", "b", "c", "d"];

      await Promise.all(
        Array.from({ length: 100 }, async (_, i) => {
          await Promise.resolve();
          ledger.add(ids[i % ids.length] ?? "a", "job", "Item");
        })
      );

      for (const id of ids) {
        expect(ledger.get(id)).toBe(25);
      }
      expect(ledger.resetCycleCounters().added).toBe(100);
    });
  });
});
