import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { MaintenanceScheduler } from "../../src/maintenance/scheduler.js";
import { MemoryStore } from "../../src/memory/store.js";
import { SessionStore } from "../../src/session/store.js";
import type { MaintenanceConfig } from "../../src/config/types.js";
import { InMemoryRecordStore, makeMemory, mockLogger } from "../helpers/fixtures.js";

const LONG_AGO = Date.parse("2020-01-01T00:00:00.000Z");

describe("MaintenanceScheduler", () => {
  let logger: ReturnType<typeof mockLogger>;
  let sessions: SessionStore;
  let memories: MemoryStore;
  let scheduler: MaintenanceScheduler | undefined;

  const enabled: MaintenanceConfig = {
    enabled: true,
    sweepSchedule: "0 3 * * *",
    consolidateSchedule: "30 3 * * *",
  };

  beforeEach(() => {
    logger = mockLogger();
    sessions = new SessionStore({
      records: new InMemoryRecordStore(),
      logger,
      maxTokenLimit: 3_000,
      ttlDays: 7,
      now: () => LONG_AGO,
    });
    memories = new MemoryStore({ records: new InMemoryRecordStore(), logger });
  });

  afterEach(() => {
    scheduler?.stop();
    scheduler = undefined;
  });

  it("schedules nothing when disabled", () => {
    scheduler = new MaintenanceScheduler({ ...enabled, enabled: false }, sessions, memories, logger);
    scheduler.start();
    expect(scheduler.nextRun("sweep")).toBeNull();
  });

  it("schedules both jobs when enabled", () => {
    scheduler = new MaintenanceScheduler(enabled, sessions, memories, logger);
    scheduler.start();

    expect(scheduler.nextRun("sweep")).toBeInstanceOf(Date);
    expect(scheduler.nextRun("consolidate")).toBeInstanceOf(Date);

    scheduler.stop();
    expect(scheduler.nextRun("sweep")).toBeNull();
  });

  it("runs the session sweep on demand", async () => {
    scheduler = new MaintenanceScheduler(enabled, sessions, memories, logger);
    await sessions.createSession("u1");
    await sessions.createSession("u2");

    const run = await scheduler.runNow("sweep");

    expect(run).toMatchObject({ job: "sweep", success: true, processed: 2 });
    expect(logger.info).toHaveBeenCalledWith(
      expect.objectContaining({ job: "sweep", processed: 2 }),
      "Maintenance job completed",
    );
  });

  it("consolidates every user with memories", async () => {
    scheduler = new MaintenanceScheduler(enabled, sessions, memories, logger);
    await memories.store(makeMemory({ userId: "u1" }));
    await memories.store(makeMemory({ userId: "u2" }));

    const run = await scheduler.runNow("consolidate");

    expect(run).toMatchObject({ job: "consolidate", success: true, processed: 2 });
  });

  it("reports a failed run without throwing", async () => {
    scheduler = new MaintenanceScheduler(enabled, sessions, memories, logger);
    vi.spyOn(memories, "listUsers").mockRejectedValueOnce(new Error("disk gone"));

    const run = await scheduler.runNow("consolidate");

    expect(run).toMatchObject({ job: "consolidate", success: false, processed: 0, error: "disk gone" });
    expect(logger.error).toHaveBeenCalledWith(
      expect.objectContaining({ job: "consolidate", error: "disk gone" }),
      "Maintenance job failed",
    );
  });
});
