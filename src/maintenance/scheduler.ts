import { Cron } from "croner";
import type { MaintenanceConfig } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import type { MemoryStore } from "../memory/store.js";
import type { SessionStore } from "../session/store.js";

export type MaintenanceJob = "sweep" | "consolidate";

export interface MaintenanceRun {
  readonly job: MaintenanceJob;
  readonly startedAt: number;
  readonly completedAt: number;
  readonly success: boolean;
  /** Sessions archived, or users consolidated. */
  readonly processed: number;
  readonly error?: string;
}

/**
 * Periodic batch jobs: the session TTL sweep and per-user consolidation.
 * A run never throws into the timer; its outcome is logged.
 */
export class MaintenanceScheduler {
  private readonly scheduled = new Map<MaintenanceJob, Cron>();
  private readonly logger: Logger;

  constructor(
    private readonly config: MaintenanceConfig,
    private readonly sessions: SessionStore,
    private readonly memories: MemoryStore,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: "maintenance" });
  }

  start(): void {
    if (!this.config.enabled) {
      this.logger.debug("Maintenance disabled");
      return;
    }
    this.schedule("sweep", this.config.sweepSchedule);
    this.schedule("consolidate", this.config.consolidateSchedule);
    this.logger.info({ jobs: [...this.scheduled.keys()] }, "Maintenance scheduler started");
  }

  stop(): void {
    for (const [job, cron] of this.scheduled) {
      cron.stop();
      this.logger.debug({ job }, "Stopped maintenance job");
    }
    this.scheduled.clear();
  }

  nextRun(job: MaintenanceJob): Date | null {
    return this.scheduled.get(job)?.nextRun() ?? null;
  }

  async runNow(job: MaintenanceJob): Promise<MaintenanceRun> {
    const startedAt = Date.now();
    let run: MaintenanceRun;
    try {
      const processed = job === "sweep" ? await this.sweep() : await this.consolidateAll();
      run = { job, startedAt, completedAt: Date.now(), success: true, processed };
    } catch (err) {
      run = {
        job,
        startedAt,
        completedAt: Date.now(),
        success: false,
        processed: 0,
        error: err instanceof Error ? err.message : String(err),
      };
    }
    this.logRun(run);
    return run;
  }

  private schedule(job: MaintenanceJob, pattern: string): void {
    this.scheduled.get(job)?.stop();
    const cron = new Cron(pattern, { protect: true }, async () => {
      await this.runNow(job);
    });
    this.scheduled.set(job, cron);
    this.logger.debug({ job, schedule: pattern }, "Scheduled maintenance job");
  }

  private async sweep(): Promise<number> {
    return this.sessions.sweepExpired(Date.now(), this.sessions.ttlDays);
  }

  private async consolidateAll(): Promise<number> {
    const users = await this.memories.listUsers();
    let consolidated = 0;
    for (const userId of users) {
      const report = await this.memories.consolidate(userId);
      if (report) consolidated++;
    }
    return consolidated;
  }

  private logRun(run: MaintenanceRun): void {
    const durationMs = run.completedAt - run.startedAt;
    if (run.success) {
      this.logger.info(
        { job: run.job, durationMs, processed: run.processed },
        "Maintenance job completed",
      );
    } else {
      this.logger.error({ job: run.job, durationMs, error: run.error }, "Maintenance job failed");
    }
  }
}
