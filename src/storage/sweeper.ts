import type { CleanupConfig } from "../config/index.js";
import type { CleanupResult, DeleteResult, FileRecord, ReconcileResult } from "./types.js";

const DAY_MS = 86_400_000;
const HOUR_MS = 3_600_000;

export type SweepState = "idle" | "scanning" | "deleting";

/** What the sweeper needs from the storage layer. */
export interface SweepTarget {
  candidates(uploadedBefore: Date): AsyncIterable<FileRecord>;
  delete(filePath: string): Promise<DeleteResult>;
}

/**
 * Deletes records (and their files) older than a threshold.
 * Idle → Scanning → Deleting → Idle; one failing item never stops the sweep.
 * A sweep requested while another runs waits for it, then runs with its own
 * threshold.
 */
export class RetentionSweeper {
  private target: SweepTarget;
  private clock: () => Date;
  private _state: SweepState = "idle";
  private tail: Promise<void> = Promise.resolve();

  constructor(target: SweepTarget, clock: () => Date = () => new Date()) {
    this.target = target;
    this.clock = clock;
  }

  get state(): SweepState {
    return this._state;
  }

  sweep(days: number, signal?: AbortSignal): Promise<CleanupResult> {
    const run = this.tail.then(() => this.run(days, signal));
    // failures reach the caller through `run`; the queue only tracks completion
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async run(days: number, signal: AbortSignal | undefined): Promise<CleanupResult> {
    const result: CleanupResult = { deleted_count: 0, failed_count: 0, freed_bytes: 0 };
    const cutoff = new Date(this.clock().getTime() - days * DAY_MS);

    try {
      this._state = "scanning";
      const candidates: string[] = [];
      for await (const record of this.target.candidates(cutoff)) {
        if (signal?.aborted) return result;
        candidates.push(record.file_path);
      }

      this._state = "deleting";
      for (const filePath of candidates) {
        if (signal?.aborted) break;
        try {
          const res = await this.target.delete(filePath);
          if (res.deleted) {
            result.deleted_count++;
            result.freed_bytes += res.freed_bytes;
          }
        } catch (err) {
          result.failed_count++;
          console.error(`ERROR: cleanup of ${filePath}:`, err);
        }
      }
      return result;
    } finally {
      this._state = "idle";
    }
  }
}

/** The operations a scheduled run performs. */
export interface MaintenanceTarget {
  cleanup(days?: number, signal?: AbortSignal): Promise<CleanupResult>;
  reconcile(signal?: AbortSignal): Promise<ReconcileResult>;
}

// RetentionScheduler runs cleanup followed by reconcile on a fixed interval.
export class RetentionScheduler {
  private target: MaintenanceTarget;
  private cfg: CleanupConfig;
  private timer: ReturnType<typeof setInterval> | null = null;
  private abort: AbortController | null = null;
  private running: Promise<void> | null = null;

  constructor(target: MaintenanceTarget, cfg: CleanupConfig) {
    this.target = target;
    this.cfg = cfg;
  }

  get started(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) return;
    const intervalMs = Math.max(this.cfg.interval_hours, 1) * HOUR_MS;
    this.abort = new AbortController();
    this.timer = setInterval(() => {
      this.tick().catch((err) => {
        console.error("ERROR: retention scheduler:", err);
      });
    }, intervalMs);
    this.timer.unref();
    console.log(
      `Retention scheduler started (every ${Math.max(this.cfg.interval_hours, 1)}h, older than ${this.cfg.older_than_days}d)`,
    );
  }

  /** Clears the timer and lets an in-flight run finish its current item. */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      console.log("Retention scheduler stopped");
    }
    this.abort?.abort();
    this.abort = null;
    if (this.running) {
      await this.running;
    }
  }

  /** One scheduled run. Overlapping ticks are skipped. */
  async tick(): Promise<void> {
    if (this.running) {
      console.warn("WARN: retention run still in progress, skipping tick");
      return;
    }
    const signal = this.abort?.signal;
    this.running = this.run(signal);
    try {
      await this.running;
    } finally {
      this.running = null;
    }
  }

  private async run(signal: AbortSignal | undefined): Promise<void> {
    const cleaned = await this.target.cleanup(this.cfg.older_than_days, signal);
    console.log(
      `Retention cleanup: ${cleaned.deleted_count} deleted, ${cleaned.failed_count} failed, ${cleaned.freed_bytes} bytes freed`,
    );
    if (signal?.aborted) return;
    const healed = await this.target.reconcile(signal);
    if (healed.orphan_records > 0 || healed.orphan_files > 0) {
      console.log(
        `Reconcile: ${healed.orphan_records} orphan records, ${healed.orphan_files} orphan files removed`,
      );
    }
  }
}
