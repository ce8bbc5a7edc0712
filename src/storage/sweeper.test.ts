import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { RetentionScheduler, RetentionSweeper, type MaintenanceTarget, type SweepTarget } from "./sweeper.js";
import type { CleanupResult, DeleteResult, FileRecord, ReconcileResult } from "./types.js";

const NOW = new Date("2026-06-01T00:00:00.000Z");
const DAY_MS = 86_400_000;

function rec(filePath: string, ageDays: number, size = 10): FileRecord {
  return {
    file_id: filePath,
    original_filename: filePath,
    stored_filename: filePath,
    service: "web",
    folder: "general",
    file_path: filePath,
    file_size: size,
    file_hash: "0".repeat(64),
    mime_type: "text/plain",
    user_id: null,
    thumbnail_path: null,
    uploaded_at: new Date(NOW.getTime() - ageDays * DAY_MS),
    expires_at: null,
  };
}

class FakeTarget implements SweepTarget {
  records: FileRecord[];
  deleted: string[] = [];
  failOn = new Set<string>();
  cutoffs: Date[] = [];
  onDelete: (filePath: string) => void = () => {};

  constructor(records: FileRecord[]) {
    this.records = records;
  }

  async *candidates(before: Date): AsyncIterable<FileRecord> {
    this.cutoffs.push(before);
    for (const r of this.records) {
      if (r.uploaded_at < before) yield r;
    }
  }

  async delete(filePath: string): Promise<DeleteResult> {
    this.onDelete(filePath);
    if (this.failOn.has(filePath)) throw new Error(`disk error on ${filePath}`);
    const r = this.records.find((x) => x.file_path === filePath);
    if (!r) return { deleted: false, freed_bytes: 0 };
    this.records = this.records.filter((x) => x !== r);
    this.deleted.push(filePath);
    return { deleted: true, freed_bytes: r.file_size };
  }
}

describe("RetentionSweeper", () => {
  it("deletes only records older than the threshold", async () => {
    const target = new FakeTarget([rec("old", 40, 100), rec("mid", 20), rec("new", 1)]);
    const sweeper = new RetentionSweeper(target, () => NOW);

    const result = await sweeper.sweep(30);

    assert.deepEqual(result, { deleted_count: 1, failed_count: 0, freed_bytes: 100 });
    assert.deepEqual(target.deleted, ["old"]);
    assert.equal(target.cutoffs[0].toISOString(), "2026-05-02T00:00:00.000Z");
    assert.equal(sweeper.state, "idle");
  });

  it("counts a failing item and carries on", async () => {
    const target = new FakeTarget([rec("a", 50), rec("b", 50), rec("c", 50)]);
    target.failOn.add("b");
    const sweeper = new RetentionSweeper(target, () => NOW);

    const result = await sweeper.sweep(30);

    assert.deepEqual(result, { deleted_count: 2, failed_count: 1, freed_bytes: 20 });
    assert.deepEqual(target.deleted, ["a", "c"]);
  });

  it("does not count items that vanished before deletion", async () => {
    const target = new FakeTarget([rec("a", 50), rec("b", 50)]);
    target.onDelete = (p) => {
      if (p === "a") target.records = target.records.filter((r) => r.file_path !== "b");
    };
    const result = await new RetentionSweeper(target, () => NOW).sweep(30);
    assert.deepEqual(result, { deleted_count: 1, failed_count: 0, freed_bytes: 10 });
  });

  it("runs a sweep requested mid-sweep after the first, with its own threshold", async () => {
    const target = new FakeTarget([rec("a", 50, 100), rec("b", 10)]);
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const original = target.delete.bind(target);
    target.delete = async (p) => {
      await gate;
      return original(p);
    };
    const sweeper = new RetentionSweeper(target, () => NOW);

    const first = sweeper.sweep(30);
    await new Promise((resolve) => setImmediate(resolve));
    assert.equal(sweeper.state, "deleting");
    const second = sweeper.sweep(0);
    await new Promise((resolve) => setImmediate(resolve));
    assert.deepEqual(target.cutoffs.length, 1);

    release();
    assert.deepEqual(await first, { deleted_count: 1, failed_count: 0, freed_bytes: 100 });
    assert.deepEqual(await second, { deleted_count: 1, failed_count: 0, freed_bytes: 10 });
    assert.deepEqual(target.deleted, ["a", "b"]);
    assert.equal(sweeper.state, "idle");
  });

  it("keeps accepting sweeps after one fails", async () => {
    const target = new FakeTarget([rec("a", 50)]);
    const healthy = target.candidates.bind(target);
    let broken = true;
    target.candidates = (before) => {
      if (broken) {
        broken = false;
        throw new Error("database unavailable");
      }
      return healthy(before);
    };
    const sweeper = new RetentionSweeper(target, () => NOW);

    const failed = sweeper.sweep(30);
    const next = sweeper.sweep(30);
    await assert.rejects(failed, /database unavailable/);
    assert.equal((await next).deleted_count, 1);
    assert.equal(sweeper.state, "idle");
  });

  it("stops between items once aborted", async () => {
    const target = new FakeTarget([rec("a", 50), rec("b", 50), rec("c", 50)]);
    const ac = new AbortController();
    target.onDelete = (p) => {
      if (p === "a") ac.abort();
    };
    const result = await new RetentionSweeper(target, () => NOW).sweep(30, ac.signal);
    assert.deepEqual(result, { deleted_count: 1, failed_count: 0, freed_bytes: 10 });
    assert.deepEqual(target.deleted, ["a"]);
  });
});

describe("RetentionScheduler", () => {
  class FakeMaintenance implements MaintenanceTarget {
    calls: string[] = [];
    gate: Promise<void> = Promise.resolve();

    async cleanup(days?: number): Promise<CleanupResult> {
      this.calls.push(`cleanup:${days}`);
      await this.gate;
      return { deleted_count: 0, failed_count: 0, freed_bytes: 0 };
    }

    async reconcile(): Promise<ReconcileResult> {
      this.calls.push("reconcile");
      return { orphan_records: 0, orphan_files: 0 };
    }
  }

  const cfg = { enabled: true, older_than_days: 30, interval_hours: 24, orphan_grace_minutes: 60 };

  it("runs cleanup then reconcile on each tick", async () => {
    const target = new FakeMaintenance();
    const scheduler = new RetentionScheduler(target, cfg);
    await scheduler.tick();
    assert.deepEqual(target.calls, ["cleanup:30", "reconcile"]);
  });

  it("skips a tick while the previous run is still going", async () => {
    const target = new FakeMaintenance();
    let release: () => void = () => {};
    target.gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const scheduler = new RetentionScheduler(target, cfg);

    const first = scheduler.tick();
    await scheduler.tick();
    release();
    await first;

    assert.deepEqual(target.calls, ["cleanup:30", "reconcile"]);
  });

  it("starts once and stops cleanly", async () => {
    const scheduler = new RetentionScheduler(new FakeMaintenance(), cfg);
    assert.equal(scheduler.started, false);
    scheduler.start();
    scheduler.start();
    assert.equal(scheduler.started, true);
    await scheduler.stop();
    assert.equal(scheduler.started, false);
  });
});
