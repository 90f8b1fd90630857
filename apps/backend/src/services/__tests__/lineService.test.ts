/// <reference types="vitest" />
/**
 * LineService end to end over an in-memory database: job lifecycle, scan
 * verification, line lock, shift roll-up, live events and state transfer.
 */

import pino from "pino";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { createTestContext, TEST_PIN, type TestContext } from "../../test/testContext";
import {
  ConflictError,
  InvalidInputError,
  InvalidPinError,
  LineLockedError,
  NoActiveJobError,
  NotFoundError,
  PersistenceError,
  RateLimitedError,
  ValidationError,
} from "../../domain/errors";
import { JobLedger } from "../jobLedger";

const HOUR = 60 * 60 * 1000;

describe("LineService", () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = createTestContext();
  });

  afterEach(() => {
    ctx.db.close();
  });

  const scanTimes = async (barcode: string, times: number) => {
    for (let i = 0; i < times; i += 1) {
      await ctx.lineService.processScan(barcode);
    }
  };

  describe("startJob", () => {
    it("generates a job id from the start time", async () => {
      const job = await ctx.lineService.startJob({ expected_barcode: "ABC123" });

      expect(job.job_id).toBe("JOB_20260302_101500");
      expect(job.is_active).toBe(true);
      expect(job.pass_rate).toBe(100);
    });

    it("two concurrent starts → exactly one succeeds", async () => {
      const results = await Promise.allSettled([
        ctx.lineService.startJob({ job_id: "A", expected_barcode: "A1" }),
        ctx.lineService.startJob({ job_id: "B", expected_barcode: "B2" }),
      ]);

      const [first, second] = results;
      expect(first.status).toBe("fulfilled");
      expect(second.status === "rejected" ? second.reason : null).toBeInstanceOf(ConflictError);
      expect(ctx.repo.countJobs()).toBe(1);
    });

    it("invalid input → ValidationError and nothing persisted", async () => {
      await expect(ctx.lineService.startJob({ expected_barcode: "<b>" })).rejects.toBeInstanceOf(ValidationError);
      expect(ctx.repo.countJobs()).toBe(0);
    });
  });

  describe("processScan", () => {
    it("ABC123 scenario: PASS, FAIL locks, scans refused until the PIN clears it", async () => {
      await ctx.lineService.startJob({ expected_barcode: "ABC123", pieces_per_shipper: 2 });

      const pass = await ctx.lineService.processScan("ABC123");
      expect(pass.scan.status).toBe("PASS");
      expect(pass.job.total_pieces).toBe(2);

      const fail = await ctx.lineService.processScan("XYZ");
      expect(fail.scan.status).toBe("FAIL");
      expect(fail.scan.expected).toBe("ABC123");
      expect(fail.lock.state).toBe("LOCKED");
      expect(fail.job).toMatchObject({ total_scans: 2, pass_count: 1, fail_count: 1, total_pieces: 2 });

      await expect(ctx.lineService.processScan("ABC123")).rejects.toBeInstanceOf(LineLockedError);

      await ctx.lineService.verifyPin(TEST_PIN);
      const resumed = await ctx.lineService.processScan("ABC123");

      expect(resumed.job).toMatchObject({ total_scans: 3, pass_count: 2, total_pieces: 4 });
      expect(ctx.recorder.calls).toEqual(["signalPass", "signalFail", "haltLine", "resumeLine", "signalPass"]);
    });

    it("trims the scanned value but otherwise matches exactly", async () => {
      await ctx.lineService.startJob({ expected_barcode: "ABC123" });

      expect((await ctx.lineService.processScan("  ABC123\n")).scan).toMatchObject({ barcode: "ABC123", status: "PASS" });
      expect((await ctx.lineService.processScan("abc123")).scan.status).toBe("FAIL");
    });

    it("empty barcode → InvalidInputError; no job → NoActiveJobError", async () => {
      await expect(ctx.lineService.processScan("   ")).rejects.toBeInstanceOf(InvalidInputError);
      await expect(ctx.lineService.processScan("ABC123")).rejects.toBeInstanceOf(NoActiveJobError);
    });

    it("keeps cached counters equal to the ledger", async () => {
      const job = await ctx.lineService.startJob({ expected_barcode: "OK", pieces_per_shipper: 3 });
      await scanTimes("OK", 4);
      await ctx.lineService.processScan("BAD");

      const cached = ctx.ledger.getActiveJob();
      const stored = ctx.repo.getJob(job.id);
      const ledgerRows = ctx.db
        .prepare<[number], { status: string; n: number }>(
          `SELECT status, COUNT(*) AS n FROM scans WHERE job_id = ? GROUP BY status ORDER BY status`,
        )
        .all(job.id);

      expect(cached).toEqual(stored);
      expect(ledgerRows).toEqual([
        { status: "FAIL", n: 1 },
        { status: "PASS", n: 4 },
      ]);
      expect(cached).toMatchObject({ total_scans: 5, pass_count: 4, fail_count: 1, total_pieces: 12 });
    });

    it("recent scans window holds the last 8, newest first", async () => {
      await ctx.lineService.startJob({ expected_barcode: "OK" });
      await scanTimes("OK", 10);

      const { recent_scans } = ctx.lineService.getStatus();

      expect(recent_scans).toHaveLength(8);
      expect(recent_scans.map((s) => s.id)).toEqual([10, 9, 8, 7, 6, 5, 4, 3]);
    });

    it("counts PASS scans into this hour, then into the previous hour", async () => {
      await ctx.lineService.startJob({ expected_barcode: "OK", pieces_per_shipper: 2 });
      await scanTimes("OK", 2);

      expect(ctx.lineService.getStatus().active_job?.this_hour).toEqual({ shippers: 2, pieces: 4 });

      ctx.clock.advance(HOUR);
      const view = ctx.lineService.getStatus().active_job;

      expect(view?.this_hour).toEqual({ shippers: 0, pieces: 0 });
      expect(view?.prev_hour).toEqual({ shippers: 2, pieces: 4 });
    });

    it("a persistence failure changes nothing and the line keeps working", async () => {
      await ctx.lineService.startJob({ expected_barcode: "OK" });
      const sub = ctx.lineService.subscribe();
      ctx.db.exec(`CREATE TRIGGER fail_scan BEFORE INSERT ON scans BEGIN SELECT RAISE(ABORT, 'disk full'); END;`);

      await expect(ctx.lineService.processScan("OK")).rejects.toBeInstanceOf(PersistenceError);
      expect(ctx.ledger.getActiveJob()?.total_scans).toBe(0);
      expect(ctx.recorder.calls).toEqual([]);
      expect(sub.size).toBe(0);

      ctx.db.exec(`DROP TRIGGER fail_scan`);
      expect((await ctx.lineService.processScan("OK")).job.total_scans).toBe(1);
    });

    it("a faulty relay never fails the scan", async () => {
      await ctx.lineService.startJob({ expected_barcode: "OK" });
      ctx.recorder.failOn = "signalFail";

      const outcome = await ctx.lineService.processScan("NOPE");

      expect(outcome.scan.status).toBe("FAIL");
      expect(outcome.lock.state).toBe("LOCKED");
      expect(ctx.recorder.calls).toEqual(["signalFail", "haltLine"]);
    });
  });

  describe("PIN handling", () => {
    it("verifyPin and endJob share one attempt counter", async () => {
      await ctx.lineService.startJob({ expected_barcode: "OK" });
      await ctx.lineService.processScan("NOPE");

      for (let i = 0; i < 3; i += 1) {
        await expect(ctx.lineService.verifyPin("0000")).rejects.toBeInstanceOf(InvalidPinError);
      }
      await expect(ctx.lineService.endJob("0000")).rejects.toBeInstanceOf(InvalidPinError);
      await expect(ctx.lineService.endJob("0000")).rejects.toBeInstanceOf(InvalidPinError);

      await expect(ctx.lineService.verifyPin(TEST_PIN)).rejects.toBeInstanceOf(RateLimitedError);

      ctx.clock.advance(15 * 60 * 1000);
      expect((await ctx.lineService.verifyPin(TEST_PIN)).state).toBe("UNLOCKED");
    });
  });

  describe("endJob", () => {
    it("rolls 9 PASS of 10 scans into today's shift as 9 shippers", async () => {
      await ctx.lineService.startJob({ expected_barcode: "OK", pieces_per_shipper: 4 });
      await scanTimes("OK", 9);
      await ctx.lineService.processScan("NOPE");
      ctx.clock.advance(30 * 60 * 1000);

      const result = await ctx.lineService.endJob(TEST_PIN);

      expect(result.summary).toEqual({
        job_id: "JOB_20260302_101500",
        total_scans: 10,
        total_pieces: 36,
        pass_count: 9,
        fail_count: 1,
        pass_rate: 90,
        elapsed_ms: 30 * 60 * 1000,
        elapsed: "00:30:00",
      });
      expect(result.shift).toEqual({
        date: "2026-03-02",
        total_shippers: 9,
        total_pieces: 36,
        total_pass: 9,
        total_fail: 1,
        jobs_completed: 1,
      });
      expect(result.job.is_active).toBe(false);
      expect(ctx.lineService.getStatus().active_job).toBeNull();
      expect(ctx.lineService.getStatus().lock.state).toBe("UNLOCKED");
      expect(ctx.recorder.calls.at(-1)).toBe("allOff");
    });

    it("no active job → NotFoundError without spending a PIN attempt", async () => {
      await expect(ctx.lineService.endJob(TEST_PIN)).rejects.toBeInstanceOf(NotFoundError);
      await expect(ctx.lineService.endJob("0000")).rejects.toBeInstanceOf(NotFoundError);

      expect(ctx.lineService.getStatus().lock.failed_pin_attempts).toBe(0);
    });

    it("wrong PIN leaves the job running", async () => {
      await ctx.lineService.startJob({ expected_barcode: "OK" });

      await expect(ctx.lineService.endJob("0000")).rejects.toBeInstanceOf(InvalidPinError);
      expect(ctx.lineService.getStatus().active_job?.is_active).toBe(true);
    });

    it("a new job may start once the previous one ended", async () => {
      await ctx.lineService.startJob({ job_id: "FIRST", expected_barcode: "OK" });
      await ctx.lineService.endJob(TEST_PIN);

      const next = await ctx.lineService.startJob({ job_id: "SECOND", expected_barcode: "OK" });

      expect(next.job_id).toBe("SECOND");
      expect(ctx.lineService.listJobs(1, 20).total).toBe(2);
    });

    it("second generated start in the same second → suffixed job id", async () => {
      await ctx.lineService.startJob({ expected_barcode: "OK" });
      await ctx.lineService.endJob(TEST_PIN);
      const second = await ctx.lineService.startJob({ expected_barcode: "OK" });
      await ctx.lineService.endJob(TEST_PIN);
      const third = await ctx.lineService.startJob({ expected_barcode: "OK" });

      expect(second.job_id).toBe("JOB_20260302_101500_2");
      expect(third.job_id).toBe("JOB_20260302_101500_3");
    });

    it("reusing an ended job's id → ConflictError and nothing persisted", async () => {
      await ctx.lineService.startJob({ job_id: "X", expected_barcode: "OK" });
      await ctx.lineService.endJob(TEST_PIN);

      await expect(ctx.lineService.startJob({ job_id: "X", expected_barcode: "OK" })).rejects.toThrow(
        "Job ID X is already in use",
      );
      expect(ctx.lineService.listJobs(1, 20).total).toBe(1);
      expect(ctx.lineService.getStatus().active_job).toBeNull();
    });
  });

  describe("PIN lockout on a running line", () => {
    beforeEach(async () => {
      await ctx.lineService.startJob({ expected_barcode: "OK" });
      for (let i = 0; i < 5; i += 1) {
        await expect(ctx.lineService.endJob("0000")).rejects.toBeInstanceOf(InvalidPinError);
      }
    });

    it("scans still pass without halting the line", async () => {
      const result = await ctx.lineService.processScan("OK");

      expect(result.scan.status).toBe("PASS");
      expect(ctx.lineService.getStatus().lock.state).toBe("PIN_LOCKED_OUT");
      expect(ctx.recorder.calls).toEqual(["signalPass"]);
    });

    it("a malformed PIN is rate limited rather than rejected as invalid", async () => {
      await expect(ctx.lineService.endJob("12")).rejects.toBeInstanceOf(RateLimitedError);
    });
  });

  describe("live events", () => {
    it("publishes every change in commit order with consecutive seq", async () => {
      const sub = ctx.lineService.subscribe({ name: "test" });

      await ctx.lineService.startJob({ expected_barcode: "OK" });
      await ctx.lineService.processScan("OK");
      await ctx.lineService.processScan("NOPE");
      await ctx.lineService.verifyPin(TEST_PIN);
      await ctx.lineService.endJob(TEST_PIN);

      const events = sub.drain();
      expect(events.map((e) => [e.seq, e.kind])).toEqual([
        [1, "job_started"],
        [2, "scan"],
        [3, "scan"],
        [4, "line_lock"],
        [5, "line_lock"],
        [6, "job_ended"],
      ]);
      expect(ctx.lineService.getStatus().feed_seq).toBe(6);
    });

    it("rejected operations publish nothing", async () => {
      const sub = ctx.lineService.subscribe();

      await expect(ctx.lineService.processScan("OK")).rejects.toBeInstanceOf(NoActiveJobError);

      expect(sub.size).toBe(0);
    });
  });

  describe("hourly stats", () => {
    it("reports shift hours from the aggregate buckets", async () => {
      await ctx.lineService.startJob({ expected_barcode: "OK", pieces_per_shipper: 2 });
      await scanTimes("OK", 2);

      const stats = ctx.lineService.getHourlyStats();

      expect(stats.date).toBe("2026-03-02");
      expect(stats.hours).toHaveLength(13);
      expect(stats.hours.find((h) => h.hour === 10)).toEqual({
        hour: 10,
        label: "10:00",
        shippers: 2,
        pieces: 4,
        cumulative_pieces: 4,
      });
      expect(stats.hours.at(-1)?.cumulative_pieces).toBe(4);
    });
  });

  describe("shift rollover", () => {
    it("announces the new day once", async () => {
      const sub = ctx.lineService.subscribe();
      ctx.clock.set(new Date(2026, 2, 3, 0, 0, 30).getTime());

      expect(await ctx.lineService.checkShiftRollover()).toBe(true);
      expect(await ctx.lineService.checkShiftRollover()).toBe(false);

      const events = sub.drain();
      expect(events).toHaveLength(1);
      const [event] = events;
      expect(event.kind === "shift_update" ? event.payload.shift : null).toEqual({
        date: "2026-03-03",
        total_shippers: 0,
        total_pieces: 0,
        total_pass: 0,
        total_fail: 0,
        jobs_completed: 0,
      });
    });
  });

  describe("state transfer", () => {
    it("export → import into a fresh line reproduces the same state", async () => {
      await ctx.lineService.startJob({ job_id: "DONE", expected_barcode: "OK", pieces_per_shipper: 2 });
      await scanTimes("OK", 3);
      await ctx.lineService.endJob(TEST_PIN);
      await ctx.lineService.startJob({ job_id: "LIVE", expected_barcode: "OK" });
      await scanTimes("OK", 2);
      const dump = await ctx.lineService.exportState();

      const fresh = createTestContext();
      const sub = fresh.lineService.subscribe();
      const status = await fresh.lineService.importState(JSON.parse(JSON.stringify(dump)));

      expect(await fresh.lineService.exportState()).toEqual(dump);
      expect(status.active_job?.job_id).toBe("LIVE");
      expect(status.recent_scans.map((s) => s.id)).toEqual([5, 4]);
      expect(status.shift.total_shippers).toBe(3);
      expect(sub.drain().map((e) => e.kind)).toEqual(["state_restored"]);

      await expect(fresh.lineService.startJob({ expected_barcode: "OK" })).rejects.toBeInstanceOf(ConflictError);
      fresh.db.close();
    });

    it("an invalid dump is refused and nothing changes", async () => {
      await ctx.lineService.startJob({ job_id: "KEEP", expected_barcode: "OK" });

      await expect(ctx.lineService.importState({ version: 1, jobs: "nope" })).rejects.toBeInstanceOf(ValidationError);
      expect(ctx.lineService.getStatus().active_job?.job_id).toBe("KEEP");
    });

    it("a dump with repeated scan ids → ValidationError, not a storage failure", async () => {
      await ctx.lineService.startJob({ job_id: "KEEP", expected_barcode: "OK" });
      await scanTimes("OK", 2);
      const dump = await ctx.lineService.exportState();

      await expect(
        ctx.lineService.importState({ ...dump, scans: dump.scans.map((scan) => ({ ...scan, id: 1 })) }),
      ).rejects.toThrow("Duplicate scan id 1");
      expect(ctx.lineService.getStatus().active_job?.total_scans).toBe(2);
    });

    it("a dump with two active jobs is refused", async () => {
      const dump = await ctx.lineService.exportState();
      const job = {
        id: 1,
        job_id: "A",
        expected_barcode: "OK",
        pieces_per_shipper: 1,
        target_quantity: 0,
        start_time: 0,
        end_time: null,
        is_active: true,
        total_scans: 0,
        pass_count: 0,
        fail_count: 0,
        total_pieces: 0,
      };

      await expect(
        ctx.lineService.importState({ ...dump, jobs: [job, { ...job, id: 2, job_id: "B" }] }),
      ).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe("restart", () => {
    it("a fresh ledger over the same database resumes the active job", async () => {
      await ctx.lineService.startJob({ job_id: "RESUME", expected_barcode: "OK", pieces_per_shipper: 5 });
      await scanTimes("OK", 3);

      const ledger = new JobLedger(ctx.repo, ctx.clock, pino({ level: "silent" }), {
        recentScansWindow: 8,
        shiftStartHour: 8,
        shiftEndHour: 20,
      });
      ledger.load();

      expect(ledger.getActiveJob()).toEqual(ctx.ledger.getActiveJob());
      expect(ledger.recentScans()).toEqual(ctx.ledger.recentScans());
      expect(ledger.activeJobView()?.this_hour).toEqual({ shippers: 3, pieces: 15 });
    });
  });
});
