/// <reference types="vitest" />
/**
 * State dump validation: row shapes plus the cross-row rules a restore relies on.
 */

import { describe, it, expect } from "vitest";
import { lineStateDumpSchema, type LineStateDump } from "../stateDump";
import { parseOrThrow } from "../validation";
import { ValidationError } from "../errors";

const job = {
  id: 1,
  job_id: "A",
  expected_barcode: "OK",
  pieces_per_shipper: 2,
  target_quantity: 0,
  start_time: 0,
  end_time: null,
  is_active: true,
  total_scans: 2,
  pass_count: 1,
  fail_count: 1,
  total_pieces: 2,
};

const validDump = (): LineStateDump => ({
  version: 1,
  exported_at: "2026-03-02T10:30:00.000Z",
  jobs: [{ ...job }],
  scans: [
    { id: 1, job_id: 1, barcode: "OK", expected: "OK", status: "PASS", timestamp: 1000 },
    { id: 2, job_id: 1, barcode: "NO", expected: "OK", status: "FAIL", timestamp: 2000 },
  ],
  shift_stats: [
    { date: "2026-03-02", total_shippers: 0, total_pieces: 0, total_pass: 0, total_fail: 0, jobs_completed: 0 },
  ],
  shift_hour_buckets: [{ date: "2026-03-02", hour: 10, shippers: 1, pieces: 2 }],
  job_hour_buckets: [{ job_id: 1, date: "2026-03-02", hour: 10, shippers: 1, pieces: 2 }],
});

const messageOf = (input: unknown): string => {
  try {
    parseOrThrow(lineStateDumpSchema, input);
  } catch (error) {
    if (error instanceof ValidationError) return error.message;
    throw error;
  }
  throw new Error("expected a ValidationError");
};

describe("lineStateDumpSchema", () => {
  it("accepts a consistent dump", () => {
    expect(parseOrThrow(lineStateDumpSchema, validDump())).toEqual(validDump());
  });

  it("applies the job start rules to job rows", () => {
    const dump = validDump();

    expect(messageOf({ ...dump, jobs: [{ ...job, expected_barcode: "<script>" }] })).toBe(
      "Barcode contains invalid characters",
    );
    expect(messageOf({ ...dump, jobs: [{ ...job, job_id: "<script>" }] })).toBe("Job ID contains invalid characters");
    expect(messageOf({ ...dump, jobs: [{ ...job, job_id: "  " }] })).toBe("Job ID cannot be empty");
  });

  it("total_scans ≠ pass + fail → refused", () => {
    expect(messageOf({ ...validDump(), jobs: [{ ...job, total_scans: 3 }] })).toBe(
      "Job A: total_scans must equal pass_count + fail_count",
    );
  });

  it("total_pieces ≠ pass × pieces_per_shipper → refused", () => {
    expect(messageOf({ ...validDump(), jobs: [{ ...job, total_pieces: 4 }] })).toBe(
      "Job A: total_pieces must equal pass_count * pieces_per_shipper",
    );
  });

  it("counters that disagree with the scan rows → refused", () => {
    const dump = validDump();

    expect(messageOf({ ...dump, scans: dump.scans.slice(0, 1) })).toBe("Job A: counters do not match its 1 scans");
  });

  it("duplicate scan ids → refused", () => {
    const dump = validDump();

    expect(messageOf({ ...dump, scans: dump.scans.map((scan) => ({ ...scan, id: 7 })) })).toBe("Duplicate scan id 7");
  });

  it("duplicate shift dates → refused", () => {
    const dump = validDump();

    expect(messageOf({ ...dump, shift_stats: [...dump.shift_stats, ...dump.shift_stats] })).toBe(
      "Duplicate shift date 2026-03-02",
    );
  });

  it("duplicate hour buckets → refused", () => {
    const dump = validDump();

    expect(messageOf({ ...dump, shift_hour_buckets: [...dump.shift_hour_buckets, ...dump.shift_hour_buckets] })).toBe(
      "Duplicate shift hour 2026-03-02 10",
    );
    expect(messageOf({ ...dump, job_hour_buckets: [...dump.job_hour_buckets, ...dump.job_hour_buckets] })).toBe(
      "Duplicate job hour 1 2026-03-02 10",
    );
  });

  it("two jobs sharing a job ID → refused", () => {
    const ended = {
      ...job,
      id: 2,
      is_active: false,
      end_time: 5000,
      total_scans: 0,
      pass_count: 0,
      fail_count: 0,
      total_pieces: 0,
    };

    expect(messageOf({ ...validDump(), jobs: [{ ...job }, ended] })).toBe("Duplicate job ID A");
  });
});
