import { z } from "zod";
import { expectedBarcodeSchema, jobIdTextSchema } from "./validation";

export const STATE_DUMP_VERSION = 1;

const count = z.number().int().min(0);
const epochMs = z.number().int().min(0);
const hour = z.number().int().min(0).max(23);
const dateKey = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Expected YYYY-MM-DD");

const jobRow = z.object({
  id: z.number().int().positive(),
  job_id: jobIdTextSchema.refine((value) => value.length > 0, "Job ID cannot be empty"),
  expected_barcode: expectedBarcodeSchema,
  pieces_per_shipper: z.number().int().min(1),
  target_quantity: count,
  start_time: epochMs,
  end_time: epochMs.nullable(),
  is_active: z.boolean(),
  total_scans: count,
  pass_count: count,
  fail_count: count,
  total_pieces: count,
});

const scanRow = z.object({
  id: z.number().int().positive(),
  job_id: z.number().int().positive(),
  barcode: z.string(),
  expected: z.string(),
  status: z.enum(["PASS", "FAIL"]),
  timestamp: epochMs,
});

const shiftRow = z.object({
  date: dateKey,
  total_shippers: count,
  total_pieces: count,
  total_pass: count,
  total_fail: count,
  jobs_completed: count,
});

const shiftHourRow = z.object({ date: dateKey, hour, shippers: count, pieces: count });
const jobHourRow = shiftHourRow.extend({ job_id: z.number().int().positive() });

/** Reports the first repeated key only. */
function firstDuplicate<T>(rows: T[], keyOf: (row: T) => string, report: (index: number, key: string) => void): void {
  const seen = new Set<string>();
  for (const [index, row] of rows.entries()) {
    const key = keyOf(row);
    if (seen.has(key)) {
      report(index, key);
      return;
    }
    seen.add(key);
  }
}

export const lineStateDumpSchema = z
  .object({
    version: z.literal(STATE_DUMP_VERSION),
    exported_at: z.string(),
    jobs: z.array(jobRow),
    scans: z.array(scanRow),
    shift_stats: z.array(shiftRow),
    shift_hour_buckets: z.array(shiftHourRow),
    job_hour_buckets: z.array(jobHourRow),
  })
  .superRefine((dump, ctx) => {
    const issue = (path: (string | number)[], message: string) =>
      ctx.addIssue({ code: z.ZodIssueCode.custom, path, message });

    if (dump.jobs.filter((job) => job.is_active).length > 1) {
      issue(["jobs"], "At most one job may be active");
    }
    const jobIds = new Set(dump.jobs.map((job) => job.id));
    if (jobIds.size !== dump.jobs.length) {
      issue(["jobs"], "Duplicate job id");
    }
    firstDuplicate(dump.jobs, (job) => job.job_id, (index, key) => issue(["jobs", index, "job_id"], `Duplicate job ID ${key}`));
    firstDuplicate(dump.scans, (scan) => String(scan.id), (index, key) => issue(["scans", index, "id"], `Duplicate scan id ${key}`));
    firstDuplicate(dump.shift_stats, (shift) => shift.date, (index, key) =>
      issue(["shift_stats", index, "date"], `Duplicate shift date ${key}`),
    );
    firstDuplicate(dump.shift_hour_buckets, (b) => `${b.date} ${b.hour}`, (index, key) =>
      issue(["shift_hour_buckets", index], `Duplicate shift hour ${key}`),
    );
    firstDuplicate(dump.job_hour_buckets, (b) => `${b.job_id} ${b.date} ${b.hour}`, (index, key) =>
      issue(["job_hour_buckets", index], `Duplicate job hour ${key}`),
    );

    const ledger = new Map<number, { pass: number; fail: number }>();
    dump.scans.forEach((scan, index) => {
      if (!jobIds.has(scan.job_id)) {
        issue(["scans", index, "job_id"], `Scan references unknown job ${scan.job_id}`);
        return;
      }
      const tally = ledger.get(scan.job_id) ?? { pass: 0, fail: 0 };
      if (scan.status === "PASS") tally.pass += 1;
      else tally.fail += 1;
      ledger.set(scan.job_id, tally);
    });
    dump.job_hour_buckets.forEach((bucket, index) => {
      if (!jobIds.has(bucket.job_id)) {
        issue(["job_hour_buckets", index, "job_id"], `Bucket references unknown job ${bucket.job_id}`);
      }
    });

    // Counters must agree with each other and with the scan ledger.
    dump.jobs.forEach((job, index) => {
      if (job.total_scans !== job.pass_count + job.fail_count) {
        issue(["jobs", index, "total_scans"], `Job ${job.job_id}: total_scans must equal pass_count + fail_count`);
      }
      if (job.total_pieces !== job.pass_count * job.pieces_per_shipper) {
        issue(
          ["jobs", index, "total_pieces"],
          `Job ${job.job_id}: total_pieces must equal pass_count * pieces_per_shipper`,
        );
      }
      const tally = ledger.get(job.id) ?? { pass: 0, fail: 0 };
      if (tally.pass !== job.pass_count || tally.fail !== job.fail_count) {
        issue(["jobs", index], `Job ${job.job_id}: counters do not match its ${tally.pass + tally.fail} scans`);
      }
    });
  });

export type LineStateDump = z.infer<typeof lineStateDumpSchema>;
