import { previousHourSlotOf, hourSlotOf, toIso, type HourSlot } from "../platform/clock";

export type ScanStatus = "PASS" | "FAIL";

export interface HourBucket {
  shippers: number;
  pieces: number;
}

export interface Job {
  id: number;
  job_id: string;
  expected_barcode: string;
  pieces_per_shipper: number;
  target_quantity: number;
  start_time: number;
  end_time: number | null;
  is_active: boolean;
  total_scans: number;
  pass_count: number;
  fail_count: number;
  total_pieces: number;
}

export interface Scan {
  id: number;
  job_id: number;
  barcode: string;
  expected: string;
  status: ScanStatus;
  timestamp: number;
}

export interface ScanView extends Omit<Scan, "timestamp"> {
  timestamp: string;
}

export interface JobView extends Omit<Job, "start_time" | "end_time"> {
  start_time: string;
  end_time: string | null;
  pass_rate: number;
  elapsed_ms: number;
  elapsed: string;
  this_hour: HourBucket;
  prev_hour: HourBucket;
}

export interface JobSummary {
  job_id: string;
  total_scans: number;
  total_pieces: number;
  pass_count: number;
  fail_count: number;
  pass_rate: number;
  elapsed_ms: number;
  elapsed: string;
}

export type HourBuckets = ReadonlyMap<string, HourBucket>;

const EMPTY_BUCKET: HourBucket = { shippers: 0, pieces: 0 };

export const bucketKey = (slot: HourSlot): string => `${slot.date}T${String(slot.hour).padStart(2, "0")}`;

/** Percentage of PASS scans; 100 when nothing has been scanned yet. */
export const passRate = (job: Pick<Job, "total_scans" | "pass_count">): number =>
  job.total_scans === 0 ? 100 : (job.pass_count / job.total_scans) * 100;

export const roundRate = (rate: number): number => Math.round(rate * 10) / 10;

export const elapsedMs = (job: Pick<Job, "start_time" | "end_time">, now: number): number =>
  Math.max(0, (job.end_time ?? now) - job.start_time);

export const formatElapsed = (ms: number): string => {
  const totalSeconds = Math.floor(Math.max(0, ms) / 1000);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  return [hours, minutes, seconds].map((part) => String(part).padStart(2, "0")).join(":");
};

export const hourWindow = (buckets: HourBuckets, now: number): { this_hour: HourBucket; prev_hour: HourBucket } => ({
  this_hour: { ...(buckets.get(bucketKey(hourSlotOf(now))) ?? EMPTY_BUCKET) },
  prev_hour: { ...(buckets.get(bucketKey(previousHourSlotOf(now))) ?? EMPTY_BUCKET) },
});

export const toJobView = (job: Job, buckets: HourBuckets, now: number): JobView => {
  const elapsed = elapsedMs(job, now);
  return {
    ...job,
    start_time: toIso(job.start_time),
    end_time: job.end_time === null ? null : toIso(job.end_time),
    pass_rate: roundRate(passRate(job)),
    elapsed_ms: elapsed,
    elapsed: formatElapsed(elapsed),
    ...hourWindow(buckets, now),
  };
};

export const toScanView = (scan: Scan): ScanView => ({ ...scan, timestamp: toIso(scan.timestamp) });

export const summarizeJob = (job: Job, now: number): JobSummary => {
  const elapsed = elapsedMs(job, now);
  return {
    job_id: job.job_id,
    total_scans: job.total_scans,
    total_pieces: job.total_pieces,
    pass_count: job.pass_count,
    fail_count: job.fail_count,
    pass_rate: roundRate(passRate(job)),
    elapsed_ms: elapsed,
    elapsed: formatElapsed(elapsed),
  };
};

/** PASS iff the scanned value is exactly the expected barcode. */
export const classifyScan = (barcode: string, expected: string): ScanStatus =>
  barcode === expected ? "PASS" : "FAIL";
