import type { Logger } from "pino";
import type { Clock } from "../platform/clock";
import { compactStamp, dateKeyOf, hourSlotOf, toIso } from "../platform/clock";
import {
  bucketKey,
  summarizeJob,
  toJobView,
  toScanView,
  type HourBucket,
  type Job,
  type JobSummary,
  type JobView,
  type Scan,
  type ScanStatus,
  type ScanView,
} from "../domain/job";
import { buildHourlyStats, type HourlyStats, type ShiftStat } from "../domain/shift";
import { lineStateDumpSchema, type LineStateDump } from "../domain/stateDump";
import { parseJobSpec, parseOrThrow } from "../domain/validation";
import { ConflictError, NoActiveJobError, NotFoundError } from "../domain/errors";
import type { LineRepository } from "../repositories/lineRepository";

export interface JobLedgerOptions {
  recentScansWindow: number;
  shiftStartHour: number;
  shiftEndHour: number;
}

export interface RecordedScanResult {
  scan: Scan;
  job: Job;
}

export interface EndedJob {
  summary: JobSummary;
  job: Job;
  shift: ShiftStat;
}

export interface JobDetail {
  job: JobView;
  scans: ScanView[];
}

export interface JobPage {
  jobs: JobView[];
  total: number;
  page: number;
  page_size: number;
}

const JOB_DETAIL_SCAN_LIMIT = 100;

/**
 * Authoritative job state: the active job, its cached counters and hour
 * buckets, and the recent-scans window.
 *
 * Every write goes through the repository first; the cache is replaced only
 * with what the committed transaction returned, so a failed write leaves it
 * untouched. Display values are derived from the cache, never by re-reading
 * the scan ledger.
 */
export class JobLedger {
  private active: Job | null = null;
  private buckets = new Map<string, HourBucket>();
  private recent: Scan[] = [];

  constructor(
    private readonly repo: LineRepository,
    private readonly clock: Clock,
    private readonly logger: Logger,
    private readonly options: JobLedgerOptions,
  ) {}

  /** Rebuild caches from persistence. Called at startup and after an import. */
  load(): void {
    this.active = this.repo.getActiveJob() ?? null;
    this.buckets = new Map();
    this.recent = [];
    if (this.active) {
      for (const bucket of this.repo.getJobHourBuckets(this.active.id)) {
        this.buckets.set(bucketKey(bucket), { shippers: bucket.shippers, pieces: bucket.pieces });
      }
      this.recent = this.repo.recentScans(this.active.id, this.options.recentScansWindow);
      this.logger.info({ jobId: this.active.job_id, totalScans: this.active.total_scans }, "Resumed active job");
    }
  }

  getActiveJob(): Job | null {
    return this.active ? { ...this.active } : null;
  }

  startJob(input: unknown): Job {
    const spec = parseJobSpec(input);
    if (this.active) {
      throw new ConflictError(`Job ${this.active.job_id} is already active`, { active_job_id: this.active.job_id });
    }

    const startTime = this.clock.now();
    const job = this.repo.createJob({
      job_id: spec.job_id ?? this.generateJobId(startTime),
      expected_barcode: spec.expected_barcode,
      pieces_per_shipper: spec.pieces_per_shipper,
      target_quantity: spec.target_quantity,
      start_time: startTime,
    });

    this.active = job;
    this.buckets = new Map();
    this.recent = [];
    this.logger.info(
      { jobId: job.job_id, expectedBarcode: job.expected_barcode, piecesPerShipper: job.pieces_per_shipper },
      "Job started",
    );
    return { ...job };
  }

  /** `JOB_YYYYMMDD_HHMMSS`, with `_2`, `_3`... when that second is taken. */
  private generateJobId(startTime: number): string {
    const base = `JOB_${compactStamp(startTime)}`;
    let candidate = base;
    for (let n = 2; this.repo.jobIdExists(candidate); n++) {
      candidate = `${base}_${n}`;
    }
    return candidate;
  }

  recordScan(job: Job, barcode: string, status: ScanStatus): RecordedScanResult {
    if (!this.active || this.active.id !== job.id) {
      throw new NoActiveJobError();
    }

    const timestamp = this.clock.now();
    const slot = hourSlotOf(timestamp);
    const recorded = this.repo.appendScan({
      jobId: job.id,
      barcode,
      expected: job.expected_barcode,
      status,
      timestamp,
      slot,
      pieces: job.pieces_per_shipper,
    });

    // Committed: now the cache may move.
    this.active = recorded.job;
    if (status === "PASS") {
      const key = bucketKey(slot);
      const bucket = this.buckets.get(key) ?? { shippers: 0, pieces: 0 };
      this.buckets.set(key, { shippers: bucket.shippers + 1, pieces: bucket.pieces + job.pieces_per_shipper });
    }
    this.recent = [recorded.scan, ...this.recent].slice(0, this.options.recentScansWindow);

    return { scan: { ...recorded.scan }, job: { ...recorded.job } };
  }

  endJob(): EndedJob {
    if (!this.active) {
      throw new NotFoundError("Active job");
    }

    const endTime = this.clock.now();
    const { job, shift } = this.repo.closeJob(this.active.id, endTime, dateKeyOf(endTime));
    const summary = summarizeJob(job, endTime);

    this.active = null;
    this.buckets = new Map();
    this.recent = [];
    this.logger.info({ ...summary }, "Job ended");
    return { summary, job, shift };
  }

  /** View of `job` at the current clock time. */
  jobView(job: Job): JobView {
    const buckets = this.active && this.active.id === job.id ? this.buckets : this.loadBuckets(job.id);
    return toJobView(job, buckets, this.clock.now());
  }

  activeJobView(): JobView | null {
    return this.active ? toJobView(this.active, this.buckets, this.clock.now()) : null;
  }

  recentScans(): ScanView[] {
    return this.recent.map(toScanView);
  }

  getShift(date: string = dateKeyOf(this.clock.now())): ShiftStat {
    return this.repo.getShift(date);
  }

  ensureShift(date: string): ShiftStat {
    return this.repo.ensureShift(date);
  }

  getHourlyStats(date: string = dateKeyOf(this.clock.now())): HourlyStats {
    return buildHourlyStats(
      date,
      this.repo.getShiftHourBuckets(date),
      this.options.shiftStartHour,
      this.options.shiftEndHour,
    );
  }

  getJobDetail(id: number): JobDetail {
    const job = this.repo.getJob(id);
    if (!job) throw new NotFoundError("Job", id);
    return {
      job: this.jobView(job),
      scans: this.repo.recentScans(id, JOB_DETAIL_SCAN_LIMIT).map(toScanView),
    };
  }

  listJobs(page: number, pageSize: number): JobPage {
    const jobs = this.repo.listJobs(pageSize, (page - 1) * pageSize).map((job) => this.jobView(job));
    return { jobs, total: this.repo.countJobs(), page, page_size: pageSize };
  }

  exportState(): LineStateDump {
    return this.repo.exportAll(toIso(this.clock.now()));
  }

  /** Replace all persisted state with `input` and rebuild the caches. */
  importState(input: unknown): LineStateDump {
    const dump = parseOrThrow(lineStateDumpSchema, input);
    this.repo.replaceAll(dump);
    this.load();
    this.logger.warn(
      { jobs: dump.jobs.length, scans: dump.scans.length, exportedAt: dump.exported_at },
      "Line state imported",
    );
    return dump;
  }

  private loadBuckets(jobId: number): Map<string, HourBucket> {
    const buckets = new Map<string, HourBucket>();
    for (const bucket of this.repo.getJobHourBuckets(jobId)) {
      buckets.set(bucketKey(bucket), { shippers: bucket.shippers, pieces: bucket.pieces });
    }
    return buckets;
  }
}
