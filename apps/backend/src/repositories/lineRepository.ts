import type Database from "better-sqlite3";
import type { HourBucket, Job, Scan, ScanStatus } from "../domain/job";
import { emptyShift, type ShiftHourBucket, type ShiftStat } from "../domain/shift";
import { STATE_DUMP_VERSION, type LineStateDump } from "../domain/stateDump";
import { ConflictError, LineError, NoActiveJobError, NotFoundError, PersistenceError } from "../domain/errors";
import type { HourSlot } from "../platform/clock";

interface JobRow extends Omit<Job, "is_active"> {
  is_active: number;
}

export interface JobHourBucket extends HourBucket {
  job_id: number;
  date: string;
  hour: number;
}

export interface NewJob {
  job_id: string;
  expected_barcode: string;
  pieces_per_shipper: number;
  target_quantity: number;
  start_time: number;
}

export interface ScanWrite {
  jobId: number;
  barcode: string;
  expected: string;
  status: ScanStatus;
  timestamp: number;
  slot: HourSlot;
  /** Pieces credited on PASS (the job's pieces_per_shipper). */
  pieces: number;
}

export interface RecordedScan {
  scan: Scan;
  job: Job;
}

export interface ClosedJob {
  job: Job;
  shift: ShiftStat;
}

const mapJob = (row: JobRow): Job => ({ ...row, is_active: row.is_active === 1 });

const isUniqueViolation = (error: unknown): boolean =>
  typeof error === "object" &&
  error !== null &&
  "code" in error &&
  error.code === "SQLITE_CONSTRAINT_UNIQUE";

const violatesJobIdIndex = (error: unknown): boolean =>
  error instanceof Error && error.message.includes("jobs.job_id");

/**
 * SQLite persistence for jobs, the append-only scan ledger and the aggregate
 * counters. Every mutation is one transaction: counters, buckets and ledger
 * rows commit together or not at all.
 */
export class LineRepository {
  constructor(private readonly db: Database.Database) {}

  private write<T>(operation: string, fn: () => T): T {
    try {
      return this.db.transaction(fn)();
    } catch (error) {
      if (error instanceof LineError) throw error;
      throw new PersistenceError(`${operation} failed`, error);
    }
  }

  getActiveJob(): Job | undefined {
    const row = this.db
      .prepare<[], JobRow>(`SELECT * FROM jobs WHERE is_active = 1 ORDER BY id DESC LIMIT 1`)
      .get();
    return row ? mapJob(row) : undefined;
  }

  getJob(id: number): Job | undefined {
    const row = this.db.prepare<[number], JobRow>(`SELECT * FROM jobs WHERE id = ?`).get(id);
    return row ? mapJob(row) : undefined;
  }

  listJobs(limit: number, offset: number): Job[] {
    return this.db
      .prepare<[number, number], JobRow>(`SELECT * FROM jobs ORDER BY start_time DESC, id DESC LIMIT ? OFFSET ?`)
      .all(limit, offset)
      .map(mapJob);
  }

  countJobs(): number {
    const row = this.db.prepare<[], { total: number }>(`SELECT COUNT(*) AS total FROM jobs`).get();
    return row?.total ?? 0;
  }

  jobIdExists(jobId: string): boolean {
    return this.db.prepare<[string], { one: number }>(`SELECT 1 AS one FROM jobs WHERE job_id = ?`).get(jobId) !== undefined;
  }

  /**
   * Insert a job with zeroed counters.
   * Enforces the single-active-job and unique job id constraints inside the
   * transaction; the unique indexes back them up against writers in other
   * processes.
   */
  createJob(job: NewJob): Job {
    try {
      return this.write("createJob", () => {
        const existing = this.db
          .prepare<[], { job_id: string }>(`SELECT job_id FROM jobs WHERE is_active = 1 LIMIT 1`)
          .get();
        if (existing) {
          throw new ConflictError(`Job ${existing.job_id} is already active`, { active_job_id: existing.job_id });
        }
        if (this.jobIdExists(job.job_id)) {
          throw new ConflictError(`Job ID ${job.job_id} is already in use`, { job_id: job.job_id });
        }

        const result = this.db
          .prepare<NewJob>(
            `INSERT INTO jobs (job_id, expected_barcode, pieces_per_shipper, target_quantity, start_time, is_active)
             VALUES (@job_id, @expected_barcode, @pieces_per_shipper, @target_quantity, @start_time, 1)`,
          )
          .run(job);

        return this.requireJob(Number(result.lastInsertRowid));
      });
    } catch (error) {
      if (error instanceof PersistenceError && isUniqueViolation(error.cause)) {
        if (violatesJobIdIndex(error.cause)) {
          throw new ConflictError(`Job ID ${job.job_id} is already in use`, { job_id: job.job_id });
        }
        throw new ConflictError("Another job is already active");
      }
      throw error;
    }
  }

  /**
   * Append a scan and bump every counter it affects. The owning job must still
   * be active when the transaction runs.
   */
  appendScan(write: ScanWrite): RecordedScan {
    return this.write("appendScan", () => {
      const pass = write.status === "PASS";
      const updated = this.db
        .prepare<{ id: number; pass: number; fail: number; pieces: number }>(
          `UPDATE jobs
              SET total_scans = total_scans + 1,
                  pass_count = pass_count + @pass,
                  fail_count = fail_count + @fail,
                  total_pieces = total_pieces + @pieces
            WHERE id = @id AND is_active = 1`,
        )
        .run({ id: write.jobId, pass: pass ? 1 : 0, fail: pass ? 0 : 1, pieces: pass ? write.pieces : 0 });
      if (updated.changes === 0) {
        throw new NoActiveJobError();
      }

      if (pass) {
        const bucket = { job_id: write.jobId, date: write.slot.date, hour: write.slot.hour, pieces: write.pieces };
        this.db
          .prepare<typeof bucket>(
            `INSERT INTO job_hour_buckets (job_id, date, hour, shippers, pieces)
             VALUES (@job_id, @date, @hour, 1, @pieces)
             ON CONFLICT(job_id, date, hour) DO UPDATE SET
               shippers = shippers + 1,
               pieces = pieces + excluded.pieces`,
          )
          .run(bucket);
        this.db
          .prepare<Omit<typeof bucket, "job_id">>(
            `INSERT INTO shift_hour_buckets (date, hour, shippers, pieces)
             VALUES (@date, @hour, 1, @pieces)
             ON CONFLICT(date, hour) DO UPDATE SET
               shippers = shippers + 1,
               pieces = pieces + excluded.pieces`,
          )
          .run({ date: bucket.date, hour: bucket.hour, pieces: bucket.pieces });
      }

      const scan: Omit<Scan, "id"> = {
        job_id: write.jobId,
        barcode: write.barcode,
        expected: write.expected,
        status: write.status,
        timestamp: write.timestamp,
      };
      const inserted = this.db
        .prepare<Omit<Scan, "id">>(
          `INSERT INTO scans (job_id, barcode, expected, status, timestamp)
           VALUES (@job_id, @barcode, @expected, @status, @timestamp)`,
        )
        .run(scan);

      return {
        scan: { id: Number(inserted.lastInsertRowid), ...scan },
        job: this.requireJob(write.jobId),
      };
    });
  }

  /** Close the job and roll its totals into the shift for `date`. */
  closeJob(jobId: number, endTime: number, date: string): ClosedJob {
    return this.write("closeJob", () => {
      const updated = this.db
        .prepare<{ id: number; end_time: number }>(
          `UPDATE jobs SET is_active = 0, end_time = @end_time WHERE id = @id AND is_active = 1`,
        )
        .run({ id: jobId, end_time: endTime });
      if (updated.changes === 0) {
        throw new NotFoundError("Active job");
      }

      const job = this.requireJob(jobId);
      this.db
        .prepare<{ date: string; shippers: number; pieces: number; pass: number; fail: number }>(
          `INSERT INTO shift_stats (date, total_shippers, total_pieces, total_pass, total_fail, jobs_completed)
           VALUES (@date, @shippers, @pieces, @pass, @fail, 1)
           ON CONFLICT(date) DO UPDATE SET
             total_shippers = total_shippers + excluded.total_shippers,
             total_pieces = total_pieces + excluded.total_pieces,
             total_pass = total_pass + excluded.total_pass,
             total_fail = total_fail + excluded.total_fail,
             jobs_completed = jobs_completed + 1`,
        )
        .run({ date, shippers: job.pass_count, pieces: job.total_pieces, pass: job.pass_count, fail: job.fail_count });

      return { job, shift: this.getShift(date) };
    });
  }

  getShift(date: string): ShiftStat {
    return this.db.prepare<[string], ShiftStat>(`SELECT * FROM shift_stats WHERE date = ?`).get(date) ?? emptyShift(date);
  }

  ensureShift(date: string): ShiftStat {
    return this.write("ensureShift", () => {
      this.db.prepare<[string]>(`INSERT OR IGNORE INTO shift_stats (date) VALUES (?)`).run(date);
      return this.getShift(date);
    });
  }

  getShiftHourBuckets(date: string): ShiftHourBucket[] {
    return this.db
      .prepare<[string], ShiftHourBucket>(
        `SELECT date, hour, shippers, pieces FROM shift_hour_buckets WHERE date = ? ORDER BY hour`,
      )
      .all(date);
  }

  getJobHourBuckets(jobId: number): JobHourBucket[] {
    return this.db
      .prepare<[number], JobHourBucket>(
        `SELECT job_id, date, hour, shippers, pieces FROM job_hour_buckets WHERE job_id = ? ORDER BY date, hour`,
      )
      .all(jobId);
  }

  /** Most recent scans of a job, newest first. */
  recentScans(jobId: number, limit: number): Scan[] {
    return this.db
      .prepare<[number, number], Scan>(`SELECT * FROM scans WHERE job_id = ? ORDER BY id DESC LIMIT ?`)
      .all(jobId, limit);
  }

  exportAll(exportedAt: string): LineStateDump {
    return {
      version: STATE_DUMP_VERSION,
      exported_at: exportedAt,
      jobs: this.db.prepare<[], JobRow>(`SELECT * FROM jobs ORDER BY id`).all().map(mapJob),
      scans: this.db.prepare<[], Scan>(`SELECT * FROM scans ORDER BY id`).all(),
      shift_stats: this.db.prepare<[], ShiftStat>(`SELECT * FROM shift_stats ORDER BY date`).all(),
      shift_hour_buckets: this.db
        .prepare<[], ShiftHourBucket>(`SELECT date, hour, shippers, pieces FROM shift_hour_buckets ORDER BY date, hour`)
        .all(),
      job_hour_buckets: this.db
        .prepare<[], JobHourBucket>(
          `SELECT job_id, date, hour, shippers, pieces FROM job_hour_buckets ORDER BY job_id, date, hour`,
        )
        .all(),
    };
  }

  /** Replace every ledger row with the contents of `dump`. Destructive. */
  replaceAll(dump: LineStateDump): void {
    this.write("replaceAll", () => {
      this.db.prepare(`UPDATE ledger_guard SET reset_allowed = 1 WHERE id = 1`).run();
      this.db.exec(`
        DELETE FROM scans;
        DELETE FROM job_hour_buckets;
        DELETE FROM shift_hour_buckets;
        DELETE FROM shift_stats;
        DELETE FROM jobs;
      `);
      this.db.prepare(`UPDATE ledger_guard SET reset_allowed = 0 WHERE id = 1`).run();

      const insertJob = this.db.prepare<JobRow>(
        `INSERT INTO jobs (id, job_id, expected_barcode, pieces_per_shipper, target_quantity, start_time,
           end_time, is_active, total_scans, pass_count, fail_count, total_pieces)
         VALUES (@id, @job_id, @expected_barcode, @pieces_per_shipper, @target_quantity, @start_time,
           @end_time, @is_active, @total_scans, @pass_count, @fail_count, @total_pieces)`,
      );
      for (const job of dump.jobs) {
        insertJob.run({ ...job, is_active: job.is_active ? 1 : 0 });
      }

      const insertScan = this.db.prepare<Scan>(
        `INSERT INTO scans (id, job_id, barcode, expected, status, timestamp)
         VALUES (@id, @job_id, @barcode, @expected, @status, @timestamp)`,
      );
      for (const scan of dump.scans) insertScan.run(scan);

      const insertShift = this.db.prepare<ShiftStat>(
        `INSERT INTO shift_stats (date, total_shippers, total_pieces, total_pass, total_fail, jobs_completed)
         VALUES (@date, @total_shippers, @total_pieces, @total_pass, @total_fail, @jobs_completed)`,
      );
      for (const shift of dump.shift_stats) insertShift.run(shift);

      const insertShiftHour = this.db.prepare<ShiftHourBucket>(
        `INSERT INTO shift_hour_buckets (date, hour, shippers, pieces) VALUES (@date, @hour, @shippers, @pieces)`,
      );
      for (const bucket of dump.shift_hour_buckets) insertShiftHour.run(bucket);

      const insertJobHour = this.db.prepare<JobHourBucket>(
        `INSERT INTO job_hour_buckets (job_id, date, hour, shippers, pieces)
         VALUES (@job_id, @date, @hour, @shippers, @pieces)`,
      );
      for (const bucket of dump.job_hour_buckets) insertJobHour.run(bucket);
    });
  }

  private requireJob(id: number): Job {
    const job = this.getJob(id);
    if (!job) throw new NotFoundError("Job", id);
    return job;
  }
}
