import type { Logger } from "pino";
import type { Clock } from "../platform/clock";
import { dateKeyOf, toIso } from "../platform/clock";
import type { JobSummary, JobView, ScanView } from "../domain/job";
import type { HourlyStats, ShiftStat } from "../domain/shift";
import type { LineStateDump } from "../domain/stateDump";
import { NotFoundError } from "../domain/errors";
import { SerialExecutor } from "../utils/serialExecutor";
import type { BroadcastHub, HubStats, SubscribeOptions, Subscription } from "./broadcast/broadcastHub";
import type { HardwareSignal } from "./hardware/hardwareSignal";
import type { JobDetail, JobLedger, JobPage } from "./jobLedger";
import type { LineEvent, LineEventBody } from "./lineEvents";
import type { LineLockGuard, LineLockSnapshot } from "./lineLock";
import type { ScanOutcome, VerificationEngine } from "./verificationEngine";

export interface LineStatus {
  line_name: string;
  active_job: JobView | null;
  recent_scans: ScanView[];
  shift: ShiftStat;
  lock: LineLockSnapshot;
  hardware_driver: string;
  server_time: string;
  /** Hub sequence number this snapshot reflects. */
  feed_seq: number;
}

export interface JobEndResult {
  summary: JobSummary;
  job: JobView;
  shift: ShiftStat;
}

export interface LineServiceDeps {
  ledger: JobLedger;
  engine: VerificationEngine;
  guard: LineLockGuard;
  hub: BroadcastHub<LineEventBody>;
  hardware: HardwareSignal;
  clock: Clock;
  logger: Logger;
  lineName: string;
}

/**
 * The line's only entry point for state changes. Each mutation runs its
 * whole read-decide-write sequence inside one SerialExecutor slot and
 * publishes its event before the slot is released, so subscribers see events
 * in commit order.
 */
export class LineService {
  private readonly serial = new SerialExecutor();
  private readonly ledger: JobLedger;
  private readonly engine: VerificationEngine;
  private readonly guard: LineLockGuard;
  private readonly hub: BroadcastHub<LineEventBody>;
  private readonly hardware: HardwareSignal;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly lineName: string;
  private shiftDate: string;
  private holdLockEvents = false;
  private heldLockEvents: LineLockSnapshot[] = [];

  constructor(deps: LineServiceDeps) {
    this.ledger = deps.ledger;
    this.engine = deps.engine;
    this.guard = deps.guard;
    this.hub = deps.hub;
    this.hardware = deps.hardware;
    this.clock = deps.clock;
    this.logger = deps.logger;
    this.lineName = deps.lineName;
    this.shiftDate = dateKeyOf(this.clock.now());

    this.guard.on("change", (snapshot: LineLockSnapshot) => {
      if (this.holdLockEvents) {
        this.heldLockEvents.push(snapshot);
        return;
      }
      this.hub.publish({ kind: "line_lock", payload: snapshot });
    });
  }

  startJob(input: unknown): Promise<JobView> {
    return this.serial.run(() => {
      const job = this.ledger.startJob(input);
      const view = this.ledger.jobView(job);
      this.hub.publish({ kind: "job_started", payload: { job: view } });
      return view;
    });
  }

  processScan(barcode: string): Promise<ScanOutcome> {
    return this.serial.run(() => {
      // A mismatch locks the line mid-scan; announce the scan before the lock.
      this.holdLockEvents = true;
      try {
        const outcome = this.engine.processScan(barcode);
        this.hub.publish({ kind: "scan", payload: outcome });
        return outcome;
      } finally {
        this.holdLockEvents = false;
        const held = this.heldLockEvents;
        this.heldLockEvents = [];
        for (const snapshot of held) {
          this.hub.publish({ kind: "line_lock", payload: snapshot });
        }
      }
    });
  }

  verifyPin(pin: string): Promise<LineLockSnapshot> {
    return this.serial.run(() => this.guard.verifyPin(pin));
  }

  /** Close the active job. Requires the supervisor PIN. */
  endJob(pin: string): Promise<JobEndResult> {
    return this.serial.run(() => {
      if (!this.ledger.getActiveJob()) {
        throw new NotFoundError("Active job");
      }
      this.guard.authorize(pin, "end_job");

      const ended = this.ledger.endJob();
      this.guard.release();

      const result: JobEndResult = {
        summary: ended.summary,
        job: this.ledger.jobView(ended.job),
        shift: ended.shift,
      };
      this.hub.publish({ kind: "job_ended", payload: result });
      return result;
    });
  }

  /** Point-in-time read of everything a display needs. */
  getStatus(): LineStatus {
    return {
      line_name: this.lineName,
      active_job: this.ledger.activeJobView(),
      recent_scans: this.ledger.recentScans(),
      shift: this.ledger.getShift(),
      lock: this.guard.snapshot(),
      hardware_driver: this.hardware.getDriverName(),
      server_time: toIso(this.clock.now()),
      feed_seq: this.hub.lastSeq,
    };
  }

  getHourlyStats(date?: string): HourlyStats {
    return this.ledger.getHourlyStats(date);
  }

  getJobDetail(id: number): JobDetail {
    return this.ledger.getJobDetail(id);
  }

  listJobs(page: number, pageSize: number): JobPage {
    return this.ledger.listJobs(page, pageSize);
  }

  subscribe(options?: SubscribeOptions): Subscription<LineEvent> {
    return this.hub.subscribe(options);
  }

  unsubscribe(subscription: Subscription<LineEvent>): void {
    this.hub.unsubscribe(subscription);
  }

  hubStats(): HubStats {
    return this.hub.stats();
  }

  exportState(): Promise<LineStateDump> {
    return this.serial.run(() => this.ledger.exportState());
  }

  /** Destructive restore; the lock state is left as it is. */
  importState(input: unknown): Promise<LineStatus> {
    return this.serial.run(() => {
      const dump = this.ledger.importState(input);
      this.hub.publish({
        kind: "state_restored",
        payload: { jobs: dump.jobs.length, scans: dump.scans.length, exported_at: dump.exported_at },
      });
      return this.getStatus();
    });
  }

  /**
   * Publish `shift_update` when the calendar date has moved on since the last
   * check. Returns whether a rollover happened.
   */
  checkShiftRollover(): Promise<boolean> {
    return this.serial.run(() => {
      const today = dateKeyOf(this.clock.now());
      if (today === this.shiftDate) return false;

      const previous = this.shiftDate;
      const shift = this.ledger.ensureShift(today);
      this.shiftDate = today;
      this.logger.info({ previous, today }, "Shift rolled over");
      this.hub.publish({ kind: "shift_update", payload: { shift } });
      return true;
    });
  }

  /** Resolves after every mutation submitted so far has finished. */
  idle(): Promise<void> {
    return this.serial.idle();
  }
}
