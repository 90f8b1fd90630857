import type { Logger } from "pino";
import { classifyScan, toScanView, type JobView, type ScanView } from "../domain/job";
import { InvalidInputError, LineLockedError, NoActiveJobError } from "../domain/errors";
import type { HardwareSignal } from "./hardware/hardwareSignal";
import type { JobLedger } from "./jobLedger";
import type { LineLockGuard, LineLockSnapshot } from "./lineLock";

export interface ScanOutcome {
  scan: ScanView;
  job: JobView;
  recent_scans: ScanView[];
  lock: LineLockSnapshot;
}

/**
 * Verifies one scanned barcode against the active job. Must be called from
 * inside the line's serialized section.
 */
export class VerificationEngine {
  constructor(
    private readonly ledger: JobLedger,
    private readonly guard: LineLockGuard,
    private readonly hardware: HardwareSignal,
    private readonly logger: Logger,
  ) {}

  processScan(rawBarcode: string): ScanOutcome {
    const barcode = rawBarcode.trim();
    if (!barcode) {
      throw new InvalidInputError("No barcode provided");
    }

    const job = this.ledger.getActiveJob();
    if (!job) {
      throw new NoActiveJobError();
    }

    if (this.guard.blocksScanning()) {
      throw new LineLockedError();
    }

    const status = classifyScan(barcode, job.expected_barcode);
    const recorded = this.ledger.recordScan(job, barcode, status);

    if (status === "PASS") {
      this.hardware.signalPass();
    } else {
      this.hardware.signalFail();
      this.guard.engage(`Scanned ${barcode}, expected ${job.expected_barcode}`);
    }

    this.logger.info(
      { jobId: job.job_id, scanId: recorded.scan.id, status, totalScans: recorded.job.total_scans },
      "Scan recorded",
    );

    return {
      scan: toScanView(recorded.scan),
      job: this.ledger.jobView(recorded.job),
      recent_scans: this.ledger.recentScans(),
      lock: this.guard.snapshot(),
    };
  }
}
