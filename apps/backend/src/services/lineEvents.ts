import type { JobSummary, JobView } from "../domain/job";
import type { ShiftStat } from "../domain/shift";
import type { HubEnvelope } from "./broadcast/broadcastHub";
import type { LineLockSnapshot } from "./lineLock";
import type { ScanOutcome } from "./verificationEngine";

export type LineEventBody =
  | { kind: "job_started"; payload: { job: JobView } }
  | { kind: "scan"; payload: ScanOutcome }
  | { kind: "job_ended"; payload: { summary: JobSummary; job: JobView; shift: ShiftStat } }
  | { kind: "shift_update"; payload: { shift: ShiftStat } }
  | { kind: "line_lock"; payload: LineLockSnapshot }
  | { kind: "state_restored"; payload: { jobs: number; scans: number; exported_at: string } };

export type LineEventKind = LineEventBody["kind"];

export type LineEvent = LineEventBody & HubEnvelope;

export interface WireMessage {
  type: string;
  seq?: number;
  emitted_at?: string;
  payload?: unknown;
  id?: string;
}

/** Shape shared by the WebSocket and SSE feeds. */
export const toWireMessage = (event: LineEvent): WireMessage => ({
  type: event.kind,
  seq: event.seq,
  emitted_at: event.emitted_at,
  payload: event.payload,
});
