import { z } from "zod";

export const feedMessageSchema = z.object({
  type: z.string(),
  seq: z.number().int().positive().optional(),
  emitted_at: z.string().optional(),
  payload: z.unknown().optional(),
  id: z.string().optional(),
});

export type FeedMessage = z.infer<typeof feedMessageSchema>;

export interface FeedEvent {
  type: string;
  seq: number;
  emitted_at?: string;
  payload: unknown;
}

const jobSchema = z
  .object({
    job_id: z.string(),
    expected_barcode: z.string(),
    total_scans: z.number(),
    pass_count: z.number(),
    fail_count: z.number(),
    total_pieces: z.number(),
    pass_rate: z.number(),
  })
  .passthrough();

const lockSchema = z
  .object({
    state: z.enum(["UNLOCKED", "LOCKED", "PIN_LOCKED_OUT"]),
  })
  .passthrough();

/** The parts of GET /api/status the monitor reads; the rest passes through. */
export const lineStatusSchema = z
  .object({
    line_name: z.string(),
    active_job: jobSchema.nullable(),
    shift: z
      .object({
        date: z.string(),
        total_shippers: z.number(),
        total_pieces: z.number(),
      })
      .passthrough(),
    lock: lockSchema,
    feed_seq: z.number().int().min(0),
  })
  .passthrough();

export type LineStatusSnapshot = z.infer<typeof lineStatusSchema>;

const scanPayloadSchema = z.object({
  scan: z.object({ barcode: z.string(), status: z.enum(["PASS", "FAIL"]) }),
  job: z.object({ job_id: z.string(), total_scans: z.number() }),
});

const jobPayloadSchema = z.object({ job: z.object({ job_id: z.string() }) });

/** One log line per feed event. */
export function describeEvent(event: FeedEvent): string {
  switch (event.type) {
    case "scan": {
      const parsed = scanPayloadSchema.safeParse(event.payload);
      if (!parsed.success) break;
      const { scan, job } = parsed.data;
      return `${scan.status} ${scan.barcode} (${job.job_id}, ${job.total_scans} scans)`;
    }
    case "job_started":
    case "job_ended": {
      const parsed = jobPayloadSchema.safeParse(event.payload);
      if (!parsed.success) break;
      return `${event.type === "job_started" ? "Job started" : "Job ended"}: ${parsed.data.job.job_id}`;
    }
    case "line_lock": {
      const parsed = lockSchema.safeParse(event.payload);
      if (!parsed.success) break;
      return `Line lock: ${parsed.data.state}`;
    }
  }
  return event.type;
}
