import { z, type ZodError, type ZodTypeAny } from "zod";
import { ValidationError } from "./errors";

// Characters that must never reach a label template or the operator screen.
const BARCODE_FORBIDDEN = ["<", ">", '"', "'", "&", ";", "\\"];
const JOB_ID_FORBIDDEN = [...BARCODE_FORBIDDEN, "/"];

const CONTROL_CHARS = /[\u0000-\u001f\u007f]/;

const containsAny = (value: string, chars: readonly string[]) => chars.some((ch) => value.includes(ch));

export const MAX_BARCODE_LENGTH = 200;
export const MAX_JOB_ID_LENGTH = 100;
export const MAX_PIECES_PER_SHIPPER = 10_000;
export const MAX_TARGET_QUANTITY = 1_000_000;

export const expectedBarcodeSchema = z
  .string({ required_error: "Barcode is required", invalid_type_error: "Barcode must be a string" })
  .trim()
  .min(1, "Barcode cannot be empty")
  .max(MAX_BARCODE_LENGTH, `Barcode must be ${MAX_BARCODE_LENGTH} characters or less`)
  .refine((value) => !containsAny(value, BARCODE_FORBIDDEN), "Barcode contains invalid characters")
  .refine((value) => !CONTROL_CHARS.test(value), "Barcode contains invalid control characters");

/** Job id text rules without the blank-means-generate mapping. */
export const jobIdTextSchema = z
  .string({ invalid_type_error: "Job ID must be a string" })
  .trim()
  .max(MAX_JOB_ID_LENGTH, `Job ID must be ${MAX_JOB_ID_LENGTH} characters or less`)
  .refine((value) => !containsAny(value, JOB_ID_FORBIDDEN), "Job ID contains invalid characters")
  .refine((value) => !CONTROL_CHARS.test(value), "Job ID contains invalid control characters");

export const jobIdSchema = jobIdTextSchema.transform((value) => (value === "" ? undefined : value));

export const jobStartSchema = z.object({
  job_id: jobIdSchema.nullish(),
  expected_barcode: expectedBarcodeSchema,
  pieces_per_shipper: z
    .number({ invalid_type_error: "Pieces per shipper must be a number" })
    .int("Pieces per shipper must be a whole number")
    .min(1, "Pieces per shipper must be at least 1")
    .max(MAX_PIECES_PER_SHIPPER, `Pieces per shipper must be ${MAX_PIECES_PER_SHIPPER} or less`)
    .default(1),
  target_quantity: z
    .number({ invalid_type_error: "Target quantity must be a number" })
    .int("Target quantity must be a whole number")
    .min(0, "Target quantity cannot be negative")
    .max(MAX_TARGET_QUANTITY, `Target quantity must be ${MAX_TARGET_QUANTITY} or less`)
    .default(0),
});

export type JobSpec = z.output<typeof jobStartSchema>;

export const scanRequestSchema = z.object({
  barcode: z.string({ required_error: "No barcode provided", invalid_type_error: "Barcode must be a string" }),
});

export const pinSchema = z
  .string({ required_error: "PIN is required", invalid_type_error: "PIN must be a string" })
  .trim()
  .min(4, "PIN must be at least 4 characters")
  .max(20, "PIN must be 20 characters or less")
  .regex(/^[A-Za-z0-9]+$/, "PIN must be alphanumeric");

/** Request shape only; the PIN format is checked once lockout has been ruled out. */
export const pinRequestSchema = z.object({
  pin: z.string({ required_error: "PIN is required", invalid_type_error: "PIN must be a string" }),
});

export const clientErrorSchema = z.object({
  message: z.string().max(2000),
  source: z.string().max(200).optional(),
  stack: z.string().max(10_000).optional(),
  context: z.record(z.unknown()).optional(),
});

export const issuesOf = (error: ZodError) =>
  error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message }));

/**
 * Parse `input` with `schema`, raising ValidationError with the first issue as
 * the message and every issue in details.
 */
export const parseOrThrow = <S extends ZodTypeAny>(schema: S, input: unknown): z.output<S> => {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = issuesOf(result.error);
    throw new ValidationError(issues[0]?.message ?? "Invalid request", { issues });
  }
  return result.data;
};

export const parseJobSpec = (input: unknown): JobSpec => parseOrThrow(jobStartSchema, input);
