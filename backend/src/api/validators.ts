import { z } from "zod";
import { CONSENT_REASON_MAX_LENGTH, READING_CLOCK_SKEW_MINUTES } from "../policy";
import { addMinutes } from "../utils/time";
import { VitalReading } from "../models/types";
import { MAX_BATCH_READINGS } from "../services/vitalsService";

export const passwordSchema = z
  .string()
  .min(8)
  .max(128)
  .regex(/[A-Za-z]/, "Password must contain a letter.")
  .regex(/[0-9]/, "Password must contain a digit.");

export const emailSchema = z.string().trim().toLowerCase().email();

export const loginSchema = z.object({
  email: z.string().trim().min(1),
  password: z.string().min(1)
});

export const refreshSchema = z.object({
  refresh_token: z.string().min(1)
});

export const resetRequestSchema = z.object({
  email: z.string().trim().min(1)
});

export const resetConfirmSchema = z.object({
  token: z.string().min(1),
  new_password: passwordSchema
});

export const provisionSchema = z.object({
  email: emailSchema,
  password: passwordSchema,
  full_name: z.string().trim().min(1).max(120).nullable().default(null),
  role: z.enum(["Patient", "Clinician", "Admin"])
});

export const adminResetSchema = z.object({
  new_password: passwordSchema
});

export const consentReasonSchema = z.object({
  reason: z.string().trim().max(CONSENT_REASON_MAX_LENGTH).nullable().default(null)
});

export const consentReviewSchema = z.object({
  decision: z.enum(["Approve", "Reject"]),
  reason: z.string().trim().max(CONSENT_REASON_MAX_LENGTH).nullable().default(null)
});

export const vitalReadingSchema = z
  .object({
    heart_rate: z.number().int().min(30).max(250),
    spo2: z.number().min(0).max(100).nullable().default(null),
    blood_pressure: z
      .object({
        systolic: z.number().int().min(70).max(250),
        diastolic: z.number().int().min(40).max(150).nullable().default(null)
      })
      .nullable()
      .default(null),
    timestamp: z.string().datetime({ offset: true }).optional()
  });

export type VitalReadingInput = z.infer<typeof vitalReadingSchema>;

export const vitalBatchSchema = z.object({
  readings: z.array(vitalReadingSchema).min(1).max(MAX_BATCH_READINGS)
});

export const historyQuerySchema = z.object({
  days: z.coerce.number().int().min(1).max(365).default(7)
});

export const alertListQuerySchema = z.object({
  include_inactive: z.enum(["true", "false"]).default("false"),
  unacknowledged_only: z.enum(["true", "false"]).default("false"),
  limit: z.coerce.number().int().min(1).max(500).default(100)
});

export const resolveAlertSchema = z.object({
  notes: z.string().trim().max(1000).nullable().default(null)
});

export function toVitalReading(input: VitalReadingInput, receivedAt: Date): VitalReading {
  return {
    heartRate: input.heart_rate,
    spo2: input.spo2,
    systolicBp: input.blood_pressure?.systolic ?? null,
    diastolicBp: input.blood_pressure?.diastolic ?? null,
    timestamp: input.timestamp ? new Date(input.timestamp).toISOString() : receivedAt.toISOString()
  };
}

export function isFutureReading(reading: VitalReading, now: Date): boolean {
  return Date.parse(reading.timestamp) > addMinutes(now, READING_CLOCK_SKEW_MINUTES).getTime();
}
