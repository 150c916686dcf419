/**
 * Input parsing for the services and the HTTP boundary.
 * Entity schemas live in shared/schema.ts; the ones here describe queries and
 * admin commands that have no table of their own.
 */

import { z } from "zod";
import {
  ACTIVITY_TYPES,
  APPOINTMENT_STATUSES,
  LOG_LEVELS,
  MODALITIES,
  MODERATION_STATUSES,
  RECORD_TYPES,
  type JsonValue,
} from "@shared/schema";
import { fromZodError } from "./errors";

export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw fromZodError(result.error);
  }
  return result.data;
}

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValueSchema), z.record(jsonValueSchema)]),
);

export const metadataSchema = z.record(jsonValueSchema);

export const idSchema = z.string().trim().min(1, "Identifier is required");

export const conditionSchema = z.string().trim().min(1, "Condition is required");

export const isoDateSchema = z.string().regex(DATE_PATTERN, "Expected a date formatted YYYY-MM-DD");

const isoInstantSchema = z.string().refine((value) => !Number.isNaN(Date.parse(value)), "Expected an ISO-8601 timestamp");

// GET /api/patients/search
export const patientSearchSchema = z.object({
  q: z.string().default(""),
  limit: z.coerce.number().int().optional(),
});

// GET /api/patients/:id/records
export const historyQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(50),
  recordType: z.enum(RECORD_TYPES).optional(),
});

// GET /api/patients/:id/records/timeline
export const timelineQuerySchema = z.object({
  start: isoInstantSchema.optional(),
  end: isoInstantSchema.optional(),
});

export const modalitySchema = z.enum(MODALITIES);

// GET /api/appointments/availability
export const availabilityQuerySchema = z.object({
  doctorId: idSchema,
  date: isoDateSchema,
});

// GET /api/appointments
export const appointmentFilterSchema = z.object({
  doctorId: z.string().optional(),
  patientId: z.string().optional(),
  patientEmail: z.string().trim().toLowerCase().optional(),
  status: z.enum(APPOINTMENT_STATUSES).optional(),
  appointmentDate: isoDateSchema.optional(),
});

// GET /api/admin/activities
export const activityFilterSchema = z.object({
  userId: z.string().optional(),
  activityType: z.enum(ACTIVITY_TYPES).optional(),
  since: isoInstantSchema.optional(),
  until: isoInstantSchema.optional(),
  limit: z.coerce.number().int().min(1).max(1000).default(50),
});

// GET /api/admin/logs
export const systemLogFilterSchema = z.object({
  level: z.enum(LOG_LEVELS).optional(),
  component: z.string().optional(),
  since: isoInstantSchema.optional(),
  until: isoInstantSchema.optional(),
  limit: z.coerce.number().int().min(1).max(1000).default(50),
});

export const newUserActivitySchema = z.object({
  userId: z.string().nullish(),
  userEmail: z.string().email().nullish(),
  activityType: z.enum(ACTIVITY_TYPES),
  description: z.string().trim().min(1),
  ipAddress: z.string().nullish(),
  userAgent: z.string().nullish(),
  metadata: metadataSchema.nullish(),
  sessionId: z.string().nullish(),
});

export const newSystemLogSchema = z.object({
  level: z.enum(LOG_LEVELS),
  component: z.string().trim().min(1),
  message: z.string().trim().min(1),
  stackTrace: z.string().nullish(),
  metadata: metadataSchema.nullish(),
});

export const adminActorSchema = z.object({
  id: idSchema,
  email: z.string().email(),
});

// POST /api/admin/flags/:id/moderate
export const moderationSchema = z.object({
  action: z.string().trim().min(1),
  status: z.enum(MODERATION_STATUSES),
  reason: z.string().nullish(),
  notes: z.string().nullish(),
});
