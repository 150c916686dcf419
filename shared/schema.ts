import {
  pgTable,
  text,
  varchar,
  timestamp,
  jsonb,
  boolean,
  numeric,
  date,
  index,
} from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

// ============================================================================
// Enumerations
// ============================================================================

export const GENDERS = ["male", "female", "other", "prefer_not_to_say"] as const;
export const BLOOD_TYPES = ["A+", "A-", "B+", "B-", "AB+", "AB-", "O+", "O-"] as const;

export const RECORD_TYPES = [
  "xray",
  "ct_2d",
  "ct_3d",
  "mri_2d",
  "mri_3d",
  "ultrasound",
  "lab_result",
  "consultation",
  "prescription",
  "surgery",
] as const;

export const MODALITIES = ["xray", "ct", "mri", "ultrasound", "lab", "clinical"] as const;

export const APPOINTMENT_STATUSES = ["confirmed", "cancelled", "completed"] as const;

export const ACTIVITY_TYPES = [
  "login",
  "logout",
  "image_upload",
  "analysis_request",
  "report_generation",
  "appointment_booking",
  "patient_creation",
  "medical_record_creation",
  "admin_action",
] as const;

export const LOG_LEVELS = ["debug", "info", "warning", "error"] as const;
export const MODERATION_STATUSES = ["pending", "approved", "rejected", "flagged"] as const;

export type Gender = (typeof GENDERS)[number];
export type BloodType = (typeof BLOOD_TYPES)[number];
export type RecordType = (typeof RECORD_TYPES)[number];
export type Modality = (typeof MODALITIES)[number];
export type AppointmentStatus = (typeof APPOINTMENT_STATUSES)[number];
export type ActivityType = (typeof ACTIVITY_TYPES)[number];
export type LogLevel = (typeof LOG_LEVELS)[number];
export type ModerationStatus = (typeof MODERATION_STATUSES)[number];

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type Metadata = Record<string, JsonValue>;

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const TIME_PATTERN = /^([01]\d|2[0-3]):[0-5]\d$/;

// ============================================================================
// Client/server tables (PostgreSQL)
// ============================================================================

export const patients = pgTable("patients", {
  id: varchar("id", { length: 36 }).primaryKey(),
  email: varchar("email", { length: 255 }).unique().notNull(),
  name: varchar("name", { length: 255 }).notNull(),
  phone: varchar("phone", { length: 50 }),
  dateOfBirth: date("date_of_birth", { mode: "string" }),
  gender: varchar("gender", { length: 20, enum: GENDERS }),
  address: text("address"),
  emergencyContact: varchar("emergency_contact", { length: 255 }),
  bloodType: varchar("blood_type", { length: 10, enum: BLOOD_TYPES }),
  allergies: jsonb("allergies").$type<string[]>(),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).notNull(),
}, (table) => ({
  emailIdx: index("idx_patients_email").on(table.email),
}));

export const medicalRecords = pgTable("medical_records", {
  id: varchar("id", { length: 36 }).primaryKey(),
  patientId: varchar("patient_id", { length: 36 }).notNull().references(() => patients.id, { onDelete: "cascade" }),
  recordType: varchar("record_type", { length: 100, enum: RECORD_TYPES }).notNull(),
  modality: varchar("modality", { length: 100, enum: MODALITIES }).notNull(),
  diagnosis: text("diagnosis"),
  symptoms: jsonb("symptoms").$type<string[]>(),
  findings: text("findings"),
  recommendations: jsonb("recommendations").$type<string[]>(),
  suggestedTests: jsonb("suggested_tests").$type<string[]>(),
  imagePath: text("image_path"),
  confidenceScore: numeric("confidence_score", { precision: 5, scale: 4 }),
  doctorNotes: text("doctor_notes"),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).notNull(),
}, (table) => ({
  patientIdx: index("idx_medical_records_patient").on(table.patientId),
  typeIdx: index("idx_medical_records_type").on(table.recordType),
}));

export const appointments = pgTable("appointments", {
  id: varchar("id", { length: 36 }).primaryKey(),
  patientId: varchar("patient_id", { length: 36 }).references(() => patients.id, { onDelete: "cascade" }),
  doctorId: varchar("doctor_id", { length: 255 }).notNull(),
  doctorName: varchar("doctor_name", { length: 255 }).notNull(),
  doctorEmail: varchar("doctor_email", { length: 255 }).notNull(),
  patientName: varchar("patient_name", { length: 255 }).notNull(),
  patientPhone: varchar("patient_phone", { length: 50 }).notNull(),
  patientEmail: varchar("patient_email", { length: 255 }).notNull(),
  appointmentDate: date("appointment_date", { mode: "string" }).notNull(),
  appointmentTime: varchar("appointment_time", { length: 5 }).notNull(),
  symptoms: text("symptoms"),
  status: varchar("status", { length: 50, enum: APPOINTMENT_STATUSES }).notNull().default("confirmed"),
  notes: text("notes"),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).notNull(),
}, (table) => ({
  patientIdx: index("idx_appointments_patient").on(table.patientId),
  dateIdx: index("idx_appointments_date").on(table.appointmentDate),
}));

export const userActivityLogs = pgTable("user_activity_logs", {
  id: text("id").primaryKey(),
  userId: text("user_id"),
  userEmail: text("user_email"),
  activityType: text("activity_type", { enum: ACTIVITY_TYPES }).notNull(),
  description: text("description").notNull(),
  ipAddress: text("ip_address"),
  userAgent: text("user_agent"),
  metadata: jsonb("metadata").$type<Metadata>(),
  timestamp: timestamp("timestamp", { withTimezone: true }).notNull(),
  sessionId: text("session_id"),
});

export const systemLogs = pgTable("system_logs", {
  id: text("id").primaryKey(),
  level: text("level", { enum: LOG_LEVELS }).notNull(),
  component: text("component").notNull(),
  message: text("message").notNull(),
  stackTrace: text("stack_trace"),
  metadata: jsonb("metadata").$type<Metadata>(),
  timestamp: timestamp("timestamp", { withTimezone: true }).notNull(),
});

export const adminUsers = pgTable("admin_users", {
  id: text("id").primaryKey(),
  email: text("email").unique().notNull(),
  name: text("name").notNull(),
  role: text("role").notNull(),
  permissions: jsonb("permissions").$type<string[]>().notNull(),
  isActive: boolean("is_active").notNull().default(true),
  lastLogin: timestamp("last_login", { withTimezone: true }),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull(),
});

export const moderationActions = pgTable("moderation_actions", {
  id: text("id").primaryKey(),
  adminId: text("admin_id").notNull(),
  adminEmail: text("admin_email").notNull(),
  targetType: text("target_type").notNull(),
  targetId: text("target_id").notNull(),
  actionType: text("action_type").notNull(),
  reason: text("reason"),
  status: text("status", { enum: MODERATION_STATUSES }).notNull(),
  metadata: jsonb("metadata").$type<Metadata>(),
  timestamp: timestamp("timestamp", { withTimezone: true }).notNull(),
});

export const contentFlags = pgTable("content_flags", {
  id: text("id").primaryKey(),
  contentType: text("content_type").notNull(),
  contentId: text("content_id").notNull(),
  reporterId: text("reporter_id"),
  reporterEmail: text("reporter_email"),
  reason: text("reason").notNull(),
  description: text("description"),
  status: text("status", { enum: MODERATION_STATUSES }).notNull().default("pending"),
  adminNotes: text("admin_notes"),
  timestamp: timestamp("timestamp", { withTimezone: true }).notNull(),
});

export const analyticsCache = pgTable("analytics_cache", {
  id: text("id").primaryKey(),
  cacheKey: text("cache_key").unique().notNull(),
  data: jsonb("data").$type<JsonValue>().notNull(),
  expiresAt: timestamp("expires_at", { withTimezone: true }).notNull(),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull(),
});

// ============================================================================
// Input schemas
// ============================================================================

export const insertPatientSchema = createInsertSchema(patients, {
  email: z.string().trim().toLowerCase().email(),
  name: z.string().trim().min(1).max(100),
  phone: z.string().max(20),
  dateOfBirth: z.string().regex(DATE_PATTERN, "Expected a date formatted YYYY-MM-DD"),
  gender: z.enum(GENDERS),
  address: z.string().max(500),
  emergencyContact: z.string().max(100),
  bloodType: z.enum(BLOOD_TYPES),
  allergies: z.array(z.string()),
}).omit({
  id: true,
  createdAt: true,
  updatedAt: true,
});

// Email is the natural key and cannot change after creation
export const updatePatientSchema = insertPatientSchema.omit({ email: true }).partial();

export const insertMedicalRecordSchema = createInsertSchema(medicalRecords, {
  recordType: z.enum(RECORD_TYPES),
  modality: z.enum(MODALITIES),
  diagnosis: z.string().max(500),
  symptoms: z.array(z.string()),
  recommendations: z.array(z.string()),
  suggestedTests: z.array(z.string()),
  confidenceScore: z.number().min(0).max(1),
}).omit({
  id: true,
  patientId: true,
  imagePath: true,
  createdAt: true,
  updatedAt: true,
});

export const updateMedicalRecordSchema = insertMedicalRecordSchema.pick({
  diagnosis: true,
  symptoms: true,
  findings: true,
  recommendations: true,
  suggestedTests: true,
  confidenceScore: true,
  doctorNotes: true,
}).partial();

export const insertAppointmentSchema = createInsertSchema(appointments, {
  doctorId: z.string().trim().min(1),
  doctorName: z.string().trim().min(1),
  doctorEmail: z.string().email(),
  patientName: z.string().trim().min(1),
  patientPhone: z.string().trim().min(1).max(50),
  patientEmail: z.string().trim().toLowerCase().email(),
  appointmentDate: z.string().regex(DATE_PATTERN, "Expected a date formatted YYYY-MM-DD"),
  appointmentTime: z.string().regex(TIME_PATTERN, "Expected a time formatted HH:MM"),
  status: z.enum(APPOINTMENT_STATUSES),
}).omit({
  id: true,
  createdAt: true,
  updatedAt: true,
});

export const updateAppointmentSchema = insertAppointmentSchema.partial();

export const insertContentFlagSchema = createInsertSchema(contentFlags, {
  contentType: z.string().trim().min(1),
  contentId: z.string().trim().min(1),
  reason: z.string().trim().min(1),
  reporterEmail: z.string().email(),
}).omit({
  id: true,
  status: true,
  adminNotes: true,
  timestamp: true,
});

export const insertAdminUserSchema = createInsertSchema(adminUsers, {
  email: z.string().trim().toLowerCase().email(),
  name: z.string().trim().min(1),
  role: z.string().trim().min(1),
  permissions: z.array(z.string()),
}).omit({
  id: true,
  lastLogin: true,
  createdAt: true,
});

export type InsertPatient = z.infer<typeof insertPatientSchema>;
export type UpdatePatient = z.infer<typeof updatePatientSchema>;
export type InsertMedicalRecord = z.infer<typeof insertMedicalRecordSchema>;
export type UpdateMedicalRecord = z.infer<typeof updateMedicalRecordSchema>;
export type InsertAppointment = z.infer<typeof insertAppointmentSchema>;
export type UpdateAppointment = z.infer<typeof updateAppointmentSchema>;
export type InsertContentFlag = z.infer<typeof insertContentFlagSchema>;
export type InsertAdminUser = z.infer<typeof insertAdminUserSchema>;

// ============================================================================
// Entities as callers see them, identical on every backend
// ============================================================================

export interface Patient {
  id: string;
  email: string;
  name: string;
  phone: string | null;
  dateOfBirth: string | null;
  gender: Gender | null;
  address: string | null;
  emergencyContact: string | null;
  bloodType: BloodType | null;
  allergies: string[];
  createdAt: string;
  updatedAt: string;
}

export interface MedicalRecord {
  id: string;
  patientId: string;
  recordType: RecordType;
  modality: Modality;
  diagnosis: string | null;
  symptoms: string[];
  findings: string | null;
  recommendations: string[];
  suggestedTests: string[];
  imagePath: string | null;
  confidenceScore: number | null;
  doctorNotes: string | null;
  createdAt: string;
  updatedAt: string;
}

// Store-level record input: validated fields plus the image path the service assigned
export type NewMedicalRecord = InsertMedicalRecord & { imagePath?: string | null };

export interface Appointment {
  id: string;
  patientId: string | null;
  doctorId: string;
  doctorName: string;
  doctorEmail: string;
  patientName: string;
  patientPhone: string;
  patientEmail: string;
  appointmentDate: string;
  appointmentTime: string;
  symptoms: string | null;
  status: AppointmentStatus;
  notes: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface AppointmentFilter {
  doctorId?: string;
  patientId?: string;
  patientEmail?: string;
  status?: AppointmentStatus;
  appointmentDate?: string;
}

export interface UserActivityLog {
  id: string;
  userId: string | null;
  userEmail: string | null;
  activityType: ActivityType;
  description: string;
  ipAddress: string | null;
  userAgent: string | null;
  metadata: Metadata | null;
  timestamp: string;
  sessionId: string | null;
}

export interface SystemLog {
  id: string;
  level: LogLevel;
  component: string;
  message: string;
  stackTrace: string | null;
  metadata: Metadata | null;
  timestamp: string;
}

export interface AdminUser {
  id: string;
  email: string;
  name: string;
  role: string;
  permissions: string[];
  isActive: boolean;
  lastLogin: string | null;
  createdAt: string;
}

export interface ModerationAction {
  id: string;
  adminId: string;
  adminEmail: string;
  targetType: string;
  targetId: string;
  actionType: string;
  reason: string | null;
  status: ModerationStatus;
  metadata: Metadata | null;
  timestamp: string;
}

export interface ContentFlag {
  id: string;
  contentType: string;
  contentId: string;
  reporterId: string | null;
  reporterEmail: string | null;
  reason: string;
  description: string | null;
  status: ModerationStatus;
  adminNotes: string | null;
  timestamp: string;
}

export interface PatientStatistics {
  totalRecords: number;
  recordsByType: Record<string, number>;
  recentRecords: number;
  lastUpdated: string;
}
