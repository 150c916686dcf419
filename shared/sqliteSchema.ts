import { sqliteTable, text, integer, real, index } from "drizzle-orm/sqlite-core";
import {
  GENDERS,
  BLOOD_TYPES,
  RECORD_TYPES,
  MODALITIES,
  APPOINTMENT_STATUSES,
  ACTIVITY_TYPES,
  LOG_LEVELS,
  MODERATION_STATUSES,
} from "./schema";

// Embedded mirror of ./schema. List-valued and metadata columns hold JSON text,
// timestamps hold ISO-8601 strings.

export const patients = sqliteTable("patients", {
  id: text("id").primaryKey(),
  email: text("email").unique().notNull(),
  name: text("name").notNull(),
  phone: text("phone"),
  dateOfBirth: text("date_of_birth"),
  gender: text("gender", { enum: GENDERS }),
  address: text("address"),
  emergencyContact: text("emergency_contact"),
  bloodType: text("blood_type", { enum: BLOOD_TYPES }),
  allergies: text("allergies"),
  createdAt: text("created_at").notNull(),
  updatedAt: text("updated_at").notNull(),
}, (table) => ({
  emailIdx: index("idx_patients_email").on(table.email),
}));

export const medicalRecords = sqliteTable("medical_records", {
  id: text("id").primaryKey(),
  patientId: text("patient_id").notNull().references(() => patients.id, { onDelete: "cascade" }),
  recordType: text("record_type", { enum: RECORD_TYPES }).notNull(),
  modality: text("modality", { enum: MODALITIES }).notNull(),
  diagnosis: text("diagnosis"),
  symptoms: text("symptoms"),
  findings: text("findings"),
  recommendations: text("recommendations"),
  suggestedTests: text("suggested_tests"),
  imagePath: text("image_path"),
  confidenceScore: real("confidence_score"),
  doctorNotes: text("doctor_notes"),
  createdAt: text("created_at").notNull(),
  updatedAt: text("updated_at").notNull(),
}, (table) => ({
  patientIdx: index("idx_medical_records_patient").on(table.patientId),
  typeIdx: index("idx_medical_records_type").on(table.recordType),
}));

export const appointments = sqliteTable("appointments", {
  id: text("id").primaryKey(),
  patientId: text("patient_id").references(() => patients.id, { onDelete: "cascade" }),
  doctorId: text("doctor_id").notNull(),
  doctorName: text("doctor_name").notNull(),
  doctorEmail: text("doctor_email").notNull(),
  patientName: text("patient_name").notNull(),
  patientPhone: text("patient_phone").notNull(),
  patientEmail: text("patient_email").notNull(),
  appointmentDate: text("appointment_date").notNull(),
  appointmentTime: text("appointment_time").notNull(),
  symptoms: text("symptoms"),
  status: text("status", { enum: APPOINTMENT_STATUSES }).notNull().default("confirmed"),
  notes: text("notes"),
  createdAt: text("created_at").notNull(),
  updatedAt: text("updated_at").notNull(),
}, (table) => ({
  patientIdx: index("idx_appointments_patient").on(table.patientId),
  dateIdx: index("idx_appointments_date").on(table.appointmentDate),
}));

export const userActivityLogs = sqliteTable("user_activity_logs", {
  id: text("id").primaryKey(),
  userId: text("user_id"),
  userEmail: text("user_email"),
  activityType: text("activity_type", { enum: ACTIVITY_TYPES }).notNull(),
  description: text("description").notNull(),
  ipAddress: text("ip_address"),
  userAgent: text("user_agent"),
  metadata: text("metadata"),
  timestamp: text("timestamp").notNull(),
  sessionId: text("session_id"),
});

export const systemLogs = sqliteTable("system_logs", {
  id: text("id").primaryKey(),
  level: text("level", { enum: LOG_LEVELS }).notNull(),
  component: text("component").notNull(),
  message: text("message").notNull(),
  stackTrace: text("stack_trace"),
  metadata: text("metadata"),
  timestamp: text("timestamp").notNull(),
});

export const adminUsers = sqliteTable("admin_users", {
  id: text("id").primaryKey(),
  email: text("email").unique().notNull(),
  name: text("name").notNull(),
  role: text("role").notNull(),
  permissions: text("permissions").notNull(),
  isActive: integer("is_active", { mode: "boolean" }).notNull().default(true),
  lastLogin: text("last_login"),
  createdAt: text("created_at").notNull(),
});

export const moderationActions = sqliteTable("moderation_actions", {
  id: text("id").primaryKey(),
  adminId: text("admin_id").notNull(),
  adminEmail: text("admin_email").notNull(),
  targetType: text("target_type").notNull(),
  targetId: text("target_id").notNull(),
  actionType: text("action_type").notNull(),
  reason: text("reason"),
  status: text("status", { enum: MODERATION_STATUSES }).notNull(),
  metadata: text("metadata"),
  timestamp: text("timestamp").notNull(),
});

export const contentFlags = sqliteTable("content_flags", {
  id: text("id").primaryKey(),
  contentType: text("content_type").notNull(),
  contentId: text("content_id").notNull(),
  reporterId: text("reporter_id"),
  reporterEmail: text("reporter_email"),
  reason: text("reason").notNull(),
  description: text("description"),
  status: text("status", { enum: MODERATION_STATUSES }).notNull().default("pending"),
  adminNotes: text("admin_notes"),
  timestamp: text("timestamp").notNull(),
});

export const analyticsCache = sqliteTable("analytics_cache", {
  id: text("id").primaryKey(),
  cacheKey: text("cache_key").unique().notNull(),
  data: text("data").notNull(),
  expiresAt: text("expires_at").notNull(),
  createdAt: text("created_at").notNull(),
});
