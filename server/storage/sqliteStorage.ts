import { mkdirSync } from "fs";
import { dirname } from "path";
import Database from "better-sqlite3";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import { and, count, desc, eq, gte, isNotNull, lte, or, sql, type SQL } from "drizzle-orm";
import * as schema from "@shared/sqliteSchema";
import { patients, medicalRecords, appointments } from "@shared/sqliteSchema";
import type {
  Patient,
  InsertPatient,
  UpdatePatient,
  MedicalRecord,
  NewMedicalRecord,
  UpdateMedicalRecord,
  Appointment,
  InsertAppointment,
  UpdateAppointment,
  AppointmentFilter,
  PatientStatistics,
} from "@shared/schema";
import {
  DEFAULT_HISTORY_LIMIT,
  DEFAULT_SEARCH_LIMIT,
  RECENT_WINDOW_DAYS,
  type IRecordStore,
  type MedicalHistoryFilter,
  type StoreHandle,
} from "../storage";
import { ConflictError, NotFoundError, StorageError, errorMessage } from "../errors";
import { safeLogger, type Logger } from "../safe_logger";
import { SQLITE_CORE_DDL } from "./ddl";
import {
  daysBefore,
  decodeList,
  encodeList,
  generateId,
  hasErrorCode,
  likePattern,
  monotonicNow,
  toIsoString,
} from "./rowMapping";

type PatientRow = typeof patients.$inferSelect;
type MedicalRecordRow = typeof medicalRecords.$inferSelect;
type AppointmentRow = typeof appointments.$inferSelect;

export function mapPatientRow(row: PatientRow): Patient {
  return {
    id: row.id,
    email: row.email,
    name: row.name,
    phone: row.phone,
    dateOfBirth: row.dateOfBirth,
    gender: row.gender,
    address: row.address,
    emergencyContact: row.emergencyContact,
    bloodType: row.bloodType,
    allergies: decodeList(row.allergies),
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

export function mapMedicalRecordRow(row: MedicalRecordRow): MedicalRecord {
  return {
    id: row.id,
    patientId: row.patientId,
    recordType: row.recordType,
    modality: row.modality,
    diagnosis: row.diagnosis,
    symptoms: decodeList(row.symptoms),
    findings: row.findings,
    recommendations: decodeList(row.recommendations),
    suggestedTests: decodeList(row.suggestedTests),
    imagePath: row.imagePath,
    confidenceScore: row.confidenceScore,
    doctorNotes: row.doctorNotes,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

function mapAppointmentRow(row: AppointmentRow): Appointment {
  return { ...row };
}

export interface SqliteStorageOptions {
  /** File path, or ":memory:" */
  path: string;
  logger?: Logger;
}

/**
 * Embedded backend: one better-sqlite3 file driven through drizzle.
 * better-sqlite3 is synchronous, so every operation completes before its
 * promise resolves.
 */
export class SqliteStorage implements IRecordStore {
  readonly kind = "embedded" as const;

  private sqlite?: Database.Database;
  private db?: BetterSQLite3Database<typeof schema>;
  private readonly log: Logger;

  constructor(private readonly options: SqliteStorageOptions) {
    this.log = (options.logger ?? safeLogger).child("sqlite-storage");
  }

  get path(): string {
    return this.options.path;
  }

  async connect(): Promise<boolean> {
    if (this.sqlite) return true;
    try {
      if (this.options.path !== ":memory:") {
        mkdirSync(dirname(this.options.path), { recursive: true });
      }
      const sqlite = new Database(this.options.path);
      sqlite.pragma("foreign_keys = ON");
      // SQLite's lower() folds ASCII only
      sqlite.function("js_lower", { deterministic: true }, (value: unknown) =>
        typeof value === "string" ? value.toLowerCase() : value,
      );
      this.sqlite = sqlite;
      this.db = drizzle(sqlite, { schema });
      this.log.info(`Connected to embedded database at ${this.options.path}`);
      return true;
    } catch (error) {
      this.log.error("Embedded database connection failed", { error: errorMessage(error) });
      return false;
    }
  }

  async disconnect(): Promise<boolean> {
    if (!this.sqlite) return true;
    try {
      this.sqlite.close();
      return true;
    } catch (error) {
      this.log.error("Embedded database close failed", { error: errorMessage(error) });
      return false;
    } finally {
      this.sqlite = undefined;
      this.db = undefined;
    }
  }

  async createSchema(): Promise<boolean> {
    try {
      const sqlite = this.requireSqlite();
      sqlite.transaction(() => {
        for (const statement of SQLITE_CORE_DDL) sqlite.exec(statement);
      })();
      return true;
    } catch (error) {
      this.log.error("Embedded schema creation failed", { error: errorMessage(error) });
      return false;
    }
  }

  getHandle(): StoreHandle | undefined {
    if (!this.sqlite || !this.db) return undefined;
    return { kind: "embedded", db: this.db, sqlite: this.sqlite };
  }

  private requireSqlite(): Database.Database {
    if (!this.sqlite) throw new StorageError("Embedded database is not connected");
    return this.sqlite;
  }

  private requireDb(): BetterSQLite3Database<typeof schema> {
    if (!this.db) throw new StorageError("Embedded database is not connected");
    return this.db;
  }

  /** Runs one operation, logging and substituting `fallback` when it throws. */
  private attempt<T>(operation: string, fallback: T, run: (db: BetterSQLite3Database<typeof schema>) => T): T {
    try {
      return run(this.requireDb());
    } catch (error) {
      this.log.error(`Failed to ${operation}`, { error: errorMessage(error) });
      return fallback;
    }
  }

  // Patient operations
  async createPatient(fields: InsertPatient): Promise<string> {
    const id = generateId();
    const now = monotonicNow();
    try {
      this.requireDb()
        .insert(patients)
        .values({
          id,
          email: fields.email.trim().toLowerCase(),
          name: fields.name,
          phone: fields.phone ?? null,
          dateOfBirth: fields.dateOfBirth ?? null,
          gender: fields.gender ?? null,
          address: fields.address ?? null,
          emergencyContact: fields.emergencyContact ?? null,
          bloodType: fields.bloodType ?? null,
          allergies: encodeList(fields.allergies),
          createdAt: now,
          updatedAt: now,
        })
        .run();
      return id;
    } catch (error) {
      if (hasErrorCode(error, "SQLITE_CONSTRAINT_UNIQUE", "SQLITE_CONSTRAINT_PRIMARYKEY")) {
        throw new ConflictError("A patient with this email already exists");
      }
      throw new StorageError(`Failed to create patient: ${errorMessage(error)}`);
    }
  }

  async getPatient(id: string): Promise<Patient | undefined> {
    return this.attempt("get patient", undefined, (db) => {
      const row = db.select().from(patients).where(eq(patients.id, id)).get();
      return row ? mapPatientRow(row) : undefined;
    });
  }

  async getPatientByEmail(email: string): Promise<Patient | undefined> {
    return this.attempt("get patient by email", undefined, (db) => {
      const row = db.select().from(patients).where(eq(patients.email, email.trim().toLowerCase())).get();
      return row ? mapPatientRow(row) : undefined;
    });
  }

  async updatePatient(id: string, changes: UpdatePatient): Promise<boolean> {
    const { allergies, ...rest } = changes;
    return this.attempt("update patient", false, (db) => {
      const updated = db
        .update(patients)
        .set({
          ...rest,
          ...(allergies !== undefined ? { allergies: encodeList(allergies) } : {}),
          updatedAt: monotonicNow(),
        })
        .where(eq(patients.id, id))
        .returning({ id: patients.id })
        .all();
      return updated.length > 0;
    });
  }

  async deletePatient(id: string): Promise<boolean> {
    return this.attempt("delete patient", false, (db) =>
      db.transaction((tx) => {
        tx.delete(medicalRecords).where(eq(medicalRecords.patientId, id)).run();
        tx.delete(appointments).where(eq(appointments.patientId, id)).run();
        const deleted = tx.delete(patients).where(eq(patients.id, id)).returning({ id: patients.id }).all();
        return deleted.length > 0;
      }),
    );
  }

  async countPatients(): Promise<number> {
    return this.attempt("count patients", 0, (db) => db.select({ value: count() }).from(patients).get()?.value ?? 0);
  }

  async searchPatients(text: string, limit: number = DEFAULT_SEARCH_LIMIT): Promise<Patient[]> {
    const pattern = likePattern(text.trim());
    return this.attempt("search patients", [], (db) =>
      db
        .select()
        .from(patients)
        .where(
          or(
            sql`js_lower(${patients.name}) LIKE ${pattern} ESCAPE '\\'`,
            sql`js_lower(${patients.email}) LIKE ${pattern} ESCAPE '\\'`,
            sql`js_lower(coalesce(${patients.phone}, '')) LIKE ${pattern} ESCAPE '\\'`,
          ),
        )
        .limit(limit)
        .all()
        .map(mapPatientRow),
    );
  }

  // Medical record operations
  async addMedicalRecord(patientId: string, fields: NewMedicalRecord): Promise<string> {
    const id = generateId();
    const now = monotonicNow();
    try {
      this.requireDb()
        .insert(medicalRecords)
        .values({
          id,
          patientId,
          recordType: fields.recordType,
          modality: fields.modality,
          diagnosis: fields.diagnosis ?? null,
          symptoms: encodeList(fields.symptoms),
          findings: fields.findings ?? null,
          recommendations: encodeList(fields.recommendations),
          suggestedTests: encodeList(fields.suggestedTests),
          imagePath: fields.imagePath ?? null,
          confidenceScore: fields.confidenceScore ?? null,
          doctorNotes: fields.doctorNotes ?? null,
          createdAt: now,
          updatedAt: now,
        })
        .run();
      return id;
    } catch (error) {
      if (hasErrorCode(error, "SQLITE_CONSTRAINT_FOREIGNKEY")) {
        throw new NotFoundError(`Patient ${patientId} not found`);
      }
      throw new StorageError(`Failed to add medical record: ${errorMessage(error)}`);
    }
  }

  async getMedicalRecord(id: string): Promise<MedicalRecord | undefined> {
    return this.attempt("get medical record", undefined, (db) => {
      const row = db.select().from(medicalRecords).where(eq(medicalRecords.id, id)).get();
      return row ? mapMedicalRecordRow(row) : undefined;
    });
  }

  async updateMedicalRecord(id: string, changes: UpdateMedicalRecord): Promise<boolean> {
    const { symptoms, recommendations, suggestedTests, ...rest } = changes;
    return this.attempt("update medical record", false, (db) => {
      const updated = db
        .update(medicalRecords)
        .set({
          ...rest,
          ...(symptoms !== undefined ? { symptoms: encodeList(symptoms) } : {}),
          ...(recommendations !== undefined ? { recommendations: encodeList(recommendations) } : {}),
          ...(suggestedTests !== undefined ? { suggestedTests: encodeList(suggestedTests) } : {}),
          updatedAt: monotonicNow(),
        })
        .where(eq(medicalRecords.id, id))
        .returning({ id: medicalRecords.id })
        .all();
      return updated.length > 0;
    });
  }

  async deleteMedicalRecord(id: string): Promise<boolean> {
    return this.attempt("delete medical record", false, (db) => {
      const deleted = db.delete(medicalRecords).where(eq(medicalRecords.id, id)).returning({ id: medicalRecords.id }).all();
      return deleted.length > 0;
    });
  }

  async getMedicalHistory(
    patientId: string,
    limit: number = DEFAULT_HISTORY_LIMIT,
    filter: MedicalHistoryFilter = {},
  ): Promise<MedicalRecord[]> {
    const conditions: SQL[] = [eq(medicalRecords.patientId, patientId)];
    if (filter.recordType) conditions.push(eq(medicalRecords.recordType, filter.recordType));
    if (filter.modality) conditions.push(eq(medicalRecords.modality, filter.modality));
    if (filter.from) conditions.push(gte(medicalRecords.createdAt, toIsoString(filter.from)));
    if (filter.to) conditions.push(lte(medicalRecords.createdAt, toIsoString(filter.to)));

    return this.attempt("get medical history", [], (db) =>
      db
        .select()
        .from(medicalRecords)
        .where(and(...conditions))
        .orderBy(desc(medicalRecords.createdAt))
        .limit(limit)
        .all()
        .map(mapMedicalRecordRow),
    );
  }

  async getPatientStatistics(patientId: string, now: Date = new Date()): Promise<PatientStatistics | undefined> {
    return this.attempt("get patient statistics", undefined, (db) => {
      const total = db
        .select({ value: count() })
        .from(medicalRecords)
        .where(eq(medicalRecords.patientId, patientId))
        .get();

      const byType = db
        .select({ recordType: medicalRecords.recordType, value: count() })
        .from(medicalRecords)
        .where(eq(medicalRecords.patientId, patientId))
        .groupBy(medicalRecords.recordType)
        .all();

      const recent = db
        .select({ value: count() })
        .from(medicalRecords)
        .where(
          and(
            eq(medicalRecords.patientId, patientId),
            gte(medicalRecords.createdAt, daysBefore(now, RECENT_WINDOW_DAYS)),
          ),
        )
        .get();

      const recordsByType: Record<string, number> = {};
      for (const row of byType) recordsByType[row.recordType] = row.value;

      return {
        totalRecords: total?.value ?? 0,
        recordsByType,
        recentRecords: recent?.value ?? 0,
        lastUpdated: now.toISOString(),
      };
    });
  }

  async getConditionHistory(patientId: string, condition: string): Promise<MedicalRecord[]> {
    const pattern = likePattern(condition.trim());
    return this.attempt("get condition history", [], (db) =>
      db
        .select()
        .from(medicalRecords)
        .where(
          and(
            eq(medicalRecords.patientId, patientId),
            sql`js_lower(${medicalRecords.diagnosis}) LIKE ${pattern} ESCAPE '\\'`,
          ),
        )
        .orderBy(desc(medicalRecords.createdAt))
        .all()
        .map(mapMedicalRecordRow),
    );
  }

  async listImagePaths(patientId: string): Promise<string[]> {
    return this.attempt("list image paths", [], (db) =>
      db
        .select({ imagePath: medicalRecords.imagePath })
        .from(medicalRecords)
        .where(and(eq(medicalRecords.patientId, patientId), isNotNull(medicalRecords.imagePath)))
        .all()
        .flatMap((row) => (row.imagePath ? [row.imagePath] : [])),
    );
  }

  // Appointment operations
  async createAppointment(fields: InsertAppointment): Promise<string> {
    const id = generateId();
    const now = monotonicNow();
    try {
      this.requireDb()
        .insert(appointments)
        .values({
          id,
          patientId: fields.patientId ?? null,
          doctorId: fields.doctorId,
          doctorName: fields.doctorName,
          doctorEmail: fields.doctorEmail,
          patientName: fields.patientName,
          patientPhone: fields.patientPhone,
          patientEmail: fields.patientEmail.trim().toLowerCase(),
          appointmentDate: fields.appointmentDate,
          appointmentTime: fields.appointmentTime,
          symptoms: fields.symptoms ?? null,
          status: fields.status ?? "confirmed",
          notes: fields.notes ?? null,
          createdAt: now,
          updatedAt: now,
        })
        .run();
      return id;
    } catch (error) {
      if (hasErrorCode(error, "SQLITE_CONSTRAINT_FOREIGNKEY")) {
        throw new NotFoundError(`Patient ${fields.patientId ?? ""} not found`);
      }
      throw new StorageError(`Failed to create appointment: ${errorMessage(error)}`);
    }
  }

  async getAppointment(id: string): Promise<Appointment | undefined> {
    return this.attempt("get appointment", undefined, (db) => {
      const row = db.select().from(appointments).where(eq(appointments.id, id)).get();
      return row ? mapAppointmentRow(row) : undefined;
    });
  }

  async listAppointments(filter: AppointmentFilter = {}): Promise<Appointment[]> {
    const conditions: SQL[] = [];
    if (filter.doctorId) conditions.push(eq(appointments.doctorId, filter.doctorId));
    if (filter.patientId) conditions.push(eq(appointments.patientId, filter.patientId));
    if (filter.patientEmail) conditions.push(eq(appointments.patientEmail, filter.patientEmail.trim().toLowerCase()));
    if (filter.status) conditions.push(eq(appointments.status, filter.status));
    if (filter.appointmentDate) conditions.push(eq(appointments.appointmentDate, filter.appointmentDate));

    return this.attempt("list appointments", [], (db) =>
      db
        .select()
        .from(appointments)
        .where(conditions.length > 0 ? and(...conditions) : undefined)
        .orderBy(appointments.appointmentDate, appointments.appointmentTime)
        .all()
        .map(mapAppointmentRow),
    );
  }

  async updateAppointment(id: string, changes: UpdateAppointment): Promise<boolean> {
    return this.attempt("update appointment", false, (db) => {
      const updated = db
        .update(appointments)
        .set({ ...changes, updatedAt: monotonicNow() })
        .where(eq(appointments.id, id))
        .returning({ id: appointments.id })
        .all();
      return updated.length > 0;
    });
  }

  async deleteAppointment(id: string): Promise<boolean> {
    return this.attempt("delete appointment", false, (db) => {
      const deleted = db.delete(appointments).where(eq(appointments.id, id)).returning({ id: appointments.id }).all();
      return deleted.length > 0;
    });
  }
}
