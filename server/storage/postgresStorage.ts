import { Pool, type PoolClient } from "pg";
import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import { and, count, desc, eq, gte, ilike, isNotNull, lte, or, type SQL } from "drizzle-orm";
import {
  patients,
  medicalRecords,
  appointments,
  type Patient,
  type InsertPatient,
  type UpdatePatient,
  type MedicalRecord,
  type NewMedicalRecord,
  type UpdateMedicalRecord,
  type Appointment,
  type InsertAppointment,
  type UpdateAppointment,
  type AppointmentFilter,
  type PatientStatistics,
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
import { POSTGRES_CORE_DDL } from "./ddl";
import {
  daysBefore,
  decodeList,
  generateId,
  hasErrorCode,
  likePattern,
  monotonicNow,
  toIsoString,
  toNumberOrNull,
} from "./rowMapping";

const UNIQUE_VIOLATION = "23505";
const FOREIGN_KEY_VIOLATION = "23503";

type PatientRow = typeof patients.$inferSelect;
type MedicalRecordRow = typeof medicalRecords.$inferSelect;
type AppointmentRow = typeof appointments.$inferSelect;

// numeric(5,4) travels as a string through node-postgres
function toNumeric(value: number | null | undefined): string | null {
  return value === null || value === undefined ? null : value.toFixed(4);
}

export function mapPgPatientRow(row: PatientRow): Patient {
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
    createdAt: toIsoString(row.createdAt),
    updatedAt: toIsoString(row.updatedAt),
  };
}

export function mapPgMedicalRecordRow(row: MedicalRecordRow): MedicalRecord {
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
    confidenceScore: toNumberOrNull(row.confidenceScore),
    doctorNotes: row.doctorNotes,
    createdAt: toIsoString(row.createdAt),
    updatedAt: toIsoString(row.updatedAt),
  };
}

export function mapPgAppointmentRow(row: AppointmentRow): Appointment {
  return {
    ...row,
    createdAt: toIsoString(row.createdAt),
    updatedAt: toIsoString(row.updatedAt),
  };
}

export interface PostgresStorageOptions {
  connectionUrl: string;
  poolMax?: number;
  logger?: Logger;
}

/**
 * Client/server backend over a node-postgres pool. Each operation checks out
 * its own client and hands it back in `finally`; nothing holds a client
 * between calls.
 */
export class PostgresStorage implements IRecordStore {
  readonly kind = "client-server" as const;

  private pool?: Pool;
  private readonly log: Logger;

  constructor(private readonly options: PostgresStorageOptions) {
    this.log = (options.logger ?? safeLogger).child("postgres-storage");
  }

  async connect(): Promise<boolean> {
    if (this.pool) return true;
    const pool = new Pool({
      connectionString: this.options.connectionUrl,
      max: this.options.poolMax ?? 10,
    });
    pool.on("error", (error) => {
      this.log.error("Idle database client error", { error: errorMessage(error) });
    });

    try {
      const client = await pool.connect();
      client.release();
      this.pool = pool;
      this.log.info("Connected to PostgreSQL pool");
      return true;
    } catch (error) {
      this.log.error("PostgreSQL connection failed", { error: errorMessage(error) });
      await pool.end().catch((endError: unknown) => {
        this.log.warn("Pool shutdown after failed connect also failed", { error: errorMessage(endError) });
      });
      return false;
    }
  }

  async disconnect(): Promise<boolean> {
    const pool = this.pool;
    if (!pool) return true;
    this.pool = undefined;
    try {
      await pool.end();
      return true;
    } catch (error) {
      this.log.error("PostgreSQL pool shutdown failed", { error: errorMessage(error) });
      return false;
    }
  }

  async createSchema(): Promise<boolean> {
    return this.attempt("create schema", false, async (_db, client) => {
      await client.query("BEGIN");
      try {
        for (const statement of POSTGRES_CORE_DDL) await client.query(statement);
        await client.query("COMMIT");
      } catch (error) {
        await client.query("ROLLBACK");
        throw error;
      }
      return true;
    });
  }

  getHandle(): StoreHandle | undefined {
    return this.pool ? { kind: "client-server", pool: this.pool } : undefined;
  }

  private async withClient<T>(run: (db: NodePgDatabase, client: PoolClient) => Promise<T>): Promise<T> {
    if (!this.pool) throw new StorageError("PostgreSQL pool is not connected");
    const client = await this.pool.connect();
    try {
      return await run(drizzle(client), client);
    } finally {
      client.release();
    }
  }

  private async attempt<T>(
    operation: string,
    fallback: T,
    run: (db: NodePgDatabase, client: PoolClient) => Promise<T>,
  ): Promise<T> {
    try {
      return await this.withClient(run);
    } catch (error) {
      this.log.error(`Failed to ${operation}`, { error: errorMessage(error) });
      return fallback;
    }
  }

  // Patient operations
  async createPatient(fields: InsertPatient): Promise<string> {
    const id = generateId();
    const now = new Date(monotonicNow());
    try {
      await this.withClient((db) =>
        db.insert(patients).values({
          id,
          email: fields.email.trim().toLowerCase(),
          name: fields.name,
          phone: fields.phone ?? null,
          dateOfBirth: fields.dateOfBirth ?? null,
          gender: fields.gender ?? null,
          address: fields.address ?? null,
          emergencyContact: fields.emergencyContact ?? null,
          bloodType: fields.bloodType ?? null,
          allergies: fields.allergies ?? [],
          createdAt: now,
          updatedAt: now,
        }),
      );
      return id;
    } catch (error) {
      if (hasErrorCode(error, UNIQUE_VIOLATION)) {
        throw new ConflictError("A patient with this email already exists");
      }
      throw new StorageError(`Failed to create patient: ${errorMessage(error)}`);
    }
  }

  async getPatient(id: string): Promise<Patient | undefined> {
    return this.attempt("get patient", undefined, async (db) => {
      const [row] = await db.select().from(patients).where(eq(patients.id, id));
      return row ? mapPgPatientRow(row) : undefined;
    });
  }

  async getPatientByEmail(email: string): Promise<Patient | undefined> {
    return this.attempt("get patient by email", undefined, async (db) => {
      const [row] = await db.select().from(patients).where(eq(patients.email, email.trim().toLowerCase()));
      return row ? mapPgPatientRow(row) : undefined;
    });
  }

  async updatePatient(id: string, changes: UpdatePatient): Promise<boolean> {
    return this.attempt("update patient", false, async (db) => {
      const updated = await db
        .update(patients)
        .set({ ...changes, updatedAt: new Date(monotonicNow()) })
        .where(eq(patients.id, id))
        .returning({ id: patients.id });
      return updated.length > 0;
    });
  }

  async deletePatient(id: string): Promise<boolean> {
    return this.attempt("delete patient", false, (db) =>
      db.transaction(async (tx) => {
        await tx.delete(medicalRecords).where(eq(medicalRecords.patientId, id));
        await tx.delete(appointments).where(eq(appointments.patientId, id));
        const deleted = await tx.delete(patients).where(eq(patients.id, id)).returning({ id: patients.id });
        return deleted.length > 0;
      }),
    );
  }

  async countPatients(): Promise<number> {
    return this.attempt("count patients", 0, async (db) => {
      const [row] = await db.select({ value: count() }).from(patients);
      return row?.value ?? 0;
    });
  }

  async searchPatients(text: string, limit: number = DEFAULT_SEARCH_LIMIT): Promise<Patient[]> {
    const pattern = likePattern(text.trim());
    return this.attempt("search patients", [], async (db) => {
      const rows = await db
        .select()
        .from(patients)
        .where(or(ilike(patients.name, pattern), ilike(patients.email, pattern), ilike(patients.phone, pattern)))
        .limit(limit);
      return rows.map(mapPgPatientRow);
    });
  }

  // Medical record operations
  async addMedicalRecord(patientId: string, fields: NewMedicalRecord): Promise<string> {
    const id = generateId();
    const now = new Date(monotonicNow());
    try {
      await this.withClient((db) =>
        db.insert(medicalRecords).values({
          id,
          patientId,
          recordType: fields.recordType,
          modality: fields.modality,
          diagnosis: fields.diagnosis ?? null,
          symptoms: fields.symptoms ?? [],
          findings: fields.findings ?? null,
          recommendations: fields.recommendations ?? [],
          suggestedTests: fields.suggestedTests ?? [],
          imagePath: fields.imagePath ?? null,
          confidenceScore: toNumeric(fields.confidenceScore),
          doctorNotes: fields.doctorNotes ?? null,
          createdAt: now,
          updatedAt: now,
        }),
      );
      return id;
    } catch (error) {
      if (hasErrorCode(error, FOREIGN_KEY_VIOLATION)) {
        throw new NotFoundError(`Patient ${patientId} not found`);
      }
      throw new StorageError(`Failed to add medical record: ${errorMessage(error)}`);
    }
  }

  async getMedicalRecord(id: string): Promise<MedicalRecord | undefined> {
    return this.attempt("get medical record", undefined, async (db) => {
      const [row] = await db.select().from(medicalRecords).where(eq(medicalRecords.id, id));
      return row ? mapPgMedicalRecordRow(row) : undefined;
    });
  }

  async updateMedicalRecord(id: string, changes: UpdateMedicalRecord): Promise<boolean> {
    const { confidenceScore, ...rest } = changes;
    return this.attempt("update medical record", false, async (db) => {
      const updated = await db
        .update(medicalRecords)
        .set({
          ...rest,
          ...(confidenceScore !== undefined ? { confidenceScore: toNumeric(confidenceScore) } : {}),
          updatedAt: new Date(monotonicNow()),
        })
        .where(eq(medicalRecords.id, id))
        .returning({ id: medicalRecords.id });
      return updated.length > 0;
    });
  }

  async deleteMedicalRecord(id: string): Promise<boolean> {
    return this.attempt("delete medical record", false, async (db) => {
      const deleted = await db.delete(medicalRecords).where(eq(medicalRecords.id, id)).returning({ id: medicalRecords.id });
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
    if (filter.from) conditions.push(gte(medicalRecords.createdAt, new Date(filter.from)));
    if (filter.to) conditions.push(lte(medicalRecords.createdAt, new Date(filter.to)));

    return this.attempt("get medical history", [], async (db) => {
      const rows = await db
        .select()
        .from(medicalRecords)
        .where(and(...conditions))
        .orderBy(desc(medicalRecords.createdAt))
        .limit(limit);
      return rows.map(mapPgMedicalRecordRow);
    });
  }

  async getPatientStatistics(patientId: string, now: Date = new Date()): Promise<PatientStatistics | undefined> {
    return this.attempt("get patient statistics", undefined, async (db) => {
      const [total] = await db
        .select({ value: count() })
        .from(medicalRecords)
        .where(eq(medicalRecords.patientId, patientId));

      const byType = await db
        .select({ recordType: medicalRecords.recordType, value: count() })
        .from(medicalRecords)
        .where(eq(medicalRecords.patientId, patientId))
        .groupBy(medicalRecords.recordType);

      const [recent] = await db
        .select({ value: count() })
        .from(medicalRecords)
        .where(
          and(
            eq(medicalRecords.patientId, patientId),
            gte(medicalRecords.createdAt, new Date(daysBefore(now, RECENT_WINDOW_DAYS))),
          ),
        );

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
    return this.attempt("get condition history", [], async (db) => {
      const rows = await db
        .select()
        .from(medicalRecords)
        .where(and(eq(medicalRecords.patientId, patientId), ilike(medicalRecords.diagnosis, pattern)))
        .orderBy(desc(medicalRecords.createdAt));
      return rows.map(mapPgMedicalRecordRow);
    });
  }

  async listImagePaths(patientId: string): Promise<string[]> {
    return this.attempt("list image paths", [], async (db) => {
      const rows = await db
        .select({ imagePath: medicalRecords.imagePath })
        .from(medicalRecords)
        .where(and(eq(medicalRecords.patientId, patientId), isNotNull(medicalRecords.imagePath)));
      return rows.flatMap((row) => (row.imagePath ? [row.imagePath] : []));
    });
  }

  // Appointment operations
  async createAppointment(fields: InsertAppointment): Promise<string> {
    const id = generateId();
    const now = new Date(monotonicNow());
    try {
      await this.withClient((db) =>
        db.insert(appointments).values({
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
        }),
      );
      return id;
    } catch (error) {
      if (hasErrorCode(error, FOREIGN_KEY_VIOLATION)) {
        throw new NotFoundError(`Patient ${fields.patientId ?? ""} not found`);
      }
      throw new StorageError(`Failed to create appointment: ${errorMessage(error)}`);
    }
  }

  async getAppointment(id: string): Promise<Appointment | undefined> {
    return this.attempt("get appointment", undefined, async (db) => {
      const [row] = await db.select().from(appointments).where(eq(appointments.id, id));
      return row ? mapPgAppointmentRow(row) : undefined;
    });
  }

  async listAppointments(filter: AppointmentFilter = {}): Promise<Appointment[]> {
    const conditions: SQL[] = [];
    if (filter.doctorId) conditions.push(eq(appointments.doctorId, filter.doctorId));
    if (filter.patientId) conditions.push(eq(appointments.patientId, filter.patientId));
    if (filter.patientEmail) conditions.push(eq(appointments.patientEmail, filter.patientEmail.trim().toLowerCase()));
    if (filter.status) conditions.push(eq(appointments.status, filter.status));
    if (filter.appointmentDate) conditions.push(eq(appointments.appointmentDate, filter.appointmentDate));

    return this.attempt("list appointments", [], async (db) => {
      const rows = await db
        .select()
        .from(appointments)
        .where(conditions.length > 0 ? and(...conditions) : undefined)
        .orderBy(appointments.appointmentDate, appointments.appointmentTime);
      return rows.map(mapPgAppointmentRow);
    });
  }

  async updateAppointment(id: string, changes: UpdateAppointment): Promise<boolean> {
    return this.attempt("update appointment", false, async (db) => {
      const updated = await db
        .update(appointments)
        .set({ ...changes, updatedAt: new Date(monotonicNow()) })
        .where(eq(appointments.id, id))
        .returning({ id: appointments.id });
      return updated.length > 0;
    });
  }

  async deleteAppointment(id: string): Promise<boolean> {
    return this.attempt("delete appointment", false, async (db) => {
      const deleted = await db.delete(appointments).where(eq(appointments.id, id)).returning({ id: appointments.id });
      return deleted.length > 0;
    });
  }
}
