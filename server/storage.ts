import type Database from "better-sqlite3";
import type { BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import type { Pool } from "pg";
import type * as sqliteSchema from "@shared/sqliteSchema";
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
  RecordType,
  Modality,
} from "@shared/schema";

export type StoreKind = "embedded" | "client-server";

export type EmbeddedHandle = {
  kind: "embedded";
  db: BetterSQLite3Database<typeof sqliteSchema>;
  sqlite: Database.Database;
};

export type ClientServerHandle = {
  kind: "client-server";
  pool: Pool;
};

/** Live connection of a store, for collaborators that share it (the admin log store). */
export type StoreHandle = EmbeddedHandle | ClientServerHandle;

export interface MedicalHistoryFilter {
  recordType?: RecordType;
  modality?: Modality;
  /** Inclusive lower bound on createdAt */
  from?: string;
  /** Inclusive upper bound on createdAt */
  to?: string;
}

/**
 * Persistence contract shared by the embedded and client/server backends.
 *
 * Reads resolve to `undefined` / `[]` on failure and mutations to `false`;
 * only the create operations reject, with a ConflictError, NotFoundError or
 * StorageError.
 */
export interface IRecordStore {
  readonly kind: StoreKind;

  connect(): Promise<boolean>;
  disconnect(): Promise<boolean>;
  createSchema(): Promise<boolean>;
  getHandle(): StoreHandle | undefined;

  // Patient operations
  createPatient(fields: InsertPatient): Promise<string>;
  getPatient(id: string): Promise<Patient | undefined>;
  getPatientByEmail(email: string): Promise<Patient | undefined>;
  updatePatient(id: string, changes: UpdatePatient): Promise<boolean>;
  deletePatient(id: string): Promise<boolean>;
  countPatients(): Promise<number>;
  searchPatients(text: string, limit?: number): Promise<Patient[]>;

  // Medical record operations
  addMedicalRecord(patientId: string, fields: NewMedicalRecord): Promise<string>;
  getMedicalRecord(id: string): Promise<MedicalRecord | undefined>;
  updateMedicalRecord(id: string, changes: UpdateMedicalRecord): Promise<boolean>;
  deleteMedicalRecord(id: string): Promise<boolean>;
  getMedicalHistory(patientId: string, limit?: number, filter?: MedicalHistoryFilter): Promise<MedicalRecord[]>;
  getPatientStatistics(patientId: string, now?: Date): Promise<PatientStatistics | undefined>;
  getConditionHistory(patientId: string, condition: string): Promise<MedicalRecord[]>;
  /** Every stored image path of the patient's records, without a limit. */
  listImagePaths(patientId: string): Promise<string[]>;

  // Appointment operations
  createAppointment(fields: InsertAppointment): Promise<string>;
  getAppointment(id: string): Promise<Appointment | undefined>;
  listAppointments(filter?: AppointmentFilter): Promise<Appointment[]>;
  updateAppointment(id: string, changes: UpdateAppointment): Promise<boolean>;
  deleteAppointment(id: string): Promise<boolean>;
}

export const DEFAULT_HISTORY_LIMIT = 50;
export const DEFAULT_SEARCH_LIMIT = 20;
export const RECENT_WINDOW_DAYS = 30;
