import {
  insertPatientSchema,
  updatePatientSchema,
  type BloodType,
  type MedicalRecord,
  type Patient,
  type PatientStatistics,
} from "@shared/schema";
import type { IRecordStore } from "../storage";
import type { ImageStorage } from "../imageStorage";
import { ConflictError, NotFoundError, StorageError, wrapStorageFailure } from "../errors";
import { safeLogger, type Logger } from "../safe_logger";
import { conditionSchema, idSchema, parseInput } from "../validation";

const MIN_SEARCH_LENGTH = 2;
const MAX_SEARCH_LIMIT = 100;
const SUMMARY_RECENT_RECORDS = 5;

export interface PatientInfo {
  name: string;
  email: string;
  age: number | null;
  bloodType: BloodType | null;
  allergies: string[];
}

export interface PatientStatisticsReport extends PatientStatistics {
  patientInfo: PatientInfo;
}

export interface PatientSummary {
  patient: Patient;
  recentRecords: MedicalRecord[];
  statistics: PatientStatisticsReport;
  summaryGeneratedAt: string;
}

export interface PatientServiceOptions {
  images?: ImageStorage;
  logger?: Logger;
  clock?: () => Date;
}

/** Whole years between a YYYY-MM-DD birth date and `now`, or null when unknown. */
export function calculateAge(dateOfBirth: string | null, now: Date): number | null {
  if (!dateOfBirth) return null;
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(dateOfBirth);
  if (!match) return null;

  const [, year, month, day] = match.map(Number);
  let age = now.getUTCFullYear() - year;
  const beforeBirthday =
    now.getUTCMonth() + 1 < month || (now.getUTCMonth() + 1 === month && now.getUTCDate() < day);
  if (beforeBirthday) age -= 1;
  return age >= 0 ? age : null;
}

export class PatientService {
  private readonly images?: ImageStorage;
  private readonly log: Logger;
  private readonly clock: () => Date;

  constructor(
    private readonly store: IRecordStore,
    options: PatientServiceOptions = {},
  ) {
    this.images = options.images;
    this.log = (options.logger ?? safeLogger).child("patient-service");
    this.clock = options.clock ?? (() => new Date());
  }

  async createPatient(input: unknown): Promise<Patient> {
    const fields = parseInput(insertPatientSchema, input);

    if (await this.store.getPatientByEmail(fields.email)) {
      throw new ConflictError("A patient with this email already exists");
    }

    let id: string;
    try {
      id = await this.store.createPatient(fields);
    } catch (error) {
      throw wrapStorageFailure(error, "create patient");
    }

    const created = await this.store.getPatient(id);
    if (!created) {
      throw new StorageError("Failed to create patient: created record could not be read back");
    }
    this.log.info(`Patient created: ${id}`);
    return created;
  }

  async getPatient(id: string): Promise<Patient> {
    const patientId = parseInput(idSchema, id);
    const patient = await this.store.getPatient(patientId);
    if (!patient) {
      throw new NotFoundError(`Patient ${patientId} not found`);
    }
    return patient;
  }

  async getPatientByEmail(email: string): Promise<Patient> {
    const patient = await this.store.getPatientByEmail(email);
    if (!patient) {
      throw new NotFoundError("No patient is registered with this email");
    }
    return patient;
  }

  async updatePatient(id: string, input: unknown): Promise<Patient> {
    const changes = parseInput(updatePatientSchema, input);
    const existing = await this.getPatient(id);

    if (!(await this.store.updatePatient(existing.id, changes))) {
      throw new StorageError("Failed to update patient");
    }
    return this.getPatient(existing.id);
  }

  /** Deletes the patient with their records and appointments, then their image files. */
  async deletePatient(id: string): Promise<void> {
    const patient = await this.getPatient(id);
    const imagePaths = await this.store.listImagePaths(patient.id);

    if (!(await this.store.deletePatient(patient.id))) {
      throw new StorageError("Failed to delete patient");
    }

    if (this.images) {
      for (const imagePath of imagePaths) await this.images.remove(imagePath);
    }
    this.log.info(`Patient deleted: ${patient.id}`, { removedImages: imagePaths.length });
  }

  async searchPatients(query: string, limit: number = 20): Promise<Patient[]> {
    const text = query.trim();
    if (text.length < MIN_SEARCH_LENGTH) return [];

    const bounded = Math.min(Math.max(Math.trunc(limit) || 1, 1), MAX_SEARCH_LIMIT);
    return this.store.searchPatients(text, bounded);
  }

  async getPatientStatistics(id: string): Promise<PatientStatisticsReport> {
    const patient = await this.getPatient(id);
    const now = this.clock();
    const statistics = await this.store.getPatientStatistics(patient.id, now);
    if (!statistics) {
      throw new StorageError("Failed to get patient statistics");
    }

    return {
      ...statistics,
      patientInfo: {
        name: patient.name,
        email: patient.email,
        age: calculateAge(patient.dateOfBirth, now),
        bloodType: patient.bloodType,
        allergies: patient.allergies,
      },
    };
  }

  async getConditionHistory(id: string, condition: string): Promise<MedicalRecord[]> {
    const patient = await this.getPatient(id);
    return this.store.getConditionHistory(patient.id, parseInput(conditionSchema, condition));
  }

  async getPatientSummary(id: string): Promise<PatientSummary> {
    const patient = await this.getPatient(id);
    const [recentRecords, statistics] = await Promise.all([
      this.store.getMedicalHistory(patient.id, SUMMARY_RECENT_RECORDS),
      this.getPatientStatistics(patient.id),
    ]);

    return {
      patient,
      recentRecords,
      statistics,
      summaryGeneratedAt: this.clock().toISOString(),
    };
  }
}
