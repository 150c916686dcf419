import {
  insertMedicalRecordSchema,
  updateMedicalRecordSchema,
  type MedicalRecord,
  type Modality,
  type RecordType,
} from "@shared/schema";
import type { IRecordStore } from "../storage";
import type { ImageStorage, ImageUpload } from "../imageStorage";
import { NotFoundError, StorageError, wrapStorageFailure } from "../errors";
import { safeLogger, type Logger } from "../safe_logger";
import { conditionSchema, idSchema, parseInput } from "../validation";

const TIMELINE_LIMIT = 100;
const SUMMARY_RECENT_RECORDS = 10;
const TOP_CONDITIONS = 5;
const FULL_HISTORY_LIMIT = 10_000;
const UNKNOWN_CONDITION = "Unknown";

export interface ConditionCount {
  condition: string;
  count: number;
}

export interface RecordsSummary {
  totalRecords: number;
  recordsByModality: Record<string, number>;
  recentRecords: MedicalRecord[];
  commonConditions: ConditionCount[];
  summaryGeneratedAt: string;
}

/**
 * Most frequent diagnoses, highest count first. Equal counts keep the order in
 * which the diagnosis was first seen.
 */
export function rankConditions(records: MedicalRecord[], top: number = TOP_CONDITIONS): ConditionCount[] {
  const counts = new Map<string, number>();
  for (const record of records) {
    const condition = record.diagnosis?.trim() || UNKNOWN_CONDITION;
    counts.set(condition, (counts.get(condition) ?? 0) + 1);
  }
  // Array.prototype.sort is stable, so insertion order breaks ties
  return Array.from(counts, ([condition, count]) => ({ condition, count }))
    .sort((a, b) => b.count - a.count)
    .slice(0, top);
}

export interface MedicalRecordsServiceOptions {
  logger?: Logger;
  clock?: () => Date;
}

export class MedicalRecordsService {
  private readonly log: Logger;
  private readonly clock: () => Date;

  constructor(
    private readonly store: IRecordStore,
    private readonly images: ImageStorage,
    options: MedicalRecordsServiceOptions = {},
  ) {
    this.log = (options.logger ?? safeLogger).child("medical-records-service");
    this.clock = options.clock ?? (() => new Date());
  }

  private async requirePatient(patientId: string): Promise<string> {
    const id = parseInput(idSchema, patientId);
    if (!(await this.store.getPatient(id))) {
      throw new NotFoundError(`Patient ${id} not found`);
    }
    return id;
  }

  /**
   * The image, when given, is written first; if the record insert then fails
   * the file is removed again.
   */
  async createMedicalRecord(patientId: string, input: unknown, image?: ImageUpload): Promise<MedicalRecord> {
    const fields = parseInput(insertMedicalRecordSchema, input);
    const id = await this.requirePatient(patientId);

    const imagePath = image ? await this.images.save(id, fields.recordType, image) : null;

    let recordId: string;
    try {
      recordId = await this.store.addMedicalRecord(id, { ...fields, imagePath });
    } catch (error) {
      if (imagePath) await this.images.remove(imagePath);
      throw wrapStorageFailure(error, "create medical record");
    }

    const created = await this.store.getMedicalRecord(recordId);
    if (!created) {
      throw new StorageError("Failed to create medical record: created record could not be read back");
    }
    this.log.info(`Medical record created: ${recordId}`, { recordType: created.recordType, hasImage: imagePath !== null });
    return created;
  }

  async getMedicalRecord(recordId: string): Promise<MedicalRecord> {
    const id = parseInput(idSchema, recordId);
    const record = await this.store.getMedicalRecord(id);
    if (!record) {
      throw new NotFoundError(`Medical record ${id} not found`);
    }
    return record;
  }

  async updateMedicalRecord(recordId: string, input: unknown): Promise<MedicalRecord> {
    const changes = parseInput(updateMedicalRecordSchema, input);
    const existing = await this.getMedicalRecord(recordId);

    if (!(await this.store.updateMedicalRecord(existing.id, changes))) {
      throw new StorageError("Failed to update medical record");
    }
    return this.getMedicalRecord(existing.id);
  }

  async deleteMedicalRecord(recordId: string): Promise<void> {
    const record = await this.getMedicalRecord(recordId);
    if (!(await this.store.deleteMedicalRecord(record.id))) {
      throw new StorageError("Failed to delete medical record");
    }
    if (record.imagePath) {
      await this.images.remove(record.imagePath);
    }
  }

  async getMedicalHistory(patientId: string, limit: number = 50, recordType?: RecordType): Promise<MedicalRecord[]> {
    const id = await this.requirePatient(patientId);
    return this.store.getMedicalHistory(id, limit, recordType ? { recordType } : {});
  }

  async getRecordsByCondition(patientId: string, condition: string): Promise<MedicalRecord[]> {
    const id = await this.requirePatient(patientId);
    return this.store.getConditionHistory(id, parseInput(conditionSchema, condition));
  }

  async getRecordsByModality(patientId: string, modality: Modality, limit: number = 50): Promise<MedicalRecord[]> {
    const id = await this.requirePatient(patientId);
    return this.store.getMedicalHistory(id, limit, { modality });
  }

  /** Newest first, bounds inclusive. */
  async getRecordsTimeline(patientId: string, start?: string, end?: string): Promise<MedicalRecord[]> {
    const id = await this.requirePatient(patientId);
    return this.store.getMedicalHistory(id, TIMELINE_LIMIT, { from: start, to: end });
  }

  /** Resolves undefined when the record has no image or its file is gone. */
  async getImagePath(recordId: string): Promise<string | undefined> {
    const record = await this.getMedicalRecord(recordId);
    if (!record.imagePath) return undefined;
    return (await this.images.exists(record.imagePath)) ? record.imagePath : undefined;
  }

  async getRecordsSummary(patientId: string): Promise<RecordsSummary> {
    const id = await this.requirePatient(patientId);
    const records = await this.store.getMedicalHistory(id, FULL_HISTORY_LIMIT);

    const recordsByModality: Record<string, number> = {};
    for (const record of records) {
      recordsByModality[record.modality] = (recordsByModality[record.modality] ?? 0) + 1;
    }

    return {
      totalRecords: records.length,
      recordsByModality,
      recentRecords: records.slice(0, SUMMARY_RECENT_RECORDS),
      commonConditions: rankConditions(records),
      summaryGeneratedAt: this.clock().toISOString(),
    };
  }
}
