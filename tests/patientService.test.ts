import { existsSync, mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import path from 'path';
import { ConflictError, NotFoundError, ValidationError } from '../server/errors';
import { ImageStorage } from '../server/imageStorage';
import { MedicalRecordsService } from '../server/services/medicalRecordsService';
import { PatientService, calculateAge } from '../server/services/patientService';
import type { SqliteStorage } from '../server/storage/sqliteStorage';
import { captureLogger, memoryStore, patientInput, recordInput } from './helpers';

describe('calculateAge', () => {
  it('should count whole years in UTC', () => {
    expect(calculateAge('1980-06-15', new Date('2024-06-14T12:00:00Z'))).toBe(43);
    expect(calculateAge('1980-06-15', new Date('2024-06-15T00:00:00Z'))).toBe(44);
  });

  it('should return null for missing, malformed or future dates', () => {
    expect(calculateAge(null, new Date())).toBeNull();
    expect(calculateAge('15/06/1980', new Date())).toBeNull();
    expect(calculateAge('2099-01-01', new Date('2024-01-01T00:00:00Z'))).toBeNull();
  });
});

describe('PatientService', () => {
  const now = new Date('2030-01-10T12:00:00.000Z');
  let store: SqliteStorage;
  let uploadDir: string;
  let images: ImageStorage;
  let service: PatientService;

  beforeEach(async () => {
    store = await memoryStore();
    uploadDir = mkdtempSync(path.join(tmpdir(), 'patients-'));
    images = new ImageStorage(uploadDir, captureLogger());
    service = new PatientService(store, { images, logger: captureLogger(), clock: () => now });
  });

  afterEach(async () => {
    await store.disconnect();
    rmSync(uploadDir, { recursive: true, force: true });
  });

  describe('createPatient', () => {
    it('should validate, store and return the patient', async () => {
      const patient = await service.createPatient({ ...patientInput(), email: ' Ada.Test@Example.com ' });

      expect(patient).toMatchObject({ email: 'ada.test@example.com', name: 'Ada Testcase', allergies: ['penicillin'] });
      expect(await store.countPatients()).toBe(1);
    });

    it('should name missing required fields', async () => {
      await expect(service.createPatient({ email: 'x@example.com' })).rejects.toThrow(
        new ValidationError('Missing required field(s): name'),
      );
    });

    it('should reject malformed values', async () => {
      await expect(service.createPatient(patientInput({ email: 'not-an-email' }))).rejects.toBeInstanceOf(
        ValidationError,
      );
      await expect(service.createPatient({ ...patientInput(), bloodType: 'Z+' })).rejects.toBeInstanceOf(
        ValidationError,
      );
    });

    it('should reject a duplicate email', async () => {
      await service.createPatient(patientInput());
      await expect(service.createPatient(patientInput({ name: 'Someone Else' }))).rejects.toBeInstanceOf(
        ConflictError,
      );
    });
  });

  describe('lookups', () => {
    it('should raise NotFoundError for unknown patients', async () => {
      await expect(service.getPatient('missing')).rejects.toBeInstanceOf(NotFoundError);
      await expect(service.getPatientByEmail('nobody@example.com')).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should reject a blank id', async () => {
      await expect(service.getPatient('  ')).rejects.toBeInstanceOf(ValidationError);
    });
  });

  it('should update patient fields', async () => {
    const created = await service.createPatient(patientInput());
    const updated = await service.updatePatient(created.id, { address: '1 Test Lane', gender: 'other' });

    expect(updated).toMatchObject({ id: created.id, address: '1 Test Lane', gender: 'other', name: 'Ada Testcase' });
    await expect(service.updatePatient(created.id, { gender: 'unknown' })).rejects.toBeInstanceOf(ValidationError);
  });

  describe('searchPatients', () => {
    beforeEach(async () => {
      await service.createPatient(patientInput());
      await service.createPatient(patientInput({ email: 'adam@example.com', name: 'Adam Sample' }));
    });

    it('should ignore queries shorter than two characters', async () => {
      expect(await service.searchPatients(' a ')).toEqual([]);
    });

    it('should clamp the limit', async () => {
      expect(await service.searchPatients('ada', 0)).toHaveLength(1);
      expect(await service.searchPatients('ada', 500)).toHaveLength(2);
    });
  });

  it('should report statistics with patient info', async () => {
    const patient = await service.createPatient(patientInput());
    await store.addMedicalRecord(patient.id, recordInput());

    const report = await service.getPatientStatistics(patient.id);

    // The clock sits in 2030, so records written now fall outside the 30-day window
    expect(report).toEqual({
      totalRecords: 1,
      recordsByType: { xray: 1 },
      recentRecords: 0,
      lastUpdated: now.toISOString(),
      patientInfo: {
        name: 'Ada Testcase',
        email: 'ada.test@example.com',
        age: 49,
        bloodType: 'O+',
        allergies: ['penicillin'],
      },
    });
  });

  it('should require a condition for condition history', async () => {
    const patient = await service.createPatient(patientInput());
    await expect(service.getConditionHistory(patient.id, ' ')).rejects.toBeInstanceOf(ValidationError);
  });

  it('should summarize the five most recent records', async () => {
    const patient = await service.createPatient(patientInput());
    for (let i = 0; i < 7; i += 1) {
      await store.addMedicalRecord(patient.id, recordInput({ doctorNotes: `visit ${i}` }));
    }

    const summary = await service.getPatientSummary(patient.id);

    expect(summary.patient.id).toBe(patient.id);
    expect(summary.recentRecords.map((r) => r.doctorNotes)).toEqual(['visit 6', 'visit 5', 'visit 4', 'visit 3', 'visit 2']);
    expect(summary.statistics.totalRecords).toBe(7);
    expect(summary.summaryGeneratedAt).toBe(now.toISOString());
  });

  it('should delete the patient with records and image files', async () => {
    const patient = await service.createPatient(patientInput());
    const records = new MedicalRecordsService(store, images, { logger: captureLogger() });
    const record = await records.createMedicalRecord(patient.id, recordInput(), {
      buffer: Buffer.from('fake-image'),
      originalName: 'chest.png',
    });
    const imagePath = record.imagePath ?? '';
    expect(existsSync(imagePath)).toBe(true);

    await service.deletePatient(patient.id);

    expect(existsSync(imagePath)).toBe(false);
    expect(await store.getMedicalRecord(record.id)).toBeUndefined();
    await expect(service.getPatient(patient.id)).rejects.toBeInstanceOf(NotFoundError);
  });

  it('should collect image paths without going through the bounded history', async () => {
    const patient = await service.createPatient(patientInput());
    const listImagePaths = jest.spyOn(store, 'listImagePaths');
    const getMedicalHistory = jest.spyOn(store, 'getMedicalHistory');

    await service.deletePatient(patient.id);

    expect(listImagePaths).toHaveBeenCalledWith(patient.id);
    expect(getMedicalHistory).not.toHaveBeenCalled();
  });
});
