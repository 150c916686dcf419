import type { InsertAppointment, InsertPatient, NewMedicalRecord } from '@shared/schema';
import type { Logger } from '../server/safe_logger';
import { SqliteStorage } from '../server/storage/sqliteStorage';

export interface CapturedLine {
  level: 'debug' | 'info' | 'warn' | 'error';
  component: string;
  message: string;
}

/** Logger that keeps lines in memory instead of writing them. */
export function captureLogger(component = 'test', lines: CapturedLine[] = []): Logger & { lines: CapturedLine[] } {
  const push = (level: CapturedLine['level']) => (message: string) => {
    lines.push({ level, component, message });
  };
  return {
    lines,
    debug: push('debug'),
    info: push('info'),
    warn: push('warn'),
    error: push('error'),
    child: (name) => captureLogger(`${component}:${name}`, lines),
  };
}

export async function memoryStore(logger: Logger = captureLogger()): Promise<SqliteStorage> {
  const store = new SqliteStorage({ path: ':memory:', logger });
  await store.connect();
  await store.createSchema();
  return store;
}

export function patientInput(overrides: Partial<InsertPatient> = {}): InsertPatient {
  return {
    email: 'ada.test@example.com',
    name: 'Ada Testcase',
    phone: '555-0100',
    dateOfBirth: '1980-06-15',
    gender: 'female',
    bloodType: 'O+',
    allergies: ['penicillin'],
    ...overrides,
  };
}

export function recordInput(overrides: Partial<NewMedicalRecord> = {}): NewMedicalRecord {
  return {
    recordType: 'xray',
    modality: 'xray',
    diagnosis: 'Pneumonia',
    symptoms: ['cough', 'fever'],
    findings: 'Opacity in the lower left lobe',
    recommendations: ['Antibiotics'],
    suggestedTests: ['CBC'],
    confidenceScore: 0.87,
    ...overrides,
  };
}

export function appointmentInput(overrides: Partial<InsertAppointment> = {}): InsertAppointment {
  return {
    doctorId: 'doc-1',
    doctorName: 'Dr. Sample',
    doctorEmail: 'doctor@example.com',
    patientName: 'Ada Testcase',
    patientPhone: '555-0100',
    patientEmail: 'ada.test@example.com',
    appointmentDate: '2030-01-15',
    appointmentTime: '10:00',
    status: 'confirmed',
    ...overrides,
  };
}
