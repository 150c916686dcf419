// Idempotent schema statements for both dialects. Column names and types mirror
// shared/schema.ts (client/server) and shared/sqliteSchema.ts (embedded).

export const SQLITE_CORE_DDL: readonly string[] = [
  `CREATE TABLE IF NOT EXISTS patients (
    id TEXT PRIMARY KEY,
    email TEXT UNIQUE NOT NULL,
    name TEXT NOT NULL,
    phone TEXT,
    date_of_birth TEXT,
    gender TEXT,
    address TEXT,
    emergency_contact TEXT,
    blood_type TEXT,
    allergies TEXT,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  )`,
  `CREATE TABLE IF NOT EXISTS medical_records (
    id TEXT PRIMARY KEY,
    patient_id TEXT NOT NULL REFERENCES patients(id) ON DELETE CASCADE,
    record_type TEXT NOT NULL,
    modality TEXT NOT NULL,
    diagnosis TEXT,
    symptoms TEXT,
    findings TEXT,
    recommendations TEXT,
    suggested_tests TEXT,
    image_path TEXT,
    confidence_score REAL,
    doctor_notes TEXT,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  )`,
  `CREATE TABLE IF NOT EXISTS appointments (
    id TEXT PRIMARY KEY,
    patient_id TEXT REFERENCES patients(id) ON DELETE CASCADE,
    doctor_id TEXT NOT NULL,
    doctor_name TEXT NOT NULL,
    doctor_email TEXT NOT NULL,
    patient_name TEXT NOT NULL,
    patient_phone TEXT NOT NULL,
    patient_email TEXT NOT NULL,
    appointment_date TEXT NOT NULL,
    appointment_time TEXT NOT NULL,
    symptoms TEXT,
    status TEXT NOT NULL DEFAULT 'confirmed',
    notes TEXT,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  )`,
  "CREATE INDEX IF NOT EXISTS idx_patients_email ON patients(email)",
  "CREATE INDEX IF NOT EXISTS idx_medical_records_patient ON medical_records(patient_id)",
  "CREATE INDEX IF NOT EXISTS idx_medical_records_type ON medical_records(record_type)",
  "CREATE INDEX IF NOT EXISTS idx_appointments_patient ON appointments(patient_id)",
  "CREATE INDEX IF NOT EXISTS idx_appointments_date ON appointments(appointment_date)",
];

export const POSTGRES_CORE_DDL: readonly string[] = [
  `CREATE TABLE IF NOT EXISTS patients (
    id VARCHAR(36) PRIMARY KEY,
    email VARCHAR(255) UNIQUE NOT NULL,
    name VARCHAR(255) NOT NULL,
    phone VARCHAR(50),
    date_of_birth DATE,
    gender VARCHAR(20),
    address TEXT,
    emergency_contact VARCHAR(255),
    blood_type VARCHAR(10),
    allergies JSONB,
    created_at TIMESTAMPTZ NOT NULL,
    updated_at TIMESTAMPTZ NOT NULL
  )`,
  `CREATE TABLE IF NOT EXISTS medical_records (
    id VARCHAR(36) PRIMARY KEY,
    patient_id VARCHAR(36) NOT NULL REFERENCES patients(id) ON DELETE CASCADE,
    record_type VARCHAR(100) NOT NULL,
    modality VARCHAR(100) NOT NULL,
    diagnosis TEXT,
    symptoms JSONB,
    findings TEXT,
    recommendations JSONB,
    suggested_tests JSONB,
    image_path TEXT,
    confidence_score DECIMAL(5,4),
    doctor_notes TEXT,
    created_at TIMESTAMPTZ NOT NULL,
    updated_at TIMESTAMPTZ NOT NULL
  )`,
  `CREATE TABLE IF NOT EXISTS appointments (
    id VARCHAR(36) PRIMARY KEY,
    patient_id VARCHAR(36) REFERENCES patients(id) ON DELETE CASCADE,
    doctor_id VARCHAR(255) NOT NULL,
    doctor_name VARCHAR(255) NOT NULL,
    doctor_email VARCHAR(255) NOT NULL,
    patient_name VARCHAR(255) NOT NULL,
    patient_phone VARCHAR(50) NOT NULL,
    patient_email VARCHAR(255) NOT NULL,
    appointment_date DATE NOT NULL,
    appointment_time VARCHAR(5) NOT NULL,
    symptoms TEXT,
    status VARCHAR(50) NOT NULL DEFAULT 'confirmed',
    notes TEXT,
    created_at TIMESTAMPTZ NOT NULL,
    updated_at TIMESTAMPTZ NOT NULL
  )`,
  "CREATE INDEX IF NOT EXISTS idx_patients_email ON patients(email)",
  "CREATE INDEX IF NOT EXISTS idx_medical_records_patient ON medical_records(patient_id)",
  "CREATE INDEX IF NOT EXISTS idx_medical_records_type ON medical_records(record_type)",
  "CREATE INDEX IF NOT EXISTS idx_appointments_patient ON appointments(patient_id)",
  "CREATE INDEX IF NOT EXISTS idx_appointments_date ON appointments(appointment_date)",
];

export const SQLITE_ADMIN_DDL: readonly string[] = [
  `CREATE TABLE IF NOT EXISTS user_activity_logs (
    id TEXT PRIMARY KEY,
    user_id TEXT,
    user_email TEXT,
    activity_type TEXT NOT NULL,
    description TEXT NOT NULL,
    ip_address TEXT,
    user_agent TEXT,
    metadata TEXT,
    timestamp TEXT NOT NULL,
    session_id TEXT
  )`,
  `CREATE TABLE IF NOT EXISTS system_logs (
    id TEXT PRIMARY KEY,
    level TEXT NOT NULL,
    component TEXT NOT NULL,
    message TEXT NOT NULL,
    stack_trace TEXT,
    metadata TEXT,
    timestamp TEXT NOT NULL
  )`,
  `CREATE TABLE IF NOT EXISTS admin_users (
    id TEXT PRIMARY KEY,
    email TEXT UNIQUE NOT NULL,
    name TEXT NOT NULL,
    role TEXT NOT NULL,
    permissions TEXT NOT NULL,
    is_active INTEGER NOT NULL DEFAULT 1,
    last_login TEXT,
    created_at TEXT NOT NULL
  )`,
  `CREATE TABLE IF NOT EXISTS moderation_actions (
    id TEXT PRIMARY KEY,
    admin_id TEXT NOT NULL,
    admin_email TEXT NOT NULL,
    target_type TEXT NOT NULL,
    target_id TEXT NOT NULL,
    action_type TEXT NOT NULL,
    reason TEXT,
    status TEXT NOT NULL,
    metadata TEXT,
    timestamp TEXT NOT NULL
  )`,
  `CREATE TABLE IF NOT EXISTS content_flags (
    id TEXT PRIMARY KEY,
    content_type TEXT NOT NULL,
    content_id TEXT NOT NULL,
    reporter_id TEXT,
    reporter_email TEXT,
    reason TEXT NOT NULL,
    description TEXT,
    status TEXT NOT NULL DEFAULT 'pending',
    admin_notes TEXT,
    timestamp TEXT NOT NULL
  )`,
  `CREATE TABLE IF NOT EXISTS analytics_cache (
    id TEXT PRIMARY KEY,
    cache_key TEXT UNIQUE NOT NULL,
    data TEXT NOT NULL,
    expires_at TEXT NOT NULL,
    created_at TEXT NOT NULL
  )`,
];

export const POSTGRES_ADMIN_DDL: readonly string[] = [
  `CREATE TABLE IF NOT EXISTS user_activity_logs (
    id TEXT PRIMARY KEY,
    user_id TEXT,
    user_email TEXT,
    activity_type TEXT NOT NULL,
    description TEXT NOT NULL,
    ip_address TEXT,
    user_agent TEXT,
    metadata JSONB,
    timestamp TIMESTAMPTZ NOT NULL,
    session_id TEXT
  )`,
  `CREATE TABLE IF NOT EXISTS system_logs (
    id TEXT PRIMARY KEY,
    level TEXT NOT NULL,
    component TEXT NOT NULL,
    message TEXT NOT NULL,
    stack_trace TEXT,
    metadata JSONB,
    timestamp TIMESTAMPTZ NOT NULL
  )`,
  `CREATE TABLE IF NOT EXISTS admin_users (
    id TEXT PRIMARY KEY,
    email TEXT UNIQUE NOT NULL,
    name TEXT NOT NULL,
    role TEXT NOT NULL,
    permissions JSONB NOT NULL,
    is_active BOOLEAN NOT NULL DEFAULT TRUE,
    last_login TIMESTAMPTZ,
    created_at TIMESTAMPTZ NOT NULL
  )`,
  `CREATE TABLE IF NOT EXISTS moderation_actions (
    id TEXT PRIMARY KEY,
    admin_id TEXT NOT NULL,
    admin_email TEXT NOT NULL,
    target_type TEXT NOT NULL,
    target_id TEXT NOT NULL,
    action_type TEXT NOT NULL,
    reason TEXT,
    status TEXT NOT NULL,
    metadata JSONB,
    timestamp TIMESTAMPTZ NOT NULL
  )`,
  `CREATE TABLE IF NOT EXISTS content_flags (
    id TEXT PRIMARY KEY,
    content_type TEXT NOT NULL,
    content_id TEXT NOT NULL,
    reporter_id TEXT,
    reporter_email TEXT,
    reason TEXT NOT NULL,
    description TEXT,
    status TEXT NOT NULL DEFAULT 'pending',
    admin_notes TEXT,
    timestamp TIMESTAMPTZ NOT NULL
  )`,
  `CREATE TABLE IF NOT EXISTS analytics_cache (
    id TEXT PRIMARY KEY,
    cache_key TEXT UNIQUE NOT NULL,
    data JSONB NOT NULL,
    expires_at TIMESTAMPTZ NOT NULL,
    created_at TIMESTAMPTZ NOT NULL
  )`,
];
