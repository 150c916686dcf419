/**
 * PHI-safe logger
 *
 * Every line written by the stores, services and the HTTP boundary goes through
 * here. Free text is scrubbed with PHI_PATTERNS and metadata values under
 * SENSITIVE_FIELDS are replaced outright, so patient emails, phone numbers,
 * diagnoses and the like never reach console output.
 */

type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
  child(component: string): Logger;
}

interface RedactionPattern {
  name: string;
  pattern: RegExp;
  replacement: string;
}

const PHI_PATTERNS: RedactionPattern[] = [
  // Connection strings carry credentials; matched before emails swallow user:pass@host
  {
    name: "connection_url",
    pattern: /\b(postgres(?:ql)?:\/\/)[^:\s/]+:[^@\s]+@/gi,
    replacement: "$1[CREDENTIALS_REDACTED]@",
  },
  {
    name: "email",
    pattern: /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/gi,
    replacement: "[EMAIL_REDACTED]",
  },
  {
    name: "phone",
    pattern: /(\+?1[-.\s]?)?\(?\d{3}\)?[-.\s]?\d{3}[-.\s]?\d{4}\b/g,
    replacement: "[PHONE_REDACTED]",
  },
  {
    name: "ssn",
    pattern: /\b\d{3}-\d{2}-\d{4}\b/g,
    replacement: "[SSN_REDACTED]",
  },
  {
    name: "mrn",
    pattern: /\bMRN[:\s#-]*\d{5,10}\b/gi,
    replacement: "[MRN_REDACTED]",
  },
  {
    name: "bearer",
    pattern: /Bearer\s+[A-Za-z0-9._-]+/gi,
    replacement: "[BEARER_REDACTED]",
  },
  {
    name: "base64_data",
    pattern: /data:[a-z]+\/[a-z0-9.+-]+;base64,[A-Za-z0-9+/=]{50,}/gi,
    replacement: "[BASE64_DATA_REDACTED]",
  },
];

const SENSITIVE_FIELDS = new Set([
  "password",
  "email",
  "useremail",
  "reporteremail",
  "patientemail",
  "phone",
  "patientphone",
  "name",
  "patientname",
  "address",
  "dateofbirth",
  "emergencycontact",
  "allergies",
  "diagnosis",
  "symptoms",
  "findings",
  "doctornotes",
  "connectionurl",
  "database_url",
  "token",
  "authorization",
  "secret",
]);

const MAX_DEPTH = 10;
const MAX_META_LENGTH = 500;

function redactString(input: string): string {
  let result = input;
  for (const { pattern, replacement } of PHI_PATTERNS) {
    result = result.replace(pattern, replacement);
  }
  return result;
}

function isSensitiveField(key: string): boolean {
  return SENSITIVE_FIELDS.has(key.toLowerCase());
}

function redactObject(value: unknown, depth: number = 0): unknown {
  if (depth > MAX_DEPTH) return "[MAX_DEPTH_REACHED]";
  if (value === null || value === undefined) return value;
  if (typeof value === "string") return redactString(value);
  if (typeof value === "number" || typeof value === "boolean") return value;

  if (value instanceof Error) {
    return { name: value.name, message: redactString(value.message) };
  }

  if (Array.isArray(value)) {
    return value.map((item) => redactObject(item, depth + 1));
  }

  if (typeof value === "object") {
    const redacted: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      redacted[key] = isSensitiveField(key) ? "[FIELD_REDACTED]" : redactObject(entry, depth + 1);
    }
    return redacted;
  }

  return String(value);
}

function resolveThreshold(): number {
  const configured = (process.env.LOG_LEVEL ?? "info").toLowerCase();
  if (configured === "debug" || configured === "info" || configured === "warn" || configured === "error") {
    return LEVEL_ORDER[configured];
  }
  return LEVEL_ORDER.info;
}

function formatMessage(level: LogLevel, message: string, component?: string, meta?: unknown): string {
  const timestamp = new Date().toISOString();
  const tag = component ? ` [${component}]` : "";
  const prefix = `[${timestamp}] [${level.toUpperCase()}]${tag}`;
  const safeMessage = redactString(message);

  if (meta === undefined) {
    return `${prefix} ${safeMessage}`;
  }

  const metaStr = JSON.stringify(redactObject(meta));
  const truncatedMeta = metaStr.length > MAX_META_LENGTH ? metaStr.slice(0, MAX_META_LENGTH - 3) + "..." : metaStr;
  return `${prefix} ${safeMessage} ${truncatedMeta}`;
}

function createLogger(component?: string): Logger {
  const write = (level: LogLevel, message: string, meta?: unknown): void => {
    if (process.env.NODE_ENV === "test" && process.env.LOG_IN_TESTS !== "true") return;
    if (LEVEL_ORDER[level] < resolveThreshold()) return;

    const line = formatMessage(level, message, component, meta);
    if (level === "error") {
      console.error(line);
    } else if (level === "warn") {
      console.warn(line);
    } else {
      console.log(line);
    }
  };

  return {
    debug: (message, meta) => write("debug", message, meta),
    info: (message, meta) => write("info", message, meta),
    warn: (message, meta) => write("warn", message, meta),
    error: (message, meta) => write("error", message, meta),
    child: (childComponent) => createLogger(component ? `${component}:${childComponent}` : childComponent),
  };
}

export const safeLogger = createLogger();

export function containsPHI(input: string): boolean {
  // Fresh regexes: the shared ones are global and carry lastIndex between calls
  return PHI_PATTERNS.some(({ pattern }) => new RegExp(pattern.source, pattern.flags.replace("g", "")).test(input));
}

export { redactString, redactObject, formatMessage, createLogger, PHI_PATTERNS, SENSITIVE_FIELDS };

export default safeLogger;
