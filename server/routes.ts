import path from "path";
import express, { type Express, type NextFunction, type Request, type Response } from "express";
import multer from "multer";
import type { ActivityType } from "@shared/schema";
import type { PatientService } from "./services/patientService";
import type { MedicalRecordsService } from "./services/medicalRecordsService";
import type { AppointmentService } from "./services/appointmentService";
import type { AdminService } from "./services/adminService";
import type { IRecordStore } from "./storage";
import { AppError, NotFoundError, ValidationError, sendErrorResponse } from "./errors";
import { safeLogger } from "./safe_logger";
import {
  historyQuerySchema,
  modalitySchema,
  parseInput,
  patientSearchSchema,
  timelineQuerySchema,
} from "./validation";

export interface Services {
  store: IRecordStore;
  patients: PatientService;
  records: MedicalRecordsService;
  appointments: AppointmentService;
  admin: AdminService;
}

export interface RouteOptions {
  maxFileSize: number;
}

type Handler = (req: Request, res: Response) => Promise<void>;

// Express 4 does not forward rejected promises to the error middleware
const handle =
  (fn: Handler) =>
  (req: Request, res: Response, next: NextFunction): void => {
    fn(req, res).catch(next);
  };

/** Multipart uploads carry the record fields as a JSON string in `data`. */
function recordInput(body: unknown): unknown {
  if (typeof body !== "object" || body === null || !("data" in body) || typeof body.data !== "string") {
    return body;
  }
  try {
    return JSON.parse(body.data);
  } catch {
    throw new ValidationError("Invalid value for data: expected a JSON object", [
      { field: "data", message: "Malformed JSON" },
    ]);
  }
}

export function registerRoutes(app: Express, services: Services, options: RouteOptions): void {
  const { patients, records, appointments, admin } = services;

  const imageUpload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: options.maxFileSize },
    fileFilter: (_req, file, cb) => {
      if (file.mimetype.startsWith("image/") || file.mimetype === "application/dicom") {
        cb(null, true);
      } else {
        cb(new ValidationError("Only image uploads are accepted", [{ field: "image", message: file.mimetype }]));
      }
    },
  });

  const track = async (req: Request, activityType: ActivityType, description: string): Promise<void> => {
    await admin.logUserActivity({
      activityType,
      description,
      ipAddress: req.ip ?? null,
      userAgent: req.get("user-agent") ?? null,
    });
  };

  app.get(
    "/api/health",
    handle(async (_req, res) => {
      res.json({ status: "ok", backend: services.store.kind });
    }),
  );

  // Patients
  app.post(
    "/api/patients",
    handle(async (req, res) => {
      const patient = await patients.createPatient(req.body);
      await track(req, "patient_creation", `Patient ${patient.id} created`);
      res.status(201).json(patient);
    }),
  );

  app.get(
    "/api/patients/search",
    handle(async (req, res) => {
      const { q, limit } = parseInput(patientSearchSchema, req.query);
      res.json(await patients.searchPatients(q, limit));
    }),
  );

  app.get(
    "/api/patients/by-email/:email",
    handle(async (req, res) => {
      res.json(await patients.getPatientByEmail(req.params.email));
    }),
  );

  app.get(
    "/api/patients/:id",
    handle(async (req, res) => {
      res.json(await patients.getPatient(req.params.id));
    }),
  );

  app.put(
    "/api/patients/:id",
    handle(async (req, res) => {
      res.json(await patients.updatePatient(req.params.id, req.body));
    }),
  );

  app.delete(
    "/api/patients/:id",
    handle(async (req, res) => {
      await patients.deletePatient(req.params.id);
      res.json({ success: true });
    }),
  );

  app.get(
    "/api/patients/:id/statistics",
    handle(async (req, res) => {
      res.json(await patients.getPatientStatistics(req.params.id));
    }),
  );

  app.get(
    "/api/patients/:id/summary",
    handle(async (req, res) => {
      res.json(await patients.getPatientSummary(req.params.id));
    }),
  );

  app.get(
    "/api/patients/:id/conditions/:condition",
    handle(async (req, res) => {
      res.json(await patients.getConditionHistory(req.params.id, req.params.condition));
    }),
  );

  // Medical records
  app.post(
    "/api/patients/:id/records",
    imageUpload.single("image"),
    handle(async (req, res) => {
      const image = req.file ? { buffer: req.file.buffer, originalName: req.file.originalname } : undefined;
      const record = await records.createMedicalRecord(req.params.id, recordInput(req.body), image);
      await track(
        req,
        image ? "image_upload" : "medical_record_creation",
        `Medical record ${record.id} created for patient ${record.patientId}`,
      );
      res.status(201).json(record);
    }),
  );

  app.get(
    "/api/patients/:id/records",
    handle(async (req, res) => {
      const { limit, recordType } = parseInput(historyQuerySchema, req.query);
      res.json(await records.getMedicalHistory(req.params.id, limit, recordType));
    }),
  );

  app.get(
    "/api/patients/:id/records/timeline",
    handle(async (req, res) => {
      const { start, end } = parseInput(timelineQuerySchema, req.query);
      res.json(await records.getRecordsTimeline(req.params.id, start, end));
    }),
  );

  app.get(
    "/api/patients/:id/records/summary",
    handle(async (req, res) => {
      res.json(await records.getRecordsSummary(req.params.id));
    }),
  );

  app.get(
    "/api/patients/:id/records/modality/:modality",
    handle(async (req, res) => {
      const modality = parseInput(modalitySchema, req.params.modality);
      res.json(await records.getRecordsByModality(req.params.id, modality));
    }),
  );

  app.get(
    "/api/patients/:id/records/condition/:condition",
    handle(async (req, res) => {
      res.json(await records.getRecordsByCondition(req.params.id, req.params.condition));
    }),
  );

  app.get(
    "/api/records/:id",
    handle(async (req, res) => {
      res.json(await records.getMedicalRecord(req.params.id));
    }),
  );

  app.put(
    "/api/records/:id",
    handle(async (req, res) => {
      res.json(await records.updateMedicalRecord(req.params.id, req.body));
    }),
  );

  app.delete(
    "/api/records/:id",
    handle(async (req, res) => {
      await records.deleteMedicalRecord(req.params.id);
      res.json({ success: true });
    }),
  );

  app.get(
    "/api/records/:id/image",
    handle(async (req, res) => {
      const imagePath = await records.getImagePath(req.params.id);
      if (!imagePath) {
        throw new NotFoundError("Image not found");
      }
      res.sendFile(path.resolve(imagePath));
    }),
  );

  // Appointments
  app.get(
    "/api/appointments/availability",
    handle(async (req, res) => {
      const doctorId = typeof req.query.doctorId === "string" ? req.query.doctorId : "";
      const date = typeof req.query.date === "string" ? req.query.date : "";
      res.json(await appointments.getAvailability(doctorId, date));
    }),
  );

  app.post(
    "/api/appointments",
    handle(async (req, res) => {
      const appointment = await appointments.bookAppointment(req.body);
      await track(req, "appointment_booking", `Appointment ${appointment.id} booked`);
      res.status(201).json(appointment);
    }),
  );

  app.get(
    "/api/appointments",
    handle(async (req, res) => {
      res.json(await appointments.listAppointments(req.query));
    }),
  );

  app.get(
    "/api/appointments/:id",
    handle(async (req, res) => {
      res.json(await appointments.getAppointment(req.params.id));
    }),
  );

  app.put(
    "/api/appointments/:id",
    handle(async (req, res) => {
      res.json(await appointments.updateAppointment(req.params.id, req.body));
    }),
  );

  app.post(
    "/api/appointments/:id/cancel",
    handle(async (req, res) => {
      res.json(await appointments.cancelAppointment(req.params.id));
    }),
  );

  app.delete(
    "/api/appointments/:id",
    handle(async (req, res) => {
      await appointments.deleteAppointment(req.params.id);
      res.json({ success: true });
    }),
  );

  // Admin
  app.get(
    "/api/admin/dashboard",
    handle(async (_req, res) => {
      res.json(await admin.getDashboardStats());
    }),
  );

  app.get(
    "/api/admin/analytics",
    handle(async (req, res) => {
      res.json(await admin.getAnalytics({ fresh: req.query.fresh === "true" }));
    }),
  );

  app.get(
    "/api/admin/health",
    handle(async (_req, res) => {
      res.json(await admin.getSystemHealth());
    }),
  );

  app.get(
    "/api/admin/activities",
    handle(async (req, res) => {
      res.json(await admin.getUserActivities(req.query));
    }),
  );

  app.get(
    "/api/admin/logs",
    handle(async (req, res) => {
      res.json(await admin.getSystemLogs(req.query));
    }),
  );

  app.get(
    "/api/admin/flags",
    handle(async (_req, res) => {
      res.json(await admin.getPendingContentFlags());
    }),
  );

  app.post(
    "/api/admin/flags",
    handle(async (req, res) => {
      res.status(201).json(await admin.createContentFlag(req.body));
    }),
  );

  app.post(
    "/api/admin/flags/:id/moderate",
    handle(async (req, res) => {
      const body: unknown = req.body;
      const actor = typeof body === "object" && body !== null && "admin" in body ? body.admin : undefined;
      const flag = await admin.moderateContent(req.params.id, actor, body);
      res.json(flag);
    }),
  );

  app.post(
    "/api/admin/users",
    handle(async (req, res) => {
      res.status(201).json(await admin.createAdminUser(req.body));
    }),
  );

  app.post(
    "/api/admin/login",
    handle(async (req, res) => {
      const body: unknown = req.body;
      const email =
        typeof body === "object" && body !== null && "email" in body && typeof body.email === "string" ? body.email : "";
      res.json(await admin.recordAdminLogin(email));
    }),
  );

  app.use("/api", (_req: Request, _res: Response, next: NextFunction) => {
    next(new NotFoundError("Route not found"));
  });

  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof multer.MulterError) {
      const status = error.code === "LIMIT_FILE_SIZE" ? 413 : 400;
      sendErrorResponse(res, new AppError(error.message, status, error.code));
      return;
    }
    if (!(error instanceof AppError) || error.statusCode >= 500) {
      safeLogger.error(`${req.method} ${req.path} failed`, { error });
      admin.recordFailure("http", error).catch((logError: unknown) => {
        safeLogger.warn("Could not persist request failure", { error: logError });
      });
    }
    sendErrorResponse(res, error);
  });
}

export function createApp(services: Services, options: RouteOptions): Express {
  const app = express();
  app.use(express.json({ limit: "1mb" }));
  app.use(express.urlencoded({ extended: false }));

  app.use((req, res, next) => {
    const start = Date.now();
    res.on("finish", () => {
      if (req.path.startsWith("/api")) {
        safeLogger.info(`${req.method} ${req.path} ${res.statusCode} in ${Date.now() - start}ms`);
      }
    });
    next();
  });

  registerRoutes(app, services, options);
  return app;
}
