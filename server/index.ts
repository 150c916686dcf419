import type { Server } from "http";
import { ConfigError, loadConfig } from "./config";
import { createStorage, describeConnection, storageConfigFromDatabase } from "./db";
import { ImageStorage } from "./imageStorage";
import { createApp } from "./routes";
import { safeLogger } from "./safe_logger";
import { AdminService } from "./services/adminService";
import { AppointmentService } from "./services/appointmentService";
import { MedicalRecordsService } from "./services/medicalRecordsService";
import { PatientService } from "./services/patientService";

const log = safeLogger.child("server");

async function main(): Promise<void> {
  const config = loadConfig();
  const storageConfig = storageConfigFromDatabase(config.database);
  const store = createStorage(storageConfig, safeLogger);
  log.info(`Using ${store.kind} storage at ${describeConnection(storageConfig)}`);

  const admin = new AdminService(store, {
    logger: safeLogger,
    analyticsCacheTtlSeconds: config.analyticsCacheTtlSeconds,
  });
  if (!(await admin.initialize())) {
    throw new Error("Storage backend could not be initialized");
  }

  const images = new ImageStorage(config.uploads.dir, safeLogger);
  const app = createApp(
    {
      store,
      admin,
      patients: new PatientService(store, { images, logger: safeLogger }),
      records: new MedicalRecordsService(store, images, { logger: safeLogger }),
      appointments: new AppointmentService(store, { logger: safeLogger }),
    },
    { maxFileSize: config.uploads.maxFileSize },
  );

  const server: Server = app.listen(config.port, "0.0.0.0", () => {
    log.info(`serving on port ${config.port}`);
  });

  const stop = (signal: string) => {
    log.info(`${signal} received, shutting down`);
    server.close(() => {
      admin
        .shutdown()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          log.error("Shutdown failed", { error });
          process.exit(1);
        });
    });
  };
  process.on("SIGTERM", () => stop("SIGTERM"));
  process.on("SIGINT", () => stop("SIGINT"));
}

main().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    log.error(error.message, { variables: error.variables });
  } else {
    log.error("Server failed to start", { error });
  }
  process.exit(1);
});
