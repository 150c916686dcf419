import {
  insertAppointmentSchema,
  updateAppointmentSchema,
  type Appointment,
  type AppointmentFilter,
} from "@shared/schema";
import type { IRecordStore } from "../storage";
import { ConflictError, NotFoundError, StorageError, ValidationError, wrapStorageFailure } from "../errors";
import { safeLogger, type Logger } from "../safe_logger";
import { appointmentFilterSchema, availabilityQuerySchema, idSchema, parseInput } from "../validation";

const SLOT_MINUTES = 30;
const DAY_START_HOUR = 9;
const DAY_END_HOUR = 18;
const LUNCH_HOUR = 13;

function formatSlot(totalMinutes: number): string {
  const hours = Math.floor(totalMinutes / 60);
  const minutes = totalMinutes % 60;
  return `${hours.toString().padStart(2, "0")}:${minutes.toString().padStart(2, "0")}`;
}

/** 09:00 through 18:00 every 30 minutes, without the 13:00 hour. */
export function dailySlots(): string[] {
  const slots: string[] = [];
  for (let minutes = DAY_START_HOUR * 60; minutes <= DAY_END_HOUR * 60; minutes += SLOT_MINUTES) {
    if (Math.floor(minutes / 60) === LUNCH_HOUR) continue;
    slots.push(formatSlot(minutes));
  }
  return slots;
}

function isoDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export interface Availability {
  doctorId: string;
  date: string;
  availableSlots: string[];
  bookedSlots: string[];
}

export interface AppointmentServiceOptions {
  logger?: Logger;
  clock?: () => Date;
}

export class AppointmentService {
  private readonly log: Logger;
  private readonly clock: () => Date;
  // Serializes slot check + write so two bookings cannot both see a free slot
  private slotQueue: Promise<void> = Promise.resolve();

  constructor(
    private readonly store: IRecordStore,
    options: AppointmentServiceOptions = {},
  ) {
    this.log = (options.logger ?? safeLogger).child("appointment-service");
    this.clock = options.clock ?? (() => new Date());
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.slotQueue.then(task);
    // The caller receives the rejection through `run`; the queue itself keeps going
    this.slotQueue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async bookedSlots(doctorId: string, date: string, excludeId?: string): Promise<string[]> {
    const booked = await this.store.listAppointments({ doctorId, appointmentDate: date, status: "confirmed" });
    return booked.filter((appointment) => appointment.id !== excludeId).map((appointment) => appointment.appointmentTime);
  }

  private assertBookable(date: string, time: string): void {
    if (date < isoDay(this.clock())) {
      throw new ValidationError("Cannot book an appointment in the past", [
        { field: "appointmentDate", message: "Date is in the past" },
      ]);
    }
    if (!dailySlots().includes(time)) {
      throw new ValidationError(`${time} is not a bookable slot`, [
        { field: "appointmentTime", message: "Outside of consultation hours" },
      ]);
    }
  }

  /** A date before today yields no slots at all. */
  async getAvailability(doctorId: string, date: string): Promise<Availability> {
    const query = parseInput(availabilityQuerySchema, { doctorId, date });
    if (query.date < isoDay(this.clock())) {
      return { doctorId: query.doctorId, date: query.date, availableSlots: [], bookedSlots: [] };
    }

    const booked = await this.bookedSlots(query.doctorId, query.date);
    return {
      doctorId: query.doctorId,
      date: query.date,
      availableSlots: dailySlots().filter((slot) => !booked.includes(slot)),
      bookedSlots: booked,
    };
  }

  async bookAppointment(input: unknown): Promise<Appointment> {
    const fields = parseInput(insertAppointmentSchema, input);
    const status = fields.status ?? "confirmed";

    if (fields.patientId && !(await this.store.getPatient(fields.patientId))) {
      throw new NotFoundError(`Patient ${fields.patientId} not found`);
    }

    const id = await this.exclusive(async () => {
      if (status === "confirmed") {
        this.assertBookable(fields.appointmentDate, fields.appointmentTime);
        const booked = await this.bookedSlots(fields.doctorId, fields.appointmentDate);
        if (booked.includes(fields.appointmentTime)) {
          throw new ConflictError(`${fields.appointmentTime} on ${fields.appointmentDate} is already booked`);
        }
      }
      try {
        return await this.store.createAppointment({ ...fields, status });
      } catch (error) {
        throw wrapStorageFailure(error, "book appointment");
      }
    });

    const created = await this.store.getAppointment(id);
    if (!created) {
      throw new StorageError("Failed to book appointment: created record could not be read back");
    }
    this.log.info(`Appointment booked: ${id}`, { date: created.appointmentDate, time: created.appointmentTime });
    return created;
  }

  async getAppointment(appointmentId: string): Promise<Appointment> {
    const id = parseInput(idSchema, appointmentId);
    const appointment = await this.store.getAppointment(id);
    if (!appointment) {
      throw new NotFoundError(`Appointment ${id} not found`);
    }
    return appointment;
  }

  async listAppointments(filter: unknown = {}): Promise<Appointment[]> {
    const parsed: AppointmentFilter = parseInput(appointmentFilterSchema, filter);
    return this.store.listAppointments(parsed);
  }

  /** Confirming, or moving a confirmed appointment, re-checks the target slot. */
  async updateAppointment(appointmentId: string, input: unknown): Promise<Appointment> {
    const changes = parseInput(updateAppointmentSchema, input);
    const existing = await this.getAppointment(appointmentId);

    await this.exclusive(async () => {
      const next = {
        doctorId: changes.doctorId ?? existing.doctorId,
        date: changes.appointmentDate ?? existing.appointmentDate,
        time: changes.appointmentTime ?? existing.appointmentTime,
        status: changes.status ?? existing.status,
      };
      const slotChanged =
        next.doctorId !== existing.doctorId ||
        next.date !== existing.appointmentDate ||
        next.time !== existing.appointmentTime;
      const becomesConfirmed = next.status === "confirmed" && existing.status !== "confirmed";

      if (next.status === "confirmed" && (slotChanged || becomesConfirmed)) {
        this.assertBookable(next.date, next.time);
        const booked = await this.bookedSlots(next.doctorId, next.date, existing.id);
        if (booked.includes(next.time)) {
          throw new ConflictError(`${next.time} on ${next.date} is already booked`);
        }
      }

      if (!(await this.store.updateAppointment(existing.id, changes))) {
        throw new StorageError("Failed to update appointment");
      }
    });

    return this.getAppointment(existing.id);
  }

  async cancelAppointment(appointmentId: string): Promise<Appointment> {
    const existing = await this.getAppointment(appointmentId);
    if (existing.status === "cancelled") return existing;

    if (!(await this.store.updateAppointment(existing.id, { status: "cancelled" }))) {
      throw new StorageError("Failed to cancel appointment");
    }
    return this.getAppointment(existing.id);
  }

  async deleteAppointment(appointmentId: string): Promise<void> {
    const existing = await this.getAppointment(appointmentId);
    if (!(await this.store.deleteAppointment(existing.id))) {
      throw new StorageError("Failed to delete appointment");
    }
  }
}
