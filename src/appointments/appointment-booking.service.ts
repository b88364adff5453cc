import {
  BadRequestException,
  ConflictException,
  ForbiddenException,
  HttpException,
  Inject,
  Injectable,
  InternalServerErrorException,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { describeError, errorStack } from '../common/utils/describe-error';
import { generateAppointmentId } from '../common/utils/id-generator';
import { todayIsoDate } from '../common/validation/date-time';
import { AppointmentPatch, PATIENT_REPOSITORY, PatientRepository } from '../patient/patient.repository';
import { Appointment, AppointmentStatus, LOCKED_STATUSES } from '../schemas/patient.schema';
import {
  DOCTOR_AVAILABILITY_CLIENT,
  DoctorAvailabilityClient,
  RemoteAvailability,
} from './doctor-availability.client';
import { AppointmentQueryDto } from './dto/appointment-query.dto';
import { CreateAppointmentDto } from './dto/create-appointment.dto';
import { UpdateAppointmentDto } from './dto/update-appointment.dto';
import { RemoteCallError } from './remote-call.error';

export const DEFAULT_CONSULTATION_KIND = 'General Consultation';
const UPCOMING_STATUSES: AppointmentStatus[] = ['scheduled', 'confirmed', 'booked'];

export interface ValidatedSlot {
  slotId: string;
  startTime: string;
  endTime: string;
  appointmentType: string;
  durationMins: number;
  price: number;
  currency: string;
}

export interface BookingOutcome {
  appointment: Appointment;
  slotBooked: boolean;
}

export interface CancellationOutcome {
  appointmentId: string;
  slotReleased: boolean;
}

interface SlotRef {
  doctorId: string;
  date: string;
  slotId: string;
  consultationType: string;
}

/**
 * Keeps a patient's embedded appointments in step with the doctor
 * module's slot store. Slot validation here is advisory; the remote
 * conditional booking decides.
 */
@Injectable()
export class AppointmentBookingService {
  private readonly logger = new Logger(AppointmentBookingService.name);

  constructor(
    @Inject(PATIENT_REPOSITORY) private readonly patientRepository: PatientRepository,
    @Inject(DOCTOR_AVAILABILITY_CLIENT) private readonly doctorAvailability: DoctorAvailabilityClient,
  ) {}

  async validateSlotAvailability(
    doctorId: string,
    date: string,
    slotId: string,
    consultationType?: string,
  ): Promise<ValidatedSlot> {
    let documents: RemoteAvailability[];
    try {
      documents = await this.doctorAvailability.getAvailabilityForDate(doctorId, date, consultationType);
    } catch (error) {
      throw new BadRequestException(`Slot validation failed: ${describeError(error)}`);
    }

    for (const doc of documents) {
      for (const group of doc.types) {
        const slot = group.slots.find((s) => s.slotId === slotId);
        if (!slot) {
          continue;
        }
        if (slot.isBooked) {
          throw new BadRequestException(`Slot validation failed: Slot ${slotId} is already booked`);
        }
        return {
          slotId,
          startTime: slot.startTime,
          endTime: slot.endTime,
          appointmentType: group.type,
          durationMins: group.durationMins,
          price: group.price,
          currency: group.currency,
        };
      }
    }
    throw new NotFoundException(`Slot validation failed: Slot ${slotId} not found in available slots`);
  }

  /**
   * Writes the appointment locally before booking remotely. A failed remote
   * booking leaves it `not_booked` instead of failing the request.
   */
  async createPatientAppointment(patientId: string, dto: CreateAppointmentDto): Promise<BookingOutcome> {
    try {
      const patient = await this.patientRepository.findById(patientId);
      if (!patient) {
        throw new NotFoundException('Patient not found');
      }
      if (dto.slotId && !dto.doctorId) {
        throw new BadRequestException('doctorId is required when slotId is provided');
      }

      const slot =
        dto.slotId && dto.doctorId
          ? await this.validateSlotAvailability(dto.doctorId, dto.appointmentDate, dto.slotId, dto.appointmentType)
          : undefined;

      const now = new Date();
      const appointment: Appointment = {
        appointmentId: generateAppointmentId(),
        doctorId: dto.doctorId ?? null,
        appointmentDate: dto.appointmentDate,
        appointmentTime: slot?.startTime ?? dto.appointmentTime,
        endTime: slot?.endTime ?? dto.endTime ?? null,
        durationMins: slot?.durationMins ?? null,
        type: dto.type ?? slot?.appointmentType ?? DEFAULT_CONSULTATION_KIND,
        appointmentType: dto.appointmentType,
        appointmentStatus: 'pending',
        ...this.slotSnapshot(slot),
        notes: dto.notes ?? '',
        patientNotes: dto.patientNotes ?? '',
        doctorNotes: '',
        rejectionReason: null,
        approvedBy: null,
        rejectedBy: null,
        requestedBy: 'patient',
        bookingError: null,
        reconciliationAttempts: 0,
        createdAt: now,
        updatedAt: now,
      };

      const stored = await this.patientRepository.pushAppointment(patientId, appointment);
      if (!stored) {
        throw new NotFoundException('Patient not found');
      }
      this.logger.log(`Stored appointment ${appointment.appointmentId} for patient ${patientId} as pending`);

      if (!slot || !dto.doctorId) {
        return { appointment, slotBooked: false };
      }

      const outcome = await this.bookRemote(patientId, appointment.appointmentId, {
        doctorId: dto.doctorId,
        date: dto.appointmentDate,
        slotId: slot.slotId,
        consultationType: dto.appointmentType,
      });
      const updated = await this.patientRepository.updateAppointment(patientId, appointment.appointmentId, outcome);
      return { appointment: updated ?? { ...appointment, ...outcome }, slotBooked: outcome.appointmentStatus === 'booked' };
    } catch (error) {
      throw this.wrap(error, 'Failed to create appointment');
    }
  }

  async getPatientAppointments(patientId: string, query: AppointmentQueryDto = {}): Promise<Appointment[]> {
    const appointments = await this.loadAppointments(patientId);
    return this.applyFilters(appointments, query);
  }

  async getPatientAppointment(patientId: string, appointmentId: string): Promise<Appointment> {
    const appointments = await this.loadAppointments(patientId);
    const appointment = appointments.find((a) => a.appointmentId === appointmentId);
    if (!appointment) {
      throw new NotFoundException('Appointment not found');
    }
    return appointment;
  }

  async getUpcomingAppointments(patientId: string, today: string = todayIsoDate()): Promise<Appointment[]> {
    const appointments = await this.loadAppointments(patientId);
    return appointments
      .filter((a) => UPCOMING_STATUSES.includes(a.appointmentStatus) && a.appointmentDate >= today)
      .sort((a, b) => this.chronological(a, b));
  }

  async getAppointmentHistory(patientId: string, query: AppointmentQueryDto = {}): Promise<Appointment[]> {
    const appointments = await this.loadAppointments(patientId);
    return this.applyFilters(appointments, query).sort((a, b) => this.chronological(b, a));
  }

  /**
   * Applies patient edits. Moving to another slot releases the old one
   * first and re-books it if the new booking fails.
   */
  async updatePatientAppointment(
    patientId: string,
    appointmentId: string,
    dto: UpdateAppointmentDto,
    bearerToken?: string,
  ): Promise<Appointment> {
    try {
      const current = await this.getPatientAppointment(patientId, appointmentId);
      if (LOCKED_STATUSES.includes(current.appointmentStatus)) {
        throw new ForbiddenException({
          error: 'Cannot update approved appointments',
          message:
            'This appointment has been approved by the doctor. Please cancel this appointment and create a new one if you need to make changes.',
          actionRequired: 'cancel_and_recreate',
          currentStatus: current.appointmentStatus,
        });
      }

      const patch: AppointmentPatch = {
        ...(dto.appointmentDate !== undefined && { appointmentDate: dto.appointmentDate }),
        ...(dto.appointmentTime !== undefined && { appointmentTime: dto.appointmentTime }),
        ...(dto.endTime !== undefined && { endTime: dto.endTime }),
        ...(dto.type !== undefined && { type: dto.type }),
        ...(dto.appointmentType !== undefined && { appointmentType: dto.appointmentType }),
        ...(dto.notes !== undefined && { notes: dto.notes }),
        ...(dto.patientNotes !== undefined && { patientNotes: dto.patientNotes }),
      };

      const targetDate = dto.appointmentDate ?? current.appointmentDate;
      const movesDate = dto.appointmentDate !== undefined && dto.appointmentDate !== current.appointmentDate;
      const movesMode = dto.appointmentType !== undefined && dto.appointmentType !== current.appointmentType;
      const targetSlotId =
        dto.slotId !== undefined && (dto.slotId !== current.slotId || movesDate || movesMode) ? dto.slotId : undefined;

      // The slot's day document is keyed by date and consultation type; neither may drift from it.
      if (!targetSlotId && current.slotId) {
        if (movesDate) {
          throw new BadRequestException('slotId is required to move a slot-based appointment to another date');
        }
        if (movesMode) {
          throw new BadRequestException('slotId is required to change the consultation type of a slot-based appointment');
        }
        const movesTime =
          (dto.appointmentTime !== undefined && dto.appointmentTime !== current.appointmentTime) ||
          (dto.endTime !== undefined && dto.endTime !== current.endTime);
        if (movesTime) {
          throw new BadRequestException('Timing of a slot-based appointment follows its slot; choose another slotId');
        }
      }

      if (targetSlotId) {
        if (!current.doctorId) {
          throw new BadRequestException('Appointment has no doctor to book a slot with');
        }
        const target: SlotRef = {
          doctorId: current.doctorId,
          date: targetDate,
          slotId: targetSlotId,
          consultationType: dto.appointmentType ?? current.appointmentType,
        };
        const slot = await this.reschedule(patientId, current, target, bearerToken);
        const booked: AppointmentPatch = {
          appointmentTime: slot.startTime,
          endTime: slot.endTime,
          durationMins: slot.durationMins,
          type: dto.type ?? slot.appointmentType,
          appointmentStatus: 'booked',
          bookingError: null,
          ...this.slotSnapshot(slot),
        };
        Object.assign(patch, booked);
      }

      if (Object.keys(patch).length === 0) {
        throw new BadRequestException('No valid fields to update');
      }

      const updated = await this.patientRepository.updateAppointment(patientId, appointmentId, patch);
      if (!updated) {
        throw new NotFoundException('Appointment not found');
      }
      this.logger.log(`Updated appointment ${appointmentId} for patient ${patientId}`);
      return updated;
    } catch (error) {
      throw this.wrap(error, 'Failed to update appointment');
    }
  }

  /** Removes the appointment; releasing the remote slot is best effort. */
  async cancelPatientAppointment(
    patientId: string,
    appointmentId: string,
    bearerToken?: string,
  ): Promise<CancellationOutcome> {
    try {
      const appointment = await this.getPatientAppointment(patientId, appointmentId);

      let slotReleased = false;
      if (appointment.slotId && appointment.doctorId) {
        try {
          await this.doctorAvailability.cancelSlot(
            {
              doctorId: appointment.doctorId,
              date: appointment.appointmentDate,
              slotId: appointment.slotId,
              appointmentId,
              reason: 'Cancelled by patient',
              consultationType: appointment.appointmentType,
            },
            bearerToken,
          );
          slotReleased = true;
        } catch (error) {
          this.logger.warn(`Could not release slot ${appointment.slotId} for ${appointmentId}: ${describeError(error)}`);
        }
      }

      const removed = await this.patientRepository.removeAppointment(patientId, appointmentId);
      if (!removed) {
        throw new NotFoundException('Appointment not found');
      }
      this.logger.log(`Cancelled appointment ${appointmentId} for patient ${patientId}`);
      return { appointmentId, slotReleased };
    } catch (error) {
      throw this.wrap(error, 'Failed to cancel appointment');
    }
  }

  private async reschedule(
    patientId: string,
    current: Appointment,
    target: SlotRef,
    bearerToken?: string,
  ): Promise<ValidatedSlot> {
    const { doctorId } = target;
    const previous: SlotRef | undefined = current.slotId
      ? { doctorId, date: current.appointmentDate, slotId: current.slotId, consultationType: current.appointmentType }
      : undefined;

    if (previous) {
      try {
        await this.doctorAvailability.cancelSlot(
          { ...previous, appointmentId: current.appointmentId, reason: 'Rescheduled by patient' },
          bearerToken,
        );
      } catch (error) {
        this.logger.warn(`Old slot ${previous.slotId} not released before reschedule: ${describeError(error)}`);
      }
    }

    try {
      const slot = await this.validateSlotAvailability(doctorId, target.date, target.slotId, target.consultationType);
      await this.doctorAvailability.bookSlot({ ...target, patientId, appointmentId: current.appointmentId });
      return slot;
    } catch (error) {
      const reason = error instanceof RemoteCallError ? error.message : describeError(error);
      if (!previous) {
        throw new BadRequestException({ message: `Failed to book new slot: ${reason}`, code: 'RESCHEDULE_FAILED' });
      }
      await this.restorePreviousSlot(patientId, current.appointmentId, previous, reason);
      throw new BadRequestException({
        message: `Failed to book new slot: ${reason}`,
        code: 'RESCHEDULE_FAILED',
        rolledBack: true,
      });
    }
  }

  private async restorePreviousSlot(
    patientId: string,
    appointmentId: string,
    previous: SlotRef,
    reason: string,
  ): Promise<void> {
    try {
      await this.doctorAvailability.bookSlot({ ...previous, patientId, appointmentId });
      this.logger.log(`Restored slot ${previous.slotId} for appointment ${appointmentId} after failed reschedule`);
    } catch (error) {
      const compensation = describeError(error);
      this.logger.warn(`Could not restore slot ${previous.slotId} for ${appointmentId}: ${compensation}`);
      await this.patientRepository.updateAppointment(patientId, appointmentId, {
        appointmentStatus: 'not_booked',
        bookingError: compensation,
      });
      throw new ConflictException({
        message: `Failed to book new slot: ${reason}. The original slot could not be restored`,
        code: 'RESCHEDULE_PARTIALLY_FAILED',
        rolledBack: false,
      });
    }
  }

  private async bookRemote(
    patientId: string,
    appointmentId: string,
    ref: SlotRef,
  ): Promise<Pick<Appointment, 'appointmentStatus' | 'bookingError'>> {
    try {
      await this.doctorAvailability.bookSlot({ ...ref, patientId, appointmentId });
      this.logger.log(`Appointment ${appointmentId} booked on slot ${ref.slotId}`);
      return { appointmentStatus: 'booked', bookingError: null };
    } catch (error) {
      this.logger.warn(`Remote booking failed for ${appointmentId}: ${describeError(error)}`);
      return { appointmentStatus: 'not_booked', bookingError: describeError(error) };
    }
  }

  private slotSnapshot(slot: ValidatedSlot | undefined) {
    return {
      slotId: slot?.slotId ?? null,
      slotStartTime: slot?.startTime ?? null,
      slotEndTime: slot?.endTime ?? null,
      slotDurationMins: slot?.durationMins ?? null,
      slotPrice: slot?.price ?? null,
      slotCurrency: slot?.currency ?? null,
    };
  }

  private async loadAppointments(patientId: string): Promise<Appointment[]> {
    const patient = await this.patientRepository.findById(patientId);
    if (!patient) {
      throw new NotFoundException('Patient not found');
    }
    return patient.appointments;
  }

  private applyFilters(appointments: Appointment[], query: AppointmentQueryDto): Appointment[] {
    return appointments.filter(
      (a) =>
        (!query.date || a.appointmentDate === query.date) &&
        (!query.status || a.appointmentStatus === query.status) &&
        (!query.type || a.type === query.type) &&
        (!query.appointmentType || a.appointmentType === query.appointmentType),
    );
  }

  private chronological(a: Appointment, b: Appointment): number {
    return a.appointmentDate.localeCompare(b.appointmentDate) || a.appointmentTime.localeCompare(b.appointmentTime);
  }

  private wrap(error: unknown, context: string): HttpException {
    if (error instanceof HttpException) {
      return error;
    }
    this.logger.error(`${context}: ${describeError(error)}`, errorStack(error));
    return new InternalServerErrorException(`${context}: ${describeError(error)}`);
  }
}
