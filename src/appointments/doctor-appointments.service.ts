import {
  BadRequestException,
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
import {
  AppointmentPatch,
  PATIENT_REPOSITORY,
  PatientAppointment,
  PatientRepository,
} from '../patient/patient.repository';
import { Appointment, AppointmentStatus } from '../schemas/patient.schema';
import { DEFAULT_CONSULTATION_KIND } from './appointment-booking.service';
import { DoctorAppointmentQueryDto } from './dto/appointment-query.dto';
import {
  ApproveAppointmentDto,
  CreateDoctorAppointmentDto,
  RejectAppointmentDto,
  UpdateDoctorAppointmentDto,
} from './dto/doctor-appointment.dto';

const UPCOMING_STATUSES: AppointmentStatus[] = ['scheduled', 'confirmed', 'pending', 'booked'];

const emptyStatusCounts = (): Record<AppointmentStatus, number> => ({
  pending: 0,
  booked: 0,
  not_booked: 0,
  scheduled: 0,
  confirmed: 0,
  approved: 0,
  rejected: 0,
  completed: 0,
  cancelled: 0,
});

export interface AppointmentStatistics {
  totalAppointments: number;
  byStatus: Record<AppointmentStatus, number>;
  todayAppointments: number;
  upcomingAppointments: number;
}

/**
 * Doctor-side view over patients' appointments. Nothing here touches the
 * remote slot store.
 */
@Injectable()
export class DoctorAppointmentsService {
  private readonly logger = new Logger(DoctorAppointmentsService.name);

  constructor(@Inject(PATIENT_REPOSITORY) private readonly patientRepository: PatientRepository) {}

  async getDoctorAppointments(query: DoctorAppointmentQueryDto = {}): Promise<PatientAppointment[]> {
    const views = await this.patientRepository.searchAppointments({
      doctorId: query.doctorId,
      patientId: query.patientId,
      date: query.date,
      statuses: query.status ? [query.status] : undefined,
      appointmentType: query.appointmentType,
    });
    return views.filter((view) => !query.type || view.appointment.type === query.type);
  }

  async createDoctorAppointment(dto: CreateDoctorAppointmentDto): Promise<PatientAppointment> {
    try {
      const now = new Date();
      const appointment: Appointment = {
        appointmentId: generateAppointmentId(),
        doctorId: dto.doctorId ?? null,
        appointmentDate: dto.appointmentDate,
        appointmentTime: dto.appointmentTime,
        endTime: dto.endTime ?? null,
        durationMins: null,
        type: dto.type ?? DEFAULT_CONSULTATION_KIND,
        appointmentType: dto.appointmentType,
        appointmentStatus: 'scheduled',
        slotId: null,
        slotStartTime: null,
        slotEndTime: null,
        slotDurationMins: null,
        slotPrice: null,
        slotCurrency: null,
        notes: dto.notes ?? '',
        patientNotes: '',
        doctorNotes: dto.doctorNotes ?? '',
        rejectionReason: null,
        approvedBy: null,
        rejectedBy: null,
        requestedBy: 'doctor',
        bookingError: null,
        reconciliationAttempts: 0,
        createdAt: now,
        updatedAt: now,
      };

      const stored = await this.patientRepository.pushAppointment(dto.patientId, appointment);
      if (!stored) {
        throw new NotFoundException('Patient not found');
      }
      this.logger.log(`Doctor scheduled appointment ${appointment.appointmentId} for patient ${dto.patientId}`);
      return await this.getDoctorAppointment(appointment.appointmentId);
    } catch (error) {
      throw this.wrap(error, 'Failed to create appointment');
    }
  }

  async getDoctorAppointment(appointmentId: string): Promise<PatientAppointment> {
    const found = await this.patientRepository.findAppointment(appointmentId);
    if (!found) {
      throw new NotFoundException('Appointment not found');
    }
    return found;
  }

  async updateDoctorAppointment(appointmentId: string, dto: UpdateDoctorAppointmentDto): Promise<PatientAppointment> {
    const patch: AppointmentPatch = {
      ...(dto.doctorId !== undefined && { doctorId: dto.doctorId }),
      ...(dto.appointmentDate !== undefined && { appointmentDate: dto.appointmentDate }),
      ...(dto.appointmentTime !== undefined && { appointmentTime: dto.appointmentTime }),
      ...(dto.endTime !== undefined && { endTime: dto.endTime }),
      ...(dto.type !== undefined && { type: dto.type }),
      ...(dto.appointmentType !== undefined && { appointmentType: dto.appointmentType }),
      ...(dto.appointmentStatus !== undefined && { appointmentStatus: dto.appointmentStatus }),
      ...(dto.notes !== undefined && { notes: dto.notes }),
      ...(dto.doctorNotes !== undefined && { doctorNotes: dto.doctorNotes }),
    };
    if (Object.keys(patch).length === 0) {
      throw new BadRequestException('No valid fields to update');
    }
    return this.patchAppointment(appointmentId, patch, 'Failed to update appointment');
  }

  async deleteDoctorAppointment(appointmentId: string): Promise<void> {
    const { patientId } = await this.getDoctorAppointment(appointmentId);
    const removed = await this.patientRepository.removeAppointment(patientId, appointmentId);
    if (!removed) {
      throw new NotFoundException('Appointment not found');
    }
    this.logger.log(`Doctor deleted appointment ${appointmentId}`);
  }

  approveAppointment(appointmentId: string, dto: ApproveAppointmentDto = {}): Promise<PatientAppointment> {
    return this.patchAppointment(
      appointmentId,
      {
        appointmentStatus: 'confirmed',
        approvedBy: dto.approvedBy ?? 'doctor',
        ...(dto.doctorNotes !== undefined && { doctorNotes: dto.doctorNotes }),
      },
      'Failed to approve appointment',
    );
  }

  rejectAppointment(appointmentId: string, dto: RejectAppointmentDto): Promise<PatientAppointment> {
    return this.patchAppointment(
      appointmentId,
      {
        appointmentStatus: 'rejected',
        rejectionReason: dto.rejectionReason,
        rejectedBy: dto.rejectedBy ?? 'doctor',
        ...(dto.doctorNotes !== undefined && { doctorNotes: dto.doctorNotes }),
      },
      'Failed to reject appointment',
    );
  }

  async getPendingAppointments(doctorId?: string): Promise<PatientAppointment[]> {
    const pending = await this.patientRepository.searchAppointments({ doctorId, statuses: ['pending'] });
    return pending.sort((a, b) => a.appointment.createdAt.getTime() - b.appointment.createdAt.getTime());
  }

  async getAppointmentStatistics(doctorId?: string, today: string = todayIsoDate()): Promise<AppointmentStatistics> {
    const views = await this.patientRepository.searchAppointments({ doctorId });
    const byStatus = emptyStatusCounts();
    let todayAppointments = 0;
    let upcomingAppointments = 0;

    for (const { appointment } of views) {
      byStatus[appointment.appointmentStatus] += 1;
      if (appointment.appointmentDate === today) {
        todayAppointments += 1;
      } else if (appointment.appointmentDate > today && UPCOMING_STATUSES.includes(appointment.appointmentStatus)) {
        upcomingAppointments += 1;
      }
    }

    return { totalAppointments: views.length, byStatus, todayAppointments, upcomingAppointments };
  }

  private async patchAppointment(
    appointmentId: string,
    patch: AppointmentPatch,
    context: string,
  ): Promise<PatientAppointment> {
    try {
      const { patientId, patientName } = await this.getDoctorAppointment(appointmentId);
      const appointment = await this.patientRepository.updateAppointment(patientId, appointmentId, patch);
      if (!appointment) {
        throw new NotFoundException('Appointment not found');
      }
      this.logger.log(`Appointment ${appointmentId} updated by doctor (${Object.keys(patch).join(', ')})`);
      return { patientId, patientName, appointment };
    } catch (error) {
      throw this.wrap(error, context);
    }
  }

  private wrap(error: unknown, context: string): HttpException {
    if (error instanceof HttpException) {
      return error;
    }
    this.logger.error(`${context}: ${describeError(error)}`, errorStack(error));
    return new InternalServerErrorException(`${context}: ${describeError(error)}`);
  }
}
