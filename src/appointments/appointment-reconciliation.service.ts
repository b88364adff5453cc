import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Cron, CronExpression } from '@nestjs/schedule';
import { describeError } from '../common/utils/describe-error';
import { ReconciliationConfig } from '../config/configuration';
import { PATIENT_REPOSITORY, PatientRepository } from '../patient/patient.repository';
import { DOCTOR_AVAILABILITY_CLIENT, DoctorAvailabilityClient } from './doctor-availability.client';

export interface ReconciliationReport {
  scanned: number;
  booked: number;
  failed: number;
}

/** Retries the remote booking of appointments left `not_booked`. */
@Injectable()
export class AppointmentReconciliationService {
  private readonly logger = new Logger(AppointmentReconciliationService.name);
  private readonly config: ReconciliationConfig;
  private running = false;

  constructor(
    @Inject(PATIENT_REPOSITORY) private readonly patientRepository: PatientRepository,
    @Inject(DOCTOR_AVAILABILITY_CLIENT) private readonly doctorAvailability: DoctorAvailabilityClient,
    configService: ConfigService,
  ) {
    this.config = configService.get<ReconciliationConfig>('reconciliation') ?? { enabled: false, maxAttempts: 5 };
  }

  @Cron(CronExpression.EVERY_5_MINUTES)
  async handleNotBookedAppointments(): Promise<void> {
    if (!this.config.enabled || this.running) {
      return;
    }
    this.running = true;
    try {
      const report = await this.reconcile();
      if (report.scanned > 0) {
        this.logger.log(`Reconciliation: ${report.booked} booked, ${report.failed} still failing`);
      }
    } catch (error) {
      this.logger.error(`Reconciliation run failed: ${describeError(error)}`);
    } finally {
      this.running = false;
    }
  }

  async reconcile(): Promise<ReconciliationReport> {
    const candidates = await this.patientRepository.searchAppointments({
      statuses: ['not_booked'],
      slotBacked: true,
    });
    const report: ReconciliationReport = { scanned: 0, booked: 0, failed: 0 };

    for (const { patientId, appointment } of candidates) {
      if (!appointment.slotId || !appointment.doctorId) {
        continue;
      }
      if (appointment.reconciliationAttempts >= this.config.maxAttempts) {
        continue;
      }
      report.scanned += 1;

      try {
        await this.doctorAvailability.bookSlot({
          doctorId: appointment.doctorId,
          date: appointment.appointmentDate,
          slotId: appointment.slotId,
          patientId,
          appointmentId: appointment.appointmentId,
          consultationType: appointment.appointmentType,
        });
        await this.patientRepository.updateAppointment(patientId, appointment.appointmentId, {
          appointmentStatus: 'booked',
          bookingError: null,
          reconciliationAttempts: appointment.reconciliationAttempts + 1,
        });
        report.booked += 1;
        this.logger.log(`Reconciled appointment ${appointment.appointmentId} onto slot ${appointment.slotId}`);
      } catch (error) {
        await this.patientRepository.updateAppointment(patientId, appointment.appointmentId, {
          bookingError: describeError(error),
          reconciliationAttempts: appointment.reconciliationAttempts + 1,
        });
        report.failed += 1;
        this.logger.warn(`Retry failed for ${appointment.appointmentId}: ${describeError(error)}`);
      }
    }
    return report;
  }
}
