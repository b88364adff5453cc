import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios from 'axios';
import { DoctorModuleConfig } from '../config/configuration';
import { PatientModule } from '../patient/patient.module';
import { AppointmentBookingService } from './appointment-booking.service';
import { AppointmentReconciliationService } from './appointment-reconciliation.service';
import { DOCTOR_AVAILABILITY_CLIENT, DOCTOR_MODULE_HTTP, HttpDoctorAvailabilityClient } from './doctor-availability.client';
import { DoctorAppointmentsController } from './doctor-appointments.controller';
import { DoctorAppointmentsService } from './doctor-appointments.service';
import { PatientAppointmentsController } from './patient-appointments.controller';

@Module({
  imports: [PatientModule],
  controllers: [PatientAppointmentsController, DoctorAppointmentsController],
  providers: [
    AppointmentBookingService,
    DoctorAppointmentsService,
    AppointmentReconciliationService,
    {
      provide: DOCTOR_MODULE_HTTP,
      useFactory: (configService: ConfigService) =>
        axios.create({
          timeout: configService.get<DoctorModuleConfig>('doctorModule')?.timeoutMs ?? 10000,
          headers: { 'Content-Type': 'application/json' },
        }),
      inject: [ConfigService],
    },
    { provide: DOCTOR_AVAILABILITY_CLIENT, useClass: HttpDoctorAvailabilityClient },
  ],
  exports: [AppointmentBookingService, DoctorAppointmentsService],
})
export class AppointmentsModule {}
