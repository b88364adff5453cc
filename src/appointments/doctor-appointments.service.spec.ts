import { HttpException } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { InMemoryPatientRepository } from '../../test/support/in-memory-patient.repository';
import { PATIENT_REPOSITORY } from '../patient/patient.repository';
import { Appointment } from '../schemas/patient.schema';
import { DoctorAppointmentsService } from './doctor-appointments.service';

const pendingRequest = (appointmentId: string, appointmentDate: string, createdAt: string): Appointment => ({
  appointmentId,
  doctorId: 'DOC123',
  appointmentDate,
  appointmentTime: '11:00',
  endTime: null,
  durationMins: null,
  type: 'General Consultation',
  appointmentType: 'Online',
  appointmentStatus: 'pending',
  slotId: null,
  slotStartTime: null,
  slotEndTime: null,
  slotDurationMins: null,
  slotPrice: null,
  slotCurrency: null,
  notes: '',
  patientNotes: '',
  doctorNotes: '',
  rejectionReason: null,
  approvedBy: null,
  rejectedBy: null,
  requestedBy: 'patient',
  bookingError: null,
  reconciliationAttempts: 0,
  createdAt: new Date(createdAt),
  updatedAt: new Date(createdAt),
});

describe('DoctorAppointmentsService', () => {
  let service: DoctorAppointmentsService;
  let patients: InMemoryPatientRepository;

  beforeEach(async () => {
    patients = new InMemoryPatientRepository();
    const moduleRef = await Test.createTestingModule({
      providers: [DoctorAppointmentsService, { provide: PATIENT_REPOSITORY, useValue: patients }],
    }).compile();
    service = moduleRef.get(DoctorAppointmentsService);

    for (const [patientId, firstName] of [
      ['PAT1', 'Asha'],
      ['PAT2', 'Meera'],
    ]) {
      await patients.create({
        patientId,
        firstName,
        lastName: 'Rao',
        email: `${firstName.toLowerCase()}@example.com`,
        mobile: null,
        dueDate: null,
        appointments: [],
      });
    }
  });

  const schedule = (patientId: string, appointmentDate: string, doctorId = 'DOC123') =>
    service.createDoctorAppointment({
      patientId,
      doctorId,
      appointmentDate,
      appointmentTime: '10:00',
      appointmentType: 'In-Person',
    });

  it('schedules an appointment on the patient record', async () => {
    const created = await schedule('PAT1', '2025-11-01');

    expect(created).toMatchObject({
      patientId: 'PAT1',
      patientName: 'Asha Rao',
      appointment: {
        doctorId: 'DOC123',
        appointmentStatus: 'scheduled',
        requestedBy: 'doctor',
        type: 'General Consultation',
        slotId: null,
      },
    });
  });

  it('reports a missing patient', async () => {
    await expect(schedule('PAT404', '2025-11-01')).rejects.toThrow('Patient not found');
  });

  it('approves into confirmed and records who approved', async () => {
    const { appointment } = await schedule('PAT1', '2025-11-01');

    const approved = await service.approveAppointment(appointment.appointmentId, { doctorNotes: 'See you then' });

    expect(approved.appointment).toMatchObject({
      appointmentStatus: 'confirmed',
      approvedBy: 'doctor',
      doctorNotes: 'See you then',
    });
  });

  it('rejects with a reason', async () => {
    const { appointment } = await schedule('PAT1', '2025-11-01');

    const rejected = await service.rejectAppointment(appointment.appointmentId, {
      rejectionReason: 'Please book an in-person visit instead',
      rejectedBy: 'DOC123',
    });

    expect(rejected.appointment).toMatchObject({
      appointmentStatus: 'rejected',
      rejectionReason: 'Please book an in-person visit instead',
      rejectedBy: 'DOC123',
    });
  });

  it('refuses an update without fields', async () => {
    const { appointment } = await schedule('PAT1', '2025-11-01');

    await expect(service.updateDoctorAppointment(appointment.appointmentId, {})).rejects.toThrow(
      'No valid fields to update',
    );
  });

  it('deletes an appointment from its patient', async () => {
    const { appointment } = await schedule('PAT2', '2025-11-01');

    await service.deleteDoctorAppointment(appointment.appointmentId);

    const failure = await service.getDoctorAppointment(appointment.appointmentId).catch((error: unknown) => error);
    expect(failure).toBeInstanceOf(HttpException);
    expect(failure instanceof HttpException && failure.getStatus()).toBe(404);
  });

  it('lists pending requests oldest first', async () => {
    await patients.pushAppointment('PAT1', pendingRequest('late', '2025-11-01', '2025-10-20T09:00:00Z'));
    await patients.pushAppointment('PAT2', pendingRequest('early', '2025-12-01', '2025-10-19T09:00:00Z'));
    await schedule('PAT1', '2025-11-05');

    const pending = await service.getPendingAppointments('DOC123');

    expect(pending.map((view) => view.appointment.appointmentId)).toEqual(['early', 'late']);
  });

  it('filters a doctor listing by consultation kind', async () => {
    await schedule('PAT1', '2025-11-01');
    await service.createDoctorAppointment({
      patientId: 'PAT2',
      doctorId: 'DOC123',
      appointmentDate: '2025-11-02',
      appointmentTime: '10:00',
      appointmentType: 'Online',
      type: 'Lactation Support',
    });

    const views = await service.getDoctorAppointments({ doctorId: 'DOC123', type: 'Lactation Support' });

    expect(views.map((view) => view.patientId)).toEqual(['PAT2']);
  });

  it('counts appointments by status and date', async () => {
    await schedule('PAT1', '2025-10-26');
    await schedule('PAT1', '2025-11-01');
    const toReject = await schedule('PAT2', '2025-11-02');
    const toApprove = await schedule('PAT2', '2025-10-01');
    await schedule('PAT2', '2025-11-03', 'DOC9');
    await service.rejectAppointment(toReject.appointment.appointmentId, { rejectionReason: 'Clinic closed' });
    await service.approveAppointment(toApprove.appointment.appointmentId);

    const stats = await service.getAppointmentStatistics('DOC123', '2025-10-26');

    expect(stats).toEqual({
      totalAppointments: 4,
      byStatus: {
        pending: 0,
        booked: 0,
        not_booked: 0,
        scheduled: 2,
        confirmed: 1,
        approved: 0,
        rejected: 1,
        completed: 0,
        cancelled: 0,
      },
      todayAppointments: 1,
      upcomingAppointments: 1,
    });
  });
});
