import {
  AppointmentPatch,
  AppointmentSearch,
  DuplicatePatientError,
  PatientAppointment,
  PatientProfilePatch,
  PatientRepository,
} from '../../src/patient/patient.repository';
import { Appointment, Patient } from '../../src/schemas/patient.schema';

export class InMemoryPatientRepository implements PatientRepository {
  private readonly patients: Patient[] = [];

  async create(patient: Patient): Promise<Patient> {
    if (this.patients.some((p) => p.patientId === patient.patientId)) {
      throw new DuplicatePatientError('patientId', patient.patientId);
    }
    if (this.patients.some((p) => p.email === patient.email)) {
      throw new DuplicatePatientError('email', patient.email);
    }
    const now = new Date();
    const stored = { ...structuredClone(patient), createdAt: now, updatedAt: now };
    this.patients.push(stored);
    return structuredClone(stored);
  }

  async findById(patientId: string): Promise<Patient | null> {
    const patient = this.find(patientId);
    return patient ? structuredClone(patient) : null;
  }

  async list(limit: number, skip: number): Promise<{ patients: Patient[]; total: number }> {
    return {
      patients: structuredClone(this.patients.slice(skip, skip + limit)),
      total: this.patients.length,
    };
  }

  async update(patientId: string, patch: PatientProfilePatch): Promise<Patient | null> {
    const patient = this.find(patientId);
    if (!patient) {
      return null;
    }
    Object.assign(patient, structuredClone(patch), { updatedAt: new Date() });
    return structuredClone(patient);
  }

  async delete(patientId: string): Promise<boolean> {
    const index = this.patients.findIndex((p) => p.patientId === patientId);
    if (index < 0) {
      return false;
    }
    this.patients.splice(index, 1);
    return true;
  }

  async pushAppointment(patientId: string, appointment: Appointment): Promise<boolean> {
    const patient = this.find(patientId);
    if (!patient) {
      return false;
    }
    patient.appointments.push(structuredClone(appointment));
    return true;
  }

  async updateAppointment(
    patientId: string,
    appointmentId: string,
    patch: AppointmentPatch,
  ): Promise<Appointment | null> {
    const appointment = this.find(patientId)?.appointments.find((a) => a.appointmentId === appointmentId);
    if (!appointment) {
      return null;
    }
    const defined = Object.fromEntries(Object.entries(patch).filter(([, value]) => value !== undefined));
    Object.assign(appointment, structuredClone(defined), { updatedAt: new Date() });
    return structuredClone(appointment);
  }

  async removeAppointment(patientId: string, appointmentId: string): Promise<boolean> {
    const patient = this.find(patientId);
    if (!patient) {
      return false;
    }
    const before = patient.appointments.length;
    patient.appointments = patient.appointments.filter((a) => a.appointmentId !== appointmentId);
    return patient.appointments.length < before;
  }

  async findAppointment(appointmentId: string): Promise<PatientAppointment | null> {
    const all = await this.searchAppointments({});
    return all.find((view) => view.appointment.appointmentId === appointmentId) ?? null;
  }

  async searchAppointments(search: AppointmentSearch): Promise<PatientAppointment[]> {
    return this.patients
      .filter((p) => !search.patientId || p.patientId === search.patientId)
      .flatMap((p) =>
        p.appointments.map((appointment) => ({
          patientId: p.patientId,
          patientName: `${p.firstName} ${p.lastName}`.trim(),
          appointment: structuredClone(appointment),
        })),
      )
      .filter(({ appointment: a }) => {
        if (search.doctorId && a.doctorId !== search.doctorId) return false;
        if (search.statuses?.length && !search.statuses.includes(a.appointmentStatus)) return false;
        if (search.date && a.appointmentDate !== search.date) return false;
        if (!search.date && search.fromDate && a.appointmentDate < search.fromDate) return false;
        if (!search.date && search.toDate && a.appointmentDate > search.toDate) return false;
        if (search.appointmentType && a.appointmentType !== search.appointmentType) return false;
        if (search.slotBacked !== undefined && (a.slotId !== null) !== search.slotBacked) return false;
        return true;
      })
      .sort(
        (x, y) =>
          x.appointment.appointmentDate.localeCompare(y.appointment.appointmentDate) ||
          x.appointment.appointmentTime.localeCompare(y.appointment.appointmentTime),
      );
  }

  private find(patientId: string): Patient | undefined {
    return this.patients.find((p) => p.patientId === patientId);
  }
}
