import { Appointment, AppointmentStatus, Patient } from '../schemas/patient.schema';

export const PATIENT_REPOSITORY = Symbol('PATIENT_REPOSITORY');

export type PatientProfilePatch = Partial<Pick<Patient, 'firstName' | 'lastName' | 'email' | 'mobile' | 'dueDate'>>;

export type AppointmentPatch = Partial<Omit<Appointment, 'appointmentId' | 'createdAt'>>;

export interface AppointmentSearch {
  doctorId?: string;
  patientId?: string;
  statuses?: AppointmentStatus[];
  date?: string;
  fromDate?: string;
  toDate?: string;
  appointmentType?: string;
  slotBacked?: boolean;
}

export interface PatientAppointment {
  patientId: string;
  patientName: string;
  appointment: Appointment;
}

export class DuplicatePatientError extends Error {
  constructor(readonly field: 'patientId' | 'email', readonly value: string) {
    super(`Patient with ${field} ${value} already exists`);
    this.name = 'DuplicatePatientError';
  }
}

/** Patient documents with their embedded appointment list. */
export interface PatientRepository {
  create(patient: Patient): Promise<Patient>;
  findById(patientId: string): Promise<Patient | null>;
  list(limit: number, skip: number): Promise<{ patients: Patient[]; total: number }>;
  update(patientId: string, patch: PatientProfilePatch): Promise<Patient | null>;
  delete(patientId: string): Promise<boolean>;
  /** Returns false when the patient does not exist. */
  pushAppointment(patientId: string, appointment: Appointment): Promise<boolean>;
  updateAppointment(patientId: string, appointmentId: string, patch: AppointmentPatch): Promise<Appointment | null>;
  removeAppointment(patientId: string, appointmentId: string): Promise<boolean>;
  findAppointment(appointmentId: string): Promise<PatientAppointment | null>;
  searchAppointments(search: AppointmentSearch): Promise<PatientAppointment[]>;
}
