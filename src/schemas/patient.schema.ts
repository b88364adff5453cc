import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

export const APPOINTMENT_STATUSES = [
  'pending',
  'booked',
  'not_booked',
  'scheduled',
  'confirmed',
  'approved',
  'rejected',
  'completed',
  'cancelled',
] as const;
export type AppointmentStatus = (typeof APPOINTMENT_STATUSES)[number];

/** Statuses a patient can no longer edit; only cancel-and-recreate applies. */
export const LOCKED_STATUSES: readonly AppointmentStatus[] = ['approved', 'confirmed'];

@Schema({ _id: false })
export class Appointment {
  @Prop({ required: true })
  appointmentId!: string;

  @Prop({ type: String, default: null })
  doctorId!: string | null;

  @Prop({ required: true })
  appointmentDate!: string;

  @Prop({ required: true })
  appointmentTime!: string;

  @Prop({ type: String, default: null })
  endTime!: string | null;

  @Prop({ type: Number, default: null })
  durationMins!: number | null;

  @Prop({ default: 'General Consultation' })
  type!: string;

  @Prop({ required: true })
  appointmentType!: string;

  @Prop({ type: String, enum: APPOINTMENT_STATUSES, default: 'pending' })
  appointmentStatus!: AppointmentStatus;

  @Prop({ type: String, default: null })
  slotId!: string | null;

  @Prop({ type: String, default: null })
  slotStartTime!: string | null;

  @Prop({ type: String, default: null })
  slotEndTime!: string | null;

  @Prop({ type: Number, default: null })
  slotDurationMins!: number | null;

  @Prop({ type: Number, default: null })
  slotPrice!: number | null;

  @Prop({ type: String, default: null })
  slotCurrency!: string | null;

  @Prop({ type: String, default: '' })
  notes!: string;

  @Prop({ type: String, default: '' })
  patientNotes!: string;

  @Prop({ type: String, default: '' })
  doctorNotes!: string;

  @Prop({ type: String, default: null })
  rejectionReason!: string | null;

  @Prop({ type: String, default: null })
  approvedBy!: string | null;

  @Prop({ type: String, default: null })
  rejectedBy!: string | null;

  @Prop({ type: String, enum: ['patient', 'doctor'], default: 'patient' })
  requestedBy!: 'patient' | 'doctor';

  @Prop({ type: String, default: null })
  bookingError!: string | null;

  @Prop({ default: 0 })
  reconciliationAttempts!: number;

  @Prop({ type: Date, required: true })
  createdAt!: Date;

  @Prop({ type: Date, required: true })
  updatedAt!: Date;
}

export const AppointmentSchema = SchemaFactory.createForClass(Appointment);

@Schema({ timestamps: true, collection: 'patients' })
export class Patient {
  @Prop({ required: true, unique: true })
  patientId!: string;

  @Prop({ required: true, trim: true })
  firstName!: string;

  @Prop({ required: true, trim: true })
  lastName!: string;

  @Prop({ required: true, lowercase: true, trim: true })
  email!: string;

  @Prop({ type: String, default: null })
  mobile!: string | null;

  @Prop({ type: String, default: null })
  dueDate!: string | null;

  @Prop({ type: [AppointmentSchema], default: [] })
  appointments!: Appointment[];

  createdAt?: Date;
  updatedAt?: Date;
}

export type PatientDocument = HydratedDocument<Patient>;

export const PatientSchema = SchemaFactory.createForClass(Patient);

PatientSchema.index({ email: 1 }, { unique: true });
PatientSchema.index({ 'appointments.appointmentId': 1 });
PatientSchema.index({ 'appointments.doctorId': 1, 'appointments.appointmentStatus': 1 });
PatientSchema.index({ 'appointments.appointmentStatus': 1 });
