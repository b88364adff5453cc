import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';
import { CONSULTATION_TYPES, ConsultationType } from '../common/validation/date-time';

@Schema({ _id: false })
export class TimeRange {
  @Prop({ required: true })
  startTime!: string;

  @Prop({ required: true })
  endTime!: string;
}

export const TimeRangeSchema = SchemaFactory.createForClass(TimeRange);

@Schema({ _id: false })
export class BreakPeriod extends TimeRange {
  @Prop({ type: String, default: null })
  reason!: string | null;
}

export const BreakPeriodSchema = SchemaFactory.createForClass(BreakPeriod);

@Schema({ _id: false })
export class AvailabilitySlot {
  @Prop({ required: true })
  slotId!: string;

  @Prop({ required: true })
  startTime!: string;

  @Prop({ required: true })
  endTime!: string;

  @Prop({ required: true, default: false })
  isBooked!: boolean;

  @Prop({ type: String, default: null })
  patientId!: string | null;

  @Prop({ type: String, default: null })
  appointmentId!: string | null;

  @Prop({ type: Date, default: null })
  bookingTimestamp!: Date | null;

  @Prop({ type: String, default: null })
  cancellationReason!: string | null;

  @Prop({ type: Date, default: null })
  cancelledAt!: Date | null;

  @Prop({ type: String, default: null })
  notes!: string | null;
}

export const AvailabilitySlotSchema = SchemaFactory.createForClass(AvailabilitySlot);

@Schema({ _id: false })
export class AppointmentTypeGroup {
  @Prop({ required: true })
  type!: string;

  @Prop({ required: true, min: 1 })
  durationMins!: number;

  @Prop({ default: 0 })
  price!: number;

  @Prop({ default: 'USD' })
  currency!: string;

  @Prop({ type: [AvailabilitySlotSchema], default: [] })
  slots!: AvailabilitySlot[];

  // Creation-time snapshot; read paths recompute from `slots`
  @Prop({ default: 0 })
  availableSlotsCount!: number;

  @Prop({ default: 0 })
  totalSlotsCount!: number;
}

export const AppointmentTypeGroupSchema = SchemaFactory.createForClass(AppointmentTypeGroup);

@Schema({ timestamps: true, collection: 'doctor_availability' })
export class DoctorAvailability {
  @Prop({ required: true, unique: true })
  availabilityId!: string;

  @Prop({ required: true })
  doctorId!: string;

  @Prop({ required: true })
  date!: string;

  @Prop({ type: String, required: true, enum: CONSULTATION_TYPES })
  consultationType!: ConsultationType;

  @Prop({ type: TimeRangeSchema, required: true })
  workHours!: TimeRange;

  @Prop({ type: [AppointmentTypeGroupSchema], default: [] })
  types!: AppointmentTypeGroup[];

  @Prop({ type: [BreakPeriodSchema], default: [] })
  breaks!: BreakPeriod[];

  @Prop({ default: true })
  isActive!: boolean;

  @Prop({ type: String, default: null })
  dayCancellationReason!: string | null;

  @Prop({ type: Date, default: null })
  dayCancelledAt!: Date | null;

  createdAt?: Date;
  updatedAt?: Date;
}

export type DoctorAvailabilityDocument = HydratedDocument<DoctorAvailability>;

export const DoctorAvailabilitySchema = SchemaFactory.createForClass(DoctorAvailability);

// One active day per doctor and consultation type
DoctorAvailabilitySchema.index(
  { doctorId: 1, date: 1, consultationType: 1 },
  { unique: true, partialFilterExpression: { isActive: true } },
);
DoctorAvailabilitySchema.index({ doctorId: 1, isActive: 1 });
DoctorAvailabilitySchema.index({ 'types.slots.appointmentId': 1 });
