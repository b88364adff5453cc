import { ConsultationType } from '../common/validation/date-time';
import { BreakPeriod, DoctorAvailability, TimeRange } from '../schemas/doctor-availability.schema';

export const AVAILABILITY_REPOSITORY = Symbol('AVAILABILITY_REPOSITORY');

/** Identifies one doctor-day; without a consultation type any active document for the day matches. */
export interface DayLookup {
  doctorId: string;
  date: string;
  consultationType?: ConsultationType;
}

export interface AvailabilitySearch {
  doctorId: string;
  date?: string;
  startDate?: string;
  endDate?: string;
  consultationType?: ConsultationType;
}

export interface AvailabilityPatch {
  date?: string;
  consultationType?: ConsultationType;
  workHours?: TimeRange;
  breaks?: BreakPeriod[];
  isActive?: boolean;
}

export interface SlotBookingWrite {
  slotId: string;
  patientId: string;
  appointmentId: string;
  bookedAt: Date;
}

export interface SlotReleaseWrite {
  appointmentId: string;
  reason: string;
  cancelledAt: Date;
}

export class DuplicateAvailabilityError extends Error {
  constructor(readonly doctorId: string, readonly date: string, readonly consultationType: string) {
    super(`Availability already exists for ${doctorId} on ${date} (${consultationType})`);
    this.name = 'DuplicateAvailabilityError';
  }
}

/**
 * Storage port for availability documents.
 *
 * The slot writes are conditional: each returns `true` only when a slot
 * matching the predicate was changed, and the check and the change happen
 * in one atomic step per document.
 */
export interface AvailabilityRepository {
  /** Rejects with {@link DuplicateAvailabilityError} when an active day already exists. */
  insert(availability: DoctorAvailability): Promise<DoctorAvailability>;
  findActive(lookup: DayLookup): Promise<DoctorAvailability | null>;
  findManyActive(search: AvailabilitySearch): Promise<DoctorAvailability[]>;
  findById(availabilityId: string): Promise<DoctorAvailability | null>;
  update(availabilityId: string, patch: AvailabilityPatch): Promise<DoctorAvailability | null>;
  /** Books `slotId` only while it is free. */
  bookSlot(lookup: DayLookup, booking: SlotBookingWrite): Promise<boolean>;
  /** Frees `slotId` only while it is booked by `release.appointmentId`. */
  cancelSlot(lookup: DayLookup, slotId: string, release: SlotReleaseWrite): Promise<boolean>;
  cancelSlotByAppointmentId(release: SlotReleaseWrite): Promise<boolean>;
  /** Frees every booked slot of the day and deactivates it. */
  cancelDay(availabilityId: string, reason: string, cancelledAt: Date): Promise<boolean>;
}
