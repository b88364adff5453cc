import {
  AvailabilityPatch,
  AvailabilityRepository,
  AvailabilitySearch,
  DayLookup,
  DuplicateAvailabilityError,
  SlotBookingWrite,
  SlotReleaseWrite,
} from '../../src/availability/availability.repository';
import { AvailabilitySlot, DoctorAvailability } from '../../src/schemas/doctor-availability.schema';

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

/**
 * Process-local stand-in for the Mongo adapter. Each conditional write
 * checks and mutates within one synchronous block after yielding, so
 * concurrent callers interleave the way separate requests would.
 */
export class InMemoryAvailabilityRepository implements AvailabilityRepository {
  private readonly documents: DoctorAvailability[] = [];

  async insert(availability: DoctorAvailability): Promise<DoctorAvailability> {
    await tick();
    const clash = this.documents.find(
      (doc) =>
        doc.isActive &&
        availability.isActive &&
        doc.doctorId === availability.doctorId &&
        doc.date === availability.date &&
        doc.consultationType === availability.consultationType,
    );
    if (clash) {
      throw new DuplicateAvailabilityError(availability.doctorId, availability.date, availability.consultationType);
    }
    const now = new Date();
    const stored = { ...structuredClone(availability), createdAt: now, updatedAt: now };
    this.documents.push(stored);
    return structuredClone(stored);
  }

  async findActive(lookup: DayLookup): Promise<DoctorAvailability | null> {
    await tick();
    const doc = this.documents.find((d) => this.matchesDay(d, lookup));
    return doc ? structuredClone(doc) : null;
  }

  async findManyActive(search: AvailabilitySearch): Promise<DoctorAvailability[]> {
    await tick();
    return this.documents
      .filter((doc) => doc.isActive && doc.doctorId === search.doctorId)
      .filter((doc) => {
        if (search.date) {
          return doc.date === search.date;
        }
        if (search.startDate && search.endDate) {
          return doc.date >= search.startDate && doc.date <= search.endDate;
        }
        return true;
      })
      .filter((doc) => !search.consultationType || doc.consultationType === search.consultationType)
      .sort((a, b) => a.date.localeCompare(b.date) || a.consultationType.localeCompare(b.consultationType))
      .map((doc) => structuredClone(doc));
  }

  async findById(availabilityId: string): Promise<DoctorAvailability | null> {
    await tick();
    const doc = this.documents.find((d) => d.availabilityId === availabilityId);
    return doc ? structuredClone(doc) : null;
  }

  async update(availabilityId: string, patch: AvailabilityPatch): Promise<DoctorAvailability | null> {
    await tick();
    const doc = this.documents.find((d) => d.availabilityId === availabilityId);
    if (!doc) {
      return null;
    }
    Object.assign(doc, structuredClone(patch), { updatedAt: new Date() });
    return structuredClone(doc);
  }

  async bookSlot(lookup: DayLookup, booking: SlotBookingWrite): Promise<boolean> {
    await tick();
    const slot = this.findSlot(lookup, (s) => s.slotId === booking.slotId && s.isBooked === false);
    if (!slot) {
      return false;
    }
    Object.assign(slot, {
      isBooked: true,
      patientId: booking.patientId,
      appointmentId: booking.appointmentId,
      bookingTimestamp: booking.bookedAt,
      cancellationReason: null,
      cancelledAt: null,
    });
    return true;
  }

  async cancelSlot(lookup: DayLookup, slotId: string, release: SlotReleaseWrite): Promise<boolean> {
    await tick();
    const slot = this.findSlot(
      lookup,
      (s) => s.slotId === slotId && s.appointmentId === release.appointmentId && s.isBooked === true,
    );
    if (!slot) {
      return false;
    }
    this.release(slot, release.reason, release.cancelledAt);
    return true;
  }

  async cancelSlotByAppointmentId(release: SlotReleaseWrite): Promise<boolean> {
    await tick();
    const slot = this.documents
      .flatMap((doc) => doc.types.flatMap((group) => group.slots))
      .find((s) => s.appointmentId === release.appointmentId && s.isBooked === true);
    if (!slot) {
      return false;
    }
    this.release(slot, release.reason, release.cancelledAt);
    return true;
  }

  async cancelDay(availabilityId: string, reason: string, cancelledAt: Date): Promise<boolean> {
    await tick();
    const doc = this.documents.find((d) => d.availabilityId === availabilityId && d.isActive);
    if (!doc) {
      return false;
    }
    doc.types
      .flatMap((group) => group.slots)
      .filter((s) => s.isBooked === true)
      .forEach((s) => this.release(s, reason, cancelledAt));
    Object.assign(doc, { isActive: false, dayCancellationReason: reason, dayCancelledAt: cancelledAt });
    return true;
  }

  /** Direct view for assertions. */
  snapshot(): DoctorAvailability[] {
    return structuredClone(this.documents);
  }

  private matchesDay(doc: DoctorAvailability, lookup: DayLookup): boolean {
    return (
      doc.isActive &&
      doc.doctorId === lookup.doctorId &&
      doc.date === lookup.date &&
      (!lookup.consultationType || doc.consultationType === lookup.consultationType)
    );
  }

  private findSlot(lookup: DayLookup, predicate: (slot: AvailabilitySlot) => boolean): AvailabilitySlot | undefined {
    for (const doc of this.documents.filter((d) => this.matchesDay(d, lookup))) {
      const slot = doc.types.flatMap((group) => group.slots).find(predicate);
      if (slot) {
        return slot;
      }
    }
    return undefined;
  }

  private release(slot: AvailabilitySlot, reason: string, cancelledAt: Date): void {
    Object.assign(slot, {
      isBooked: false,
      patientId: null,
      appointmentId: null,
      bookingTimestamp: null,
      cancellationReason: reason,
      cancelledAt,
    });
  }
}
