import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { FilterQuery, Model } from 'mongoose';
import { DoctorAvailability } from '../schemas/doctor-availability.schema';
import {
  AvailabilityPatch,
  AvailabilityRepository,
  AvailabilitySearch,
  DayLookup,
  DuplicateAvailabilityError,
  SlotBookingWrite,
  SlotReleaseWrite,
} from './availability.repository';

const SLOT = 'types.$[].slots.$[slot]';

const isDuplicateKeyError = (error: unknown): boolean =>
  typeof error === 'object' && error !== null && 'code' in error && error.code === 11000;

const releasedSlotFields = (reason: string, cancelledAt: Date) => ({
  [`${SLOT}.isBooked`]: false,
  [`${SLOT}.patientId`]: null,
  [`${SLOT}.appointmentId`]: null,
  [`${SLOT}.bookingTimestamp`]: null,
  [`${SLOT}.cancellationReason`]: reason,
  [`${SLOT}.cancelledAt`]: cancelledAt,
});

@Injectable()
export class MongoAvailabilityRepository implements AvailabilityRepository {
  constructor(
    @InjectModel(DoctorAvailability.name)
    private readonly availabilityModel: Model<DoctorAvailability>,
  ) {}

  async insert(availability: DoctorAvailability): Promise<DoctorAvailability> {
    try {
      const created = await this.availabilityModel.create(availability);
      return created.toObject<DoctorAvailability>();
    } catch (error) {
      if (isDuplicateKeyError(error)) {
        throw new DuplicateAvailabilityError(
          availability.doctorId,
          availability.date,
          availability.consultationType,
        );
      }
      throw error;
    }
  }

  findActive(lookup: DayLookup): Promise<DoctorAvailability | null> {
    return this.availabilityModel
      .findOne(this.dayFilter(lookup))
      .sort({ createdAt: 1 })
      .lean<DoctorAvailability>()
      .exec();
  }

  findManyActive(search: AvailabilitySearch): Promise<DoctorAvailability[]> {
    const filter: FilterQuery<DoctorAvailability> = { doctorId: search.doctorId, isActive: true };
    if (search.date) {
      filter.date = search.date;
    } else if (search.startDate && search.endDate) {
      filter.date = { $gte: search.startDate, $lte: search.endDate };
    }
    if (search.consultationType) {
      filter.consultationType = search.consultationType;
    }
    return this.availabilityModel
      .find(filter)
      .sort({ date: 1, consultationType: 1 })
      .lean<DoctorAvailability[]>()
      .exec();
  }

  findById(availabilityId: string): Promise<DoctorAvailability | null> {
    return this.availabilityModel.findOne({ availabilityId }).lean<DoctorAvailability>().exec();
  }

  update(availabilityId: string, patch: AvailabilityPatch): Promise<DoctorAvailability | null> {
    return this.availabilityModel
      .findOneAndUpdate({ availabilityId }, { $set: patch }, { new: true })
      .lean<DoctorAvailability>()
      .exec();
  }

  async bookSlot(lookup: DayLookup, booking: SlotBookingWrite): Promise<boolean> {
    const filter: FilterQuery<DoctorAvailability> = {
      ...this.dayFilter(lookup),
      'types.slots': { $elemMatch: { slotId: booking.slotId, isBooked: false } },
    };
    const result = await this.availabilityModel.updateOne(
      filter,
      {
        $set: {
          [`${SLOT}.isBooked`]: true,
          [`${SLOT}.patientId`]: booking.patientId,
          [`${SLOT}.appointmentId`]: booking.appointmentId,
          [`${SLOT}.bookingTimestamp`]: booking.bookedAt,
          [`${SLOT}.cancellationReason`]: null,
          [`${SLOT}.cancelledAt`]: null,
        },
      },
      { arrayFilters: [{ 'slot.slotId': booking.slotId, 'slot.isBooked': false }] },
    );
    return result.modifiedCount > 0;
  }

  async cancelSlot(lookup: DayLookup, slotId: string, release: SlotReleaseWrite): Promise<boolean> {
    const predicate = { slotId, appointmentId: release.appointmentId, isBooked: true };
    const filter: FilterQuery<DoctorAvailability> = {
      ...this.dayFilter(lookup),
      'types.slots': { $elemMatch: predicate },
    };
    const result = await this.availabilityModel.updateOne(
      filter,
      { $set: releasedSlotFields(release.reason, release.cancelledAt) },
      {
        arrayFilters: [
          { 'slot.slotId': slotId, 'slot.appointmentId': release.appointmentId, 'slot.isBooked': true },
        ],
      },
    );
    return result.modifiedCount > 0;
  }

  async cancelSlotByAppointmentId(release: SlotReleaseWrite): Promise<boolean> {
    const filter: FilterQuery<DoctorAvailability> = {
      'types.slots': { $elemMatch: { appointmentId: release.appointmentId, isBooked: true } },
    };
    const result = await this.availabilityModel.updateOne(
      filter,
      { $set: releasedSlotFields(release.reason, release.cancelledAt) },
      { arrayFilters: [{ 'slot.appointmentId': release.appointmentId, 'slot.isBooked': true }] },
    );
    return result.modifiedCount > 0;
  }

  async cancelDay(availabilityId: string, reason: string, cancelledAt: Date): Promise<boolean> {
    const result = await this.availabilityModel.updateOne(
      { availabilityId, isActive: true },
      {
        $set: {
          ...releasedSlotFields(reason, cancelledAt),
          isActive: false,
          dayCancellationReason: reason,
          dayCancelledAt: cancelledAt,
        },
      },
      { arrayFilters: [{ 'slot.isBooked': true }] },
    );
    return result.modifiedCount > 0;
  }

  private dayFilter(lookup: DayLookup): FilterQuery<DoctorAvailability> {
    const filter: FilterQuery<DoctorAvailability> = {
      doctorId: lookup.doctorId,
      date: lookup.date,
      isActive: true,
    };
    if (lookup.consultationType) {
      filter.consultationType = lookup.consultationType;
    }
    return filter;
  }
}
