import {
  BadRequestException,
  HttpException,
  Inject,
  Injectable,
  InternalServerErrorException,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { ConsultationType, toMinutes } from '../common/validation/date-time';
import { describeError, errorStack } from '../common/utils/describe-error';
import { formatSlotId, generateAvailabilityId } from '../common/utils/id-generator';
import {
  AppointmentTypeGroup,
  AvailabilitySlot,
  DoctorAvailability,
} from '../schemas/doctor-availability.schema';
import {
  AVAILABILITY_REPOSITORY,
  AvailabilityRepository,
  DayLookup,
  DuplicateAvailabilityError,
} from './availability.repository';
import { AppointmentTypeDto, CreateAvailabilityDto, SlotDto } from './dto/create-availability.dto';
import { AvailabilityQueryDto } from './dto/availability-query.dto';
import { UpdateAvailabilityDto } from './dto/update-availability.dto';
import { DEFAULT_SLOT_MINUTES, generateSlots } from './slot-generator';

export const DEFAULT_APPOINTMENT_TYPE = 'General Consultation';
export const DEFAULT_SLOT_CANCEL_REASON = 'Cancelled by doctor';
export const DEFAULT_DAY_CANCEL_REASON = 'Full day cancelled by doctor';
export const DEFAULT_RELEASE_REASON = 'Appointment deleted by patient';

export interface AvailableSlotView {
  slotId: string;
  startTime: string;
  endTime: string;
  appointmentType: string;
  durationMins: number;
  price: number;
  currency: string;
}

export interface BookedSlotView {
  slotId: string;
  startTime: string;
  endTime: string;
  appointmentType: string;
  patientId: string | null;
  appointmentId: string | null;
  bookingTimestamp: Date | null;
}

export interface SlotCounts {
  totalSlots: number;
  bookedSlots: number;
  availableSlots: number;
}

export interface TypeSummary extends SlotCounts {
  type: string;
  durationMins: number;
  price: number;
  currency: string;
}

export interface DaySummary {
  availabilityId: string;
  doctorId: string;
  date: string;
  consultationType: ConsultationType;
  types: TypeSummary[];
  totals: SlotCounts;
}

export interface SlotBookingResult {
  slotId: string;
  patientId: string;
  appointmentId: string;
  alreadyBooked: boolean;
}

export interface DayCancellationResult {
  availabilityId: string;
  cancelledCount: number;
  cancelledAppointments: BookedSlotView[];
}

const isBooked = (slot: AvailabilitySlot): boolean => slot.isBooked === true;
const isFree = (slot: AvailabilitySlot): boolean => slot.isBooked === false;

@Injectable()
export class AvailabilityService {
  private readonly logger = new Logger(AvailabilityService.name);

  constructor(
    @Inject(AVAILABILITY_REPOSITORY)
    private readonly availabilityRepository: AvailabilityRepository,
  ) {}

  async createDailyAvailability(doctorId: string, dto: CreateAvailabilityDto): Promise<string> {
    try {
      this.assertRange(dto.workHours.startTime, dto.workHours.endTime, 'Work hours');
      for (const br of dto.breaks ?? []) {
        this.assertRange(br.startTime, br.endTime, 'Break');
      }

      const types = this.buildTypes(dto);
      const lookup: DayLookup = { doctorId, date: dto.date, consultationType: dto.consultationType };
      const existing = await this.availabilityRepository.findActive(lookup);
      if (existing) {
        throw new BadRequestException('Availability already exists for this date and consultation type');
      }

      const availabilityId = generateAvailabilityId();
      await this.availabilityRepository.insert({
        availabilityId,
        doctorId,
        date: dto.date,
        consultationType: dto.consultationType,
        workHours: { startTime: dto.workHours.startTime, endTime: dto.workHours.endTime },
        types,
        breaks: (dto.breaks ?? []).map((br) => ({
          startTime: br.startTime,
          endTime: br.endTime,
          reason: br.reason ?? null,
        })),
        isActive: true,
        dayCancellationReason: null,
        dayCancelledAt: null,
      });

      this.logger.log(`Created availability ${availabilityId} for ${doctorId} on ${dto.date} (${dto.consultationType})`);
      return availabilityId;
    } catch (error) {
      if (error instanceof DuplicateAvailabilityError) {
        throw new BadRequestException('Availability already exists for this date and consultation type');
      }
      throw this.wrap(error, 'Failed to create availability');
    }
  }

  async getDoctorAvailability(doctorId: string, query: AvailabilityQueryDto = {}): Promise<DoctorAvailability[]> {
    if (Boolean(query.startDate) !== Boolean(query.endDate)) {
      throw new BadRequestException('startDate and endDate must be provided together');
    }
    if (query.startDate && query.endDate && query.startDate > query.endDate) {
      throw new BadRequestException('startDate must not be after endDate');
    }

    const documents = await this.availabilityRepository.findManyActive({
      doctorId,
      date: query.date,
      startDate: query.startDate,
      endDate: query.endDate,
      consultationType: query.consultationType,
    });

    const views = documents.map((doc) => this.withCounts(doc));
    const { appointmentType } = query;
    if (!appointmentType) {
      return views;
    }
    return views
      .map((doc) => ({ ...doc, types: doc.types.filter((group) => group.type === appointmentType) }))
      .filter((doc) => doc.types.length > 0);
  }

  async getAvailableSlotsByType(
    doctorId: string,
    date: string,
    appointmentType: string,
    consultationType?: ConsultationType,
  ): Promise<AvailableSlotView[]> {
    const documents = await this.availabilityRepository.findManyActive({ doctorId, date, consultationType });
    return documents.flatMap((doc) =>
      doc.types
        .filter((group) => group.type === appointmentType)
        .flatMap((group) => this.freeSlots(group)),
    );
  }

  async getAvailableSlotsForDate(
    doctorId: string,
    date: string,
    consultationType?: ConsultationType,
  ): Promise<AvailableSlotView[]> {
    const documents = await this.availabilityRepository.findManyActive({ doctorId, date, consultationType });
    return documents.flatMap((doc) => doc.types.flatMap((group) => this.freeSlots(group)));
  }

  async getBookedSlotsByDate(
    doctorId: string,
    date: string,
    consultationType?: ConsultationType,
  ): Promise<BookedSlotView[]> {
    const documents = await this.availabilityRepository.findManyActive({ doctorId, date, consultationType });
    return documents.flatMap((doc) => this.bookedSlots(doc));
  }

  async getDateAppointmentSummary(
    doctorId: string,
    date: string,
    consultationType?: ConsultationType,
  ): Promise<DaySummary> {
    const doc = await this.findDayOrFail({ doctorId, date, consultationType });
    const types = doc.types.map((group): TypeSummary => ({
      type: group.type,
      durationMins: group.durationMins,
      price: group.price,
      currency: group.currency,
      ...this.countSlots(group.slots),
    }));
    const totals = types.reduce<SlotCounts>(
      (acc, t) => ({
        totalSlots: acc.totalSlots + t.totalSlots,
        bookedSlots: acc.bookedSlots + t.bookedSlots,
        availableSlots: acc.availableSlots + t.availableSlots,
      }),
      { totalSlots: 0, bookedSlots: 0, availableSlots: 0 },
    );

    return {
      availabilityId: doc.availabilityId,
      doctorId: doc.doctorId,
      date: doc.date,
      consultationType: doc.consultationType,
      types,
      totals,
    };
  }

  /**
   * Books a free slot. The repository's conditional write is the only
   * guard against double booking; a retry by the same appointment is
   * reported as `alreadyBooked` instead of failing.
   */
  async bookSlot(
    doctorId: string,
    date: string,
    slotId: string,
    patientId: string,
    appointmentId: string,
    consultationType?: ConsultationType,
  ): Promise<SlotBookingResult> {
    const lookup: DayLookup = { doctorId, date, consultationType };
    const booked = await this.availabilityRepository.bookSlot(lookup, {
      slotId,
      patientId,
      appointmentId,
      bookedAt: new Date(),
    });

    if (booked) {
      this.logger.log(`Booked ${slotId} on ${date} for ${doctorId} (appointment ${appointmentId})`);
      return { slotId, patientId, appointmentId, alreadyBooked: false };
    }

    const existing = await this.findSlot(lookup, slotId);
    if (existing && isBooked(existing) && existing.appointmentId === appointmentId && existing.patientId === patientId) {
      this.logger.debug(`Slot ${slotId} already held by appointment ${appointmentId}`);
      return { slotId, patientId, appointmentId, alreadyBooked: true };
    }

    this.logger.warn(`Booking rejected for ${slotId} on ${date} (doctor ${doctorId})`);
    throw new BadRequestException('Slot not found or already booked');
  }

  async cancelAppointmentSlot(
    doctorId: string,
    date: string,
    slotId: string,
    appointmentId: string,
    reason: string = DEFAULT_SLOT_CANCEL_REASON,
    consultationType?: ConsultationType,
  ): Promise<void> {
    const cancelled = await this.availabilityRepository.cancelSlot({ doctorId, date, consultationType }, slotId, {
      appointmentId,
      reason,
      cancelledAt: new Date(),
    });
    if (!cancelled) {
      throw new NotFoundException('Slot not found or already cancelled');
    }
    this.logger.log(`Released ${slotId} on ${date} for ${doctorId} (appointment ${appointmentId})`);
  }

  async cancelSlotByAppointmentId(appointmentId: string, reason: string = DEFAULT_RELEASE_REASON): Promise<void> {
    const cancelled = await this.availabilityRepository.cancelSlotByAppointmentId({
      appointmentId,
      reason,
      cancelledAt: new Date(),
    });
    if (!cancelled) {
      throw new NotFoundException('No booked slot found for this appointment');
    }
    this.logger.log(`Released slot held by appointment ${appointmentId}`);
  }

  /**
   * Frees every booked slot of the day and deactivates it. The returned
   * list is read before the write, so a booking landing in between is
   * freed without being listed.
   */
  async cancelAllAppointmentsForDate(
    doctorId: string,
    date: string,
    reason: string = DEFAULT_DAY_CANCEL_REASON,
    consultationType?: ConsultationType,
  ): Promise<DayCancellationResult> {
    const doc = await this.findDayOrFail({ doctorId, date, consultationType });
    const cancelledAppointments = this.bookedSlots(doc);

    const updated = await this.availabilityRepository.cancelDay(doc.availabilityId, reason, new Date());
    if (!updated) {
      throw new NotFoundException('No availability found for this date');
    }

    this.logger.log(
      `Cancelled ${cancelledAppointments.length} appointment(s) for ${doctorId} on ${date} (${doc.availabilityId})`,
    );
    return {
      availabilityId: doc.availabilityId,
      cancelledCount: cancelledAppointments.length,
      cancelledAppointments,
    };
  }

  async updateAvailability(availabilityId: string, dto: UpdateAvailabilityDto): Promise<DoctorAvailability> {
    const patch = {
      ...(dto.date !== undefined && { date: dto.date }),
      ...(dto.consultationType !== undefined && { consultationType: dto.consultationType }),
      ...(dto.workHours !== undefined && {
        workHours: { startTime: dto.workHours.startTime, endTime: dto.workHours.endTime },
      }),
      ...(dto.breaks !== undefined && {
        breaks: dto.breaks.map((br) => ({ startTime: br.startTime, endTime: br.endTime, reason: br.reason ?? null })),
      }),
      ...(dto.isActive !== undefined && { isActive: dto.isActive }),
    };
    if (Object.keys(patch).length === 0) {
      throw new BadRequestException('No valid fields to update');
    }
    if (patch.workHours) {
      this.assertRange(patch.workHours.startTime, patch.workHours.endTime, 'Work hours');
    }

    try {
      const updated = await this.availabilityRepository.update(availabilityId, patch);
      if (!updated) {
        throw new NotFoundException('Availability not found');
      }
      return this.withCounts(updated);
    } catch (error) {
      if (error instanceof DuplicateAvailabilityError) {
        throw new BadRequestException('Availability already exists for this date and consultation type');
      }
      throw this.wrap(error, 'Failed to update availability');
    }
  }

  async deleteAvailability(availabilityId: string): Promise<void> {
    const updated = await this.availabilityRepository.update(availabilityId, { isActive: false });
    if (!updated) {
      throw new NotFoundException('Availability not found');
    }
    this.logger.log(`Deactivated availability ${availabilityId}`);
  }

  private buildTypes(dto: CreateAvailabilityDto): AppointmentTypeGroup[] {
    let requested: AppointmentTypeDto[];
    if (dto.types) {
      requested = dto.types;
    } else {
      const durationMins = dto.durationMins ?? DEFAULT_SLOT_MINUTES;
      const slots: SlotDto[] = dto.slots ?? generateSlots(dto.workHours, dto.breaks, durationMins);
      if (slots.length === 0) {
        throw new BadRequestException('No slots could be derived from workHours and breaks');
      }
      requested = [
        {
          type: dto.appointmentType ?? DEFAULT_APPOINTMENT_TYPE,
          durationMins,
          price: dto.price,
          currency: dto.currency,
          slots,
        },
      ];
    }

    const usedIds = new Set<string>();
    for (const slot of requested.flatMap((group) => group.slots)) {
      if (slot.slotId === undefined) {
        continue;
      }
      if (usedIds.has(slot.slotId)) {
        throw new BadRequestException(`Duplicate slotId ${slot.slotId}`);
      }
      usedIds.add(slot.slotId);
    }

    let sequence = 0;
    const nextSlotId = (): string => {
      let candidate: string;
      do {
        sequence += 1;
        candidate = formatSlotId(sequence);
      } while (usedIds.has(candidate));
      usedIds.add(candidate);
      return candidate;
    };

    return requested.map((group) => {
      const slots = group.slots.map((slot) => this.buildSlot(slot, slot.slotId ?? nextSlotId()));
      return {
        type: group.type,
        durationMins: group.durationMins,
        price: group.price ?? 0,
        currency: group.currency ?? 'USD',
        slots,
        ...this.snapshotCounts(slots),
      };
    });
  }

  private buildSlot(slot: SlotDto, slotId: string): AvailabilitySlot {
    this.assertRange(slot.startTime, slot.endTime, `Slot ${slotId}`);
    if (slot.isBooked && (!slot.patientId || !slot.appointmentId)) {
      throw new BadRequestException(`Booked slot ${slotId} requires patientId and appointmentId`);
    }
    return {
      slotId,
      startTime: slot.startTime,
      endTime: slot.endTime,
      isBooked: slot.isBooked,
      patientId: slot.isBooked ? slot.patientId ?? null : null,
      appointmentId: slot.isBooked ? slot.appointmentId ?? null : null,
      bookingTimestamp: slot.isBooked ? new Date() : null,
      cancellationReason: null,
      cancelledAt: null,
      notes: slot.notes ?? null,
    };
  }

  private assertRange(startTime: string, endTime: string, label: string): void {
    if (toMinutes(startTime) >= toMinutes(endTime)) {
      throw new BadRequestException(`${label} end time must be after start time`);
    }
  }

  private snapshotCounts(slots: AvailabilitySlot[]) {
    const counts = this.countSlots(slots);
    return { availableSlotsCount: counts.availableSlots, totalSlotsCount: counts.totalSlots };
  }

  private countSlots(slots: AvailabilitySlot[]): SlotCounts {
    const bookedSlots = slots.filter(isBooked).length;
    const availableSlots = slots.filter(isFree).length;
    return { totalSlots: slots.length, bookedSlots, availableSlots };
  }

  private withCounts(doc: DoctorAvailability): DoctorAvailability {
    return {
      ...doc,
      types: doc.types.map((group) => ({ ...group, ...this.snapshotCounts(group.slots) })),
    };
  }

  private freeSlots(group: AppointmentTypeGroup): AvailableSlotView[] {
    return group.slots.filter(isFree).map((slot) => ({
      slotId: slot.slotId,
      startTime: slot.startTime,
      endTime: slot.endTime,
      appointmentType: group.type,
      durationMins: group.durationMins,
      price: group.price,
      currency: group.currency,
    }));
  }

  private bookedSlots(doc: DoctorAvailability): BookedSlotView[] {
    return doc.types.flatMap((group) =>
      group.slots.filter(isBooked).map((slot) => ({
        slotId: slot.slotId,
        startTime: slot.startTime,
        endTime: slot.endTime,
        appointmentType: group.type,
        patientId: slot.patientId,
        appointmentId: slot.appointmentId,
        bookingTimestamp: slot.bookingTimestamp,
      })),
    );
  }

  private async findSlot(lookup: DayLookup, slotId: string): Promise<AvailabilitySlot | undefined> {
    const documents = await this.availabilityRepository.findManyActive(lookup);
    return documents
      .flatMap((doc) => doc.types.flatMap((group) => group.slots))
      .find((slot) => slot.slotId === slotId);
  }

  private async findDayOrFail(lookup: DayLookup): Promise<DoctorAvailability> {
    const doc = await this.availabilityRepository.findActive(lookup);
    if (!doc) {
      throw new NotFoundException('No availability found for this date');
    }
    return doc;
  }

  private wrap(error: unknown, context: string): HttpException {
    if (error instanceof HttpException) {
      return error;
    }
    this.logger.error(`${context}: ${describeError(error)}`, errorStack(error));
    return new InternalServerErrorException(`${context}: ${describeError(error)}`);
  }
}
