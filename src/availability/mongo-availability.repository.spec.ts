import { getModelToken } from '@nestjs/mongoose';
import { Test } from '@nestjs/testing';
import { DoctorAvailability } from '../schemas/doctor-availability.schema';
import { DuplicateAvailabilityError } from './availability.repository';
import { MongoAvailabilityRepository } from './mongo-availability.repository';

describe('MongoAvailabilityRepository', () => {
  let repository: MongoAvailabilityRepository;
  const availabilityModel = {
    updateOne: jest.fn(),
    create: jest.fn(),
  };
  const bookedAt = new Date('2025-10-20T10:00:00.000Z');

  beforeEach(async () => {
    jest.resetAllMocks();
    const moduleRef = await Test.createTestingModule({
      providers: [
        MongoAvailabilityRepository,
        { provide: getModelToken(DoctorAvailability.name), useValue: availabilityModel },
      ],
    }).compile();
    repository = moduleRef.get(MongoAvailabilityRepository);
  });

  it('books with a single conditional update on a free slot', async () => {
    availabilityModel.updateOne.mockResolvedValue({ modifiedCount: 1 });

    const booked = await repository.bookSlot(
      { doctorId: 'DOC1', date: '2025-10-26', consultationType: 'Online' },
      { slotId: 's1', patientId: 'PAT1', appointmentId: 'A1', bookedAt },
    );

    expect(booked).toBe(true);
    expect(availabilityModel.updateOne).toHaveBeenCalledWith(
      {
        doctorId: 'DOC1',
        date: '2025-10-26',
        isActive: true,
        consultationType: 'Online',
        'types.slots': { $elemMatch: { slotId: 's1', isBooked: false } },
      },
      {
        $set: {
          'types.$[].slots.$[slot].isBooked': true,
          'types.$[].slots.$[slot].patientId': 'PAT1',
          'types.$[].slots.$[slot].appointmentId': 'A1',
          'types.$[].slots.$[slot].bookingTimestamp': bookedAt,
          'types.$[].slots.$[slot].cancellationReason': null,
          'types.$[].slots.$[slot].cancelledAt': null,
        },
      },
      { arrayFilters: [{ 'slot.slotId': 's1', 'slot.isBooked': false }] },
    );
  });

  it('reports a lost race as not booked', async () => {
    availabilityModel.updateOne.mockResolvedValue({ modifiedCount: 0 });

    await expect(
      repository.bookSlot(
        { doctorId: 'DOC1', date: '2025-10-26' },
        { slotId: 's1', patientId: 'PAT2', appointmentId: 'A2', bookedAt },
      ),
    ).resolves.toBe(false);
    expect(availabilityModel.updateOne.mock.calls[0][0]).not.toHaveProperty('consultationType');
  });

  it('cancels only the slot held by the given appointment', async () => {
    availabilityModel.updateOne.mockResolvedValue({ modifiedCount: 1 });

    await repository.cancelSlot({ doctorId: 'DOC1', date: '2025-10-26' }, 's1', {
      appointmentId: 'A1',
      reason: 'Cancelled by doctor',
      cancelledAt: bookedAt,
    });

    const [filter, update, options] = availabilityModel.updateOne.mock.calls[0];
    expect(filter['types.slots']).toEqual({ $elemMatch: { slotId: 's1', appointmentId: 'A1', isBooked: true } });
    expect(update.$set['types.$[].slots.$[slot].isBooked']).toBe(false);
    expect(update.$set['types.$[].slots.$[slot].cancellationReason']).toBe('Cancelled by doctor');
    expect(options).toEqual({
      arrayFilters: [{ 'slot.slotId': 's1', 'slot.appointmentId': 'A1', 'slot.isBooked': true }],
    });
  });

  it('deactivates the day while freeing booked slots', async () => {
    availabilityModel.updateOne.mockResolvedValue({ modifiedCount: 1 });

    await repository.cancelDay('AVAIL_1', 'Emergency', bookedAt);

    const [filter, update, options] = availabilityModel.updateOne.mock.calls[0];
    expect(filter).toEqual({ availabilityId: 'AVAIL_1', isActive: true });
    expect(update.$set).toMatchObject({ isActive: false, dayCancellationReason: 'Emergency', dayCancelledAt: bookedAt });
    expect(options).toEqual({ arrayFilters: [{ 'slot.isBooked': true }] });
  });

  it('maps a duplicate key error', async () => {
    availabilityModel.create.mockRejectedValue(Object.assign(new Error('E11000 duplicate key'), { code: 11000 }));

    await expect(
      repository.insert({
        availabilityId: 'AVAIL_1',
        doctorId: 'DOC1',
        date: '2025-10-26',
        consultationType: 'Online',
        workHours: { startTime: '09:00', endTime: '10:00' },
        types: [],
        breaks: [],
        isActive: true,
        dayCancellationReason: null,
        dayCancelledAt: null,
      }),
    ).rejects.toBeInstanceOf(DuplicateAvailabilityError);
  });
});
