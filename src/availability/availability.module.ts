import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { DoctorAvailability, DoctorAvailabilitySchema } from '../schemas/doctor-availability.schema';
import { AvailabilityController, DoctorAvailabilityController } from './availability.controller';
import { AVAILABILITY_REPOSITORY } from './availability.repository';
import { AvailabilityService } from './availability.service';
import { MongoAvailabilityRepository } from './mongo-availability.repository';

@Module({
  imports: [
    MongooseModule.forFeature([{ name: DoctorAvailability.name, schema: DoctorAvailabilitySchema }]),
  ],
  controllers: [DoctorAvailabilityController, AvailabilityController],
  providers: [
    AvailabilityService,
    { provide: AVAILABILITY_REPOSITORY, useClass: MongoAvailabilityRepository },
  ],
  exports: [AvailabilityService],
})
export class AvailabilityModule {}
