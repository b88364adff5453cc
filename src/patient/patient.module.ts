import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { Patient, PatientSchema } from '../schemas/patient.schema';
import { MongoPatientRepository } from './mongo-patient.repository';
import { PatientController } from './patient.controller';
import { PATIENT_REPOSITORY } from './patient.repository';
import { PatientService } from './patient.service';

@Module({
  imports: [MongooseModule.forFeature([{ name: Patient.name, schema: PatientSchema }])],
  controllers: [PatientController],
  providers: [PatientService, { provide: PATIENT_REPOSITORY, useClass: MongoPatientRepository }],
  exports: [PatientService, PATIENT_REPOSITORY],
})
export class PatientModule {}
