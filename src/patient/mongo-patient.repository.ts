import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { FilterQuery, Model, PipelineStage } from 'mongoose';
import { Appointment, Patient } from '../schemas/patient.schema';
import {
  AppointmentPatch,
  AppointmentSearch,
  DuplicatePatientError,
  PatientAppointment,
  PatientProfilePatch,
  PatientRepository,
} from './patient.repository';

const isDuplicateKeyError = (error: unknown): error is { keyPattern?: Record<string, unknown> } =>
  typeof error === 'object' && error !== null && 'code' in error && error.code === 11000;

const toAppointmentView = (patient: Patient, appointment: Appointment): PatientAppointment => ({
  patientId: patient.patientId,
  patientName: `${patient.firstName} ${patient.lastName}`.trim(),
  appointment,
});

@Injectable()
export class MongoPatientRepository implements PatientRepository {
  constructor(@InjectModel(Patient.name) private readonly patientModel: Model<Patient>) {}

  async create(patient: Patient): Promise<Patient> {
    try {
      const created = await this.patientModel.create(patient);
      return created.toObject<Patient>();
    } catch (error) {
      if (isDuplicateKeyError(error)) {
        const field = error.keyPattern && 'email' in error.keyPattern ? 'email' : 'patientId';
        throw new DuplicatePatientError(field, field === 'email' ? patient.email : patient.patientId);
      }
      throw error;
    }
  }

  findById(patientId: string): Promise<Patient | null> {
    return this.patientModel.findOne({ patientId }).lean<Patient>().exec();
  }

  async list(limit: number, skip: number): Promise<{ patients: Patient[]; total: number }> {
    const [patients, total] = await Promise.all([
      this.patientModel.find().sort({ createdAt: -1 }).skip(skip).limit(limit).lean<Patient[]>().exec(),
      this.patientModel.countDocuments().exec(),
    ]);
    return { patients, total };
  }

  update(patientId: string, patch: PatientProfilePatch): Promise<Patient | null> {
    return this.patientModel
      .findOneAndUpdate({ patientId }, { $set: patch }, { new: true, runValidators: true })
      .lean<Patient>()
      .exec();
  }

  async delete(patientId: string): Promise<boolean> {
    const result = await this.patientModel.deleteOne({ patientId }).exec();
    return result.deletedCount > 0;
  }

  async pushAppointment(patientId: string, appointment: Appointment): Promise<boolean> {
    const result = await this.patientModel.updateOne({ patientId }, { $push: { appointments: appointment } }).exec();
    return result.matchedCount > 0;
  }

  async updateAppointment(
    patientId: string,
    appointmentId: string,
    patch: AppointmentPatch,
  ): Promise<Appointment | null> {
    const $set: Record<string, unknown> = { 'appointments.$.updatedAt': new Date() };
    for (const [key, value] of Object.entries(patch)) {
      if (value !== undefined) {
        $set[`appointments.$.${key}`] = value;
      }
    }

    const patient = await this.patientModel
      .findOneAndUpdate({ patientId, 'appointments.appointmentId': appointmentId }, { $set }, { new: true })
      .lean<Patient>()
      .exec();
    return patient?.appointments.find((a) => a.appointmentId === appointmentId) ?? null;
  }

  async removeAppointment(patientId: string, appointmentId: string): Promise<boolean> {
    const result = await this.patientModel
      .updateOne({ patientId }, { $pull: { appointments: { appointmentId } } })
      .exec();
    return result.modifiedCount > 0;
  }

  async findAppointment(appointmentId: string): Promise<PatientAppointment | null> {
    const patient = await this.patientModel
      .findOne({ 'appointments.appointmentId': appointmentId })
      .lean<Patient>()
      .exec();
    const appointment = patient?.appointments.find((a) => a.appointmentId === appointmentId);
    return patient && appointment ? toAppointmentView(patient, appointment) : null;
  }

  searchAppointments(search: AppointmentSearch): Promise<PatientAppointment[]> {
    const match: FilterQuery<Patient> = {};
    if (search.doctorId) {
      match['appointments.doctorId'] = search.doctorId;
    }
    if (search.statuses?.length) {
      match['appointments.appointmentStatus'] = { $in: search.statuses };
    }
    if (search.date) {
      match['appointments.appointmentDate'] = search.date;
    } else if (search.fromDate || search.toDate) {
      match['appointments.appointmentDate'] = {
        ...(search.fromDate && { $gte: search.fromDate }),
        ...(search.toDate && { $lte: search.toDate }),
      };
    }
    if (search.appointmentType) {
      match['appointments.appointmentType'] = search.appointmentType;
    }
    if (search.slotBacked !== undefined) {
      match['appointments.slotId'] = search.slotBacked ? { $ne: null } : null;
    }

    const pipeline: PipelineStage[] = [
      { $match: search.patientId ? { patientId: search.patientId } : {} },
      { $unwind: '$appointments' },
      { $match: match },
      { $sort: { 'appointments.appointmentDate': 1, 'appointments.appointmentTime': 1 } },
      {
        $project: {
          _id: 0,
          patientId: 1,
          patientName: { $trim: { input: { $concat: ['$firstName', ' ', '$lastName'] } } },
          appointment: '$appointments',
        },
      },
    ];
    return this.patientModel.aggregate<PatientAppointment>(pipeline).exec();
  }
}
