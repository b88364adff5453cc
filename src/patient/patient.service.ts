import {
  BadRequestException,
  ConflictException,
  HttpException,
  Inject,
  Injectable,
  InternalServerErrorException,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { describeError, errorStack } from '../common/utils/describe-error';
import { generatePatientId } from '../common/utils/id-generator';
import { Patient } from '../schemas/patient.schema';
import { CreatePatientDto } from './dto/create-patient.dto';
import { UpdatePatientDto } from './dto/update-patient.dto';
import { DuplicatePatientError, PATIENT_REPOSITORY, PatientRepository } from './patient.repository';

export interface PatientPage {
  patients: Patient[];
  pagination: { total: number; page: number; limit: number; totalPages: number };
}

@Injectable()
export class PatientService {
  private readonly logger = new Logger(PatientService.name);

  constructor(@Inject(PATIENT_REPOSITORY) private readonly patientRepository: PatientRepository) {}

  async create(dto: CreatePatientDto): Promise<Patient> {
    try {
      const patient = await this.patientRepository.create({
        patientId: dto.patientId ?? generatePatientId(),
        firstName: dto.firstName,
        lastName: dto.lastName,
        email: dto.email,
        mobile: dto.mobile ?? null,
        dueDate: dto.dueDate ?? null,
        appointments: [],
      });
      this.logger.log(`Registered patient ${patient.patientId}`);
      return patient;
    } catch (error) {
      if (error instanceof DuplicatePatientError) {
        throw new ConflictException(error.message);
      }
      throw this.wrap(error, 'Failed to create patient');
    }
  }

  async findAll(page = 1, limit = 20): Promise<PatientPage> {
    const { patients, total } = await this.patientRepository.list(limit, (page - 1) * limit);
    return {
      patients,
      pagination: { total, page, limit, totalPages: Math.ceil(total / limit) },
    };
  }

  async findOne(patientId: string): Promise<Patient> {
    const patient = await this.patientRepository.findById(patientId);
    if (!patient) {
      throw new NotFoundException('Patient not found');
    }
    return patient;
  }

  async update(patientId: string, dto: UpdatePatientDto): Promise<Patient> {
    const patch = {
      ...(dto.firstName !== undefined && { firstName: dto.firstName }),
      ...(dto.lastName !== undefined && { lastName: dto.lastName }),
      ...(dto.email !== undefined && { email: dto.email }),
      ...(dto.mobile !== undefined && { mobile: dto.mobile }),
      ...(dto.dueDate !== undefined && { dueDate: dto.dueDate }),
    };
    if (Object.keys(patch).length === 0) {
      throw new BadRequestException('No valid fields to update');
    }
    try {
      const updated = await this.patientRepository.update(patientId, patch);
      if (!updated) {
        throw new NotFoundException('Patient not found');
      }
      return updated;
    } catch (error) {
      if (error instanceof DuplicatePatientError) {
        throw new ConflictException(error.message);
      }
      throw this.wrap(error, 'Failed to update patient');
    }
  }

  async remove(patientId: string): Promise<void> {
    const deleted = await this.patientRepository.delete(patientId);
    if (!deleted) {
      throw new NotFoundException('Patient not found');
    }
    this.logger.log(`Deleted patient ${patientId}`);
  }

  private wrap(error: unknown, context: string): HttpException {
    if (error instanceof HttpException) {
      return error;
    }
    this.logger.error(`${context}: ${describeError(error)}`, errorStack(error));
    return new InternalServerErrorException(`${context}: ${describeError(error)}`);
  }
}
