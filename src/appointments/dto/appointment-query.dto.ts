import { ApiPropertyOptional } from '@nestjs/swagger';
import { IsIn, IsNotEmpty, IsOptional, IsString } from 'class-validator';
import { IsCalendarDate } from '../../common/validation/date-time';
import { APPOINTMENT_STATUSES, AppointmentStatus } from '../../schemas/patient.schema';

export class AppointmentQueryDto {
  @ApiPropertyOptional({ example: '2025-10-26' })
  @IsOptional()
  @IsCalendarDate()
  date?: string;

  @ApiPropertyOptional({ enum: APPOINTMENT_STATUSES })
  @IsOptional()
  @IsIn(APPOINTMENT_STATUSES)
  status?: AppointmentStatus;

  @ApiPropertyOptional({ example: 'Prenatal Checkup', description: 'Consultation kind' })
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  type?: string;

  @ApiPropertyOptional({ example: 'Online', description: 'Delivery mode' })
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  appointmentType?: string;
}

export class DoctorAppointmentQueryDto extends AppointmentQueryDto {
  @ApiPropertyOptional({ example: 'DOC123' })
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  doctorId?: string;

  @ApiPropertyOptional({ example: 'PAT1' })
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  patientId?: string;
}
