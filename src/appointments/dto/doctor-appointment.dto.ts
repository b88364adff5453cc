import { ApiProperty, ApiPropertyOptional, OmitType, PartialType } from '@nestjs/swagger';
import { IsIn, IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';
import { APPOINTMENT_STATUSES, AppointmentStatus } from '../../schemas/patient.schema';
import { CreateAppointmentDto } from './create-appointment.dto';

export class CreateDoctorAppointmentDto extends OmitType(CreateAppointmentDto, ['slotId', 'patientNotes'] as const) {
  @ApiProperty({ example: 'PAT1' })
  @IsString()
  @IsNotEmpty({ message: 'patientId is required' })
  patientId!: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  @MaxLength(2000)
  doctorNotes?: string;
}

export class UpdateDoctorAppointmentDto extends PartialType(OmitType(CreateDoctorAppointmentDto, ['patientId'] as const)) {
  @ApiPropertyOptional({ enum: APPOINTMENT_STATUSES })
  @IsOptional()
  @IsIn(APPOINTMENT_STATUSES)
  appointmentStatus?: AppointmentStatus;
}

export class ApproveAppointmentDto {
  @ApiPropertyOptional({ example: 'DOC123', default: 'doctor' })
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  approvedBy?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  @MaxLength(2000)
  doctorNotes?: string;
}

export class RejectAppointmentDto {
  @ApiProperty({ example: 'Please book an in-person visit instead' })
  @IsString()
  @IsNotEmpty({ message: 'rejectionReason is required' })
  @MaxLength(500)
  rejectionReason!: string;

  @ApiPropertyOptional({ example: 'DOC123', default: 'doctor' })
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  rejectedBy?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  @MaxLength(2000)
  doctorNotes?: string;
}
