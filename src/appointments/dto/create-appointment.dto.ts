import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsIn, IsNotEmpty, IsOptional, IsString, Matches, MaxLength } from 'class-validator';
import { CLOCK_TIME_PATTERN, CONSULTATION_TYPES, ConsultationType, IsCalendarDate } from '../../common/validation/date-time';

export class CreateAppointmentDto {
  @ApiProperty({ example: '2025-10-26' })
  @IsCalendarDate({ message: 'appointmentDate must be a valid date in YYYY-MM-DD format' })
  appointmentDate!: string;

  @ApiProperty({ example: '09:00', description: 'Replaced by the slot start time when slotId is given' })
  @Matches(CLOCK_TIME_PATTERN, { message: 'appointmentTime must be a time in HH:MM 24-hour format' })
  appointmentTime!: string;

  @ApiProperty({ enum: CONSULTATION_TYPES, description: 'Delivery mode; also selects the consultation type of the slot' })
  @IsIn(CONSULTATION_TYPES, { message: `appointmentType must be one of: ${CONSULTATION_TYPES.join(', ')}` })
  appointmentType!: ConsultationType;

  @ApiPropertyOptional({ example: 'DOC123', description: 'Required when slotId is given' })
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  doctorId?: string;

  @ApiPropertyOptional({ example: 'slot_001' })
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  slotId?: string;

  @ApiPropertyOptional({ example: 'Prenatal Checkup', description: 'Inferred from the slot when omitted' })
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  type?: string;

  @ApiPropertyOptional({ example: '09:30' })
  @IsOptional()
  @Matches(CLOCK_TIME_PATTERN, { message: 'endTime must be a time in HH:MM 24-hour format' })
  endTime?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  @MaxLength(2000)
  notes?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  @MaxLength(2000)
  patientNotes?: string;
}
