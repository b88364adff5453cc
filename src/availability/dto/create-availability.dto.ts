import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import {
  ArrayMinSize,
  IsArray,
  IsBoolean,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Matches,
  Min,
  ValidateNested,
} from 'class-validator';
import {
  CLOCK_TIME_PATTERN,
  CONSULTATION_TYPES,
  ConsultationType,
  IsCalendarDate,
} from '../../common/validation/date-time';

const TIME_MESSAGE = 'must be a time in HH:MM 24-hour format';

export class TimeRangeDto {
  @ApiProperty({ example: '09:00', description: 'Start time (HH:MM, 24-hour)' })
  @Matches(CLOCK_TIME_PATTERN, { message: `startTime ${TIME_MESSAGE}` })
  startTime!: string;

  @ApiProperty({ example: '17:00', description: 'End time (HH:MM, 24-hour)' })
  @Matches(CLOCK_TIME_PATTERN, { message: `endTime ${TIME_MESSAGE}` })
  endTime!: string;
}

export class BreakDto extends TimeRangeDto {
  @ApiPropertyOptional({ example: 'Lunch' })
  @IsOptional()
  @IsString()
  reason?: string;
}

export class SlotDto extends TimeRangeDto {
  @ApiPropertyOptional({ example: 'slot_001', description: 'Assigned automatically when omitted' })
  @IsOptional()
  @IsString()
  @IsNotEmpty({ message: 'slotId cannot be empty' })
  slotId?: string;

  @ApiProperty({ example: false })
  @IsBoolean({ message: 'isBooked must be a boolean' })
  isBooked!: boolean;

  @ApiPropertyOptional({ example: 'PAT1' })
  @IsOptional()
  @IsString()
  patientId?: string;

  @ApiPropertyOptional({ example: 'A1' })
  @IsOptional()
  @IsString()
  appointmentId?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  notes?: string;
}

export class AppointmentTypeDto {
  @ApiProperty({ example: 'Prenatal Checkup' })
  @IsString({ message: 'type must be text' })
  @IsNotEmpty({ message: 'type cannot be empty' })
  type!: string;

  @ApiProperty({ example: 30 })
  @IsInt({ message: 'durationMins must be an integer' })
  @Min(1, { message: 'durationMins must be at least 1' })
  durationMins!: number;

  @ApiPropertyOptional({ example: 25, default: 0 })
  @IsOptional()
  @IsNumber()
  @Min(0)
  price?: number;

  @ApiPropertyOptional({ example: 'USD', default: 'USD' })
  @IsOptional()
  @IsString()
  currency?: string;

  @ApiProperty({ type: [SlotDto] })
  @IsArray({ message: 'slots must be a list' })
  @ArrayMinSize(1, { message: 'Each appointment type must define at least one slot' })
  @ValidateNested({ each: true })
  @Type(() => SlotDto)
  slots!: SlotDto[];
}

export class CreateAvailabilityDto {
  @ApiProperty({ example: '2025-10-26', description: 'Calendar day (YYYY-MM-DD)' })
  @IsCalendarDate()
  date!: string;

  @ApiProperty({ enum: CONSULTATION_TYPES, example: 'Online' })
  @IsIn(CONSULTATION_TYPES, { message: `consultationType must be one of: ${CONSULTATION_TYPES.join(', ')}` })
  consultationType!: ConsultationType;

  @ApiProperty({ type: TimeRangeDto })
  @ValidateNested()
  @Type(() => TimeRangeDto)
  workHours!: TimeRangeDto;

  @ApiPropertyOptional({
    type: [AppointmentTypeDto],
    description: 'When omitted, slots come from `slots` or are generated from workHours minus breaks',
  })
  @IsOptional()
  @IsArray({ message: 'types must be a list' })
  @ArrayMinSize(1, { message: 'types must contain at least one appointment type' })
  @ValidateNested({ each: true })
  @Type(() => AppointmentTypeDto)
  types?: AppointmentTypeDto[];

  @ApiPropertyOptional({ type: [SlotDto], description: 'Flat slot list wrapped into a single appointment type' })
  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => SlotDto)
  slots?: SlotDto[];

  @ApiPropertyOptional({ example: 'General Consultation' })
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  appointmentType?: string;

  @ApiPropertyOptional({ example: 30 })
  @IsOptional()
  @IsInt()
  @Min(1)
  durationMins?: number;

  @ApiPropertyOptional({ example: 0 })
  @IsOptional()
  @IsNumber()
  @Min(0)
  price?: number;

  @ApiPropertyOptional({ example: 'USD' })
  @IsOptional()
  @IsString()
  currency?: string;

  @ApiPropertyOptional({ type: [BreakDto] })
  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => BreakDto)
  breaks?: BreakDto[];
}
