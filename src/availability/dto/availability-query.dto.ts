import { ApiPropertyOptional } from '@nestjs/swagger';
import { IsIn, IsNotEmpty, IsOptional, IsString } from 'class-validator';
import { CONSULTATION_TYPES, ConsultationType, IsCalendarDate } from '../../common/validation/date-time';

export class AvailabilityQueryDto {
  @ApiPropertyOptional({ example: '2025-10-26' })
  @IsOptional()
  @IsCalendarDate()
  date?: string;

  @ApiPropertyOptional({ example: '2025-10-01' })
  @IsOptional()
  @IsCalendarDate()
  startDate?: string;

  @ApiPropertyOptional({ example: '2025-10-31' })
  @IsOptional()
  @IsCalendarDate()
  endDate?: string;

  @ApiPropertyOptional({ enum: CONSULTATION_TYPES })
  @IsOptional()
  @IsIn(CONSULTATION_TYPES)
  consultationType?: ConsultationType;

  @ApiPropertyOptional({ example: 'Prenatal Checkup' })
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  appointmentType?: string;
}
