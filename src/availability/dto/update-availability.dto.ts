import { ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { IsArray, IsBoolean, IsIn, IsOptional, ValidateNested } from 'class-validator';
import { CONSULTATION_TYPES, ConsultationType, IsCalendarDate } from '../../common/validation/date-time';
import { BreakDto, TimeRangeDto } from './create-availability.dto';

export class UpdateAvailabilityDto {
  @ApiPropertyOptional({ example: '2025-10-27' })
  @IsOptional()
  @IsCalendarDate()
  date?: string;

  @ApiPropertyOptional({ enum: CONSULTATION_TYPES })
  @IsOptional()
  @IsIn(CONSULTATION_TYPES)
  consultationType?: ConsultationType;

  @ApiPropertyOptional({ type: TimeRangeDto })
  @IsOptional()
  @ValidateNested()
  @Type(() => TimeRangeDto)
  workHours?: TimeRangeDto;

  @ApiPropertyOptional({ type: [BreakDto] })
  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => BreakDto)
  breaks?: BreakDto[];

  @ApiPropertyOptional()
  @IsOptional()
  @IsBoolean()
  isActive?: boolean;
}
