import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';

export class BookSlotDto {
  @ApiProperty({ example: 'slot_001' })
  @IsString()
  @IsNotEmpty({ message: 'slotId is required' })
  slotId!: string;

  @ApiProperty({ example: 'PAT1' })
  @IsString()
  @IsNotEmpty({ message: 'patientId is required' })
  patientId!: string;

  @ApiProperty({ example: '6717a1c2e4b0a1b2c3d4e5f6' })
  @IsString()
  @IsNotEmpty({ message: 'appointmentId is required' })
  appointmentId!: string;
}

export class CancelSlotDto {
  @ApiProperty({ example: '6717a1c2e4b0a1b2c3d4e5f6' })
  @IsString()
  @IsNotEmpty({ message: 'appointmentId is required' })
  appointmentId!: string;

  @ApiPropertyOptional({ example: 'Patient rescheduled' })
  @IsOptional()
  @IsString()
  @MaxLength(500)
  cancellationReason?: string;
}

export class CancelDayDto {
  @ApiPropertyOptional({ example: 'Doctor unavailable' })
  @IsOptional()
  @IsString()
  @MaxLength(500)
  cancellationReason?: string;
}

export class ReleaseSlotDto extends CancelDayDto {}
