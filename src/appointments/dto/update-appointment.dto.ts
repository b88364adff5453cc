import { ApiPropertyOptional, OmitType, PartialType } from '@nestjs/swagger';
import { IsOptional, IsString, IsNotEmpty } from 'class-validator';
import { CreateAppointmentDto } from './create-appointment.dto';

/** Patient-editable fields. A new slotId (or a new date with one) reschedules. */
export class UpdateAppointmentDto extends PartialType(OmitType(CreateAppointmentDto, ['doctorId', 'slotId'] as const)) {
  @ApiPropertyOptional({ example: 'slot_004' })
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  slotId?: string;
}
