import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Transform } from 'class-transformer';
import { IsEmail, IsNotEmpty, IsOptional, IsString, Matches, MinLength } from 'class-validator';
import { IsCalendarDate } from '../../common/validation/date-time';

const trimmed = ({ value }: { value: unknown }) => (typeof value === 'string' ? value.trim() : value);

export class CreatePatientDto {
  @ApiPropertyOptional({ example: 'PAT1', description: 'Generated when omitted' })
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  patientId?: string;

  @ApiProperty({ example: 'Asha' })
  @Transform(trimmed)
  @IsString({ message: 'First name must be text' })
  @IsNotEmpty({ message: 'First name cannot be empty' })
  firstName!: string;

  @ApiProperty({ example: 'Rao' })
  @Transform(trimmed)
  @IsString({ message: 'Last name must be text' })
  @MinLength(1, { message: 'Last name cannot be empty' })
  lastName!: string;

  @ApiProperty({ example: 'asha@example.com' })
  @Transform(({ value }) => (typeof value === 'string' ? value.toLowerCase().trim() : value))
  @IsEmail({}, { message: 'Invalid email format' })
  email!: string;

  @ApiPropertyOptional({ example: '9876543210' })
  @IsOptional()
  @Matches(/^\+?\d{10,15}$/, { message: 'Mobile number must contain 10 to 15 digits' })
  mobile?: string;

  @ApiPropertyOptional({ example: '2026-02-14', description: 'Expected delivery date' })
  @IsOptional()
  @IsCalendarDate()
  dueDate?: string;
}
