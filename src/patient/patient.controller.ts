import { Body, Controller, Delete, Get, Param, ParseIntPipe, Post, Put, Query, DefaultValuePipe } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { CreatePatientDto } from './dto/create-patient.dto';
import { UpdatePatientDto } from './dto/update-patient.dto';
import { PatientService } from './patient.service';

@ApiTags('Patients')
@Controller('patient')
export class PatientController {
  constructor(private readonly patientService: PatientService) {}

  @Post()
  async create(@Body() dto: CreatePatientDto) {
    const patient = await this.patientService.create(dto);
    return { message: 'Patient registered successfully', data: patient };
  }

  @Get()
  async findAll(
    @Query('page', new DefaultValuePipe(1), ParseIntPipe) page: number,
    @Query('limit', new DefaultValuePipe(20), ParseIntPipe) limit: number,
  ) {
    const result = await this.patientService.findAll(Math.max(page, 1), Math.min(Math.max(limit, 1), 100));
    return { message: 'Patients retrieved successfully', data: result };
  }

  @Get(':patientId')
  async findOne(@Param('patientId') patientId: string) {
    const patient = await this.patientService.findOne(patientId);
    return { message: 'Patient retrieved successfully', data: patient };
  }

  @Put(':patientId')
  async update(@Param('patientId') patientId: string, @Body() dto: UpdatePatientDto) {
    const patient = await this.patientService.update(patientId, dto);
    return { message: 'Patient updated successfully', data: patient };
  }

  @Delete(':patientId')
  async remove(@Param('patientId') patientId: string) {
    await this.patientService.remove(patientId);
    return { message: 'Patient deleted successfully', data: { patientId } };
  }
}
