import { Body, Controller, Delete, Get, Param, Post, Put, Query } from '@nestjs/common';
import { ApiQuery, ApiTags } from '@nestjs/swagger';
import { DoctorAppointmentsService } from './doctor-appointments.service';
import { DoctorAppointmentQueryDto } from './dto/appointment-query.dto';
import {
  ApproveAppointmentDto,
  CreateDoctorAppointmentDto,
  RejectAppointmentDto,
  UpdateDoctorAppointmentDto,
} from './dto/doctor-appointment.dto';

@ApiTags('Doctor appointments')
@Controller('doctor/appointments')
export class DoctorAppointmentsController {
  constructor(private readonly doctorAppointmentsService: DoctorAppointmentsService) {}

  @Get()
  async list(@Query() query: DoctorAppointmentQueryDto) {
    const appointments = await this.doctorAppointmentsService.getDoctorAppointments(query);
    return {
      message: 'Appointments retrieved successfully',
      data: { appointments, totalCount: appointments.length },
    };
  }

  @Get('pending')
  @ApiQuery({ name: 'doctorId', required: false })
  async pending(@Query('doctorId') doctorId?: string) {
    const appointments = await this.doctorAppointmentsService.getPendingAppointments(doctorId || undefined);
    return {
      message: 'Pending appointments retrieved successfully',
      data: { appointments, totalCount: appointments.length },
    };
  }

  @Get('statistics')
  @ApiQuery({ name: 'doctorId', required: false })
  async statistics(@Query('doctorId') doctorId?: string) {
    const statistics = await this.doctorAppointmentsService.getAppointmentStatistics(doctorId || undefined);
    return { message: 'Appointment statistics retrieved successfully', data: statistics };
  }

  @Post()
  async create(@Body() dto: CreateDoctorAppointmentDto) {
    const created = await this.doctorAppointmentsService.createDoctorAppointment(dto);
    return { message: 'Appointment created successfully', data: created };
  }

  @Get(':appointmentId')
  async findOne(@Param('appointmentId') appointmentId: string) {
    const found = await this.doctorAppointmentsService.getDoctorAppointment(appointmentId);
    return { message: 'Appointment retrieved successfully', data: found };
  }

  @Put(':appointmentId')
  async update(@Param('appointmentId') appointmentId: string, @Body() dto: UpdateDoctorAppointmentDto) {
    const updated = await this.doctorAppointmentsService.updateDoctorAppointment(appointmentId, dto);
    return { message: 'Appointment updated successfully', data: updated };
  }

  @Delete(':appointmentId')
  async remove(@Param('appointmentId') appointmentId: string) {
    await this.doctorAppointmentsService.deleteDoctorAppointment(appointmentId);
    return { message: 'Appointment deleted successfully', data: { appointmentId } };
  }

  @Put(':appointmentId/approve')
  async approve(@Param('appointmentId') appointmentId: string, @Body() dto: ApproveAppointmentDto) {
    const approved = await this.doctorAppointmentsService.approveAppointment(appointmentId, dto);
    return { message: 'Appointment approved successfully', data: approved };
  }

  @Put(':appointmentId/reject')
  async reject(@Param('appointmentId') appointmentId: string, @Body() dto: RejectAppointmentDto) {
    const rejected = await this.doctorAppointmentsService.rejectAppointment(appointmentId, dto);
    return { message: 'Appointment rejected successfully', data: rejected };
  }
}
