import {
  Body,
  Controller,
  Delete,
  Get,
  Headers,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  Put,
  Query,
} from '@nestjs/common';
import { ApiBearerAuth, ApiTags } from '@nestjs/swagger';
import { AppointmentBookingService } from './appointment-booking.service';
import { AppointmentQueryDto } from './dto/appointment-query.dto';
import { CreateAppointmentDto } from './dto/create-appointment.dto';
import { UpdateAppointmentDto } from './dto/update-appointment.dto';

const bearerToken = (authorization?: string): string | undefined => {
  const match = authorization?.match(/^Bearer\s+(.+)$/i);
  return match ? match[1] : undefined;
};

@ApiTags('Patient appointments')
@Controller('patient/:patientId/appointments')
export class PatientAppointmentsController {
  constructor(private readonly bookingService: AppointmentBookingService) {}

  @Get()
  async list(@Param('patientId') patientId: string, @Query() query: AppointmentQueryDto) {
    const appointments = await this.bookingService.getPatientAppointments(patientId, query);
    return {
      message: 'Appointments retrieved successfully',
      data: { appointments, totalCount: appointments.length },
    };
  }

  @Get('upcoming')
  async upcoming(@Param('patientId') patientId: string) {
    const appointments = await this.bookingService.getUpcomingAppointments(patientId);
    return {
      message: 'Upcoming appointments retrieved successfully',
      data: { appointments, totalCount: appointments.length },
    };
  }

  @Get('history')
  async history(@Param('patientId') patientId: string, @Query() query: AppointmentQueryDto) {
    const appointments = await this.bookingService.getAppointmentHistory(patientId, query);
    return {
      message: 'Appointment history retrieved successfully',
      data: { appointments, totalCount: appointments.length, filters: query },
    };
  }

  @Post()
  async create(@Param('patientId') patientId: string, @Body() dto: CreateAppointmentDto) {
    const { appointment, slotBooked } = await this.bookingService.createPatientAppointment(patientId, dto);
    const message =
      appointment.appointmentStatus === 'not_booked'
        ? 'Appointment created but the slot could not be booked'
        : 'Appointment created successfully';
    return { message, data: { appointment, appointmentId: appointment.appointmentId, slotBooked } };
  }

  @Get(':appointmentId')
  async findOne(@Param('patientId') patientId: string, @Param('appointmentId') appointmentId: string) {
    const appointment = await this.bookingService.getPatientAppointment(patientId, appointmentId);
    return { message: 'Appointment retrieved successfully', data: appointment };
  }

  @Put(':appointmentId')
  @ApiBearerAuth()
  async update(
    @Param('patientId') patientId: string,
    @Param('appointmentId') appointmentId: string,
    @Body() dto: UpdateAppointmentDto,
    @Headers('authorization') authorization?: string,
  ) {
    const appointment = await this.bookingService.updatePatientAppointment(
      patientId,
      appointmentId,
      dto,
      bearerToken(authorization),
    );
    return { message: 'Appointment updated successfully', data: appointment };
  }

  @Delete(':appointmentId')
  @HttpCode(HttpStatus.OK)
  @ApiBearerAuth()
  async cancel(
    @Param('patientId') patientId: string,
    @Param('appointmentId') appointmentId: string,
    @Headers('authorization') authorization?: string,
  ) {
    const outcome = await this.bookingService.cancelPatientAppointment(
      patientId,
      appointmentId,
      bearerToken(authorization),
    );
    return {
      message: outcome.slotReleased
        ? 'Appointment cancelled and slot released'
        : 'Appointment cancelled',
      data: outcome,
    };
  }
}
