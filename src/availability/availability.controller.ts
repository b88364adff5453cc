import {
  Body,
  Controller,
  Delete,
  Get,
  Headers,
  HttpCode,
  HttpStatus,
  Logger,
  Param,
  Post,
  Put,
  Query,
} from '@nestjs/common';
import { ApiOperation, ApiQuery, ApiTags } from '@nestjs/swagger';
import { ParseCalendarDatePipe } from '../common/pipes/parse-calendar-date.pipe';
import { ParseConsultationTypePipe } from '../common/pipes/parse-consultation-type.pipe';
import { CONSULTATION_TYPES, ConsultationType } from '../common/validation/date-time';
import { AvailabilityService } from './availability.service';
import { AvailabilityQueryDto } from './dto/availability-query.dto';
import { CreateAvailabilityDto } from './dto/create-availability.dto';
import { BookSlotDto, CancelDayDto, CancelSlotDto, ReleaseSlotDto } from './dto/slot-action.dto';
import { UpdateAvailabilityDto } from './dto/update-availability.dto';

const consultationTypeQuery = { name: 'consultationType', required: false, enum: CONSULTATION_TYPES };

@ApiTags('Doctor availability')
@Controller('doctor/:doctorId/availability')
export class DoctorAvailabilityController {
  private readonly logger = new Logger(DoctorAvailabilityController.name);

  constructor(private readonly availabilityService: AvailabilityService) {}

  @Post()
  @ApiOperation({ summary: 'Create availability for one day' })
  async create(@Param('doctorId') doctorId: string, @Body() dto: CreateAvailabilityDto) {
    const availabilityId = await this.availabilityService.createDailyAvailability(doctorId, dto);
    return { message: 'Availability created successfully', data: { availabilityId } };
  }

  @Get()
  @ApiOperation({ summary: 'List active availability, optionally by date, range or type' })
  async list(@Param('doctorId') doctorId: string, @Query() query: AvailabilityQueryDto) {
    const availability = await this.availabilityService.getDoctorAvailability(doctorId, query);
    return {
      message: 'Availability retrieved successfully',
      data: { availability, totalCount: availability.length },
    };
  }

  @Get(':date')
  @ApiQuery(consultationTypeQuery)
  async getByDate(
    @Param('doctorId') doctorId: string,
    @Param('date', ParseCalendarDatePipe) date: string,
    @Query('consultationType', ParseConsultationTypePipe) consultationType?: ConsultationType,
  ) {
    const availability = await this.availabilityService.getDoctorAvailability(doctorId, { date, consultationType });
    return {
      message: 'Availability retrieved successfully',
      data: { availability, totalCount: availability.length },
    };
  }

  @Get(':date/booked-slots')
  @ApiQuery(consultationTypeQuery)
  async bookedSlots(
    @Param('doctorId') doctorId: string,
    @Param('date', ParseCalendarDatePipe) date: string,
    @Query('consultationType', ParseConsultationTypePipe) consultationType?: ConsultationType,
  ) {
    const slots = await this.availabilityService.getBookedSlotsByDate(doctorId, date, consultationType);
    return { message: 'Booked slots retrieved successfully', data: { slots, totalCount: slots.length } };
  }

  @Get(':date/available-slots')
  @ApiQuery(consultationTypeQuery)
  async availableSlots(
    @Param('doctorId') doctorId: string,
    @Param('date', ParseCalendarDatePipe) date: string,
    @Query('consultationType', ParseConsultationTypePipe) consultationType?: ConsultationType,
  ) {
    const slots = await this.availabilityService.getAvailableSlotsForDate(doctorId, date, consultationType);
    return { message: 'Available slots retrieved successfully', data: { slots, totalCount: slots.length } };
  }

  @Get(':date/summary')
  @ApiQuery(consultationTypeQuery)
  async summary(
    @Param('doctorId') doctorId: string,
    @Param('date', ParseCalendarDatePipe) date: string,
    @Query('consultationType', ParseConsultationTypePipe) consultationType?: ConsultationType,
  ) {
    const summary = await this.availabilityService.getDateAppointmentSummary(doctorId, date, consultationType);
    return { message: 'Summary retrieved successfully', data: summary };
  }

  @Post(':date/book-slot')
  @HttpCode(HttpStatus.OK)
  @ApiQuery(consultationTypeQuery)
  async bookSlot(
    @Param('doctorId') doctorId: string,
    @Param('date', ParseCalendarDatePipe) date: string,
    @Body() dto: BookSlotDto,
    @Query('consultationType', ParseConsultationTypePipe) consultationType?: ConsultationType,
  ) {
    const result = await this.availabilityService.bookSlot(
      doctorId,
      date,
      dto.slotId,
      dto.patientId,
      dto.appointmentId,
      consultationType,
    );
    return {
      message: result.alreadyBooked ? 'Slot already booked for this appointment' : 'Slot booked successfully',
      data: result,
    };
  }

  @Post(':date/cancel-all')
  @HttpCode(HttpStatus.OK)
  @ApiQuery(consultationTypeQuery)
  async cancelAll(
    @Param('doctorId') doctorId: string,
    @Param('date', ParseCalendarDatePipe) date: string,
    @Body() dto: CancelDayDto,
    @Query('consultationType', ParseConsultationTypePipe) consultationType?: ConsultationType,
  ) {
    const result = await this.availabilityService.cancelAllAppointmentsForDate(
      doctorId,
      date,
      dto.cancellationReason,
      consultationType,
    );
    return { message: `Cancelled ${result.cancelledCount} appointment(s)`, data: result };
  }

  @Post(':date/:slotId/cancel')
  @HttpCode(HttpStatus.OK)
  @ApiQuery(consultationTypeQuery)
  async cancelSlot(
    @Param('doctorId') doctorId: string,
    @Param('date', ParseCalendarDatePipe) date: string,
    @Param('slotId') slotId: string,
    @Body() dto: CancelSlotDto,
    @Headers('authorization') authorization?: string,
    @Query('consultationType', ParseConsultationTypePipe) consultationType?: ConsultationType,
  ) {
    this.logger.debug(`Cancel ${slotId} on ${date} for ${doctorId} (forwarded auth: ${Boolean(authorization)})`);
    await this.availabilityService.cancelAppointmentSlot(
      doctorId,
      date,
      slotId,
      dto.appointmentId,
      dto.cancellationReason,
      consultationType,
    );
    return { message: 'Slot cancelled successfully', data: { slotId, appointmentId: dto.appointmentId } };
  }

  @Get(':date/:appointmentType')
  @ApiQuery(consultationTypeQuery)
  async slotsByType(
    @Param('doctorId') doctorId: string,
    @Param('date', ParseCalendarDatePipe) date: string,
    @Param('appointmentType') appointmentType: string,
    @Query('consultationType', ParseConsultationTypePipe) consultationType?: ConsultationType,
  ) {
    const slots = await this.availabilityService.getAvailableSlotsByType(
      doctorId,
      date,
      appointmentType,
      consultationType,
    );
    return { message: 'Available slots retrieved successfully', data: { slots, totalCount: slots.length } };
  }
}

@ApiTags('Doctor availability')
@Controller('availability')
export class AvailabilityController {
  constructor(private readonly availabilityService: AvailabilityService) {}

  @Put(':availabilityId')
  async update(@Param('availabilityId') availabilityId: string, @Body() dto: UpdateAvailabilityDto) {
    const availability = await this.availabilityService.updateAvailability(availabilityId, dto);
    return { message: 'Availability updated successfully', data: availability };
  }

  @Delete(':availabilityId')
  async remove(@Param('availabilityId') availabilityId: string) {
    await this.availabilityService.deleteAvailability(availabilityId);
    return { message: 'Availability deleted successfully', data: { availabilityId } };
  }

  @Post('appointments/:appointmentId/release')
  @HttpCode(HttpStatus.OK)
  async release(@Param('appointmentId') appointmentId: string, @Body() dto: ReleaseSlotDto) {
    await this.availabilityService.cancelSlotByAppointmentId(appointmentId, dto.cancellationReason);
    return { message: 'Slot released successfully', data: { appointmentId } };
  }
}
