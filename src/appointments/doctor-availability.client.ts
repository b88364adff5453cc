import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AxiosInstance, isAxiosError } from 'axios';
import { DoctorModuleConfig } from '../config/configuration';
import { ConsultationType } from '../common/validation/date-time';
import { RemoteCallError } from './remote-call.error';

export const DOCTOR_AVAILABILITY_CLIENT = Symbol('DOCTOR_AVAILABILITY_CLIENT');
export const DOCTOR_MODULE_HTTP = Symbol('DOCTOR_MODULE_HTTP');

export type DoctorModuleHttp = Pick<AxiosInstance, 'get' | 'post'>;

export interface RemoteSlot {
  slotId: string;
  startTime: string;
  endTime: string;
  isBooked: boolean;
}

export interface RemoteAppointmentTypeGroup {
  type: string;
  durationMins: number;
  price: number;
  currency: string;
  slots: RemoteSlot[];
}

export interface RemoteAvailability {
  availabilityId: string;
  doctorId: string;
  date: string;
  consultationType: ConsultationType;
  types: RemoteAppointmentTypeGroup[];
}

export interface RemoteSlotRef {
  doctorId: string;
  date: string;
  slotId: string;
  appointmentId: string;
  consultationType?: string;
}

export interface RemoteBookingRequest extends RemoteSlotRef {
  patientId: string;
}

export interface RemoteCancelRequest extends RemoteSlotRef {
  reason: string;
}

/** HTTP port to the doctor module's availability API. */
export interface DoctorAvailabilityClient {
  getAvailabilityForDate(doctorId: string, date: string, consultationType?: string): Promise<RemoteAvailability[]>;
  bookSlot(request: RemoteBookingRequest): Promise<void>;
  cancelSlot(request: RemoteCancelRequest, bearerToken?: string): Promise<void>;
}

interface AvailabilityEnvelope {
  data?: { availability?: RemoteAvailability[] };
}

@Injectable()
export class HttpDoctorAvailabilityClient implements DoctorAvailabilityClient {
  private readonly logger = new Logger(HttpDoctorAvailabilityClient.name);
  private readonly config: DoctorModuleConfig;

  constructor(
    @Inject(DOCTOR_MODULE_HTTP) private readonly http: DoctorModuleHttp,
    configService: ConfigService,
  ) {
    this.config = configService.get<DoctorModuleConfig>('doctorModule') ?? { timeoutMs: 10000 };
  }

  async getAvailabilityForDate(
    doctorId: string,
    date: string,
    consultationType?: string,
  ): Promise<RemoteAvailability[]> {
    const url = this.url(`/doctor/${encodeURIComponent(doctorId)}/availability/${encodeURIComponent(date)}`);
    const response = await this.call(() =>
      this.http.get<AvailabilityEnvelope>(url, {
        params: consultationType ? { consultationType } : undefined,
        timeout: this.config.timeoutMs,
      }),
    );
    const availability = response.data.data?.availability;
    if (!Array.isArray(availability)) {
      throw new RemoteCallError('Unexpected availability response from doctor module', response.status);
    }
    return availability;
  }

  async bookSlot(request: RemoteBookingRequest): Promise<void> {
    const url = this.url(
      `/doctor/${encodeURIComponent(request.doctorId)}/availability/${encodeURIComponent(request.date)}/book-slot`,
    );
    await this.call(() =>
      this.http.post(
        url,
        { slotId: request.slotId, patientId: request.patientId, appointmentId: request.appointmentId },
        {
          params: request.consultationType ? { consultationType: request.consultationType } : undefined,
          timeout: this.config.timeoutMs,
        },
      ),
    );
    this.logger.debug(`Remote booked ${request.slotId} for appointment ${request.appointmentId}`);
  }

  async cancelSlot(request: RemoteCancelRequest, bearerToken?: string): Promise<void> {
    const url = this.url(
      `/doctor/${encodeURIComponent(request.doctorId)}/availability/${encodeURIComponent(request.date)}/${encodeURIComponent(request.slotId)}/cancel`,
    );
    await this.call(() =>
      this.http.post(
        url,
        { appointmentId: request.appointmentId, cancellationReason: request.reason },
        {
          params: request.consultationType ? { consultationType: request.consultationType } : undefined,
          headers: bearerToken ? { Authorization: `Bearer ${bearerToken}` } : undefined,
          timeout: this.config.timeoutMs,
        },
      ),
    );
    this.logger.debug(`Remote released ${request.slotId} for appointment ${request.appointmentId}`);
  }

  private url(path: string): string {
    if (!this.config.url) {
      throw new RemoteCallError('DOCTOR_MODULE_URL not configured');
    }
    return `${this.config.url.replace(/\/+$/, '')}${path}`;
  }

  private async call<T>(request: () => Promise<T>): Promise<T> {
    try {
      return await request();
    } catch (error) {
      throw this.translate(error);
    }
  }

  private translate(error: unknown): RemoteCallError {
    if (error instanceof RemoteCallError) {
      return error;
    }
    if (!isAxiosError(error)) {
      return new RemoteCallError(error instanceof Error ? error.message : 'Doctor module request failed');
    }
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new RemoteCallError('Doctor module request timed out');
    }
    const status = error.response?.status;
    const remoteMessage = this.remoteMessage(error.response?.data);
    if (status === undefined) {
      return new RemoteCallError(`Doctor module unreachable: ${error.message}`);
    }
    return new RemoteCallError(remoteMessage ?? `Doctor module responded with ${status}`, status, remoteMessage);
  }

  private remoteMessage(body: unknown): string | undefined {
    if (typeof body !== 'object' || body === null || !('message' in body)) {
      return undefined;
    }
    const { message } = body;
    if (Array.isArray(message)) {
      return message.map(String).join('; ');
    }
    return typeof message === 'string' ? message : undefined;
  }
}
