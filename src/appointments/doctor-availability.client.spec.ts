import { ConfigService } from '@nestjs/config';
import { AxiosError, AxiosHeaders } from 'axios';
import { HttpDoctorAvailabilityClient } from './doctor-availability.client';
import { RemoteCallError } from './remote-call.error';

const configWith = (url?: string) => new ConfigService({ doctorModule: { url, timeoutMs: 10000 } });

const axiosFailure = (status: number, data: unknown): AxiosError => {
  const headers = new AxiosHeaders();
  return new AxiosError('Request failed', 'ERR_BAD_REQUEST', { headers }, undefined, {
    status,
    statusText: 'Bad Request',
    data,
    headers: {},
    config: { headers },
  });
};

describe('HttpDoctorAvailabilityClient', () => {
  const http = { get: jest.fn(), post: jest.fn() };

  beforeEach(() => jest.resetAllMocks());

  it('reads the by-date endpoint with the consultation type', async () => {
    http.get.mockResolvedValue({ status: 200, data: { message: 'ok', data: { availability: [], totalCount: 0 } } });
    const client = new HttpDoctorAvailabilityClient(http, configWith('http://doctor.local/api/'));

    await expect(client.getAvailabilityForDate('DOC 1', '2025-10-26', 'Online')).resolves.toEqual([]);
    expect(http.get).toHaveBeenCalledWith('http://doctor.local/api/doctor/DOC%201/availability/2025-10-26', {
      params: { consultationType: 'Online' },
      timeout: 10000,
    });
  });

  it('posts bookings with the identifiers in the body', async () => {
    http.post.mockResolvedValue({ status: 200, data: {} });
    const client = new HttpDoctorAvailabilityClient(http, configWith('http://doctor.local/api'));

    await client.bookSlot({
      doctorId: 'DOC1',
      date: '2025-10-26',
      slotId: 's1',
      patientId: 'PAT1',
      appointmentId: 'A1',
    });

    expect(http.post).toHaveBeenCalledWith(
      'http://doctor.local/api/doctor/DOC1/availability/2025-10-26/book-slot',
      { slotId: 's1', patientId: 'PAT1', appointmentId: 'A1' },
      { params: undefined, timeout: 10000 },
    );
  });

  it('forwards the caller token on cancel', async () => {
    http.post.mockResolvedValue({ status: 200, data: {} });
    const client = new HttpDoctorAvailabilityClient(http, configWith('http://doctor.local/api'));

    await client.cancelSlot(
      {
        doctorId: 'DOC1',
        date: '2025-10-26',
        slotId: 's1',
        appointmentId: 'A1',
        reason: 'Cancelled by patient',
        consultationType: 'Online',
      },
      'test-token',
    );

    expect(http.post).toHaveBeenCalledWith(
      'http://doctor.local/api/doctor/DOC1/availability/2025-10-26/s1/cancel',
      { appointmentId: 'A1', cancellationReason: 'Cancelled by patient' },
      {
        params: { consultationType: 'Online' },
        headers: { Authorization: 'Bearer test-token' },
        timeout: 10000,
      },
    );
  });

  it('fails every call when the doctor module url is missing', async () => {
    const client = new HttpDoctorAvailabilityClient(http, configWith(undefined));

    await expect(client.getAvailabilityForDate('DOC1', '2025-10-26')).rejects.toThrow(
      new RemoteCallError('DOCTOR_MODULE_URL not configured'),
    );
    expect(http.get).not.toHaveBeenCalled();
  });

  it('carries the remote status and message', async () => {
    http.post.mockRejectedValue(axiosFailure(400, { success: false, message: 'Slot not found or already booked' }));
    const client = new HttpDoctorAvailabilityClient(http, configWith('http://doctor.local/api'));

    const failure = client.bookSlot({
      doctorId: 'DOC1',
      date: '2025-10-26',
      slotId: 's1',
      patientId: 'PAT1',
      appointmentId: 'A1',
    });

    await expect(failure).rejects.toMatchObject({
      name: 'RemoteCallError',
      message: 'Slot not found or already booked',
      status: 400,
    });
  });

  it('reports timeouts', async () => {
    http.get.mockRejectedValue(new AxiosError('timeout of 10000ms exceeded', 'ECONNABORTED'));
    const client = new HttpDoctorAvailabilityClient(http, configWith('http://doctor.local/api'));

    await expect(client.getAvailabilityForDate('DOC1', '2025-10-26')).rejects.toThrow('Doctor module request timed out');
  });
});
