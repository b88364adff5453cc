import { randomBytes } from 'crypto';
import { Types } from 'mongoose';

const hex = (bytes: number): string => randomBytes(bytes).toString('hex').toUpperCase();

/** `AVAIL_<epoch ms><8 hex chars>`, e.g. `AVAIL_1761436800000A1B2C3D4`. */
export function generateAvailabilityId(now: number = Date.now()): string {
  return `AVAIL_${now}${hex(4)}`;
}

export function generatePatientId(now: number = Date.now()): string {
  return `PAT${now}${hex(2)}`;
}

export function generateAppointmentId(): string {
  return new Types.ObjectId().toHexString();
}

/** Sequential slot ids: 1 -> `slot_001`. */
export function formatSlotId(sequence: number): string {
  return `slot_${String(sequence).padStart(3, '0')}`;
}
