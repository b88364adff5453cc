import { fromMinutes, toMinutes } from '../common/validation/date-time';

export interface ClockRange {
  startTime: string;
  endTime: string;
}

export interface GeneratedSlot extends ClockRange {
  isBooked: false;
}

export const DEFAULT_SLOT_MINUTES = 30;

const overlaps = (start: number, end: number, range: [number, number]): boolean =>
  start < range[1] && end > range[0];

/**
 * Cuts the working day into back-to-back slots of `durationMins`,
 * dropping any slot that overlaps a break. A trailing remainder shorter
 * than one slot is discarded.
 */
export function generateSlots(
  workHours: ClockRange,
  breaks: ClockRange[] = [],
  durationMins: number = DEFAULT_SLOT_MINUTES,
): GeneratedSlot[] {
  const dayStart = toMinutes(workHours.startTime);
  const dayEnd = toMinutes(workHours.endTime);
  const blocked = breaks.map((b): [number, number] => [toMinutes(b.startTime), toMinutes(b.endTime)]);

  const slots: GeneratedSlot[] = [];
  for (let cursor = dayStart; cursor + durationMins <= dayEnd; cursor += durationMins) {
    const end = cursor + durationMins;
    if (blocked.some((range) => overlaps(cursor, end, range))) {
      continue;
    }
    slots.push({ startTime: fromMinutes(cursor), endTime: fromMinutes(end), isBooked: false });
  }
  return slots;
}
