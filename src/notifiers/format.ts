import { MONTHS, WEEKDAYS, parseIsoDate } from '../dates';
import { countSlots } from '../differ';
import type { DateSlotMap, FacilityProfile, SlotRecord } from '../types';

export const SMS_SLOT_LIMIT = 3;

export interface FormattedEmail {
  subject: string;
  text: string;
}

function plural(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? '' : 's'}`;
}

function sortedDates(batch: DateSlotMap): string[] {
  return Object.keys(batch)
    .filter((date) => batch[date].length > 0)
    .sort();
}

function timeOf(slot: SlotRecord): string {
  return slot.timeLabel ?? 'an unlisted time';
}

/** "Sunday, October 26, 2025" */
export function formatDateHeading(iso: string): string {
  const date = parseIsoDate(iso);
  return `${WEEKDAYS[date.getDay()]}, ${MONTHS[date.getMonth()]} ${date.getDate()}, ${date.getFullYear()}`;
}

export function describeSlot(slot: SlotRecord): string {
  return `${slot.resourceName} at ${timeOf(slot)} (${slot.priceLabel})`;
}

export function formatEmail(
  profile: FacilityProfile,
  bookingUrl: string,
  batch: DateSlotMap
): FormattedEmail {
  const total = countSlots(batch);
  const lines: string[] = [`${profile.displayName}: ${plural(total, 'new court slot')} available`, ''];

  let counter = 1;
  for (const date of sortedDates(batch)) {
    lines.push(`${formatDateHeading(date)}:`);
    for (const slot of batch[date]) {
      lines.push(`  ${counter}. ${describeSlot(slot)}`);
      counter += 1;
    }
    lines.push('');
  }

  lines.push(`Book now: ${bookingUrl}`);

  return {
    subject: `${profile.displayName} - ${plural(total, 'court slot')} available`,
    text: `${lines.join('\n')}\n`,
  };
}

export function formatSms(profile: FacilityProfile, bookingUrl: string, batch: DateSlotMap): string {
  const total = countSlots(batch);
  const slots = sortedDates(batch).flatMap((date) => batch[date]);
  const listed = slots
    .slice(0, SMS_SLOT_LIMIT)
    .map((slot) => `${slot.resourceName} ${timeOf(slot)}`)
    .join(', ');
  const more = total > SMS_SLOT_LIMIT ? ` +${total - SMS_SLOT_LIMIT} more` : '';

  return `${profile.shortName}: ${plural(total, 'new slot')}! ${listed}${more}. Book: ${bookingUrl}`;
}
