import type { DateSlotMap, Preferences, SlotRecord } from './types';

export function normalizeTimeLabel(value: string): string {
  return value.toLowerCase().replace(/\s+/g, '').replace(/\./g, '');
}

function courtKey(value: string): string {
  const stripped = value.replace(/court/gi, '').trim();
  const id = stripped.match(/[A-Z]?\d+/i);
  return (id ? id[0] : stripped).toLowerCase().replace(/^0+(?=\d)/, '');
}

export function hasPreferences(preferences: Preferences): boolean {
  return preferences.preferredTimes.length > 0 || preferences.preferredCourts.length > 0;
}

export function matchesPreferences(slot: SlotRecord, preferences: Preferences): boolean {
  const { preferredTimes, preferredCourts } = preferences;

  if (preferredTimes.length > 0) {
    if (slot.timeLabel === null) {
      return false;
    }
    const time = normalizeTimeLabel(slot.timeLabel);
    if (!preferredTimes.some((wanted) => normalizeTimeLabel(wanted) === time)) {
      return false;
    }
  }

  if (preferredCourts.length > 0) {
    const court = courtKey(slot.resourceName);
    if (!preferredCourts.some((wanted) => courtKey(wanted) === court)) {
      return false;
    }
  }

  return true;
}

export function filterByPreferences(map: DateSlotMap, preferences: Preferences): DateSlotMap {
  if (!hasPreferences(preferences)) {
    return map;
  }

  const filtered: DateSlotMap = {};
  for (const [date, slots] of Object.entries(map)) {
    filtered[date] = slots.filter((slot) => matchesPreferences(slot, preferences));
  }
  return filtered;
}
