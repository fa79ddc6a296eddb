import type { Logger } from 'pino';
import type { DateSlotMap, MonitorState, SlotRecord } from './types';

export function createMonitorState(): MonitorState {
  return {
    observed: new Set<string>(),
    sentBatches: new Set<string>(),
  };
}

// rawText only stands in when the control carried no parsable time.
export function slotIdentity(slot: SlotRecord): string {
  return `${slot.date}_${slot.resourceName}_${slot.timeLabel ?? slot.rawText}`;
}

export function countSlots(map: DateSlotMap): number {
  return Object.values(map).reduce((total, slots) => total + slots.length, 0);
}

/**
 * Returns the slots of `current` whose identity is not in `observed` and
 * commits them to `observed` in the same pass. Dates with nothing new are left
 * out, so `{}` means "nothing to report".
 */
export function diffSlots(current: DateSlotMap, observed: Set<string>, logger?: Logger): DateSlotMap {
  const fresh: DateSlotMap = {};

  for (const [date, slots] of Object.entries(current)) {
    const freshForDate: SlotRecord[] = [];

    for (const slot of slots) {
      const identity = slotIdentity(slot);
      if (observed.has(identity)) {
        continue;
      }
      observed.add(identity);
      freshForDate.push(slot);
    }

    if (freshForDate.length > 0) {
      fresh[date] = freshForDate;
    }
  }

  const total = countSlots(fresh);
  if (total > 0) {
    logger?.info({ newSlots: total, observed: observed.size }, 'New slots detected');
  } else {
    logger?.debug({ observed: observed.size }, 'No new slots since last check');
  }

  return fresh;
}
