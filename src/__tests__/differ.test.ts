import { describe, it, expect } from 'vitest';
import { countSlots, createMonitorState, diffSlots, slotIdentity } from '../differ';
import type { DateSlotMap } from '../types';
import { makeSlot } from './fakes';

describe('diffSlots', () => {
  it('reports nothing the second time the same page is seen', () => {
    const { observed } = createMonitorState();
    const page: DateSlotMap = {
      '2025-10-26': [makeSlot(), makeSlot({ resourceName: 'Court 2', timeLabel: '8:00 am' })],
    };

    expect(countSlots(diffSlots(page, observed))).toBe(2);
    expect(diffSlots(page, observed)).toEqual({});
  });

  it('reports only the slot that was not seen before', () => {
    const { observed } = createMonitorState();
    diffSlots({ '2025-10-26': [makeSlot()] }, observed);

    const courtTwo = makeSlot({ resourceName: 'Court 2', timeLabel: '8:00 am' });
    const fresh = diffSlots({ '2025-10-26': [makeSlot(), courtTwo] }, observed);

    expect(fresh).toEqual({ '2025-10-26': [courtTwo] });
    expect(observed.size).toBe(2);
  });

  it('ignores differences in raw text when the identity matches', () => {
    const { observed } = createMonitorState();
    diffSlots({ '2025-10-26': [makeSlot({ rawText: 'Book 6:00 am as 48hr' })] }, observed);

    const fresh = diffSlots({ '2025-10-26': [makeSlot({ rawText: 'Book 6:00 am (members)' })] }, observed);

    expect(fresh).toEqual({});
  });

  it('leaves out dates with nothing new', () => {
    const { observed } = createMonitorState();
    const fresh = diffSlots({ '2025-10-26': [], '2025-10-27': [makeSlot({ date: '2025-10-27' })] }, observed);

    expect(Object.keys(fresh)).toEqual(['2025-10-27']);
  });

  it('treats the same court and time on another day as new', () => {
    const { observed } = createMonitorState();
    diffSlots({ '2025-10-26': [makeSlot()] }, observed);

    const fresh = diffSlots({ '2025-10-27': [makeSlot({ date: '2025-10-27' })] }, observed);

    expect(countSlots(fresh)).toBe(1);
  });
});

describe('slotIdentity', () => {
  it('combines date, court and time', () => {
    expect(slotIdentity(makeSlot())).toBe('2025-10-26_Court 1_6:00 am');
  });

  it('uses the raw text when there is no time', () => {
    expect(slotIdentity(makeSlot({ timeLabel: null, rawText: 'Book: Court 1' }))).toBe(
      '2025-10-26_Court 1_Book: Court 1'
    );
  });
});
