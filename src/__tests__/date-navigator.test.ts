import { describe, it, expect } from 'vitest';
import { DateNavigator, containsLabel } from '../date-navigator';
import { dateLabels } from '../dates';
import { DEFAULT_NAVIGATION } from '../facilities/common';
import { FakeGateway, button, silentLogger } from './fakes';

const CONTROLS = DEFAULT_NAVIGATION.dateControlQuery;
const NEXT = DEFAULT_NAVIGATION.nextDaySelectors[0];
const DATE_INPUT = DEFAULT_NAVIGATION.dateInputSelectors[0];
const SETTLE_MS = 25;

function makeNavigator(gateway: FakeGateway, initialDate = '2025-10-26'): DateNavigator {
  return new DateNavigator(gateway, DEFAULT_NAVIGATION, SETTLE_MS, silentLogger(), initialDate);
}

describe('dateLabels', () => {
  it('renders the formats calendars display', () => {
    expect(dateLabels('2025-10-26')).toEqual({
      long: 'October 26, 2025',
      weekdayShort: 'Sun 26',
      weekdayLong: 'Sunday 26',
      day: '26',
    });
  });
});

describe('containsLabel', () => {
  it('rejects a match followed by another digit', () => {
    expect(containsLabel('Sun 26', 'Sun 2')).toBe(false);
    expect(containsLabel('Sun 26 Sun 2', 'Sun 2')).toBe(true);
    expect(containsLabel('Sunday 2 Nov', 'Sunday 2')).toBe(true);
    expect(containsLabel('November 2, 2025', 'November 2, 2025')).toBe(true);
  });
});

describe('DateNavigator', () => {
  it('clicks the control showing the target day', async () => {
    const saturday = button('Saturday 25');
    const sunday = button('Sunday 26');
    const gateway = new FakeGateway().set(CONTROLS, [saturday, sunday]);
    const navigator = makeNavigator(gateway, '2025-10-25');

    expect(await navigator.navigateToDate('2025-10-26')).toBe(true);
    expect(saturday.clicks).toBe(0);
    expect(sunday.clicks).toBe(1);
    expect(gateway.pauses).toEqual([SETTLE_MS]);
    expect(navigator.currentDate).toBe('2025-10-26');
  });

  it('prefers the long date format over a bare day number', async () => {
    const bare = button('26');
    const long = button('Sunday, October 26, 2025');
    const gateway = new FakeGateway().set(CONTROLS, [bare, long]);

    await makeNavigator(gateway).navigateToDate('2025-10-26');

    expect(long.clicks).toBe(1);
    expect(bare.clicks).toBe(0);
  });

  it('reads the aria-label of controls without text', async () => {
    const cell = button('', { attributes: { 'aria-label': 'Monday, October 27, 2025' } });
    const gateway = new FakeGateway().set(CONTROLS, [cell]);

    expect(await makeNavigator(gateway).navigateToDate('2025-10-27')).toBe(true);
    expect(cell.clicks).toBe(1);
  });

  it('matches a bare day number exactly', async () => {
    const longer = button('126');
    const exact = button('26');
    const gateway = new FakeGateway().set(CONTROLS, [longer, exact]);

    expect(await makeNavigator(gateway).navigateToDate('2025-10-26')).toBe(true);
    expect(longer.clicks).toBe(0);
    expect(exact.clicks).toBe(1);
  });

  it('does not take a later day that starts with the same digits', async () => {
    const october = button('Sun 26');
    const november = button('Sun 2');
    const gateway = new FakeGateway().set(CONTROLS, [october, november]);
    const navigator = makeNavigator(gateway, '2025-10-31');

    expect(await navigator.navigateToDate('2025-11-02')).toBe(true);
    expect(october.clicks).toBe(0);
    expect(november.clicks).toBe(1);
  });

  it('skips disabled controls', async () => {
    const disabled = button('Sunday 26', { enabled: false });
    const gateway = new FakeGateway().set(CONTROLS, [disabled]);

    expect(await makeNavigator(gateway).navigateToDate('2025-10-26')).toBe(false);
    expect(disabled.clicks).toBe(0);
  });

  it('steps forward one click per day', async () => {
    const next = button('>');
    const gateway = new FakeGateway().set(NEXT, [next]);
    const navigator = makeNavigator(gateway, '2025-10-26');

    expect(await navigator.navigateToDate('2025-10-28')).toBe(true);
    expect(next.clicks).toBe(2);
    expect(gateway.pauses).toEqual([SETTLE_MS, SETTLE_MS]);

    expect(await navigator.navigateToDate('2025-10-29')).toBe(true);
    expect(next.clicks).toBe(3);
  });

  it('does not step backwards', async () => {
    const next = button('>');
    const gateway = new FakeGateway().set(NEXT, [next]);

    expect(await makeNavigator(gateway, '2025-10-27').navigateToDate('2025-10-26')).toBe(false);
    expect(next.clicks).toBe(0);
  });

  it('fills a date input as a last resort', async () => {
    const input = button('');
    const gateway = new FakeGateway().set(DATE_INPUT, [input]);

    expect(await makeNavigator(gateway).navigateToDate('2025-10-27')).toBe(true);
    expect(input.filled).toEqual(['2025-10-27']);
  });

  it('moves on when a strategy throws', async () => {
    const input = button('');
    const gateway = new FakeGateway().fail(CONTROLS).set(DATE_INPUT, [input]);

    expect(await makeNavigator(gateway).navigateToDate('2025-10-27')).toBe(true);
    expect(input.filled).toEqual(['2025-10-27']);
  });

  it('reports failure without throwing when nothing works', async () => {
    const navigator = makeNavigator(new FakeGateway());

    expect(await navigator.navigateToDate('2025-10-27')).toBe(false);
    expect(navigator.currentDate).toBe('2025-10-26');
  });

  it('starts from the reset date', async () => {
    const next = button('>');
    const gateway = new FakeGateway().set(NEXT, [next]);
    const navigator = makeNavigator(gateway, '2025-10-20');

    navigator.reset('2025-10-26');

    expect(await navigator.navigateToDate('2025-10-27')).toBe(true);
    expect(next.clicks).toBe(1);
  });
});
