import { describe, it, expect } from 'vitest';
import {
  extractDurationLabel,
  extractPriceLabel,
  extractSlots,
  extractTimeLabel,
  isFalsePositive,
} from '../extractor';
import { btcProfile } from '../facilities/btc.profile';
import { FALSE_POSITIVES, TIME_PATTERNS } from '../facilities/common';
import { ubcProfile } from '../facilities/ubc.profile';
import { FakeGateway, FakeElement, button, silentLogger } from './fakes';

const rules = btcProfile.extraction;
const DATE = '2025-10-26';

describe('extractSlots', () => {
  it('keeps bookable buttons and drops grid chrome', async () => {
    const gateway = new FakeGateway().set('button', [
      button('Book 6:00 am as 48hr'),
      button('Booking Grid - None'),
      button('Book 10:00 am'),
    ]);

    const slots = await extractSlots(gateway, rules, DATE, silentLogger());

    expect(slots).toHaveLength(2);
    expect(slots.map((slot) => slot.timeLabel)).toEqual(['6:00 am', '10:00 am']);
    expect(slots.map((slot) => slot.resourceName)).toEqual(['Court 1', 'Court 3']);
    expect(slots[0]).toEqual({
      resourceName: 'Court 1',
      timeLabel: '6:00 am',
      durationLabel: '1 hour',
      priceLabel: 'Unknown',
      date: DATE,
      rawText: 'Book 6:00 am as 48hr',
      interactable: true,
    });
  });

  it('never extracts the grid placeholder', async () => {
    const gateway = new FakeGateway().set('button', [button('Booking Grid - None')]);

    expect(await extractSlots(gateway, rules, DATE, silentLogger())).toEqual([]);
  });

  it('reads court, price and duration from the control text', async () => {
    const gateway = new FakeGateway().set('button', [button('Court 4  Book 8:00 pm $25 1.5 hours')]);

    const [slot] = await extractSlots(gateway, rules, DATE, silentLogger());

    expect(slot.resourceName).toBe('Court 4');
    expect(slot.timeLabel).toBe('8:00 pm');
    expect(slot.priceLabel).toBe('$25');
    expect(slot.durationLabel).toBe('1.5 hours');
    expect(slot.rawText).toBe('Court 4 Book 8:00 pm $25 1.5 hours');
  });

  it('attributes a slot to the nearest court label', async () => {
    const gateway = new FakeGateway()
      .set(rules.resourceLabelQuery, [
        new FakeElement({ text: 'Court 1', position: { x: 100, y: 50 } }),
        new FakeElement({ text: 'Court 2', position: { x: 300, y: 50 } }),
        new FakeElement({ text: 'Schedule', position: { x: 290, y: 390 } }),
      ])
      .set('button', [button('Book 7:30 pm', { position: { x: 290, y: 400 } })]);

    const [slot] = await extractSlots(gateway, rules, DATE, silentLogger());

    expect(slot.resourceName).toBe('Court 2');
  });

  it('falls back to the ordinal when the label query fails', async () => {
    const gateway = new FakeGateway()
      .fail(rules.resourceLabelQuery)
      .set('button', [button('Book 7:30 pm', { position: { x: 10, y: 10 } })]);

    const [slot] = await extractSlots(gateway, rules, DATE, silentLogger());

    expect(slot.resourceName).toBe('Court 1');
  });

  it('keeps a control with a colon but no parsable time', async () => {
    const gateway = new FakeGateway().set('button', [button('Book: Court 2')]);

    const [slot] = await extractSlots(gateway, rules, DATE, silentLogger());

    expect(slot.timeLabel).toBeNull();
    expect(slot.resourceName).toBe('Court 2');
  });

  it('skips controls without any time hint', async () => {
    const gateway = new FakeGateway().set('button', [button('Book now'), button('Cancel')]);

    expect(await extractSlots(gateway, rules, DATE, silentLogger())).toEqual([]);
  });

  it('marks disabled controls as not interactable', async () => {
    const gateway = new FakeGateway().set('button', [button('Book 9:00 am', { enabled: false })]);

    const [slot] = await extractSlots(gateway, rules, DATE, silentLogger());

    expect(slot.interactable).toBe(false);
  });

  it('skips unreadable elements and keeps the rest', async () => {
    const gateway = new FakeGateway().set('button', [
      new FakeElement({ brokenText: true }),
      button('Book 11:00 am'),
    ]);

    const slots = await extractSlots(gateway, rules, DATE, silentLogger());

    expect(slots.map((slot) => slot.timeLabel)).toEqual(['11:00 am']);
  });

  it('returns an empty list when the page query fails', async () => {
    const gateway = new FakeGateway().fail('button');

    expect(await extractSlots(gateway, rules, DATE, silentLogger())).toEqual([]);
  });
});

describe('extractSlots on facility cards', () => {
  const cards = ubcProfile.extraction;

  it('treats a "Choose" control as a slot', async () => {
    const gateway = new FakeGateway().set(cards.candidateQuery, [button('Choose 6:00 pm Court 01')]);

    const slots = await extractSlots(gateway, cards, DATE, silentLogger());

    expect(slots).toHaveLength(1);
    expect(slots[0].resourceName).toBe('Court 01');
    expect(slots[0].timeLabel).toBe('6:00 pm');
  });

  it('keeps a card control that shows no time', async () => {
    const gateway = new FakeGateway().set(cards.candidateQuery, [button('Details'), button('Choose')]);

    const slots = await extractSlots(gateway, cards, DATE, silentLogger());

    expect(slots).toHaveLength(1);
    expect(slots[0].timeLabel).toBeNull();
    expect(slots[0].resourceName).toBe('Court 1');
    expect(slots[0].rawText).toBe('Choose');
  });

  it('ignores "Choose" controls on a booking grid', async () => {
    const gateway = new FakeGateway().set('button', [button('Choose 6:00 pm Court 01')]);

    expect(await extractSlots(gateway, rules, DATE, silentLogger())).toEqual([]);
  });
});

describe('text helpers', () => {
  it('matches false positives case-sensitively', () => {
    expect(isFalsePositive('Court closed', FALSE_POSITIVES)).toBe(true);
    expect(isFalsePositive('Court CLOSED', FALSE_POSITIVES)).toBe(false);
  });

  it('prefers the most specific time pattern', () => {
    expect(extractTimeLabel('Book 6:00 pm Court 1', TIME_PATTERNS)).toBe('6:00 pm');
    expect(extractTimeLabel('Book 18:00', TIME_PATTERNS)).toBe('18:00');
    expect(extractTimeLabel('Opens 7:15 AM', TIME_PATTERNS)).toBe('7:15 AM');
    expect(extractTimeLabel('Book now', TIME_PATTERNS)).toBeNull();
  });

  it('defaults price and duration', () => {
    expect(extractPriceLabel('Book 6:00 am')).toBe('Unknown');
    expect(extractPriceLabel('Book 6:00 am $ 18.50')).toBe('$18.50');
    expect(extractDurationLabel('Book 6:00 am')).toBe('1 hour');
    expect(extractDurationLabel('Book 6:00 am 90 mins')).toBe('90 mins');
  });
});
