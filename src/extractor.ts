import type { Logger } from 'pino';
import { isUsable } from './selectors';
import type { ExtractionRules, PageElement, Position, SessionGateway, SlotRecord } from './types';

const PRICE_PATTERN = /\$\s?\d+(?:\.\d{2})?/;
const DURATION_PATTERN = /\b(\d+(?:\.\d+)?)\s*(hours?|mins?|minutes?)\b/i;

export const DEFAULT_DURATION = '1 hour';
export const DEFAULT_PRICE = 'Unknown';

interface ResourceLabel {
  name: string;
  position: Position;
}

export function normalizeText(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

export function isFalsePositive(text: string, falsePositives: readonly string[]): boolean {
  return falsePositives.some((indicator) => text.includes(indicator));
}

function firstCapture(text: string, patterns: readonly RegExp[]): string | null {
  for (const pattern of patterns) {
    const match = text.match(pattern);
    if (match && match[1]) {
      return match[1].trim();
    }
  }
  return null;
}

export function extractTimeLabel(text: string, patterns: readonly RegExp[]): string | null {
  return firstCapture(text, patterns);
}

export function extractResourceName(text: string, patterns: readonly RegExp[]): string | null {
  const id = firstCapture(text, patterns);
  return id ? `Court ${id}` : null;
}

export function extractPriceLabel(text: string): string {
  const match = text.match(PRICE_PATTERN);
  return match ? match[0].replace(/\s+/g, '') : DEFAULT_PRICE;
}

export function extractDurationLabel(text: string): string {
  const match = text.match(DURATION_PATTERN);
  return match ? `${match[1]} ${match[2].toLowerCase()}` : DEFAULT_DURATION;
}

export function looksBookable(
  text: string,
  timeLabel: string | null,
  rules: Pick<ExtractionRules, 'candidateToken' | 'requireTime'>
): boolean {
  if (timeLabel !== null || !rules.requireTime) {
    return true;
  }
  return rules.candidateToken.test(text) && text.includes(':');
}

function manhattan(a: Position, b: Position): number {
  return Math.abs(a.x - b.x) + Math.abs(a.y - b.y);
}

export function nearestLabel(origin: Position, labels: readonly ResourceLabel[]): string | null {
  let best: ResourceLabel | null = null;
  let bestDistance = Number.POSITIVE_INFINITY;

  for (const label of labels) {
    const distance = manhattan(origin, label.position);
    if (distance < bestDistance) {
      best = label;
      bestDistance = distance;
    }
  }

  return best ? best.name : null;
}

async function collectResourceLabels(
  gateway: SessionGateway,
  rules: ExtractionRules,
  logger: Logger
): Promise<ResourceLabel[]> {
  const labels: ResourceLabel[] = [];
  let elements: PageElement[];
  try {
    elements = await gateway.findAll(rules.resourceLabelQuery);
  } catch (error) {
    logger.warn({ err: error }, 'Resource label query failed');
    return labels;
  }

  for (const element of elements) {
    try {
      const name = extractResourceName(normalizeText(await element.text()), rules.resourcePatterns);
      const position = name ? await element.position() : null;
      if (name && position) {
        labels.push({ name, position });
      }
    } catch (error) {
      logger.debug({ err: error }, 'Skipping unreadable resource label');
    }
  }

  logger.debug({ count: labels.length }, 'Collected resource labels');
  return labels;
}

/**
 * Reads bookable slots off the current page.
 *
 * Every clickable element is enumerated with a single query and filtered in
 * memory; narrow per-widget selectors break whenever the site ships new markup.
 * Never throws: a failure on one element skips that element, a failure of the
 * page query yields an empty list.
 */
export async function extractSlots(
  gateway: SessionGateway,
  rules: ExtractionRules,
  date: string,
  logger: Logger
): Promise<SlotRecord[]> {
  const records: SlotRecord[] = [];

  try {
    const elements = await gateway.findAll(rules.candidateQuery);
    logger.debug({ date, count: elements.length }, 'Enumerated clickable elements');

    let labels: ResourceLabel[] | null = null;
    let ordinal = 0;

    const resolveNearest = async (element: PageElement): Promise<string | null> => {
      const origin = await element.position();
      if (!origin) {
        return null;
      }
      const known = labels ?? (await collectResourceLabels(gateway, rules, logger));
      labels = known;
      return nearestLabel(origin, known);
    };

    for (const element of elements) {
      try {
        const text = normalizeText(await element.text());
        if (!rules.candidateToken.test(text)) {
          continue;
        }
        ordinal += 1;

        if (isFalsePositive(text, rules.falsePositives)) {
          logger.debug({ text }, 'Skipping false positive');
          continue;
        }

        const timeLabel = extractTimeLabel(text, rules.timePatterns);
        if (!looksBookable(text, timeLabel, rules)) {
          logger.debug({ text }, 'Skipping control without a time');
          continue;
        }

        const resourceName =
          extractResourceName(text, rules.resourcePatterns) ??
          (await resolveNearest(element)) ??
          `Court ${ordinal}`;

        records.push({
          resourceName,
          timeLabel,
          durationLabel: extractDurationLabel(text),
          priceLabel: extractPriceLabel(text),
          date,
          rawText: text,
          interactable: await isUsable(element),
        });
      } catch (error) {
        logger.debug({ err: error, date }, 'Skipping unreadable element');
      }
    }
  } catch (error) {
    logger.error({ err: error, date }, 'Slot extraction failed');
    return [];
  }

  logger.info({ date, count: records.length }, 'Extracted bookable slots');
  return records;
}
