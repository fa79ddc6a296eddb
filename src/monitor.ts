import { login } from './auth';
import { DateNavigator } from './date-navigator';
import { addDays, toIsoDate } from './dates';
import { countSlots, diffSlots } from './differ';
import { BookingPageError } from './errors';
import { extractSlots } from './extractor';
import type { NotificationDispatcher } from './notifiers';
import { filterByPreferences } from './preferences';
import { findFirst, isUsable } from './selectors';
import type { DateSlotMap, MonitorContext, MonitorEnvironment } from './types';

export interface CycleResult {
  loggedIn: boolean;
  slots: DateSlotMap;
  newSlots: DateSlotMap;
  totalSlots: number;
  newCount: number;
  notified: boolean;
}

export interface MonitorOptions {
  dispatcher: NotificationDispatcher | null;
  today?: () => string;
}

export async function openBookingPage(ctx: MonitorContext): Promise<boolean> {
  const { gateway, profile, config, logger } = ctx;

  try {
    logger.info({ url: config.bookingUrl }, 'Opening booking page');
    await gateway.navigate(config.bookingUrl);
    await gateway.pause(config.settleMs);

    if (profile.bookingEntrySelectors.length > 0) {
      const entry = await findFirst(gateway, profile.bookingEntrySelectors, isUsable);
      if (entry) {
        logger.debug({ selector: entry.selector }, 'Following booking entry link');
        await entry.element.click();
        await gateway.pause(config.settleMs);
      } else {
        logger.debug('No booking entry link found; staying on booking URL');
      }
    }

    const url = gateway.currentUrl();
    if (!url.includes(profile.bookingHost)) {
      logger.warn({ url, expected: profile.bookingHost }, 'Unexpected URL after opening booking page');
      return false;
    }

    logger.info({ url }, 'Booking page ready');
    return true;
  } catch (error) {
    logger.error({ err: error, url: config.bookingUrl }, 'Error opening booking page');
    return false;
  }
}

/**
 * Visits every tracked day and merges what the extractor finds. When the
 * calendar could not be moved to any day, the page as loaded is scanned once
 * and attributed to `today`.
 */
export async function scanTrackedDates(
  ctx: MonitorContext,
  navigator: DateNavigator,
  today: string
): Promise<DateSlotMap> {
  const { gateway, profile, logger } = ctx;
  const slots: DateSlotMap = {};
  let navigated = false;

  for (const offset of profile.trackedDayOffsets) {
    const date = addDays(today, offset);
    try {
      if (await navigator.navigateToDate(date)) {
        navigated = true;
        slots[date] = await extractSlots(gateway, profile.extraction, date, logger);
      } else {
        slots[date] = [];
      }
    } catch (error) {
      logger.error({ err: error, date }, 'Error scanning date');
      slots[date] = [];
    }
  }

  if (!navigated) {
    logger.warn('Date navigation failed for all dates; scanning the current page');
    slots[today] = await extractSlots(gateway, profile.extraction, today, logger);
  }

  return slots;
}

/**
 * Runs poll cycles against a browser taken from `env.sessions`. A cycle that
 * throws releases the session, so the next cycle starts on a fresh browser.
 */
export class AvailabilityMonitor {
  private readonly today: () => string;

  constructor(
    private readonly env: MonitorEnvironment,
    private readonly options: MonitorOptions
  ) {
    this.today = options.today ?? (() => toIsoDate(new Date()));
  }

  async runCycle(): Promise<CycleResult> {
    const { sessions, ...rest } = this.env;
    const gateway = await sessions.acquire();

    try {
      return await this.scan({ ...rest, gateway });
    } catch (error) {
      rest.logger.warn({ err: error }, 'Cycle failed; discarding browser session');
      await sessions.release();
      throw error;
    }
  }

  private async scan(ctx: MonitorContext): Promise<CycleResult> {
    const { gateway, profile, config, logger, state } = ctx;

    const loggedIn = await login(gateway, profile, config, logger);
    if (!loggedIn && config.credentials.username) {
      logger.warn('Login failed, continuing anyway');
    }

    if (!(await openBookingPage(ctx))) {
      throw new BookingPageError(profile.id, config.bookingUrl);
    }

    const today = this.today();
    const navigator = new DateNavigator(gateway, profile.navigation, config.settleMs, logger, today);
    const slots = await scanTrackedDates(ctx, navigator, today);
    const candidates = filterByPreferences(slots, config.preferences);
    const newSlots = diffSlots(candidates, state.observed, logger);

    const totalSlots = countSlots(candidates);
    const newCount = countSlots(newSlots);
    let notified = false;

    if (newCount === 0) {
      logger.info({ totalSlots }, 'No new courts since last check');
    } else {
      for (const [date, dateSlots] of Object.entries(newSlots)) {
        logger.info(
          {
            date,
            slots: dateSlots.map((slot) => `${slot.resourceName} ${slot.timeLabel ?? slot.rawText}`),
          },
          'New courts'
        );
      }
      notified = this.options.dispatcher ? await this.options.dispatcher.notify(newSlots) : false;
    }

    return { loggedIn, slots: candidates, newSlots, totalSlots, newCount, notified };
  }
}
