import type { Logger } from 'pino';
import { dateLabels, daysBetween } from './dates';
import { findFirst, isUsable } from './selectors';
import type { NavigationRules, PageElement, SessionGateway } from './types';

interface NavigationStrategy {
  name: string;
  attempt: (target: string) => Promise<boolean>;
}

interface LabelledElement {
  element: PageElement;
  text: string;
}

/** True when `label` occurs in `text` and is not followed by another digit ("Sun 2" vs "Sun 26"). */
export function containsLabel(text: string, label: string): boolean {
  let from = text.indexOf(label);
  while (from !== -1) {
    const next = text.charAt(from + label.length);
    if (!/\d/.test(next)) {
      return true;
    }
    from = text.indexOf(label, from + 1);
  }
  return false;
}

/**
 * Moves the booking calendar to a target day. Strategies run in order and the
 * first one that reports success wins; a failure on every strategy is returned
 * as `false`, never thrown.
 */
export class DateNavigator {
  private displayedDate: string;
  private readonly strategies: NavigationStrategy[];

  constructor(
    private readonly gateway: SessionGateway,
    private readonly rules: NavigationRules,
    private readonly settleMs: number,
    private readonly logger: Logger,
    initialDate: string
  ) {
    this.displayedDate = initialDate;
    this.strategies = [
      { name: 'date-control', attempt: (target) => this.clickDateControl(target) },
      { name: 'next-day', attempt: (target) => this.stepForward(target) },
      { name: 'date-input', attempt: (target) => this.fillDateInput(target) },
    ];
  }

  get currentDate(): string {
    return this.displayedDate;
  }

  /** Call after every page load; the calendar opens on `date` again. */
  reset(date: string): void {
    this.displayedDate = date;
  }

  async navigateToDate(target: string): Promise<boolean> {
    this.logger.info({ target }, 'Navigating to date');

    for (const strategy of this.strategies) {
      try {
        if (await strategy.attempt(target)) {
          this.logger.info({ target, strategy: strategy.name }, 'Date navigation succeeded');
          this.displayedDate = target;
          return true;
        }
      } catch (error) {
        this.logger.debug({ err: error, target, strategy: strategy.name }, 'Date strategy failed');
      }
    }

    this.logger.warn({ target }, 'Could not navigate to date');
    return false;
  }

  private async settle(): Promise<void> {
    await this.gateway.pause(this.settleMs);
  }

  private async readControls(): Promise<LabelledElement[]> {
    const elements = await this.gateway.findAll(this.rules.dateControlQuery);
    const controls: LabelledElement[] = [];
    for (const element of elements) {
      // Icon-only day cells carry the date in aria-label.
      const text =
        (await element.text().catch(() => '')) ||
        ((await element.attribute('aria-label').catch(() => null)) ?? '');
      if (text) {
        controls.push({ element, text: text.replace(/\s+/g, ' ').trim() });
      }
    }
    return controls;
  }

  private async clickDateControl(target: string): Promise<boolean> {
    const labels = dateLabels(target);
    const controls = await this.readControls();

    const matchers: { format: string; matches: (text: string) => boolean }[] = [
      { format: labels.long, matches: (text) => containsLabel(text, labels.long) },
      { format: labels.weekdayShort, matches: (text) => containsLabel(text, labels.weekdayShort) },
      { format: labels.weekdayLong, matches: (text) => containsLabel(text, labels.weekdayLong) },
      { format: labels.day, matches: (text) => text === labels.day },
    ];

    for (const matcher of matchers) {
      for (const control of controls) {
        if (!matcher.matches(control.text)) {
          continue;
        }
        if (!(await isUsable(control.element).catch(() => false))) {
          continue;
        }
        this.logger.debug({ format: matcher.format, text: control.text }, 'Clicking date control');
        await control.element.click();
        await this.settle();
        return true;
      }
    }

    return false;
  }

  private async stepForward(target: string): Promise<boolean> {
    const steps = daysBetween(this.displayedDate, target);
    if (steps <= 0) {
      return false;
    }

    const next = await findFirst(this.gateway, this.rules.nextDaySelectors, isUsable);
    if (!next) {
      return false;
    }

    this.logger.debug({ selector: next.selector, steps }, 'Stepping calendar forward');
    for (let i = 0; i < steps; i += 1) {
      await next.element.click();
      await this.settle();
    }
    return true;
  }

  private async fillDateInput(target: string): Promise<boolean> {
    const input = await findFirst(this.gateway, this.rules.dateInputSelectors, (element) =>
      element.isDisplayed()
    );
    if (!input) {
      return false;
    }

    this.logger.debug({ selector: input.selector }, 'Setting date input');
    await input.element.fill(target);
    await this.settle();
    return true;
  }
}
