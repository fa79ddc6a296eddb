import type { Logger } from 'pino';
import { countSlots, slotIdentity } from '../differ';
import type {
  AppConfig,
  CarrierGateway,
  DateSlotMap,
  FacilityProfile,
  MonitorState,
  NotificationConfig,
} from '../types';
import { formatEmail, formatSms, type FormattedEmail } from './format';
import { createMailRelay, type MailRelay } from './mail';
import { ConsoleSink, type NotificationSink } from './sink';

const DEDUP_CACHE_LIMIT = 100;
const DEDUP_CACHE_KEEP = 50;

export interface DispatcherOptions {
  profile: FacilityProfile;
  bookingUrl: string;
  notification: NotificationConfig;
  senderEmail: string;
  relay: MailRelay | null;
  sink: NotificationSink;
  sentBatches: Set<string>;
  logger: Logger;
}

export function dedupKey(batch: DateSlotMap): string {
  return Object.values(batch)
    .flat()
    .map(slotIdentity)
    .sort()
    .join('|');
}

/**
 * Delivers one alert per distinct batch: email first, then SMS through the
 * carrier gateways, and always the local sink. A remote failure moves on to
 * the next channel and never fails the call.
 */
export class NotificationDispatcher {
  private readonly options: DispatcherOptions;

  constructor(options: DispatcherOptions) {
    this.options = options;
  }

  async notify(batch: DateSlotMap): Promise<boolean> {
    const { profile, bookingUrl, sink, sentBatches, logger } = this.options;

    try {
      const total = countSlots(batch);
      if (total === 0) {
        return true;
      }

      const key = dedupKey(batch);
      if (sentBatches.has(key)) {
        logger.info({ total }, 'Notification already sent for this slot combination');
        return true;
      }

      const email = formatEmail(profile, bookingUrl, batch);
      const sms = formatSms(profile, bookingUrl, batch);

      const emailSent = await this.sendEmail(email);
      const smsSent = await this.sendSms(sms);

      sink.write({ subject: email.subject, body: email.text, sms });
      this.remember(key);

      logger.info({ total, emailSent, smsSent }, 'Notification dispatched');
      return true;
    } catch (error) {
      logger.error({ err: error }, 'Notification dispatch failed');
      return false;
    }
  }

  private remember(key: string): void {
    const { sentBatches, logger } = this.options;
    sentBatches.add(key);

    if (sentBatches.size > DEDUP_CACHE_LIMIT) {
      const recent = Array.from(sentBatches).slice(-DEDUP_CACHE_KEEP);
      sentBatches.clear();
      for (const entry of recent) {
        sentBatches.add(entry);
      }
      logger.debug({ kept: recent.length }, 'Pruned notification dedup cache');
    }
  }

  private async sendEmail(email: FormattedEmail): Promise<boolean> {
    const { relay, notification, senderEmail, logger } = this.options;
    if (!relay || !notification.email) {
      logger.debug('Email channel not configured');
      return false;
    }

    try {
      await relay.send({
        from: senderEmail,
        to: notification.email,
        subject: email.subject,
        text: email.text,
      });
      logger.info({ relay: relay.name, to: notification.email }, 'Email notification sent');
      return true;
    } catch (error) {
      logger.warn({ err: error, relay: relay.name }, 'Email notification failed');
      return false;
    }
  }

  private async sendSms(text: string): Promise<boolean> {
    const { relay, notification, senderEmail, profile, logger } = this.options;
    if (!relay || !notification.phoneNumber) {
      logger.debug('SMS channel not configured');
      return false;
    }

    const gateways: CarrierGateway[] = [...profile.smsGateways, profile.universalGateway];

    for (const gateway of gateways) {
      const to = `${notification.phoneNumber}@${gateway.domain}`;
      try {
        logger.debug({ carrier: gateway.carrier, to }, 'Trying SMS gateway');
        await relay.send({ from: senderEmail, to, subject: '', text });
        logger.info({ carrier: gateway.carrier }, 'SMS notification sent');
        return true;
      } catch (error) {
        logger.warn({ err: error, carrier: gateway.carrier }, 'SMS gateway failed');
      }
    }

    return false;
  }
}

export function createNotificationDispatcher(
  config: AppConfig,
  profile: FacilityProfile,
  state: MonitorState,
  logger: Logger
): NotificationDispatcher {
  return new NotificationDispatcher({
    profile,
    bookingUrl: config.bookingUrl,
    notification: config.notification,
    senderEmail: config.mail.senderEmail,
    relay: createMailRelay(config.mail, logger),
    sink: new ConsoleSink(logger),
    sentBatches: state.sentBatches,
    logger,
  });
}

/** A single placeholder slot, used to exercise every channel end to end. */
export function sampleBatch(date: string): DateSlotMap {
  return {
    [date]: [
      {
        resourceName: 'Court 1',
        timeLabel: '6:00 pm',
        durationLabel: '1 hour',
        priceLabel: 'Unknown',
        date,
        rawText: 'Book 6:00 pm',
        interactable: true,
      },
    ],
  };
}
