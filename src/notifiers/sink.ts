import type { Logger } from 'pino';

export interface LocalNotification {
  subject: string;
  body: string;
  sms: string;
}

export interface NotificationSink {
  write(notification: LocalNotification): void;
}

const RULE = '='.repeat(50);

export class ConsoleSink implements NotificationSink {
  constructor(private readonly logger: Logger) {}

  write(notification: LocalNotification): void {
    this.logger.info({ channel: 'local', subject: notification.subject }, 'Notification recorded locally');
    console.log(
      `\n${RULE}\n${notification.subject}\n${RULE}\n${notification.body}${RULE}\nSMS: ${notification.sms}\n`
    );
  }
}
