import nodemailer, { type Transporter } from 'nodemailer';
import { Resend } from 'resend';
import type { Logger } from 'pino';
import type { MailConfig } from '../types';

export interface MailMessage {
  from: string;
  to: string;
  subject: string;
  text: string;
}

/** Rejects when the message could not be handed to the relay. */
export interface MailRelay {
  readonly name: string;
  send(message: MailMessage): Promise<void>;
}

export class SmtpMailRelay implements MailRelay {
  readonly name = 'smtp';
  private readonly transporter: Transporter;

  constructor(config: MailConfig) {
    // Submission port: plain connect, then STARTTLS is required before AUTH.
    this.transporter = nodemailer.createTransport({
      host: config.smtpHost,
      port: config.smtpPort,
      secure: config.smtpPort === 465,
      requireTLS: config.smtpPort !== 465,
      auth: {
        user: config.senderEmail,
        pass: config.senderPassword,
      },
    });
  }

  async send(message: MailMessage): Promise<void> {
    await this.transporter.sendMail({
      from: message.from,
      to: message.to,
      subject: message.subject,
      text: message.text,
    });
  }
}

export class ResendMailRelay implements MailRelay {
  readonly name = 'resend';
  private readonly client: Resend;

  constructor(apiKey: string) {
    this.client = new Resend(apiKey);
  }

  async send(message: MailMessage): Promise<void> {
    const result = await this.client.emails.send({
      from: message.from,
      to: message.to,
      subject: message.subject,
      text: message.text,
    });

    if (result.error) {
      throw new Error(`Resend error: ${result.error.message}`);
    }
  }
}

export function createMailRelay(config: MailConfig, logger: Logger): MailRelay | null {
  if (config.transport === 'resend') {
    if (!config.resendApiKey) {
      logger.warn('RESEND_API_KEY not set, remote notifications disabled');
      return null;
    }
    return new ResendMailRelay(config.resendApiKey);
  }

  if (!config.senderEmail || !config.senderPassword) {
    logger.warn('Sender email or app password not set, remote notifications disabled');
    return null;
  }
  return new SmtpMailRelay(config);
}
