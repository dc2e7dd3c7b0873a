/**
 * Nodemailer Email Sender
 * Sends mail via plain SMTP, Gmail or Resend.com
 */

import nodemailer from 'nodemailer';
import type { Transporter } from 'nodemailer';
import type { Settings } from '../config/settings';
import { logInfo, logError } from '../observability/logger';

export type EmailSettings = Settings['email'];

export interface EmailOptions {
  to: string | string[];
  subject: string;
  html?: string;
  text: string;
  from?: string;
}

export interface SendResult {
  success: boolean;
  messageId?: string;
  error?: string;
}

/**
 * Whether the provider has the credentials it needs
 */
export function isEmailConfigured(settings: EmailSettings): boolean {
  switch (settings.provider) {
    case 'resend':
      return Boolean(settings.resendApiKey);
    case 'gmail':
      return Boolean(settings.user && settings.password);
    case 'smtp':
      return Boolean(settings.smtpHost);
  }
}

/**
 * Create the transporter for the configured provider
 */
export function createTransport(settings: EmailSettings): Transporter {
  if (settings.provider === 'resend') {
    logInfo('Email transporter initialized', { provider: 'resend' });
    return nodemailer.createTransport({
      host: 'smtp.resend.com',
      port: 465,
      secure: true,
      auth: {
        user: 'resend',
        pass: settings.resendApiKey,
      },
    });
  }

  if (settings.provider === 'gmail') {
    logInfo('Email transporter initialized', { provider: 'gmail' });
    return nodemailer.createTransport({
      service: 'gmail',
      auth: {
        user: settings.user,
        pass: settings.password,
      },
    });
  }

  logInfo('Email transporter initialized', { provider: 'smtp', host: settings.smtpHost });
  return nodemailer.createTransport({
    host: settings.smtpHost,
    port: settings.smtpPort,
    secure: settings.smtpPort === 465,
    auth: settings.user ? { user: settings.user, pass: settings.password } : undefined,
  });
}

export class Mailer {
  constructor(
    private readonly transporter: Transporter,
    private readonly defaultFrom: string
  ) {}

  async send(options: EmailOptions): Promise<SendResult> {
    const { to, subject, html, text, from } = options;

    try {
      const info = await this.transporter.sendMail({
        from: from ?? this.defaultFrom,
        to,
        subject,
        html,
        text,
      });

      logInfo('Email sent successfully', {
        messageId: info.messageId,
        subject,
      });

      return {
        success: true,
        messageId: info.messageId,
      };
    } catch (error) {
      const errorMsg = error instanceof Error ? error.message : String(error);

      logError('Failed to send email', error, { subject });

      return {
        success: false,
        error: errorMsg,
      };
    }
  }
}
