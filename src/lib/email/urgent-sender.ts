/**
 * Email adapters for the scarce urgent channel and the operator reply thread
 */

import type { Item, Rating } from '../db/models';
import type { ReplyTransport, UrgentSender, UrgentSendResult } from '../notify/types';
import type { Mailer } from './nodemailer-sender';
import { renderUrgentAlert } from './renderer';

export class EmailUrgentSender implements UrgentSender {
  constructor(
    private readonly mailer: Mailer | null,
    private readonly recipient: string | undefined
  ) {}

  isConfigured(): boolean {
    return this.mailer !== null && Boolean(this.recipient);
  }

  async sendUrgent(item: Item, rating: Rating, alertId: string): Promise<UrgentSendResult> {
    if (!this.mailer || !this.recipient) {
      return { status: 'failure', reason: 'urgent email channel not configured' };
    }

    const { subject, html, text } = renderUrgentAlert(item, rating, alertId);
    const result = await this.mailer.send({ to: this.recipient, subject, html, text });

    return result.success
      ? { status: 'success', messageId: result.messageId }
      : { status: 'failure', reason: result.error ?? 'unknown mail error' };
  }
}

export class EmailReplyTransport implements ReplyTransport {
  constructor(
    private readonly mailer: Mailer | null,
    private readonly recipient: string | undefined
  ) {}

  async notify(subject: string, text: string): Promise<boolean> {
    if (!this.mailer || !this.recipient) {
      return false;
    }
    const result = await this.mailer.send({ to: this.recipient, subject, text });
    return result.success;
  }
}
