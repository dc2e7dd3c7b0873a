import type { Channel, Item, Rating } from '../db/models';

export type ChannelSendResult =
  | { status: 'success' }
  | { status: 'not_found' }
  | { status: 'transient_error'; message: string };

export interface ChannelSender {
  send(
    channel: Channel,
    item: Item,
    rating: Rating,
    signal?: AbortSignal
  ): Promise<ChannelSendResult>;
}

export type UrgentSendResult =
  | { status: 'success'; messageId?: string }
  | { status: 'failure'; reason: string };

/** The scarce direct-to-person channel. */
export interface UrgentSender {
  isConfigured(): boolean;
  sendUrgent(item: Item, rating: Rating, alertId: string): Promise<UrgentSendResult>;
}

/** Outbound half of the reply conversation with the operator. */
export interface ReplyTransport {
  notify(subject: string, text: string): Promise<boolean>;
}
