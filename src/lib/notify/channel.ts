import type { Dispatcher } from 'undici';

export type ChannelName = 'telegram' | 'whatsapp';

export interface ChannelResponse {
  status: number;
  body: string;
}

export interface HttpOptions {
  timeoutMs?: number;
  dispatcher?: Dispatcher;
}

export interface Channel {
  name: ChannelName;
  label: string;
  maxChars: number;
  /** null when credentials are missing; the channel is then skipped. */
  send: ((text: string) => Promise<ChannelResponse>) | null;
}

export class DeliveryError extends Error {
  readonly channel: ChannelName;
  readonly status: number | null;

  constructor(channel: ChannelName, message: string, status: number | null = null) {
    super(message);
    this.name = 'DeliveryError';
    this.channel = channel;
    this.status = status;
  }
}
