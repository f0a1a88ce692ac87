import { request } from 'undici';

import type { TelegramConfig } from '../types.js';
import { MAX_TELEGRAM_CHARS } from '../digest/limits.js';
import { DeliveryError, type Channel, type ChannelResponse, type HttpOptions } from './channel.js';

export const TELEGRAM_API = 'https://api.telegram.org';

export async function sendTelegramMessage(
  config: TelegramConfig,
  text: string,
  opts: HttpOptions = {}
): Promise<ChannelResponse> {
  const { timeoutMs = 20_000, dispatcher } = opts;
  const url = `${TELEGRAM_API}/bot${config.botToken}/sendMessage`;

  const { statusCode, body } = await request(url, {
    method: 'POST',
    headers: { 'content-type': 'application/x-www-form-urlencoded' },
    body: new URLSearchParams({ chat_id: config.chatId, text }).toString(),
    bodyTimeout: timeoutMs,
    headersTimeout: timeoutMs,
    dispatcher,
  });
  const responseText = await body.text();

  console.log('Telegram status:', statusCode);
  console.log('Telegram response body:', responseText);

  if (statusCode < 200 || statusCode >= 300) {
    throw new DeliveryError('telegram', `Telegram sendMessage failed: ${statusCode} ${responseText}`, statusCode);
  }
  return { status: statusCode, body: responseText };
}

export function telegramChannel(config: TelegramConfig | null, opts: HttpOptions = {}): Channel {
  return {
    name: 'telegram',
    label: 'Telegram',
    maxChars: MAX_TELEGRAM_CHARS,
    send: config ? (text) => sendTelegramMessage(config, text, opts) : null,
  };
}
