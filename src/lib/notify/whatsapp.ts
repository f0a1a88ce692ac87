import { request } from 'undici';

import type { WhatsAppConfig } from '../types.js';
import { MAX_WHATSAPP_CHARS } from '../digest/limits.js';
import { DeliveryError, type Channel, type ChannelResponse, type HttpOptions } from './channel.js';

export const TWILIO_API = 'https://api.twilio.com';

export function basicAuth(user: string, password: string): string {
  return `Basic ${Buffer.from(`${user}:${password}`, 'utf8').toString('base64')}`;
}

export async function sendWhatsAppMessage(
  config: WhatsAppConfig,
  text: string,
  opts: HttpOptions = {}
): Promise<ChannelResponse> {
  const { timeoutMs = 20_000, dispatcher } = opts;
  const url = `${TWILIO_API}/2010-04-01/Accounts/${encodeURIComponent(config.accountSid)}/Messages.json`;

  const { statusCode, body } = await request(url, {
    method: 'POST',
    headers: {
      authorization: basicAuth(config.accountSid, config.authToken),
      'content-type': 'application/x-www-form-urlencoded',
    },
    body: new URLSearchParams({ From: config.from, To: config.to, Body: text }).toString(),
    bodyTimeout: timeoutMs,
    headersTimeout: timeoutMs,
    dispatcher,
  });
  const responseText = await body.text();

  console.log('Twilio status:', statusCode);

  if (statusCode < 200 || statusCode >= 300) {
    throw new DeliveryError('whatsapp', `Twilio WhatsApp send failed: ${statusCode} ${responseText}`, statusCode);
  }
  return { status: statusCode, body: responseText };
}

export function whatsappChannel(config: WhatsAppConfig | null, opts: HttpOptions = {}): Channel {
  return {
    name: 'whatsapp',
    label: 'Twilio WhatsApp',
    maxChars: MAX_WHATSAPP_CHARS,
    send: config ? (text) => sendWhatsAppMessage(config, text, opts) : null,
  };
}
