import type { Channel, ChannelName } from './channel.js';
import { truncateForChannel } from '../digest/truncate.js';
import { errorMessage } from '../errors.js';

export type DeliveryOutcome =
  | { channel: ChannelName; status: 'sent'; httpStatus: number; truncated: boolean }
  | { channel: ChannelName; status: 'skipped' }
  | { channel: ChannelName; status: 'failed'; error: string };

/**
 * Sends `text` through every channel. Each channel is isolated: a skip or a
 * failure is reported in the outcome list and never stops the next one.
 */
export async function deliverToChannels(
  channels: readonly Channel[],
  text: string
): Promise<DeliveryOutcome[]> {
  const outcomes: DeliveryOutcome[] = [];

  for (const channel of channels) {
    if (!channel.send) {
      console.log(`${channel.label} not configured; skipping ${channel.label} send.`);
      outcomes.push({ channel: channel.name, status: 'skipped' });
      continue;
    }

    const { text: body, truncated } = truncateForChannel(text, channel.maxChars);
    try {
      const res = await channel.send(body);
      outcomes.push({ channel: channel.name, status: 'sent', httpStatus: res.status, truncated });
    } catch (e) {
      const error = errorMessage(e);
      console.error(`${channel.label} delivery failed: ${error}`);
      outcomes.push({ channel: channel.name, status: 'failed', error });
    }
  }

  return outcomes;
}

export function summarizeOutcomes(outcomes: readonly DeliveryOutcome[]): string {
  return outcomes.map((o) => `${o.channel}=${o.status}`).join(', ');
}
