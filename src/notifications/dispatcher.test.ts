import { describe, it, expect, vi } from 'vitest';
import { StorageError } from '../errors';
import type { AvailabilityEvent, DeliveryChannel, DeliveryResult, NotificationMessage } from '../types';
import { createNotificationDispatcher } from './dispatcher';

const EVENT: AvailabilityEvent = {
  url: 'https://a.example',
  observedAt: new Date('2024-05-01T12:00:00Z'),
  previous: 'unknown',
};

function subscribers(...ids: string[]) {
  return { listSubscribed: () => new Set(ids) };
}

function recordingChannel(fail: Record<string, 'throw' | 'reject'> = {}) {
  const sent: Array<{ recipient: string; message: NotificationMessage }> = [];
  const channel: DeliveryChannel = {
    send: vi.fn(async (recipient: string, message: NotificationMessage): Promise<DeliveryResult> => {
      if (fail[recipient] === 'throw') throw new Error('connection reset');
      if (fail[recipient] === 'reject') return { success: false, error: 'Cannot send messages to this user' };
      sent.push({ recipient, message });
      return { success: true };
    }),
  };
  return { sent, channel };
}

describe('NotificationDispatcher', () => {
  it('delivers one message per subscriber', async () => {
    const { sent, channel } = recordingChannel();
    const dispatcher = createNotificationDispatcher({ subscribers: subscribers('1', '2'), channel });

    const report = await dispatcher.dispatch(EVENT);

    expect(report).toEqual({ url: EVENT.url, recipients: 2, delivered: 2, failed: [] });
    expect(sent.map((s) => s.recipient)).toEqual(['1', '2']);
    expect(sent[0].message.embeds?.[0].description).toBe('<@1> The website at https://a.example is now accessible.');
  });

  it('keeps delivering when one recipient fails', async () => {
    const { sent, channel } = recordingChannel({ '2': 'throw' });
    const dispatcher = createNotificationDispatcher({ subscribers: subscribers('1', '2', '3'), channel });

    const report = await dispatcher.dispatch(EVENT);

    expect(sent.map((s) => s.recipient)).toEqual(['1', '3']);
    expect(report.delivered).toBe(2);
    expect(report.failed).toEqual([{ recipient: '2', error: 'connection reset' }]);
  });

  it('counts an unsuccessful result as a failure', async () => {
    const { channel } = recordingChannel({ '1': 'reject' });
    const dispatcher = createNotificationDispatcher({ subscribers: subscribers('1'), channel });

    const report = await dispatcher.dispatch(EVENT);

    expect(report.failed).toEqual([{ recipient: '1', error: 'Cannot send messages to this user' }]);
    expect(channel.send).toHaveBeenCalledTimes(1);
  });

  it('does nothing without subscribers', async () => {
    const { channel } = recordingChannel();
    const dispatcher = createNotificationDispatcher({ subscribers: subscribers(), channel });

    expect(await dispatcher.dispatch(EVENT)).toEqual({ url: EVENT.url, recipients: 0, delivered: 0, failed: [] });
    expect(channel.send).not.toHaveBeenCalled();
  });

  it('propagates a failure to read subscribers', async () => {
    const { channel } = recordingChannel();
    const dispatcher = createNotificationDispatcher({
      subscribers: {
        listSubscribed: () => {
          throw new StorageError('listSubscribed', 'listSubscribed failed: disk I/O error');
        },
      },
      channel,
    });

    await expect(dispatcher.dispatch(EVENT)).rejects.toBeInstanceOf(StorageError);
  });

  it('bounds the number of deliveries in flight', async () => {
    let inFlight = 0;
    let peak = 0;
    const channel: DeliveryChannel = {
      async send(): Promise<DeliveryResult> {
        inFlight++;
        peak = Math.max(peak, inFlight);
        await new Promise((resolve) => setTimeout(resolve, 5));
        inFlight--;
        return { success: true };
      },
    };
    const ids = ['1', '2', '3', '4', '5', '6', '7'];

    const sequential = createNotificationDispatcher({ subscribers: subscribers(...ids), channel });
    await sequential.dispatch(EVENT);
    expect(peak).toBe(1);

    peak = 0;
    const pooled = createNotificationDispatcher({ subscribers: subscribers(...ids), channel, concurrency: 3 });
    const report = await pooled.dispatch(EVENT);
    expect(peak).toBe(3);
    expect(report.delivered).toBe(7);
  });

  it('uses a custom formatter when given', async () => {
    const { sent, channel } = recordingChannel();
    const dispatcher = createNotificationDispatcher({
      subscribers: subscribers('9'),
      channel,
      format: (event, recipient) => ({ content: `${recipient}:${event.url}` }),
    });

    await dispatcher.dispatch(EVENT);

    expect(sent[0].message).toEqual({ content: '9:https://a.example' });
  });
});
