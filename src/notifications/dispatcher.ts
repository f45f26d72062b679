/**
 * Notification Dispatcher - fans an availability event out to subscribers
 *
 * Reads the current subscriber set once per event and makes one delivery
 * attempt per recipient. A failed delivery is logged and counted; it never
 * stops the remaining deliveries and is not retried.
 */

import { errorMessage } from '../errors';
import type { SubscriberStore } from '../subscribers/store';
import type {
  AvailabilityEvent,
  DeliveryChannel,
  NotificationMessage,
  SubscriberId,
} from '../types';
import { forEachConcurrent } from '../utils/concurrency';
import { createLogger } from '../utils/logger';
import { formatAvailabilityMessage } from './message';

const logger = createLogger('dispatcher');

// =============================================================================
// TYPES
// =============================================================================

export interface DeliveryFailure {
  recipient: SubscriberId;
  error: string;
}

export interface DispatchReport {
  url: string;
  recipients: number;
  delivered: number;
  failed: DeliveryFailure[];
}

export interface NotificationDispatcher {
  /**
   * Deliver the event to every current subscriber. Rejects only when the
   * subscriber list cannot be read (StorageError).
   */
  dispatch(event: AvailabilityEvent): Promise<DispatchReport>;
}

export interface DispatcherDeps {
  subscribers: Pick<SubscriberStore, 'listSubscribed'>;
  channel: DeliveryChannel;
  /** Max deliveries in flight. Default: 1 (sequential) */
  concurrency?: number;
  format?: (event: AvailabilityEvent, recipient: SubscriberId) => NotificationMessage;
}

// =============================================================================
// DISPATCHER
// =============================================================================

export function createNotificationDispatcher(deps: DispatcherDeps): NotificationDispatcher {
  const concurrency = Math.max(1, Math.floor(deps.concurrency ?? 1));
  const format = deps.format ?? formatAvailabilityMessage;

  async function deliver(event: AvailabilityEvent, recipient: SubscriberId): Promise<DeliveryFailure | null> {
    try {
      const result = await deps.channel.send(recipient, format(event, recipient));
      if (result.success) return null;
      return { recipient, error: result.error ?? 'Delivery rejected' };
    } catch (err) {
      return { recipient, error: errorMessage(err) };
    }
  }

  return {
    async dispatch(event: AvailabilityEvent): Promise<DispatchReport> {
      const recipients = [...deps.subscribers.listSubscribed()];
      const failed: DeliveryFailure[] = [];
      let delivered = 0;

      await forEachConcurrent(recipients, concurrency, async (recipient) => {
        const failure = await deliver(event, recipient);
        if (failure) {
          failed.push(failure);
          logger.warn({ subscriberId: recipient, url: event.url, error: failure.error }, 'Error notifying subscriber');
        } else {
          delivered++;
        }
      });

      logger.info(
        { url: event.url, recipients: recipients.length, delivered, failed: failed.length },
        'Availability notification dispatched',
      );

      return { url: event.url, recipients: recipients.length, delivered, failed };
    },
  };
}
