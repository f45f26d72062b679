/**
 * Shared types for sitewatch
 */

// =============================================================================
// SUBSCRIBERS
// =============================================================================

/**
 * Platform-assigned user id (a Discord snowflake). Kept as a decimal string
 * because snowflakes exceed Number.MAX_SAFE_INTEGER.
 */
export type SubscriberId = string;

export interface Subscriber {
  id: SubscriberId;
  subscribed: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export type SubscribeOutcome = 'subscribed' | 'resubscribed' | 'already-subscribed';

export type UnsubscribeOutcome = 'unsubscribed' | 'not-subscribed';

// =============================================================================
// AVAILABILITY
// =============================================================================

export type AvailabilityStatus = 'available' | 'unavailable' | 'unknown';

export interface ProbeResult {
  url: string;
  available: boolean;
  /** HTTP status when a response was received */
  status?: number;
  /** Transport error, timeout or non-2xx description */
  error?: string;
  durationMs: number;
}

export type Probe = (url: string) => Promise<ProbeResult>;

/** Emitted when a probe observes a URL as reachable. */
export interface AvailabilityEvent {
  url: string;
  observedAt: Date;
  /** Tracker state before this observation */
  previous: AvailabilityStatus;
}

/**
 * When to raise an availability event:
 * - every-check: on every cycle the URL is available
 * - transition: only when the previous state was not 'available'
 */
export type NotifyPolicy = 'every-check' | 'transition';

/**
 * inline: dispatch each event before probing the next URL.
 * batched: probe every URL first, then dispatch the collected events.
 */
export type DispatchMode = 'inline' | 'batched';

// =============================================================================
// DELIVERY
// =============================================================================

export interface NotificationEmbed {
  title?: string;
  description?: string;
  color?: number;
  url?: string;
  fields?: Array<{ name: string; value: string; inline?: boolean }>;
  footer?: { text: string };
  timestamp?: string;
}

export interface NotificationMessage {
  content?: string;
  embeds?: NotificationEmbed[];
}

export interface DeliveryResult {
  success: boolean;
  error?: string;
}

/** Outbound channel that reaches a single subscriber directly. */
export interface DeliveryChannel {
  send(recipient: SubscriberId, message: NotificationMessage): Promise<DeliveryResult>;
}

// =============================================================================
// CONFIG
// =============================================================================

export interface Config {
  botToken: string;
  adminId: SubscriberId;
  applicationId?: string;
  databasePath: string;
  /** Seconds to sleep between cycles */
  urlCheckDelay: number;
  urlsToCheck: string[];
  probe: {
    /** Seconds before a probe is abandoned */
    timeout: number;
    method: 'HEAD' | 'GET';
  };
  notifyOn: NotifyPolicy;
  dispatchMode: DispatchMode;
  deliveryConcurrency: number;
  maxSubscribers: number;
}
