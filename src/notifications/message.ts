/**
 * Availability notification formatting (Discord embeds)
 */

import type { AvailabilityEvent, NotificationEmbed, NotificationMessage, SubscriberId } from '../types';

// Discord uses decimal color values
export const EMBED_COLORS = {
  success: 0x2ecc71,
  danger: 0xe74c3c,
  info: 0x3498db,
  pending: 0x95a5a6,
} as const;

export const FOOTER_TEXT = 'sitewatch';

export function formatAvailabilityEmbed(event: AvailabilityEvent, recipient: SubscriberId): NotificationEmbed {
  const stillUp = event.previous === 'available';
  return {
    title: '🟢 Website Available!',
    description: stillUp
      ? `<@${recipient}> The website at ${event.url} is still accessible.`
      : `<@${recipient}> The website at ${event.url} is now accessible.`,
    color: EMBED_COLORS.success,
    url: event.url,
    footer: { text: FOOTER_TEXT },
    timestamp: event.observedAt.toISOString(),
  };
}

export function formatAvailabilityMessage(event: AvailabilityEvent, recipient: SubscriberId): NotificationMessage {
  return { embeds: [formatAvailabilityEmbed(event, recipient)] };
}
