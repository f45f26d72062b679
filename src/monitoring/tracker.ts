/**
 * Availability Tracker - last observed state per monitored URL
 *
 * Memory only. A fresh tracker (and so every process restart) reports every
 * URL as 'unknown' until its first probe is recorded.
 */

import type { AvailabilityStatus } from '../types';

export interface UrlState {
  url: string;
  status: AvailabilityStatus;
  checkedAt: Date | null;
}

export class AvailabilityTracker {
  private readonly urls: readonly string[];
  private readonly states = new Map<string, { available: boolean; checkedAt: Date }>();

  constructor(urls: readonly string[]) {
    this.urls = [...urls];
  }

  /** Monitored URLs in configured order. */
  get monitoredUrls(): readonly string[] {
    return this.urls;
  }

  /**
   * Overwrite the state for url and return the state it replaced.
   */
  record(url: string, available: boolean, checkedAt: Date = new Date()): AvailabilityStatus {
    const previous = this.statusOf(url);
    this.states.set(url, { available, checkedAt });
    return previous;
  }

  statusOf(url: string): AvailabilityStatus {
    const state = this.states.get(url);
    if (!state) return 'unknown';
    return state.available ? 'available' : 'unavailable';
  }

  lastCheckedAt(url: string): Date | null {
    return this.states.get(url)?.checkedAt ?? null;
  }

  /** State of every monitored URL, in configured order. */
  snapshot(): UrlState[] {
    return this.urls.map((url) => ({
      url,
      status: this.statusOf(url),
      checkedAt: this.lastCheckedAt(url),
    }));
  }
}
