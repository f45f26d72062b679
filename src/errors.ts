/**
 * Error taxonomy
 *
 * Storage and capacity errors surface to the immediate caller. Probe and
 * delivery failures are values, not exceptions (see ProbeResult and
 * DispatchReport).
 */

/**
 * Configuration could not be loaded or failed validation. Fatal at startup.
 */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = [], options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * A subscriber-store operation failed. Mutations have been rolled back.
 */
export class StorageError extends Error {
  readonly operation: string;

  constructor(operation: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StorageError';
    this.operation = operation;
  }
}

/**
 * The backing medium could not be opened, created or written during setup.
 */
export class StorageInitError extends StorageError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('init', message, options);
    this.name = 'StorageInitError';
  }
}

/**
 * Subscribing a new identity would exceed the subscriber cap. Nothing was written.
 */
export class CapacityExceededError extends Error {
  readonly cap: number;

  constructor(cap: number) {
    super(`Subscriber limit reached (${cap})`);
    this.name = 'CapacityExceededError';
    this.cap = cap;
  }
}

export class InvalidSubscriberIdError extends Error {
  readonly value: string;

  constructor(value: string) {
    super(`Invalid subscriber id: "${value}"`);
    this.name = 'InvalidSubscriberIdError';
    this.value = value;
  }
}

/**
 * Non-2xx response from the Discord REST API.
 */
export class DiscordApiError extends Error {
  readonly status: number;
  readonly method: string;
  readonly path: string;

  constructor(method: string, path: string, status: number, body: string) {
    super(`Discord API ${method} ${path} returned ${status}: ${body.slice(0, 300)}`);
    this.name = 'DiscordApiError';
    this.status = status;
    this.method = method;
    this.path = path;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
