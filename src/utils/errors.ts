/**
 * Error taxonomy
 *
 * Only ConfigError is fatal. The others end the current cycle (or a single
 * delivery) and are reported through the logger.
 */

export class StatuscastError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Platform adapter could not produce a snapshot (network, auth, parse). */
export class FetchError extends StatuscastError {}

/** Snapshot shape does not match the platform kind or the stored snapshot. */
export class DiffError extends StatuscastError {}

/** State store failed to persist a snapshot. */
export class CommitError extends StatuscastError {}

/** Notification channel rejected or failed a delivery. */
export class DeliveryError extends StatuscastError {}

/** Configuration rejected at load time. */
export class ConfigError extends StatuscastError {
  readonly issues: string[];

  constructor(issues: string[] | string) {
    const list = Array.isArray(issues) ? issues : [issues];
    super(`invalid configuration:\n  - ${list.join('\n  - ')}`);
    this.issues = list;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
