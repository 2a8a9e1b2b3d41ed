/**
 * Error types callers distinguish on.
 */

/** Missing or invalid configuration. Fatal at startup. */
export class ConfigError extends Error {
  override name = "ConfigError";
}

/** HTTP or protocol failure talking to the search/download provider. */
export class ProviderError extends Error {
  override name = "ProviderError";

  constructor(
    message: string,
    readonly status?: number
  ) {
    super(message);
  }
}

/** A requester already has a search or download in flight. */
export class RequesterBusyError extends Error {
  override name = "RequesterBusyError";

  constructor(
    readonly requester: string,
    readonly kind: string
  ) {
    super(`A ${kind} is already in progress for ${requester}`);
  }
}

/** Audio could not be read or decoded. */
export class DecodeError extends Error {
  override name = "DecodeError";
}

/** Render an unknown thrown value as a message. */
export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
