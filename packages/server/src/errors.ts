/**
 * Error taxonomy shared by the session bridge and the room registry.
 *
 * Each class keeps a stable `name` so that close reasons and log lines stay
 * machine-readable (`"<name>: <message>"`).
 */

export class BridgeError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed length header or unreadable body on the process side. */
export class FramingError extends BridgeError {}

/** The analysis process could not be started. */
export class SpawnError extends BridgeError {}

/** An inbound client message failed the URI-shape checks. */
export class ValidationError extends BridgeError {}

/** Persisted room history exists but could not be replayed. */
export class RoomLoadError extends BridgeError {}

/** The mirror file could not be written. */
export class MirrorWriteError extends BridgeError {}

/** No history has been persisted for a room yet. */
export class UpdateStoreNotFound extends BridgeError {}

/** Configuration from the command line or the environment is invalid. */
export class ConfigError extends BridgeError {}

export class IncompleteReadError extends BridgeError {
  constructor(
    readonly expected: number,
    readonly received: number,
  ) {
    super(
      `Stream ended after ${received} of ${expected} expected bytes`,
    );
  }
}

// RFC 6455 caps the close reason at 123 bytes of UTF-8.
const MAX_CLOSE_REASON_BYTES = 123;

export const toError = (value: unknown): Error =>
  value instanceof Error ? value : new Error(String(value));

export function truncateUtf8(text: string, maxBytes: number): string {
  if (Buffer.byteLength(text, 'utf8') <= maxBytes) {
    return text;
  }
  let result = '';
  let used = 0;
  for (const char of text) {
    const size = Buffer.byteLength(char, 'utf8');
    if (used + size > maxBytes) {
      break;
    }
    result += char;
    used += size;
  }
  return result;
}

export function describeCloseReason(error: unknown): string {
  const failure = toError(error);
  return truncateUtf8(
    `${failure.name}: ${failure.message}`,
    MAX_CLOSE_REASON_BYTES,
  );
}
