import { ValidationError } from '../errors.js';
import {
  isProtocolMessage,
  isRecord,
  ProtocolMethod,
  type ProtocolMessage,
} from '../types.js';

/**
 * True for a string of the form `file://<authority>/<path>` whose path is
 * more than the bare root. The scheme must be lower-case `file` as written.
 */
export function isFileUri(value: unknown): value is string {
  if (typeof value !== 'string' || !value.startsWith('file://')) {
    return false;
  }

  let url: URL;
  try {
    url = new URL(value);
  } catch {
    return false;
  }

  return url.protocol === 'file:' && url.pathname.length > 1;
}

/** Parses one client text frame into a message, rejecting anything else. */
export function parseClientMessage(text: string): ProtocolMessage {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    throw new ValidationError('Message is not valid JSON');
  }

  if (!isProtocolMessage(parsed)) {
    throw new ValidationError('Message is not a JSON-RPC object');
  }
  return parsed;
}

function describeUri(value: unknown): string {
  return typeof value === 'string' ? `'${value}'` : String(value);
}

/**
 * Checks the URI-shaped fields of an inbound message. Throws
 * {@link ValidationError} on the first violation.
 */
export function validateMessage(message: ProtocolMessage): void {
  const params = message.params;
  if (!isRecord(params)) {
    return;
  }

  const method = message.method ?? '<response>';

  if (method === ProtocolMethod.Initialize && !isFileUri(params.rootUri)) {
    throw new ValidationError(
      `initialize: rootUri ${describeUri(params.rootUri)} is not a file URI`,
    );
  }

  const textDocument = params.textDocument;
  if (isRecord(textDocument) && !isFileUri(textDocument.uri)) {
    throw new ValidationError(
      `${method}: textDocument.uri ${describeUri(textDocument.uri)} is not a file URI`,
    );
  }
}
