import { FramingError, IncompleteReadError } from '../errors.js';
import { isProtocolMessage, type ProtocolMessage } from '../types.js';
import type { ByteReader } from './byte-reader.js';

const CONTENT_LENGTH_HEADER = 'content-length';

/**
 * Serializes a message as `Content-Length: <n>\r\n\r\n<body>`, where `n` is
 * the UTF-8 byte length of the JSON body.
 */
export function encodeMessage(message: ProtocolMessage): Buffer {
  const body = Buffer.from(JSON.stringify(message), 'utf8');
  const header = Buffer.from(
    `Content-Length: ${body.length}\r\n\r\n`,
    'ascii',
  );
  return Buffer.concat([header, body]);
}

function parseContentLength(value: string): number {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new FramingError(`Invalid Content-Length value '${trimmed}'`);
  }
  return Number.parseInt(trimmed, 10);
}

/**
 * Reads one framed message. Resolves `null` when the stream ends before any
 * header line has been read.
 */
export async function decodeMessage(
  reader: ByteReader,
  signal?: AbortSignal,
): Promise<ProtocolMessage | null> {
  let contentLength: number | null = null;
  let sawHeader = false;

  while (true) {
    const rawLine = await reader.readLine(signal);
    if (rawLine.length === 0) {
      if (!sawHeader) {
        return null;
      }
      throw new FramingError('Stream ended inside message headers');
    }
    sawHeader = true;

    const line = rawLine.toString('latin1').trim();
    if (line.length === 0) {
      break;
    }

    const separator = line.indexOf(':');
    if (separator < 0) {
      continue;
    }
    const name = line.slice(0, separator).trim().toLowerCase();
    if (name === CONTENT_LENGTH_HEADER) {
      contentLength = parseContentLength(line.slice(separator + 1));
    }
  }

  if (contentLength === null) {
    throw new FramingError('Message headers did not include Content-Length');
  }

  let body: Buffer;
  try {
    body = await reader.readExactly(contentLength, signal);
  } catch (error) {
    if (error instanceof IncompleteReadError) {
      throw new FramingError(
        `Message body truncated: expected ${error.expected} bytes, got ${error.received}`,
        { cause: error },
      );
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(body.toString('utf8'));
  } catch (error) {
    throw new FramingError('Message body is not valid JSON', { cause: error });
  }

  if (!isProtocolMessage(parsed)) {
    throw new FramingError('Message body is not a JSON-RPC object');
  }
  return parsed;
}
