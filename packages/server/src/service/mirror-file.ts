import { writeFile } from 'node:fs/promises';

import { DebugLogger } from '../debug/DebugLogger.js';
import { MirrorWriteError, toError } from '../errors.js';
import { isRecord, ProtocolMethod, type ProtocolMessage } from '../types.js';

/**
 * Returns the authoritative full document text carried by a sync message, or
 * `undefined` when the message carries none.
 *
 * Only full-document sync is mirrored: for `didChange` the last content
 * change wins, and only when it is a full-text entry (no `range`).
 */
export function extractDocumentText(
  message: ProtocolMessage,
): string | undefined {
  const params = message.params;
  if (!isRecord(params)) {
    return undefined;
  }

  if (message.method === ProtocolMethod.DidOpen) {
    const textDocument = params.textDocument;
    if (isRecord(textDocument) && typeof textDocument.text === 'string') {
      return textDocument.text;
    }
    return undefined;
  }

  if (message.method === ProtocolMethod.DidChange) {
    const changes = params.contentChanges;
    if (!Array.isArray(changes) || changes.length === 0) {
      return undefined;
    }
    const last: unknown = changes[changes.length - 1];
    if (
      isRecord(last) &&
      typeof last.text === 'string' &&
      last.range === undefined
    ) {
      return last.text;
    }
  }

  return undefined;
}

/**
 * The on-disk copy of the document that the analysis process reads. Writes
 * overwrite; failures are logged and reported as `false`.
 */
export class MirrorFile {
  private readonly logger = DebugLogger.getLogger('proofpad:session');

  public constructor(public readonly path: string) {}

  public async write(text: string): Promise<boolean> {
    try {
      await writeFile(this.path, text, 'utf8');
      return true;
    } catch (error) {
      const failure = new MirrorWriteError(
        `Failed to write ${this.path}: ${toError(error).message}`,
        { cause: error },
      );
      this.logger.error(failure.message);
      return false;
    }
  }
}
