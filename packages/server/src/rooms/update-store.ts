import { appendFile, readFile, truncate } from 'node:fs/promises';
import { join } from 'node:path';

import * as decoding from 'lib0/decoding';
import * as encoding from 'lib0/encoding';
import * as Y from 'yjs';

import { RoomLoadError, toError, UpdateStoreNotFound } from '../errors.js';
import type { RoomName } from '../types.js';

/** Transaction origin for updates replayed from the store. */
export const STORE_ORIGIN = Symbol('update-store');

export interface UpdateStore {
  /**
   * Replays every persisted update into `doc`. Throws
   * {@link UpdateStoreNotFound} when nothing has been persisted yet.
   */
  applyUpdates(doc: Y.Doc): Promise<void>;
  write(update: Uint8Array): Promise<void>;
  flush(): Promise<void>;
}

export type UpdateStoreFactory = (roomName: RoomName) => UpdateStore;

const isErrnoException = (error: unknown): error is NodeJS.ErrnoException =>
  error instanceof Error && 'code' in error;

export function encodeUpdateRecord(update: Uint8Array): Uint8Array {
  const encoder = encoding.createEncoder();
  encoding.writeVarUint8Array(encoder, update);
  return encoding.toUint8Array(encoder);
}

export interface DecodedUpdateLog {
  updates: Uint8Array[];
  /** Byte length of the leading run of complete records. */
  validLength: number;
  /** Why decoding stopped early, or `null` when every byte was consumed. */
  failure: string | null;
}

/** Decodes records up to the first one that is truncated or unreadable. */
export function decodeUpdateRecords(data: Uint8Array): DecodedUpdateLog {
  const decoder = decoding.createDecoder(data);
  const updates: Uint8Array[] = [];
  let validLength = 0;

  while (decoding.hasContent(decoder)) {
    let length: number;
    try {
      length = decoding.readVarUint(decoder);
    } catch (error) {
      return {
        updates,
        validLength,
        failure: `Unreadable record length at byte ${validLength}: ${toError(error).message}`,
      };
    }
    if (decoder.pos + length > data.length) {
      return {
        updates,
        validLength,
        failure: `Record declares ${length} bytes but only ${data.length - decoder.pos} remain`,
      };
    }
    updates.push(decoding.readUint8Array(decoder, length));
    validLength = decoder.pos;
  }

  return { updates, validLength, failure: null };
}

/**
 * Append-only update log kept in one file per room. Each record is a
 * var-uint length followed by one encoded Yjs update.
 */
export class FileUpdateStore implements UpdateStore {
  private writeQueue: Promise<void> = Promise.resolve();

  public constructor(public readonly path: string) {}

  public static forRoom(dataDir: string, roomName: RoomName): FileUpdateStore {
    return new FileUpdateStore(
      join(dataDir, `${encodeURIComponent(roomName)}.ystore`),
    );
  }

  public async applyUpdates(doc: Y.Doc): Promise<void> {
    let data: Buffer;
    try {
      data = await readFile(this.path);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        throw new UpdateStoreNotFound(`No update log at ${this.path}`);
      }
      throw new RoomLoadError(
        `Failed to read ${this.path}: ${toError(error).message}`,
        { cause: error },
      );
    }

    const log = decodeUpdateRecords(new Uint8Array(data));
    let repair = '';
    if (log.failure !== null) {
      // Cut the damaged tail before anything else is appended after it.
      try {
        await this.enqueue(() => truncate(this.path, log.validLength));
        repair = `truncated to ${log.validLength} bytes`;
      } catch (error) {
        repair = `truncation failed: ${toError(error).message}`;
      }
    }

    if (log.updates.length > 0) {
      try {
        Y.applyUpdate(doc, Y.mergeUpdates(log.updates), STORE_ORIGIN);
      } catch (error) {
        throw new RoomLoadError(
          `Update log ${this.path} could not be applied: ${toError(error).message}`,
          { cause: error },
        );
      }
    }

    if (log.failure !== null) {
      throw new RoomLoadError(
        `Update log ${this.path} is corrupt after ${log.updates.length} records (${log.failure}); ${repair}`,
      );
    }
  }

  public write(update: Uint8Array): Promise<void> {
    const record = encodeUpdateRecord(update);
    return this.enqueue(() => appendFile(this.path, record));
  }

  public async flush(): Promise<void> {
    await this.writeQueue;
  }

  private enqueue(operation: () => Promise<void>): Promise<void> {
    const run = this.writeQueue.then(operation);
    this.writeQueue = run.catch(() => undefined);
    return run;
  }
}
