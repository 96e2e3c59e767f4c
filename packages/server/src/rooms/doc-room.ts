import * as decoding from 'lib0/decoding';
import * as encoding from 'lib0/encoding';
import {
  applyAwarenessUpdate,
  Awareness,
  encodeAwarenessUpdate,
  removeAwarenessStates,
} from 'y-protocols/awareness';
import {
  readSyncMessage,
  writeSyncStep1,
  writeUpdate,
} from 'y-protocols/sync';
import * as Y from 'yjs';

import { DebugLogger } from '../debug/DebugLogger.js';
import type { RoomLoadError } from '../errors.js';
import { toError } from '../errors.js';
import type { RoomName } from '../types.js';
import { STORE_ORIGIN, type UpdateStore } from './update-store.js';

export const MessageType = {
  Sync: 0,
  Awareness: 1,
} as const;

/** Outgoing side of one room connection. */
export interface RoomPeer {
  send(message: Uint8Array): void;
}

/** Incoming side of one room connection, handed back by `addConnection`. */
export interface RoomConnection {
  receive(message: Uint8Array): void;
  disconnect(): void;
}

interface AwarenessChanges {
  added: number[];
  updated: number[];
  removed: number[];
}

/**
 * One shared document plus the peers editing it. Speaks the y-websocket
 * sync and awareness sub-protocol and appends every non-replayed update to
 * its store.
 */
export class DocRoom {
  public readonly doc = new Y.Doc();
  public readonly awareness: Awareness;
  public ready = false;
  public loadError: RoomLoadError | null = null;
  private started = false;
  // Peer -> awareness client ids it controls
  private readonly peers = new Map<RoomPeer, Set<number>>();
  private readonly logger = DebugLogger.getLogger('proofpad:rooms');

  public constructor(
    public readonly name: RoomName,
    public readonly store: UpdateStore,
  ) {
    this.awareness = new Awareness(this.doc);
    // The server holds no cursor of its own.
    this.awareness.setLocalState(null);
  }

  public get connectionCount(): number {
    return this.peers.size;
  }

  public get isStarted(): boolean {
    return this.started;
  }

  /** Subscribes to document and awareness updates. Safe to call repeatedly. */
  public start(): void {
    if (this.started) {
      return;
    }
    this.started = true;
    this.doc.on('update', this.onDocumentUpdate);
    this.awareness.on('update', this.onAwarenessUpdate);
  }

  /**
   * Detaches every peer and releases the awareness timer, then waits for
   * pending store appends. Only used at shutdown; a stopped room is not
   * restarted.
   */
  public async stop(): Promise<void> {
    if (this.started) {
      this.started = false;
      this.doc.off('update', this.onDocumentUpdate);
      this.awareness.off('update', this.onAwarenessUpdate);
    }
    this.peers.clear();
    this.awareness.destroy();
    await this.store.flush();
  }

  public addConnection(peer: RoomPeer): RoomConnection {
    this.peers.set(peer, new Set());
    this.logger.debug(
      `Peer joined room ${this.name} (${this.peers.size} connected)`,
    );

    const syncEncoder = encoding.createEncoder();
    encoding.writeVarUint(syncEncoder, MessageType.Sync);
    writeSyncStep1(syncEncoder, this.doc);
    this.sendTo(peer, encoding.toUint8Array(syncEncoder));

    const states = this.awareness.getStates();
    if (states.size > 0) {
      const awarenessEncoder = encoding.createEncoder();
      encoding.writeVarUint(awarenessEncoder, MessageType.Awareness);
      encoding.writeVarUint8Array(
        awarenessEncoder,
        encodeAwarenessUpdate(this.awareness, [...states.keys()]),
      );
      this.sendTo(peer, encoding.toUint8Array(awarenessEncoder));
    }

    return {
      receive: (message) => this.handleMessage(peer, message),
      disconnect: () => this.removePeer(peer),
    };
  }

  private handleMessage(peer: RoomPeer, message: Uint8Array): void {
    if (!this.peers.has(peer)) {
      return;
    }
    try {
      const encoder = encoding.createEncoder();
      const decoder = decoding.createDecoder(message);
      const messageType = decoding.readVarUint(decoder);

      switch (messageType) {
        case MessageType.Sync:
          encoding.writeVarUint(encoder, MessageType.Sync);
          readSyncMessage(decoder, encoder, this.doc, peer);
          // Only the message type was written: nothing to reply.
          if (encoding.length(encoder) > 1) {
            this.sendTo(peer, encoding.toUint8Array(encoder));
          }
          break;
        case MessageType.Awareness:
          applyAwarenessUpdate(
            this.awareness,
            decoding.readVarUint8Array(decoder),
            peer,
          );
          break;
        default:
          this.logger.warn(
            `Unknown message type ${messageType} in room ${this.name}`,
          );
      }
    } catch (error) {
      this.logger.error(
        `Failed to process message in room ${this.name}: ${toError(error).message}`,
      );
    }
  }

  private removePeer(peer: RoomPeer): void {
    const controlled = this.peers.get(peer);
    if (!controlled) {
      return;
    }
    this.peers.delete(peer);
    if (controlled.size > 0) {
      removeAwarenessStates(this.awareness, [...controlled], null);
    }
    this.logger.debug(
      `Peer left room ${this.name} (${this.peers.size} remaining)`,
    );
  }

  private sendTo(peer: RoomPeer, message: Uint8Array): void {
    try {
      peer.send(message);
    } catch (error) {
      this.logger.warn(
        `Dropping peer in room ${this.name}: ${toError(error).message}`,
      );
      this.removePeer(peer);
    }
  }

  private broadcast(message: Uint8Array): void {
    for (const peer of [...this.peers.keys()]) {
      this.sendTo(peer, message);
    }
  }

  private readonly onDocumentUpdate = (
    update: Uint8Array,
    origin: unknown,
  ): void => {
    const encoder = encoding.createEncoder();
    encoding.writeVarUint(encoder, MessageType.Sync);
    writeUpdate(encoder, update);
    this.broadcast(encoding.toUint8Array(encoder));

    if (origin !== STORE_ORIGIN) {
      void this.store.write(update).catch((error: unknown) => {
        this.logger.error(
          `Failed to persist update for room ${this.name}: ${toError(error).message}`,
        );
      });
    }
  };

  private readonly onAwarenessUpdate = (
    { added, updated, removed }: AwarenessChanges,
    origin: unknown,
  ): void => {
    for (const [peer, controlled] of this.peers) {
      if (peer === origin) {
        added.forEach((clientId) => controlled.add(clientId));
        removed.forEach((clientId) => controlled.delete(clientId));
      }
    }

    const changed = [...added, ...updated, ...removed];
    if (changed.length === 0) {
      return;
    }
    const encoder = encoding.createEncoder();
    encoding.writeVarUint(encoder, MessageType.Awareness);
    encoding.writeVarUint8Array(
      encoder,
      encodeAwarenessUpdate(this.awareness, changed),
    );
    this.broadcast(encoding.toUint8Array(encoder));
  };
}
