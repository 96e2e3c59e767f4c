import { WebSocket, type RawData } from 'ws';

import { DebugLogger } from '../debug/DebugLogger.js';
import { toError } from '../errors.js';
import type { RoomConnection } from '../rooms/doc-room.js';
import type { RoomRegistry } from '../rooms/room-registry.js';
import type { RoomName } from '../types.js';
import { rawDataToBuffer } from './session-channel.js';

const logger = DebugLogger.getLogger('proofpad:rooms');

/**
 * Serves `/yjs/:room`. Frames that arrive while the room is still loading
 * are held and delivered in order once the connection joins.
 */
export class RoomChannel {
  public constructor(private readonly registry: RoomRegistry) {}

  public async handleConnection(
    socket: WebSocket,
    roomName: RoomName,
  ): Promise<void> {
    const pending: Uint8Array[] = [];
    let connection: RoomConnection | null = null;
    let closed = false;

    socket.binaryType = 'nodebuffer';
    socket.on('message', (data: RawData) => {
      const message = new Uint8Array(rawDataToBuffer(data));
      if (connection) {
        connection.receive(message);
      } else {
        pending.push(message);
      }
    });
    socket.on('close', () => {
      closed = true;
      connection?.disconnect();
    });
    socket.on('error', (error: Error) => {
      logger.warn(`Room ${roomName} socket error: ${error.message}`);
    });

    const room = await this.registry.getOrCreateRoom(roomName);
    if (closed) {
      return;
    }

    const joined = room.addConnection({
      send: (message) => {
        if (socket.readyState !== WebSocket.OPEN) {
          throw new Error('socket is not open');
        }
        socket.send(message, (error?: Error) => {
          if (error) {
            logger.debug(
              `Send to room ${roomName} failed: ${toError(error).message}`,
            );
          }
        });
      },
    });
    connection = joined;
    for (const message of pending.splice(0)) {
      joined.receive(message);
    }
  }
}
