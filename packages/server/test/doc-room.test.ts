import * as decoding from 'lib0/decoding';
import * as encoding from 'lib0/encoding';
import { afterEach, describe, expect, it } from 'vitest';
import {
  Awareness,
  encodeAwarenessUpdate,
} from 'y-protocols/awareness';
import {
  messageYjsSyncStep1,
  messageYjsUpdate,
  writeUpdate,
} from 'y-protocols/sync';
import * as Y from 'yjs';

import { DocRoom, MessageType, type RoomPeer } from '../src/rooms/doc-room.js';
import { MemoryUpdateStore } from './helpers.js';

class RecordingPeer implements RoomPeer {
  public readonly messages: Uint8Array[] = [];

  public send(message: Uint8Array): void {
    this.messages.push(message);
  }
}

function header(message: Uint8Array): [number, number] {
  const decoder = decoding.createDecoder(message);
  const messageType = decoding.readVarUint(decoder);
  return [messageType, decoding.readVarUint(decoder)];
}

function updateMessage(update: Uint8Array): Uint8Array {
  const encoder = encoding.createEncoder();
  encoding.writeVarUint(encoder, MessageType.Sync);
  writeUpdate(encoder, update);
  return encoding.toUint8Array(encoder);
}

function clientUpdate(text: string): Uint8Array {
  const doc = new Y.Doc();
  doc.getText('content').insert(0, text);
  return Y.encodeStateAsUpdate(doc);
}

const rooms: DocRoom[] = [];
const awarenesses: Awareness[] = [];

function createRoom(store = new MemoryUpdateStore()): DocRoom {
  const room = new DocRoom('main', store);
  room.start();
  rooms.push(room);
  return room;
}

afterEach(async () => {
  await Promise.all(rooms.map((room) => room.stop()));
  rooms.length = 0;
  awarenesses.forEach((awareness) => awareness.destroy());
  awarenesses.length = 0;
});

describe('DocRoom', () => {
  it('greets a new peer with sync step 1', () => {
    const room = createRoom();
    const peer = new RecordingPeer();

    room.addConnection(peer);

    expect(peer.messages).toHaveLength(1);
    expect(header(peer.messages[0])).toEqual([
      MessageType.Sync,
      messageYjsSyncStep1,
    ]);
    expect(room.connectionCount).toBe(1);
  });

  it('answers sync step 1 with sync step 2', () => {
    const room = createRoom();
    room.doc.getText('content').insert(0, 'server text');
    const peer = new RecordingPeer();
    const connection = room.addConnection(peer);

    const client = new Y.Doc();
    const encoder = encoding.createEncoder();
    encoding.writeVarUint(encoder, MessageType.Sync);
    encoding.writeVarUint(encoder, messageYjsSyncStep1);
    encoding.writeVarUint8Array(encoder, Y.encodeStateVector(client));
    connection.receive(encoding.toUint8Array(encoder));

    expect(peer.messages).toHaveLength(2);
    const decoder = decoding.createDecoder(peer.messages[1]);
    expect(decoding.readVarUint(decoder)).toBe(MessageType.Sync);
    decoding.readVarUint(decoder);
    Y.applyUpdate(client, decoding.readVarUint8Array(decoder));
    expect(client.getText('content').toString()).toBe('server text');
  });

  it('applies, broadcasts and persists a client update', () => {
    const store = new MemoryUpdateStore();
    const room = createRoom(store);
    const author = new RecordingPeer();
    const watcher = new RecordingPeer();
    const authorConnection = room.addConnection(author);
    room.addConnection(watcher);

    authorConnection.receive(updateMessage(clientUpdate('by p1')));

    expect(room.doc.getText('content').toString()).toBe('by p1');
    expect(store.written).toHaveLength(1);
    expect(watcher.messages).toHaveLength(2);
    expect(header(watcher.messages[1])).toEqual([
      MessageType.Sync,
      messageYjsUpdate,
    ]);
  });

  it('ignores messages from a disconnected peer', () => {
    const room = createRoom();
    const connection = room.addConnection(new RecordingPeer());

    connection.disconnect();
    connection.receive(updateMessage(clientUpdate('late')));

    expect(room.connectionCount).toBe(0);
    expect(room.doc.getText('content').toString()).toBe('');
  });

  it('survives a malformed message', () => {
    const room = createRoom();
    const peer = new RecordingPeer();
    const connection = room.addConnection(peer);

    connection.receive(new Uint8Array([MessageType.Sync, 9, 9]));

    expect(room.connectionCount).toBe(1);
  });

  it('drops a peer whose send fails', () => {
    const room = createRoom();
    const broken: RoomPeer = {
      send: () => {
        throw new Error('socket is not open');
      },
    };

    room.addConnection(broken);

    expect(room.connectionCount).toBe(0);
  });

  it('removes the awareness states a peer controlled when it leaves', () => {
    const room = createRoom();
    const peer = new RecordingPeer();
    const connection = room.addConnection(peer);

    const clientDoc = new Y.Doc();
    const clientAwareness = new Awareness(clientDoc);
    awarenesses.push(clientAwareness);
    clientAwareness.setLocalState({ user: 'p1' });

    const encoder = encoding.createEncoder();
    encoding.writeVarUint(encoder, MessageType.Awareness);
    encoding.writeVarUint8Array(
      encoder,
      encodeAwarenessUpdate(clientAwareness, [clientDoc.clientID]),
    );
    connection.receive(encoding.toUint8Array(encoder));

    expect(room.awareness.getStates().get(clientDoc.clientID)).toEqual({
      user: 'p1',
    });

    connection.disconnect();

    expect(room.awareness.getStates().has(clientDoc.clientID)).toBe(false);
  });

  it('sends known awareness states to a joining peer', () => {
    const room = createRoom();
    const first = room.addConnection(new RecordingPeer());
    const clientDoc = new Y.Doc();
    const clientAwareness = new Awareness(clientDoc);
    awarenesses.push(clientAwareness);
    clientAwareness.setLocalState({ user: 'p1' });
    const encoder = encoding.createEncoder();
    encoding.writeVarUint(encoder, MessageType.Awareness);
    encoding.writeVarUint8Array(
      encoder,
      encodeAwarenessUpdate(clientAwareness, [clientDoc.clientID]),
    );
    first.receive(encoding.toUint8Array(encoder));

    const late = new RecordingPeer();
    room.addConnection(late);

    expect(late.messages).toHaveLength(2);
    expect(header(late.messages[1])[0]).toBe(MessageType.Awareness);
  });
});
