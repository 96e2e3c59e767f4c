import { DebugLogger } from '../debug/DebugLogger.js';
import { RoomLoadError, toError, UpdateStoreNotFound } from '../errors.js';
import type { RoomName } from '../types.js';
import { DocRoom } from './doc-room.js';
import type { UpdateStoreFactory } from './update-store.js';

/**
 * Maps room names to shared rooms. A room is created on first request and
 * lives for the lifetime of the registry.
 *
 * Creation is a synchronous check-then-insert, so it cannot interleave with
 * another caller on the event loop. History replay happens once per room:
 * concurrent first callers share one in-flight load.
 */
export class RoomRegistry {
  private readonly rooms = new Map<RoomName, DocRoom>();
  private readonly loads = new Map<RoomName, Promise<void>>();
  private readonly logger = DebugLogger.getLogger('proofpad:rooms');

  public constructor(private readonly createStore: UpdateStoreFactory) {}

  public get size(): number {
    return this.rooms.size;
  }

  public has(name: RoomName): boolean {
    return this.rooms.has(name);
  }

  public async getOrCreateRoom(name: RoomName): Promise<DocRoom> {
    let room = this.rooms.get(name);
    if (!room) {
      room = new DocRoom(name, this.createStore(name));
      this.rooms.set(name, room);
      this.logger.debug(`Created room ${name}`);
    }

    room.start();

    if (!room.ready) {
      await this.ensureLoaded(room);
    }
    return room;
  }

  public async close(): Promise<void> {
    await Promise.all([...this.loads.values()]);
    await Promise.all([...this.rooms.values()].map((room) => room.stop()));
  }

  private ensureLoaded(room: DocRoom): Promise<void> {
    const inFlight = this.loads.get(room.name);
    if (inFlight) {
      return inFlight;
    }

    const load = (async () => {
      try {
        await room.store.applyUpdates(room.doc);
        this.logger.debug(`Replayed history for room ${room.name}`);
      } catch (error) {
        if (error instanceof UpdateStoreNotFound) {
          this.logger.debug(`No history yet for room ${room.name}`);
        } else {
          const failure =
            error instanceof RoomLoadError
              ? error
              : new RoomLoadError(
                  `Failed to load room ${room.name}: ${toError(error).message}`,
                  { cause: error },
                );
          room.loadError = failure;
          this.logger.error(
            `${failure.message}; room ${room.name} continues without it`,
          );
        }
      } finally {
        room.ready = true;
        this.loads.delete(room.name);
      }
    })();

    this.loads.set(room.name, load);
    return load;
  }
}
