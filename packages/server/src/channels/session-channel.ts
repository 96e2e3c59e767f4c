import { WebSocket, type RawData } from 'ws';

import { DebugLogger } from '../debug/DebugLogger.js';
import { toError } from '../errors.js';
import { abortReason } from '../service/byte-reader.js';
import type { MirrorFile } from '../service/mirror-file.js';
import type { ProcessSpawner } from '../service/process-manager.js';
import {
  SessionBridge,
  type SessionConnection,
} from '../service/session-bridge.js';
import type { SessionId } from '../types.js';

const logger = DebugLogger.getLogger('proofpad:session');

export function rawDataToBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) {
    return data;
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data);
  }
  return Buffer.from(data);
}

type Waiter = (text: string | null) => void;

/**
 * Adapts a `ws` socket to the pull-style {@link SessionConnection} the bridge
 * reads from. Frames that arrive while nobody is waiting are queued in order.
 */
export class WebSocketSessionConnection implements SessionConnection {
  private readonly queue: string[] = [];
  private readonly waiters = new Set<Waiter>();
  private closed = false;

  public constructor(private readonly socket: WebSocket) {
    socket.on('message', (data: RawData) => {
      const text = rawDataToBuffer(data).toString('utf8');
      const [waiter] = this.waiters;
      if (waiter) {
        this.waiters.delete(waiter);
        waiter(text);
        return;
      }
      this.queue.push(text);
    });
    socket.on('close', () => {
      this.markClosed();
    });
    socket.on('error', (error: Error) => {
      logger.warn(`Session socket error: ${error.message}`);
      this.markClosed();
    });
  }

  public receive(signal: AbortSignal): Promise<string | null> {
    const queued = this.queue.shift();
    if (queued !== undefined) {
      return Promise.resolve(queued);
    }
    if (this.closed) {
      return Promise.resolve(null);
    }

    return new Promise<string | null>((resolve, reject) => {
      if (signal.aborted) {
        reject(abortReason(signal));
        return;
      }

      const onAbort = (): void => {
        this.waiters.delete(waiter);
        reject(abortReason(signal));
      };
      const waiter: Waiter = (text) => {
        signal.removeEventListener('abort', onAbort);
        resolve(text);
      };

      this.waiters.add(waiter);
      signal.addEventListener('abort', onAbort, { once: true });
    });
  }

  public send(text: string): Promise<void> {
    if (this.socket.readyState !== WebSocket.OPEN) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve, reject) => {
      this.socket.send(text, (error?: Error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });
  }

  public async close(code: number, reason: string): Promise<void> {
    if (
      this.socket.readyState === WebSocket.CLOSED ||
      this.socket.readyState === WebSocket.CLOSING
    ) {
      return;
    }
    this.socket.close(code, reason);
  }

  private markClosed(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    for (const waiter of this.waiters) {
      waiter(null);
    }
    this.waiters.clear();
  }
}

export interface SessionChannelDeps {
  processes: ProcessSpawner;
  mirror: MirrorFile;
}

/**
 * Serves `/lsp/:sessionId`. Tracks running bridges so the server can stop
 * them on shutdown.
 */
export class SessionChannel {
  private readonly bridges = new Map<SessionBridge, Promise<void>>();

  public constructor(private readonly deps: SessionChannelDeps) {}

  public get activeSessions(): number {
    return this.bridges.size;
  }

  public handleConnection(socket: WebSocket, sessionId: SessionId): void {
    const bridge = new SessionBridge(
      sessionId,
      new WebSocketSessionConnection(socket),
      this.deps.processes,
      this.deps.mirror,
    );

    const running = bridge
      .run()
      .catch((error: unknown) => {
        logger.error(
          `Session ${sessionId} bridge failed: ${toError(error).message}`,
        );
      })
      .finally(() => {
        this.bridges.delete(bridge);
      });
    this.bridges.set(bridge, running);
  }

  public async stopAll(): Promise<void> {
    const running = [...this.bridges.entries()];
    for (const [bridge] of running) {
      bridge.stop();
    }
    await Promise.all(running.map(([, done]) => done));
  }
}
