import { createServer, type IncomingMessage, type Server } from 'node:http';
import type { AddressInfo } from 'node:net';
import type { Duplex } from 'node:stream';

import express from 'express';
import { WebSocketServer, type WebSocket } from 'ws';

import {
  createDocumentMetadata,
  createMetadataRouter,
} from './channels/metadata-route.js';
import { RoomChannel } from './channels/room-channel.js';
import { SessionChannel } from './channels/session-channel.js';
import type { ServerConfig } from './config.js';
import { DebugLogger } from './debug/DebugLogger.js';
import { toError } from './errors.js';
import { RoomRegistry } from './rooms/room-registry.js';
import {
  FileUpdateStore,
  type UpdateStoreFactory,
} from './rooms/update-store.js';
import { MirrorFile } from './service/mirror-file.js';
import { AnalysisProcessManager } from './service/process-manager.js';
import type { DocumentMetadata, RoomName, SessionId } from './types.js';

export type ConnectionRoute =
  | { kind: 'room'; room: RoomName }
  | { kind: 'session'; sessionId: SessionId };

const ROUTE_PATTERN = /^\/(yjs|lsp)\/([^/]+)\/?$/;

/** Maps an upgrade request path to a room or session connection. */
export function matchConnectionRoute(
  url: string | undefined,
): ConnectionRoute | null {
  const pathname = new URL(url ?? '/', 'http://localhost').pathname;
  const match = ROUTE_PATTERN.exec(pathname);
  if (!match) {
    return null;
  }

  let parameter: string;
  try {
    parameter = decodeURIComponent(match[2]);
  } catch {
    return null;
  }
  if (parameter.length === 0) {
    return null;
  }

  return match[1] === 'yjs'
    ? { kind: 'room', room: parameter }
    : { kind: 'session', sessionId: parameter };
}

export interface ProofpadServerDeps {
  processes?: AnalysisProcessManager;
  createStore?: UpdateStoreFactory;
}

export class ProofpadServer {
  public readonly metadata: DocumentMetadata;
  public readonly processes: AnalysisProcessManager;
  public readonly rooms: RoomRegistry;
  private readonly sessions: SessionChannel;
  private readonly roomChannel: RoomChannel;
  private readonly httpServer: Server;
  private readonly wss = new WebSocketServer({ noServer: true });
  private readonly logger = DebugLogger.getLogger('proofpad:server');
  private closing: Promise<void> | null = null;

  public constructor(
    private readonly config: ServerConfig,
    deps: ProofpadServerDeps = {},
  ) {
    this.metadata = createDocumentMetadata(
      config.documentFile,
      config.projectDir,
    );
    this.processes =
      deps.processes ?? new AnalysisProcessManager(config.analysis);
    this.rooms = new RoomRegistry(
      deps.createStore ??
        ((name) => FileUpdateStore.forRoom(config.dataDir, name)),
    );
    this.sessions = new SessionChannel({
      processes: this.processes,
      mirror: new MirrorFile(config.documentFile),
    });
    this.roomChannel = new RoomChannel(this.rooms);

    const app = express();
    app.disable('x-powered-by');
    app.use(createMetadataRouter(this.metadata));

    this.httpServer = createServer(app);
    this.httpServer.on('upgrade', (request, socket, head) => {
      this.handleUpgrade(request, socket, head);
    });
  }

  public get activeSessions(): number {
    return this.sessions.activeSessions;
  }

  public listen(
    port: number = this.config.port,
    host: string = this.config.host,
  ): Promise<AddressInfo> {
    return new Promise<AddressInfo>((resolve, reject) => {
      const onError = (error: Error): void => {
        reject(error);
      };
      this.httpServer.once('error', onError);
      this.httpServer.listen(port, host, () => {
        this.httpServer.off('error', onError);
        const address = this.httpServer.address();
        if (address === null || typeof address === 'string') {
          reject(new Error('Server is not listening on a TCP port'));
          return;
        }
        resolve(address);
      });
    });
  }

  /** Stops every session, closes every socket, and kills every process. */
  public close(): Promise<void> {
    if (!this.closing) {
      this.closing = this.shutdown();
    }
    return this.closing;
  }

  private async shutdown(): Promise<void> {
    await this.sessions.stopAll();

    for (const client of this.wss.clients) {
      client.close(1001, 'Server shutting down');
    }
    await new Promise<void>((resolve) => {
      this.wss.close(() => resolve());
    });

    await new Promise<void>((resolve, reject) => {
      if (!this.httpServer.listening) {
        resolve();
        return;
      }
      this.httpServer.closeAllConnections();
      this.httpServer.close((error) => (error ? reject(error) : resolve()));
    });

    await this.processes.killAll();
    await this.rooms.close();
  }

  private handleUpgrade(
    request: IncomingMessage,
    socket: Duplex,
    head: Buffer,
  ): void {
    const route = matchConnectionRoute(request.url);
    if (!route || this.closing) {
      socket.write('HTTP/1.1 404 Not Found\r\nConnection: close\r\n\r\n');
      socket.destroy();
      return;
    }

    this.wss.handleUpgrade(request, socket, head, (ws: WebSocket) => {
      this.dispatch(ws, route);
    });
  }

  private dispatch(ws: WebSocket, route: ConnectionRoute): void {
    if (route.kind === 'session') {
      this.logger.debug(`Session connection ${route.sessionId}`);
      this.sessions.handleConnection(ws, route.sessionId);
      return;
    }

    this.logger.debug(`Room connection ${route.room}`);
    void this.roomChannel
      .handleConnection(ws, route.room)
      .catch((error: unknown) => {
        this.logger.error(
          `Room ${route.room} connection failed: ${toError(error).message}`,
        );
        ws.close(1011, 'Room unavailable');
      });
  }
}

export const createProofpadServer = (
  config: ServerConfig,
  deps?: ProofpadServerDeps,
): ProofpadServer => new ProofpadServer(config, deps);
