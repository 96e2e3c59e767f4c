import type { Writable } from 'node:stream';
import { once } from 'node:events';

import { DebugLogger } from '../debug/DebugLogger.js';
import {
  describeCloseReason,
  toError,
  ValidationError,
} from '../errors.js';
import type { SessionId } from '../types.js';
import { abortReason, ByteReader } from './byte-reader.js';
import { decodeMessage, encodeMessage } from './framer.js';
import {
  parseClientMessage,
  validateMessage,
} from './message-validation.js';
import { extractDocumentText, type MirrorFile } from './mirror-file.js';
import type { AnalysisProcess, ProcessSpawner } from './process-manager.js';

/**
 * Client side of a session as seen by the bridge. `receive` resolves `null`
 * once the client has disconnected.
 */
export interface SessionConnection {
  receive(signal: AbortSignal): Promise<string | null>;
  send(text: string): Promise<void>;
  close(code: number, reason: string): Promise<void>;
}

export type SessionState = 'connecting' | 'active' | 'closing' | 'closed';

export const CloseCode = {
  Normal: 1000,
  GoingAway: 1001,
  PolicyViolation: 1008,
  InternalError: 1011,
} as const;

type LoopName = 'inbound' | 'outbound' | 'diagnostic';

interface LoopOutcome {
  loop: LoopName;
  error?: Error;
}

interface CloseFrame {
  code: number;
  reason: string;
}

async function writeFrame(
  stream: Writable,
  frame: Buffer,
  signal: AbortSignal,
): Promise<void> {
  if (signal.aborted) {
    throw abortReason(signal);
  }
  if (stream.destroyed || !stream.writable) {
    throw new Error('Analysis process input is closed');
  }
  if (!stream.write(frame)) {
    await once(stream, 'drain', { signal });
  }
}

/**
 * Relays one client connection to its analysis process.
 *
 * Three loops run side by side: client to process stdin, process stdout to
 * client, and process stderr to the log. The first loop to finish, for any
 * reason, tears the whole session down.
 */
export class SessionBridge {
  private stateValue: SessionState = 'connecting';
  private readonly abortController = new AbortController();
  private stopRequested = false;
  private connectionClosed = false;
  private readonly logger = DebugLogger.getLogger('proofpad:session');
  private readonly analysisLogger = DebugLogger.getLogger('proofpad:analysis');

  public constructor(
    public readonly sessionId: SessionId,
    private readonly connection: SessionConnection,
    private readonly processes: ProcessSpawner,
    private readonly mirror: MirrorFile,
  ) {}

  public get state(): SessionState {
    return this.stateValue;
  }

  /**
   * Runs the session to completion. Never rejects: every failure ends in a
   * close frame on the client connection.
   */
  public async run(): Promise<void> {
    if (this.stateValue !== 'connecting') {
      return;
    }

    let child: AnalysisProcess;
    try {
      child = await this.processes.spawn(this.sessionId);
    } catch (error) {
      this.logger.error(
        `Session ${this.sessionId} could not start: ${toError(error).message}`,
      );
      this.stateValue = 'closing';
      await this.closeConnection({
        code: CloseCode.InternalError,
        reason: describeCloseReason(error),
      });
      this.stateValue = 'closed';
      return;
    }

    if (this.stopRequested) {
      this.stateValue = 'closing';
      await this.finish({ loop: 'inbound' }, []);
      return;
    }

    this.stateValue = 'active';
    this.logger.debug(`Session ${this.sessionId} active`);

    const signal = this.abortController.signal;
    const loops = [
      this.runLoop('inbound', () => this.forwardInbound(child, signal)),
      this.runLoop('outbound', () => this.forwardOutbound(child, signal)),
      this.runLoop('diagnostic', () => this.forwardDiagnostics(child, signal)),
    ];

    const first = await Promise.race(loops);
    this.stateValue = 'closing';
    this.abortController.abort();
    await this.finish(first, loops);
  }

  /** Requests teardown from outside, e.g. on server shutdown. */
  public stop(): void {
    this.stopRequested = true;
    this.abortController.abort();
  }

  private async runLoop(
    loop: LoopName,
    body: () => Promise<void>,
  ): Promise<LoopOutcome> {
    try {
      await body();
      return { loop };
    } catch (error) {
      return { loop, error: toError(error) };
    }
  }

  private async forwardInbound(
    child: AnalysisProcess,
    signal: AbortSignal,
  ): Promise<void> {
    while (true) {
      const text = await this.connection.receive(signal);
      if (text === null) {
        return;
      }

      const message = parseClientMessage(text);
      validateMessage(message);

      const documentText = extractDocumentText(message);
      if (documentText !== undefined) {
        await this.mirror.write(documentText);
      }

      await writeFrame(child.stdin, encodeMessage(message), signal);
    }
  }

  private async forwardOutbound(
    child: AnalysisProcess,
    signal: AbortSignal,
  ): Promise<void> {
    const reader = new ByteReader(child.stdout);
    while (true) {
      const message = await decodeMessage(reader, signal);
      if (message === null) {
        return;
      }
      await this.connection.send(JSON.stringify(message));
    }
  }

  private async forwardDiagnostics(
    child: AnalysisProcess,
    signal: AbortSignal,
  ): Promise<void> {
    const reader = new ByteReader(child.stderr);
    while (true) {
      const line = await reader.readLine(signal);
      if (line.length === 0) {
        return;
      }
      this.analysisLogger.log(
        `[analysis-${this.sessionId}] ${line.toString('utf8').trimEnd()}`,
      );
    }
  }

  private async finish(
    first: LoopOutcome,
    loops: Array<Promise<LoopOutcome>>,
  ): Promise<void> {
    await Promise.all(loops);

    try {
      await this.processes.kill(this.sessionId);
    } catch (error) {
      this.logger.error(
        `Failed to kill process for session ${this.sessionId}: ${toError(error).message}`,
      );
    }

    const frame = this.closeFrameFor(first);
    if (frame.code === CloseCode.Normal || frame.code === CloseCode.GoingAway) {
      this.logger.debug(
        `Session ${this.sessionId} ended by ${first.loop} loop`,
      );
    } else {
      this.logger.warn(
        `Session ${this.sessionId} aborted by ${first.loop} loop: ${frame.reason}`,
      );
    }

    await this.closeConnection(frame);
    this.stateValue = 'closed';
  }

  private closeFrameFor(outcome: LoopOutcome): CloseFrame {
    if (this.stopRequested) {
      return { code: CloseCode.GoingAway, reason: 'Server shutting down' };
    }
    if (!outcome.error) {
      return { code: CloseCode.Normal, reason: '' };
    }
    if (outcome.error instanceof ValidationError) {
      return {
        code: CloseCode.PolicyViolation,
        reason: describeCloseReason(outcome.error),
      };
    }
    return {
      code: CloseCode.InternalError,
      reason: describeCloseReason(outcome.error),
    };
  }

  private async closeConnection(frame: CloseFrame): Promise<void> {
    if (this.connectionClosed) {
      return;
    }
    this.connectionClosed = true;
    try {
      await this.connection.close(frame.code, frame.reason);
    } catch (error) {
      this.logger.debug(
        `Closing session ${this.sessionId} connection failed: ${toError(error).message}`,
      );
    }
  }
}
