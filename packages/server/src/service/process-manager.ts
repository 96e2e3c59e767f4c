import { spawn, type ChildProcessWithoutNullStreams } from 'node:child_process';

import { DebugLogger } from '../debug/DebugLogger.js';
import { SpawnError, toError } from '../errors.js';
import type { SessionId } from '../types.js';

export type AnalysisProcess = ChildProcessWithoutNullStreams;

export interface AnalysisProcessOptions {
  command: string;
  args: readonly string[];
  cwd: string;
  /** How long `kill` waits after SIGTERM before sending SIGKILL. */
  killGraceMs: number;
  env?: NodeJS.ProcessEnv;
}

/** The slice of the manager a session bridge depends on. */
export interface ProcessSpawner {
  spawn(sessionId: SessionId): Promise<AnalysisProcess>;
  kill(sessionId: SessionId): Promise<void>;
}

export const DEFAULT_KILL_GRACE_MS = 5_000;

type SessionOpQueue = Promise<void>;

export function isProcessAlive(child: AnalysisProcess): boolean {
  return child.exitCode === null && child.signalCode === null;
}

function waitForExit(child: AnalysisProcess): Promise<void> {
  if (!isProcessAlive(child)) {
    return Promise.resolve();
  }
  return new Promise<void>((resolve) => {
    child.once('exit', () => resolve());
  });
}

async function exitsWithin(
  exited: Promise<void>,
  timeoutMs: number,
): Promise<boolean> {
  let timer: NodeJS.Timeout | undefined;
  const timedOut = new Promise<boolean>((resolve) => {
    timer = setTimeout(() => resolve(false), timeoutMs);
  });
  try {
    return await Promise.race([exited.then(() => true), timedOut]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Owns one analysis process per session id. Every operation on a given id
 * runs through that id's queue, so concurrent callers never race each other
 * into spawning a second process.
 */
export class AnalysisProcessManager implements ProcessSpawner {
  private readonly processes = new Map<SessionId, AnalysisProcess>();
  private readonly opQueues = new Map<SessionId, SessionOpQueue>();
  private readonly logger = DebugLogger.getLogger('proofpad:process');

  public constructor(private readonly options: AnalysisProcessOptions) {}

  public get size(): number {
    return this.processes.size;
  }

  public has(sessionId: SessionId): boolean {
    return this.processes.has(sessionId);
  }

  public get(sessionId: SessionId): AnalysisProcess | undefined {
    return this.processes.get(sessionId);
  }

  public async spawn(sessionId: SessionId): Promise<AnalysisProcess> {
    return await this.enqueueSessionOp(sessionId, async () => {
      const existing = this.processes.get(sessionId);
      if (existing) {
        if (isProcessAlive(existing)) {
          return existing;
        }
        this.processes.delete(sessionId);
      }

      const child = await this.startProcess(sessionId);
      this.processes.set(sessionId, child);
      this.logger.log(
        `Spawned ${this.options.command} for session ${sessionId} (pid=${String(child.pid)})`,
      );
      return child;
    });
  }

  public async kill(sessionId: SessionId): Promise<void> {
    await this.enqueueSessionOp(sessionId, async () => {
      const child = this.processes.get(sessionId);
      this.processes.delete(sessionId);
      if (!child || !isProcessAlive(child)) {
        return;
      }

      const exited = waitForExit(child);
      child.kill('SIGTERM');
      const graceful = await exitsWithin(exited, this.options.killGraceMs);
      if (!graceful) {
        this.logger.warn(
          `Session ${sessionId} did not exit within ${this.options.killGraceMs}ms, sending SIGKILL`,
        );
        child.kill('SIGKILL');
        await exited;
      }
      this.logger.log(`Killed ${this.options.command} for session ${sessionId}`);
    });
  }

  public async killAll(): Promise<void> {
    await Promise.all(
      [...this.processes.keys()].map((sessionId) => this.kill(sessionId)),
    );
  }

  private async startProcess(sessionId: SessionId): Promise<AnalysisProcess> {
    const child = spawn(this.options.command, [...this.options.args], {
      cwd: this.options.cwd,
      env: this.options.env ?? process.env,
      stdio: ['pipe', 'pipe', 'pipe'],
    });

    await new Promise<void>((resolve, reject) => {
      const onSpawn = (): void => {
        child.off('error', onError);
        resolve();
      };
      const onError = (error: Error): void => {
        child.off('spawn', onSpawn);
        reject(
          new SpawnError(
            `Failed to spawn '${this.options.command}' for session ${sessionId}: ${error.message}`,
            { cause: error },
          ),
        );
      };
      child.once('spawn', onSpawn);
      child.once('error', onError);
    });

    child.on('error', (error: Error) => {
      this.logger.error(
        `Process error for session ${sessionId}: ${error.message}`,
      );
    });
    // Writes racing a dying process surface as EPIPE here, not as a crash.
    child.stdin.on('error', (error: unknown) => {
      this.logger.debug(
        `stdin closed for session ${sessionId}: ${toError(error).message}`,
      );
    });

    return child;
  }

  private async enqueueSessionOp<T>(
    sessionId: SessionId,
    operation: () => Promise<T>,
  ): Promise<T> {
    const previous = this.opQueues.get(sessionId) ?? Promise.resolve();
    let release = (): void => {};
    const next = new Promise<void>((resolveRelease) => {
      release = resolveRelease;
    });

    const queued = previous.then(() => next);
    this.opQueues.set(sessionId, queued);

    await previous;
    try {
      return await operation();
    } finally {
      release();
      if (this.opQueues.get(sessionId) === queued) {
        this.opQueues.delete(sessionId);
      }
    }
  }
}
