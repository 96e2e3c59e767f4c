import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';

import * as Y from 'yjs';

import { UpdateStoreNotFound } from '../src/errors.js';
import { STORE_ORIGIN, type UpdateStore } from '../src/rooms/update-store.js';
import type { AnalysisProcessOptions } from '../src/service/process-manager.js';
import type { SessionConnection } from '../src/service/session-bridge.js';

export const FIXTURE_PATH = fileURLToPath(
  new URL('./fixtures/fake-analysis-server.ts', import.meta.url),
);

/** Runs the fake analysis server through tsx with the given mode flags. */
export function fakeServerOptions(
  args: string[] = [],
  killGraceMs = 2_000,
): AnalysisProcessOptions {
  return {
    command: process.execPath,
    args: ['--import', 'tsx', FIXTURE_PATH, ...args],
    cwd: process.cwd(),
    killGraceMs,
  };
}

/** A bare node process that idles until signalled. */
export function idleProcessOptions(
  script = 'setInterval(() => {}, 1000)',
  killGraceMs = 2_000,
): AnalysisProcessOptions {
  return {
    command: process.execPath,
    args: ['-e', script],
    cwd: process.cwd(),
    killGraceMs,
  };
}

export async function createTempDir(prefix: string): Promise<string> {
  return await mkdtemp(join(tmpdir(), `proofpad-${prefix}-`));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export async function waitFor(
  predicate: () => boolean,
  timeoutMs = 10_000,
  intervalMs = 20,
): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) {
      throw new Error(`Condition not met within ${timeoutMs}ms`);
    }
    await new Promise((resolve) => setTimeout(resolve, intervalMs));
  }
}

type Waiter = (text: string | null) => void;

/**
 * In-memory {@link SessionConnection}: tests push client frames in and read
 * what the bridge sent back out.
 */
export class FakeSessionConnection implements SessionConnection {
  public readonly sent: string[] = [];
  public closedWith: { code: number; reason: string } | null = null;
  private readonly inbox: Array<string | null> = [];
  private readonly waiters: Waiter[] = [];

  public push(text: string): void {
    this.deliver(text);
  }

  /** Simulates the client hanging up. */
  public disconnect(): void {
    this.deliver(null);
  }

  public receive(signal: AbortSignal): Promise<string | null> {
    if (this.inbox.length > 0) {
      const next = this.inbox.shift();
      return Promise.resolve(next === undefined ? null : next);
    }
    return new Promise<string | null>((resolve, reject) => {
      const onAbort = (): void => {
        const index = this.waiters.indexOf(waiter);
        if (index >= 0) {
          this.waiters.splice(index, 1);
        }
        reject(new Error('receive aborted'));
      };
      const waiter: Waiter = (text) => {
        signal.removeEventListener('abort', onAbort);
        resolve(text);
      };
      if (signal.aborted) {
        reject(new Error('receive aborted'));
        return;
      }
      this.waiters.push(waiter);
      signal.addEventListener('abort', onAbort, { once: true });
    });
  }

  public async send(text: string): Promise<void> {
    this.sent.push(text);
  }

  public async close(code: number, reason: string): Promise<void> {
    this.closedWith = { code, reason };
  }

  /** Resolves once at least `count` frames have been sent to the client. */
  public async waitForSent(count: number, timeoutMs = 10_000): Promise<void> {
    await waitFor(() => this.sent.length >= count, timeoutMs);
  }

  private deliver(text: string | null): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(text);
      return;
    }
    this.inbox.push(text);
  }
}

/** Update store held in memory; records every append. */
export class MemoryUpdateStore implements UpdateStore {
  public readonly written: Uint8Array[] = [];
  public applyCalls = 0;

  public constructor(
    private readonly history: Uint8Array[] | null = null,
    private readonly loadDelayMs = 0,
  ) {}

  public async applyUpdates(doc: Y.Doc): Promise<void> {
    this.applyCalls += 1;
    if (this.loadDelayMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.loadDelayMs));
    }
    if (this.history === null) {
      throw new UpdateStoreNotFound('No history');
    }
    for (const update of this.history) {
      Y.applyUpdate(doc, update, STORE_ORIGIN);
    }
  }

  public async write(update: Uint8Array): Promise<void> {
    this.written.push(update);
  }

  public async flush(): Promise<void> {}
}
