#!/usr/bin/env node
import { realpathSync } from 'node:fs';
import { mkdir } from 'node:fs/promises';
import { stderr } from 'node:process';
import { fileURLToPath, pathToFileURL } from 'node:url';

import {
  loadEnvironment,
  loadServerConfig,
  type ServerConfig,
} from './config.js';
import { DebugLogger } from './debug/DebugLogger.js';
import { toError } from './errors.js';
import { createProofpadServer } from './server.js';

const logger = DebugLogger.getLogger('proofpad:server');

export function describeEndpoints(
  config: ServerConfig,
  port: number,
): string[] {
  const host = config.host;
  return [
    `Project dir:   ${config.projectDir}`,
    `Server:        http://${host}:${port}`,
    `Room socket:   ws://${host}:${port}/yjs/{room}`,
    `Session socket: ws://${host}:${port}/lsp/{sessionId}`,
  ];
}

export async function main(argv: readonly string[]): Promise<void> {
  loadEnvironment();
  const config = loadServerConfig({ argv });
  const debugNamespaces = config.verbose
    ? 'proofpad:*'
    : process.env.PROOFPAD_DEBUG;
  if (debugNamespaces) {
    DebugLogger.enable(debugNamespaces);
  }

  await mkdir(config.dataDir, { recursive: true });

  const server = createProofpadServer(config);
  const address = await server.listen();
  for (const line of describeEndpoints(config, address.port)) {
    stderr.write(`${line}\n`);
  }

  let shuttingDown = false;
  const shutdown = async (): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;

    try {
      await server.close();
    } catch (error) {
      logger.error(`Shutdown failed: ${toError(error).message}`);
    }
    process.exit(0);
  };

  process.on('SIGTERM', () => {
    void shutdown();
  });

  process.on('SIGINT', () => {
    void shutdown();
  });

  process.on('unhandledRejection', (error) => {
    logger.error(`Unhandled rejection: ${String(error)}`);
  });
}

/**
 * True when `argvEntry` resolves to the file at `moduleUrl`. Both sides go
 * through the real path so a symlinked bin still matches.
 */
export function isMainModule(
  argvEntry: string | undefined,
  moduleUrl: string,
): boolean {
  if (!argvEntry || !moduleUrl.startsWith('file://')) {
    return false;
  }

  try {
    return (
      pathToFileURL(realpathSync(argvEntry)).href ===
      pathToFileURL(realpathSync(fileURLToPath(moduleUrl))).href
    );
  } catch (error) {
    logger.debug(
      () => `Not an entry point ${argvEntry}: ${toError(error).message}`,
    );
    return false;
  }
}

if (isMainModule(process.argv[1], import.meta.url)) {
  void main(process.argv.slice(2)).catch((error) => {
    stderr.write(`Fatal error in proofpad server: ${String(error)}\n`);
    process.exit(1);
  });
}
