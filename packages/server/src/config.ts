import { existsSync } from 'node:fs';
import { join, resolve } from 'node:path';

import * as dotenv from 'dotenv';
import yargs from 'yargs/yargs';
import { z } from 'zod';

import { ConfigError } from './errors.js';
import {
  DEFAULT_KILL_GRACE_MS,
  type AnalysisProcessOptions,
} from './service/process-manager.js';

export interface ServerConfig {
  port: number;
  host: string;
  projectDir: string;
  /** Absolute path of the mirror file the analysis process reads. */
  documentFile: string;
  dataDir: string;
  analysis: AnalysisProcessOptions;
  verbose: boolean;
}

export interface ConfigSources {
  argv?: readonly string[];
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

const serverConfigSchema = z.object({
  port: z.coerce.number().int().min(0).max(65535).default(8080),
  host: z.string().min(1).default('0.0.0.0'),
  projectDir: z.string().min(1).default('lean-project'),
  document: z.string().min(1).default('src/Scratch.lean'),
  dataDir: z.string().min(1).default('data'),
  command: z.string().min(1).default('lake'),
  args: z.array(z.string()).default(['serve']),
  killGraceMs: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_KILL_GRACE_MS),
  verbose: z.boolean().default(false),
});

function parseArguments(argv: readonly string[]) {
  return yargs([...argv])
    .locale('en')
    .scriptName('proofpad')
    .usage('$0 [options]')
    .option('port', {
      type: 'number',
      description: 'Port to listen on (default 8080)',
    })
    .option('host', {
      type: 'string',
      description: 'Host to bind to (default 0.0.0.0)',
    })
    .option('project-dir', {
      type: 'string',
      description: 'Project the analysis process serves',
    })
    .option('document', {
      type: 'string',
      description: 'Shared document path, relative to the project directory',
    })
    .option('data-dir', {
      type: 'string',
      description: 'Directory holding the per-room update logs',
    })
    .option('command', {
      type: 'string',
      description: 'Analysis process executable (default lake)',
    })
    .option('arg', {
      type: 'string',
      array: true,
      description: 'Argument for the analysis process (repeatable)',
    })
    .option('kill-grace-ms', {
      type: 'number',
      description: 'Wait after SIGTERM before SIGKILL (default 5000)',
    })
    .option('verbose', {
      type: 'boolean',
      description: 'Enable all proofpad debug namespaces',
    })
    .strict()
    .exitProcess(false)
    .fail((message, error) => {
      throw new ConfigError(error?.message ?? message);
    })
    .parseSync();
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
    .join('; ');
}

/**
 * Builds the server configuration. Command-line flags win over
 * `PROOFPAD_*` environment variables, which win over the defaults.
 */
export function loadServerConfig(sources: ConfigSources = {}): ServerConfig {
  const env = sources.env ?? process.env;
  const cwd = sources.cwd ?? process.cwd();
  const argv = parseArguments(sources.argv ?? []);

  const raw = {
    port: argv.port ?? env.PROOFPAD_PORT,
    host: argv.host ?? env.PROOFPAD_HOST,
    projectDir: argv.projectDir ?? env.PROOFPAD_PROJECT_DIR,
    document: argv.document ?? env.PROOFPAD_DOCUMENT,
    dataDir: argv.dataDir ?? env.PROOFPAD_DATA_DIR,
    command: argv.command ?? env.PROOFPAD_COMMAND,
    args: argv.arg,
    killGraceMs: argv.killGraceMs ?? env.PROOFPAD_KILL_GRACE_MS,
    verbose: argv.verbose,
  };

  const parsed = serverConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid configuration: ${formatIssues(parsed.error)}`,
    );
  }

  const config = parsed.data;
  const projectDir = resolve(cwd, config.projectDir);
  return {
    port: config.port,
    host: config.host,
    projectDir,
    documentFile: resolve(projectDir, config.document),
    dataDir: resolve(cwd, config.dataDir),
    analysis: {
      command: config.command,
      args: config.args,
      cwd: projectDir,
      killGraceMs: config.killGraceMs,
    },
    verbose: config.verbose,
  };
}

/** Loads `.env` from the working directory, if there is one. */
export function loadEnvironment(cwd: string = process.cwd()): void {
  const envPath = join(cwd, '.env');
  if (existsSync(envPath)) {
    dotenv.config({ path: envPath });
  }
}
