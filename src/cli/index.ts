import { resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import { parseArgs } from 'node:util';
import { type ConnectionDescriptor, describeTarget } from '../config/descriptor.js';
import { loadDescriptorFromEnv } from '../config/env.js';
import { ConfigurationError, describeCause } from '../errors.js';
import { AsyncSessionManager } from '../session/manager.js';
import type { MaybePromise } from '../types/index.js';

/** Default export of a module passed to `bootstrap --setup`. */
export type SetupFunction = (manager: AsyncSessionManager) => MaybePromise<void>;

export interface CliOutput {
  log(line: string): void;
  error(line: string): void;
}

export interface CliContext {
  env?: Record<string, string | undefined>;
  output?: CliOutput;
  createManager?: (descriptor: ConnectionDescriptor) => AsyncSessionManager;
  loadSetup?: (path: string) => Promise<SetupFunction>;
}

interface CommandOptions {
  database: string;
  tenantId?: string;
  setup?: string;
}

const HELP = `
db-session - Tenant-aware database bootstrap CLI

Usage: db-session <command> [options]

Commands:
  check        Connect (with retry) and report the resolved target; runs no hooks
  bootstrap    Run precreate hooks, schema creation and postcreate hooks

Options:
  --database, -d   Logical database name (required)
  --tenant, -t     Tenant id
  --setup          Module whose default export registers hooks and schemas
  --help           Show this help message

Connection settings are read from DB_* environment variables.

Examples:
  db-session check --database orders
  db-session bootstrap --database orders --tenant acme --setup ./dist/db-setup.js
`;

export async function loadSetupModule(path: string): Promise<SetupFunction> {
  const mod: unknown = await import(pathToFileURL(resolve(path)).href);
  if (typeof mod !== 'object' || mod === null || !('default' in mod) || typeof mod.default !== 'function') {
    throw new ConfigurationError(`Setup module ${path} must export a default function`);
  }
  const setup = mod.default;
  return async (manager) => {
    await setup(manager);
  };
}

export async function checkConnection(
  manager: AsyncSessionManager,
  options: CommandOptions,
  output: CliOutput
): Promise<void> {
  const resolvedName = await manager.verifyConnection(options.database, { tenantId: options.tenantId });
  output.log(`Connected to ${describeTarget(manager.descriptor, resolvedName)}`);
}

export async function bootstrapDatabase(
  manager: AsyncSessionManager,
  options: CommandOptions,
  output: CliOutput,
  loadSetup: (path: string) => Promise<SetupFunction> = loadSetupModule
): Promise<void> {
  if (options.setup) {
    const setup = await loadSetup(options.setup);
    await setup(manager);
  }

  const engine = await manager.getEngine(options.database, { tenantId: options.tenantId });
  await manager.releaseEngine(engine);
  const hooks = manager.hooks.count(options.database);
  output.log(
    `Bootstrapped ${describeTarget(manager.descriptor, engine.database)} (${hooks} hook${hooks === 1 ? '' : 's'})`
  );
}

function parseCommandOptions(args: string[]): CommandOptions {
  const { values } = parseArgs({
    args,
    options: {
      database: { type: 'string', short: 'd' },
      tenant: { type: 'string', short: 't' },
      setup: { type: 'string' },
    },
  });

  if (!values.database) {
    throw new ConfigurationError('Missing required option --database');
  }
  return { database: values.database, tenantId: values.tenant, setup: values.setup };
}

const COMMANDS = ['check', 'bootstrap'] as const;

type Command = (typeof COMMANDS)[number];

function isCommand(name: string): name is Command {
  return COMMANDS.some((command) => command === name);
}

/**
 * Runs one CLI invocation and returns the process exit code.
 */
export async function runCli(argv: string[], context: CliContext = {}): Promise<number> {
  const output = context.output ?? { log: console.log, error: console.error };
  const [command, ...rest] = argv;

  if (command === undefined || command === '--help' || command === '-h') {
    output.log(HELP);
    return 0;
  }

  if (!isCommand(command)) {
    output.error(`Unknown command: ${command}`);
    output.log(HELP);
    return 1;
  }

  let manager: AsyncSessionManager | undefined;
  let exitCode = 0;
  try {
    const options = parseCommandOptions(rest);
    const descriptor = loadDescriptorFromEnv(context.env ?? process.env);
    manager = context.createManager?.(descriptor) ?? new AsyncSessionManager(descriptor);

    if (command === 'check') {
      await checkConnection(manager, options, output);
    } else {
      await bootstrapDatabase(manager, options, output, context.loadSetup);
    }
  } catch (error) {
    output.error(`Error: ${describeCause(error)}`);
    exitCode = 1;
  }

  if (manager) {
    try {
      await manager.dispose();
    } catch (error) {
      output.error(`Error while disposing engines: ${describeCause(error)}`);
      exitCode = 1;
    }
  }
  return exitCode;
}
