#!/usr/bin/env node

/**
 * Command-line entry: move a database to a version, or print status
 */

import * as dotenv from 'dotenv';
import * as path from 'path';
import { ConnectionFactory } from '../database/ConnectionFactory';
import { getMigratorSettings, Environment } from '../config/database';
import { ConsoleLogger, Logger } from '../utils/logger';
import { MigrationEngine, formatStatus } from '../migrator/MigrationEngine';
import { MigrationRegistry } from '../migrator/MigrationRegistry';
import { toError } from '../database/types';

export type CliCommand =
  | { command: 'to'; target: string; migrationsModule?: string }
  | { command: 'status'; migrationsModule?: string }
  | { command: 'help' };

export interface CliOutput {
  out(line: string): void;
  err(line: string): void;
}

export interface CliDependencies {
  env?: Environment;
  output?: CliOutput;
  logger?: Logger;
  cwd?: string;
}

type MigrationsModule = {
  registerMigrations: (registry: MigrationRegistry) => void | Promise<void>;
};

export const USAGE = `Usage: migrate <command> [target] [--migrations <module>]

Commands:
  to [target]   Apply or revert migrations until the database is at
                target (latest when omitted)
  status        List registered migrations and whether they are applied
  help          Show this message

The migrations module exports registerMigrations(registry). It is read
from --migrations or the MIGRATIONS_MODULE environment variable.`;

export function parseArgs(argv: string[]): CliCommand {
  const positional: string[] = [];
  let migrationsModule: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--migrations' || arg === '-m') {
      migrationsModule = argv[i + 1];
      if (migrationsModule === undefined) {
        throw new Error(`${arg} requires a module path`);
      }
      i++;
    } else if (arg.startsWith('--migrations=')) {
      migrationsModule = arg.slice('--migrations='.length);
    } else if (arg === '--help' || arg === '-h') {
      return { command: 'help' };
    } else {
      positional.push(arg);
    }
  }

  const [command, target, ...extra] = positional;
  switch (command) {
    case 'to':
      if (extra.length > 0) {
        throw new Error(`Unexpected arguments: ${extra.join(' ')}`);
      }
      return { command: 'to', target: target ?? '', migrationsModule };
    case 'status':
      if (target !== undefined) {
        throw new Error(`Unexpected arguments: ${positional.slice(1).join(' ')}`);
      }
      return { command: 'status', migrationsModule };
    case 'help':
    case undefined:
      return { command: 'help' };
    default:
      throw new Error(`Unknown command: ${command}`);
  }
}

function isMigrationsModule(value: unknown): value is MigrationsModule {
  return (
    typeof value === 'object' &&
    value !== null &&
    'registerMigrations' in value &&
    typeof value.registerMigrations === 'function'
  );
}

/**
 * Load the host module and let it register its migrations
 */
export async function loadMigrations(modulePath: string, cwd: string = process.cwd()): Promise<MigrationRegistry> {
  const resolved = path.resolve(cwd, modulePath);
  const loaded: unknown = await import(resolved);

  if (!isMigrationsModule(loaded)) {
    throw new Error(`${modulePath} does not export registerMigrations(registry)`);
  }

  const registry = new MigrationRegistry();
  await loaded.registerMigrations(registry);
  return registry.freeze();
}

const processOutput: CliOutput = {
  out: line => process.stdout.write(`${line}\n`),
  err: line => process.stderr.write(`${line}\n`)
};

export async function runCli(argv: string[], deps: CliDependencies = {}): Promise<number> {
  const env = deps.env ?? process.env;
  const output = deps.output ?? processOutput;

  let command: CliCommand;
  try {
    command = parseArgs(argv);
  } catch (error) {
    output.err(toError(error).message);
    output.err(USAGE);
    return 1;
  }

  if (command.command === 'help') {
    output.out(USAGE);
    return 0;
  }

  const factory = ConnectionFactory.getInstance();

  try {
    const settings = getMigratorSettings(env);
    const logger = deps.logger ?? new ConsoleLogger('migrator', settings.logLevel);
    const migrationsModule = command.migrationsModule ?? settings.migrationsModule;
    if (!migrationsModule) {
      throw new Error('No migrations module given; pass --migrations or set MIGRATIONS_MODULE');
    }

    const registry = await loadMigrations(migrationsModule, deps.cwd);
    const validation = registry.validate();
    if (!validation.ok) {
      validation.problems.forEach(problem => output.err(problem.message));
      return 1;
    }

    const engine = new MigrationEngine(registry, { tableName: settings.tableName, logger });
    const pool = await factory.createPool(settings.database);

    try {
      const connection = await pool.acquire();
      try {
        if (command.command === 'status') {
          formatStatus(await engine.status(connection)).forEach(line => output.out(line));
        } else {
          const result = await engine.migrate(connection, command.target);
          if (result.applied.length === 0) {
            output.out(`Already at ${result.target}`);
          } else {
            const verb = result.direction === 'up' ? 'Applied' : 'Reverted';
            output.out(`${verb}: ${result.applied.join(', ')}`);
          }
        }
      } finally {
        await pool.release(connection);
      }
    } finally {
      await factory.closePool(settings.database);
    }

    return 0;
  } catch (error) {
    output.err(toError(error).message);
    return 1;
  }
}

if (require.main === module) {
  dotenv.config();
  runCli(process.argv.slice(2))
    .then(code => process.exit(code))
    .catch(error => {
      console.error(error);
      process.exit(1);
    });
}
