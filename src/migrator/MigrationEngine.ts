/**
 * Applies and reverts registered migrations, one transaction per migration
 */

import { DatabaseConnection, TransactionError, toError } from '../database/types';
import { Logger, createLogger } from '../utils/logger';
import { FLOOR_VERSION, MigrationRegistry } from './MigrationRegistry';
import { VersionStore } from './VersionStore';
import { computePlan } from './plan';
import { InvalidTargetError, MigrationError } from './errors';
import {
  Migration,
  MigrationDirection,
  MigrationEngineOptions,
  MigrationRunResult,
  MigrationStatusEntry,
  MigrationStep
} from './types';

export class MigrationEngine {
  private readonly store: VersionStore;
  private readonly logger: Logger;
  private readonly onStep?: (step: MigrationStep) => void;

  constructor(private readonly registry: MigrationRegistry, options: MigrationEngineOptions = {}) {
    this.store = new VersionStore(options.tableName);
    this.logger = options.logger ?? createLogger('migrator');
    this.onStep = options.onStep;
  }

  getVersionStore(): VersionStore {
    return this.store;
  }

  /**
   * Bring the database to `target`. An empty target means the latest
   * registered version. Stops at the first failing step.
   */
  async migrate(connection: DatabaseConnection, target: string = ''): Promise<MigrationRunResult> {
    this.registry.assertValid();

    if (target !== '' && target < FLOOR_VERSION) {
      throw new InvalidTargetError(target, FLOOR_VERSION);
    }

    if (connection.isInTransaction()) {
      throw new TransactionError('Migrations open their own transactions; commit or roll back first');
    }

    await this.store.ensureSchema(connection);
    const current = (await this.store.currentVersion(connection)) ?? FLOOR_VERSION;

    const resolvedTarget = target === '' ? this.registry.latestVersion() : target;
    const plan = computePlan(this.registry.sortedVersions(), current, resolvedTarget);
    const result: MigrationRunResult = {
      direction: plan.direction,
      from: current,
      target: plan.target,
      plan: plan.versions,
      applied: []
    };

    if (plan.versions.length === 0) {
      this.logger.info(`Database is at ${current}, nothing to migrate`);
      return result;
    }

    this.logger.info(
      `Migrating ${plan.direction} from ${current} to ${plan.target}: ${plan.versions.length} migration(s)`
    );

    for (const [index, version] of plan.versions.entries()) {
      const migration = this.registry.get(version);
      if (!migration) {
        // plan versions come from the registry
        throw new Error(`Migration ${version} disappeared from the registry`);
      }

      await this.runStep(connection, migration, plan.direction, result.applied);
      result.applied.push(version);

      this.onStep?.({
        version,
        name: migration.name,
        direction: plan.direction,
        index,
        total: plan.versions.length
      });
    }

    this.logger.info(`Migrations complete, database is at ${plan.target}`);
    return result;
  }

  /**
   * Every registered version in ascending order with its applied state
   */
  async status(connection: DatabaseConnection): Promise<MigrationStatusEntry[]> {
    this.registry.assertValid();
    await this.store.ensureSchema(connection);

    const appliedByVersion = new Map(
      (await this.store.listApplied(connection)).map(row => [row.version, row])
    );

    return this.registry.sortedVersions().map(version => {
      const row = appliedByVersion.get(version);
      const entry: MigrationStatusEntry = {
        version,
        name: this.registry.get(version)?.name ?? '',
        applied: row !== undefined
      };
      if (row) {
        entry.appliedAt = row.createdAt;
      }
      return entry;
    });
  }

  private async runStep(
    connection: DatabaseConnection,
    migration: Migration,
    direction: MigrationDirection,
    completed: string[]
  ): Promise<void> {
    const verb = direction === 'up' ? 'Applying' : 'Reverting';
    this.logger.info(`${verb} ${migration.version} ${migration.name}`);

    try {
      await connection.beginTransaction();

      if (direction === 'up') {
        await migration.up(connection);
        await this.store.recordApplied(connection, migration.version, migration.name);
      } else {
        await migration.down(connection);
        const removed = await this.store.recordReverted(connection, migration.version);
        if (removed === 0) {
          this.logger.warn(`No versions row found for ${migration.version} while reverting`);
        }
      }

      await connection.commit();
    } catch (error) {
      const cause = toError(error);
      let rollbackError: Error | undefined;

      if (connection.isInTransaction()) {
        try {
          await connection.rollback();
        } catch (rollbackFailure) {
          rollbackError = toError(rollbackFailure);
        }
      }

      const failure = new MigrationError({
        version: migration.version,
        name: migration.name,
        direction,
        completed: [...completed],
        cause,
        rollbackError
      });
      this.logger.error(failure.message);
      throw failure;
    }
  }
}

/**
 * Render status entries as a checklist, one `[x] version name` line each
 */
export function formatStatus(entries: MigrationStatusEntry[]): string[] {
  return entries.map(entry => `[${entry.applied ? 'x' : ' '}] ${entry.version} ${entry.name}`);
}

export async function migrate(
  connection: DatabaseConnection,
  registry: MigrationRegistry,
  target: string = '',
  options: MigrationEngineOptions = {}
): Promise<MigrationRunResult> {
  return new MigrationEngine(registry, options).migrate(connection, target);
}

export async function status(
  connection: DatabaseConnection,
  registry: MigrationRegistry,
  options: MigrationEngineOptions = {}
): Promise<MigrationStatusEntry[]> {
  return new MigrationEngine(registry, options).status(connection);
}
