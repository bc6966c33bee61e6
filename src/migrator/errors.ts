import { MigrationDirection, RegistrationProblem } from './types';

export class RegistrationError extends Error {
  constructor(public readonly problems: RegistrationProblem[]) {
    super(
      problems.length === 1
        ? `Invalid migration registry: ${problems[0].message}`
        : `Invalid migration registry:\n${problems.map(problem => `  - ${problem.message}`).join('\n')}`
    );
    this.name = 'RegistrationError';
  }
}

export class InvalidTargetError extends Error {
  constructor(public readonly target: string, floor: string) {
    super(`Target version "${target}" sorts before the floor version "${floor}"`);
    this.name = 'InvalidTargetError';
  }
}

export interface MigrationErrorDetails {
  version: string;
  name: string;
  direction: MigrationDirection;
  /** Versions committed earlier in the same run. */
  completed: string[];
  cause: Error;
  rollbackError?: Error;
}

/**
 * A step of a run failed. Steps listed in `completed` stay committed;
 * the failing step was rolled back.
 */
export class MigrationError extends Error {
  readonly version: string;
  readonly migrationName: string;
  readonly direction: MigrationDirection;
  readonly completed: string[];
  readonly cause: Error;
  readonly rollbackError?: Error;

  constructor(details: MigrationErrorDetails) {
    const verb = details.direction === 'up' ? 'apply' : 'revert';
    let message = `Failed to ${verb} migration ${details.version} (${details.name}): ${details.cause.message}`;
    if (details.rollbackError) {
      message += `; rollback also failed: ${details.rollbackError.message}`;
    }

    super(message);
    this.name = 'MigrationError';
    this.version = details.version;
    this.migrationName = details.name;
    this.direction = details.direction;
    this.completed = details.completed;
    this.cause = details.cause;
    this.rollbackError = details.rollbackError;
  }
}
