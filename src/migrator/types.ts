/**
 * Migration system types and interfaces
 */

import { DatabaseConnection } from '../database/types';
import { Logger } from '../utils/logger';

/**
 * Forward or reverse body of a migration. Runs inside the transaction
 * opened for it; a rejected promise fails the step.
 */
export type MigrationAction = (tx: DatabaseConnection) => Promise<void>;

export interface Migration {
  version: string;
  name: string;
  up: MigrationAction;
  down: MigrationAction;
}

export type MigrationDirection = 'up' | 'down';

/** A row of the bookkeeping table. */
export interface AppliedVersion {
  id: number;
  version: string;
  name: string;
  createdAt: Date;
}

export interface MigrationPlan {
  direction: MigrationDirection;
  /** Target after resolving the empty "latest" target. */
  target: string;
  /** Versions to run, in execution order. */
  versions: string[];
}

export interface MigrationRunResult {
  direction: MigrationDirection;
  /** Version recorded before the run; the floor sentinel when nothing was applied. */
  from: string;
  target: string;
  plan: string[];
  /** Versions whose step committed, in execution order. */
  applied: string[];
}

export interface MigrationStep {
  version: string;
  name: string;
  direction: MigrationDirection;
  index: number;
  total: number;
}

export interface MigrationStatusEntry {
  version: string;
  name: string;
  applied: boolean;
  appliedAt?: Date;
}

export interface MigrationEngineOptions {
  tableName?: string;
  logger?: Logger;
  /** Called after each step commits. */
  onStep?: (step: MigrationStep) => void;
}

export type RegistrationProblemKind =
  | 'missing-action'
  | 'duplicate-version'
  | 'empty-version'
  | 'below-floor'
  | 'registry-frozen';

export interface RegistrationProblem {
  kind: RegistrationProblemKind;
  version: string;
  message: string;
}

export type RegistrationResult =
  | { ok: true }
  | { ok: false; problems: RegistrationProblem[] };
