/**
 * In-memory registry of migrations keyed by version.
 *
 * Versions are ordered by plain string comparison, so the naming scheme
 * must sort lexicographically in the intended order. Fixed-width UTC
 * timestamps such as `20200101T000000Z` do.
 */

import { Migration, MigrationAction, RegistrationProblem, RegistrationResult } from './types';
import { RegistrationError } from './errors';

/** Version of the no-op migration that stands for "nothing applied". */
export const FLOOR_VERSION = '00010101T000000Z';
export const FLOOR_NAME = 'nil';

const noop: MigrationAction = async () => {};

export function compareVersions(left: string, right: string): number {
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}

export class MigrationRegistry {
  private migrations: Map<string, Migration> = new Map();
  private problems: RegistrationProblem[] = [];
  private frozen = false;

  constructor() {
    this.migrations.set(FLOOR_VERSION, {
      version: FLOOR_VERSION,
      name: FLOOR_NAME,
      up: noop,
      down: noop
    });
  }

  /**
   * Add a migration. Invalid registrations are not inserted; they are
   * reported by validate().
   */
  register(
    version: string,
    name: string,
    up: MigrationAction | null | undefined,
    down: MigrationAction | null | undefined
  ): this {
    if (this.frozen) {
      throw new RegistrationError([{
        kind: 'registry-frozen',
        version,
        message: `registry is frozen, cannot register ${version}`
      }]);
    }

    if (version === '') {
      this.problems.push({ kind: 'empty-version', version, message: `migration "${name}" has an empty version` });
      return this;
    }

    if (!up || !down) {
      this.problems.push({
        kind: 'missing-action',
        version,
        message: `migration ${version} requires both up and down actions`
      });
      return this;
    }

    if (this.migrations.has(version)) {
      this.problems.push({
        kind: 'duplicate-version',
        version,
        message: `migration ${version} is registered more than once`
      });
      return this;
    }

    if (version <= FLOOR_VERSION) {
      this.problems.push({
        kind: 'below-floor',
        version,
        message: `migration ${version} must sort after ${FLOOR_VERSION}`
      });
      return this;
    }

    this.migrations.set(version, { version, name, up, down });
    return this;
  }

  validate(): RegistrationResult {
    if (this.problems.length === 0) {
      return { ok: true };
    }
    return { ok: false, problems: [...this.problems] };
  }

  assertValid(): void {
    const result = this.validate();
    if (!result.ok) {
      throw new RegistrationError(result.problems);
    }
  }

  /** Seal the registry; later registrations throw. */
  freeze(): this {
    this.frozen = true;
    return this;
  }

  isFrozen(): boolean {
    return this.frozen;
  }

  get(version: string): Migration | undefined {
    return this.migrations.get(version);
  }

  has(version: string): boolean {
    return this.migrations.has(version);
  }

  sortedVersions(): string[] {
    return Array.from(this.migrations.keys()).sort(compareVersions);
  }

  /** Greatest registered version; the floor when nothing else is registered. */
  latestVersion(): string {
    const versions = this.sortedVersions();
    return versions[versions.length - 1];
  }
}
