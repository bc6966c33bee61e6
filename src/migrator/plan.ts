/**
 * Migration plan computation
 */

import { compareVersions } from './MigrationRegistry';
import { MigrationPlan } from './types';

/**
 * Select the versions to run to move from `current` to `target`.
 *
 * An empty target means the greatest registered version. Going up runs
 * every version in (current, target] ascending; going down runs every
 * version in (target, current] descending. current === target yields an
 * empty plan.
 */
export function computePlan(registeredVersions: readonly string[], current: string, target: string): MigrationPlan {
  const ascending = [...registeredVersions].sort(compareVersions);

  let resolvedTarget = target;
  if (resolvedTarget === '') {
    resolvedTarget = ascending.length > 0 ? ascending[ascending.length - 1] : current;
  }

  if (current > resolvedTarget) {
    return {
      direction: 'down',
      target: resolvedTarget,
      versions: ascending.filter(v => v > resolvedTarget && v <= current).reverse()
    };
  }

  return {
    direction: 'up',
    target: resolvedTarget,
    versions: ascending.filter(v => v > current && v <= resolvedTarget)
  };
}
