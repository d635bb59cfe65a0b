import { abbreviate, logger } from '../observability/logger.js';
import { getAllInvariants, getInvariantsByIds } from './registry.js';
import type { InvariantCheckResult, InvariantID, InvariantViolation, TreeSnapshot } from './types.js';
import { summarizeViolations, TreeInvariantViolationError } from './violations.js';

export function checkTreeInvariants(
  snapshot: TreeSnapshot,
  invariantIds?: InvariantID[]
): InvariantCheckResult {
  const invariants = invariantIds
    ? getInvariantsByIds(invariantIds)
    : getAllInvariants();

  const keys = new Set(snapshot.entries.map(([digest]) => digest));
  const violations: InvariantViolation[] = [];

  for (const invariant of invariants) {
    if (invariant.evaluate(snapshot, keys)) continue;

    violations.push({
      invariantId: invariant.id,
      description: invariant.description,
      severity: invariant.severity,
      root: snapshot.root,
      height: snapshot.height,
      timestamp: new Date().toISOString(),
    });

    logger.warn('tree_invariants', `Invariant violated: ${invariant.id}`, {
      invariantId: invariant.id,
      severity: invariant.severity,
      description: invariant.description,
      root: abbreviate(snapshot.root),
    });
  }

  return {
    passed: violations.length === 0,
    violations,
  };
}

/**
 * Throws when any fatal invariant fails; lesser violations are only logged.
 */
export function enforceTreeInvariants(
  snapshot: TreeSnapshot,
  invariantIds?: InvariantID[]
): void {
  const result = checkTreeInvariants(snapshot, invariantIds);
  if (result.passed) return;

  logger.error('tree_invariants', 'Invariant violations detected', {
    summary: summarizeViolations(result.violations),
    violations: result.violations.map(v => ({
      id: v.invariantId,
      severity: v.severity,
    })),
  });

  const fatalViolations = result.violations.filter(v => v.severity === 'fatal');
  if (fatalViolations.length > 0) {
    throw new TreeInvariantViolationError(fatalViolations);
  }
}
