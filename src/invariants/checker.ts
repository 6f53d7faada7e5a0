import type { InvariantContext, InvariantCheckResult, InvariantViolation, InvariantID } from './types.js';
import { getInvariantsByIds, getAllInvariants } from './registry.js';
import { logger, errorMessage } from '../observability/logger.js';
import { metrics } from '../metrics/metrics.js';
import { InvariantViolationError, summarizeViolations } from './violations.js';

export function checkInvariants(
  context: InvariantContext,
  invariantIds?: InvariantID[]
): InvariantCheckResult {
  const invariants = invariantIds
    ? getInvariantsByIds(invariantIds)
    : getAllInvariants();

  const violations: InvariantViolation[] = [];

  for (const invariant of invariants) {
    if (invariant.evaluate(context)) continue;

    violations.push({
      invariantId: invariant.id,
      description: invariant.description,
      severity: invariant.severity,
      context,
      timestamp: new Date().toISOString(),
    });

    logger.warn('invariant_violation', `Invariant violated: ${invariant.id}`, {
      invariantId: invariant.id,
      severity: invariant.severity,
      description: invariant.description,
      context,
    });
  }

  metrics.recordInvariantViolations(violations.length);

  return {
    passed: violations.length === 0,
    violations,
  };
}

/**
 * Throws InvariantViolationError when any fatal invariant fails; lesser
 * violations are logged and returned.
 */
export function enforceInvariants(
  context: InvariantContext,
  invariantIds?: InvariantID[]
): InvariantViolation[] {
  const result = checkInvariants(context, invariantIds);
  if (result.passed) return [];

  logger.error('invariant_enforcement', 'Invariant violations detected', {
    summary: summarizeViolations(result.violations),
    violations: result.violations.map(v => ({
      id: v.invariantId,
      severity: v.severity,
    })),
  });

  const fatal = result.violations.filter(v => v.severity === 'fatal');
  if (fatal.length > 0) {
    throw new InvariantViolationError(fatal);
  }

  return result.violations;
}

/**
 * Never throws. Used by the semaphore bookkeeping.
 */
export function safeCheckInvariants(
  context: InvariantContext,
  invariantIds?: InvariantID[]
): InvariantViolation[] {
  try {
    return checkInvariants(context, invariantIds).violations;
  } catch (error) {
    logger.error('invariant_safe_check_error', 'Safe invariant check failed', {
      error: errorMessage(error),
    });
    return [];
  }
}
