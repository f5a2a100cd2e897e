/**
 * Decides which environments are removal candidates and why. Planning never
 * touches the store; executing a plan is EnvironmentService's job.
 */
import type { CleanupCandidate, CleanupPolicy, CleanupReason, EnvironmentRecord } from '../types';
import { daysSinceUse } from './usage-tracker';

export const DEFAULT_CLEANUP_POLICY: Readonly<CleanupPolicy> = Object.freeze({
  unusedDays: 30,
  lowUsageThreshold: 5,
  includeLowUsage: false,
});

/**
 * Every criterion the record meets, in a fixed order.
 */
export function cleanupReasons(record: EnvironmentRecord, now: Date, policy: CleanupPolicy): CleanupReason[] {
  const reasons: CleanupReason[] = [];
  const days = daysSinceUse(record, now);

  if (record.usageCount === 0) {
    reasons.push({ kind: 'never-used' });
  } else if (days >= policy.unusedDays) {
    reasons.push({ kind: 'stale', days });
  }
  if (record.usageCount > 0 && record.usageCount <= policy.lowUsageThreshold) {
    reasons.push({ kind: 'low-usage', count: record.usageCount });
  }
  return reasons;
}

function qualifies(reasons: CleanupReason[], policy: CleanupPolicy): boolean {
  return reasons.some((reason) => reason.kind !== 'low-usage' || policy.includeLowUsage);
}

export function planCleanup(
  records: readonly EnvironmentRecord[],
  now: Date,
  policy: CleanupPolicy = DEFAULT_CLEANUP_POLICY
): CleanupCandidate[] {
  const candidates: CleanupCandidate[] = [];
  for (const record of records) {
    const reasons = cleanupReasons(record, now, policy);
    if (reasons.length > 0 && qualifies(reasons, policy)) {
      candidates.push({ name: record.name, reasons, daysSinceUse: daysSinceUse(record, now) });
    }
  }

  return candidates.sort((a, b) => {
    if (a.daysSinceUse !== b.daysSinceUse) {
      return a.daysSinceUse > b.daysSinceUse ? -1 : 1;
    }
    return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
  });
}

export function describeReason(reason: CleanupReason): string {
  switch (reason.kind) {
    case 'never-used':
      return 'Never used';
    case 'stale':
      return `Not used for ${reason.days} days`;
    case 'low-usage':
      return `Low usage (${reason.count} ${reason.count === 1 ? 'time' : 'times'})`;
  }
}
