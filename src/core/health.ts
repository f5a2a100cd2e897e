/**
 * Health classification as an ordered rule list; the first matching rule
 * decides the tier.
 */
import { HealthTier } from '../types';
import type { EnvironmentRecord, HealthPolicy, UsageMetrics } from '../types';
import { usageMetrics } from './usage-tracker';

export const DEFAULT_HEALTH_POLICY: Readonly<HealthPolicy> = Object.freeze({
  criticalDays: 90,
  staleDays: 30,
  lowUsageThreshold: 5,
});

export interface HealthRule {
  name: string;
  tier: HealthTier;
  condition: (record: EnvironmentRecord, metrics: UsageMetrics, policy: HealthPolicy) => boolean;
}

export const HEALTH_RULES: readonly HealthRule[] = [
  {
    name: 'never-used',
    tier: HealthTier.NEEDS_ATTENTION,
    condition: (record) => record.usageCount === 0,
  },
  {
    name: 'critically-stale',
    tier: HealthTier.NEEDS_ATTENTION,
    condition: (_, metrics, policy) => metrics.daysSinceUse >= policy.criticalDays,
  },
  {
    name: 'low-usage',
    tier: HealthTier.WARNING,
    condition: (record, _, policy) => record.usageCount <= policy.lowUsageThreshold,
  },
  {
    name: 'stale',
    tier: HealthTier.WARNING,
    condition: (_, metrics, policy) => metrics.daysSinceUse >= policy.staleDays,
  },
];

/**
 * Name of the first rule that matches, or null for a healthy record.
 */
export function matchHealthRule(
  record: EnvironmentRecord,
  now: Date,
  policy: HealthPolicy = DEFAULT_HEALTH_POLICY
): HealthRule | null {
  const metrics = usageMetrics(record, now);
  return HEALTH_RULES.find((rule) => rule.condition(record, metrics, policy)) ?? null;
}

export function classifyHealth(
  record: EnvironmentRecord,
  now: Date,
  policy: HealthPolicy = DEFAULT_HEALTH_POLICY
): HealthTier {
  return matchHealthRule(record, now, policy)?.tier ?? HealthTier.HEALTHY;
}
