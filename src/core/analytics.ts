/**
 * Read-only reports over environment records.
 */
import type { EnvironmentAnalytics, EnvironmentRecord, HealthPolicy, UsageSummary } from '../types';
import { DEFAULT_HEALTH_POLICY, classifyHealth } from './health';
import { usageMetrics } from './usage-tracker';

export const USAGE_CATEGORIES = ['Never used', 'Low usage (1-5)', 'Moderate (6-20)', 'High (21+)'] as const;

export type UsageCategory = (typeof USAGE_CATEGORIES)[number];

const MOST_USED_LIMIT = 5;

export function usageCategory(usageCount: number): UsageCategory {
  if (usageCount === 0) return 'Never used';
  if (usageCount <= 5) return 'Low usage (1-5)';
  if (usageCount <= 20) return 'Moderate (6-20)';
  return 'High (21+)';
}

export function environmentAnalytics(
  record: EnvironmentRecord,
  now: Date,
  policy: HealthPolicy = DEFAULT_HEALTH_POLICY
): EnvironmentAnalytics {
  const metrics = usageMetrics(record, now);
  return {
    name: record.name,
    pythonVersion: record.pythonVersion,
    createdAt: record.createdAt,
    lastUsed: record.lastUsed,
    usageCount: record.usageCount,
    ageDays: metrics.ageDays,
    daysSinceUse: metrics.daysSinceUse,
    usageFrequency: metrics.usageFrequency,
    health: classifyHealth(record, now, policy),
    tags: [...record.tags],
    description: record.description,
    projectRoot: record.projectRoot,
    sizeBytes: record.sizeBytes,
  };
}

/**
 * Unused means never activated, or idle for at least `policy.staleDays`.
 */
export function usageSummary(
  records: readonly EnvironmentRecord[],
  now: Date,
  policy: HealthPolicy = DEFAULT_HEALTH_POLICY
): UsageSummary {
  const environmentsByUsage: Record<string, number> = {};
  let unused = 0;
  let totalSizeBytes = 0;

  for (const record of records) {
    const category = usageCategory(record.usageCount);
    environmentsByUsage[category] = (environmentsByUsage[category] ?? 0) + 1;

    const { daysSinceUse } = usageMetrics(record, now);
    if (daysSinceUse >= policy.staleDays) {
      unused += 1;
    }
    totalSizeBytes += record.sizeBytes ?? 0;
  }

  const mostUsed = records
    .filter((record) => record.usageCount > 0)
    .sort((a, b) => b.usageCount - a.usageCount || (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
    .slice(0, MOST_USED_LIMIT)
    .map((record) => ({ name: record.name, usageCount: record.usageCount, lastUsed: record.lastUsed }));

  const total = records.length;
  return {
    totalEnvironments: total,
    unusedEnvironments: unused,
    environmentsByUsage,
    mostUsed,
    totalSizeBytes,
    efficiencyPercent: total > 0 ? Math.round(((total - unused) / total) * 1000) / 10 : 0,
  };
}
