/**
 * Activation bookkeeping and the usage metrics derived from it.
 */
import type { Clock, EnvironmentRecord, Result, UsageMetrics } from '../types';
import type { MetadataStore } from './metadata-store';
import { fail, ok } from '../utils/errors';

export const MS_PER_DAY = 24 * 60 * 60 * 1000;

export const systemClock: Clock = {
  now: () => new Date(),
};

export function daysBetween(from: Date, to: Date): number {
  return Math.max(0, Math.floor((to.getTime() - from.getTime()) / MS_PER_DAY));
}

export function ageDays(record: EnvironmentRecord, now: Date): number {
  return daysBetween(record.createdAt, now);
}

/**
 * Whole days since the last activation, or Infinity if there never was one.
 */
export function daysSinceUse(record: EnvironmentRecord, now: Date): number {
  return record.lastUsed ? daysBetween(record.lastUsed, now) : Infinity;
}

export function usageMetrics(record: EnvironmentRecord, now: Date): UsageMetrics {
  const age = ageDays(record, now);
  return {
    ageDays: age,
    daysSinceUse: daysSinceUse(record, now),
    usageFrequency: record.usageCount / Math.max(age, 1),
  };
}

export class UsageTracker {
  constructor(
    private readonly store: MetadataStore,
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * Count one activation. Every call counts; callers invoke this once per
   * real activation.
   */
  async recordActivation(name: string, clock: Clock = this.clock): Promise<Result<EnvironmentRecord>> {
    const loaded = await this.store.load(name);
    if (!loaded.ok) {
      return loaded;
    }

    const record = loaded.value;
    const now = clock.now();
    record.lastUsed = now < record.createdAt ? new Date(record.createdAt.getTime()) : now;
    record.usageCount += 1;

    const saved = await this.store.save(record);
    if (!saved.ok) {
      return fail(saved.error);
    }
    return ok(record);
  }
}
