import type {
  Clock,
  Dependency,
  EnvironmentBackend,
  EnvironmentRecord,
  Result,
} from '../src';
import { EnvKeepError, ErrorCodes, fail, notFound, ok } from '../src/utils/errors';
import { normalizePackageName } from '../src/core/lockfile';

export const DAY = 24 * 60 * 60 * 1000;
export const NOW = new Date('2026-06-01T12:00:00.000Z');

export function daysAgo(days: number, from: Date = NOW): Date {
  return new Date(from.getTime() - days * DAY);
}

export function fixedClock(at: Date = NOW): Clock & { set(date: Date): void } {
  let current = at;
  return {
    now: () => new Date(current.getTime()),
    set(date: Date) {
      current = date;
    },
  };
}

export function makeRecord(overrides: Partial<EnvironmentRecord> = {}): EnvironmentRecord {
  return {
    name: 'api',
    description: null,
    tags: [],
    pythonVersion: '3.11.0',
    createdAt: daysAgo(100),
    lastUsed: null,
    usageCount: 0,
    active: false,
    projectRoot: null,
    sizeBytes: null,
    trackedPackages: [],
    ...overrides,
  };
}

/**
 * Used `count` times, last `lastUsedDaysAgo` days ago.
 */
export function usedRecord(name: string, count: number, lastUsedDaysAgo: number, createdDaysAgo = 100): EnvironmentRecord {
  return makeRecord({
    name,
    usageCount: count,
    lastUsed: daysAgo(lastUsedDaysAgo),
    createdAt: daysAgo(createdDaysAgo),
  });
}

const FAKE_REQUIREMENT = /^([A-Za-z0-9][A-Za-z0-9._-]*)(?:\[[^\]]*\])?\s*(?:==\s*(\S+))?/;

/**
 * Backend that keeps environments in memory. Unpinned requirements resolve
 * to version 1.0.0.
 */
export class FakeBackend implements EnvironmentBackend {
  readonly environments = new Map<string, { pythonVersion: string; installed: Dependency[]; sizeBytes: number }>();
  failCreate = false;
  failRemove = false;
  failInstall = false;

  async create(name: string, pythonVersion: string): Promise<Result<string>> {
    if (this.failCreate) {
      return fail(new EnvKeepError(ErrorCodes.BACKEND_FAILED, `could not create ${name}`));
    }
    this.environments.set(name, { pythonVersion, installed: [], sizeBytes: 1024 });
    return ok(`/fake/${name}`);
  }

  async remove(name: string): Promise<Result<void>> {
    if (!this.environments.has(name)) return fail(notFound(name));
    if (this.failRemove) return fail(new EnvKeepError(ErrorCodes.BACKEND_FAILED, `could not remove ${name}`));
    this.environments.delete(name);
    return ok(undefined);
  }

  async computeSizeBytes(name: string): Promise<Result<number>> {
    const env = this.environments.get(name);
    return env ? ok(env.sizeBytes) : fail(notFound(name));
  }

  async exists(name: string): Promise<boolean> {
    return this.environments.has(name);
  }

  async listEnvironments(): Promise<string[]> {
    return [...this.environments.keys()];
  }

  async install(name: string, requirements: readonly string[]): Promise<Result<void>> {
    const env = this.environments.get(name);
    if (!env) return fail(notFound(name));
    if (this.failInstall) return fail(new EnvKeepError(ErrorCodes.BACKEND_FAILED, `could not install into ${name}`));

    const installed = new Map(env.installed.map((dep): [string, Dependency] => [normalizePackageName(dep.name), dep]));
    for (const requirement of requirements) {
      const match = FAKE_REQUIREMENT.exec(requirement);
      if (!match) return fail(new EnvKeepError(ErrorCodes.BACKEND_FAILED, `cannot parse ${requirement}`));
      installed.set(normalizePackageName(match[1]), { name: match[1], version: match[2] ?? '1.0.0' });
    }
    env.installed = [...installed.values()];
    return ok(undefined);
  }

  activationScript(name: string): string {
    return `/fake/${name}/bin/activate`;
  }

  async snapshotDependencies(name: string): Promise<Result<Dependency[]>> {
    const env = this.environments.get(name);
    return env ? ok([...env.installed]) : fail(notFound(name));
  }
}
