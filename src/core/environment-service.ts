/**
 * EnvironmentService ties the metadata store, usage tracking, planning and
 * lockfiles to an environment backend. The CLI talks only to this class;
 * every method returns a Result.
 */
import type {
  Advisory,
  CleanupCandidate,
  CleanupMode,
  CleanupPolicy,
  CleanupResult,
  Clock,
  ConsistencyIssue,
  DependencyIntrospector,
  EnvironmentAnalytics,
  EnvironmentProvisioner,
  EnvironmentRecord,
  FreezeListing,
  HealthPolicy,
  LockSnapshot,
  Platform,
  Result,
  ThawPlan,
  UsageSummary,
} from '../types';
import type { CreateOptions, MetadataStore } from './metadata-store';
import { validateName } from './metadata-store';
import { UsageTracker, systemClock } from './usage-tracker';
import { DEFAULT_HEALTH_POLICY } from './health';
import { DEFAULT_CLEANUP_POLICY, planCleanup } from './cleanup-planner';
import { environmentAnalytics, usageSummary } from './analytics';
import {
  currentPlatform,
  deserializeLock,
  generateLock,
  serializeLock,
  sortDependencies,
  thawLock,
  toRequirement,
} from './lockfile';
import { mergeTracked, validateRequirements } from './packages';
import { EnvKeepError, ErrorCodes, alreadyExists, fail, inconsistent, notFound, ok } from '../utils/errors';
import { logger } from '../utils/logger';

export type EnvironmentBackend = EnvironmentProvisioner & DependencyIntrospector;

export interface EnvironmentServiceOptions {
  store: MetadataStore;
  backend: EnvironmentBackend;
  clock?: Clock;
  healthPolicy?: HealthPolicy;
  cleanupPolicy?: CleanupPolicy;
  platform?: () => Platform;
}

export interface EditChanges {
  description?: string | null;
  addTags?: string[];
  removeTags?: string[];
  projectRoot?: string | null;
}

export interface RemoveOptions {
  /** Also remove half-present or corrupt environments */
  force?: boolean;
}

export interface CleanupOptions {
  mode: CleanupMode;
  /** Asked once per candidate in interactive mode */
  confirm?: (candidate: CleanupCandidate) => Promise<boolean>;
}

export interface ThawOptions {
  /** Called when the lockfile does not match; returning false skips installation */
  proceedWithAdvisories?: (advisories: Advisory[]) => Promise<boolean>;
}

export interface FreezeOptions {
  /** List only the specs recorded by `add` */
  trackedOnly?: boolean;
}

export interface ThawOutcome {
  plan: ThawPlan;
  installed: boolean;
}

export class EnvironmentService {
  private readonly store: MetadataStore;
  private readonly backend: EnvironmentBackend;
  private readonly clock: Clock;
  private readonly tracker: UsageTracker;
  private readonly platform: () => Platform;
  readonly healthPolicy: HealthPolicy;
  readonly cleanupPolicy: CleanupPolicy;

  constructor(options: EnvironmentServiceOptions) {
    this.store = options.store;
    this.backend = options.backend;
    this.clock = options.clock ?? systemClock;
    this.tracker = new UsageTracker(this.store, this.clock);
    this.platform = options.platform ?? currentPlatform;
    this.healthPolicy = options.healthPolicy ?? { ...DEFAULT_HEALTH_POLICY };
    this.cleanupPolicy = options.cleanupPolicy ?? { ...DEFAULT_CLEANUP_POLICY };
  }

  /**
   * Provision an environment and its metadata; if writing the metadata fails
   * the fresh environment is removed again.
   */
  async create(name: string, pythonVersion: string, options: CreateOptions = {}): Promise<Result<EnvironmentRecord>> {
    const invalid = validateName(name);
    if (invalid) return fail(invalid);

    if (await this.store.exists(name)) {
      return fail(alreadyExists(name));
    }
    if (await this.backend.exists(name)) {
      return fail(
        inconsistent(
          name,
          `An environment directory for '${name}' exists without metadata; remove it with --force or restore its metadata`,
          this.store.describeLocation(name)
        )
      );
    }

    logger.debug(`provisioning ${name} (python ${pythonVersion})`);
    const provisioned = await this.backend.create(name, pythonVersion);
    if (!provisioned.ok) return provisioned;

    const created = await this.store.create(name, pythonVersion, options, this.clock);
    if (!created.ok) {
      const rollback = await this.backend.remove(name);
      if (!rollback.ok) {
        logger.warn(`Could not remove environment after failed metadata write: ${rollback.error.message}`);
      }
    }
    return created;
  }

  private missingEnvironment(name: string): EnvKeepError {
    return inconsistent(
      name,
      `Metadata for '${name}' exists but the environment does not`,
      this.store.describeLocation(name)
    );
  }

  private missingMetadata(name: string): EnvKeepError {
    return inconsistent(name, `Environment '${name}' exists but has no metadata`, this.store.describeLocation(name));
  }

  async list(): Promise<Result<EnvironmentRecord[]>> {
    return this.store.list();
  }

  /**
   * Remove metadata and environment together. Refuses to act on only one
   * half, or on corrupt metadata, unless forced.
   */
  async remove(name: string, options: RemoveOptions = {}): Promise<Result<void>> {
    const invalid = validateName(name);
    if (invalid) return fail(invalid);

    const hasMetadata = await this.store.exists(name);
    const hasEnvironment = await this.backend.exists(name);
    if (!hasMetadata && !hasEnvironment) {
      return fail(notFound(name));
    }

    if (!options.force) {
      if (!hasEnvironment) {
        return fail(this.missingEnvironment(name));
      }
      if (!hasMetadata) {
        return fail(this.missingMetadata(name));
      }
    }

    let previous: EnvironmentRecord | null = null;
    let lockText: string | null = null;
    if (hasMetadata) {
      const loaded = await this.store.load(name);
      if (loaded.ok) {
        previous = loaded.value;
      } else if (!options.force) {
        return loaded;
      }
      const lock = await this.store.loadLockfile(name);
      if (lock.ok) {
        lockText = lock.value;
      } else if (!options.force) {
        return lock;
      }
      const deleted = await this.store.delete(name);
      if (!deleted.ok) return deleted;
    }

    const removed = await this.backend.remove(name);
    if (!removed.ok && !(removed.error.code === ErrorCodes.NOT_FOUND && !hasEnvironment)) {
      if (previous) {
        const restored = await this.store.save(previous);
        if (!restored.ok) {
          logger.warn(`Could not restore metadata for '${name}': ${restored.error.message}`);
        }
      }
      if (lockText !== null) {
        const relocked = await this.store.saveLockfile(name, lockText);
        if (!relocked.ok) {
          logger.warn(`Could not restore the lockfile for '${name}': ${relocked.error.message}`);
        }
      }
      return removed;
    }
    return ok(undefined);
  }

  /**
   * Count an activation and hand back the activation script path.
   */
  async activate(name: string): Promise<Result<{ record: EnvironmentRecord; activationScript: string }>> {
    if (!(await this.backend.exists(name))) {
      if (await this.store.exists(name)) {
        return fail(this.missingEnvironment(name));
      }
      return fail(notFound(name));
    }
    if (!(await this.store.exists(name))) {
      return fail(this.missingMetadata(name));
    }
    const tracked = await this.tracker.recordActivation(name);
    if (!tracked.ok) return tracked;
    return ok({ record: tracked.value, activationScript: this.backend.activationScript(name) });
  }

  async edit(name: string, changes: EditChanges): Promise<Result<EnvironmentRecord>> {
    const loaded = await this.store.load(name);
    if (!loaded.ok) return loaded;

    const record = loaded.value;
    if (changes.description !== undefined) {
      record.description = changes.description;
    }
    if (changes.projectRoot !== undefined) {
      record.projectRoot = changes.projectRoot;
    }
    const tags = new Set(record.tags);
    for (const tag of changes.addTags ?? []) tags.add(tag);
    for (const tag of changes.removeTags ?? []) tags.delete(tag);
    record.tags = [...tags];

    const saved = await this.store.save(record);
    if (!saved.ok) return saved;
    return ok(record);
  }

  /**
   * Rescan the environment directory and cache the size on the record.
   */
  async refreshSize(name: string): Promise<Result<EnvironmentRecord>> {
    const loaded = await this.store.load(name);
    if (!loaded.ok) return loaded;

    const size = await this.backend.computeSizeBytes(name);
    if (!size.ok) return size;

    const record = loaded.value;
    record.sizeBytes = size.value;
    const saved = await this.store.save(record);
    if (!saved.ok) return saved;
    return ok(record);
  }

  async analytics(name: string, options: { refreshSize?: boolean } = {}): Promise<Result<EnvironmentAnalytics>> {
    let record: Result<EnvironmentRecord> = await this.store.load(name);
    if (record.ok && options.refreshSize) {
      const refreshed = await this.refreshSize(name);
      if (refreshed.ok) {
        record = refreshed;
      } else {
        logger.debug(`size scan failed for ${name}: ${refreshed.error.message}`);
      }
    }
    if (!record.ok) return record;
    return ok(environmentAnalytics(record.value, this.clock.now(), this.healthPolicy));
  }

  /**
   * Analytics for every readable record.
   */
  async overview(): Promise<Result<EnvironmentAnalytics[]>> {
    const records = await this.store.list();
    if (!records.ok) return records;
    const now = this.clock.now();
    return ok(records.value.map((record) => environmentAnalytics(record, now, this.healthPolicy)));
  }

  async summary(): Promise<Result<UsageSummary>> {
    const records = await this.store.list();
    if (!records.ok) return records;
    return ok(usageSummary(records.value, this.clock.now(), this.healthPolicy));
  }

  async planCleanup(overrides: Partial<CleanupPolicy> = {}): Promise<Result<CleanupCandidate[]>> {
    const records = await this.store.list();
    if (!records.ok) return records;
    return ok(planCleanup(records.value, this.clock.now(), { ...this.cleanupPolicy, ...overrides }));
  }

  /**
   * Carry out a plan. Dry runs only report; interactive mode asks `confirm`
   * per candidate (and skips everything without one); force removes all.
   */
  async executeCleanup(plan: readonly CleanupCandidate[], options: CleanupOptions): Promise<Result<CleanupResult>> {
    const result: CleanupResult = {
      mode: options.mode,
      removed: [],
      wouldRemove: [],
      skipped: [],
      failed: [],
      spaceFreed: 0,
    };

    for (const candidate of plan) {
      const size = await this.knownSize(candidate.name);

      if (options.mode === 'dry-run') {
        result.wouldRemove.push(candidate.name);
        result.spaceFreed += size;
        continue;
      }
      if (options.mode === 'interactive' && !(options.confirm && (await options.confirm(candidate)))) {
        result.skipped.push(candidate.name);
        continue;
      }

      const removed = await this.remove(candidate.name);
      if (removed.ok) {
        result.removed.push(candidate.name);
        result.spaceFreed += size;
      } else {
        result.failed.push({ name: candidate.name, error: removed.error });
      }
    }
    return ok(result);
  }

  private async knownSize(name: string): Promise<number> {
    const loaded = await this.store.load(name);
    if (loaded.ok && loaded.value.sizeBytes !== null) {
      return loaded.value.sizeBytes;
    }
    const computed = await this.backend.computeSizeBytes(name);
    return computed.ok ? computed.value : 0;
  }

  /**
   * Snapshot the installed packages and write the lockfile.
   */
  async lock(name: string): Promise<Result<{ snapshot: LockSnapshot; location: string }>> {
    const loaded = await this.store.load(name);
    if (!loaded.ok) return loaded;
    if (!(await this.backend.exists(name))) {
      return fail(this.missingEnvironment(name));
    }

    const dependencies = await this.backend.snapshotDependencies(name);
    if (!dependencies.ok) return dependencies;

    const snapshot = generateLock(loaded.value, dependencies.value, this.clock, this.platform());
    const saved = await this.store.saveLockfile(name, serializeLock(snapshot));
    if (!saved.ok) return saved;

    logger.debug(`locked ${snapshot.dependencies.length} packages for ${name}`);
    return ok({ snapshot, location: this.store.lockfileLocation(name) });
  }

  async readLock(name: string): Promise<Result<LockSnapshot>> {
    const text = await this.store.loadLockfile(name);
    if (!text.ok) return text;
    const location = this.store.lockfileLocation(name);
    if (text.value === null) {
      return fail(new EnvKeepError(ErrorCodes.NOT_FOUND, `No lockfile for '${name}'; run lock first`, { name, path: location }));
    }
    return deserializeLock(text.value, location);
  }

  /**
   * Reinstall the locked package set. Advisories never fail the call; they
   * are passed to `proceedWithAdvisories`, which may cancel installation.
   */
  async thaw(name: string, options: ThawOptions = {}): Promise<Result<ThawOutcome>> {
    const loaded = await this.store.load(name);
    if (!loaded.ok) return loaded;

    const snapshot = await this.readLock(name);
    if (!snapshot.ok) return snapshot;

    if (!(await this.backend.exists(name))) {
      return fail(this.missingEnvironment(name));
    }

    const plan = thawLock(snapshot.value, loaded.value, this.platform());
    if (plan.advisories.length > 0 && options.proceedWithAdvisories) {
      if (!(await options.proceedWithAdvisories(plan.advisories))) {
        return ok({ plan, installed: false });
      }
    }

    const installed = await this.backend.install(name, plan.instructions.map(toRequirement));
    if (!installed.ok) return installed;
    return ok({ plan, installed: true });
  }

  /**
   * Install packages into an environment and remember them as tracked.
   * Nothing is recorded when installation fails.
   */
  async addPackages(name: string, specs: readonly string[]): Promise<Result<EnvironmentRecord>> {
    const requirements = validateRequirements(specs);
    if (!requirements.ok) return requirements;

    const loaded = await this.store.load(name);
    if (!loaded.ok) return loaded;
    if (!(await this.backend.exists(name))) {
      return fail(this.missingEnvironment(name));
    }

    logger.debug(`installing ${requirements.value.join(' ')} into ${name}`);
    const installed = await this.backend.install(name, requirements.value);
    if (!installed.ok) return installed;

    const record = loaded.value;
    record.trackedPackages = mergeTracked(record.trackedPackages, requirements.value);
    const saved = await this.store.save(record);
    if (!saved.ok) return saved;
    return ok(record);
  }

  /**
   * Installed packages as `name==version` lines, or the tracked specs.
   */
  async freeze(name: string, options: FreezeOptions = {}): Promise<Result<FreezeListing>> {
    const loaded = await this.store.load(name);
    if (!loaded.ok) return loaded;

    if (options.trackedOnly) {
      return ok({ environmentName: name, trackedOnly: true, packages: [...loaded.value.trackedPackages] });
    }
    if (!(await this.backend.exists(name))) {
      return fail(this.missingEnvironment(name));
    }
    const dependencies = await this.backend.snapshotDependencies(name);
    if (!dependencies.ok) return dependencies;
    return ok({
      environmentName: name,
      trackedOnly: false,
      packages: sortDependencies(dependencies.value).map(toRequirement),
    });
  }

  /**
   * Compare metadata records with environment directories. Nothing is
   * repaired; every mismatch is reported.
   */
  async checkConsistency(): Promise<Result<ConsistencyIssue[]>> {
    const all = await this.store.loadAll();
    if (!all.ok) return all;

    const environments = new Set(await this.backend.listEnvironments());
    const issues: ConsistencyIssue[] = [];

    for (const [name, record] of all.value) {
      const path = this.store.describeLocation(name);
      if (!record.ok && record.error.code === ErrorCodes.CORRUPT) {
        issues.push({ kind: 'corrupt-metadata', name, path, reason: String(record.error.details?.reason ?? record.error.message) });
      }
      if (!environments.has(name)) {
        issues.push({ kind: 'metadata-without-environment', name, path });
      }
    }
    for (const name of environments) {
      if (!all.value.has(name)) {
        issues.push({ kind: 'environment-without-metadata', name, path: this.store.describeLocation(name) });
      }
    }

    return ok(issues.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0)));
  }
}
