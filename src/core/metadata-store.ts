/**
 * Persistence for per-environment metadata records and lockfiles.
 */
import type { Clock, EnvironmentRecord, Result } from '../types';
import { EnvKeepError, ErrorCodes, alreadyExists, fail, ioError, ok } from '../utils/errors';

const NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

export interface CreateOptions {
  description?: string;
  tags?: string[];
}

export interface MetadataStore {
  load(name: string): Promise<Result<EnvironmentRecord>>;
  /** Replace the stored record atomically */
  save(record: EnvironmentRecord): Promise<Result<void>>;
  create(name: string, pythonVersion: string, options: CreateOptions, clock: Clock): Promise<Result<EnvironmentRecord>>;
  delete(name: string): Promise<Result<void>>;
  /** Unordered. Unreadable records are left out and reported by loadAll() */
  list(): Promise<Result<EnvironmentRecord[]>>;
  /** Every record, keyed by name, as the individual load() result */
  loadAll(): Promise<Result<Map<string, Result<EnvironmentRecord>>>>;
  exists(name: string): Promise<boolean>;
  loadLockfile(name: string): Promise<Result<string | null>>;
  saveLockfile(name: string, content: string): Promise<Result<void>>;
  /** Where a record lives, for messages */
  describeLocation(name: string): string;
  lockfileLocation(name: string): string;
}

export function validateName(name: string): EnvKeepError | null {
  if (!NAME_PATTERN.test(name)) {
    return new EnvKeepError(
      ErrorCodes.INVALID_NAME,
      `Invalid environment name '${name}': use letters, digits, '.', '_' or '-', starting with a letter or digit`,
      { name }
    );
  }
  return null;
}

export function newRecord(name: string, pythonVersion: string, options: CreateOptions, clock: Clock): EnvironmentRecord {
  return {
    name,
    description: options.description ?? null,
    tags: [...new Set(options.tags ?? [])],
    pythonVersion,
    createdAt: clock.now(),
    lastUsed: null,
    usageCount: 0,
    active: false,
    projectRoot: null,
    sizeBytes: null,
    trackedPackages: [],
  };
}

/**
 * Shared create/list logic; subclasses provide the storage primitives.
 */
export abstract class BaseMetadataStore implements MetadataStore {
  abstract load(name: string): Promise<Result<EnvironmentRecord>>;
  abstract save(record: EnvironmentRecord): Promise<Result<void>>;
  abstract delete(name: string): Promise<Result<void>>;
  abstract exists(name: string): Promise<boolean>;
  abstract loadLockfile(name: string): Promise<Result<string | null>>;
  abstract saveLockfile(name: string, content: string): Promise<Result<void>>;
  abstract describeLocation(name: string): string;
  abstract lockfileLocation(name: string): string;

  /**
   * Names of every stored record, readable or not.
   */
  protected abstract names(): Promise<string[]>;

  async create(
    name: string,
    pythonVersion: string,
    options: CreateOptions,
    clock: Clock
  ): Promise<Result<EnvironmentRecord>> {
    const invalid = validateName(name);
    if (invalid) {
      return fail(invalid);
    }
    if (await this.exists(name)) {
      return fail(alreadyExists(name));
    }

    const record = newRecord(name, pythonVersion, options, clock);
    const saved = await this.save(record);
    if (!saved.ok) {
      return fail(saved.error);
    }
    return ok(record);
  }

  async loadAll(): Promise<Result<Map<string, Result<EnvironmentRecord>>>> {
    let names: string[];
    try {
      names = await this.names();
    } catch (error) {
      return fail(ioError('Cannot list environments', error));
    }

    const results = new Map<string, Result<EnvironmentRecord>>();
    for (const name of names) {
      results.set(name, await this.load(name));
    }
    return ok(results);
  }

  async list(): Promise<Result<EnvironmentRecord[]>> {
    const all = await this.loadAll();
    if (!all.ok) {
      return fail(all.error);
    }
    const records: EnvironmentRecord[] = [];
    for (const result of all.value.values()) {
      if (result.ok) {
        records.push(result.value);
      }
    }
    return ok(records);
  }
}
