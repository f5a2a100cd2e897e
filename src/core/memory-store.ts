/**
 * In-process metadata store, used by tests and dry runs.
 */
import type { EnvironmentRecord, Result } from '../types';
import { BaseMetadataStore, validateName } from './metadata-store';
import { cloneRecord } from './record-schema';
import { fail, notFound, ok } from '../utils/errors';

export class MemoryMetadataStore extends BaseMetadataStore {
  private readonly records = new Map<string, EnvironmentRecord>();
  private readonly lockfiles = new Map<string, string>();

  constructor(initial: EnvironmentRecord[] = []) {
    super();
    for (const record of initial) {
      this.records.set(record.name, cloneRecord(record));
    }
  }

  describeLocation(name: string): string {
    return `memory:${name}`;
  }

  lockfileLocation(name: string): string {
    return `memory:${name}.lock`;
  }

  async load(name: string): Promise<Result<EnvironmentRecord>> {
    const record = this.records.get(name);
    if (!record) {
      return fail(notFound(name));
    }
    return ok(cloneRecord(record));
  }

  async save(record: EnvironmentRecord): Promise<Result<void>> {
    const invalid = validateName(record.name);
    if (invalid) {
      return fail(invalid);
    }
    this.records.set(record.name, cloneRecord(record));
    return ok(undefined);
  }

  async delete(name: string): Promise<Result<void>> {
    if (!this.records.delete(name)) {
      return fail(notFound(name));
    }
    this.lockfiles.delete(name);
    return ok(undefined);
  }

  async exists(name: string): Promise<boolean> {
    return this.records.has(name);
  }

  async loadLockfile(name: string): Promise<Result<string | null>> {
    return ok(this.lockfiles.get(name) ?? null);
  }

  async saveLockfile(name: string, content: string): Promise<Result<void>> {
    this.lockfiles.set(name, content);
    return ok(undefined);
  }

  protected async names(): Promise<string[]> {
    return [...this.records.keys()];
  }
}
