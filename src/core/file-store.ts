/**
 * Metadata store backed by one directory per environment:
 *
 *   <envsDir>/<name>/envkeep.meta.json
 *   <envsDir>/<name>/envkeep.lock
 */
import * as fs from 'fs-extra';
import * as path from 'path';
import type { EnvironmentRecord, Result } from '../types';
import { BaseMetadataStore, validateName } from './metadata-store';
import { toDocument, upgradeDocument } from './record-schema';
import { corrupt, fail, ioError, notFound, ok } from '../utils/errors';
import { listSubdirectories, writeFileAtomic } from '../utils/file-system';

export const METADATA_FILE = 'envkeep.meta.json';
export const LOCK_FILE = 'envkeep.lock';

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class FileMetadataStore extends BaseMetadataStore {
  constructor(private readonly envsDir: string) {
    super();
  }

  environmentDir(name: string): string {
    return path.join(this.envsDir, name);
  }

  metadataPath(name: string): string {
    return path.join(this.environmentDir(name), METADATA_FILE);
  }

  lockfilePath(name: string): string {
    return path.join(this.environmentDir(name), LOCK_FILE);
  }

  describeLocation(name: string): string {
    return this.metadataPath(name);
  }

  lockfileLocation(name: string): string {
    return this.lockfilePath(name);
  }

  async load(name: string): Promise<Result<EnvironmentRecord>> {
    const invalid = validateName(name);
    if (invalid) {
      return fail(invalid);
    }

    const file = this.metadataPath(name);
    let content: string;
    let mtime: Date;
    try {
      content = await fs.readFile(file, 'utf-8');
      mtime = (await fs.stat(file)).mtime;
    } catch (error) {
      if (isMissing(error)) {
        return fail(notFound(name, file));
      }
      return fail(ioError(`Cannot read ${file}`, error));
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      return fail(corrupt(file, error instanceof Error ? error.message : 'invalid JSON'));
    }

    const upgraded = upgradeDocument(raw, { name, fallbackCreatedAt: mtime });
    if (!upgraded.success) {
      return fail(corrupt(file, upgraded.reason));
    }
    return ok(upgraded.record);
  }

  async save(record: EnvironmentRecord): Promise<Result<void>> {
    const invalid = validateName(record.name);
    if (invalid) {
      return fail(invalid);
    }
    const file = this.metadataPath(record.name);
    try {
      await writeFileAtomic(file, JSON.stringify(toDocument(record), null, 2) + '\n');
    } catch (error) {
      return fail(ioError(`Cannot write ${file}`, error));
    }
    return ok(undefined);
  }

  async delete(name: string): Promise<Result<void>> {
    const file = this.metadataPath(name);
    if (!(await this.exists(name))) {
      return fail(notFound(name, file));
    }
    try {
      await fs.remove(file);
      await fs.remove(this.lockfilePath(name));
    } catch (error) {
      return fail(ioError(`Cannot delete ${file}`, error));
    }
    return ok(undefined);
  }

  async exists(name: string): Promise<boolean> {
    if (validateName(name)) {
      return false;
    }
    return fs.pathExists(this.metadataPath(name));
  }

  async loadLockfile(name: string): Promise<Result<string | null>> {
    const file = this.lockfilePath(name);
    try {
      return ok(await fs.readFile(file, 'utf-8'));
    } catch (error) {
      if (isMissing(error)) {
        return ok(null);
      }
      return fail(ioError(`Cannot read ${file}`, error));
    }
  }

  async saveLockfile(name: string, content: string): Promise<Result<void>> {
    const file = this.lockfilePath(name);
    try {
      await writeFileAtomic(file, content);
    } catch (error) {
      return fail(ioError(`Cannot write ${file}`, error));
    }
    return ok(undefined);
  }

  protected async names(): Promise<string[]> {
    const dirs = await listSubdirectories(this.envsDir);
    const names: string[] = [];
    for (const dir of dirs) {
      if (await fs.pathExists(path.join(this.envsDir, dir, METADATA_FILE))) {
        names.push(dir);
      }
    }
    return names;
  }
}
