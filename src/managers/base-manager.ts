/**
 * Base class for environment backends
 */
import * as fs from 'fs-extra';
import * as path from 'path';
import {
  BackendKind,
  Dependency,
  DependencyIntrospector,
  EnvironmentProvisioner,
  Result,
} from '../types';
import { CommandResult, isWindows, runCommand } from '../utils/core-utils';
import { EnvKeepError, ErrorCodes, fail, ioError, notFound, ok } from '../utils/errors';
import { calculateDirectorySize, listSubdirectories } from '../utils/file-system';
import { logger } from '../utils/logger';

/** Marker file every virtual environment has */
export const PYVENV_CFG = 'pyvenv.cfg';

const FREEZE_LINE = /^([A-Za-z0-9][A-Za-z0-9._-]*)==([^\s;#]+)/;

/**
 * Parse `pip freeze` output. Editable installs, URL requirements and
 * comments carry no exact version and are skipped.
 */
export function parseFreezeOutput(output: string): Dependency[] {
  const dependencies: Dependency[] = [];
  for (const rawLine of output.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#') || line.startsWith('-')) continue;
    const match = FREEZE_LINE.exec(line);
    if (match) {
      dependencies.push({ name: match[1], version: match[2] });
    }
  }
  return dependencies;
}

export abstract class BaseEnvironmentManager implements EnvironmentProvisioner, DependencyIntrospector {
  abstract readonly kind: BackendKind;

  constructor(protected readonly envsDir: string) {}

  /**
   * Materialize an empty environment at environmentDir(name)
   */
  protected abstract createEnvironment(name: string, pythonVersion: string): Promise<Result<void>>;

  /**
   * Command that prints `pip freeze` output for the environment
   */
  protected abstract freezeCommand(name: string): { bin: string; args: string[] };

  /**
   * Command that installs requirement specs into the environment
   */
  protected abstract installCommand(name: string, requirements: string[]): { bin: string; args: string[] };

  environmentDir(name: string): string {
    return path.join(this.envsDir, name);
  }

  pythonPath(name: string): string {
    return isWindows()
      ? path.join(this.environmentDir(name), 'Scripts', 'python.exe')
      : path.join(this.environmentDir(name), 'bin', 'python');
  }

  activationScript(name: string): string {
    return isWindows()
      ? path.join(this.environmentDir(name), 'Scripts', 'activate')
      : path.join(this.environmentDir(name), 'bin', 'activate');
  }

  async exists(name: string): Promise<boolean> {
    return fs.pathExists(path.join(this.environmentDir(name), PYVENV_CFG));
  }

  /**
   * Names of every directory that holds a virtual environment
   */
  async listEnvironments(): Promise<string[]> {
    const dirs = await listSubdirectories(this.envsDir);
    const names: string[] = [];
    for (const dir of dirs) {
      if (await this.exists(dir)) {
        names.push(dir);
      }
    }
    return names;
  }

  async create(name: string, pythonVersion: string): Promise<Result<string>> {
    if (await this.exists(name)) {
      return fail(
        new EnvKeepError(ErrorCodes.ALREADY_EXISTS, `An environment already exists at ${this.environmentDir(name)}`, {
          name,
        })
      );
    }

    const dir = this.environmentDir(name);
    const existedBefore = await fs.pathExists(dir);
    const created = await this.createEnvironment(name, pythonVersion);
    if (!created.ok) {
      // leave no half-built environment behind
      if (!existedBefore) {
        await fs.remove(dir);
      }
      return fail(created.error);
    }
    return ok(dir);
  }

  /**
   * Delete the whole environment directory
   */
  async remove(name: string): Promise<Result<void>> {
    const dir = this.environmentDir(name);
    if (!(await fs.pathExists(dir))) {
      return fail(notFound(name, dir));
    }
    try {
      await fs.remove(dir);
    } catch (error) {
      return fail(ioError(`Cannot remove ${dir}`, error));
    }
    return ok(undefined);
  }

  async computeSizeBytes(name: string): Promise<Result<number>> {
    const dir = this.environmentDir(name);
    if (!(await fs.pathExists(dir))) {
      return fail(notFound(name, dir));
    }
    try {
      return ok(await calculateDirectorySize(dir));
    } catch (error) {
      return fail(ioError(`Cannot scan ${dir}`, error));
    }
  }

  async snapshotDependencies(name: string): Promise<Result<Dependency[]>> {
    if (!(await this.exists(name))) {
      return fail(notFound(name, this.environmentDir(name)));
    }
    const { bin, args } = this.freezeCommand(name);
    const res = await this.run(bin, args);
    if (!res.ok) {
      return fail(res.error);
    }
    return ok(parseFreezeOutput(res.value.stdout));
  }

  async install(name: string, requirements: readonly string[]): Promise<Result<void>> {
    if (requirements.length === 0) {
      return ok(undefined);
    }
    const { bin, args } = this.installCommand(name, [...requirements]);
    const res = await this.run(bin, args);
    if (!res.ok) {
      return fail(res.error);
    }
    return ok(undefined);
  }

  /**
   * Run a command, turning spawn errors and non-zero exits into BACKEND_FAILED
   */
  protected async run(bin: string, args: string[]): Promise<Result<CommandResult>> {
    const log = logger.child(this.kind);
    let res: CommandResult;
    try {
      res = await runCommand(bin, args);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      log.debug(`could not start ${bin}`, { reason });
      return fail(this.backendError(`Could not run ${bin}`, reason));
    }
    if (res.code !== 0) {
      log.debug(`${bin} exited with ${res.code}`, { stderr: res.stderr });
      return fail(this.backendError(`${bin} exited with code ${res.code}`, res.stderr.trim()));
    }
    return ok(res);
  }

  protected backendError(message: string, reason: string): EnvKeepError {
    return new EnvKeepError(ErrorCodes.BACKEND_FAILED, reason ? `${message}: ${reason}` : message, {
      backend: this.kind,
    });
  }
}
