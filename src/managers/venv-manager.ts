/**
 * Standard library backend: `python -m venv` plus the environment's own pip
 */
import { BaseEnvironmentManager } from './base-manager';
import { BackendKind, Result } from '../types';
import { isWindows, resolveFromPATH } from '../utils/core-utils';
import { EnvKeepError, ErrorCodes, fail, ok } from '../utils/errors';

export class VenvManager extends BaseEnvironmentManager {
  readonly kind = BackendKind.VENV;

  /**
   * Find an interpreter for the requested version: python3.11 for "3.11.4",
   * then python3 / python as a last resort.
   */
  resolveInterpreter(pythonVersion: string): string | null {
    const [major, minor] = pythonVersion.split('.');
    const candidates = [
      ...(major && minor ? [`python${major}.${minor}`] : []),
      ...(major ? [`python${major}`] : []),
      isWindows() ? 'python' : 'python3',
    ];
    for (const candidate of candidates) {
      const found = resolveFromPATH(candidate);
      if (found) return found;
    }
    return null;
  }

  protected async createEnvironment(name: string, pythonVersion: string): Promise<Result<void>> {
    const interpreter = this.resolveInterpreter(pythonVersion);
    if (!interpreter) {
      return fail(
        new EnvKeepError(ErrorCodes.BACKEND_FAILED, `No Python interpreter found for version ${pythonVersion}`, {
          backend: this.kind,
        })
      );
    }
    const res = await this.run(interpreter, ['-m', 'venv', this.environmentDir(name)]);
    if (!res.ok) return fail(res.error);
    return ok(undefined);
  }

  protected freezeCommand(name: string): { bin: string; args: string[] } {
    return { bin: this.pythonPath(name), args: ['-m', 'pip', 'freeze', '--all'] };
  }

  protected installCommand(name: string, requirements: string[]): { bin: string; args: string[] } {
    return { bin: this.pythonPath(name), args: ['-m', 'pip', 'install', ...requirements] };
  }
}
