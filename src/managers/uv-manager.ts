/**
 * uv backend: `uv venv` creates environments, `uv pip` inspects and installs
 */
import { BaseEnvironmentManager } from './base-manager';
import { BackendKind, Result } from '../types';
import { uvBinary } from '../utils/core-utils';
import { EnvKeepError, ErrorCodes, fail, ok } from '../utils/errors';

export class UvManager extends BaseEnvironmentManager {
  readonly kind = BackendKind.UV;

  private binary(): Result<string> {
    const bin = uvBinary();
    if (!bin) {
      return fail(
        new EnvKeepError(ErrorCodes.BACKEND_FAILED, 'uv not found. Install it or set ENVKEEP_UV to its path.', {
          backend: this.kind,
        })
      );
    }
    return ok(bin);
  }

  protected async createEnvironment(name: string, pythonVersion: string): Promise<Result<void>> {
    const bin = this.binary();
    if (!bin.ok) return bin;
    const res = await this.run(bin.value, ['venv', this.environmentDir(name), '--python', pythonVersion]);
    if (!res.ok) return fail(res.error);
    return ok(undefined);
  }

  protected freezeCommand(name: string): { bin: string; args: string[] } {
    // an unresolved binary surfaces as a spawn error from run()
    return { bin: uvBinary() ?? 'uv', args: ['pip', 'freeze', '--python', this.pythonPath(name)] };
  }

  protected installCommand(name: string, requirements: string[]): { bin: string; args: string[] } {
    return { bin: uvBinary() ?? 'uv', args: ['pip', 'install', '--python', this.pythonPath(name), ...requirements] };
  }
}
