/**
 * Environment backend factory and exports
 */
import { BaseEnvironmentManager, parseFreezeOutput, PYVENV_CFG } from './base-manager';
import { UvManager } from './uv-manager';
import { VenvManager } from './venv-manager';
import { BackendKind } from '../types';

export { BaseEnvironmentManager, UvManager, VenvManager, parseFreezeOutput, PYVENV_CFG };

export function getManager(kind: BackendKind, envsDir: string): BaseEnvironmentManager {
  switch (kind) {
    case BackendKind.UV:
      return new UvManager(envsDir);
    case BackendKind.VENV:
      return new VenvManager(envsDir);
    default:
      throw new Error(`Unsupported backend: ${String(kind)}`);
  }
}
