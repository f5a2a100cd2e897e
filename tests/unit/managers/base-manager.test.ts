import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import chalk from 'chalk';
import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { BackendKind } from '../../../src/types';
import type { Result } from '../../../src/types';
import { BaseEnvironmentManager, PYVENV_CFG, UvManager, VenvManager, getManager, parseFreezeOutput } from '../../../src/managers';
import { EnvKeepError, ErrorCodes, fail, ok } from '../../../src/utils/errors';
import { logger } from '../../../src/utils/logger';

const MISSING_BINARY = 'envkeep-test-no-such-binary';

/**
 * Writes the marker file instead of running a real tool.
 */
class StubManager extends BaseEnvironmentManager {
  readonly kind = BackendKind.VENV;
  failCreate = false;

  protected async createEnvironment(name: string): Promise<Result<void>> {
    const dir = this.environmentDir(name);
    await fs.outputFile(path.join(dir, 'lib', 'site.py'), 'x'.repeat(100));
    if (this.failCreate) {
      return fail(new EnvKeepError(ErrorCodes.BACKEND_FAILED, 'interpreter crashed'));
    }
    await fs.outputFile(path.join(dir, PYVENV_CFG), 'home = /usr/bin\n');
    return ok(undefined);
  }

  protected freezeCommand(): { bin: string; args: string[] } {
    return { bin: MISSING_BINARY, args: ['freeze'] };
  }

  protected installCommand(_name: string, requirements: string[]): { bin: string; args: string[] } {
    return { bin: MISSING_BINARY, args: ['install', ...requirements] };
  }
}

describe('parseFreezeOutput', () => {
  it('keeps pinned requirements only', () => {
    const output = [
      '# generated by pip',
      'Flask==3.0.0',
      '-e git+https://example.invalid/repo.git#egg=local',
      '',
      'numpy==1.26.4 ; python_version >= "3.9"',
      'mylib @ file:///tmp/mylib',
      'requests==2.31.0\r',
    ].join('\n');

    expect(parseFreezeOutput(output)).toEqual([
      { name: 'Flask', version: '3.0.0' },
      { name: 'numpy', version: '1.26.4' },
      { name: 'requests', version: '2.31.0' },
    ]);
  });
});

describe('BaseEnvironmentManager', () => {
  let envsDir: string;
  let manager: StubManager;

  beforeEach(async () => {
    envsDir = await fs.mkdtemp(path.join(os.tmpdir(), 'envkeep-envs-'));
    manager = new StubManager(envsDir);
  });

  afterEach(async () => {
    logger.setLevel('info');
    vi.restoreAllMocks();
    await fs.remove(envsDir);
  });

  it('creates an environment and finds it again', async () => {
    const created = await manager.create('api', '3.11.0');

    expect(created).toEqual({ ok: true, value: path.join(envsDir, 'api') });
    expect(await manager.exists('api')).toBe(true);
    expect(await manager.listEnvironments()).toEqual(['api']);
  });

  it('only counts directories with a pyvenv.cfg as environments', async () => {
    await manager.create('api', '3.11.0');
    await fs.ensureDir(path.join(envsDir, 'metadata-only'));
    await fs.ensureDir(path.join(envsDir, '.cache'));

    expect(await manager.listEnvironments()).toEqual(['api']);
    expect(await manager.exists('metadata-only')).toBe(false);
  });

  it('refuses to create over an existing environment', async () => {
    await manager.create('api', '3.11.0');

    const again = await manager.create('api', '3.12.0');

    expect(!again.ok && again.error.code).toBe(ErrorCodes.ALREADY_EXISTS);
  });

  it('cleans up after a failed creation', async () => {
    manager.failCreate = true;

    const created = await manager.create('api', '3.11.0');

    expect(!created.ok && created.error.message).toBe('interpreter crashed');
    expect(await fs.pathExists(path.join(envsDir, 'api'))).toBe(false);
  });

  it('measures and removes an environment', async () => {
    await manager.create('api', '3.11.0');

    const size = await manager.computeSizeBytes('api');
    expect(size).toEqual({ ok: true, value: 100 + 'home = /usr/bin\n'.length });

    expect((await manager.remove('api')).ok).toBe(true);
    expect(await fs.pathExists(path.join(envsDir, 'api'))).toBe(false);

    const again = await manager.remove('api');
    expect(!again.ok && again.error.code).toBe(ErrorCodes.NOT_FOUND);
  });

  it('turns a tool that cannot be started into a backend failure', async () => {
    await manager.create('api', '3.11.0');

    const frozen = await manager.snapshotDependencies('api');

    expect(frozen.ok).toBe(false);
    if (!frozen.ok) {
      expect(frozen.error.code).toBe(ErrorCodes.BACKEND_FAILED);
      expect(frozen.error.details).toEqual({ backend: 'venv' });
    }
  });

  it('logs command failures under the backend name', async () => {
    await manager.create('api', '3.11.0');
    chalk.level = 0;
    logger.setLevel('debug');
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    await manager.install('api', ['requests']);

    const lines = stderr.mock.calls.map((call) => String(call[0]));
    expect(lines).toContain(`[DEBUG] exec ${MISSING_BINARY} install requests`);
    expect(lines).toContain(`[DEBUG] [venv] could not start ${MISSING_BINARY}`);
  });

  it('skips the installer for an empty package set', async () => {
    await manager.create('api', '3.11.0');

    expect(await manager.install('api', [])).toEqual({ ok: true, value: undefined });
  });

  it('points at the activation script inside the environment', () => {
    const script = manager.activationScript('api');

    expect(script.startsWith(path.join(envsDir, 'api'))).toBe(true);
    expect(path.basename(script)).toBe('activate');
  });
});

describe('getManager', () => {
  it('builds the requested backend', () => {
    expect(getManager(BackendKind.UV, '/envs')).toBeInstanceOf(UvManager);
    expect(getManager(BackendKind.VENV, '/envs')).toBeInstanceOf(VenvManager);
  });
});
