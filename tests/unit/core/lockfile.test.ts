import { describe, it, expect } from 'vitest';
import {
  LOCK_FORMAT_VERSION,
  describeAdvisory,
  deserializeLock,
  generateLock,
  normalizePackageName,
  serializeLock,
  sortDependencies,
  thawLock,
} from '../../../src/core/lockfile';
import { ErrorCodes } from '../../../src/utils/errors';
import { NOW, fixedClock, makeRecord } from '../../helpers';

const linux = { system: 'Linux', machine: 'x86_64' };

const dependencies = [
  { name: 'requests', version: '2.31.0' },
  { name: 'Flask', version: '3.0.0' },
  { name: 'numpy', version: '1.26.4' },
];

function snapshotFor(pythonVersion: string) {
  return generateLock(makeRecord({ name: 'api', pythonVersion }), dependencies, fixedClock(NOW), linux);
}

describe('sortDependencies', () => {
  it('sorts by normalized name and keeps the last duplicate', () => {
    const sorted = sortDependencies([
      { name: 'Requests', version: '2.31.0' },
      { name: 'zope.interface', version: '6.1' },
      { name: 'flask', version: '3.0.0' },
      { name: 'Flask', version: '3.0.1' },
    ]);

    expect(sorted).toEqual([
      { name: 'Flask', version: '3.0.1' },
      { name: 'Requests', version: '2.31.0' },
      { name: 'zope.interface', version: '6.1' },
    ]);
  });

  it('normalizes separators and case', () => {
    expect(normalizePackageName('Zope.Interface')).toBe('zope-interface');
    expect(normalizePackageName('typing__extensions')).toBe('typing-extensions');
  });
});

describe('generateLock', () => {
  it('captures the record, the sorted packages and the platform', () => {
    const snapshot = snapshotFor('3.11.0');

    expect(snapshot).toEqual({
      formatVersion: LOCK_FORMAT_VERSION,
      generatedAt: NOW,
      environmentName: 'api',
      pythonVersion: '3.11.0',
      dependencies: [
        { name: 'Flask', version: '3.0.0' },
        { name: 'numpy', version: '1.26.4' },
        { name: 'requests', version: '2.31.0' },
      ],
      platform: linux,
    });
    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot.dependencies)).toBe(true);
  });
});

describe('serializeLock / deserializeLock', () => {
  it('writes a commented YAML document with name==version lines', () => {
    const lines = serializeLock(snapshotFor('3.11.0')).split('\n');

    expect(lines[0]).toBe('# envkeep lockfile - regenerate with `envkeep lock api`');
    expect(lines).toContain('  format_version: 1');
    expect(lines).toContain('  python_version: 3.11.0');
    expect(lines).toContain('  - Flask==3.0.0');
    expect(lines).toContain('  generated_at: 2026-06-01T12:00:00.000Z');
  });

  it('reads back what it wrote', () => {
    const snapshot = snapshotFor('3.11.0');

    const parsed = deserializeLock(serializeLock(snapshot));

    expect(parsed).toEqual({ ok: true, value: snapshot });
  });

  it('accepts a lockfile without dependencies', () => {
    const text = [
      'tool:',
      '  name: envkeep',
      '  format_version: 1',
      'environment:',
      '  name: empty',
      '  python_version: 3.12.1',
      'metadata:',
      '  generated_at: 2026-01-02T03:04:05.000Z',
      '  platform:',
      '    system: Darwin',
      '    machine: arm64',
    ].join('\n');

    const parsed = deserializeLock(text);

    expect(parsed.ok && parsed.value.dependencies).toEqual([]);
    expect(parsed.ok && parsed.value.platform).toEqual({ system: 'Darwin', machine: 'arm64' });
  });

  it.each([
    ['broken YAML', 'tool: [unclosed'],
    ['an empty document', ''],
    ['a missing environment section', 'tool:\n  name: envkeep\n  format_version: 1\n'],
  ])('reports %s as corrupt', (_, text) => {
    const parsed = deserializeLock(text, '/envs/api/envkeep.lock');

    expect(parsed.ok).toBe(false);
    if (!parsed.ok) {
      expect(parsed.error.code).toBe(ErrorCodes.CORRUPT);
      expect(parsed.error.details?.path).toBe('/envs/api/envkeep.lock');
    }
  });

  it('rejects requirements that are not pinned', () => {
    const text = serializeLock(snapshotFor('3.11.0')).replace('requests==2.31.0', 'requests>=2');

    const parsed = deserializeLock(text);

    expect(parsed.ok).toBe(false);
    if (!parsed.ok) {
      expect(parsed.error.details?.reason).toBe('dependencies.2: expected name==version');
    }
  });

  it('rejects a newer format version', () => {
    const text = serializeLock(snapshotFor('3.11.0')).replace('format_version: 1', 'format_version: 2');

    const parsed = deserializeLock(text);

    expect(parsed.ok).toBe(false);
    if (!parsed.ok) {
      expect(parsed.error.details?.reason).toBe('unsupported lockfile format_version 2');
    }
  });
});

describe('thawLock', () => {
  it('succeeds with a version advisory when the interpreter differs', () => {
    const plan = thawLock(snapshotFor('3.10.0'), makeRecord({ name: 'api', pythonVersion: '3.11.0' }), linux);

    expect(plan.advisories).toEqual([{ code: 'VERSION_MISMATCH', expected: '3.10.0', actual: '3.11.0' }]);
    expect(plan.instructions).toEqual([
      { name: 'Flask', version: '3.0.0' },
      { name: 'numpy', version: '1.26.4' },
      { name: 'requests', version: '2.31.0' },
    ]);
  });

  it('has no advisories for a matching environment', () => {
    const plan = thawLock(snapshotFor('3.11.0'), makeRecord({ name: 'api-copy', pythonVersion: '3.11.0' }), linux);

    expect(plan.environmentName).toBe('api-copy');
    expect(plan.advisories).toEqual([]);
  });

  it('notes a different platform', () => {
    const mac = { system: 'Darwin', machine: 'arm64' };

    const plan = thawLock(snapshotFor('3.11.0'), makeRecord({ pythonVersion: '3.11.0' }), mac);

    expect(plan.advisories).toEqual([{ code: 'INCOMPATIBLE_PLATFORM', expected: linux, actual: mac }]);
    expect(describeAdvisory(plan.advisories[0])).toBe(
      'Lockfile was generated on Linux/x86_64, current platform is Darwin/arm64'
    );
  });
});
