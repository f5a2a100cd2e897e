/**
 * Lockfile capture and restore.
 *
 * A lockfile is a versioned YAML document with four sections: tool,
 * environment, dependencies and metadata. Dependencies are written as
 * `name==version` lines sorted by lowercase name so that lockfiles diff
 * cleanly.
 */
import * as os from 'os';
import YAML from 'yaml';
import { z } from 'zod';
import type {
  Advisory,
  Clock,
  Dependency,
  EnvironmentRecord,
  LockSnapshot,
  Platform,
  Result,
  ThawPlan,
} from '../types';
import { corrupt, fail, ok } from '../utils/errors';

export const LOCK_FORMAT_VERSION = 1;
export const TOOL_NAME = 'envkeep';

const REQUIREMENT_PATTERN = /^([A-Za-z0-9][A-Za-z0-9._-]*)==(\S+)$/;

const requirement = z.string().regex(REQUIREMENT_PATTERN, 'expected name==version');

const LockDocumentSchema = z.object({
  tool: z.object({
    name: z.literal(TOOL_NAME),
    format_version: z.number().int(),
  }),
  environment: z.object({
    name: z.string().min(1),
    python_version: z.string().min(1),
  }),
  dependencies: z.array(requirement).nullish().transform((deps) => deps ?? []),
  metadata: z.object({
    generated_at: z.string().refine((value) => !Number.isNaN(Date.parse(value)), {
      message: 'not an ISO-8601 timestamp',
    }),
    platform: z.object({
      system: z.string(),
      machine: z.string(),
    }),
  }),
});

export function currentPlatform(): Platform {
  return { system: os.type(), machine: os.machine() };
}

export function normalizePackageName(name: string): string {
  return name.toLowerCase().replace(/[-_.]+/g, '-');
}

/**
 * Sort by normalized name and drop repeated packages (the last one wins).
 */
export function sortDependencies(dependencies: readonly Dependency[]): Dependency[] {
  const byName = new Map<string, Dependency>();
  for (const dep of dependencies) {
    byName.set(normalizePackageName(dep.name), { name: dep.name, version: dep.version });
  }
  return [...byName.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([, dep]) => dep);
}

export function toRequirement(dep: Dependency): string {
  return `${dep.name}==${dep.version}`;
}

export function generateLock(
  record: EnvironmentRecord,
  dependencies: readonly Dependency[],
  clock: Clock,
  platform: Platform
): LockSnapshot {
  return Object.freeze({
    formatVersion: LOCK_FORMAT_VERSION,
    generatedAt: clock.now(),
    environmentName: record.name,
    pythonVersion: record.pythonVersion,
    dependencies: Object.freeze(sortDependencies(dependencies).map((dep) => Object.freeze(dep))),
    platform: Object.freeze({ ...platform }),
  });
}

export function serializeLock(snapshot: LockSnapshot): string {
  const doc = new YAML.Document({
    tool: { name: TOOL_NAME, format_version: snapshot.formatVersion },
    environment: {
      name: snapshot.environmentName,
      python_version: snapshot.pythonVersion,
    },
    dependencies: snapshot.dependencies.map(toRequirement),
    metadata: {
      generated_at: snapshot.generatedAt.toISOString(),
      platform: { system: snapshot.platform.system, machine: snapshot.platform.machine },
    },
  });
  doc.commentBefore = ` ${TOOL_NAME} lockfile - regenerate with \`${TOOL_NAME} lock ${snapshot.environmentName}\``;
  return doc.toString();
}

/**
 * @param source - shown in Corrupt errors, usually the lockfile path
 */
export function deserializeLock(text: string, source = '<lockfile>'): Result<LockSnapshot> {
  let raw: unknown;
  try {
    raw = YAML.parse(text);
  } catch (error) {
    return fail(corrupt(source, error instanceof Error ? error.message : 'invalid YAML'));
  }

  const parsed = LockDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    const reason = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    return fail(corrupt(source, reason));
  }

  const doc = parsed.data;
  if (doc.tool.format_version !== LOCK_FORMAT_VERSION) {
    return fail(corrupt(source, `unsupported lockfile format_version ${doc.tool.format_version}`));
  }

  const dependencies: Dependency[] = [];
  for (const line of doc.dependencies) {
    const match = REQUIREMENT_PATTERN.exec(line);
    if (match) {
      dependencies.push({ name: match[1], version: match[2] });
    }
  }

  return ok(
    Object.freeze({
      formatVersion: doc.tool.format_version,
      generatedAt: new Date(doc.metadata.generated_at),
      environmentName: doc.environment.name,
      pythonVersion: doc.environment.python_version,
      dependencies: Object.freeze(dependencies),
      platform: Object.freeze({ ...doc.metadata.platform }),
    })
  );
}

function samePlatform(a: Platform, b: Platform): boolean {
  return a.system === b.system && a.machine === b.machine;
}

/**
 * Installation instructions for reproducing a snapshot in `target`.
 * Version and platform differences are reported as advisories; the caller
 * decides whether to go ahead.
 */
export function thawLock(snapshot: LockSnapshot, target: EnvironmentRecord, platform: Platform): ThawPlan {
  const advisories: Advisory[] = [];
  if (snapshot.pythonVersion !== target.pythonVersion) {
    advisories.push({
      code: 'VERSION_MISMATCH',
      expected: snapshot.pythonVersion,
      actual: target.pythonVersion,
    });
  }
  if (!samePlatform(snapshot.platform, platform)) {
    advisories.push({
      code: 'INCOMPATIBLE_PLATFORM',
      expected: { ...snapshot.platform },
      actual: { ...platform },
    });
  }

  return {
    environmentName: target.name,
    instructions: snapshot.dependencies.map((dep) => ({ name: dep.name, version: dep.version })),
    advisories,
  };
}

export function describeAdvisory(advisory: Advisory): string {
  switch (advisory.code) {
    case 'VERSION_MISMATCH':
      return `Lockfile was generated with Python ${advisory.expected}, environment uses ${advisory.actual}`;
    case 'INCOMPATIBLE_PLATFORM':
      return (
        `Lockfile was generated on ${advisory.expected.system}/${advisory.expected.machine}, ` +
        `current platform is ${advisory.actual.system}/${advisory.actual.machine}`
      );
  }
}
