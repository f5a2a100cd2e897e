/**
 * On-disk shape of envkeep.meta.json and its upgrade path.
 *
 * Documents written by older releases may lack fields; those are filled with
 * defaults here so that loading never fails on a merely outdated schema.
 */
import { z } from 'zod';
import type { EnvironmentRecord } from '../types';

const timestamp = z.string().refine((value) => !Number.isNaN(Date.parse(value)), {
  message: 'not an ISO-8601 timestamp',
});

const nullableString = z.string().nullish().transform((value) => value ?? null);

export const MetadataDocumentSchema = z
  .object({
    name: z.string().min(1).optional(),
    description: nullableString,
    tags: z.array(z.string()).nullish().transform((tags) => tags ?? []),
    python_version: z.string().min(1).optional(),
    created_at: timestamp.optional(),
    last_used: timestamp.nullish().transform((value) => value ?? null),
    usage_count: z.number().int().nonnegative().nullish().transform((count) => count ?? 0),
    active: z.boolean().nullish().transform((active) => active ?? false),
    project_root: nullableString,
    size_bytes: z.number().int().nonnegative().nullish().transform((size) => size ?? null),
    tracked_packages: z.array(z.string().min(1)).nullish().transform((specs) => specs ?? []),
  })
  .passthrough();

export interface UpgradeContext {
  /** Directory name; the directory, not the document, carries identity */
  name: string;
  /** Used when the document has no created_at (usually the file mtime) */
  fallbackCreatedAt: Date;
}

export const UNKNOWN_PYTHON_VERSION = 'unknown';

/**
 * Turn a parsed JSON value into a record, filling defaults.
 * Returns the zod issues as a message when the value is not a metadata
 * document at all.
 */
export function upgradeDocument(
  raw: unknown,
  context: UpgradeContext
): { success: true; record: EnvironmentRecord } | { success: false; reason: string } {
  const parsed = MetadataDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    const reason = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    return { success: false, reason };
  }

  const doc = parsed.data;
  let createdAt = doc.created_at ? new Date(doc.created_at) : context.fallbackCreatedAt;
  let lastUsed = doc.last_used ? new Date(doc.last_used) : null;
  let usageCount = doc.usage_count;

  // Keep last_used and usage_count agreeing: a recorded use implies at least
  // one activation, and a count without a timestamp dates back to creation.
  if (lastUsed && usageCount === 0) {
    usageCount = 1;
  } else if (!lastUsed && usageCount > 0) {
    lastUsed = createdAt;
  }
  // An environment cannot be used before it exists.
  if (lastUsed && lastUsed.getTime() < createdAt.getTime()) {
    createdAt = new Date(lastUsed.getTime());
  }

  return {
    success: true,
    record: {
      name: context.name,
      description: doc.description,
      tags: [...new Set(doc.tags)],
      pythonVersion: doc.python_version ?? UNKNOWN_PYTHON_VERSION,
      createdAt,
      lastUsed,
      usageCount,
      active: doc.active,
      projectRoot: doc.project_root,
      sizeBytes: doc.size_bytes,
      trackedPackages: [...new Set(doc.tracked_packages)],
    },
  };
}

export function toDocument(record: EnvironmentRecord): Record<string, unknown> {
  return {
    name: record.name,
    description: record.description,
    tags: [...record.tags],
    python_version: record.pythonVersion,
    created_at: record.createdAt.toISOString(),
    last_used: record.lastUsed ? record.lastUsed.toISOString() : null,
    usage_count: record.usageCount,
    active: record.active,
    project_root: record.projectRoot,
    size_bytes: record.sizeBytes,
    tracked_packages: [...record.trackedPackages],
  };
}

export function cloneRecord(record: EnvironmentRecord): EnvironmentRecord {
  return {
    ...record,
    tags: [...record.tags],
    trackedPackages: [...record.trackedPackages],
    createdAt: new Date(record.createdAt.getTime()),
    lastUsed: record.lastUsed ? new Date(record.lastUsed.getTime()) : null,
  };
}
