/**
 * Requirement specs accepted by `add`, and the tracked-package list kept on
 * each record.
 */
import type { Result } from '../types';
import { EnvKeepError, ErrorCodes, fail, ok } from '../utils/errors';
import { normalizePackageName } from './lockfile';

const SPEC_PATTERN = /^([A-Za-z0-9][A-Za-z0-9._-]*)(\[[A-Za-z0-9._,-]*\])?(\s*(?:===|==|~=|!=|>=|<=|<|>)\s*\S+)*$/;

/**
 * Normalized package name of a spec such as `Django>=4.2` or `uvicorn[standard]`,
 * or null when the text is not a plain requirement.
 */
export function requirementName(spec: string): string | null {
  const match = SPEC_PATTERN.exec(spec.trim());
  return match ? normalizePackageName(match[1]) : null;
}

export function validateRequirements(specs: readonly string[]): Result<string[]> {
  if (specs.length === 0) {
    return fail(new EnvKeepError(ErrorCodes.INVALID_REQUIREMENT, 'No packages given'));
  }
  const cleaned: string[] = [];
  for (const spec of specs) {
    if (requirementName(spec) === null) {
      return fail(
        new EnvKeepError(ErrorCodes.INVALID_REQUIREMENT, `'${spec}' is not a package requirement`, { spec })
      );
    }
    cleaned.push(spec.trim());
  }
  return ok(cleaned);
}

/**
 * One spec per package; a later spec for the same package replaces the
 * earlier one in place.
 */
export function mergeTracked(existing: readonly string[], added: readonly string[]): string[] {
  const byName = new Map<string, string>();
  for (const spec of [...existing, ...added]) {
    byName.set(requirementName(spec) ?? spec, spec);
  }
  return [...byName.values()];
}
