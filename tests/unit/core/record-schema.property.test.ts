/**
 * Property tests for metadata upgrades
 */
import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { toDocument, upgradeDocument } from '../../../src/core/record-schema';
import type { EnvironmentRecord } from '../../../src/types';

const RANGE = { min: Date.UTC(2000, 0, 1), max: Date.UTC(2030, 0, 1) };

const dateArb = fc.integer(RANGE).map((ms) => new Date(ms));
const isoArb = dateArb.map((date) => date.toISOString());

const documentArb = fc.record(
  {
    python_version: fc.constantFrom('3.9.7', '3.11.0', '3.12.1'),
    created_at: isoArb,
    last_used: fc.option(isoArb, { nil: null }),
    usage_count: fc.nat({ max: 500 }),
    tags: fc.array(fc.constantFrom('web', 'ml', 'gpu'), { maxLength: 4 }),
  },
  { requiredKeys: [] }
);

function upgrade(doc: unknown, fallbackCreatedAt: Date): EnvironmentRecord {
  const result = upgradeDocument(doc, { name: 'api', fallbackCreatedAt });
  if (!result.success) throw new Error(result.reason);
  return result.record;
}

describe('upgradeDocument properties', () => {
  it('has a last use exactly when the usage count is positive', () => {
    fc.assert(
      fc.property(documentArb, dateArb, (doc, fallback) => {
        const record = upgrade(doc, fallback);

        expect(record.lastUsed === null).toBe(record.usageCount === 0);
      })
    );
  });

  it('never puts the last use before creation', () => {
    fc.assert(
      fc.property(documentArb, dateArb, (doc, fallback) => {
        const record = upgrade(doc, fallback);

        if (record.lastUsed) {
          expect(record.createdAt.getTime()).toBeLessThanOrEqual(record.lastUsed.getTime());
        }
      })
    );
  });

  it('leaves an upgraded record unchanged when written and read again', () => {
    fc.assert(
      fc.property(documentArb, dateArb, dateArb, (doc, fallback, laterFallback) => {
        const record = upgrade(doc, fallback);

        expect(upgrade(toDocument(record), laterFallback)).toEqual(record);
      })
    );
  });
});
