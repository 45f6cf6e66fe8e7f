/**
 * Property-based tests for the audit trail hash chain.
 *
 * Changing any field of any recorded entry breaks verification at exactly
 * that entry's index.
 *
 * @module audit/auditTrail.property.test
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { AuditTrail } from './auditTrail.js';

describe('AuditTrail chain integrity (property)', () => {
  it('detects tampering with any entry of any chain', async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.array(fc.string({ minLength: 1, maxLength: 12 }), { minLength: 1, maxLength: 8 }),
        fc.nat(),
        async (targets, pick) => {
          const chain = new AuditTrail();
          for (const target of targets) {
            await chain.record({
              actor: '7',
              action: 'authorize',
              target,
              outcome: 'denied',
              timestamp: new Date('2024-06-01T12:00:00Z'),
            });
          }
          const entries = await chain.query();
          const index = pick % entries.length;
          entries[index]!.target = `${entries[index]!.target}~`;

          const result = await chain.verifyChain();
          expect(result.valid).toBe(false);
          expect(result.firstInvalidIndex).toBe(index);
        },
      ),
      { numRuns: 50 },
    );
  });
});
