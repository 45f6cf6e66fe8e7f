/**
 * Property-based tests for permission resolution.
 *
 * A user's effective permissions are exactly the union of the permissions
 * of every role granted to them.
 *
 * @module access/permissionResolver.property.test
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { createAccessFixture } from '../test/accessFixture.js';
import { roleAssignmentsArb } from '../test/arbitraries.js';

describe('PermissionResolver union (property)', () => {
  it('resolves exactly the union of the granted roles’ permissions', async () => {
    await fc.assert(
      fc.asyncProperty(roleAssignmentsArb, async ({ roles }) => {
        const fx = createAccessFixture();
        const user = fx.user('someone');
        for (const [index, permissions] of roles.entries()) {
          const roleId = await fx.role(`role_${index}`, permissions);
          await fx.grants.assignRoleToUser(user.id, roleId, null, null);
        }

        expect(await fx.resolver.resolve(user.id)).toEqual(new Set(roles.flat()));
      }),
      { numRuns: 40 },
    );
  });
});
