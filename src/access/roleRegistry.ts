/**
 * Role and permission vocabularies and their association.
 *
 * Names are validated once and never renamed. Any change to which
 * permissions a role carries, and any deletion, clears the whole permission
 * cache: working out which users hold the role would cost a query per
 * write, and these edits are rare.
 *
 * @module access/roleRegistry
 */

import type { Logger } from '../logging/logger.js';
import { createLogger } from '../logging/logger.js';
import type { RoleRepository } from '../repositories/types.js';
import type { NewPermission, NewRole, Permission, Role } from '../types/index.js';
import { NotFoundError, PolicyError, ValidationError } from '../utils/errors.js';
import { KeyedLock } from '../utils/keyedLock.js';
import {
  permissionCategory,
  validatePermissionName,
  validateRoleName,
} from '../utils/validators/nameValidator.js';
import type { CacheInvalidator } from './types.js';

export interface RoleRegistryOptions {
  roles: RoleRepository;
  cache: CacheInvalidator;
  logger?: Logger;
  locks?: KeyedLock;
}

export class RoleRegistry {
  private readonly roles: RoleRepository;
  private readonly cache: CacheInvalidator;
  private readonly logger: Logger;
  private readonly locks: KeyedLock;

  constructor(options: RoleRegistryOptions) {
    this.roles = options.roles;
    this.cache = options.cache;
    this.logger = (options.logger ?? createLogger()).child({ component: 'roleRegistry' });
    this.locks = options.locks ?? new KeyedLock();
  }

  /**
   * @throws ValidationError for a malformed name
   * @throws ConflictError when the name exists
   */
  async createRole(input: NewRole): Promise<Role> {
    const check = validateRoleName(input.name);
    if (!check.valid) throw new ValidationError(check.errors);

    const role = await this.roles.createRole({
      name: input.name,
      label: input.label ?? input.name,
      description: input.description ?? '',
      isSystem: input.isSystem ?? false,
    });
    this.logger.info('Role created', { roleId: role.id, name: role.name });
    return role;
  }

  /**
   * The category defaults to the name's first segment.
   *
   * @throws ValidationError for a malformed name
   * @throws ConflictError when the name exists
   */
  async createPermission(input: NewPermission): Promise<Permission> {
    const check = validatePermissionName(input.name);
    if (!check.valid) throw new ValidationError(check.errors);

    const permission = await this.roles.createPermission({
      name: input.name,
      label: input.label ?? input.name,
      category: input.category ?? permissionCategory(input.name),
      description: input.description ?? '',
      isSystem: input.isSystem ?? false,
    });
    this.logger.info('Permission created', { permissionId: permission.id, name: permission.name });
    return permission;
  }

  /** @returns false when the role already carried the permission */
  async assignPermissionToRole(roleId: number, permissionId: number): Promise<boolean> {
    await this.requireRole(roleId);
    await this.requirePermission(permissionId);

    const added = await this.locks.run(roleLockKey(roleId), () =>
      this.roles.addRolePermission(roleId, permissionId),
    );
    if (added) {
      this.cache.invalidateAll();
      this.logger.info('Permission assigned to role', { roleId, permissionId });
    }
    return added;
  }

  /** @returns false when the role did not carry the permission */
  async revokePermissionFromRole(roleId: number, permissionId: number): Promise<boolean> {
    await this.requireRole(roleId);
    await this.requirePermission(permissionId);

    const removed = await this.locks.run(roleLockKey(roleId), () =>
      this.roles.removeRolePermission(roleId, permissionId),
    );
    if (removed) {
      this.cache.invalidateAll();
      this.logger.info('Permission revoked from role', { roleId, permissionId });
    }
    return removed;
  }

  async listRoles(): Promise<Role[]> {
    return this.roles.listRoles();
  }

  async listPermissions(category?: string): Promise<Permission[]> {
    return this.roles.listPermissions(category);
  }

  async listPermissionsForRole(roleId: number): Promise<Permission[]> {
    await this.requireRole(roleId);
    return this.roles.listPermissionsForRole(roleId);
  }

  async findRoleByName(name: string): Promise<Role | null> {
    return this.roles.findRoleByName(name);
  }

  async findPermissionByName(name: string): Promise<Permission | null> {
    return this.roles.findPermissionByName(name);
  }

  /**
   * Remove a role together with its permission associations and grants.
   *
   * @throws PolicyError for a system role
   */
  async deleteRole(roleId: number): Promise<void> {
    const role = await this.requireRole(roleId);
    if (role.isSystem) {
      throw new PolicyError(`Role "${role.name}" is a system role and cannot be deleted`);
    }

    const deleted = await this.locks.run(roleLockKey(roleId), () => this.roles.deleteRole(roleId));
    if (!deleted) throw new NotFoundError('role', roleId);
    this.cache.invalidateAll();
    this.logger.info('Role deleted', { roleId, name: role.name });
  }

  /**
   * @throws PolicyError for a system permission
   */
  async deletePermission(permissionId: number): Promise<void> {
    const permission = await this.requirePermission(permissionId);
    if (permission.isSystem) {
      throw new PolicyError(
        `Permission "${permission.name}" is a system permission and cannot be deleted`,
      );
    }

    if (!(await this.roles.deletePermission(permissionId))) {
      throw new NotFoundError('permission', permissionId);
    }
    this.cache.invalidateAll();
    this.logger.info('Permission deleted', { permissionId, name: permission.name });
  }

  private async requireRole(roleId: number): Promise<Role> {
    const role = await this.roles.findRoleById(roleId);
    if (!role) throw new NotFoundError('role', roleId);
    return role;
  }

  private async requirePermission(permissionId: number): Promise<Permission> {
    const permission = await this.roles.findPermissionById(permissionId);
    if (!permission) throw new NotFoundError('permission', permissionId);
    return permission;
  }
}

function roleLockKey(roleId: number): string {
  return `role:${roleId}`;
}
