/**
 * The stock role and permission vocabulary shipped with the core.
 *
 * Five system roles over 31 system permissions in the materials, lab,
 * quality, documents, reports, admin and suppliers namespaces, read from
 * `config/defaultCatalog.json`. Seeding only creates what is missing, so it
 * can run on every start.
 *
 * @module access/defaultCatalog
 */

import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import type { RoleRegistry } from './roleRegistry.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export const DEFAULT_CATALOG_PATH = path.resolve(__dirname, '..', 'config', 'defaultCatalog.json');

export interface CatalogPermission {
  name: string;
  label: string;
  category: string;
}

export interface CatalogRole {
  name: string;
  label: string;
  description: string;
  permissions: string[];
}

export interface Catalog {
  permissions: CatalogPermission[];
  roles: CatalogRole[];
}

export interface SeedResult {
  rolesCreated: number;
  permissionsCreated: number;
  assignmentsCreated: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(source: Record<string, unknown>, key: string, where: string): string {
  const value = source[key];
  if (typeof value !== 'string') throw new Error(`${where}: "${key}" must be a string`);
  return value;
}

function readArray(source: Record<string, unknown>, key: string, where: string): unknown[] {
  const value = source[key];
  if (!Array.isArray(value)) throw new Error(`${where}: "${key}" must be an array`);
  return value;
}

/**
 * Check the shape of a parsed catalog document, and that every role only
 * names permissions the document defines.
 */
export function parseCatalog(raw: unknown): Catalog {
  if (!isRecord(raw)) throw new Error('catalog: document must be an object');

  const permissions = readArray(raw, 'permissions', 'catalog').map((item, index) => {
    const where = `catalog.permissions[${index}]`;
    if (!isRecord(item)) throw new Error(`${where}: must be an object`);
    return {
      name: readString(item, 'name', where),
      label: readString(item, 'label', where),
      category: readString(item, 'category', where),
    };
  });
  const known = new Set(permissions.map((p) => p.name));

  const roles = readArray(raw, 'roles', 'catalog').map((item, index) => {
    const where = `catalog.roles[${index}]`;
    if (!isRecord(item)) throw new Error(`${where}: must be an object`);
    const names = readArray(item, 'permissions', where).map((name) => {
      if (typeof name !== 'string' || !known.has(name)) {
        throw new Error(`${where}: unknown permission ${String(name)}`);
      }
      return name;
    });
    return {
      name: readString(item, 'name', where),
      label: readString(item, 'label', where),
      description: readString(item, 'description', where),
      permissions: names,
    };
  });

  return { permissions, roles };
}

export function loadDefaultCatalog(file: string = DEFAULT_CATALOG_PATH): Catalog {
  const raw: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'));
  return parseCatalog(raw);
}

/**
 * Create any missing catalog roles, permissions and associations.
 * Existing entries are left as they are.
 */
export async function seedDefaultCatalog(
  registry: RoleRegistry,
  catalog: Catalog = loadDefaultCatalog(),
): Promise<SeedResult> {
  const result: SeedResult = { rolesCreated: 0, permissionsCreated: 0, assignmentsCreated: 0 };
  const permissionIds = new Map<string, number>();

  for (const entry of catalog.permissions) {
    let permission = await registry.findPermissionByName(entry.name);
    if (!permission) {
      permission = await registry.createPermission({ ...entry, isSystem: true });
      result.permissionsCreated += 1;
    }
    permissionIds.set(permission.name, permission.id);
  }

  for (const entry of catalog.roles) {
    let role = await registry.findRoleByName(entry.name);
    if (!role) {
      role = await registry.createRole({
        name: entry.name,
        label: entry.label,
        description: entry.description,
        isSystem: true,
      });
      result.rolesCreated += 1;
    }

    for (const name of entry.permissions) {
      const permissionId = permissionIds.get(name);
      if (permissionId === undefined) continue;
      if (await registry.assignPermissionToRole(role.id, permissionId)) {
        result.assignmentsCreated += 1;
      }
    }
  }

  return result;
}
