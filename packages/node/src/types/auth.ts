/**
 * Authentication and authorization types.
 *
 * API keys via the X-Api-Key header. Role hierarchy: admin > viewer.
 * An admin key acts as the vault owner.
 */

// =============================================================================
// Roles & Permissions
// =============================================================================

export type Role = "admin" | "viewer";

/** Permission levels for role-based access control */
export type Permission = "read" | "admin";

/** Which permissions each role grants */
export const ROLE_PERMISSIONS: Record<Role, readonly Permission[]> = {
  viewer: ["read"],
  admin: ["read", "admin"],
};

export function isRole(value: string): value is Role {
  return value === "admin" || value === "viewer";
}

/**
 * Check whether a role has a specific permission.
 */
export function hasPermission(role: Role, permission: Permission): boolean {
  return ROLE_PERMISSIONS[role].includes(permission);
}

// =============================================================================
// Auth Context
// =============================================================================

/**
 * Resolved authentication context, set by the auth middleware.
 */
export interface AuthContext {
  readonly type: "api-key";
  readonly identity: string;
  readonly role: Role;
}

export interface ApiKeyRecord {
  readonly key: string;
  readonly role: Role;
}
