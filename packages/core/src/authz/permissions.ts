import { AuthzError } from "../internal/errors.js";

export const PERMISSION_LEVELS = ["READ", "EDIT", "MANAGE", "NO_PERMISSIONS"] as const;

export type PermissionLevel = (typeof PERMISSION_LEVELS)[number];

export type Capability = "read" | "update" | "delete" | "manage";

export type Capabilities = {
  canRead: boolean;
  canUpdate: boolean;
  canDelete: boolean;
  canManage: boolean;
};

const CAPABILITIES: Record<PermissionLevel, Capabilities> = {
  READ: { canRead: true, canUpdate: false, canDelete: false, canManage: false },
  EDIT: { canRead: true, canUpdate: true, canDelete: false, canManage: false },
  MANAGE: { canRead: true, canUpdate: true, canDelete: true, canManage: true },
  NO_PERMISSIONS: { canRead: false, canUpdate: false, canDelete: false, canManage: false },
};

// Strength order used when two grants have to be merged into one.
const RANK: Record<PermissionLevel, number> = {
  NO_PERMISSIONS: 0,
  READ: 1,
  EDIT: 2,
  MANAGE: 3,
};

export function isPermissionLevel(value: unknown): value is PermissionLevel {
  return typeof value === "string" && (PERMISSION_LEVELS as readonly string[]).includes(value);
}

export function parsePermissionLevel(value: unknown): PermissionLevel {
  if (isPermissionLevel(value)) return value;
  throw AuthzError.invalidPermissionLevel(String(value));
}

export function capabilitiesOf(level: PermissionLevel | string): Capabilities {
  return CAPABILITIES[parsePermissionLevel(level)];
}

export function hasCapability(level: PermissionLevel, capability: Capability): boolean {
  const caps = CAPABILITIES[level];
  switch (capability) {
    case "read":
      return caps.canRead;
    case "update":
      return caps.canUpdate;
    case "delete":
      return caps.canDelete;
    case "manage":
      return caps.canManage;
  }
}

export function strongerOf(a: PermissionLevel, b: PermissionLevel): PermissionLevel {
  return RANK[a] >= RANK[b] ? a : b;
}
