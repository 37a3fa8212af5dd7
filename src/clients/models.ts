/**
 * Portainer Models
 *
 * Domain shapes returned to agents, the zod schemas for the raw Portainer
 * API payloads they are built from, and the conversions between them.
 */

import { z } from "zod";

// --- Domain models ---

export const ACCESS_LEVELS = [
  "environment_administrator",
  "helpdesk_user",
  "standard_user",
  "readonly_user",
  "operator_user",
] as const;

export type AccessLevel = (typeof ACCESS_LEVELS)[number];

/** A user or team id with its access level on an environment or group */
export interface AccessEntry {
  id: number;
  access: AccessLevel;
}

export const USER_ROLES = ["admin", "user", "edge_admin"] as const;

export type UserRole = (typeof USER_ROLES)[number];

export interface EnvironmentTag {
  id: number;
  name: string;
  environmentIds: number[];
}

export type EnvironmentStatus = "active" | "inactive" | "unknown";

export type EnvironmentType =
  | "docker-local"
  | "docker-agent"
  | "azure-aci"
  | "docker-edge-agent"
  | "kubernetes-local"
  | "kubernetes-agent"
  | "kubernetes-edge-agent"
  | "unknown";

export interface Environment {
  id: number;
  name: string;
  status: EnvironmentStatus;
  type: EnvironmentType;
  tagIds: number[];
  userAccesses: AccessEntry[];
  teamAccesses: AccessEntry[];
}

export interface EnvironmentGroup {
  id: number;
  name: string;
  environmentIds: number[];
  tagIds: number[];
}

export interface AccessGroup {
  id: number;
  name: string;
  environmentIds: number[];
  userAccesses: AccessEntry[];
  teamAccesses: AccessEntry[];
}

export interface Stack {
  id: number;
  name: string;
  createdAt: string;
  environmentGroupIds: number[];
}

export interface Team {
  id: number;
  name: string;
  memberIds: number[];
}

export interface User {
  id: number;
  username: string;
  role: UserRole | "unknown";
}

export interface PortainerSettings {
  authentication: {
    method: "internal" | "ldap" | "oauth" | "unknown";
  };
  edge: {
    enabled: boolean;
    checkinInterval: number;
  };
}

// --- Raw API payloads ---

const idList = z
  .array(z.number())
  .nullish()
  .transform((ids) => ids ?? []);

const accessPolicies = z
  .record(z.string(), z.object({ RoleId: z.number() }))
  .nullish()
  .transform((policies) => policies ?? {});

export const rawTagSchema = z.object({
  ID: z.number(),
  Name: z.string(),
  Endpoints: z.record(z.string(), z.boolean()).nullish(),
});

export const rawEndpointSchema = z.object({
  Id: z.number(),
  Name: z.string(),
  Type: z.number(),
  Status: z.number(),
  GroupId: z.number().optional(),
  TagIds: idList,
  UserAccessPolicies: accessPolicies,
  TeamAccessPolicies: accessPolicies,
});

export const rawEdgeGroupSchema = z.object({
  Id: z.number(),
  Name: z.string(),
  Dynamic: z.boolean().optional(),
  PartialMatch: z.boolean().optional(),
  Endpoints: idList,
  TagIds: idList,
});

export const rawEndpointGroupSchema = z.object({
  Id: z.number(),
  Name: z.string(),
  UserAccessPolicies: accessPolicies,
  TeamAccessPolicies: accessPolicies,
});

export const rawEdgeStackSchema = z.object({
  Id: z.number(),
  Name: z.string(),
  CreationDate: z.number(),
  EdgeGroups: idList,
});

export const rawStackFileSchema = z.object({
  StackFileContent: z.string(),
});

export const rawTeamSchema = z.object({
  Id: z.number(),
  Name: z.string(),
});

export const rawTeamMembershipSchema = z.object({
  Id: z.number(),
  UserID: z.number(),
  TeamID: z.number(),
});

export const rawUserSchema = z.object({
  Id: z.number(),
  Username: z.string(),
  Role: z.number(),
});

export const rawSettingsSchema = z.object({
  AuthenticationMethod: z.number(),
  EnableEdgeComputeFeatures: z.boolean().optional(),
  EdgeAgentCheckinInterval: z.number().optional(),
});

export const rawVersionSchema = z.object({
  ServerVersion: z.string(),
});

/** Creation endpoints answer with the new object; only the id matters */
export const rawCreatedSchema = z.union([
  z.object({ Id: z.number() }).transform((raw) => raw.Id),
  z.object({ ID: z.number() }).transform((raw) => raw.ID),
]);

export type RawEndpoint = z.infer<typeof rawEndpointSchema>;
export type RawEdgeGroup = z.infer<typeof rawEdgeGroupSchema>;

// --- Conversions ---

const ENVIRONMENT_TYPES: Record<number, EnvironmentType> = {
  1: "docker-local",
  2: "docker-agent",
  3: "azure-aci",
  4: "docker-edge-agent",
  5: "kubernetes-local",
  6: "kubernetes-agent",
  7: "kubernetes-edge-agent",
};

const USER_ROLE_IDS: Record<UserRole, number> = {
  admin: 1,
  user: 2,
  edge_admin: 3,
};

/** Portainer role ids are 1-based in ACCESS_LEVELS order */
function accessLevelToRoleId(level: AccessLevel): number {
  return ACCESS_LEVELS.indexOf(level) + 1;
}

function roleIdToAccessLevel(roleId: number): AccessLevel | undefined {
  return ACCESS_LEVELS[roleId - 1];
}

export function userRoleToId(role: UserRole): number {
  return USER_ROLE_IDS[role];
}

function userRoleFromId(id: number): UserRole | "unknown" {
  return USER_ROLES.find((role) => USER_ROLE_IDS[role] === id) ?? "unknown";
}

/** Policy maps become entries sorted by id; unknown role ids are dropped */
function toAccessEntries(policies: Record<string, { RoleId: number }>): AccessEntry[] {
  const entries: AccessEntry[] = [];
  for (const [id, policy] of Object.entries(policies)) {
    const access = roleIdToAccessLevel(policy.RoleId);
    if (access) {
      entries.push({ id: Number(id), access });
    }
  }
  return entries.sort((a, b) => a.id - b.id);
}

export function toAccessPolicies(entries: AccessEntry[]): Record<string, { RoleId: number }> {
  return Object.fromEntries(
    entries.map((entry) => [String(entry.id), { RoleId: accessLevelToRoleId(entry.access) }])
  );
}

export function toEnvironmentTag(raw: z.infer<typeof rawTagSchema>): EnvironmentTag {
  const environmentIds = Object.entries(raw.Endpoints ?? {})
    .filter(([, member]) => member)
    .map(([id]) => Number(id))
    .sort((a, b) => a - b);
  return { id: raw.ID, name: raw.Name, environmentIds };
}

export function toEnvironment(raw: RawEndpoint): Environment {
  let status: EnvironmentStatus = "unknown";
  if (raw.Status === 1) {
    status = "active";
  } else if (raw.Status === 2) {
    status = "inactive";
  }

  return {
    id: raw.Id,
    name: raw.Name,
    status,
    type: ENVIRONMENT_TYPES[raw.Type] ?? "unknown",
    tagIds: raw.TagIds,
    userAccesses: toAccessEntries(raw.UserAccessPolicies),
    teamAccesses: toAccessEntries(raw.TeamAccessPolicies),
  };
}

export function toEnvironmentGroup(raw: RawEdgeGroup): EnvironmentGroup {
  return {
    id: raw.Id,
    name: raw.Name,
    environmentIds: raw.Endpoints,
    tagIds: raw.TagIds,
  };
}

export function toAccessGroup(
  raw: z.infer<typeof rawEndpointGroupSchema>,
  environments: RawEndpoint[]
): AccessGroup {
  return {
    id: raw.Id,
    name: raw.Name,
    environmentIds: environments.filter((e) => e.GroupId === raw.Id).map((e) => e.Id),
    userAccesses: toAccessEntries(raw.UserAccessPolicies),
    teamAccesses: toAccessEntries(raw.TeamAccessPolicies),
  };
}

export function toStack(raw: z.infer<typeof rawEdgeStackSchema>): Stack {
  return {
    id: raw.Id,
    name: raw.Name,
    createdAt: new Date(raw.CreationDate * 1000).toISOString(),
    environmentGroupIds: raw.EdgeGroups,
  };
}

export function toTeam(
  raw: z.infer<typeof rawTeamSchema>,
  memberships: Array<z.infer<typeof rawTeamMembershipSchema>>
): Team {
  return {
    id: raw.Id,
    name: raw.Name,
    memberIds: memberships.filter((m) => m.TeamID === raw.Id).map((m) => m.UserID),
  };
}

export function toUser(raw: z.infer<typeof rawUserSchema>): User {
  return { id: raw.Id, username: raw.Username, role: userRoleFromId(raw.Role) };
}

export function toSettings(raw: z.infer<typeof rawSettingsSchema>): PortainerSettings {
  const methods: Record<number, PortainerSettings["authentication"]["method"]> = {
    1: "internal",
    2: "ldap",
    3: "oauth",
  };
  return {
    authentication: { method: methods[raw.AuthenticationMethod] ?? "unknown" },
    edge: {
      enabled: raw.EnableEdgeComputeFeatures ?? false,
      checkinInterval: raw.EdgeAgentCheckinInterval ?? 0,
    },
  };
}
