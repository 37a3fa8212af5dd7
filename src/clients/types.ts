/**
 * Backend Client Types
 *
 * The narrow surface the tool handlers call into: one typed method per
 * domain operation and two raw-forwarding methods, one per engine.
 */

import type { ReadableStream } from "node:stream/web";
import type {
  AccessEntry,
  AccessGroup,
  Environment,
  EnvironmentGroup,
  EnvironmentTag,
  PortainerSettings,
  Stack,
  Team,
  User,
  UserRole,
} from "./models.js";

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE" | "HEAD";

export const HTTP_METHODS: readonly HttpMethod[] = ["GET", "POST", "PUT", "PATCH", "DELETE", "HEAD"];

export type ProxyEngine = "docker" | "kubernetes";

/** A verbatim request for an engine API behind a Portainer environment */
export interface ProxyRequest {
  environmentId: number;
  method: HttpMethod;
  /** Path below the engine root, starting with "/" */
  path: string;
  /** Query pairs in order; repeated keys allowed */
  query: Array<[string, string]>;
  /** Header pairs in order; repeated names allowed */
  headers: Array<[string, string]>;
  body?: string;
}

/**
 * Upstream response as received. The body is the live stream from the
 * engine: consumers read it incrementally and must cancel it when they stop.
 */
export interface ProxyResponse {
  status: number;
  statusText: string;
  headers: Array<[string, string]>;
  body: ReadableStream<Uint8Array> | null;
}

/** Per-call options; the signal aborts the in-flight backend request */
export interface CallOptions {
  signal?: AbortSignal;
}

export interface BackendClient {
  // Tag methods
  getEnvironmentTags(options?: CallOptions): Promise<EnvironmentTag[]>;
  createEnvironmentTag(name: string, options?: CallOptions): Promise<number>;

  // Environment methods
  getEnvironments(options?: CallOptions): Promise<Environment[]>;
  updateEnvironmentTags(id: number, tagIds: number[], options?: CallOptions): Promise<void>;
  updateEnvironmentUserAccesses(
    id: number,
    accesses: AccessEntry[],
    options?: CallOptions
  ): Promise<void>;
  updateEnvironmentTeamAccesses(
    id: number,
    accesses: AccessEntry[],
    options?: CallOptions
  ): Promise<void>;

  // Environment group methods
  getEnvironmentGroups(options?: CallOptions): Promise<EnvironmentGroup[]>;
  createEnvironmentGroup(
    name: string,
    environmentIds: number[],
    options?: CallOptions
  ): Promise<number>;
  updateEnvironmentGroupName(id: number, name: string, options?: CallOptions): Promise<void>;
  updateEnvironmentGroupEnvironments(
    id: number,
    environmentIds: number[],
    options?: CallOptions
  ): Promise<void>;
  updateEnvironmentGroupTags(id: number, tagIds: number[], options?: CallOptions): Promise<void>;

  // Access group methods
  getAccessGroups(options?: CallOptions): Promise<AccessGroup[]>;
  createAccessGroup(name: string, environmentIds: number[], options?: CallOptions): Promise<number>;
  updateAccessGroupName(id: number, name: string, options?: CallOptions): Promise<void>;
  updateAccessGroupUserAccesses(
    id: number,
    accesses: AccessEntry[],
    options?: CallOptions
  ): Promise<void>;
  updateAccessGroupTeamAccesses(
    id: number,
    accesses: AccessEntry[],
    options?: CallOptions
  ): Promise<void>;
  addEnvironmentToAccessGroup(
    id: number,
    environmentId: number,
    options?: CallOptions
  ): Promise<void>;
  removeEnvironmentFromAccessGroup(
    id: number,
    environmentId: number,
    options?: CallOptions
  ): Promise<void>;

  // Stack methods
  getStacks(options?: CallOptions): Promise<Stack[]>;
  getStackFile(id: number, options?: CallOptions): Promise<string>;
  createStack(
    name: string,
    file: string,
    environmentGroupIds: number[],
    options?: CallOptions
  ): Promise<number>;
  updateStack(
    id: number,
    file: string,
    environmentGroupIds: number[],
    options?: CallOptions
  ): Promise<void>;

  // Team methods
  createTeam(name: string, options?: CallOptions): Promise<number>;
  getTeams(options?: CallOptions): Promise<Team[]>;
  updateTeamName(id: number, name: string, options?: CallOptions): Promise<void>;
  updateTeamMembers(id: number, userIds: number[], options?: CallOptions): Promise<void>;

  // User methods
  getUsers(options?: CallOptions): Promise<User[]>;
  updateUserRole(id: number, role: UserRole, options?: CallOptions): Promise<void>;

  // Settings and version
  getSettings(options?: CallOptions): Promise<PortainerSettings>;
  getVersion(options?: CallOptions): Promise<string>;

  // Raw engine proxies
  proxyDockerRequest(request: ProxyRequest, options?: CallOptions): Promise<ProxyResponse>;
  proxyKubernetesRequest(request: ProxyRequest, options?: CallOptions): Promise<ProxyResponse>;
}
