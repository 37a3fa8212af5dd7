/**
 * Client exports
 */

export { PortainerClient, type PortainerClientOptions } from "./portainer.js";

export type {
  BackendClient,
  CallOptions,
  HttpMethod,
  ProxyEngine,
  ProxyRequest,
  ProxyResponse,
} from "./types.js";
export { HTTP_METHODS } from "./types.js";

export {
  ACCESS_LEVELS,
  USER_ROLES,
  type AccessEntry,
  type AccessGroup,
  type AccessLevel,
  type Environment,
  type EnvironmentGroup,
  type EnvironmentTag,
  type PortainerSettings,
  type Stack,
  type Team,
  type User,
  type UserRole,
} from "./models.js";
