/**
 * Portainer API Client
 *
 * Typed access to the Portainer REST API plus raw forwarding into the
 * Docker and Kubernetes APIs Portainer exposes per environment.
 *
 * One instance is shared by every in-flight call. It holds no per-call
 * state: cancellation travels in each call's options.
 */

import {
  request as httpRequest,
  type IncomingMessage,
  type OutgoingHttpHeaders,
  type RequestOptions as HttpRequestOptions,
} from "node:http";
import { request as httpsRequest } from "node:https";
import { Readable } from "node:stream";
import type { z } from "zod";
import {
  ApiError,
  InvalidArgumentsError,
  UpstreamUnreachableError,
  ValidationError,
} from "../shared/errors.js";
import { createLogger } from "../shared/logger.js";
import { withRetry, type RetryOptions } from "../shared/retry.js";
import { TimeoutError } from "../shared/timeout.js";
import { SpanAttributes, SpanOperations, withSpan } from "../shared/tracing.js";
import {
  rawCreatedSchema,
  rawEdgeGroupSchema,
  rawEdgeStackSchema,
  rawEndpointGroupSchema,
  rawEndpointSchema,
  rawSettingsSchema,
  rawStackFileSchema,
  rawTagSchema,
  rawTeamMembershipSchema,
  rawTeamSchema,
  rawUserSchema,
  rawVersionSchema,
  toAccessGroup,
  toAccessPolicies,
  toEnvironment,
  toEnvironmentGroup,
  toEnvironmentTag,
  toSettings,
  toStack,
  toTeam,
  toUser,
  userRoleToId,
  type AccessEntry,
  type AccessGroup,
  type Environment,
  type EnvironmentGroup,
  type EnvironmentTag,
  type PortainerSettings,
  type RawEdgeGroup,
  type Stack,
  type Team,
  type User,
  type UserRole,
} from "./models.js";
import type {
  BackendClient,
  CallOptions,
  HttpMethod,
  ProxyEngine,
  ProxyRequest,
  ProxyResponse,
} from "./types.js";

const logger = createLogger("PortainerClient");

/** Membership role for a regular team member */
const TEAM_MEMBER_ROLE = 2;

/** Edge stacks deployed through Compose */
const COMPOSE_DEPLOYMENT = 0;

/** Headers the caller may not set on a proxied request */
const STRIPPED_PROXY_HEADERS = new Set([
  "x-api-key",
  "authorization",
  "host",
  "connection",
  "content-length",
  "transfer-encoding",
]);

export interface PortainerClientOptions {
  /** Base URL without trailing slash, e.g. https://portainer.example.com */
  serverUrl: string;
  apiToken: string;
  /** Retry tuning for idempotent reads */
  retry?: Partial<Omit<RetryOptions, "signal">>;
}

interface RequestOptions extends CallOptions {
  body?: unknown;
}

export class PortainerClient implements BackendClient {
  private readonly baseUrl: string;
  private readonly apiToken: string;
  private readonly retry: Partial<Omit<RetryOptions, "signal">>;

  constructor(options: PortainerClientOptions) {
    this.baseUrl = options.serverUrl.replace(/\/+$/, "");
    this.apiToken = options.apiToken;
    this.retry = options.retry ?? {};
  }

  // --- Tags ---

  async getEnvironmentTags(options?: CallOptions): Promise<EnvironmentTag[]> {
    const tags = await this.requestJson("GET", "/api/tags", rawTagSchema.array(), options);
    return tags.map(toEnvironmentTag);
  }

  async createEnvironmentTag(name: string, options?: CallOptions): Promise<number> {
    return this.requestJson("POST", "/api/tags", rawCreatedSchema, { ...options, body: { name } });
  }

  // --- Environments ---

  async getEnvironments(options?: CallOptions): Promise<Environment[]> {
    const endpoints = await this.getRawEndpoints(options);
    return endpoints.map(toEnvironment);
  }

  async updateEnvironmentTags(id: number, tagIds: number[], options?: CallOptions): Promise<void> {
    await this.requestNoContent("PUT", `/api/endpoints/${id}`, {
      ...options,
      body: { tagIDs: tagIds },
    });
  }

  async updateEnvironmentUserAccesses(
    id: number,
    accesses: AccessEntry[],
    options?: CallOptions
  ): Promise<void> {
    await this.requestNoContent("PUT", `/api/endpoints/${id}`, {
      ...options,
      body: { userAccessPolicies: toAccessPolicies(accesses) },
    });
  }

  async updateEnvironmentTeamAccesses(
    id: number,
    accesses: AccessEntry[],
    options?: CallOptions
  ): Promise<void> {
    await this.requestNoContent("PUT", `/api/endpoints/${id}`, {
      ...options,
      body: { teamAccessPolicies: toAccessPolicies(accesses) },
    });
  }

  // --- Environment groups (edge groups) ---

  async getEnvironmentGroups(options?: CallOptions): Promise<EnvironmentGroup[]> {
    const groups = await this.requestJson(
      "GET",
      "/api/edge_groups",
      rawEdgeGroupSchema.array(),
      options
    );
    return groups.map(toEnvironmentGroup);
  }

  async createEnvironmentGroup(
    name: string,
    environmentIds: number[],
    options?: CallOptions
  ): Promise<number> {
    return this.requestJson("POST", "/api/edge_groups", rawCreatedSchema, {
      ...options,
      body: { name, dynamic: false, endpoints: environmentIds, tagIds: [] },
    });
  }

  async updateEnvironmentGroupName(id: number, name: string, options?: CallOptions): Promise<void> {
    await this.updateEdgeGroup(id, (group) => ({ ...group, Name: name }), options);
  }

  async updateEnvironmentGroupEnvironments(
    id: number,
    environmentIds: number[],
    options?: CallOptions
  ): Promise<void> {
    await this.updateEdgeGroup(id, (group) => ({ ...group, Endpoints: environmentIds }), options);
  }

  async updateEnvironmentGroupTags(
    id: number,
    tagIds: number[],
    options?: CallOptions
  ): Promise<void> {
    await this.updateEdgeGroup(id, (group) => ({ ...group, TagIds: tagIds }), options);
  }

  // --- Access groups (endpoint groups) ---

  async getAccessGroups(options?: CallOptions): Promise<AccessGroup[]> {
    const [groups, endpoints] = await Promise.all([
      this.requestJson("GET", "/api/endpoint_groups", rawEndpointGroupSchema.array(), options),
      this.getRawEndpoints(options),
    ]);
    return groups.map((group) => toAccessGroup(group, endpoints));
  }

  async createAccessGroup(
    name: string,
    environmentIds: number[],
    options?: CallOptions
  ): Promise<number> {
    return this.requestJson("POST", "/api/endpoint_groups", rawCreatedSchema, {
      ...options,
      body: { name, associatedEndpoints: environmentIds },
    });
  }

  async updateAccessGroupName(id: number, name: string, options?: CallOptions): Promise<void> {
    await this.requestNoContent("PUT", `/api/endpoint_groups/${id}`, { ...options, body: { name } });
  }

  async updateAccessGroupUserAccesses(
    id: number,
    accesses: AccessEntry[],
    options?: CallOptions
  ): Promise<void> {
    await this.requestNoContent("PUT", `/api/endpoint_groups/${id}`, {
      ...options,
      body: { userAccessPolicies: toAccessPolicies(accesses) },
    });
  }

  async updateAccessGroupTeamAccesses(
    id: number,
    accesses: AccessEntry[],
    options?: CallOptions
  ): Promise<void> {
    await this.requestNoContent("PUT", `/api/endpoint_groups/${id}`, {
      ...options,
      body: { teamAccessPolicies: toAccessPolicies(accesses) },
    });
  }

  async addEnvironmentToAccessGroup(
    id: number,
    environmentId: number,
    options?: CallOptions
  ): Promise<void> {
    await this.requestNoContent(
      "PUT",
      `/api/endpoint_groups/${id}/endpoints/${environmentId}`,
      options ?? {}
    );
  }

  async removeEnvironmentFromAccessGroup(
    id: number,
    environmentId: number,
    options?: CallOptions
  ): Promise<void> {
    await this.requestNoContent(
      "DELETE",
      `/api/endpoint_groups/${id}/endpoints/${environmentId}`,
      options ?? {}
    );
  }

  // --- Stacks (edge stacks) ---

  async getStacks(options?: CallOptions): Promise<Stack[]> {
    const stacks = await this.requestJson(
      "GET",
      "/api/edge_stacks",
      rawEdgeStackSchema.array(),
      options
    );
    return stacks.map(toStack);
  }

  async getStackFile(id: number, options?: CallOptions): Promise<string> {
    const file = await this.requestJson(
      "GET",
      `/api/edge_stacks/${id}/file`,
      rawStackFileSchema,
      options
    );
    return file.StackFileContent;
  }

  async createStack(
    name: string,
    file: string,
    environmentGroupIds: number[],
    options?: CallOptions
  ): Promise<number> {
    return this.requestJson("POST", "/api/edge_stacks/create/string", rawCreatedSchema, {
      ...options,
      body: {
        name,
        stackFileContent: file,
        edgeGroups: environmentGroupIds,
        deploymentType: COMPOSE_DEPLOYMENT,
      },
    });
  }

  async updateStack(
    id: number,
    file: string,
    environmentGroupIds: number[],
    options?: CallOptions
  ): Promise<void> {
    await this.requestNoContent("PUT", `/api/edge_stacks/${id}`, {
      ...options,
      body: {
        stackFileContent: file,
        edgeGroups: environmentGroupIds,
        deploymentType: COMPOSE_DEPLOYMENT,
        updateVersion: true,
      },
    });
  }

  // --- Teams ---

  async createTeam(name: string, options?: CallOptions): Promise<number> {
    return this.requestJson("POST", "/api/teams", rawCreatedSchema, { ...options, body: { name } });
  }

  async getTeams(options?: CallOptions): Promise<Team[]> {
    const [teams, memberships] = await Promise.all([
      this.requestJson("GET", "/api/teams", rawTeamSchema.array(), options),
      this.getTeamMemberships(options),
    ]);
    return teams.map((team) => toTeam(team, memberships));
  }

  async updateTeamName(id: number, name: string, options?: CallOptions): Promise<void> {
    await this.requestNoContent("PUT", `/api/teams/${id}`, { ...options, body: { name } });
  }

  /**
   * Make the team's members exactly `userIds`: memberships for other users
   * are removed, missing ones created.
   */
  async updateTeamMembers(id: number, userIds: number[], options?: CallOptions): Promise<void> {
    const memberships = (await this.getTeamMemberships(options)).filter((m) => m.TeamID === id);
    const wanted = new Set(userIds);
    const current = new Set(memberships.map((m) => m.UserID));

    for (const membership of memberships) {
      if (!wanted.has(membership.UserID)) {
        await this.requestNoContent(
          "DELETE",
          `/api/team_memberships/${membership.Id}`,
          options ?? {}
        );
      }
    }

    for (const userId of wanted) {
      if (!current.has(userId)) {
        await this.requestNoContent("POST", "/api/team_memberships", {
          ...options,
          body: { userID: userId, teamID: id, role: TEAM_MEMBER_ROLE },
        });
      }
    }
  }

  // --- Users ---

  async getUsers(options?: CallOptions): Promise<User[]> {
    const users = await this.requestJson("GET", "/api/users", rawUserSchema.array(), options);
    return users.map(toUser);
  }

  async updateUserRole(id: number, role: UserRole, options?: CallOptions): Promise<void> {
    await this.requestNoContent("PUT", `/api/users/${id}`, {
      ...options,
      body: { role: userRoleToId(role) },
    });
  }

  // --- Settings and version ---

  async getSettings(options?: CallOptions): Promise<PortainerSettings> {
    return toSettings(await this.requestJson("GET", "/api/settings", rawSettingsSchema, options));
  }

  async getVersion(options?: CallOptions): Promise<string> {
    const version = await this.requestJson(
      "GET",
      "/api/system/version",
      rawVersionSchema,
      options
    );
    return version.ServerVersion;
  }

  // --- Raw engine proxies ---

  async proxyDockerRequest(request: ProxyRequest, options?: CallOptions): Promise<ProxyResponse> {
    return this.forward("docker", request, options);
  }

  async proxyKubernetesRequest(
    request: ProxyRequest,
    options?: CallOptions
  ): Promise<ProxyResponse> {
    return this.forward("kubernetes", request, options);
  }

  /**
   * Engine root for an environment, e.g. /api/endpoints/3/docker
   */
  engineRoot(engine: ProxyEngine, environmentId: number): string {
    return `/api/endpoints/${environmentId}/${engine}`;
  }

  /**
   * Build the upstream URL and check it still sits under the engine root
   * once the URL parser has normalised it.
   *
   * @throws InvalidArgumentsError if the path escapes the engine root
   */
  resolveEngineUrl(engine: ProxyEngine, request: ProxyRequest): URL {
    const root = new URL(`${this.baseUrl}${this.engineRoot(engine, request.environmentId)}`);
    const url = new URL(`${root.href}${request.path}`);

    if (
      url.origin !== root.origin ||
      (url.pathname !== root.pathname && !url.pathname.startsWith(`${root.pathname}/`))
    ) {
      throw new InvalidArgumentsError("path", `must stay under the ${engine} API root`);
    }

    for (const [key, value] of request.query) {
      url.searchParams.append(key, value);
    }
    return url;
  }

  private async forward(
    engine: ProxyEngine,
    request: ProxyRequest,
    options?: CallOptions
  ): Promise<ProxyResponse> {
    const url = this.resolveEngineUrl(engine, request);
    const target = `${engine} engine (environment ${request.environmentId})`;
    const signal = options?.signal;

    return withSpan(
      `${request.method} ${engine}${request.path}`,
      SpanOperations.PROXY_REQUEST,
      async () => {
        let response: IncomingMessage;
        try {
          response = await sendUpstream(url, request, this.upstreamHeaders(request), signal);
        } catch (error) {
          throw this.toUpstreamError(target, error, signal);
        }

        if (signal) {
          releaseOnAbort(response, signal);
        }

        logger.debug("Proxy response", {
          engine,
          environmentId: request.environmentId,
          method: request.method,
          status: response.statusCode,
        });

        return {
          status: response.statusCode ?? 0,
          statusText: response.statusMessage ?? "",
          headers: rawHeaderPairs(response.rawHeaders),
          body: Readable.toWeb(response),
        };
      },
      {
        [SpanAttributes.HTTP_METHOD]: request.method,
        [SpanAttributes.PORTAINER_ENGINE]: engine,
        [SpanAttributes.PORTAINER_ENVIRONMENT]: request.environmentId,
      }
    );
  }

  /**
   * Caller headers with repeats kept, minus the ones this client owns.
   * The body is relayed as sent, so ask for it uncompressed unless the
   * caller chose an encoding.
   */
  private upstreamHeaders(request: ProxyRequest): OutgoingHttpHeaders {
    const headers: Record<string, string | string[]> = {};
    for (const [name, value] of request.headers) {
      const key = name.toLowerCase();
      if (STRIPPED_PROXY_HEADERS.has(key)) {
        continue;
      }
      const existing = headers[key];
      headers[key] =
        existing === undefined ? value : [...(Array.isArray(existing) ? existing : [existing]), value];
    }
    headers["accept-encoding"] ??= "identity";
    if (request.body !== undefined) {
      headers["content-length"] = String(Buffer.byteLength(request.body));
    }
    headers["x-api-key"] = this.apiToken;
    return headers;
  }

  /**
   * Network failures and timeouts become UpstreamUnreachableError;
   * a caller-side cancellation is rethrown untouched.
   */
  private toUpstreamError(target: string, error: unknown, signal?: AbortSignal): unknown {
    if (signal?.aborted) {
      if (signal.reason instanceof TimeoutError) {
        return new UpstreamUnreachableError(target, signal.reason.message);
      }
      return error;
    }

    let reason = error instanceof Error ? error.message : String(error);
    if (error instanceof Error && error.cause instanceof Error) {
      reason = error.cause.message;
    }
    return new UpstreamUnreachableError(target, reason);
  }

  private async getRawEndpoints(options?: CallOptions) {
    return this.requestJson("GET", "/api/endpoints", rawEndpointSchema.array(), options);
  }

  private async getTeamMemberships(options?: CallOptions) {
    return this.requestJson(
      "GET",
      "/api/team_memberships",
      rawTeamMembershipSchema.array(),
      options
    );
  }

  /**
   * Edge groups only take full updates: read, modify, write back.
   */
  private async updateEdgeGroup(
    id: number,
    modify: (group: RawEdgeGroup) => RawEdgeGroup,
    options?: CallOptions
  ): Promise<void> {
    const current = await this.requestJson(
      "GET",
      `/api/edge_groups/${id}`,
      rawEdgeGroupSchema,
      options
    );
    const next = modify(current);
    await this.requestNoContent("PUT", `/api/edge_groups/${id}`, {
      ...options,
      body: {
        name: next.Name,
        dynamic: next.Dynamic ?? false,
        partialMatch: next.PartialMatch ?? false,
        endpoints: next.Endpoints,
        tagIds: next.TagIds,
      },
    });
  }

  private async requestJson<S extends z.ZodTypeAny>(
    method: HttpMethod,
    endpoint: string,
    schema: S,
    options: RequestOptions = {}
  ): Promise<z.output<S>> {
    const response = await this.send(method, endpoint, options);
    const payload: unknown = await response.json();
    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      throw new ValidationError(
        `Unexpected response from ${method} ${endpoint}: ${parsed.error.issues[0]?.message ?? "invalid payload"}`,
        endpoint,
        payload
      );
    }
    return parsed.data;
  }

  private async requestNoContent(
    method: HttpMethod,
    endpoint: string,
    options: RequestOptions
  ): Promise<void> {
    const response = await this.send(method, endpoint, options);
    await response.body?.cancel();
  }

  /**
   * Send an API request; non-2xx answers become ApiError.
   * GETs are retried on network errors and 5xx.
   */
  private async send(
    method: HttpMethod,
    endpoint: string,
    options: RequestOptions
  ): Promise<Response> {
    const attempt = async (): Promise<Response> => {
      const headers: Record<string, string> = {
        Accept: "application/json",
        "X-API-Key": this.apiToken,
      };
      if (options.body !== undefined) {
        headers["Content-Type"] = "application/json";
      }

      const response = await fetch(`${this.baseUrl}${endpoint}`, {
        method,
        headers,
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
        signal: options.signal,
      });

      if (!response.ok) {
        throw new ApiError(await this.describeFailure(response), response.status, endpoint, {
          method,
        });
      }
      return response;
    };

    return withSpan(
      `${method} ${endpoint}`,
      SpanOperations.HTTP_CLIENT,
      () =>
        method === "GET"
          ? withRetry(attempt, { ...this.retry, signal: options.signal })
          : attempt(),
      { [SpanAttributes.HTTP_METHOD]: method, [SpanAttributes.HTTP_URL]: endpoint }
    );
  }

  /**
   * Portainer errors look like {"message": "...", "details": "..."}.
   */
  private async describeFailure(response: Response): Promise<string> {
    const text = await response.text();
    let detail = text.trim();
    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch {
      body = undefined;
    }
    if (body && typeof body === "object") {
      const message = "message" in body && typeof body.message === "string" ? body.message : "";
      const details = "details" in body && typeof body.details === "string" ? body.details : "";
      detail = [message, details].filter((part) => part.length > 0).join(": ") || detail;
    }
    return `Portainer API error ${response.status}${detail ? `: ${detail}` : ""}`;
  }
}

/**
 * One raw request to the engine. No redirects are followed and the body
 * is never decoded: the caller gets exactly what the engine sent.
 */
function sendUpstream(
  url: URL,
  request: ProxyRequest,
  headers: OutgoingHttpHeaders,
  signal: AbortSignal | undefined
): Promise<IncomingMessage> {
  const options: HttpRequestOptions = { method: request.method, headers, signal };
  return new Promise((resolve, reject) => {
    const outgoing =
      url.protocol === "https:"
        ? httpsRequest(url, options, resolve)
        : httpRequest(url, options, resolve);
    outgoing.on("error", reject);
    outgoing.end(request.body);
  });
}

/** Destroying the response closes the upstream connection and errors its body stream */
function releaseOnAbort(response: IncomingMessage, signal: AbortSignal): void {
  const abort = (): void => {
    response.destroy(signal.reason instanceof Error ? signal.reason : new Error("aborted"));
  };
  if (signal.aborted) {
    abort();
    return;
  }
  signal.addEventListener("abort", abort, { once: true });
  response.once("close", () => {
    signal.removeEventListener("abort", abort);
  });
}

/** `rawHeaders` is a flat name, value, name, value list in wire order */
function rawHeaderPairs(raw: string[]): Array<[string, string]> {
  const pairs: Array<[string, string]> = [];
  for (let i = 0; i + 1 < raw.length; i += 2) {
    pairs.push([(raw[i] ?? "").toLowerCase(), raw[i + 1] ?? ""]);
  }
  return pairs;
}
