/**
 * Catalog Types
 *
 * Declared tools as read from the catalog document and as published
 * through tools/list.
 */

import type { z } from "zod";

export type ParameterType = "string" | "number" | "boolean" | "array" | "object";

/** Shape of a value; `items` and `properties` nest further shapes */
export interface ParameterShape {
  type: ParameterType;
  description?: string;
  /** Allowed values, strings only */
  enum?: string[];
  /** Element shape, arrays only */
  items?: ParameterShape;
  /** Named members, objects only */
  properties?: ParameterDeclaration[];
}

export interface ParameterDeclaration extends ParameterShape {
  name: string;
  required?: boolean;
}

/** A tool as written in the catalog document */
export interface ToolDeclaration {
  name: string;
  description: string;
  mutating: boolean;
  /** Whether a call mutates depends on its HTTP method (the engine proxies) */
  mutatingByMethod?: boolean;
  annotations?: {
    title?: string;
    destructiveHint?: boolean;
    idempotentHint?: boolean;
    openWorldHint?: boolean;
  };
  parameters: ParameterDeclaration[];
}

/** JSON Schema subset published to agents */
export type JsonSchema = {
  type: ParameterType;
  description?: string;
  enum?: string[];
  items?: JsonSchema;
  properties?: Record<string, JsonSchema>;
  required?: string[];
  additionalProperties?: false;
};

export type ToolInputSchema = {
  type: "object";
  properties: Record<string, JsonSchema>;
  required: string[];
  additionalProperties: false;
};

export type ToolAnnotations = {
  title?: string;
  readOnlyHint: boolean;
  destructiveHint?: boolean;
  idempotentHint?: boolean;
  openWorldHint?: boolean;
};

/** Immutable definition of a declared tool */
export interface ToolDefinition {
  readonly name: string;
  readonly description: string;
  readonly inputSchema: ToolInputSchema;
  /** True if invoking the tool can change backend state */
  readonly mutating: boolean;
  /** Reachable in read-only mode, but only for non-mutating methods */
  readonly mutatingByMethod: boolean;
  readonly annotations: ToolAnnotations;
}

export type ToolArguments = Record<string, unknown>;

export type ArgumentValidator = z.ZodType<ToolArguments>;

export interface CatalogEntry {
  readonly definition: ToolDefinition;
  readonly validator: ArgumentValidator;
}
