/**
 * Tool Catalog Loader
 *
 * Reads the declarative tool catalog (YAML) once at startup.
 * Any problem is a SchemaError: the server must not start on a catalog
 * it cannot fully trust.
 */

import { readFile } from "node:fs/promises";
import { parse } from "yaml";
import { z } from "zod";
import { SchemaError } from "../shared/errors.js";
import { MINIMUM_TOOLS_VERSION } from "../shared/constants.js";
import { compileParameters } from "./schema.js";
import { isVersionAtLeast, parseVersion } from "./version.js";
import type {
  CatalogEntry,
  ParameterDeclaration,
  ParameterShape,
  ToolDeclaration,
  ToolDefinition,
} from "./types.js";

const NAME_PATTERN = /^[A-Za-z][A-Za-z0-9_]*$/;

const parameterTypeSchema = z.enum(["string", "number", "boolean", "array", "object"]);

const parameterShapeSchema: z.ZodType<ParameterShape> = z.lazy(() =>
  z
    .object({
      type: parameterTypeSchema,
      description: z.string().optional(),
      enum: z.array(z.string()).min(1).optional(),
      items: parameterShapeSchema.optional(),
      properties: z.array(parameterDeclarationSchema).optional(),
    })
    .strict()
);

const parameterDeclarationSchema: z.ZodType<ParameterDeclaration> = z.lazy(() =>
  z
    .object({
      name: z.string().regex(NAME_PATTERN, "parameter names must be identifiers"),
      required: z.boolean().optional(),
      type: parameterTypeSchema,
      description: z.string().optional(),
      enum: z.array(z.string()).min(1).optional(),
      items: parameterShapeSchema.optional(),
      properties: z.array(parameterDeclarationSchema).optional(),
    })
    .strict()
);

const toolDeclarationSchema: z.ZodType<ToolDeclaration, z.ZodTypeDef, unknown> = z
  .object({
    name: z.string().regex(NAME_PATTERN, "tool names must be identifiers"),
    description: z.string().min(1),
    mutating: z.boolean(),
    mutatingByMethod: z.boolean().optional(),
    annotations: z
      .object({
        title: z.string().optional(),
        destructiveHint: z.boolean().optional(),
        idempotentHint: z.boolean().optional(),
        openWorldHint: z.boolean().optional(),
      })
      .strict()
      .optional(),
    parameters: z.array(parameterDeclarationSchema).default([]),
  })
  .strict();

const documentSchema = z.object({
  version: z.string(),
  tools: z.array(z.unknown()),
});

/**
 * The set of declared tools, keyed by name.
 * Pure lookup table; built once and never modified.
 */
export class ToolCatalog {
  readonly version: string;
  private readonly entries: ReadonlyMap<string, CatalogEntry>;

  constructor(version: string, entries: CatalogEntry[]) {
    this.version = version;
    this.entries = new Map(entries.map((entry) => [entry.definition.name, entry]));
  }

  get(name: string): CatalogEntry | undefined {
    return this.entries.get(name);
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  names(): string[] {
    return [...this.entries.keys()];
  }

  definitions(): ToolDefinition[] {
    return [...this.entries.values()].map((entry) => entry.definition);
  }

  get size(): number {
    return this.entries.size;
  }
}

function describeIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) {
    return "invalid declaration";
  }
  const where = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
  return `${where}${issue.message}`;
}

function toEntry(declaration: ToolDeclaration): CatalogEntry {
  const { inputSchema, validator } = compileParameters(declaration.name, declaration.parameters);
  const mutatingByMethod = declaration.mutatingByMethod === true;

  const definition: ToolDefinition = Object.freeze({
    name: declaration.name,
    description: declaration.description,
    inputSchema,
    mutating: declaration.mutating,
    mutatingByMethod,
    annotations: {
      ...declaration.annotations,
      readOnlyHint: !declaration.mutating && !mutatingByMethod,
      ...(mutatingByMethod
        ? { destructiveHint: declaration.annotations?.destructiveHint ?? true }
        : {}),
    },
  });

  return Object.freeze({ definition, validator });
}

/**
 * Parse a catalog document.
 *
 * @param text - YAML source
 * @param minimumVersion - Oldest catalog version this build accepts
 * @param source - Label for error messages (usually the file path)
 * @throws SchemaError on any parse, version or declaration problem
 */
export function parseToolCatalog(
  text: string,
  minimumVersion: string = MINIMUM_TOOLS_VERSION,
  source = "<inline>"
): ToolCatalog {
  let raw: unknown;
  try {
    raw = parse(text);
  } catch (error) {
    throw new SchemaError(
      `${source}: not valid YAML: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const document = documentSchema.safeParse(raw);
  if (!document.success) {
    throw new SchemaError(`${source}: ${describeIssue(document.error)}`);
  }

  const { version, tools } = document.data;
  if (!parseVersion(version)) {
    throw new SchemaError(`${source}: invalid version '${version}'`, { version });
  }
  if (!isVersionAtLeast(version, minimumVersion)) {
    throw new SchemaError(
      `${source}: tools version ${version} is older than the minimum supported ${minimumVersion}`,
      { version, minimumVersion }
    );
  }

  const entries: CatalogEntry[] = [];
  const seen = new Set<string>();

  tools.forEach((item, index) => {
    const declaration = toolDeclarationSchema.safeParse(item);
    if (!declaration.success) {
      throw new SchemaError(`${source}: tools[${index}]: ${describeIssue(declaration.error)}`);
    }
    const { name } = declaration.data;
    if (seen.has(name)) {
      throw new SchemaError(`${source}: duplicate tool '${name}'`, { tool: name });
    }
    seen.add(name);
    entries.push(toEntry(declaration.data));
  });

  return new ToolCatalog(version, entries);
}

/**
 * Load the catalog from disk.
 *
 * @throws SchemaError if the file cannot be read or fails to parse
 */
export async function loadToolCatalog(
  path: string,
  minimumVersion: string = MINIMUM_TOOLS_VERSION
): Promise<ToolCatalog> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (error) {
    throw new SchemaError(
      `failed to read tool catalog at ${path}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return parseToolCatalog(text, minimumVersion, path);
}
