/**
 * Parameter Schemas
 *
 * Turns catalog parameter declarations into the JSON Schema published
 * through tools/list and the zod validator that gates every call.
 * Both are derived from the same declaration so they cannot drift.
 */

import { z } from "zod";
import { InvalidArgumentsError, SchemaError } from "../shared/errors.js";
import type {
  ArgumentValidator,
  JsonSchema,
  ParameterDeclaration,
  ParameterShape,
  ToolArguments,
  ToolInputSchema,
} from "./types.js";

/**
 * Check the structural rules zod cannot express on a recursive shape.
 *
 * @param path - Dotted location used in error messages
 */
function checkShape(shape: ParameterShape, path: string): void {
  if (shape.type === "array" && !shape.items) {
    throw new SchemaError(`${path}: array parameters must declare items`);
  }
  if (shape.type !== "array" && shape.items) {
    throw new SchemaError(`${path}: only array parameters may declare items`);
  }
  if (shape.type !== "string" && shape.enum) {
    throw new SchemaError(`${path}: only string parameters may declare enum`);
  }
  if (shape.type !== "object" && shape.properties) {
    throw new SchemaError(`${path}: only object parameters may declare properties`);
  }
  if (shape.items) {
    checkShape(shape.items, `${path}.items`);
  }
  if (shape.properties) {
    checkMembers(shape.properties, path);
  }
}

function checkMembers(members: ParameterDeclaration[], path: string): void {
  const seen = new Set<string>();
  for (const member of members) {
    if (seen.has(member.name)) {
      throw new SchemaError(`${path}: duplicate parameter '${member.name}'`);
    }
    seen.add(member.name);
    checkShape(member, `${path}.${member.name}`);
  }
}

function shapeToJsonSchema(shape: ParameterShape): JsonSchema {
  const schema: JsonSchema = { type: shape.type };
  if (shape.description) {
    schema.description = shape.description;
  }
  if (shape.enum) {
    schema.enum = [...shape.enum];
  }
  if (shape.items) {
    schema.items = shapeToJsonSchema(shape.items);
  }
  if (shape.type === "object") {
    const members = shape.properties ?? [];
    schema.properties = Object.fromEntries(members.map((m) => [m.name, shapeToJsonSchema(m)]));
    schema.required = members.filter((m) => m.required === true).map((m) => m.name);
    schema.additionalProperties = false;
  }
  return schema;
}

function shapeToZod(shape: ParameterShape): z.ZodTypeAny {
  switch (shape.type) {
    case "string": {
      if (shape.enum && shape.enum.length > 0) {
        const [first, ...rest] = shape.enum;
        return z.enum([first, ...rest]);
      }
      return z.string();
    }
    case "number":
      return z.number();
    case "boolean":
      return z.boolean();
    case "array":
      return z.array(shape.items ? shapeToZod(shape.items) : z.unknown());
    case "object":
      return membersToZod(shape.properties ?? []);
  }
}

function membersToZod(members: ParameterDeclaration[]) {
  const fields: Record<string, z.ZodTypeAny> = {};
  for (const member of members) {
    const field = shapeToZod(member);
    fields[member.name] = member.required === true ? field : field.optional();
  }
  return z.object(fields).strict();
}

/**
 * Build the published input schema and the call validator for a tool.
 *
 * @throws SchemaError if a declaration breaks the structural rules
 */
export function compileParameters(
  toolName: string,
  parameters: ParameterDeclaration[]
): { inputSchema: ToolInputSchema; validator: ArgumentValidator } {
  checkMembers(parameters, toolName);

  const inputSchema: ToolInputSchema = {
    type: "object",
    properties: Object.fromEntries(parameters.map((p) => [p.name, shapeToJsonSchema(p)])),
    required: parameters.filter((p) => p.required === true).map((p) => p.name),
    additionalProperties: false,
  };

  return { inputSchema, validator: membersToZod(parameters) };
}

/**
 * Validate call arguments, reporting the first offending field.
 *
 * @throws InvalidArgumentsError naming the field and the reason
 */
export function validateArguments(validator: ArgumentValidator, args: unknown): ToolArguments {
  const result = validator.safeParse(args ?? {});
  if (result.success) {
    return result.data;
  }

  const issue = result.error.issues[0];
  if (!issue) {
    throw new InvalidArgumentsError("(arguments)", "arguments do not match the tool schema");
  }

  if (issue.code === "unrecognized_keys") {
    const prefix = issue.path.length > 0 ? `${issue.path.join(".")}.` : "";
    throw new InvalidArgumentsError(`${prefix}${issue.keys[0] ?? "(unknown)"}`, "is not a declared argument");
  }

  const field = issue.path.length > 0 ? issue.path.join(".") : "(arguments)";
  if (issue.code === "invalid_type" && issue.received === "undefined") {
    throw new InvalidArgumentsError(field, "is required");
  }
  throw new InvalidArgumentsError(field, issue.message);
}
