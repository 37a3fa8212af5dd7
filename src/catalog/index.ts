/**
 * Tool catalog exports
 */

export { ToolCatalog, loadToolCatalog, parseToolCatalog } from "./loader.js";
export { compileParameters, validateArguments } from "./schema.js";
export { isVersionAtLeast, parseVersion } from "./version.js";
export type {
  ArgumentValidator,
  CatalogEntry,
  JsonSchema,
  ParameterDeclaration,
  ParameterShape,
  ParameterType,
  ToolAnnotations,
  ToolArguments,
  ToolDeclaration,
  ToolDefinition,
  ToolInputSchema,
} from "./types.js";
