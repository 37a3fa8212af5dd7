/**
 * Access Guard
 *
 * The single read-only / read-write policy for the server. Registration
 * asks isAllowed() once per declared tool; the proxy bridge asks
 * isMethodAllowed() once per call, since one proxy tool carries any method,
 * and tools/list asks publishedAnnotations() for those same tools.
 */

import type { ToolAnnotations, ToolDefinition } from "../catalog/types.js";

export interface AccessGuardOptions {
  readOnly: boolean;
}

export class AccessGuard {
  readonly readOnly: boolean;

  constructor(options: AccessGuardOptions) {
    this.readOnly = options.readOnly;
  }

  /** False iff the server is read-only and the tool can change state. */
  isAllowed(definition: Pick<ToolDefinition, "mutating">): boolean {
    return !(this.readOnly && definition.mutating);
  }

  /**
   * Annotations as published in this mode. A tool whose effect depends on
   * the method is read-only once the guard limits it to GET.
   */
  publishedAnnotations(
    definition: Pick<ToolDefinition, "mutatingByMethod" | "annotations">
  ): ToolAnnotations {
    if (this.readOnly && definition.mutatingByMethod) {
      return { ...definition.annotations, readOnlyHint: true, destructiveHint: false };
    }
    return definition.annotations;
  }

  /** Only GET is non-mutating; everything else is refused in read-only mode. */
  isMethodAllowed(method: string): boolean {
    return !this.readOnly || method.toUpperCase() === "GET";
  }
}
