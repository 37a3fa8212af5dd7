/**
 * Typed access to validated tool arguments.
 *
 * Arguments have already passed the catalog schema by the time a handler
 * reads them; a mismatch here means the catalog declares a parameter
 * differently from what the handler needs.
 */

import type { ToolArguments } from "../catalog/types.js";
import { ACCESS_LEVELS, type AccessEntry } from "../clients/models.js";
import { InvalidArgumentsError } from "../shared/errors.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export class ArgumentReader {
  private readonly args: ToolArguments;

  constructor(args: ToolArguments) {
    this.args = args;
  }

  has(name: string): boolean {
    return this.args[name] !== undefined;
  }

  number(name: string): number {
    const value = this.args[name];
    if (typeof value !== "number" || !Number.isFinite(value)) {
      throw new InvalidArgumentsError(name, "must be a number");
    }
    return value;
  }

  /** Ids are positive integers */
  id(name: string): number {
    const value = this.number(name);
    if (!Number.isInteger(value) || value < 1) {
      throw new InvalidArgumentsError(name, "must be a positive integer");
    }
    return value;
  }

  string(name: string): string {
    const value = this.args[name];
    if (typeof value !== "string" || value.length === 0) {
      throw new InvalidArgumentsError(name, "must be a non-empty string");
    }
    return value;
  }

  optionalString(name: string): string | undefined {
    return this.has(name) ? this.rawString(name) : undefined;
  }

  oneOf<T extends string>(name: string, allowed: readonly T[]): T {
    const value = this.args[name];
    const match = allowed.find((candidate) => candidate === value);
    if (match === undefined) {
      throw new InvalidArgumentsError(name, `must be one of ${allowed.join(", ")}`);
    }
    return match;
  }

  idArray(name: string): number[] {
    const value = this.args[name];
    if (!Array.isArray(value)) {
      throw new InvalidArgumentsError(name, "must be an array of ids");
    }
    return value.map((item, index) => {
      if (typeof item !== "number" || !Number.isInteger(item) || item < 1) {
        throw new InvalidArgumentsError(`${name}.${index}`, "must be a positive integer");
      }
      return item;
    });
  }

  /** `[{ id, access }]` pairs for user or team access updates */
  accessEntries(name: string): AccessEntry[] {
    return this.records(name).map((record, index) => {
      const reader = new ArgumentReader(record);
      try {
        return { id: reader.id("id"), access: reader.oneOf("access", ACCESS_LEVELS) };
      } catch (error) {
        if (error instanceof InvalidArgumentsError) {
          throw new InvalidArgumentsError(`${name}.${index}.${error.field}`, error.reason);
        }
        throw error;
      }
    });
  }

  /** `[{ key, value }]` pairs, order and repeats kept */
  pairs(name: string): Array<[string, string]> {
    if (!this.has(name)) {
      return [];
    }
    return this.records(name).map((record, index): [string, string] => {
      const { key, value } = record;
      if (typeof key !== "string" || key.length === 0) {
        throw new InvalidArgumentsError(`${name}.${index}.key`, "must be a non-empty string");
      }
      if (typeof value !== "string") {
        throw new InvalidArgumentsError(`${name}.${index}.value`, "must be a string");
      }
      return [key, value];
    });
  }

  private rawString(name: string): string {
    const value = this.args[name];
    if (typeof value !== "string") {
      throw new InvalidArgumentsError(name, "must be a string");
    }
    return value;
  }

  private records(name: string): Array<Record<string, unknown>> {
    const value = this.args[name];
    if (!Array.isArray(value)) {
      throw new InvalidArgumentsError(name, "must be an array");
    }
    return value.map((item, index) => {
      if (!isRecord(item)) {
        throw new InvalidArgumentsError(`${name}.${index}`, "must be an object");
      }
      return item;
    });
  }
}
