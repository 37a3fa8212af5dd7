import { describe, expect, it } from "vitest";
import { InvalidArgumentsError } from "../shared/errors.js";
import { ArgumentReader } from "./args.js";

describe("ArgumentReader", () => {
  it("should read ids and reject non-positive ones", () => {
    const reader = new ArgumentReader({ id: 4, zero: 0, half: 1.5 });

    expect(reader.id("id")).toBe(4);
    expect(() => reader.id("zero")).toThrow("Invalid argument 'zero': must be a positive integer");
    expect(() => reader.id("half")).toThrow(InvalidArgumentsError);
  });

  it("should require non-empty strings", () => {
    const reader = new ArgumentReader({ name: "ops", empty: "" });

    expect(reader.string("name")).toBe("ops");
    expect(() => reader.string("empty")).toThrow("must be a non-empty string");
    expect(reader.optionalString("missing")).toBeUndefined();
    expect(reader.optionalString("empty")).toBe("");
  });

  it("should pick a value from an allowed list", () => {
    const reader = new ArgumentReader({ role: "edge_admin" });

    expect(reader.oneOf("role", ["admin", "user", "edge_admin"])).toBe("edge_admin");
    expect(() => reader.oneOf("role", ["admin"])).toThrow("must be one of admin");
  });

  it("should read id arrays and name the bad element", () => {
    const reader = new ArgumentReader({ ids: [1, 2], bad: [1, "2"] });

    expect(reader.idArray("ids")).toEqual([1, 2]);
    expect(() => reader.idArray("bad")).toThrow("Invalid argument 'bad.1': must be a positive integer");
  });

  it("should read access entries with nested field names", () => {
    const reader = new ArgumentReader({
      good: [{ id: 3, access: "readonly_user" }],
      bad: [{ id: 3, access: "readonly_user" }, { id: 4, access: "owner" }],
    });

    expect(reader.accessEntries("good")).toEqual([{ id: 3, access: "readonly_user" }]);
    expect(() => reader.accessEntries("bad")).toThrow(
      expect.objectContaining({ field: "bad.1.access" })
    );
  });

  it("should keep key/value pairs in order, repeats included", () => {
    const reader = new ArgumentReader({
      query: [
        { key: "filters", value: "a" },
        { key: "all", value: "1" },
        { key: "filters", value: "b" },
      ],
    });

    expect(reader.pairs("query")).toEqual([
      ["filters", "a"],
      ["all", "1"],
      ["filters", "b"],
    ]);
    expect(reader.pairs("headers")).toEqual([]);
  });

  it("should reject pairs without a key", () => {
    const reader = new ArgumentReader({ headers: [{ key: "", value: "x" }] });

    expect(() => reader.pairs("headers")).toThrow("Invalid argument 'headers.0.key'");
  });
});
