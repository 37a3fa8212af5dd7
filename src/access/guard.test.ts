import { describe, expect, it } from "vitest";
import { AccessGuard } from "./guard.js";

describe("AccessGuard", () => {
  describe("read-write mode", () => {
    const guard = new AccessGuard({ readOnly: false });

    it("should allow every tool", () => {
      expect(guard.isAllowed({ mutating: true })).toBe(true);
      expect(guard.isAllowed({ mutating: false })).toBe(true);
    });

    it("should allow every proxy method", () => {
      expect(guard.isMethodAllowed("DELETE")).toBe(true);
      expect(guard.isMethodAllowed("GET")).toBe(true);
    });
  });

  describe("read-only mode", () => {
    const guard = new AccessGuard({ readOnly: true });

    it("should refuse mutating tools only", () => {
      expect(guard.isAllowed({ mutating: true })).toBe(false);
      expect(guard.isAllowed({ mutating: false })).toBe(true);
    });

    it("should allow GET and nothing else", () => {
      expect(guard.isMethodAllowed("GET")).toBe(true);
      expect(guard.isMethodAllowed("get")).toBe(true);
      expect(guard.isMethodAllowed("HEAD")).toBe(false);
      expect(guard.isMethodAllowed("POST")).toBe(false);
    });
  });

  describe("publishedAnnotations", () => {
    const proxy = {
      mutatingByMethod: true,
      annotations: { title: "Docker Engine Proxy", readOnlyHint: false, destructiveHint: true },
    };

    it("should keep declared annotations in read-write mode", () => {
      const guard = new AccessGuard({ readOnly: false });

      expect(guard.publishedAnnotations(proxy)).toEqual(proxy.annotations);
    });

    it("should mark method-gated tools read-only in read-only mode", () => {
      const guard = new AccessGuard({ readOnly: true });

      expect(guard.publishedAnnotations(proxy)).toEqual({
        title: "Docker Engine Proxy",
        readOnlyHint: true,
        destructiveHint: false,
      });
    });

    it("should leave other tools alone in read-only mode", () => {
      const guard = new AccessGuard({ readOnly: true });
      const listTeams = { mutatingByMethod: false, annotations: { readOnlyHint: true } };

      expect(guard.publishedAnnotations(listTeams)).toBe(listTeams.annotations);
    });
  });
});
