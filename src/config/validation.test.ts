import { describe, expect, it } from "vitest";
import { maskApiToken, validateApiToken, validateServerUrl } from "./validation.js";

describe("validateServerUrl", () => {
  it("should strip trailing slashes", () => {
    expect(validateServerUrl("https://portainer.test:9443/")).toBe("https://portainer.test:9443");
  });

  it("should keep a base path", () => {
    expect(validateServerUrl("http://10.0.0.5/portainer//")).toBe("http://10.0.0.5/portainer");
  });

  it("should reject missing and non-http URLs", () => {
    expect(() => validateServerUrl(undefined)).toThrow("server URL is empty");
    expect(() => validateServerUrl("portainer.test")).toThrow("not a valid URL");
    expect(() => validateServerUrl("ftp://portainer.test")).toThrow("must use http or https");
  });
});

describe("validateApiToken", () => {
  it("should trim surrounding whitespace", () => {
    expect(validateApiToken("  test-secret\n")).toBe("test-secret");
  });

  it("should reject empty tokens and inner whitespace", () => {
    expect(() => validateApiToken("")).toThrow("API token is empty");
    expect(() => validateApiToken("test secret-token")).toThrow(
      "API token must not contain whitespace (got: tes...oken)"
    );
  });
});

describe("maskApiToken", () => {
  it("should hide short tokens entirely", () => {
    expect(maskApiToken("abc")).toBe("***");
  });

  it("should show only the edges of longer tokens", () => {
    expect(maskApiToken("test-secret")).toBe("tes...cret");
  });
});
